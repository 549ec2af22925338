import { createApp } from './presentation/app';
import { getConfig, validateConfig } from './config';
import { DEFAULT_KEYWORD_LEXICON } from './domain/services/LexicalScorer';

async function main(): Promise<void> {
    console.log('🔎 SERP Content Analyzer - starting...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = getConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config, Object.keys(DEFAULT_KEYWORD_LEXICON));

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Create and start the app
        console.log('🚀 Initializing application components...');
        const app = createApp(config);

        app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Default language: ${config.defaultLanguage}, concurrency: ${config.analysis.concurrency}`);
        });
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
