import { InMemoryCacheAdapter } from '../../../src/infrastructure/cache/InMemoryCacheAdapter';
import { analysisCacheKey } from '../../../src/domain/ports/ICachePort';

describe('InMemoryCacheAdapter', () => {
    let cache: InMemoryCacheAdapter;

    beforeEach(() => {
        cache = new InMemoryCacheAdapter();
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('should return null for a missing key', async () => {
        await expect(cache.get('missing')).resolves.toBeNull();
    });

    it('should store and return values', async () => {
        await cache.set('k', { score: 0.4 });

        await expect(cache.get('k')).resolves.toEqual({ score: 0.4 });
    });

    it('should expire entries after their TTL', async () => {
        jest.useFakeTimers();
        jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));

        await cache.set('k', 'v', 60);
        jest.setSystemTime(new Date('2026-01-01T00:00:59Z'));
        await expect(cache.get('k')).resolves.toBe('v');

        jest.setSystemTime(new Date('2026-01-01T00:01:01Z'));
        await expect(cache.get('k')).resolves.toBeNull();
        expect(cache.size()).toBe(0);
    });

    it('should not keep an entry stored with a zero TTL', async () => {
        jest.useFakeTimers();
        jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));

        await cache.set('k', 'v', 0);

        await expect(cache.get('k')).resolves.toBeNull();
    });

    it('should sweep expired entries when writing', async () => {
        jest.useFakeTimers();
        jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));

        await cache.set('short', 1, 1);
        await cache.set('long', 2, 60);
        jest.setSystemTime(new Date('2026-01-01T00:00:02Z'));
        await cache.set('fresh', 3);

        expect(cache.size()).toBe(2);
        await expect(cache.get('long')).resolves.toBe(2);
        await expect(cache.get('fresh')).resolves.toBe(3);
    });

    it('should report how many entries cleanup removed', async () => {
        jest.useFakeTimers();
        jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));

        await cache.set('a', 1, 1);
        await cache.set('b', 2, 1);
        await cache.set('c', 3);
        jest.setSystemTime(new Date('2026-01-01T00:00:05Z'));

        expect(cache.cleanup()).toBe(2);
        expect(cache.size()).toBe(1);
    });

    it('should clear every entry', async () => {
        await cache.set('a', 1);
        await cache.set('b', 2);

        await cache.clear();

        expect(cache.size()).toBe(0);
        await expect(cache.get('a')).resolves.toBeNull();
    });

    describe('analysisCacheKey()', () => {
        it('should include the language', () => {
            expect(analysisCacheKey('https://example.test/', 'da')).toBe('analysis:da:https://example.test/');
            expect(analysisCacheKey('https://example.test/', 'en')).not.toBe(analysisCacheKey('https://example.test/', 'da'));
        });
    });
});
