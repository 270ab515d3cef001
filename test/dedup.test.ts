import { describe, it, expect } from 'vitest';
import { DedupSet } from '../src/crawler/dedup.js';

describe('DedupSet', () => {
    it('should mark a URL only once', () => {
        const seen = new DedupSet();
        expect(seen.markIfNew('http://x.com/a')).toBe(true);
        expect(seen.markIfNew('http://x.com/a')).toBe(false);
        expect(seen.markIfNew('http://x.com/a')).toBe(false);
        expect(seen.size).toBe(1);
    });

    it('should treat URLs with equal normalized forms as the same', () => {
        const seen = new DedupSet();
        expect(seen.markIfNew('http://x.com/a')).toBe(true);
        expect(seen.markIfNew('http://x.com/a#top')).toBe(false);
        expect(seen.markIfNew('HTTP://X.COM:80/a')).toBe(false);
        expect(seen.has('http://x.com/a#other')).toBe(true);
    });

    it('should keep different queries apart', () => {
        const seen = new DedupSet();
        expect(seen.markIfNew('http://x.com/a?page=1')).toBe(true);
        expect(seen.markIfNew('http://x.com/a?page=2')).toBe(true);
        expect(seen.size).toBe(2);
    });

    it('should let exactly one of many concurrent submissions through', async () => {
        const seen = new DedupSet();
        const results = await Promise.all(
            Array.from({ length: 50 }, async (_, i) => {
                await new Promise(resolve => setTimeout(resolve, i % 3));
                return seen.markIfNew('http://x.com/shared');
            })
        );
        expect(results.filter(Boolean)).toHaveLength(1);
    });
});
