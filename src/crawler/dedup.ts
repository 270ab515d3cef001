import { createHash } from 'crypto';
import { normalizeUrl } from '../url/normalize.js';

/**
 * URLs already admitted during one crawl run, keyed by the MD5 digest of
 * the normalized URL.
 */
export class DedupSet {
    private seen = new Set<string>();

    private getKey(url: string): string {
        return createHash('md5').update(normalizeUrl(url)).digest('hex');
    }

    /**
     * Test-and-set in one synchronous step. True only for the first call
     * with a given URL; the check and the insert must never be split by an
     * await.
     */
    markIfNew(url: string): boolean {
        const key = this.getKey(url);
        if (this.seen.has(key)) return false;
        this.seen.add(key);
        return true;
    }

    has(url: string): boolean {
        return this.seen.has(this.getKey(url));
    }

    get size(): number {
        return this.seen.size;
    }
}
