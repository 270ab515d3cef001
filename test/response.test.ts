import { describe, it, expect } from 'vitest';
import { CrawlResponse } from '../src/crawler/response.js';

describe('CrawlResponse', () => {
    it('should default the final URL to the requested one', () => {
        const response = new CrawlResponse({ url: 'http://x.com/a', status: 200 });
        expect(response.finalUrl).toBe('http://x.com/a');
        expect(response.statusText).toBe('');
        expect(response.body.byteLength).toBe(0);
        expect(response.text).toBe('');
    });

    it('should look headers up case-insensitively', () => {
        const response = new CrawlResponse({
            url: 'http://x.com/',
            status: 200,
            headers: { 'Content-Type': 'text/html' },
        });
        expect(response.get('content-type')).toBe('text/html');
        expect(response.get('CONTENT-TYPE')).toBe('text/html');
        expect(response.get('x-missing')).toBeUndefined();
        expect(response.get('x-missing', 'none')).toBe('none');
    });

    it('should accept headers as entry pairs', () => {
        const response = new CrawlResponse({
            url: 'http://x.com/',
            status: 200,
            headers: [['X-Test', 'yes']],
        });
        expect(response.get('x-test')).toBe('yes');
    });

    it('should decode text as UTF-8 when no charset is declared', () => {
        const response = new CrawlResponse({
            url: 'http://x.com/',
            status: 200,
            body: 'héllo wörld',
        });
        expect(response.encoding).toBeUndefined();
        expect(response.text).toBe('héllo wörld');
    });

    it('should decode text with the declared charset', () => {
        const response = new CrawlResponse({
            url: 'http://x.com/',
            status: 200,
            headers: { 'content-type': 'text/html; charset=ISO-8859-1' },
            body: new Uint8Array([0x63, 0x61, 0x66, 0xe9]),
        });
        expect(response.encoding).toBe('iso-8859-1');
        expect(response.text).toBe('café');
    });

    it('should read quoted charsets', () => {
        const response = new CrawlResponse({
            url: 'http://x.com/',
            status: 200,
            headers: { 'content-type': 'text/html; charset="UTF-8"' },
        });
        expect(response.encoding).toBe('utf-8');
    });

    it('should fall back to UTF-8 for unknown charsets', () => {
        const response = new CrawlResponse({
            url: 'http://x.com/',
            status: 200,
            headers: { 'content-type': 'text/plain; charset=bogus' },
            body: 'naïve',
        });
        expect(response.text).toBe('naïve');
    });

    it('should replace malformed bytes instead of failing', () => {
        const response = new CrawlResponse({
            url: 'http://x.com/',
            status: 200,
            body: new Uint8Array([0x61, 0xff, 0x62]),
        });
        expect(response.text).toBe('a�b');
    });

    it('should join links against the final URL', () => {
        const response = new CrawlResponse({
            url: 'http://x.com/old',
            finalUrl: 'http://x.com/dir/page.html',
            status: 200,
        });
        expect(response.urlJoin('other.html')).toBe('http://x.com/dir/other.html');
        expect(response.urlJoin('/root')).toBe('http://x.com/root');
        expect(response.urlJoin('https://y.com/z')).toBe('https://y.com/z');
    });

    it('should report success statuses as ok', () => {
        expect(new CrawlResponse({ url: 'http://x.com/', status: 204 }).ok).toBe(true);
        expect(new CrawlResponse({ url: 'http://x.com/', status: 404 }).ok).toBe(false);
    });
});
