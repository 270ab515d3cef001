import { describe, it, expect } from 'vitest';
import { DomainFilter } from '../src/crawler/filter.js';

describe('DomainFilter', () => {
    describe('with an empty allow-list', () => {
        const filter = new DomainFilter();

        it('should admit any http(s) URL', () => {
            expect(filter.unrestricted).toBe(true);
            expect(filter.admit('http://anything.org/')).toBe(true);
            expect(filter.admit('https://x.com/a?b=c')).toBe(true);
        });

        it('should still reject URLs that cannot be fetched', () => {
            expect(filter.admit('mailto:me@x.com')).toBe(false);
            expect(filter.admit('not a url')).toBe(false);
        });
    });

    describe('exact matching', () => {
        const filter = new DomainFilter(['x.com', 'y.org']);

        it('should admit listed domains regardless of case and port', () => {
            expect(filter.admit('http://x.com/1')).toBe(true);
            expect(filter.admit('http://X.COM/2')).toBe(true);
            expect(filter.admit('http://x.com:8080/3')).toBe(true);
            expect(filter.admit('https://y.org/')).toBe(true);
        });

        it('should reject every domain absent from the list', () => {
            expect(filter.admit('http://z.com/1')).toBe(false);
            expect(filter.admit('http://sub.x.com/')).toBe(false);
            expect(filter.admit('http://notx.com/')).toBe(false);
        });

        it('should agree with list membership for every URL', () => {
            const allowed = new Set(['x.com', 'y.org']);
            const urls = [
                'http://x.com/',
                'http://a.x.com/',
                'https://y.org/p',
                'http://y.org.evil.com/',
                'http://q.net/',
            ];
            for (const url of urls) {
                expect(filter.admit(url)).toBe(allowed.has(new URL(url).hostname));
            }
        });
    });

    describe('suffix matching', () => {
        const filter = new DomainFilter(['x.com'], 'suffix');

        it('should admit the domain and its subdomains', () => {
            expect(filter.admit('http://x.com/')).toBe(true);
            expect(filter.admit('http://sub.x.com/')).toBe(true);
            expect(filter.admit('http://a.b.x.com/')).toBe(true);
        });

        it('should not admit domains that merely end with the same text', () => {
            expect(filter.admit('http://notx.com/')).toBe(false);
        });
    });

    it('should normalize allow-list entries', () => {
        const filter = new DomainFilter(['  *.X.com ', '.y.org', '']);
        expect(filter.allowed).toEqual(['x.com', 'y.org']);
        expect(filter.admit('http://x.com/')).toBe(true);
        expect(filter.admit('http://y.org/')).toBe(true);
    });
});
