import { describe, it, expect } from 'vitest';
import {
    normalizeUrl,
    getDomain,
    isValidUrl,
    resolveUrl,
    isSameOrigin,
} from '../src/url/normalize.js';

describe('normalizeUrl', () => {
    it('should drop the fragment', () => {
        expect(normalizeUrl('http://x.com/a#section')).toBe('http://x.com/a');
    });

    it('should lower-case scheme and host and drop default ports', () => {
        expect(normalizeUrl('HTTP://X.com:80/a?b=1')).toBe('http://x.com/a?b=1');
        expect(normalizeUrl('https://x.com:443')).toBe('https://x.com/');
    });

    it('should keep path and query as written', () => {
        expect(normalizeUrl('http://x.com/a/')).toBe('http://x.com/a/');
        expect(normalizeUrl('http://x.com/a?z=1&a=2')).toBe('http://x.com/a?z=1&a=2');
    });

    it('should return unparseable input unchanged', () => {
        expect(normalizeUrl('not a url')).toBe('not a url');
    });
});

describe('getDomain', () => {
    it('should return the lower-cased host without port', () => {
        expect(getDomain('http://Sub.X.com:8080/p')).toBe('sub.x.com');
    });

    it('should return null for invalid URLs', () => {
        expect(getDomain('nope')).toBeNull();
    });
});

describe('isValidUrl', () => {
    it('should only accept http and https', () => {
        expect(isValidUrl('https://x.com')).toBe(true);
        expect(isValidUrl('http://x.com/a')).toBe(true);
        expect(isValidUrl('ftp://x.com')).toBe(false);
        expect(isValidUrl('mailto:me@x.com')).toBe(false);
        expect(isValidUrl('/relative')).toBe(false);
    });
});

describe('resolveUrl', () => {
    it('should resolve relative references against the base', () => {
        expect(resolveUrl('http://x.com/a/b.html', '../c')).toBe('http://x.com/c');
        expect(resolveUrl('http://x.com/a/', '?q=1')).toBe('http://x.com/a/?q=1');
        expect(resolveUrl('http://x.com/a/', '/root')).toBe('http://x.com/root');
    });

    it('should pass absolute URLs through', () => {
        expect(resolveUrl('http://x.com/a/', 'http://y.com/z')).toBe('http://y.com/z');
    });

    it('should return null when the base is invalid', () => {
        expect(resolveUrl('nope', 'page.html')).toBeNull();
    });
});

describe('isSameOrigin', () => {
    it('should compare scheme, host and port', () => {
        expect(isSameOrigin('http://x.com/a', 'http://x.com/b')).toBe(true);
        expect(isSameOrigin('http://x.com/a', 'https://x.com/a')).toBe(false);
        expect(isSameOrigin('http://x.com/a', 'http://x.com:8080/a')).toBe(false);
        expect(isSameOrigin('http://x.com/a', 'nope')).toBe(false);
    });
});
