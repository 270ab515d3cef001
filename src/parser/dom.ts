import { JSDOM, VirtualConsole } from 'jsdom';

function quietConsole(): VirtualConsole {
    // Page scripts never run, so anything jsdom reports here is noise
    return new VirtualConsole().sendTo(console, { omitJSDOMErrors: true });
}

export function htmlToDom(html: string, url: string): JSDOM {
    try {
        return new JSDOM(html, {
            url,
            contentType: 'text/html',
            includeNodeLocations: false,
            runScripts: undefined, // Don't run scripts
            resources: undefined, // Don't load external resources
            virtualConsole: quietConsole(),
        });
    } catch {
        // Return a minimal DOM with the content
        return new JSDOM(`<!DOCTYPE html><html><body>${html}</body></html>`, {
            url,
            contentType: 'text/html',
            virtualConsole: quietConsole(),
        });
    }
}

/**
 * Absolute http(s) targets of every `a[href]`, resolved against the
 * document's base URL (honouring `<base href>`), without duplicates and
 * without fragments.
 */
export function extractLinks(dom: JSDOM): string[] {
    const document = dom.window.document;
    const links: string[] = [];
    const baseUrl = document.baseURI;

    const anchorElements = document.querySelectorAll('a[href]');

    anchorElements.forEach(element => {
        const href = element.getAttribute('href')?.trim();
        if (!href) return;

        // Skip non-http links
        if (
            href.startsWith('mailto:') ||
            href.startsWith('tel:') ||
            href.startsWith('javascript:') ||
            href.startsWith('#')
        ) {
            return;
        }

        try {
            const absolute = new URL(href, baseUrl);
            if (absolute.protocol !== 'http:' && absolute.protocol !== 'https:') {
                return;
            }
            absolute.hash = '';
            links.push(absolute.href);
        } catch {
            // Invalid URL, skip
        }
    });

    return [...new Set(links)]; // Remove duplicates
}

export function extractTitle(dom: JSDOM): string {
    return dom.window.document.title.trim();
}
