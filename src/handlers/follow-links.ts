import { extractLinks, extractTitle, htmlToDom } from '../parser/dom.js';
import { isSameOrigin } from '../url/normalize.js';
import type { CrawlResponse } from '../crawler/response.js';
import type { DocumentHandler, TaskContext } from '../types.js';

export interface PageVisit {
    url: string;
    finalUrl: string;
    status: number;
    title: string;
    links: string[];
}

export interface FollowLinksOptions {
    /** Only follow links with the same origin as the page they were found on */
    sameOriginOnly?: boolean;
    /** Called once per parsed page, after its links were submitted */
    onPage?: (visit: PageVisit, context: TaskContext) => void | Promise<void>;
}

function isHtml(response: CrawlResponse): boolean {
    const contentType = response.get('content-type');
    if (!contentType) return true;
    return (
        contentType.includes('text/html') ||
        contentType.includes('application/xhtml+xml')
    );
}

/**
 * Handler that parses HTML pages and submits every anchor target it finds.
 * Non-HTML responses are reported with no links.
 */
export function followLinks(options: FollowLinksOptions = {}): DocumentHandler {
    const { sameOriginOnly = false, onPage } = options;

    return async (response, context) => {
        let title = '';
        let links: string[] = [];

        if (isHtml(response)) {
            const dom = htmlToDom(response.text, response.finalUrl);
            try {
                title = extractTitle(dom);
                links = extractLinks(dom);
            } finally {
                dom.window.close();
            }
        }

        if (sameOriginOnly) {
            links = links.filter(link => isSameOrigin(response.finalUrl, link));
        }

        context.addTask(...links);

        if (onPage) {
            await onPage(
                {
                    url: response.url,
                    finalUrl: response.finalUrl,
                    status: response.status,
                    title,
                    links,
                },
                context
            );
        }
    };
}
