/**
 * URL normalization utilities shared by the fetchers, scorer and renderers.
 */

const TRACKING_PARAMS = [
    'utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content',
    'fbclid', 'gclid', 'mc_cid', 'mc_eid', 'ref', 'source'
];

export function normalizeUrlForDedupe(url: string): string {
    if (!url) return '';
    try {
        const u = new URL(url);
        TRACKING_PARAMS.forEach(p => u.searchParams.delete(p));
        u.hash = '';
        return u.toString().toLowerCase();
    } catch {
        return url.toLowerCase();
    }
}

/**
 * Drop tracking parameters and fragments. Returns '' for anything that is not an http(s) URL.
 */
export function cleanArticleUrl(url: string): string {
    if (!url) return '';
    try {
        const u = new URL(url.trim());
        if (!u.protocol.startsWith('http')) return '';
        TRACKING_PARAMS.forEach(p => u.searchParams.delete(p));
        u.hash = '';
        return u.toString();
    } catch {
        return '';
    }
}

// Lowercased host ("www.theverge.com"), '' when unparseable
export function getHost(url: string): string {
    try {
        return new URL(url).hostname.toLowerCase();
    } catch {
        return '';
    }
}

export function resolveUrl(href: string, base: string): string {
    try {
        return new URL(href, base).toString();
    } catch {
        return '';
    }
}
