/**
 * Text utility functions
 */

const INVALID_FILENAME_CHARS = /[\\/*?:"<>|\u0000-\u001f]/g;

/**
 * Formats a string to be safe for use as a folder or file name
 * - Removes invalid characters: \ / * ? : " < > | and control characters
 * - Replaces whitespace with underscores
 * - Limits length to 100 characters
 */
export function formatFilename(name: string): string {
    return name
        .replace(INVALID_FILENAME_CHARS, '')
        .trim()
        .replace(/\s/g, '_')
        .slice(0, 100);
}

/**
 * Cleans a human title for use inside a filename, keeping spaces.
 * `Chapter_001 - <title>.pdf` relies on the title never containing
 * path separators.
 */
export function sanitizeTitle(title: string): string {
    const cleaned = title
        .replace(INVALID_FILENAME_CHARS, ' ')
        .replace(/\s+/g, ' ')
        .trim()
        .slice(0, 100)
        .trim();
    return cleaned || 'Untitled';
}

/**
 * Drops the query string and fragment from an image URL
 */
export function cleanImageUrl(url: string): string {
    return url.split(/[?#]/)[0]?.trim() ?? '';
}

/**
 * Resolves a possibly relative URL against the page it was found on
 *
 * @returns The absolute URL, or null when it cannot be resolved
 */
export function resolveUrl(baseUrl: string, href: string | undefined | null): string | null {
    if (!href) return null;
    try {
        return new URL(href.trim(), baseUrl).toString();
    } catch {
        return null;
    }
}

/**
 * Normalizes a URL for identity comparison (loop detection)
 */
export function normalizeUrl(url: string): string {
    try {
        const parsed = new URL(url);
        parsed.hash = '';
        const path = parsed.pathname.replace(/\/+$/, '');
        return `${parsed.protocol}//${parsed.host.toLowerCase()}${path}${parsed.search}`;
    } catch {
        return url.trim();
    }
}

/**
 * Guesses a title from a chapter URL slug, e.g.
 * `https://host/title/123-en-some-series/456-ch-012` → `some series`
 */
export function titleFromUrl(url: string): string {
    try {
        const segments = new URL(url).pathname.split('/').filter(Boolean);
        const candidate = segments.length > 1 ? segments[segments.length - 2] : segments[0];
        if (!candidate) return '';
        return candidate
            .replace(/^\d+-(?:[a-z]{2}-)?/i, '')
            .replace(/[-_]+/g, ' ')
            .trim();
    } catch {
        return '';
    }
}
