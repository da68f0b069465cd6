/**
 * Constants for chapter-binder
 */

/**
 * HTTP headers sent with every page and image request
 */
export const HEADERS: Record<string, string> = {
    'User-Agent':
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    Accept: 'text/html,application/xhtml+xml,image/avif,image/webp,image/*,*/*;q=0.8',
};

/**
 * File and directory names used on disk
 */
export const PATHS = {
    /** Default root for downloaded titles */
    DOWNLOADS_DIR: 'downloads',
    /** Read-only engine settings */
    SETTINGS_FILE: 'settings.json',
    /** Default bulk download list */
    BULK_FILE: 'bulk.json',
    /** Per-title folder holding session manifests */
    MANIFESTS_DIR: '_manifests',
    /** Pointer file naming the latest session manifest */
    MANIFEST_POINTER: 'latest_manifest.txt',
    /** Where merged originals are moved */
    ORIGINALS_DIR: '_originals',
    /** Per-title error log */
    ERROR_LOG: 'error_log.txt',
} as const;

/**
 * Network configuration
 */
export const NETWORK = {
    /** Attempts per request, the first one included */
    MAX_RETRIES: 3,
    /** Request timeout in milliseconds */
    TIMEOUT: 30000,
    /** First backoff delay in milliseconds, doubled per attempt */
    BACKOFF_BASE: 1000,
    /** Upper bound for a single backoff delay */
    BACKOFF_CEILING: 8000,
    /** Number of requests before anti-ban pause (0 disables it) */
    REQUESTS_BEFORE_PAUSE: 100,
    /** Anti-ban pause duration in milliseconds */
    ANTI_BAN_PAUSE: 30000,
} as const;

/**
 * Default pacing between network operations, in milliseconds
 */
export const PACING = {
    INTER_IMAGE_DELAY: 200,
    INTER_CHAPTER_DELAY: 2000,
    /** Time a browser page is given to run its scripts after load */
    WAIT_AFTER_LOAD: 4000,
} as const;

/**
 * Image normalization applied before images reach the PDF
 */
export const IMAGE = {
    JPEG_QUALITY: 75,
    PROGRESSIVE: true,
    GRAYSCALE: false,
    MAX_WIDTH: 1200,
    CONCURRENCY: 1,
    MAX_CONCURRENCY: 4,
    /** Largest side a JPEG can encode; taller images are kept as PNG */
    JPEG_MAX_SIDE: 65535,
    EXTENSIONS: ['.jpg', '.jpeg', '.png', '.webp', '.gif'],
} as const;

/**
 * PDF layout limits
 */
export const PDF = {
    /** Largest page side most readers accept (200 inches in user units) */
    MAX_PAGE_HEIGHT: 14400,
    /** Pages per file before a continuation file is started */
    MAX_PAGES_PER_FILE: 400,
} as const;

/**
 * Output naming
 */
export const NAMING = {
    CHAPTER_PREFIX: 'Chapter_',
    NUMBER_WIDTH: 3,
    FALLBACK_BUNDLE_TITLE: 'Bundle',
} as const;
