/**
 * Identifies one chapter
 */
export interface ChapterRef {
    readonly url: string;
    readonly ordinal?: number;
    readonly title?: string;
}

/**
 * Content of a chapter page as produced by a provider
 */
export interface ChapterContent {
    title: string;
    imageUrls: string[];
    nextUrl?: string;
    /** Chapter number read from the page, when the page states one */
    chapterNumber?: number;
    /** Chapters the page's chapter picker lists for the whole series */
    totalChapters?: number;
    /** The picker's chapter numbers, ascending */
    listedChapters?: number[];
}

/**
 * A downloaded, decoded and normalized image
 */
export interface ImageAsset {
    sourceUrl: string;
    bytes: Buffer;
    width: number;
    height: number;
    /** Encoding of `bytes`; absent means JPEG */
    format?: ImageFormat;
    localPath?: string;
}

export type ImageFormat = 'jpeg' | 'png';

/**
 * Manual(count) | Automatic
 */
export type DownloadMode =
    | { readonly kind: 'manual'; readonly count: number }
    | { readonly kind: 'automatic' };

/**
 * Delays between network operations, in milliseconds
 */
export interface Pacing {
    readonly interImageDelay: number;
    readonly interChapterDelay: number;
}

/**
 * One user-initiated download run
 */
export interface DownloadJob {
    readonly start: ChapterRef;
    readonly mangaTitle: string;
    readonly mode: DownloadMode;
    readonly targetDir: string;
    readonly pacing: Pacing;
    readonly deleteImagesAfter: boolean;
    /** Safety ceiling for automatic runs */
    readonly chapterLimit?: number;
    /** Keep the session manifest after the run (for "merge only new chapters") */
    readonly keepManifest?: boolean;
}

export type RunStatus = 'running' | 'completed' | 'cancelled' | 'failed';

export type FailureKind = 'provider' | 'asset' | 'assembly' | 'cancelled';

export interface RunFailure {
    ordinal: number;
    url: string;
    kind: FailureKind;
    message: string;
}

/**
 * Why a run stopped
 */
export type StopReason =
    | 'count-reached'
    | 'end-of-series'
    | 'loop-detected'
    | 'limit-reached'
    | 'cancelled'
    | 'failed';

export interface ChapterResult {
    index: number;
    url: string;
    chapterNumber: number;
    label: string;
    files: string[];
    imageCount: number;
}

export interface RunState {
    currentChapterIndex: number;
    chaptersCompleted: number;
    /** Chapters this run is expected to process, once known */
    totalChapters?: number;
    status: RunStatus;
    stopReason?: StopReason;
    failure?: RunFailure;
    chapters: ChapterResult[];
}

/**
 * Progress events published by the sequencer
 */
export type RunEvent =
    | { type: 'chapter_started'; index: number; url: string; total?: number }
    | { type: 'image_downloaded'; index: number; imageIndex: number; total: number }
    | {
          type: 'image_failed';
          index: number;
          imageIndex: number;
          url: string;
          attempt: number;
          retryable: boolean;
          message: string;
      }
    | { type: 'chapter_completed'; index: number; result: ChapterResult; total?: number }
    | { type: 'run_finished'; state: RunState };

export type RunEventListener = (event: RunEvent) => void;

/**
 * Options accepted by a single run
 */
export interface RunOptions {
    signal?: AbortSignal;
    onEvent?: RunEventListener;
}

/**
 * Dimensions of one source image
 */
export interface ImageDimensions {
    width: number;
    height: number;
}

/**
 * A whole image or a horizontal band of one, placed on a page
 */
export interface PagePlacement {
    imageIndex: number;
    sourceTop: number;
    width: number;
    height: number;
}

/**
 * One PDF page holding whole or sliced images, top to bottom
 */
export interface PageLayout {
    width: number;
    height: number;
    placements: PagePlacement[];
}

/**
 * Image normalization settings
 */
export interface ImageSettings {
    jpegQuality: number;
    progressive: boolean;
    grayscale: boolean;
    maxWidth: number;
    concurrency: number;
}

export interface PdfSettings {
    maxPageHeight: number;
    maxPagesPerFile: number;
}

export interface NetworkSettings {
    maxRetries: number;
    timeout: number;
    backoffBase: number;
    backoffCeiling: number;
    requestsBeforePause: number;
    antiBanPause: number;
}

export interface BrowserSettings {
    /** Browser executable; the browser provider is used only when set */
    executablePath?: string;
    profileDir?: string;
    waitAfterLoad: number;
    /** Debug only, leaves the browser running after the run */
    keepOpen: boolean;
}

/**
 * Read-only settings consumed at run start
 */
export interface EngineSettings {
    downloadDir: string;
    pacing: Pacing;
    network: NetworkSettings;
    image: ImageSettings;
    pdf: PdfSettings;
    browser: BrowserSettings;
    chapterLimit?: number;
}

/**
 * Options for network fetch operations
 */
export interface FetchOptions {
    headers?: Record<string, string>;
    timeout?: number;
    signal?: AbortSignal;
    /** Wait applied after every attempt, successful or not */
    pacing?: number;
    /** Called after every failed attempt, 1-based */
    onAttemptFailed?: (attempt: number, error: Error, retryable: boolean) => void;
}

/**
 * Parsed chapter PDF filename
 */
export interface ChapterFileName {
    start: number;
    end: number;
    part: number;
    title: string;
    isRange: boolean;
}

export interface MergedBundle {
    outputPath: string;
    memberFiles: string[];
    title: string;
    firstChapter: number;
    lastChapter: number;
}

export interface SkippedFile {
    path: string;
    reason: 'no-chapter-number' | 'already-merged' | 'single-member';
}

export type OriginalsPolicy = 'move' | 'delete' | 'keep';

export interface MergeOptions {
    /** Chapters per bundle, 0 merges each group into one bundle */
    chaptersPerBundle?: number;
    groupByTitle?: boolean;
    ignoreMerged?: boolean;
    originals?: OriginalsPolicy;
    selectedFiles?: string[];
    useSessionManifest?: boolean;
    outputDir?: string;
}

/**
 * Entry of a bulk download list
 */
export interface BulkEntry {
    url: string;
    title: string;
    targetDir?: string;
    mode: 'auto' | 'manual';
    count?: number;
    deleteImages?: boolean;
    mergeAfter?: boolean;
    chaptersPerPdf?: number;
    onlyNewChapters?: boolean;
    deleteOriginals?: boolean;
}

/**
 * Result of a parse operation
 */
export type ParseResult<T> =
    | { success: true; data: T }
    | { success: false; error: string };
