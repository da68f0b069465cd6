// Main entry point for chapter-binder

import { loadSettings } from './config/settings';
import { createJob, createSequencer } from './services/engine';
import { PdfMerger, type MergeReport } from './services/merger';
import type { Logger } from './utils/logger';
import type { DownloadMode, EngineSettings, MergeOptions, RunOptions, RunState } from './types';

export type {
    BulkEntry,
    ChapterContent,
    ChapterRef,
    ChapterResult,
    DownloadJob,
    DownloadMode,
    EngineSettings,
    FailureKind,
    ImageAsset,
    ImageFormat,
    MergedBundle,
    MergeOptions,
    PageLayout,
    ParseResult,
    RunEvent,
    RunFailure,
    RunOptions,
    RunState,
    RunStatus,
    SkippedFile,
    StopReason,
} from './types';

export { DEFAULT_SETTINGS, loadSettings, resolveSettings } from './config/settings';
export {
    AssemblyError,
    AssetError,
    BinderError,
    CancelledError,
    HttpError,
    MergeError,
    ProviderError,
    SettingsError,
} from './services/errors';
export { NetworkManager } from './services/network';
export { ImageFetcher } from './services/image-fetcher';
export { ChapterDownloader } from './services/downloader';
export { planPages, sliceHeights, partitionPages } from './services/layout';
export { PdfAssembler } from './services/pdf-assembler';
export { HtmlChapterProvider, extractChapterContent, type ChapterProvider } from './services/provider';
export { BrowserChapterProvider } from './services/browser-provider';
export { ChapterSequencer, decideContinuation } from './services/sequencer';
export { SessionManifest, readLatestManifestFiles } from './services/manifest';
export { PdfMerger, type MergeReport } from './services/merger';
export { RunProgress, progressStats, formatProgress, type ProgressStats } from './services/progress';
export { runBulk, parseBulkEntries, loadBulkFile, type BulkResult } from './services/bulk';
export { createJob, createProvider, createSequencer } from './services/engine';
export { ConsoleLogger, silentLogger, type Logger } from './utils/logger';

export interface DownloadChaptersOptions extends RunOptions {
    title: string;
    mode?: DownloadMode;
    targetDir?: string;
    deleteImages?: boolean;
    settings?: EngineSettings;
    logger?: Logger;
}

/**
 * Downloads chapters starting at `url` into chapter PDFs
 *
 * @example
 * const state = await downloadChapters('https://example.com/series/ch-1', { title: 'Series' });
 */
export async function downloadChapters(url: string, options: DownloadChaptersOptions): Promise<RunState> {
    const settings = options.settings ?? await loadSettings();
    const job = createJob(settings, {
        url,
        title: options.title,
        mode: options.mode ?? { kind: 'automatic' },
        targetDir: options.targetDir,
        deleteImages: options.deleteImages,
    });
    return createSequencer(settings, options.logger).run(job, { signal: options.signal, onEvent: options.onEvent });
}

/**
 * Merges the chapter PDFs of a folder into bundles
 */
export async function mergeChapterPdfs(dir: string, options?: MergeOptions, logger?: Logger): Promise<MergeReport> {
    return new PdfMerger(logger).merge(dir, options);
}
