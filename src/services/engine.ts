/**
 * Wiring of the download pipeline from settings
 */

import { join } from 'node:path';

import { formatFilename } from '../utils/text';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import { BrowserChapterProvider } from './browser-provider';
import { ChapterDownloader } from './downloader';
import { ImageFetcher } from './image-fetcher';
import { NetworkManager } from './network';
import { PdfAssembler } from './pdf-assembler';
import { HtmlChapterProvider, type ChapterProvider } from './provider';
import { ChapterSequencer } from './sequencer';
import type { DownloadJob, DownloadMode, EngineSettings } from '../types';

/**
 * Browser provider when a browser executable is configured, plain HTML otherwise
 */
export function createProvider(settings: EngineSettings, logger: Logger = silentLogger): ChapterProvider {
    if (settings.browser.executablePath) {
        const { timeout, maxRetries, backoffBase, backoffCeiling } = settings.network;
        return new BrowserChapterProvider({ ...settings.browser, timeout, maxRetries, backoffBase, backoffCeiling, logger });
    }
    return new HtmlChapterProvider(new NetworkManager({ ...settings.network, logger }));
}

export interface SequencerOverrides {
    provider?: ChapterProvider;
    sessionManifest?: boolean;
}

/**
 * Builds a sequencer for one run. Images use their own NetworkManager,
 * separate from the provider's page requests.
 */
export function createSequencer(
    settings: EngineSettings,
    logger: Logger = silentLogger,
    overrides: SequencerOverrides = {}
): ChapterSequencer {
    const fetcher = new ImageFetcher(new NetworkManager({ ...settings.network, logger }), settings.image);
    return new ChapterSequencer({
        provider: overrides.provider ?? createProvider(settings, logger),
        downloader: new ChapterDownloader(fetcher, {
            concurrency: settings.image.concurrency,
            interImageDelay: settings.pacing.interImageDelay,
        }),
        assembler: new PdfAssembler({ ...settings.pdf, jpegQuality: settings.image.jpegQuality }),
        logger,
        sessionManifest: overrides.sessionManifest,
    });
}

export interface JobRequest {
    url: string;
    title: string;
    mode: DownloadMode;
    targetDir?: string;
    deleteImages?: boolean;
    keepManifest?: boolean;
}

/**
 * Default folder of a title: `<downloadDir>/<Formatted_Title>`
 */
export function titleFolder(settings: EngineSettings, title: string): string {
    return join(settings.downloadDir, formatFilename(title) || 'Untitled');
}

export function createJob(settings: EngineSettings, request: JobRequest): DownloadJob {
    return {
        start: { url: request.url },
        mangaTitle: request.title,
        mode: request.mode,
        targetDir: request.targetDir ?? titleFolder(settings, request.title),
        pacing: settings.pacing,
        deleteImagesAfter: request.deleteImages ?? false,
        chapterLimit: settings.chapterLimit,
        keepManifest: request.keepManifest ?? false,
    };
}
