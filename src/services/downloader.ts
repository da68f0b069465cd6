/**
 * Chapter Downloader for chapter-binder
 * Downloads every image of a chapter, in order, with a local image cache
 */

import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import pLimit from 'p-limit';

import { IMAGE } from '../config/constants';
import { ensureDir, fileExistsWithContent, readJson, writeFileAtomic, writeJson } from '../utils/fs';
import { AssetError } from './errors';
import type { ImageFetcher } from './image-fetcher';
import type { ChapterContent, ImageAsset, ImageFormat } from '../types';

export interface ImageFailure {
    imageIndex: number;
    url: string;
    attempt: number;
    retryable: boolean;
    message: string;
}

export interface DownloadChapterOptions {
    signal?: AbortSignal;
    /** Sent as Referer with every image request, usually the chapter page */
    referer?: string;
    onImageFailed?: (failure: ImageFailure) => void;
    onImageDone?: (imageIndex: number, total: number) => void;
}

export interface ChapterDownloaderOptions {
    /** Images fetched at once, clamped to 1..IMAGE.MAX_CONCURRENCY */
    concurrency?: number;
    /** Wait after every image request attempt */
    interImageDelay?: number;
}

/**
 * Name of the persisted file for a zero-based image index: 0 → `001.jpg`
 */
export function imageFileName(imageIndex: number, format: ImageFormat = 'jpeg'): string {
    return `${String(imageIndex + 1).padStart(3, '0')}.${format === 'png' ? 'png' : 'jpg'}`;
}

/** Records which URL each image file in a chapter folder came from */
export const SOURCES_FILE = 'sources.json';

type SourceMap = Record<string, string>;

async function readSources(destDir: string): Promise<SourceMap> {
    let raw: unknown;
    try {
        raw = await readJson(join(destDir, SOURCES_FILE));
    } catch {
        return {};
    }
    const sources: SourceMap = {};
    if (typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
        for (const [file, url] of Object.entries(raw)) {
            if (typeof url === 'string') sources[file] = url;
        }
    }
    return sources;
}

/**
 * ChapterDownloader fetches a chapter's images into `destDir` as NNN.jpg
 * (NNN.png for images too tall for JPEG). A file is reused only when
 * `sources.json` says it came from the same URL. A chapter either yields every image or fails with the first AssetError
 * in image order; nothing is skipped.
 */
export class ChapterDownloader {
    private readonly concurrency: number;
    private readonly interImageDelay: number;

    constructor(
        private readonly fetcher: ImageFetcher,
        options: ChapterDownloaderOptions = {}
    ) {
        const requested = Math.floor(options.concurrency ?? IMAGE.CONCURRENCY);
        this.concurrency = Math.min(Math.max(requested, 1), IMAGE.MAX_CONCURRENCY);
        this.interImageDelay = options.interImageDelay ?? 0;
    }

    /**
     * Downloads all images of a chapter
     *
     * @returns Assets in the order of `content.imageUrls`
     * @throws AssetError for the first image that could not be obtained
     * @throws CancelledError when cancellation was observed before a retry
     */
    async downloadChapter(
        content: ChapterContent,
        destDir: string,
        options: DownloadChapterOptions = {}
    ): Promise<ImageAsset[]> {
        const total = content.imageUrls.length;
        if (total === 0) {
            return [];
        }

        await ensureDir(destDir);
        const sources = await readSources(destDir);

        const limit = pLimit(this.concurrency);
        let failed = false;

        const tasks = content.imageUrls.map((url, imageIndex) =>
            limit(async (): Promise<ImageAsset | null> => {
                // Images not yet started are skipped once one has failed
                if (failed) return null;
                try {
                    const asset = await this.obtainImage(url, imageIndex, destDir, sources, options);
                    options.onImageDone?.(imageIndex, total);
                    return asset;
                } catch (error) {
                    failed = true;
                    throw error;
                }
            })
        );

        // Wait for in-flight images so nothing writes into destDir after we return
        const settled = await Promise.allSettled(tasks);
        try {
            await writeJson(join(destDir, SOURCES_FILE), sources);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new AssetError(`Cannot record image sources in ${destDir}: ${reason}`, content.imageUrls[0] ?? destDir, 1, false, { cause: error });
        }
        const assets: ImageAsset[] = [];
        for (const outcome of settled) {
            if (outcome.status === 'rejected') {
                throw outcome.reason;
            }
            if (outcome.value) {
                assets.push(outcome.value);
            }
        }
        return assets;
    }

    private async obtainImage(
        url: string,
        imageIndex: number,
        destDir: string,
        sources: SourceMap,
        options: DownloadChapterOptions
    ): Promise<ImageAsset> {
        for (const format of ['jpeg', 'png'] as const) {
            const fileName = imageFileName(imageIndex, format);
            const cachedPath = join(destDir, fileName);
            if (sources[fileName] === url && await fileExistsWithContent(cachedPath)) {
                const cached = await this.fetcher.fromCache(url, await readFile(cachedPath));
                if (cached) {
                    return { ...cached, localPath: cachedPath };
                }
            }
        }

        const asset = await this.fetcher.fetchImage(url, {
            referer: options.referer,
            signal: options.signal,
            pacing: this.interImageDelay,
            onAttemptFailed: (attempt, error, retryable) => {
                options.onImageFailed?.({ imageIndex, url, attempt, retryable, message: error.message });
            },
        });

        const fileName = imageFileName(imageIndex, asset.format);
        const localPath = join(destDir, fileName);
        const staleName = imageFileName(imageIndex, asset.format === 'png' ? 'jpeg' : 'png');
        try {
            await writeFileAtomic(localPath, asset.bytes);
            await rm(join(destDir, staleName), { force: true });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new AssetError(`Cannot save image ${localPath}: ${reason}`, url, 1, false, { cause: error });
        }
        sources[fileName] = url;
        delete sources[staleName];

        return { ...asset, localPath };
    }
}
