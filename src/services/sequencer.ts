/**
 * Chapter Sequencer for chapter-binder
 * Walks a chain of chapters one at a time: fetch, download, assemble, follow the next link
 */

import { rm } from 'node:fs/promises';
import { join } from 'node:path';

import { PATHS } from '../config/constants';
import { ensureDir } from '../utils/fs';
import { chapterFileName, chapterLabel, parseChapterNumberFromUrl } from '../utils/naming';
import { normalizeUrl } from '../utils/text';
import { sleep } from '../utils/time';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import { AssemblyError, CancelledError, ProviderError } from './errors';
import { SessionManifest } from './manifest';
import type { ChapterDownloader } from './downloader';
import type { PdfAssembler } from './pdf-assembler';
import type { ChapterProvider } from './provider';
import type {
    ChapterRef,
    ChapterResult,
    DownloadJob,
    DownloadMode,
    FailureKind,
    RunEvent,
    RunOptions,
    RunState,
    StopReason,
} from '../types';

export interface SequencerDeps {
    provider: ChapterProvider;
    downloader: ChapterDownloader;
    assembler: PdfAssembler;
    logger?: Logger;
    /** Record written PDFs in a session manifest (default true) */
    sessionManifest?: boolean;
}

export type Continuation =
    | { action: 'continue'; nextUrl: string }
    | { action: 'stop'; status: 'completed'; reason: StopReason }
    | { action: 'stop'; status: 'failed'; reason: 'failed'; message: string };

/**
 * Decides what follows a processed chapter.
 *
 * @param processed - chapters processed so far in this run
 * @param seen - normalized URLs already visited in this run
 */
export function decideContinuation(
    mode: DownloadMode,
    processed: number,
    nextUrl: string | undefined,
    seen: ReadonlySet<string>,
    chapterLimit?: number
): Continuation {
    const looped = nextUrl !== undefined && seen.has(normalizeUrl(nextUrl));

    if (mode.kind === 'manual') {
        if (processed >= mode.count) {
            return { action: 'stop', status: 'completed', reason: 'count-reached' };
        }
        if (nextUrl === undefined || looped) {
            return {
                action: 'stop',
                status: 'failed',
                reason: 'failed',
                message: nextUrl === undefined
                    ? `No next chapter after ${processed} of ${mode.count} chapters`
                    : `Next chapter link points back to a visited chapter after ${processed} of ${mode.count} chapters`,
            };
        }
        return { action: 'continue', nextUrl };
    }

    if (nextUrl === undefined) {
        return { action: 'stop', status: 'completed', reason: 'end-of-series' };
    }
    if (looped) {
        return { action: 'stop', status: 'completed', reason: 'loop-detected' };
    }
    if (chapterLimit !== undefined && processed >= chapterLimit) {
        return { action: 'stop', status: 'completed', reason: 'limit-reached' };
    }
    return { action: 'continue', nextUrl };
}

/**
 * Picks the chapter number for a page: what the page states, then the
 * ordinal the caller gave, then the number in the URL, then the position in
 * the run. A number already used in this run is passed over, since it names
 * both the image folder and the PDF.
 *
 * @returns The number and whether a preferred candidate had to be passed over
 * @throws ProviderError when every candidate is taken
 */
export function assignChapterNumber(
    candidates: ReadonlyArray<number | undefined>,
    used: ReadonlySet<number>,
    url: string
): { chapterNumber: number; displaced: boolean } {
    const defined = candidates.filter((n): n is number => n !== undefined);
    const free = defined.find((n) => !used.has(n));
    if (free === undefined) {
        throw new ProviderError(`Chapter number ${defined[0] ?? '?'} was already used in this run`, 'fatal', url);
    }
    return { chapterNumber: free, displaced: free !== defined[0] };
}

/**
 * Chapters an automatic run is expected to process, from the series'
 * chapter list: the listed chapters from this one on, plus those already done
 */
export function estimateRunTotal(listed: readonly number[], chapterNumber: number, processedBefore: number): number {
    const index = listed.indexOf(chapterNumber);
    const remaining = index >= 0
        ? listed.length - index
        : listed.filter((n) => n > chapterNumber).length + 1;
    return processedBefore + remaining;
}

function failureKind(error: unknown): FailureKind {
    if (error instanceof CancelledError) return 'cancelled';
    if (error instanceof ProviderError) return 'provider';
    if (error instanceof AssemblyError) return 'assembly';
    return 'asset';
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * ChapterSequencer runs download jobs. Chapters are strictly sequential
 * and the provider is closed when the run ends.
 */
export class ChapterSequencer {
    private readonly logger: Logger;

    constructor(private readonly deps: SequencerDeps) {
        this.logger = deps.logger ?? silentLogger;
    }

    /**
     * Runs a job to a terminal state. Never rejects for chapter failures;
     * they end the run with status `failed` and a `failure` record.
     *
     * Cancellation is honoured between chapters and before image retries.
     */
    async run(job: DownloadJob, options: RunOptions = {}): Promise<RunState> {
        if (job.mode.kind === 'manual' && (!Number.isInteger(job.mode.count) || job.mode.count < 1)) {
            throw new RangeError(`Chapter count must be a positive integer, got ${job.mode.count}`);
        }

        const { signal } = options;
        const logger = this.logger.withErrorLog(join(job.targetDir, PATHS.ERROR_LOG));
        const state: RunState = { currentChapterIndex: 0, chaptersCompleted: 0, status: 'running', chapters: [] };
        if (job.mode.kind === 'manual') {
            state.totalChapters = job.mode.count;
        }

        const emit = (event: RunEvent): void => {
            try {
                options.onEvent?.(event);
            } catch (error) {
                logger.warn(`Progress listener failed: ${errorMessage(error)}`);
            }
        };

        const stop = (status: RunState['status'], reason: StopReason): void => {
            state.status = status;
            state.stopReason = reason;
        };

        await ensureDir(job.targetDir);
        const manifest = await this.openManifest(job, logger);

        let ref: ChapterRef = job.start;
        const seen = new Set<string>([normalizeUrl(ref.url)]);
        const usedNumbers = new Set<number>();

        try {
            while (state.status === 'running') {
                if (signal?.aborted) {
                    stop('cancelled', 'cancelled');
                    break;
                }

                const position = state.currentChapterIndex + 1;
                state.currentChapterIndex = position;
                emit({ type: 'chapter_started', index: position, url: ref.url, total: state.totalChapters });

                let nextUrl: string | undefined;
                try {
                    const result = await this.processChapter(job, ref, position, usedNumbers, signal, logger, emit);
                    nextUrl = result.nextUrl;
                    state.chapters.push(result.chapter);
                    state.chaptersCompleted++;
                    this.updateTotal(state, job, result.chapter.chapterNumber, result.listedChapters, logger);
                    await this.recordChapter(manifest, result.chapter, logger);
                    emit({ type: 'chapter_completed', index: position, result: result.chapter, total: state.totalChapters });
                } catch (error) {
                    const kind = failureKind(error);
                    state.failure = { ordinal: position, url: ref.url, kind, message: errorMessage(error) };
                    if (kind === 'cancelled') {
                        logger.warn(`Cancelled during chapter ${position}: ${errorMessage(error)}`);
                        stop('cancelled', 'cancelled');
                    } else {
                        logger.error(`Chapter ${position} failed (${ref.url})`, error);
                        stop('failed', 'failed');
                    }
                    break;
                }

                const decision = decideContinuation(
                    job.mode,
                    state.chaptersCompleted,
                    nextUrl,
                    seen,
                    job.chapterLimit
                );

                if (decision.action === 'stop') {
                    if (decision.status === 'failed') {
                        state.failure = { ordinal: position, url: ref.url, kind: 'provider', message: decision.message };
                        logger.error(decision.message);
                    } else if (decision.reason === 'loop-detected') {
                        logger.warn(`Next chapter link of ${ref.url} was already visited, stopping`);
                    }
                    stop(decision.status, decision.reason);
                    break;
                }

                ref = { url: decision.nextUrl };
                seen.add(normalizeUrl(decision.nextUrl));
                await sleep(job.pacing.interChapterDelay, signal);
            }
        } finally {
            await this.finish(job, manifest, logger);
        }

        emit({ type: 'run_finished', state: { ...state, chapters: [...state.chapters] } });
        return state;
    }

    private async processChapter(
        job: DownloadJob,
        ref: ChapterRef,
        position: number,
        usedNumbers: Set<number>,
        signal: AbortSignal | undefined,
        logger: Logger,
        emit: (event: RunEvent) => void
    ): Promise<{ chapter: ChapterResult; nextUrl?: string; listedChapters?: number[] }> {
        const content = await this.deps.provider.fetch(ref, signal);

        const candidates = [content.chapterNumber, ref.ordinal, parseChapterNumberFromUrl(ref.url), position];
        const { chapterNumber, displaced } = assignChapterNumber(candidates, usedNumbers, ref.url);
        if (displaced) {
            logger.warn(`Chapter number ${candidates.find((n) => n !== undefined)} already used in this run, naming ${ref.url} as chapter ${chapterNumber}`);
        }
        usedNumbers.add(chapterNumber);
        const label = chapterLabel(chapterNumber);
        const imageDir = join(job.targetDir, label);
        const outPath = join(job.targetDir, chapterFileName(chapterNumber, job.mangaTitle));

        logger.debug(`${label}: ${content.imageUrls.length} images from ${ref.url}`);

        const images = await this.deps.downloader.downloadChapter(content, imageDir, {
            signal,
            referer: ref.url,
            onImageFailed: (failure) => emit({ type: 'image_failed', index: position, ...failure }),
            onImageDone: (imageIndex, total) => emit({ type: 'image_downloaded', index: position, imageIndex, total }),
        });

        let files: string[] = [];
        if (images.length === 0) {
            logger.warn(`${label} has no images, no PDF written (${ref.url})`);
        } else {
            const title = content.title || `${job.mangaTitle} ${label}`;
            files = await this.deps.assembler.assemble(images, title, outPath);
            if (job.deleteImagesAfter) {
                await rm(imageDir, { recursive: true, force: true });
            }
        }

        return {
            chapter: { index: position, url: ref.url, chapterNumber, label, files, imageCount: images.length },
            nextUrl: content.nextUrl,
            listedChapters: content.listedChapters,
        };
    }

    /**
     * Automatic runs learn their total from the first page with a chapter
     * list; the total never drops below the chapters already done
     */
    private updateTotal(
        state: RunState,
        job: DownloadJob,
        chapterNumber: number,
        listed: readonly number[] | undefined,
        logger: Logger
    ): void {
        if (job.mode.kind === 'manual') return;

        if (state.totalChapters === undefined && listed && listed.length > 0) {
            let total = estimateRunTotal(listed, chapterNumber, state.chaptersCompleted - 1);
            if (job.chapterLimit !== undefined) total = Math.min(total, job.chapterLimit);
            state.totalChapters = total;
            logger.info(`Series lists ${listed.length} chapters, ${total} expected in this run`);
        }
        if (state.totalChapters !== undefined) {
            state.totalChapters = Math.max(state.totalChapters, state.chaptersCompleted);
        }
    }

    private async openManifest(job: DownloadJob, logger: Logger): Promise<SessionManifest | null> {
        if (this.deps.sessionManifest === false) return null;
        try {
            return await SessionManifest.create(job.targetDir, {
                mangaTitle: job.mangaTitle,
                startUrl: job.start.url,
                mode: job.mode,
            });
        } catch (error) {
            logger.warn(`Session manifest unavailable, continuing without it: ${errorMessage(error)}`);
            return null;
        }
    }

    private async recordChapter(manifest: SessionManifest | null, chapter: ChapterResult, logger: Logger): Promise<void> {
        if (!manifest || chapter.files.length === 0) return;
        try {
            await manifest.record(chapter.label, chapter.files);
        } catch (error) {
            logger.warn(`Could not update session manifest: ${errorMessage(error)}`);
        }
    }

    private async finish(job: DownloadJob, manifest: SessionManifest | null, logger: Logger): Promise<void> {
        if (manifest && !job.keepManifest) {
            try {
                await manifest.remove();
            } catch (error) {
                logger.warn(`Could not remove session manifest: ${errorMessage(error)}`);
            }
        }
        try {
            await this.deps.provider.close?.();
        } catch (error) {
            logger.warn(`Could not close chapter provider: ${errorMessage(error)}`);
        }
    }
}
