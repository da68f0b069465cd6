/**
 * Bulk Runner
 * Downloads a list of titles one after another, optionally merging each afterwards
 */

import { readJson } from '../utils/fs';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import { createJob } from './engine';
import type { MergeReport, PdfMerger } from './merger';
import type { ChapterSequencer } from './sequencer';
import type { BulkEntry, EngineSettings, ParseResult, RunOptions, RunState } from '../types';

export interface BulkDeps {
    settings: EngineSettings;
    /** Called once per entry; each entry gets its own provider */
    createSequencer: () => ChapterSequencer;
    merger: PdfMerger;
    logger?: Logger;
}

export interface BulkResult {
    entry: BulkEntry;
    state?: RunState;
    merge?: MergeReport;
    error?: string;
}

export interface BulkOptions extends RunOptions {
    onEntryStart?: (entry: BulkEntry, position: number, total: number) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalBoolean(raw: Record<string, unknown>, key: string, where: string): boolean | undefined | string {
    const value = raw[key];
    if (value === undefined || typeof value === 'boolean') return value;
    return `${where}: "${key}" must be true or false`;
}

function parseEntry(raw: unknown, index: number): ParseResult<BulkEntry> {
    const where = `Entry ${index + 1}`;
    if (!isRecord(raw)) {
        return { success: false, error: `${where}: must be an object` };
    }

    const { url, title, targetDir, mode = 'auto', count, chaptersPerPdf } = raw;
    if (typeof url !== 'string' || !/^https?:\/\//i.test(url.trim())) {
        return { success: false, error: `${where}: "url" must be an http(s) URL` };
    }
    if (typeof title !== 'string' || title.trim() === '') {
        return { success: false, error: `${where}: "title" is required` };
    }
    if (targetDir !== undefined && typeof targetDir !== 'string') {
        return { success: false, error: `${where}: "targetDir" must be a string` };
    }
    if (mode !== 'auto' && mode !== 'manual') {
        return { success: false, error: `${where}: "mode" must be "auto" or "manual"` };
    }
    if (mode === 'manual' && (typeof count !== 'number' || !Number.isInteger(count) || count < 1)) {
        return { success: false, error: `${where}: manual mode needs a positive integer "count"` };
    }
    if (chaptersPerPdf !== undefined && (typeof chaptersPerPdf !== 'number' || !Number.isInteger(chaptersPerPdf) || chaptersPerPdf < 0)) {
        return { success: false, error: `${where}: "chaptersPerPdf" must be a non-negative integer` };
    }

    const flags: Partial<Record<'deleteImages' | 'mergeAfter' | 'onlyNewChapters' | 'deleteOriginals', boolean>> = {};
    for (const key of ['deleteImages', 'mergeAfter', 'onlyNewChapters', 'deleteOriginals'] as const) {
        const value = optionalBoolean(raw, key, where);
        if (typeof value === 'string') return { success: false, error: value };
        flags[key] = value;
    }

    return {
        success: true,
        data: {
            url: url.trim(),
            title: title.trim(),
            targetDir,
            mode,
            count: typeof count === 'number' ? count : undefined,
            chaptersPerPdf: typeof chaptersPerPdf === 'number' ? chaptersPerPdf : undefined,
            ...flags,
        },
    };
}

/**
 * Validates a parsed bulk list: an array of entries, or `{ "entries": [...] }`
 */
export function parseBulkEntries(json: unknown): ParseResult<BulkEntry[]> {
    const list = isRecord(json) ? json['entries'] : json;
    if (!Array.isArray(list)) {
        return { success: false, error: 'Bulk list must be an array of entries' };
    }

    const entries: BulkEntry[] = [];
    for (const [index, raw] of list.entries()) {
        const result = parseEntry(raw, index);
        if (!result.success) return result;
        entries.push(result.data);
    }
    return { success: true, data: entries };
}

export async function loadBulkFile(filePath: string): Promise<ParseResult<BulkEntry[]>> {
    let json: unknown;
    try {
        json = await readJson(filePath);
    } catch (error) {
        return { success: false, error: `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}` };
    }
    return parseBulkEntries(json);
}

/**
 * Runs the entries in order. A failed entry is recorded and the queue
 * moves on; cancellation stops the queue.
 */
export async function runBulk(
    entries: readonly BulkEntry[],
    deps: BulkDeps,
    options: BulkOptions = {}
): Promise<BulkResult[]> {
    const logger = deps.logger ?? silentLogger;
    const results: BulkResult[] = [];

    for (const [index, entry] of entries.entries()) {
        if (options.signal?.aborted) {
            logger.warn(`Bulk run cancelled, ${entries.length - index} entries not started`);
            break;
        }
        options.onEntryStart?.(entry, index + 1, entries.length);

        const onlyNew = entry.mergeAfter === true && entry.onlyNewChapters === true;
        const job = createJob(deps.settings, {
            url: entry.url,
            title: entry.title,
            mode: entry.mode === 'manual' ? { kind: 'manual', count: entry.count ?? 1 } : { kind: 'automatic' },
            targetDir: entry.targetDir,
            deleteImages: entry.deleteImages,
            keepManifest: onlyNew,
        });

        const result: BulkResult = { entry };
        results.push(result);

        try {
            result.state = await deps.createSequencer().run(job, { signal: options.signal, onEvent: options.onEvent });
        } catch (error) {
            result.error = error instanceof Error ? error.message : String(error);
            logger.error(`Skipping "${entry.title}"`, error);
            continue;
        }

        if (result.state.status !== 'completed') {
            result.error = result.state.failure?.message ?? `Run ended ${result.state.status}`;
            logger.warn(`"${entry.title}" ended ${result.state.status}: ${result.error}`);
            continue;
        }

        if (entry.mergeAfter) {
            try {
                result.merge = await deps.merger.merge(job.targetDir, {
                    chaptersPerBundle: entry.chaptersPerPdf ?? 0,
                    useSessionManifest: onlyNew,
                    originals: entry.deleteOriginals ? 'delete' : 'move',
                });
            } catch (error) {
                result.error = error instanceof Error ? error.message : String(error);
                logger.error(`Merging "${entry.title}" failed`, error);
            }
        }
    }

    return results;
}
