/**
 * PDF Merger for chapter-binder
 * Bundles chapter PDFs into `Chapter_<min>-<max> - <Title>.pdf` files in chapter order
 */

import { readdir, readFile, rename, rm } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { PDFDocument } from 'pdf-lib';

import { NAMING, PATHS } from '../config/constants';
import { ensureDir, fileExistsWithContent, pathExists, writeFileAtomic } from '../utils/fs';
import { bundleFileName, parseChapterFileName } from '../utils/naming';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import { MergeError } from './errors';
import { readLatestManifestFiles } from './manifest';
import type { ChapterFileName, MergedBundle, MergeOptions, SkippedFile } from '../types';

export interface MergeReport {
    bundles: MergedBundle[];
    skipped: SkippedFile[];
    warnings: string[];
    errors: MergeError[];
}

export interface Candidate {
    path: string;
    fileName: string;
    parsed: ChapterFileName;
}

/**
 * Orders candidates by chapter number, then part, then filename
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
    return a.parsed.start - b.parsed.start
        || a.parsed.part - b.parsed.part
        || (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0);
}

/**
 * Splits sorted candidates into chunks of `perBundle` distinct chapter
 * numbers; all parts of a chapter stay in one chunk. 0 means one chunk.
 */
export function chunkByChapter<T extends { parsed: ChapterFileName }>(sorted: readonly T[], perBundle: number): T[][] {
    if (perBundle === 0) return sorted.length > 0 ? [[...sorted]] : [];

    const chunks: T[][] = [];
    let current: T[] = [];
    let numbers = 0;
    let lastNumber: number | undefined;

    for (const item of sorted) {
        if (item.parsed.start !== lastNumber) {
            if (numbers === perBundle) {
                chunks.push(current);
                current = [];
                numbers = 0;
            }
            numbers++;
            lastNumber = item.parsed.start;
        }
        current.push(item);
    }
    if (current.length > 0) chunks.push(current);
    return chunks;
}

/**
 * First name in `dir` not taken yet: `X.pdf`, then `X (2).pdf`, `X (3).pdf`, ...
 */
async function freePath(dir: string, fileName: string): Promise<string> {
    const stem = fileName.replace(/\.pdf$/i, '');
    let candidate = join(dir, fileName);
    for (let n = 2; await pathExists(candidate); n++) {
        candidate = join(dir, `${stem} (${n}).pdf`);
    }
    return candidate;
}

/**
 * PdfMerger combines chapter PDFs of one folder. A failing group is
 * reported and the remaining groups are still merged.
 */
export class PdfMerger {
    constructor(private readonly logger: Logger = silentLogger) {}

    async merge(dir: string, options: MergeOptions = {}): Promise<MergeReport> {
        const perBundle = options.chaptersPerBundle ?? 0;
        if (!Number.isInteger(perBundle) || perBundle < 0) {
            throw new RangeError(`chaptersPerBundle must be a non-negative integer, got ${perBundle}`);
        }

        const report: MergeReport = { bundles: [], skipped: [], warnings: [], errors: [] };
        const sources = await this.collectSources(dir, options, report);
        const groups = this.groupCandidates(sources, options, report);

        for (const [key, group] of groups) {
            group.sort(compareCandidates);
            this.warnDuplicates(group, report);

            for (const chunk of chunkByChapter(group, perBundle)) {
                // One chapter, even split into parts, is not a bundle
                if (new Set(chunk.map((c) => c.parsed.start)).size === 1) {
                    for (const member of chunk) {
                        report.skipped.push({ path: member.path, reason: 'single-member' });
                    }
                    continue;
                }
                try {
                    const bundle = await this.writeBundle(chunk, options.outputDir ?? dir);
                    report.bundles.push(bundle);
                    this.logger.success(`Created ${basename(bundle.outputPath)} (${chunk.length} files)`);
                } catch (error) {
                    const mergeError = error instanceof MergeError
                        ? error
                        : new MergeError(`Merging group "${key}" failed: ${error instanceof Error ? error.message : String(error)}`, key, { cause: error });
                    report.errors.push(mergeError);
                    this.logger.error(mergeError.message);
                    continue;
                }
                await this.handleOriginals(chunk, dir, report, key, options);
            }
        }

        return report;
    }

    private async collectSources(dir: string, options: MergeOptions, report: MergeReport): Promise<string[]> {
        if (options.selectedFiles) {
            return options.selectedFiles.map((file) => resolve(dir, file));
        }

        if (options.useSessionManifest) {
            const recorded = await readLatestManifestFiles(dir);
            const existing: string[] = [];
            for (const file of recorded ?? []) {
                if (await fileExistsWithContent(file)) existing.push(file);
            }
            if (existing.length === 0) {
                report.warnings.push('No chapters recorded in the latest session, nothing to merge');
            }
            return existing;
        }

        const entries = await readdir(dir, { withFileTypes: true });
        return entries
            .filter((entry) => entry.isFile() && /\.pdf$/i.test(entry.name))
            .map((entry) => join(dir, entry.name));
    }

    private groupCandidates(paths: readonly string[], options: MergeOptions, report: MergeReport): Map<string, Candidate[]> {
        const ignoreMerged = options.ignoreMerged ?? true;
        const byTitle = options.groupByTitle ?? true;
        const groups = new Map<string, Candidate[]>();

        for (const path of paths) {
            const fileName = basename(path);
            const parsed = parseChapterFileName(fileName);
            if (!parsed) {
                report.skipped.push({ path, reason: 'no-chapter-number' });
                continue;
            }
            if (parsed.isRange && ignoreMerged) {
                report.skipped.push({ path, reason: 'already-merged' });
                continue;
            }

            const key = byTitle ? parsed.title : '';
            const group = groups.get(key) ?? [];
            group.push({ path, fileName, parsed });
            groups.set(key, group);
        }
        return groups;
    }

    private warnDuplicates(sorted: readonly Candidate[], report: MergeReport): void {
        for (let i = 1; i < sorted.length; i++) {
            const previous = sorted[i - 1];
            const current = sorted[i];
            if (previous && current && previous.parsed.start === current.parsed.start && previous.parsed.part === current.parsed.part) {
                const warning = `Duplicate chapter ${current.parsed.start}: ${previous.fileName} and ${current.fileName}`;
                report.warnings.push(warning);
                this.logger.warn(warning);
            }
        }
    }

    private async writeBundle(chunk: readonly Candidate[], outputDir: string): Promise<MergedBundle> {
        const first = Math.min(...chunk.map((c) => c.parsed.start));
        const last = Math.max(...chunk.map((c) => c.parsed.end));
        const title = chunk.find((c) => c.parsed.title)?.parsed.title ?? NAMING.FALLBACK_BUNDLE_TITLE;
        const outputPath = join(outputDir, bundleFileName(first, last, title));
        const group = title;

        const doc = await PDFDocument.create();
        doc.setTitle(`${title} ${first}-${last}`);
        for (const member of chunk) {
            let source: PDFDocument;
            try {
                source = await PDFDocument.load(await readFile(member.path));
            } catch (error) {
                throw new MergeError(`Cannot read ${member.fileName}: ${error instanceof Error ? error.message : String(error)}`, group, { cause: error });
            }
            const pages = await doc.copyPages(source, source.getPageIndices());
            pages.forEach((page) => doc.addPage(page));
        }

        try {
            await writeFileAtomic(outputPath, await doc.save());
        } catch (error) {
            throw new MergeError(`Cannot write ${outputPath}: ${error instanceof Error ? error.message : String(error)}`, group, { cause: error });
        }

        return {
            outputPath,
            memberFiles: chunk.map((c) => c.path),
            title,
            firstChapter: first,
            lastChapter: last,
        };
    }

    private async handleOriginals(
        chunk: readonly Candidate[],
        dir: string,
        report: MergeReport,
        group: string,
        options: MergeOptions
    ): Promise<void> {
        const policy = options.originals ?? 'move';
        if (policy === 'keep') return;

        const bundlePath = report.bundles[report.bundles.length - 1]?.outputPath;
        const originalsDir = join(dir, PATHS.ORIGINALS_DIR);

        for (const member of chunk) {
            if (bundlePath !== undefined && resolve(member.path) === resolve(bundlePath)) continue;
            try {
                if (policy === 'delete') {
                    await rm(member.path, { force: true });
                } else {
                    await ensureDir(originalsDir);
                    await rename(member.path, await freePath(originalsDir, member.fileName));
                }
            } catch (error) {
                const mergeError = new MergeError(
                    `Cannot ${policy} original ${member.fileName}: ${error instanceof Error ? error.message : String(error)}`,
                    group,
                    { cause: error }
                );
                report.errors.push(mergeError);
                this.logger.error(mergeError.message);
            }
        }
    }
}
