/**
 * Tests for PdfMerger: chapter ordering, grouping, chunking and originals handling
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { chunkByChapter, compareCandidates, PdfMerger } from '../../src/services/merger';
import type { Candidate } from '../../src/services/merger';
import { SessionManifest } from '../../src/services/manifest';
import { MergeError } from '../../src/services/errors';
import { parseChapterFileName } from '../../src/utils/naming';
import { makeTempDir, removeDir } from '../support';

/**
 * Writes a PDF whose pages have the given widths, so page order can be read back
 */
async function writePdf(path: string, widths: number[]): Promise<void> {
    const doc = await PDFDocument.create();
    for (const width of widths) {
        doc.addPage([width, 100]);
    }
    await writeFile(path, await doc.save());
}

async function pageWidths(path: string): Promise<number[]> {
    const doc = await PDFDocument.load(await readFile(path));
    return doc.getPages().map((page) => Math.round(page.getSize().width));
}

function candidate(fileName: string): Candidate {
    const parsed = parseChapterFileName(fileName);
    if (!parsed) throw new Error(`not a chapter file: ${fileName}`);
    return { path: `/x/${fileName}`, fileName, parsed };
}

describe('PdfMerger', () => {
    let dir: string;
    let runCounter = 0;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    async function freshDir(): Promise<string> {
        const path = join(dir, `set-${++runCounter}`);
        await mkdir(path);
        return path;
    }

    it('merges chapters in numeric order whatever order they were written in', async () => {
        await fc.assert(
            fc.asyncProperty(
                fc.integer({ min: 2, max: 6 }).chain((n) =>
                    fc.shuffledSubarray(Array.from({ length: n }, (_, i) => i + 1), { minLength: n, maxLength: n })
                ),
                async (writeOrder) => {
                    const target = await freshDir();
                    for (const n of writeOrder) {
                        await writePdf(join(target, `Chapter_00${n} - Series.pdf`), [100 + n]);
                    }
                    const count = writeOrder.length;

                    const report = await new PdfMerger().merge(target, { originals: 'keep' });

                    expect(report.bundles).toHaveLength(1);
                    const [bundle] = report.bundles;
                    expect(bundle?.outputPath).toBe(join(target, `Chapter_001-00${count} - Series.pdf`));
                    expect(await pageWidths(bundle?.outputPath ?? '')).toEqual(
                        Array.from({ length: count }, (_, i) => 101 + i)
                    );
                }
            ),
            { numRuns: 10 }
        );
    });

    it('orders by chapter value, not by text', async () => {
        await writePdf(join(dir, 'Chapter_010 - S.pdf'), [110]);
        await writePdf(join(dir, 'Chapter_002 - S.pdf'), [102]);
        await writePdf(join(dir, 'Chapter_001.5 - S.pdf'), [115]);

        const report = await new PdfMerger().merge(dir, { originals: 'keep' });

        expect(report.bundles[0]?.outputPath).toBe(join(dir, 'Chapter_001_5-010 - S.pdf'));
        expect(report.bundles[0]?.firstChapter).toBe(1.5);
        expect(report.bundles[0]?.lastChapter).toBe(10);
        expect(await pageWidths(join(dir, 'Chapter_001_5-010 - S.pdf'))).toEqual([115, 102, 110]);
    });

    it('keeps continuation parts right after their chapter', async () => {
        await writePdf(join(dir, 'Chapter_002 - S (part 2).pdf'), [202]);
        await writePdf(join(dir, 'Chapter_002 - S.pdf'), [102]);
        await writePdf(join(dir, 'Chapter_001 - S.pdf'), [101]);

        const report = await new PdfMerger().merge(dir, { originals: 'keep' });

        expect(await pageWidths(report.bundles[0]?.outputPath ?? '')).toEqual([101, 102, 202]);
        expect(report.bundles[0]?.outputPath).toBe(join(dir, 'Chapter_001-002 - S.pdf'));
    });

    it('skips files without a chapter number and bundles that are already merged', async () => {
        await writePdf(join(dir, 'notes.pdf'), [50]);
        await writePdf(join(dir, 'Chapter_001-003 - S.pdf'), [50]);
        await writePdf(join(dir, 'Chapter_004 - S.pdf'), [104]);
        await writePdf(join(dir, 'Chapter_005 - S.pdf'), [105]);
        await writeFile(join(dir, 'Chapter_006 - S.txt'), 'not a pdf');

        const report = await new PdfMerger().merge(dir, { originals: 'keep' });

        expect(report.skipped).toEqual(expect.arrayContaining([
            { path: join(dir, 'notes.pdf'), reason: 'no-chapter-number' },
            { path: join(dir, 'Chapter_001-003 - S.pdf'), reason: 'already-merged' },
        ]));
        expect(report.skipped).toHaveLength(2);
        expect(report.bundles.map((b) => b.outputPath)).toEqual([join(dir, 'Chapter_004-005 - S.pdf')]);
    });

    it('does not bundle a lone chapter', async () => {
        await writePdf(join(dir, 'Chapter_007 - S.pdf'), [107]);

        const report = await new PdfMerger().merge(dir);

        expect(report.bundles).toEqual([]);
        expect(report.skipped).toEqual([{ path: join(dir, 'Chapter_007 - S.pdf'), reason: 'single-member' }]);
        expect(await readdir(dir)).toEqual(['Chapter_007 - S.pdf']);
    });

    it('merges each title separately', async () => {
        for (const title of ['Alpha', 'Beta']) {
            await writePdf(join(dir, `Chapter_001 - ${title}.pdf`), [101]);
            await writePdf(join(dir, `Chapter_002 - ${title}.pdf`), [102]);
        }

        const report = await new PdfMerger().merge(dir, { originals: 'keep' });

        expect(report.bundles.map((b) => b.outputPath).sort()).toEqual([
            join(dir, 'Chapter_001-002 - Alpha.pdf'),
            join(dir, 'Chapter_001-002 - Beta.pdf'),
        ]);
    });

    it('splits into bundles of N chapters', async () => {
        for (let n = 1; n <= 5; n++) {
            await writePdf(join(dir, `Chapter_00${n} - S.pdf`), [100 + n]);
        }

        const report = await new PdfMerger().merge(dir, { chaptersPerBundle: 2, originals: 'keep' });

        expect(report.bundles.map((b) => b.outputPath)).toEqual([
            join(dir, 'Chapter_001-002 - S.pdf'),
            join(dir, 'Chapter_003-004 - S.pdf'),
        ]);
        expect(report.skipped).toEqual([{ path: join(dir, 'Chapter_005 - S.pdf'), reason: 'single-member' }]);
        expect(await pageWidths(join(dir, 'Chapter_003-004 - S.pdf'))).toEqual([103, 104]);
    });

    it('warns about duplicate chapter numbers and still merges both', async () => {
        await writePdf(join(dir, 'Chapter_003 - S.pdf'), [103]);
        await writePdf(join(dir, 'Chapter_3 - S.pdf'), [203]);
        await writePdf(join(dir, 'Chapter_004 - S.pdf'), [104]);

        const report = await new PdfMerger().merge(dir, { originals: 'keep' });

        expect(report.warnings).toEqual(['Duplicate chapter 3: Chapter_003 - S.pdf and Chapter_3 - S.pdf']);
        expect(await pageWidths(join(dir, 'Chapter_003-004 - S.pdf'))).toEqual([103, 203, 104]);
    });

    it('leaves a chapter that only has continuation parts unbundled', async () => {
        await writePdf(join(dir, 'Chapter_005 - S.pdf'), [105]);
        await writePdf(join(dir, 'Chapter_005 - S (part 2).pdf'), [205]);

        const report = await new PdfMerger().merge(dir);

        expect(report.bundles).toEqual([]);
        expect(report.skipped).toEqual([
            { path: join(dir, 'Chapter_005 - S.pdf'), reason: 'single-member' },
            { path: join(dir, 'Chapter_005 - S (part 2).pdf'), reason: 'single-member' },
        ]);
        expect((await readdir(dir)).sort()).toEqual(['Chapter_005 - S (part 2).pdf', 'Chapter_005 - S.pdf']);
    });

    it('splits bundles so a lone chapter with parts at the end stays unbundled', async () => {
        await writePdf(join(dir, 'Chapter_001 - S.pdf'), [101]);
        await writePdf(join(dir, 'Chapter_002 - S.pdf'), [102]);
        await writePdf(join(dir, 'Chapter_003 - S.pdf'), [103]);
        await writePdf(join(dir, 'Chapter_003 - S (part 2).pdf'), [203]);

        const report = await new PdfMerger().merge(dir, { chaptersPerBundle: 2, originals: 'keep' });

        expect(report.bundles.map((b) => b.outputPath)).toEqual([join(dir, 'Chapter_001-002 - S.pdf')]);
        expect(report.skipped.map((s) => s.reason)).toEqual(['single-member', 'single-member']);
    });

    it('moves originals into _originals by default', async () => {
        await writePdf(join(dir, 'Chapter_001 - S.pdf'), [101]);
        await writePdf(join(dir, 'Chapter_002 - S.pdf'), [102]);

        await new PdfMerger().merge(dir);

        expect((await readdir(dir)).sort()).toEqual(['Chapter_001-002 - S.pdf', '_originals']);
        expect((await readdir(join(dir, '_originals'))).sort()).toEqual(['Chapter_001 - S.pdf', 'Chapter_002 - S.pdf']);
    });

    it('does not overwrite originals moved by an earlier merge', async () => {
        await mkdir(join(dir, '_originals'));
        await writePdf(join(dir, '_originals', 'Chapter_001 - S.pdf'), [901]);
        await writePdf(join(dir, '_originals', 'Chapter_001 - S (2).pdf'), [902]);
        await writePdf(join(dir, 'Chapter_001 - S.pdf'), [101]);
        await writePdf(join(dir, 'Chapter_002 - S.pdf'), [102]);

        const report = await new PdfMerger().merge(dir);

        expect(report.errors).toEqual([]);
        expect((await readdir(join(dir, '_originals'))).sort()).toEqual([
            'Chapter_001 - S (2).pdf',
            'Chapter_001 - S (3).pdf',
            'Chapter_001 - S.pdf',
            'Chapter_002 - S.pdf',
        ]);
        expect(await pageWidths(join(dir, '_originals', 'Chapter_001 - S.pdf'))).toEqual([901]);
        expect(await pageWidths(join(dir, '_originals', 'Chapter_001 - S (2).pdf'))).toEqual([902]);
        expect(await pageWidths(join(dir, '_originals', 'Chapter_001 - S (3).pdf'))).toEqual([101]);
    });

    it('deletes originals when asked', async () => {
        await writePdf(join(dir, 'Chapter_001 - S.pdf'), [101]);
        await writePdf(join(dir, 'Chapter_002 - S.pdf'), [102]);

        await new PdfMerger().merge(dir, { originals: 'delete' });

        expect(await readdir(dir)).toEqual(['Chapter_001-002 - S.pdf']);
    });

    it('merges only the chapters recorded by the latest session', async () => {
        for (let n = 1; n <= 4; n++) {
            await writePdf(join(dir, `Chapter_00${n} - S.pdf`), [100 + n]);
        }
        const manifest = await SessionManifest.create(dir, { mangaTitle: 'S', startUrl: 'https://example.com/ch-3', mode: { kind: 'automatic' } });
        await manifest.record('Chapter_003', [join(dir, 'Chapter_003 - S.pdf')]);
        await manifest.record('Chapter_004', [join(dir, 'Chapter_004 - S.pdf')]);

        const report = await new PdfMerger().merge(dir, { useSessionManifest: true, originals: 'keep' });

        expect(report.bundles.map((b) => b.outputPath)).toEqual([join(dir, 'Chapter_003-004 - S.pdf')]);
        expect(report.bundles[0]?.memberFiles).toEqual([join(dir, 'Chapter_003 - S.pdf'), join(dir, 'Chapter_004 - S.pdf')]);
    });

    it('does not fall back to the whole folder when there is no session', async () => {
        await writePdf(join(dir, 'Chapter_001 - S.pdf'), [101]);
        await writePdf(join(dir, 'Chapter_002 - S.pdf'), [102]);

        const report = await new PdfMerger().merge(dir, { useSessionManifest: true });

        expect(report.bundles).toEqual([]);
        expect(report.warnings).toEqual(['No chapters recorded in the latest session, nothing to merge']);
        expect((await readdir(dir)).sort()).toEqual(['Chapter_001 - S.pdf', 'Chapter_002 - S.pdf']);
    });

    it('merges only the selected files', async () => {
        for (let n = 1; n <= 3; n++) {
            await writePdf(join(dir, `Chapter_00${n} - S.pdf`), [100 + n]);
        }

        const report = await new PdfMerger().merge(dir, {
            selectedFiles: ['Chapter_003 - S.pdf', 'Chapter_001 - S.pdf'],
            originals: 'keep',
        });

        expect(await pageWidths(report.bundles[0]?.outputPath ?? '')).toEqual([101, 103]);
        expect(report.bundles[0]?.outputPath).toBe(join(dir, 'Chapter_001-003 - S.pdf'));
    });

    it('reports an unreadable group and still merges the others', async () => {
        await writeFile(join(dir, 'Chapter_001 - Broken.pdf'), 'not a pdf');
        await writePdf(join(dir, 'Chapter_002 - Broken.pdf'), [102]);
        await writePdf(join(dir, 'Chapter_001 - Fine.pdf'), [101]);
        await writePdf(join(dir, 'Chapter_002 - Fine.pdf'), [102]);

        const report = await new PdfMerger().merge(dir);

        expect(report.errors).toHaveLength(1);
        expect(report.errors[0]).toBeInstanceOf(MergeError);
        expect(report.errors[0]?.group).toBe('Broken');
        expect(report.bundles.map((b) => b.outputPath)).toEqual([join(dir, 'Chapter_001-002 - Fine.pdf')]);
        const left = await readdir(dir);
        expect(left).toContain('Chapter_001 - Broken.pdf');
        expect(left).toContain('Chapter_002 - Broken.pdf');
        expect(left).not.toContain('Chapter_001-002 - Broken.pdf');
    });

    it('rejects a negative bundle size', async () => {
        await expect(new PdfMerger().merge(dir, { chaptersPerBundle: -1 })).rejects.toBeInstanceOf(RangeError);
    });
});

describe('chunkByChapter', () => {
    it('never splits a chapter and never exceeds N chapters per chunk', () => {
        fc.assert(
            fc.property(
                fc.array(fc.tuple(fc.integer({ min: 1, max: 30 }), fc.integer({ min: 1, max: 3 })), { maxLength: 40 }),
                fc.integer({ min: 1, max: 6 }),
                (entries, perBundle) => {
                    const names = new Set(entries.map(([n, part]) => part > 1 ? `Chapter_${n} - S (part ${part}).pdf` : `Chapter_${n} - S.pdf`));
                    const sorted = [...names].map(candidate).sort(compareCandidates);

                    const chunks = chunkByChapter(sorted, perBundle);

                    expect(chunks.flat()).toEqual(sorted);
                    for (const chunk of chunks) {
                        expect(new Set(chunk.map((c) => c.parsed.start)).size).toBeLessThanOrEqual(perBundle);
                    }
                    for (let i = 1; i < chunks.length; i++) {
                        const previous = chunks[i - 1]?.at(-1);
                        const first = chunks[i]?.[0];
                        expect(previous?.parsed.start).not.toBe(first?.parsed.start);
                    }
                }
            ),
            { numRuns: 200 }
        );
    });

    it('puts everything in one chunk when N is 0', () => {
        const sorted = ['Chapter_1 - S.pdf', 'Chapter_2 - S.pdf'].map(candidate);
        expect(chunkByChapter(sorted, 0)).toEqual([sorted]);
        expect(chunkByChapter([], 0)).toEqual([]);
    });
});

describe('compareCandidates', () => {
    it('sorts by number, then part, then name', () => {
        const sorted = ['Chapter_10 - S.pdf', 'Chapter_2 - S (part 2).pdf', 'Chapter_2 - S.pdf', 'Chapter_1.5 - S.pdf']
            .map(candidate)
            .sort(compareCandidates)
            .map((c) => c.fileName);

        expect(sorted).toEqual(['Chapter_1.5 - S.pdf', 'Chapter_2 - S.pdf', 'Chapter_2 - S (part 2).pdf', 'Chapter_10 - S.pdf']);
    });
});
