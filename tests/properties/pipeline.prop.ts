/**
 * End-to-end: HTML chapter pages → chapter PDFs → merged bundle
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { downloadChapters, mergeChapterPdfs } from '../../src/index';
import { silentLogger } from '../../src/utils/logger';
import {
    bytesResponse,
    chapterPage,
    fastSettings,
    htmlResponse,
    makeTempDir,
    removeDir,
    solidJpeg,
    stubFetch,
} from '../support';
import type { Route } from '../support';

function pageUrl(n: number): string {
    return `https://example.com/title/1-en-series/${100 + n}-ch-00${n}`;
}

function imageUrl(n: number): string {
    return `https://img.example.com/series/${n}.jpg`;
}

describe('downloadChapters + mergeChapterPdfs', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        vi.unstubAllGlobals();
        await removeDir(dir);
    });

    it('downloads a three-chapter series and merges it in order', async () => {
        const routes: Record<string, Route> = {};
        for (let n = 1; n <= 3; n++) {
            const jpeg = await solidJpeg(40 + n, 60);
            routes[pageUrl(n)] = () => htmlResponse(chapterPage({
                number: n,
                images: [imageUrl(n)],
                next: n < 3 ? pageUrl(n + 1) : undefined,
            }));
            routes[imageUrl(n)] = () => bytesResponse(jpeg);
        }
        const { headers } = stubFetch(routes);
        const targetDir = join(dir, 'Series');

        const state = await downloadChapters(pageUrl(1), {
            title: 'Series',
            targetDir,
            settings: fastSettings({ image: { maxWidth: 0 } }),
            logger: silentLogger,
        });

        expect(state.status).toBe('completed');
        expect(state.stopReason).toBe('end-of-series');
        expect(state.chapters.map((c) => c.label)).toEqual(['Chapter_001', 'Chapter_002', 'Chapter_003']);
        expect(headers.get(imageUrl(2))?.get('Referer')).toBe(pageUrl(2));

        const report = await mergeChapterPdfs(targetDir, { originals: 'keep' });

        const bundle = join(targetDir, 'Chapter_001-003 - Series.pdf');
        expect(report.bundles.map((b) => b.outputPath)).toEqual([bundle]);
        const doc = await PDFDocument.load(await readFile(bundle));
        expect(doc.getPages().map((p) => Math.round(p.getSize().width))).toEqual([41, 42, 43]);
        expect((await readdir(targetDir)).filter((n) => n.endsWith('.pdf')).sort()).toEqual([
            'Chapter_001 - Series.pdf',
            'Chapter_001-003 - Series.pdf',
            'Chapter_002 - Series.pdf',
            'Chapter_003 - Series.pdf',
        ]);
    });
});
