/**
 * PDF Assembler for chapter-binder
 * Lays out normalized images onto pages and writes one or more chapter PDFs
 */

import { rm } from 'node:fs/promises';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';

import { DEFAULT_SETTINGS } from '../config/settings';
import { writeFileAtomic } from '../utils/fs';
import { withPartSuffix } from '../utils/naming';
import { AssemblyError } from './errors';
import { planPages, partitionPages } from './layout';
import type { ImageAsset, PageLayout, PdfSettings } from '../types';

export interface PdfAssemblerOptions extends Partial<PdfSettings> {
    /** Quality used when a page has to be re-encoded from several images */
    jpegQuality?: number;
}

/**
 * PdfAssembler turns a chapter's images into PDF files.
 *
 * Output is all-or-nothing per chapter: either every file of the chapter
 * is in place or none is.
 */
export class PdfAssembler {
    private readonly maxPageHeight: number;
    private readonly maxPagesPerFile: number;
    private readonly jpegQuality: number;

    constructor(options: PdfAssemblerOptions = {}) {
        this.maxPageHeight = options.maxPageHeight ?? DEFAULT_SETTINGS.pdf.maxPageHeight;
        this.maxPagesPerFile = options.maxPagesPerFile ?? DEFAULT_SETTINGS.pdf.maxPagesPerFile;
        this.jpegQuality = options.jpegQuality ?? DEFAULT_SETTINGS.image.jpegQuality;
    }

    /**
     * Writes the chapter to `outPath`, plus `<base> (part N).pdf` files when
     * the page count exceeds maxPagesPerFile
     *
     * @returns Paths written, in reading order; empty when there are no images
     * @throws AssemblyError after removing everything written for the chapter
     */
    async assemble(images: readonly ImageAsset[], chapterTitle: string, outPath: string): Promise<string[]> {
        if (images.length === 0) {
            return [];
        }

        const written: string[] = [];
        let target = outPath;

        try {
            const pages = planPages(images, this.maxPageHeight);
            const files = partitionPages(pages, this.maxPagesPerFile);

            for (const [index, filePages] of files.entries()) {
                target = withPartSuffix(outPath, index + 1);
                const title = files.length > 1 ? `${chapterTitle} (part ${index + 1})` : chapterTitle;
                const bytes = await this.buildDocument(images, filePages, title);
                await writeFileAtomic(target, bytes);
                written.push(target);
            }
        } catch (error) {
            await Promise.all([...written, `${target}.partial`].map((path) => rm(path, { force: true })));
            const reason = error instanceof Error ? error.message : String(error);
            throw new AssemblyError(`Failed to write ${target}: ${reason}`, target, { cause: error });
        }

        return written;
    }

    private async buildDocument(
        images: readonly ImageAsset[],
        pages: readonly PageLayout[],
        title: string
    ): Promise<Uint8Array> {
        const doc = await PDFDocument.create();
        doc.setTitle(title);
        doc.setCreator('chapter-binder');

        for (const layout of pages) {
            const jpeg = await doc.embedJpg(await this.renderPage(images, layout));
            const page = doc.addPage([layout.width, layout.height]);
            page.drawImage(jpeg, { x: 0, y: 0, width: layout.width, height: layout.height });
        }

        return doc.save();
    }

    /**
     * Renders one page as a JPEG. A page holding one whole JPEG image reuses its bytes.
     */
    private async renderPage(images: readonly ImageAsset[], layout: PageLayout): Promise<Buffer> {
        const [first] = layout.placements;
        const firstImage = first ? images[first.imageIndex] : undefined;
        if (
            layout.placements.length === 1 &&
            first &&
            firstImage &&
            (firstImage.format ?? 'jpeg') === 'jpeg' &&
            first.sourceTop === 0 &&
            first.height === firstImage.height
        ) {
            return firstImage.bytes;
        }

        const layers: sharp.OverlayOptions[] = [];
        let top = 0;
        for (const placement of layout.placements) {
            const image = images[placement.imageIndex];
            if (!image) {
                throw new Error(`Layout references missing image ${placement.imageIndex}`);
            }
            const band = placement.sourceTop === 0 && placement.height === image.height
                ? image.bytes
                : await sharp(image.bytes)
                    .extract({ left: 0, top: placement.sourceTop, width: placement.width, height: placement.height })
                    .toBuffer();
            layers.push({ input: band, top, left: 0 });
            top += placement.height;
        }

        return sharp({
            create: {
                width: layout.width,
                height: layout.height,
                channels: 3,
                background: '#ffffff',
            },
        })
            .composite(layers)
            .jpeg({ quality: this.jpegQuality })
            .toBuffer();
    }
}
