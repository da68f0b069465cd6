/**
 * Page Layout
 * Greedy height-budget packing of images onto PDF pages
 */

import type { ImageDimensions, PageLayout, PagePlacement } from '../types';

function assertPositiveInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new RangeError(`${name} must be a positive integer, got ${value}`);
    }
}

/**
 * Splits a height into bands of at most `max`: all bands are `max`
 * except the last, which holds the remainder
 *
 * @example sliceHeights(25000, 10000) → [10000, 10000, 5000]
 */
export function sliceHeights(height: number, max: number): number[] {
    assertPositiveInteger('height', height);
    assertPositiveInteger('max', max);

    const bands: number[] = [];
    let remaining = height;
    while (remaining > max) {
        bands.push(max);
        remaining -= max;
    }
    bands.push(remaining);
    return bands;
}

function pageOf(placements: PagePlacement[]): PageLayout {
    return {
        width: Math.max(...placements.map((p) => p.width)),
        height: placements.reduce((sum, p) => sum + p.height, 0),
        placements,
    };
}

/**
 * Plans the pages of one chapter.
 *
 * Images no taller than `maxPageHeight` are stacked on the current page
 * while the cumulative height stays within the budget. A taller image first
 * flushes the current page, then each of its bands gets a page of its own.
 * The result is a pure function of the inputs.
 */
export function planPages(images: readonly ImageDimensions[], maxPageHeight: number): PageLayout[] {
    assertPositiveInteger('maxPageHeight', maxPageHeight);

    const pages: PageLayout[] = [];
    let current: PagePlacement[] = [];
    let currentHeight = 0;

    const flush = (): void => {
        if (current.length > 0) {
            pages.push(pageOf(current));
            current = [];
            currentHeight = 0;
        }
    };

    images.forEach((image, imageIndex) => {
        assertPositiveInteger(`width of image ${imageIndex}`, image.width);
        assertPositiveInteger(`height of image ${imageIndex}`, image.height);

        if (image.height > maxPageHeight) {
            flush();
            let sourceTop = 0;
            for (const band of sliceHeights(image.height, maxPageHeight)) {
                pages.push(pageOf([{ imageIndex, sourceTop, width: image.width, height: band }]));
                sourceTop += band;
            }
            return;
        }

        if (currentHeight + image.height > maxPageHeight) {
            flush();
        }
        current.push({ imageIndex, sourceTop: 0, width: image.width, height: image.height });
        currentHeight += image.height;
    });

    flush();
    return pages;
}

/**
 * Groups pages into files of at most `maxPagesPerFile` pages, keeping order
 */
export function partitionPages<T>(pages: readonly T[], maxPagesPerFile: number): T[][] {
    assertPositiveInteger('maxPagesPerFile', maxPagesPerFile);

    const files: T[][] = [];
    for (let i = 0; i < pages.length; i += maxPagesPerFile) {
        files.push(pages.slice(i, i + maxPagesPerFile));
    }
    return files;
}
