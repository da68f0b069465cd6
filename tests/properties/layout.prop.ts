/**
 * Property-based tests for page layout
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { planPages, sliceHeights, partitionPages } from '../../src/services/layout';

const dimension = fc.record({
    width: fc.integer({ min: 1, max: 2000 }),
    height: fc.integer({ min: 1, max: 40000 }),
});

describe('Page layout property tests', () => {
    describe('sliceHeights', () => {
        it('bands sum to the height and only the last band is shorter', () => {
            fc.assert(
                fc.property(fc.integer({ min: 1, max: 100000 }), fc.integer({ min: 1, max: 20000 }), (height, max) => {
                    const bands = sliceHeights(height, max);
                    expect(bands.reduce((a, b) => a + b, 0)).toBe(height);
                    expect(bands.length).toBe(Math.ceil(height / max));
                    bands.slice(0, -1).forEach((band) => expect(band).toBe(max));
                    const last = bands[bands.length - 1] ?? 0;
                    expect(last).toBeGreaterThan(0);
                    expect(last).toBeLessThanOrEqual(max);
                }),
                { numRuns: 200 }
            );
        });

        it('splits 25000 into 10000, 10000, 5000', () => {
            expect(sliceHeights(25000, 10000)).toEqual([10000, 10000, 5000]);
        });

        it('rejects non-positive input', () => {
            expect(() => sliceHeights(0, 10)).toThrow(RangeError);
            expect(() => sliceHeights(10, 0)).toThrow(RangeError);
        });
    });

    describe('planPages', () => {
        it('never exceeds the height budget', () => {
            fc.assert(
                fc.property(fc.array(dimension, { maxLength: 30 }), fc.integer({ min: 100, max: 15000 }), (images, max) => {
                    for (const page of planPages(images, max)) {
                        expect(page.height).toBeLessThanOrEqual(max);
                        expect(page.placements.length).toBeGreaterThan(0);
                    }
                }),
                { numRuns: 200 }
            );
        });

        it('places every pixel row of every image exactly once, in order', () => {
            fc.assert(
                fc.property(fc.array(dimension, { maxLength: 30 }), fc.integer({ min: 100, max: 15000 }), (images, max) => {
                    const placements = planPages(images, max).flatMap((page) => page.placements);
                    const rows = new Map<number, number>();
                    let previous = { imageIndex: -1, sourceTop: -1 };
                    for (const p of placements) {
                        const later = p.imageIndex > previous.imageIndex ||
                            (p.imageIndex === previous.imageIndex && p.sourceTop > previous.sourceTop);
                        expect(later).toBe(true);
                        expect(p.sourceTop).toBe(rows.get(p.imageIndex) ?? 0);
                        rows.set(p.imageIndex, p.sourceTop + p.height);
                        previous = p;
                    }
                    images.forEach((image, index) => expect(rows.get(index)).toBe(image.height));
                }),
                { numRuns: 200 }
            );
        });

        it('uses the widest placement as page width and the sum of heights as page height', () => {
            fc.assert(
                fc.property(fc.array(dimension, { maxLength: 30 }), fc.integer({ min: 100, max: 15000 }), (images, max) => {
                    for (const page of planPages(images, max)) {
                        expect(page.width).toBe(Math.max(...page.placements.map((p) => p.width)));
                        expect(page.height).toBe(page.placements.reduce((sum, p) => sum + p.height, 0));
                    }
                }),
                { numRuns: 100 }
            );
        });

        it('is deterministic', () => {
            fc.assert(
                fc.property(fc.array(dimension, { maxLength: 20 }), fc.integer({ min: 100, max: 15000 }), (images, max) => {
                    expect(planPages(images, max)).toEqual(planPages(images, max));
                }),
                { numRuns: 50 }
            );
        });

        it('gives each band of a tall image its own page after flushing the current page', () => {
            const pages = planPages(
                [
                    { width: 800, height: 3000 },
                    { width: 900, height: 25000 },
                    { width: 700, height: 2000 },
                ],
                10000
            );

            expect(pages).toEqual([
                { width: 800, height: 3000, placements: [{ imageIndex: 0, sourceTop: 0, width: 800, height: 3000 }] },
                { width: 900, height: 10000, placements: [{ imageIndex: 1, sourceTop: 0, width: 900, height: 10000 }] },
                { width: 900, height: 10000, placements: [{ imageIndex: 1, sourceTop: 10000, width: 900, height: 10000 }] },
                { width: 900, height: 5000, placements: [{ imageIndex: 1, sourceTop: 20000, width: 900, height: 5000 }] },
                { width: 700, height: 2000, placements: [{ imageIndex: 2, sourceTop: 0, width: 700, height: 2000 }] },
            ]);
        });

        it('packs images while they fit and starts a new page when the next one would not', () => {
            const pages = planPages(
                [
                    { width: 600, height: 4000 },
                    { width: 800, height: 6000 },
                    { width: 700, height: 1 },
                ],
                10000
            );
            expect(pages.map((p) => p.placements.map((q) => q.imageIndex))).toEqual([[0, 1], [2]]);
            expect(pages[0]?.width).toBe(800);
        });

        it('returns no pages for no images', () => {
            expect(planPages([], 14400)).toEqual([]);
        });
    });

    describe('partitionPages', () => {
        it('keeps order and respects the per-file limit', () => {
            fc.assert(
                fc.property(fc.array(fc.integer(), { maxLength: 200 }), fc.integer({ min: 1, max: 50 }), (pages, max) => {
                    const files = partitionPages(pages, max);
                    expect(files.flat()).toEqual(pages);
                    files.forEach((file) => {
                        expect(file.length).toBeGreaterThan(0);
                        expect(file.length).toBeLessThanOrEqual(max);
                    });
                }),
                { numRuns: 100 }
            );
        });
    });
});
