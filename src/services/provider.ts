/**
 * Chapter providers: turn a chapter reference into its title, image list and next link
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

import { IMAGE } from '../config/constants';
import { parseChapterNumberFromText } from '../utils/naming';
import { cleanImageUrl, resolveUrl } from '../utils/text';
import { CancelledError, HttpError, ProviderError } from './errors';
import type { NetworkManager } from './network';
import type { ChapterContent, ChapterRef } from '../types';

/**
 * Source of chapter content. One instance serves one run and is used
 * strictly sequentially.
 */
export interface ChapterProvider {
    /**
     * @throws ProviderError when the chapter cannot be produced
     */
    fetch(ref: ChapterRef, signal?: AbortSignal): Promise<ChapterContent>;
    close?(): Promise<void>;
}

const IMAGE_ATTRIBUTES = ['src', 'data-src', 'data-lazy-src', 'data-original', 'srcset'] as const;

/**
 * Next-chapter links, most specific first. Each entry is a selector and
 * the text the link must contain.
 */
const NEXT_LINK_RULES: ReadonlyArray<readonly [string, string]> = [
    ['a.btn', 'Next Chapter'],
    ['a.btn', 'Next'],
    ['a[class*="btn"]', 'Next'],
    ['a[href*="-ch-"]', 'Next'],
    ['a[rel="next"]', ''],
];

function looksLikeImage(url: string): boolean {
    const lower = url.toLowerCase();
    return IMAGE.EXTENSIONS.some((ext) => lower.endsWith(ext)) || lower.includes('/media/');
}

function firstSrcsetCandidate(value: string): string {
    return value.split(',')[0]?.trim().split(/\s+/)[0] ?? '';
}

/**
 * Collects chapter image URLs in document order: absolute http(s),
 * without query string, deduplicated, with an image extension or a /media/ path
 */
export function extractImageUrls($: CheerioAPI, pageUrl: string): string[] {
    let images = $('img.w-full.h-full');
    if (images.length === 0) {
        images = $('img');
    }

    const links: string[] = [];
    images.each((_, el) => {
        const $img = $(el);
        let raw: string | undefined;
        for (const attr of IMAGE_ATTRIBUTES) {
            const value = $img.attr(attr)?.trim();
            if (value) {
                raw = attr === 'srcset' ? firstSrcsetCandidate(value) : value;
                break;
            }
        }
        if (!raw || raw.startsWith('data:')) return;

        const absolute = resolveUrl(pageUrl, raw);
        if (!absolute) return;
        const url = cleanImageUrl(absolute);
        if (/^https?:\/\//i.test(url) && !links.includes(url) && looksLikeImage(url)) {
            links.push(url);
        }
    });
    return links;
}

/**
 * Finds the link to the following chapter, resolved against the page URL
 */
export function findNextChapterUrl($: CheerioAPI, pageUrl: string): string | undefined {
    for (const [selector, text] of NEXT_LINK_RULES) {
        const link = $(selector)
            .filter((_, el) => $(el).text().includes(text))
            .first();
        const href = link.attr('href');
        if (!href || href.startsWith('#') || href.startsWith('javascript:')) continue;
        const url = resolveUrl(pageUrl, href);
        if (url && /^https?:\/\//i.test(url)) {
            return url;
        }
    }
    return undefined;
}

function findChapterNumber($: CheerioAPI): number | undefined {
    const candidates = [
        ...$('span.opacity-80').toArray().map((el) => $(el).text()),
        $('h1').first().text(),
        $('title').text(),
    ];
    for (const text of candidates) {
        if (!/chapter/i.test(text)) continue;
        const number = parseChapterNumberFromText(text);
        if (number !== undefined) return number;
    }
    return undefined;
}

const OPTION_NUMBER_PATTERNS = [
    /chapter\s*(\d+(?:\.\d+)?)/,
    /kapitel\s*(\d+(?:\.\d+)?)/,
    /-ch-(\d+(?:\.\d+)?)/,
    /chapter-(\d+(?:\.\d+)?)/,
    /(\d+(?:\.\d+)?)/,
];

/**
 * Reads the series' chapter list from the chapter picker: the `<select>`
 * whose options name the most distinct chapters. On a tie a
 * `select-primary select-bordered` picker wins.
 *
 * @returns Distinct chapter numbers in ascending order, or undefined without a picker
 */
export function listChapterNumbers($: CheerioAPI): number[] | undefined {
    let best: number[] = [];
    let bestPreferred = false;

    $('select').each((_, select) => {
        const numbers = new Set<number>();
        $(select).find('option').each((_, option) => {
            const blob = `${$(option).text().trim()} ${($(option).attr('value') ?? '').trim()}`.toLowerCase();
            if (!/chapter|kapitel|-ch-/.test(blob)) return;
            for (const pattern of OPTION_NUMBER_PATTERNS) {
                const match = pattern.exec(blob);
                if (match?.[1] !== undefined) {
                    numbers.add(Number(match[1]));
                    return;
                }
            }
        });
        if (numbers.size === 0) return;

        const className = ($(select).attr('class') ?? '').toLowerCase();
        const preferred = ['select', 'primary', 'bordered'].every((part) => className.includes(part));
        if (numbers.size > best.length || (numbers.size === best.length && preferred && !bestPreferred)) {
            best = [...numbers].sort((a, b) => a - b);
            bestPreferred = preferred;
        }
    });

    return best.length > 0 ? best : undefined;
}

/**
 * Parses a rendered chapter page
 */
export function extractChapterContent(html: string, pageUrl: string): ChapterContent {
    const $ = cheerio.load(html);
    const title = ($('h1').first().text() || $('title').text()).replace(/\s+/g, ' ').trim();
    const listedChapters = listChapterNumbers($);

    return {
        title,
        imageUrls: extractImageUrls($, pageUrl),
        nextUrl: findNextChapterUrl($, pageUrl),
        chapterNumber: findChapterNumber($),
        ...(listedChapters ? { listedChapters, totalChapters: listedChapters.length } : {}),
    };
}

/**
 * Wraps a failure of the page request into a ProviderError
 */
export function toProviderError(url: string, error: unknown): ProviderError | CancelledError {
    if (error instanceof ProviderError || error instanceof CancelledError) return error;
    const reason = error instanceof Error ? error.message : String(error);
    const kind = error instanceof HttpError && error.transient ? 'transient' : 'fatal';
    return new ProviderError(`Cannot load chapter ${url}: ${reason}`, kind, url, { cause: error });
}

/**
 * Provider for sites that serve chapter images in the initial HTML
 */
export class HtmlChapterProvider implements ChapterProvider {
    constructor(private readonly network: NetworkManager) {}

    async fetch(ref: ChapterRef, signal?: AbortSignal): Promise<ChapterContent> {
        let html: string;
        try {
            html = await this.network.fetchText(ref.url, { signal });
        } catch (error) {
            throw toProviderError(ref.url, error);
        }
        return extractChapterContent(html, ref.url);
    }
}
