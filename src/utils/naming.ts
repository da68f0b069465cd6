/**
 * Chapter numbering and the `Chapter_NNN - Title.pdf` naming scheme.
 * The merger recovers ordering from filenames alone, so everything that
 * writes or reads chapter PDFs goes through these functions.
 */

import { basename } from 'node:path';

import { NAMING } from '../config/constants';
import type { ChapterFileName } from '../types';
import { sanitizeTitle } from './text';

const NUMBER_TOKEN = String.raw`\d+(?:[._]\d+)?`;
const CHAPTER_FILE_RE = new RegExp(`Chapter_(${NUMBER_TOKEN})(?:-(${NUMBER_TOKEN}))?`, 'i');
const TITLE_RE = /\s-\s(.+?)(?:\s\(part\s\d+\))?\.pdf$/i;
const PART_RE = /\s\(part\s(\d+)\)\.pdf$/i;

function splitNumber(value: number): { whole: string; fraction: string } {
    const [whole = '0', fraction = ''] = String(value).split('.');
    return { whole: whole.padStart(NAMING.NUMBER_WIDTH, '0'), fraction };
}

/**
 * 12 → `012`, 12.5 → `012.5`
 */
export function formatChapterNumber(value: number): string {
    const { whole, fraction } = splitNumber(value);
    return fraction ? `${whole}.${fraction}` : whole;
}

/**
 * Bound format used in bundle names: 12 → `012`, 12.5 → `012_5`
 */
export function formatBound(value: number): string {
    const { whole, fraction } = splitNumber(value);
    return fraction ? `${whole}_${fraction}` : whole;
}

export function chapterLabel(value: number): string {
    return `${NAMING.CHAPTER_PREFIX}${formatChapterNumber(value)}`;
}

export function chapterFileName(value: number, title: string): string {
    return `${chapterLabel(value)} - ${sanitizeTitle(title)}.pdf`;
}

export function bundleFileName(first: number, last: number, title: string): string {
    return `${NAMING.CHAPTER_PREFIX}${formatBound(first)}-${formatBound(last)} - ${sanitizeTitle(title)}.pdf`;
}

/**
 * `dir/Chapter_001 - T.pdf` + 2 → `dir/Chapter_001 - T (part 2).pdf`
 */
export function withPartSuffix(pdfPath: string, part: number): string {
    if (part <= 1) return pdfPath;
    return pdfPath.replace(/\.pdf$/i, '') + ` (part ${part}).pdf`;
}

function tokenToNumber(token: string): number {
    return Number(token.replace('_', '.'));
}

/**
 * Reads a chapter number out of free text such as `Chapter 12.5: Title`
 */
export function parseChapterNumberFromText(text: string): number | undefined {
    const match = /(?:chapter|kapitel|ch\.?)\s*(\d+(?:\.\d+)?)/i.exec(text);
    return match?.[1] !== undefined ? Number(match[1]) : undefined;
}

/**
 * Reads a chapter number out of a chapter URL: `-ch-12`, `chapter-12`,
 * otherwise the last number of the path
 */
export function parseChapterNumberFromUrl(url: string): number | undefined {
    let path: string;
    try {
        path = new URL(url).pathname;
    } catch {
        path = url;
    }

    const explicit = /(?:-ch-|chapter[-_])(\d+(?:\.\d+)?)/i.exec(path);
    if (explicit?.[1] !== undefined) {
        return Number(explicit[1]);
    }

    const numbers = path.match(/\d+/g);
    const last = numbers?.[numbers.length - 1];
    return last !== undefined ? Number(last) : undefined;
}

/**
 * Parses a chapter PDF filename (single chapter, continuation part or merged range)
 *
 * @returns null when the name carries no chapter number
 */
export function parseChapterFileName(fileName: string): ChapterFileName | null {
    const name = basename(fileName);
    if (!/\.pdf$/i.test(name)) return null;

    const match = CHAPTER_FILE_RE.exec(name);
    const startToken = match?.[1];
    if (!match || startToken === undefined) return null;

    const start = tokenToNumber(startToken);
    const endToken = match[2];
    const end = endToken !== undefined ? tokenToNumber(endToken) : start;
    const partToken = PART_RE.exec(name)?.[1];

    return {
        start: Math.min(start, end),
        end: Math.max(start, end),
        part: partToken !== undefined ? Number(partToken) : 1,
        title: TITLE_RE.exec(name)?.[1]?.trim() ?? '',
        isRange: endToken !== undefined,
    };
}
