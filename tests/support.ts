/**
 * Shared fixtures for the property tests
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import sharp from 'sharp';
import { vi } from 'vitest';

import { resolveSettings } from '../src/config/settings';
import { ProviderError } from '../src/services/errors';
import type { ChapterProvider } from '../src/services/provider';
import type { Logger, LogLevel } from '../src/utils/logger';
import type { ChapterContent, ChapterRef, EngineSettings } from '../src/types';

/**
 * Settings without delays or backoff so retry paths run instantly
 */
export function fastSettings(overrides: Record<string, unknown> = {}): EngineSettings {
    return resolveSettings({
        pacing: { interImageDelay: 0, interChapterDelay: 0 },
        network: { backoffBase: 0, backoffCeiling: 0, requestsBeforePause: 0, timeout: 5000 },
        ...overrides,
    });
}

export const FAST_NETWORK = {
    maxRetries: 3,
    backoffBase: 0,
    backoffCeiling: 0,
    requestsBeforePause: 0,
    timeout: 5000,
} as const;

export async function makeTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'chapter-binder-'));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

export function solidJpeg(width: number, height: number, color = '#3366cc'): Promise<Buffer> {
    return sharp({ create: { width, height, channels: 3, background: color } }).jpeg().toBuffer();
}

export function transparentPng(width: number, height: number): Promise<Buffer> {
    return sharp({ create: { width, height, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } } })
        .png()
        .toBuffer();
}

export type Route = (request: { url: string; headers: Headers; call: number }) => Response | Promise<Response>;

/**
 * Replaces global fetch with an in-process router keyed by exact URL.
 * Unknown URLs answer 404. Returns the per-URL call log.
 */
export function stubFetch(routes: Record<string, Route>): { calls: Map<string, number>; headers: Map<string, Headers> } {
    const calls = new Map<string, number>();
    const headers = new Map<string, Headers>();

    vi.stubGlobal('fetch', async (input: string | URL | Request, init?: RequestInit) => {
        const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
        const call = (calls.get(url) ?? 0) + 1;
        calls.set(url, call);
        const requestHeaders = new Headers(init?.headers);
        headers.set(url, requestHeaders);

        const route = routes[url];
        if (!route) {
            return new Response('not found', { status: 404, statusText: 'Not Found' });
        }
        return route({ url, headers: requestHeaders, call });
    });

    return { calls, headers };
}

export function htmlResponse(html: string): Response {
    return new Response(html, { status: 200, headers: { 'content-type': 'text/html' } });
}

export function bytesResponse(bytes: Buffer): Response {
    return new Response(new Uint8Array(bytes), { status: 200, headers: { 'content-type': 'image/jpeg' } });
}

/**
 * Minimal chapter page in the markup the HTML provider understands
 */
export function chapterPage(options: { number?: number; images: string[]; next?: string; title?: string }): string {
    const images = options.images.map((src) => `<img class="w-full h-full" src="${src}">`).join('\n');
    const heading = options.number !== undefined ? `<span class="opacity-80">Chapter ${options.number}</span>` : '';
    const next = options.next ? `<a class="btn btn-sm btn-outline btn-primary" href="${options.next}">Next Chapter</a>` : '';
    return `<html><head><title>${options.title ?? 'Test Series'}</title></head><body>
<h1>${options.title ?? 'Test Series'}</h1>
${heading}
<div class="pages">${images}</div>
${next}
</body></html>`;
}

export type FakePageEntry = ChapterContent | Error;

/**
 * In-process provider serving a fixed set of pages; unknown URLs are fatal
 */
export class FakeProvider implements ChapterProvider {
    readonly fetched: string[] = [];
    closed = false;

    constructor(private readonly pages: Map<string, FakePageEntry>) {}

    async fetch(ref: ChapterRef): Promise<ChapterContent> {
        this.fetched.push(ref.url);
        const page = this.pages.get(ref.url);
        if (page instanceof Error) throw page;
        if (!page) throw new ProviderError(`No page ${ref.url}`, 'fatal', ref.url);
        return page;
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

/**
 * Logger that keeps every line in memory
 */
export class RecordingLogger implements Logger {
    readonly lines: Array<[LogLevel, string]> = [];

    debug(message: string): void {
        this.lines.push(['debug', message]);
    }

    info(message: string): void {
        this.lines.push(['info', message]);
    }

    success(message: string): void {
        this.lines.push(['info', message]);
    }

    warn(message: string): void {
        this.lines.push(['warn', message]);
    }

    error(message: string): void {
        this.lines.push(['error', message]);
    }

    withErrorLog(): RecordingLogger {
        return this;
    }

    messages(level: LogLevel): string[] {
        return this.lines.filter(([l]) => l === level).map(([, message]) => message);
    }
}
