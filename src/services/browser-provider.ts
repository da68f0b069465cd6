/**
 * Browser-backed chapter provider for sites that render chapter images with scripts
 */

import puppeteer from 'puppeteer-core';
import type { LaunchOptions } from 'puppeteer-core';

import { HEADERS, NETWORK } from '../config/constants';
import { DEFAULT_SETTINGS } from '../config/settings';
import { backoffDelay, sleep } from '../utils/time';
import type { Logger } from '../utils/logger';
import { silentLogger } from '../utils/logger';
import { CancelledError, ProviderError } from './errors';
import { isTransientStatus } from './network';
import { extractChapterContent, type ChapterProvider } from './provider';
import type { BrowserSettings, ChapterContent, ChapterRef, NetworkSettings } from '../types';

export interface PageHandle {
    setUserAgent(userAgent: string): Promise<void>;
    goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<{ status(): number } | null>;
    content(): Promise<string>;
}

export interface BrowserHandle {
    newPage(): Promise<PageHandle>;
    close(): Promise<void>;
    disconnect(): Promise<void>;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<BrowserHandle>;

export interface BrowserProviderOptions
    extends Partial<BrowserSettings>, Partial<Pick<NetworkSettings, 'maxRetries' | 'backoffBase' | 'backoffCeiling'>> {
    timeout?: number;
    logger?: Logger;
    /** Replaces puppeteer's launcher */
    launch?: BrowserLauncher;
}

const launchPuppeteer: BrowserLauncher = (options) => puppeteer.launch(options);

/**
 * Loads each chapter in one headless page, waits for scripts to settle
 * and parses the rendered DOM. The browser starts on the first fetch with
 * the configured profile, or with a throwaway profile when that fails.
 */
export class BrowserChapterProvider implements ChapterProvider {
    private browser: BrowserHandle | null = null;
    private page: PageHandle | null = null;
    private readonly settings: BrowserSettings;
    private readonly timeout: number;
    private readonly retry: Pick<NetworkSettings, 'maxRetries' | 'backoffBase' | 'backoffCeiling'>;
    private readonly logger: Logger;
    private readonly launch: BrowserLauncher;

    constructor(options: BrowserProviderOptions = {}) {
        this.settings = {
            executablePath: options.executablePath,
            profileDir: options.profileDir,
            waitAfterLoad: options.waitAfterLoad ?? DEFAULT_SETTINGS.browser.waitAfterLoad,
            keepOpen: options.keepOpen ?? DEFAULT_SETTINGS.browser.keepOpen,
        };
        this.timeout = options.timeout ?? NETWORK.TIMEOUT;
        this.retry = {
            maxRetries: options.maxRetries ?? DEFAULT_SETTINGS.network.maxRetries,
            backoffBase: options.backoffBase ?? DEFAULT_SETTINGS.network.backoffBase,
            backoffCeiling: options.backoffCeiling ?? DEFAULT_SETTINGS.network.backoffCeiling,
        };
        this.logger = options.logger ?? silentLogger;
        this.launch = options.launch ?? launchPuppeteer;
    }

    private async openPage(): Promise<PageHandle> {
        if (this.page) return this.page;

        const base: LaunchOptions = { headless: true, executablePath: this.settings.executablePath };
        let browser: BrowserHandle;
        if (this.settings.profileDir) {
            try {
                browser = await this.launch({ ...base, userDataDir: this.settings.profileDir });
            } catch (error) {
                this.logger.warn(`Browser profile ${this.settings.profileDir} unavailable, using a temporary profile`);
                this.logger.debug(String(error));
                browser = await this.launch(base);
            }
        } else {
            browser = await this.launch(base);
        }

        this.browser = browser;
        const page = await browser.newPage();
        await page.setUserAgent(HEADERS['User-Agent'] ?? '');
        this.page = page;
        return page;
    }

    /**
     * Renders a chapter page. Navigation errors, timeouts and 5xx, 408 and
     * 429 responses are retried with backoff; other HTTP errors and a browser
     * that cannot start fail at once.
     *
     * @throws ProviderError when the page cannot be loaded
     * @throws CancelledError when cancellation was observed before a retry
     */
    async fetch(ref: ChapterRef, signal?: AbortSignal): Promise<ChapterContent> {
        let page: PageHandle;
        try {
            page = await this.openPage();
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ProviderError(`Browser could not start for ${ref.url}: ${reason}`, 'fatal', ref.url, {
                cause: error,
            });
        }

        const { maxRetries, backoffBase, backoffCeiling } = this.retry;
        let lastError: ProviderError | null = null;

        for (let attempt = 0; attempt < maxRetries; attempt++) {
            if (attempt > 0) {
                await sleep(backoffDelay(attempt - 1, backoffBase, backoffCeiling), signal);
                if (signal?.aborted) {
                    throw new CancelledError(`Cancelled before retrying ${ref.url}`);
                }
            }

            try {
                return extractChapterContent(await this.render(page, ref.url, signal), ref.url);
            } catch (error) {
                lastError = this.toProviderError(ref.url, error);
                if (lastError.kind !== 'transient') {
                    throw lastError;
                }
                this.logger.debug(`Attempt ${attempt + 1}/${maxRetries} for ${ref.url} failed: ${lastError.message}`);
            }
        }

        throw lastError ?? new ProviderError(`No attempt made for ${ref.url}`, 'transient', ref.url);
    }

    private async render(page: PageHandle, url: string, signal: AbortSignal | undefined): Promise<string> {
        const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeout });
        const status = response?.status() ?? 200;
        if (status >= 400) {
            throw new ProviderError(`HTTP ${status} for chapter ${url}`, isTransientStatus(status) ? 'transient' : 'fatal', url);
        }
        await sleep(this.settings.waitAfterLoad, signal);
        return page.content();
    }

    private toProviderError(url: string, error: unknown): ProviderError {
        if (error instanceof ProviderError) return error;
        const reason = error instanceof Error ? error.message : String(error);
        return new ProviderError(`Browser could not load ${url}: ${reason}`, 'transient', url, { cause: error });
    }

    /**
     * Closes the browser; with keepOpen it is left running for inspection
     */
    async close(): Promise<void> {
        const browser = this.browser;
        this.browser = null;
        this.page = null;
        if (!browser) return;

        if (this.settings.keepOpen) {
            this.logger.info('Leaving the browser open');
            await browser.disconnect();
        } else {
            await browser.close();
        }
    }
}
