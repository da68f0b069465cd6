/**
 * Engine settings: defaults, settings.json and BINDER_* environment overrides.
 * Settings are read once at run start and never written by the engine.
 */

import { readFile } from 'node:fs/promises';

import { IMAGE, NETWORK, PACING, PATHS, PDF } from './constants';
import { SettingsError } from '../services/errors';
import type { EngineSettings } from '../types';

export const DEFAULT_SETTINGS: EngineSettings = {
    downloadDir: PATHS.DOWNLOADS_DIR,
    pacing: {
        interImageDelay: PACING.INTER_IMAGE_DELAY,
        interChapterDelay: PACING.INTER_CHAPTER_DELAY,
    },
    network: {
        maxRetries: NETWORK.MAX_RETRIES,
        timeout: NETWORK.TIMEOUT,
        backoffBase: NETWORK.BACKOFF_BASE,
        backoffCeiling: NETWORK.BACKOFF_CEILING,
        requestsBeforePause: NETWORK.REQUESTS_BEFORE_PAUSE,
        antiBanPause: NETWORK.ANTI_BAN_PAUSE,
    },
    image: {
        jpegQuality: IMAGE.JPEG_QUALITY,
        progressive: IMAGE.PROGRESSIVE,
        grayscale: IMAGE.GRAYSCALE,
        maxWidth: IMAGE.MAX_WIDTH,
        concurrency: IMAGE.CONCURRENCY,
    },
    pdf: {
        maxPageHeight: PDF.MAX_PAGE_HEIGHT,
        maxPagesPerFile: PDF.MAX_PAGES_PER_FILE,
    },
    browser: {
        waitAfterLoad: PACING.WAIT_AFTER_LOAD,
        keepOpen: false,
    },
};

type RawObject = Record<string, unknown>;

interface NumberBounds {
    min?: number;
    max?: number;
    integer?: boolean;
}

function isRecord(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawObject, key: string): RawObject {
    const value = raw[key];
    if (value === undefined) return {};
    if (!isRecord(value)) {
        throw new SettingsError(`"${key}" must be an object`);
    }
    return value;
}

function checkNumber(name: string, value: number, bounds: NumberBounds): number {
    if (!Number.isFinite(value)) {
        throw new SettingsError(`${name} must be a number`);
    }
    if (bounds.integer && !Number.isInteger(value)) {
        throw new SettingsError(`${name} must be an integer`);
    }
    if (bounds.min !== undefined && value < bounds.min) {
        throw new SettingsError(`${name} must be >= ${bounds.min}`);
    }
    if (bounds.max !== undefined && value > bounds.max) {
        throw new SettingsError(`${name} must be <= ${bounds.max}`);
    }
    return value;
}

function readNumber(raw: RawObject, key: string, fallback: number, bounds: NumberBounds = {}): number {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number') {
        throw new SettingsError(`${key} must be a number`);
    }
    return checkNumber(key, value, bounds);
}

function readBoolean(raw: RawObject, key: string, fallback: boolean): boolean {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
        throw new SettingsError(`${key} must be true or false`);
    }
    return value;
}

function readString(raw: RawObject, key: string): string | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new SettingsError(`${key} must be a string`);
    }
    return value.trim() || undefined;
}

function envNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, bounds: NumberBounds = {}): number {
    const value = env[name];
    if (value === undefined || value.trim() === '') return fallback;
    return checkNumber(name, Number(value), bounds);
}

const DELAY: NumberBounds = { min: 0 };
const COUNT: NumberBounds = { min: 1, integer: true };

/**
 * Builds settings from a parsed settings.json value and the environment
 *
 * @throws SettingsError when a value has the wrong type or range
 */
export function resolveSettings(raw: unknown, env: NodeJS.ProcessEnv = {}): EngineSettings {
    if (raw !== undefined && !isRecord(raw)) {
        throw new SettingsError('Settings must be a JSON object');
    }
    const root = raw ?? {};
    const pacing = section(root, 'pacing');
    const network = section(root, 'network');
    const image = section(root, 'image');
    const pdf = section(root, 'pdf');
    const browser = section(root, 'browser');
    const defaults = DEFAULT_SETTINGS;

    const chapterLimit = root['chapterLimit'] === undefined
        ? undefined
        : readNumber(root, 'chapterLimit', 0, COUNT);
    const envLimit = env['BINDER_CHAPTER_LIMIT'];

    const settings: EngineSettings = {
        downloadDir: env['BINDER_DOWNLOAD_DIR']?.trim() || readString(root, 'downloadDir') || defaults.downloadDir,
        pacing: {
            interImageDelay: envNumber(env, 'BINDER_IMAGE_DELAY',
                readNumber(pacing, 'interImageDelay', defaults.pacing.interImageDelay, DELAY), DELAY),
            interChapterDelay: envNumber(env, 'BINDER_CHAPTER_DELAY',
                readNumber(pacing, 'interChapterDelay', defaults.pacing.interChapterDelay, DELAY), DELAY),
        },
        network: {
            maxRetries: envNumber(env, 'BINDER_MAX_RETRIES',
                readNumber(network, 'maxRetries', defaults.network.maxRetries, COUNT), COUNT),
            timeout: readNumber(network, 'timeout', defaults.network.timeout, { min: 1 }),
            backoffBase: readNumber(network, 'backoffBase', defaults.network.backoffBase, DELAY),
            backoffCeiling: readNumber(network, 'backoffCeiling', defaults.network.backoffCeiling, DELAY),
            requestsBeforePause: readNumber(network, 'requestsBeforePause', defaults.network.requestsBeforePause,
                { min: 0, integer: true }),
            antiBanPause: readNumber(network, 'antiBanPause', defaults.network.antiBanPause, DELAY),
        },
        image: {
            jpegQuality: readNumber(image, 'jpegQuality', defaults.image.jpegQuality, { min: 1, max: 100, integer: true }),
            progressive: readBoolean(image, 'progressive', defaults.image.progressive),
            grayscale: readBoolean(image, 'grayscale', defaults.image.grayscale),
            maxWidth: readNumber(image, 'maxWidth', defaults.image.maxWidth, { min: 0, integer: true }),
            concurrency: envNumber(env, 'BINDER_IMAGE_CONCURRENCY',
                readNumber(image, 'concurrency', defaults.image.concurrency, { ...COUNT, max: IMAGE.MAX_CONCURRENCY }),
                { ...COUNT, max: IMAGE.MAX_CONCURRENCY }),
        },
        pdf: {
            maxPageHeight: readNumber(pdf, 'maxPageHeight', defaults.pdf.maxPageHeight,
                { ...COUNT, max: PDF.MAX_PAGE_HEIGHT }),
            maxPagesPerFile: readNumber(pdf, 'maxPagesPerFile', defaults.pdf.maxPagesPerFile, COUNT),
        },
        browser: {
            executablePath: env['BINDER_BROWSER_PATH']?.trim() || readString(browser, 'executablePath'),
            profileDir: env['BINDER_BROWSER_PROFILE']?.trim() || readString(browser, 'profileDir'),
            waitAfterLoad: envNumber(env, 'BINDER_WAIT_AFTER_LOAD',
                readNumber(browser, 'waitAfterLoad', defaults.browser.waitAfterLoad, DELAY), DELAY),
            keepOpen: env['BINDER_KEEP_BROWSER_OPEN'] !== undefined
                ? env['BINDER_KEEP_BROWSER_OPEN'] === '1'
                : readBoolean(browser, 'keepOpen', defaults.browser.keepOpen),
        },
        chapterLimit: envLimit !== undefined && envLimit.trim() !== ''
            ? checkNumber('BINDER_CHAPTER_LIMIT', Number(envLimit), COUNT)
            : chapterLimit,
    };

    if (settings.network.backoffCeiling < settings.network.backoffBase) {
        throw new SettingsError('backoffCeiling must be >= backoffBase');
    }

    return Object.freeze(settings);
}

/**
 * Reads settings.json (a missing file means defaults) and applies the environment
 */
export async function loadSettings(
    filePath: string = PATHS.SETTINGS_FILE,
    env: NodeJS.ProcessEnv = process.env
): Promise<EngineSettings> {
    let content: string | null = null;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
            throw new SettingsError(`Cannot read settings file ${filePath}`, { cause: error });
        }
    }

    if (content === null) {
        return resolveSettings(undefined, env);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content) as unknown;
    } catch (error) {
        throw new SettingsError(`Settings file ${filePath} is not valid JSON`, { cause: error });
    }
    return resolveSettings(raw, env);
}
