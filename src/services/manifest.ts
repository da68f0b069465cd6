/**
 * Session manifest: records the chapter PDFs written by one download run so
 * the merger can bundle only the new chapters
 */

import { readFile, rm, writeFile } from 'node:fs/promises';
import { basename, join, relative, resolve } from 'node:path';

import { PATHS } from '../config/constants';
import { readJson, writeJson } from '../utils/fs';
import type { DownloadMode } from '../types';

export interface ManifestChapter {
    timestamp: string;
    label: string;
    files: string[];
}

export interface ManifestData {
    sessionStart: string;
    mangaTitle: string;
    outputDir: string;
    startUrl: string;
    mode: DownloadMode['kind'];
    requestedCount?: number;
    chapters: ManifestChapter[];
}

export interface SessionInfo {
    mangaTitle: string;
    startUrl: string;
    mode: DownloadMode;
}

function sessionStamp(date: Date): string {
    const pad = (n: number): string => String(n).padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export class SessionManifest {
    private constructor(
        private readonly outputDir: string,
        readonly path: string,
        private readonly data: ManifestData
    ) {}

    /**
     * Writes an empty manifest under `_manifests/` and points
     * `latest_manifest.txt` at it
     */
    static async create(outputDir: string, info: SessionInfo, now: Date = new Date()): Promise<SessionManifest> {
        const path = join(outputDir, PATHS.MANIFESTS_DIR, `session-${sessionStamp(now)}.json`);
        const data: ManifestData = {
            sessionStart: now.toISOString(),
            mangaTitle: info.mangaTitle,
            outputDir,
            startUrl: info.startUrl,
            mode: info.mode.kind,
            requestedCount: info.mode.kind === 'manual' ? info.mode.count : undefined,
            chapters: [],
        };

        await writeJson(path, data);
        await writeFile(
            join(outputDir, PATHS.MANIFEST_POINTER),
            join(PATHS.MANIFESTS_DIR, basename(path)),
            'utf-8'
        );
        return new SessionManifest(outputDir, path, data);
    }

    /**
     * Adds a chapter's PDFs; paths are stored relative to the output directory
     */
    async record(label: string, files: readonly string[], now: Date = new Date()): Promise<void> {
        const stored = files.map((file) => relative(this.outputDir, file));
        this.data.chapters.push({ timestamp: now.toISOString(), label, files: stored });
        await writeJson(this.path, this.data);
    }

    /**
     * Removes the manifest directory and the pointer file
     */
    async remove(): Promise<void> {
        await rm(join(this.outputDir, PATHS.MANIFEST_POINTER), { force: true });
        await rm(join(this.outputDir, PATHS.MANIFESTS_DIR), { recursive: true, force: true });
    }
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Reads the chapter files recorded by the latest session in `dir`,
 * resolved against `dir`
 *
 * @returns null when there is no readable manifest
 */
export async function readLatestManifestFiles(dir: string): Promise<string[] | null> {
    let pointer: string;
    try {
        pointer = (await readFile(join(dir, PATHS.MANIFEST_POINTER), 'utf-8')).trim();
    } catch {
        return null;
    }
    if (!pointer) return null;

    let data: unknown;
    try {
        data = await readJson(resolve(dir, pointer));
    } catch {
        return null;
    }
    if (typeof data !== 'object' || data === null || !('chapters' in data) || !Array.isArray(data.chapters)) {
        return null;
    }

    const chapters: unknown[] = data.chapters;
    const files: string[] = [];
    for (const chapter of chapters) {
        if (typeof chapter === 'object' && chapter !== null && 'files' in chapter && isStringArray(chapter.files)) {
            files.push(...chapter.files.map((file) => resolve(dir, file)));
        }
    }
    return files;
}
