/**
 * File system utility functions
 */

import { mkdir, readFile, writeFile, stat, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Ensures a directory exists, creating it recursively if needed
 *
 * @param dirPath - The directory path to ensure exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
    await mkdir(dirPath, { recursive: true });
}

/**
 * Reads and parses a JSON file
 *
 * @returns The parsed JSON data, unvalidated
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
}

/**
 * Writes data to a JSON file with pretty formatting
 * Creates parent directories if they don't exist
 */
export async function writeJson<T>(filePath: string, data: T): Promise<void> {
    const dir = dirname(filePath);
    if (dir && dir !== '.' && dir !== '/') {
        await ensureDir(dir);
    }
    const content = JSON.stringify(data, null, 2);
    await writeFile(filePath, content, 'utf-8');
}

/**
 * Writes a file under a temporary name and renames it into place,
 * so readers never observe a half-written file
 */
export async function writeFileAtomic(filePath: string, data: Uint8Array): Promise<void> {
    const partialPath = `${filePath}.partial`;
    await ensureDir(dirname(filePath));
    try {
        await writeFile(partialPath, data);
        await rename(partialPath, filePath);
    } catch (error) {
        await rm(partialPath, { force: true });
        throw error;
    }
}

/**
 * Checks if anything exists at a path
 */
export async function pathExists(path: string): Promise<boolean> {
    try {
        await stat(path);
        return true;
    } catch {
        return false;
    }
}

/**
 * Checks if a file exists and has non-zero size
 *
 * @returns true if file exists with size > 0, false otherwise
 */
export async function fileExistsWithContent(filePath: string): Promise<boolean> {
    try {
        const stats = await stat(filePath);
        return stats.isFile() && stats.size > 0;
    } catch {
        return false;
    }
}
