// src/utils/storage/storageUtils.ts

import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import _ from 'lodash';

import { OutputFormat } from '../../@types/index.js';
import { describeError, fail, StickerError, succeed } from '../../errors/StickerError.js';
import type { StageResult } from '../../@types/index.js';

const FORMAT_EXTENSIONS: Record<OutputFormat, string> = {
    [OutputFormat.PNG]: '.png',
    [OutputFormat.WEBP]: '.webp',
};

/**
 * Returns the file extension (with the dot) an output format is written with.
 */
export function getFormatExtension(format: OutputFormat): string {
    return FORMAT_EXTENSIONS[format];
}

/**
 * Ensures that the specified output directory exists, creating any missing parents.
 *
 * @param {string} outputFolder - The directory to create.
 * @return {Promise<StageResult<void>>} An `IOError` failure if the directory cannot be created.
 */
export async function ensureOutputDirectory(outputFolder: string): Promise<StageResult<void>> {
    try {
        await fs.mkdir(outputFolder, { recursive: true });
        return succeed(undefined);
    } catch (error) {
        return fail(
            StickerError.io(`Failed to create output directory "${outputFolder}": ${describeError(error)}`, {
                outputFolder,
            }, error),
        );
    }
}

/**
 * Tells whether a file name is selected by a pattern. `*` selects everything, `*.ext` selects
 * files whose extension equals `.ext` ignoring case; any other pattern selects nothing.
 */
export function matchesPattern(fileName: string, pattern: string): boolean {
    if (pattern === '*') {
        return true;
    }
    if (pattern.length > 2 && pattern.startsWith('*.')) {
        return path.extname(fileName).toLowerCase() === pattern.slice(1).toLowerCase();
    }
    return false;
}

/**
 * Lists the regular files directly inside `directory` that match `pattern`, sorted by path.
 * Subdirectories are not descended into.
 *
 * @param {string} directory - The directory to scan.
 * @param {string} pattern - `*` or `*.ext`.
 * @return {Promise<StageResult<string[]>>} The matching paths, or an `IOError` if the directory cannot be read.
 */
export async function listMatchingFiles(directory: string, pattern: string): Promise<StageResult<string[]>> {
    try {
        const entries = await fs.readdir(directory, { withFileTypes: true });
        const matches = entries
            .filter((entry) => entry.isFile() && matchesPattern(entry.name, pattern))
            .map((entry) => path.join(directory, entry.name));
        return succeed(_.sortBy(matches));
    } catch (error) {
        return fail(
            StickerError.io(`Failed to read input directory "${directory}": ${describeError(error)}`, {
                directory,
            }, error),
        );
    }
}

/**
 * Builds the output path for an input file: same base name, format extension, inside `outputDir`.
 *
 * @example
 * buildOutputPath('/in/cat.JPG', '/out', OutputFormat.WEBP); // '/out/cat.webp'
 */
export function buildOutputPath(inputPath: string, outputDir: string, format: OutputFormat): string {
    const { name } = path.parse(inputPath);
    return path.join(outputDir, `${name}${getFormatExtension(format)}`);
}

/**
 * Writes a buffer so that `filePath` either holds all of it or is left untouched: the bytes go to a
 * sibling temporary file first, which is then renamed over the target. Every call gets its own
 * temporary name, so concurrent writes to one target never touch each other's file.
 *
 * @param {string} filePath - Destination path.
 * @param {Uint8Array} data - Bytes to write.
 * @return {Promise<void>} Rejects with the write or rename error after removing the temporary file.
 */
export async function writeBufferAtomically(filePath: string, data: Uint8Array): Promise<void> {
    const temporaryPath = `${filePath}.${process.pid}.${randomUUID()}.partial`;
    try {
        await fs.writeFile(temporaryPath, data);
        await fs.rename(temporaryPath, filePath);
    } catch (error) {
        await fs.rm(temporaryPath, { force: true });
        throw error;
    }
}

/**
 * Checks whether a path exists and is a directory.
 *
 * @param {string} filePath - The path to inspect.
 * @return {Promise<StageResult<boolean>>} False when the path is missing or not a directory; an
 * `IOError` failure when it cannot be inspected (for instance a path below a regular file).
 */
export async function isDirectory(filePath: string): Promise<StageResult<boolean>> {
    try {
        const stats = await fs.stat(filePath);
        return succeed(stats.isDirectory());
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return succeed(false);
        }
        return fail(StickerError.io(`Cannot inspect "${filePath}": ${describeError(error)}`, { filePath }, error));
    }
}
