// src/cli/arguments.ts

import path from 'node:path';
import { InvalidArgumentError } from 'commander';

import { OutputFormat, type ProcessingOptions } from '../@types/index.js';
import { config } from '../config/index.js';
import { getFormatExtension } from '../utils/storage/storageUtils.js';

export interface CliOptions {
    output: string;
    webp?: boolean;
    quality: number;
    pattern: string;
    concurrency: number;
    strictGif?: boolean;
    report?: string;
    log?: boolean;
    verbose?: boolean;
}

/**
 * Parses `-q`: any integer is accepted and clamped into the WEBP quality range.
 */
export function parseQuality(value: string): number {
    const quality = Number.parseInt(value, 10);
    if (Number.isNaN(quality)) {
        throw new InvalidArgumentError('Quality must be an integer between 1 and 100.');
    }
    const { min, max } = config.imageCompression.webpQuality;
    return Math.min(max, Math.max(min, quality));
}

/**
 * Parses `-p`: only `*` and `*.ext` are understood.
 */
export function parsePattern(value: string): string {
    if (value === '*' || /^\*\.[^*/\\]+$/.test(value)) {
        return value;
    }
    throw new InvalidArgumentError('Pattern must be "*" or "*.ext", e.g. "*.jpg".');
}

export function parseConcurrency(value: string): number {
    const concurrency = Number.parseInt(value, 10);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new InvalidArgumentError('Concurrency must be a positive integer.');
    }
    return concurrency;
}

/**
 * In single-file mode an output path without an extension gets the format's extension;
 * in batch mode the output path is a directory and is used as is.
 *
 * @example
 * resolveOutputPath('output', OutputFormat.WEBP, false); // 'output.webp'
 * resolveOutputPath('stickers', OutputFormat.WEBP, true); // 'stickers'
 */
export function resolveOutputPath(outputPath: string, format: OutputFormat, isBatchMode: boolean): string {
    if (isBatchMode || path.extname(outputPath) !== '') {
        return outputPath;
    }
    return `${outputPath}${getFormatExtension(format)}`;
}

export function buildProcessingOptions(cliOptions: CliOptions): ProcessingOptions {
    return {
        format: cliOptions.webp ? OutputFormat.WEBP : OutputFormat.PNG,
        quality: cliOptions.quality,
        pattern: cliOptions.pattern,
    };
}
