import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';

import type { RasterImage } from '../../src/@types/index.js';

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'sticker-press-'));
}

export async function removeDir(dirPath: string): Promise<void> {
    await fs.rm(dirPath, { recursive: true, force: true });
}

/**
 * Writes a single-colour image; the format follows the file extension.
 */
export async function writeSolidImage(
    filePath: string,
    width: number,
    height: number,
    channels: 3 | 4 = 3,
): Promise<void> {
    await sharp({
        create: { width, height, channels, background: { r: 200, g: 40, b: 90, alpha: 1 } },
    }).toFile(filePath);
}

/**
 * Writes raw interleaved pixels losslessly as PNG.
 */
export async function writeRawPng(filePath: string, image: RasterImage): Promise<void> {
    await sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: image.channels },
    })
        .png()
        .toFile(filePath);
}

export function solidRaster(width: number, height: number, channels: 3 | 4, value: number): RasterImage {
    return { width, height, channels, data: Buffer.alloc(width * height * channels, value) };
}

const GIF_HEADER = [0x47, 0x49, 0x46, 0x38, 0x39, 0x61]; // GIF89a
const ONE_BY_ONE = [0x01, 0x00, 0x01, 0x00];
const TRAILER = [0x3b];

// Global color table: index 0 = (10, 20, 30), index 1 = (200, 100, 50).
const GLOBAL_TABLE_FLAGS = [0x80, 0x00, 0x00];
const GLOBAL_TABLE = [0x0a, 0x14, 0x1e, 0xc8, 0x64, 0x32];

/**
 * Image block for a 1x1 frame whose single pixel has palette index `index` (0-3). The LZW stream
 * is clear code, the index, end code, at 3 bits each.
 */
function singlePixelFrame(index: number, localTable: number[] = []): number[] {
    const codes = 4 | (index << 3) | (5 << 6);
    const flags = localTable.length > 0 ? 0x80 : 0x00;
    return [
        0x2c, 0x00, 0x00, 0x00, 0x00, ...ONE_BY_ONE, flags, ...localTable,
        0x02, 0x02, codes & 0xff, codes >> 8, 0x00,
    ];
}

export function gifWithGlobalTable(index: number): Buffer {
    return Buffer.from([...GIF_HEADER, ...ONE_BY_ONE, ...GLOBAL_TABLE_FLAGS, ...GLOBAL_TABLE, ...singlePixelFrame(index), ...TRAILER]);
}

export function gifWithLocalTable(index: number): Buffer {
    const localTable = [0x01, 0x02, 0x03, 0x04, 0x05, 0x06];
    return Buffer.from([
        ...GIF_HEADER, ...ONE_BY_ONE, ...GLOBAL_TABLE_FLAGS, ...GLOBAL_TABLE, ...singlePixelFrame(index, localTable), ...TRAILER,
    ]);
}

export function gifWithoutColorTable(): Buffer {
    return Buffer.from([...GIF_HEADER, ...ONE_BY_ONE, 0x00, 0x00, 0x00, ...singlePixelFrame(1), ...TRAILER]);
}

export function gifWithTwoFrames(): Buffer {
    return Buffer.from([
        ...GIF_HEADER, ...ONE_BY_ONE, ...GLOBAL_TABLE_FLAGS, ...GLOBAL_TABLE,
        ...singlePixelFrame(0), ...singlePixelFrame(1), ...TRAILER,
    ]);
}
