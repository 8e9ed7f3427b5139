// src/core/extraction/strategies/GifuctFirstFrameDecoder.ts

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { decompressFrames, parseGIF } from 'gifuct-js';

import type { FrameDecoder, RasterImage, StageResult } from '../../../@types/index.js';
import { describeError, fail, StickerError } from '../../../errors/StickerError.js';
import { validateRaster } from './sharpRaster.js';

const RGBA_CHANNELS = 4;
const OPAQUE = 255;

/**
 * Low-level GIF reader used when the general decoder cannot read a GIF. Parses the whole file into
 * its frame table, takes frame 0 and resolves every palette index through the frame's local color
 * table, or the global one when the frame has none. Indices outside the table fall back to entry 0,
 * and every pixel is written fully opaque.
 */
export class GifuctFirstFrameDecoder implements FrameDecoder {
    public readonly name = 'gifuct-first-frame';

    public canDecode(inputPath: string): boolean {
        return path.extname(inputPath).toLowerCase() === '.gif';
    }

    public async decodeFirstFrame(inputPath: string): Promise<StageResult<RasterImage>> {
        let frames: ReturnType<typeof decompressFrames>;
        try {
            const bytes = await fs.readFile(inputPath);
            frames = decompressFrames(parseGIF(toArrayBuffer(bytes)), false);
        } catch (error) {
            return fail(StickerError.decode(`Cannot parse GIF "${inputPath}": ${describeError(error)}`, { inputPath }, error));
        }

        const frame = frames[0];
        if (frames.length === 0 || !frame) {
            return fail(StickerError.decode(`GIF "${inputPath}" has no image frames`, { inputPath }));
        }

        const { colorTable, pixels } = frame;
        if (!colorTable || colorTable.length === 0) {
            return fail(StickerError.decode(`GIF "${inputPath}" has no color table`, { inputPath }));
        }

        const { width, height } = frame.dims;
        const data = Buffer.alloc(width * height * RGBA_CHANNELS);
        for (let i = 0; i < width * height; i++) {
            let index = pixels[i] ?? 0;
            if (index >= colorTable.length) {
                index = 0;
            }
            const [red, green, blue] = colorTable[index];
            const offset = i * RGBA_CHANNELS;
            data[offset] = red;
            data[offset + 1] = green;
            data[offset + 2] = blue;
            data[offset + 3] = OPAQUE;
        }

        return validateRaster({ width, height, channels: RGBA_CHANNELS, data }, inputPath);
    }
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
    const arrayBuffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(arrayBuffer).set(bytes);
    return arrayBuffer;
}
