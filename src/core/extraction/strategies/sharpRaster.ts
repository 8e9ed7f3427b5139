// src/core/extraction/strategies/sharpRaster.ts

import type { Sharp } from 'sharp';

import type { RasterImage, StageResult } from '../../../@types/index.js';
import { describeError, fail, StickerError, succeed } from '../../../errors/StickerError.js';

/**
 * Decodes a prepared sharp pipeline into 8-bit sRGB raw pixels, keeping any alpha channel.
 * Empty or inconsistent output is reported as a `DecodeError` instead of a zero-sized raster.
 *
 * @param {Sharp} image - A sharp instance opened on the input file.
 * @param {string} inputPath - Used in error messages only.
 */
export async function decodeSharpRaster(image: Sharp, inputPath: string): Promise<StageResult<RasterImage>> {
    try {
        const { data, info } = await image.toColourspace('srgb').raw().toBuffer({ resolveWithObject: true });
        return validateRaster({ width: info.width, height: info.height, channels: info.channels, data }, inputPath);
    } catch (error) {
        return fail(StickerError.decode(`Cannot decode "${inputPath}": ${describeError(error)}`, { inputPath }, error));
    }
}

/**
 * Rejects rasters with a non-positive edge or a pixel buffer that does not match the dimensions.
 */
export function validateRaster(image: RasterImage, inputPath: string): StageResult<RasterImage> {
    const { width, height, channels, data } = image;
    if (width <= 0 || height <= 0) {
        return fail(StickerError.decode(`Decoded "${inputPath}" to an empty ${width}x${height} image`, { inputPath }));
    }
    if (data.length !== width * height * channels) {
        return fail(
            StickerError.decode(
                `Decoded "${inputPath}" to ${data.length} bytes, expected ${width * height * channels}`,
                { inputPath, width, height, channels },
            ),
        );
    }
    return succeed(image);
}
