// src/core/sizing/resize.ts

import sharp from 'sharp';

import type { RasterImage, StageResult } from '../../@types/index.js';
import { describeError, fail, StickerError, StickerErrorKind, succeed } from '../../errors/StickerError.js';
import { computeTargetSize } from './targetSize.js';

/**
 * Resizes a raster to its sticker size with a Lanczos-3 filter. The target box is filled exactly,
 * since `computeTargetSize` already preserved the aspect ratio.
 *
 * @param {RasterImage} image - The raster to resize; it is left untouched.
 * @return {Promise<StageResult<RasterImage>>} A new raster whose long edge is the target edge.
 */
export async function resizeToSticker(image: RasterImage): Promise<StageResult<RasterImage>> {
    const target = computeTargetSize(image.width, image.height);
    if (!target.success) {
        return target;
    }

    const { width, height } = target.value;
    try {
        const { data, info } = await sharp(image.data, {
            raw: { width: image.width, height: image.height, channels: image.channels },
        })
            .resize(width, height, { fit: 'fill', kernel: sharp.kernel.lanczos3 })
            .raw()
            .toBuffer({ resolveWithObject: true });

        return succeed({ width: info.width, height: info.height, channels: info.channels, data });
    } catch (error) {
        return fail(
            new StickerError({
                kind: StickerErrorKind.Unexpected,
                message: `Failed to resize ${image.width}x${image.height} image to ${width}x${height}: ${describeError(error)}`,
                cause: error,
            }),
        );
    }
}
