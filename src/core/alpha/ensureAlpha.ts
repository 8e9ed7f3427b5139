// src/core/alpha/ensureAlpha.ts

import type { RasterImage, StageResult } from '../../@types/index.js';
import { fail, StickerError, succeed } from '../../errors/StickerError.js';

const OPAQUE = 255;

/**
 * Guarantees a 4-channel raster. An RGB raster is split into its planes and merged with a constant
 * opaque alpha plane into a new raster; an RGBA raster is returned as is. Any other layout is an
 * `UnsupportedFormatError`.
 */
export function ensureAlpha(image: RasterImage): StageResult<RasterImage> {
    if (image.channels === 4) {
        return succeed(image);
    }
    if (image.channels !== 3) {
        return fail(
            StickerError.unsupportedFormat(`Cannot add alpha to an image with ${image.channels} channel(s)`, {
                channels: image.channels,
            }),
        );
    }

    const pixelCount = image.width * image.height;
    const data = Buffer.alloc(pixelCount * 4);
    for (let pixel = 0; pixel < pixelCount; pixel++) {
        const source = pixel * 3;
        const target = pixel * 4;
        data[target] = image.data[source];
        data[target + 1] = image.data[source + 1];
        data[target + 2] = image.data[source + 2];
        data[target + 3] = OPAQUE;
    }

    return succeed({ width: image.width, height: image.height, channels: 4, data });
}
