// src/core/encoding/strategies/WebpEncoder.ts

import sharp from 'sharp';

import type { ImageEncoder, ProcessingOptions, RasterImage } from '../../../@types/index.js';

/**
 * WEBP with the quality taken verbatim from the options; clamping happens where options are built.
 */
export class WebpEncoder implements ImageEncoder {
    public async encode(image: RasterImage, options: ProcessingOptions): Promise<Buffer> {
        return sharp(image.data, {
            raw: { width: image.width, height: image.height, channels: image.channels },
        })
            .webp({ quality: options.quality })
            .toBuffer();
    }
}
