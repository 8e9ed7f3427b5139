// src/core/encoding/strategies/PngEncoder.ts

import sharp from 'sharp';

import type { ImageEncoder, RasterImage } from '../../../@types/index.js';
import { config } from '../../../config/index.js';

/**
 * Lossless PNG at maximum compression. The quality option does not apply.
 */
export class PngEncoder implements ImageEncoder {
    public async encode(image: RasterImage): Promise<Buffer> {
        return sharp(image.data, {
            raw: { width: image.width, height: image.height, channels: image.channels },
        })
            .png({
                compressionLevel: config.imageCompression.pngCompressionLevel,
                palette: false,
            })
            .toBuffer();
    }
}
