// src/core/extraction/strategies/SharpFirstFrameDecoder.ts

import sharp from 'sharp';

import type { FrameDecoder, RasterImage, StageResult } from '../../../@types/index.js';
import { describeError, fail, StickerError } from '../../../errors/StickerError.js';
import { decodeSharpRaster } from './sharpRaster.js';

/**
 * Opens a multi-frame image and decodes only its first page.
 */
export class SharpFirstFrameDecoder implements FrameDecoder {
    public readonly name = 'sharp-first-frame';

    public canDecode(_inputPath: string): boolean {
        return true;
    }

    public async decodeFirstFrame(inputPath: string): Promise<StageResult<RasterImage>> {
        const image = sharp(inputPath, { pages: 1, page: 0 });

        let pages: number | undefined;
        try {
            ({ pages } = await image.metadata());
        } catch (error) {
            return fail(StickerError.decode(`Cannot open "${inputPath}": ${describeError(error)}`, { inputPath }, error));
        }
        if (pages !== undefined && pages < 1) {
            return fail(StickerError.decode(`"${inputPath}" contains no frames`, { inputPath }));
        }

        return decodeSharpRaster(image, inputPath);
    }
}
