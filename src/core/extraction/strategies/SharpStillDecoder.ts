// src/core/extraction/strategies/SharpStillDecoder.ts

import sharp from 'sharp';

import type { FrameDecoder, RasterImage, StageResult } from '../../../@types/index.js';
import { decodeSharpRaster } from './sharpRaster.js';

/**
 * Decodes a static image as a whole, preserving its alpha channel when it has one.
 */
export class SharpStillDecoder implements FrameDecoder {
    public readonly name = 'sharp-still';

    public canDecode(_inputPath: string): boolean {
        return true;
    }

    public async decodeFirstFrame(inputPath: string): Promise<StageResult<RasterImage>> {
        return decodeSharpRaster(sharp(inputPath), inputPath);
    }
}
