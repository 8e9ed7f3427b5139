// src/core/encoding/encoder.ts

import type { ILogger, ProcessingOptions, RasterImage } from '../../@types/index.js';
import { describeError } from '../../errors/StickerError.js';
import { writeBufferAtomically } from '../../utils/storage/storageUtils.js';
import { EncoderStrategyMap } from './encoderStrategies.js';

/**
 * Encodes a raster in the format selected by `options` and writes it to `outputPath`. The file is
 * either written completely or not at all.
 *
 * @param {RasterImage} image - The raster to encode.
 * @param {string} outputPath - Destination file; its parent directory must exist.
 * @param {ProcessingOptions} options - Output format and WEBP quality.
 * @param {ILogger} logger - Receives the reason of a failure.
 * @return {Promise<boolean>} False when encoding or writing failed.
 */
export async function saveImage(
    image: RasterImage,
    outputPath: string,
    options: ProcessingOptions,
    logger: ILogger,
): Promise<boolean> {
    const encoder = EncoderStrategyMap[options.format];
    try {
        const encoded = await encoder.encode(image, options);
        await writeBufferAtomically(outputPath, encoded);
        logger.debug(`Wrote ${encoded.length} bytes to "${outputPath}"`);
        return true;
    } catch (error) {
        logger.error(`Error occurred when saving image "${outputPath}": ${describeError(error)}`);
        return false;
    }
}
