// src/core/extraction/frameExtractor.ts

import type { FrameDecoder, ILogger, RasterImage, StageResult } from '../../@types/index.js';
import { fail, StickerError, StickerErrorKind } from '../../errors/StickerError.js';
import { getDecoderChain } from './frameDecoderStrategies.js';

/**
 * Obtains a single decoded frame from a file by walking an ordered chain of decoders. Decoders that
 * cannot handle the file are skipped, the first success wins, and when every decoder fails the
 * last failure is returned.
 *
 * @param {string} inputPath - The image file.
 * @param {boolean} animated - Selects the first-frame chain instead of the whole-image decoder.
 * @param {ILogger} logger - Receives a debug line per attempt.
 * @param {FrameDecoder[]} [decoders] - Overrides the chain chosen from `animated`.
 * @return {Promise<StageResult<RasterImage>>} The frame, or a `DecodeError`.
 */
export async function extractFrame(
    inputPath: string,
    animated: boolean,
    logger: ILogger,
    decoders: FrameDecoder[] = getDecoderChain(animated),
): Promise<StageResult<RasterImage>> {
    let lastFailure = StickerError.decode(`No decoder accepts "${inputPath}"`, { inputPath });

    for (const decoder of decoders) {
        if (!decoder.canDecode(inputPath)) {
            continue;
        }

        let result: StageResult<RasterImage>;
        try {
            result = await decoder.decodeFirstFrame(inputPath);
        } catch (error) {
            result = fail(StickerError.fromUnknown(error, StickerErrorKind.Decode));
        }

        if (result.success) {
            const { width, height, channels } = result.value;
            logger.debug(`${decoder.name} decoded "${inputPath}" (${width}x${height}, ${channels} channels)`);
            return result;
        }

        logger.debug(`${decoder.name} could not decode "${inputPath}": ${result.error.message}`);
        lastFailure = result.error;
    }

    return fail(lastFailure);
}
