// src/core/pipeline/index.ts

import type { ILogger, ProcessingOptions, ProcessingResult } from '../../@types/index.js';
import { PipelineStateMachine } from './stateMachine.js';

/**
 * Converts one image file into a sticker at `outputPath`. Never rejects; failures are reported in
 * the returned result.
 *
 * @param {string} inputPath - The source image.
 * @param {string} outputPath - The sticker file to write.
 * @param {ProcessingOptions} options - Output format and quality.
 * @param {ILogger} logger - Receives progress and failure messages.
 * @param {boolean} [verbose=false] - Logs state transitions.
 */
export async function processImage(
    inputPath: string,
    outputPath: string,
    options: ProcessingOptions,
    logger: ILogger,
    verbose: boolean = false,
): Promise<ProcessingResult> {
    const stateMachine = new PipelineStateMachine({ inputPath, outputPath, options, logger, verbose });
    await stateMachine.run();
    return stateMachine.getResult();
}
