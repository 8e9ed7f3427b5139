// src/core/pipeline/stateMachine.ts

import path from 'node:path';

import type { IPipelineOptions, ProcessingResult, RasterImage } from '../../@types/index.js';
import { StickerError } from '../../errors/StickerError.js';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.js';
import { PipelineStates } from '../../stateMachine/definedStates.js';
import { ensureOutputDirectory } from '../../utils/storage/storageUtils.js';
import { ensureAlpha } from '../alpha/ensureAlpha.js';
import { saveImage } from '../encoding/encoder.js';
import { extractFrame } from '../extraction/frameExtractor.js';
import { resizeToSticker } from '../sizing/resize.js';
import { isAnimated } from '../sniffing/animationSniffer.js';

/**
 * Runs one file through sniffing, frame extraction, alpha synthesis, resizing and encoding.
 * The raster handed from one state to the next is owned by this machine alone.
 */
export class PipelineStateMachine extends AbstractStateMachine<PipelineStates, IPipelineOptions> {
    private animated = false;
    private frame: RasterImage | null = null;
    private failure: StickerError | null = null;

    constructor(options: IPipelineOptions) {
        super(PipelineStates.INIT, options);
        this.stateTransitions = [
            { state: PipelineStates.INIT, handler: this.init },
            { state: PipelineStates.SNIFF_FORMAT, handler: this.sniffFormat },
            { state: PipelineStates.EXTRACT_FRAME, handler: this.extractSourceFrame },
            { state: PipelineStates.ENSURE_ALPHA, handler: this.synthesizeAlpha },
            { state: PipelineStates.NORMALIZE_SIZE, handler: this.normalizeSize },
            { state: PipelineStates.ENCODE_OUTPUT, handler: this.encodeOutput },
        ];
    }

    /**
     * The outcome of the last `run()`: a success record, or a failure carrying the stage's error.
     */
    public getResult(): ProcessingResult {
        const { inputPath, outputPath } = this.options;
        if (this.failure) {
            return {
                inputPath,
                outputPath,
                success: false,
                error: this.failure.message,
                errorKind: this.failure.kind,
            };
        }
        return { inputPath, outputPath, success: true, error: '' };
    }

    protected getCompletionState(): PipelineStates {
        return PipelineStates.COMPLETED;
    }

    protected getErrorState(): PipelineStates {
        return PipelineStates.ERROR;
    }

    protected handleError(error: StickerError): void {
        this.failure = error;
    }

    private init(): void {
        const { logger, verbose, inputPath } = this.options;
        if (verbose) logger.info(`Processing "${path.basename(inputPath)}"...`);
    }

    private async sniffFormat(): Promise<void> {
        const { inputPath, logger } = this.options;
        this.animated = await isAnimated(inputPath, logger);
        if (this.animated) {
            logger.debug(`"${path.basename(inputPath)}" is animated, extracting the first frame`);
        }
    }

    private async extractSourceFrame(): Promise<StickerError | void> {
        const { inputPath, logger } = this.options;
        const result = await extractFrame(inputPath, this.animated, logger);
        if (!result.success) return result.error;
        this.frame = result.value;
    }

    private synthesizeAlpha(): StickerError | void {
        const result = ensureAlpha(this.requireFrame());
        if (!result.success) return result.error;
        this.frame = result.value;
    }

    private async normalizeSize(): Promise<StickerError | void> {
        const { logger } = this.options;
        const result = await resizeToSticker(this.requireFrame());
        if (!result.success) return result.error;
        this.frame = result.value;
        logger.debug(`Resized to ${result.value.width}x${result.value.height}`);
    }

    private async encodeOutput(): Promise<StickerError | void> {
        const { outputPath, options, logger } = this.options;
        const directory = await ensureOutputDirectory(path.dirname(outputPath));
        if (!directory.success) return directory.error;

        const saved = await saveImage(this.requireFrame(), outputPath, options, logger);
        if (!saved) {
            return StickerError.encode(`Failed to write "${outputPath}"`, { outputPath, format: options.format });
        }
        logger.debug(`Saved "${outputPath}"`);
    }

    private requireFrame(): RasterImage {
        if (!this.frame) {
            throw new Error(`No frame available in state "${this.state}"`);
        }
        return this.frame;
    }
}
