// src/core/batch/stateMachine.ts

import path from 'node:path';
import _ from 'lodash';
import pLimit from 'p-limit';

import type { IBatchOptions, ProcessingResult } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { StickerError } from '../../errors/StickerError.js';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.js';
import { BatchStates } from '../../stateMachine/definedStates.js';
import { buildOutputPath, ensureOutputDirectory, listMatchingFiles } from '../../utils/storage/storageUtils.js';
import { processImage } from '../pipeline/index.js';

export class BatchStateMachine extends AbstractStateMachine<BatchStates, IBatchOptions> {
    private files: string[] = [];
    private results: ProcessingResult[] = [];

    constructor(options: IBatchOptions) {
        super(BatchStates.INIT, options);
        this.stateTransitions = [
            { state: BatchStates.INIT, handler: this.init },
            { state: BatchStates.ENSURE_OUTPUT_DIR, handler: this.ensureOutputDir },
            { state: BatchStates.LIST_MATCHES, handler: this.listMatches },
            { state: BatchStates.PROCESS_FILES, handler: this.processFiles },
        ];
    }

    /**
     * One result per matched file in path order, or the single failure that stopped the batch.
     */
    public getResults(): ProcessingResult[] {
        return [...this.results];
    }

    protected getCompletionState(): BatchStates {
        return BatchStates.COMPLETED;
    }

    protected getErrorState(): BatchStates {
        return BatchStates.ERROR;
    }

    /**
     * Directory-level failures replace the whole result list with one record describing the batch.
     */
    protected handleError(error: StickerError): void {
        const { inputDir, outputDir } = this.options;
        this.results = [
            {
                inputPath: inputDir,
                outputPath: outputDir,
                success: false,
                error: error.message,
                errorKind: error.kind,
            },
        ];
    }

    private init(): void {
        const { logger, verbose, inputDir, options } = this.options;
        if (verbose) logger.info(`Initializing batch for "${inputDir}" with pattern "${options.pattern}"...`);
    }

    private async ensureOutputDir(): Promise<StickerError | void> {
        const result = await ensureOutputDirectory(this.options.outputDir);
        if (!result.success) return result.error;
    }

    private async listMatches(): Promise<StickerError | void> {
        const { inputDir, options, logger } = this.options;
        const result = await listMatchingFiles(inputDir, options.pattern);
        if (!result.success) return result.error;
        if (result.value.length === 0) {
            return StickerError.noMatch(`No files matching "${options.pattern}" found in "${inputDir}"`, {
                inputDir,
                pattern: options.pattern,
            });
        }
        this.files = result.value;
        logger.info(`Found ${this.files.length} file(s) to process.`);
    }

    /**
     * Runs every matched file through its own pipeline. A failing file only fails its own record.
     * Files that map to the same output (`a.jpg` and `a.png`) share one pool slot and run in sorted
     * order, so the last of them wins exactly as in a sequential run. Results keep the sorted order
     * of `files` whatever order the pool finishes them in.
     */
    private async processFiles(): Promise<void> {
        const { outputDir, options, progressBar } = this.options;
        const limit = pLimit(Math.max(1, this.options.concurrency ?? config.defaults.concurrency));
        const outputPaths = this.files.map((inputPath) => buildOutputPath(inputPath, outputDir, options.format));
        const groups = _.groupBy(_.range(this.files.length), (index) => outputPaths[index]);
        const results: ProcessingResult[] = [];

        progressBar?.start(this.files.length, 0, { file: '' });
        try {
            await Promise.all(
                Object.values(groups).map((indices) =>
                    limit(async () => {
                        for (const index of indices) {
                            results[index] = await this.processFile(this.files[index], outputPaths[index]);
                        }
                    }),
                ),
            );
        } finally {
            progressBar?.stop();
        }
        this.results = results;
    }

    private async processFile(inputPath: string, outputPath: string): Promise<ProcessingResult> {
        const { options, logger, verbose, progressBar } = this.options;
        const result = await processImage(inputPath, outputPath, options, logger, verbose);
        if (!result.success) {
            logger.warn(`Processing failed: ${path.basename(inputPath)} - ${result.error}`);
        }
        progressBar?.increment(1, { file: path.basename(inputPath) });
        return result;
    }
}
