// src/cli/program.ts

import path from 'node:path';
import cliProgress from 'cli-progress';
import { Command } from 'commander';

import type { ILogger, IProgressBar, ProcessingOptions } from '../@types/index.js';
import { SupportedSniffPolicies } from '../@types/index.js';
import { config } from '../config/index.js';
import { processDirectory } from '../core/batch/index.js';
import { summarizeResults, writeReport } from '../core/batch/report.js';
import { processImage } from '../core/pipeline/index.js';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.js';
import { isDirectory } from '../utils/storage/storageUtils.js';
import {
    buildProcessingOptions,
    type CliOptions,
    parseConcurrency,
    parsePattern,
    parseQuality,
    resolveOutputPath,
} from './arguments.js';

export function createProgram(): Command {
    const program = new Command();
    program
        .name('sticker-press')
        .description('Turn images into 512px stickers with an alpha channel')
        .version('1.0.0')
        .argument('<input>', 'Image file or directory of images')
        .option('-o, --output <path>', 'Output file or directory', config.defaults.outputPath)
        .option('--webp', 'Write WEBP instead of PNG')
        .option('-q, --quality <number>', 'WEBP quality (1-100)', parseQuality, config.imageCompression.webpQuality.default)
        .option('-p, --pattern <glob>', 'File pattern in directory mode, e.g. "*.jpg"', parsePattern, config.defaults.pattern)
        .option('-c, --concurrency <number>', 'Files converted at once in directory mode', parseConcurrency, config.defaults.concurrency)
        .option('--strict-gif', 'Treat single-frame GIFs as static images')
        .option('--report <file>', 'Write the directory results to a JSON file')
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging')
        .showHelpAfterError()
        .addHelpText(
            'after',
            [
                '',
                'Examples:',
                '  $ sticker-press input.jpg',
                '  $ sticker-press input.gif -o sticker.webp --webp -q 90',
                '  $ sticker-press ./images -o ./stickers --webp -p "*.jpg"',
            ].join('\n'),
        )
        .action(async (input: string, options: CliOptions) => {
            const verbose = options.verbose || false;
            const logger = getLogger('sticker-press', options.log || verbose ? console : NoopLogFacility, verbose);
            const summary = getLogger('summary');

            if (options.strictGif) {
                config.sniffing.extensionPolicies['.gif'] = SupportedSniffPolicies.GifFrameCount;
            }

            const inputPath = path.resolve(input);
            const inputKind = await isDirectory(inputPath);
            if (!inputKind.success) {
                summary.error(`Processing failed: ${inputPath} - ${inputKind.error.message}`);
                process.exit(1);
            }
            const isBatchMode = inputKind.value;
            const processingOptions = buildProcessingOptions(options);
            const outputPath = path.resolve(resolveOutputPath(options.output, processingOptions.format, isBatchMode));

            if (isBatchMode) {
                await runBatch(inputPath, outputPath, processingOptions, options, logger, summary);
                process.exit(0);
            }

            const result = await processImage(inputPath, outputPath, processingOptions, logger, verbose);
            if (!result.success) {
                summary.error(`Processing failed: ${result.inputPath} - ${result.error}`);
                process.exit(1);
            }
            summary.success(`Processing completed! Output file: ${result.outputPath}`);
        });
    return program;
}

async function runBatch(
    inputDir: string,
    outputDir: string,
    processingOptions: ProcessingOptions,
    options: CliOptions,
    logger: ILogger,
    summary: ILogger,
): Promise<void> {
    let progressBar: IProgressBar | undefined;
    if (!options.log && !options.verbose) {
        progressBar = new cliProgress.SingleBar({
            format: 'Processing |{bar}| {percentage}% || {value}/{total} files {file}',
            barCompleteChar: '█',
            barIncompleteChar: '░',
            hideCursor: true,
        }, cliProgress.Presets.shades_grey);
    }

    const results = await processDirectory({
        inputDir,
        outputDir,
        options: processingOptions,
        logger,
        verbose: options.verbose || false,
        concurrency: options.concurrency,
        progressBar,
    });

    const { total, succeeded, failed, failures } = summarizeResults(results);
    for (const failure of failures) {
        summary.error(`Processing failed: ${failure.inputPath} - ${failure.error}`);
    }
    summary.info(`Processing completed! Total: ${total} files, success: ${succeeded}, failed: ${failed}`);
    summary.info(`Output directory: ${outputDir}`);

    if (options.report) {
        await writeReport(path.resolve(options.report), results, summary);
    }
}
