// src/core/batch/report.ts

import { promises as fs } from 'node:fs';

import type { BatchSummary, ILogger, ProcessingResult } from '../../@types/index.js';
import { describeError } from '../../errors/StickerError.js';

/**
 * Counts successes and failures of a batch.
 */
export function summarizeResults(results: ProcessingResult[]): BatchSummary {
    const failures = results.filter((result) => !result.success);
    return {
        total: results.length,
        succeeded: results.length - failures.length,
        failed: failures.length,
        failures,
    };
}

/**
 * Writes the batch results to a JSON file. A failed write is logged, not thrown.
 *
 * @param {string} reportPath - The JSON file to write.
 * @param {ProcessingResult[]} results - The results in batch order.
 * @param {ILogger} logger - Receives the outcome.
 * @return {Promise<boolean>} Whether the report was written.
 */
export async function writeReport(reportPath: string, results: ProcessingResult[], logger: ILogger): Promise<boolean> {
    try {
        await fs.writeFile(reportPath, JSON.stringify({ summary: summarizeResults(results), results }, null, 2));
        logger.info(`Report written to "${reportPath}".`);
        return true;
    } catch (error) {
        logger.error(`Failed to write report: ${describeError(error)}`);
        return false;
    }
}
