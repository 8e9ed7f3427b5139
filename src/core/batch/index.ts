// src/core/batch/index.ts

import type { IBatchOptions, ProcessingResult } from '../../@types/index.js';
import { BatchStateMachine } from './stateMachine.js';

/**
 * Converts every matching file directly inside a directory. Never rejects: per-file failures stay
 * in their own results, and a batch that cannot start yields a single failed result.
 *
 * @param {IBatchOptions} options - Directories, processing options and pool size.
 * @return {Promise<ProcessingResult[]>} Results in lexicographic order of input path.
 */
export async function processDirectory(options: IBatchOptions): Promise<ProcessingResult[]> {
    const stateMachine = new BatchStateMachine(options);
    await stateMachine.run();
    return stateMachine.getResults();
}
