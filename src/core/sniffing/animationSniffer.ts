// src/core/sniffing/animationSniffer.ts

import path from 'node:path';

import type { ILogger } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { describeError } from '../../errors/StickerError.js';
import { SniffPolicyMap } from './sniffPolicies.js';

/**
 * Classifies a file as animated or static. The lower-cased extension selects a policy through
 * `config.sniffing.extensionPolicies`; extensions without a policy are static.
 * Never rejects: a policy that fails to read the file yields `false`.
 *
 * @param {string} inputPath - The file to classify.
 * @param {ILogger} [logger] - Receives a debug line when a policy fails.
 * @return {Promise<boolean>} True when the file should go through first-frame extraction.
 */
export async function isAnimated(inputPath: string, logger?: ILogger): Promise<boolean> {
    const extension = path.extname(inputPath).toLowerCase();
    const policyName = config.sniffing.extensionPolicies[extension];
    if (policyName === undefined) {
        return false;
    }

    try {
        return await SniffPolicyMap[policyName].isAnimated(inputPath);
    } catch (error) {
        logger?.debug(`Sniffing "${inputPath}" with ${policyName} failed, treating it as static: ${describeError(error)}`);
        return false;
    }
}
