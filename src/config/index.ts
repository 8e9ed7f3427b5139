// src/config/index.ts

import { OutputFormat } from '../@types/processing.js';
import { SupportedSniffPolicies } from '../@types/sniffing.js';

// Extensions are matched lower-cased; anything missing here is static.
const extensionPolicies: Record<string, SupportedSniffPolicies> = {
    '.gif': SupportedSniffPolicies.AlwaysAnimated,
    '.webp': SupportedSniffPolicies.WebpContainerHeader,
};

export const config = {
    sticker: {
        targetEdge: 512, // long edge of every sticker
    },
    imageCompression: {
        pngCompressionLevel: 9,
        webpQuality: {
            min: 1,
            max: 100,
            default: 100,
        },
    },
    sniffing: {
        headerLength: 16, // bytes read for container sniffing
        extensionPolicies,
    },
    defaults: {
        format: OutputFormat.PNG,
        pattern: '*',
        outputPath: 'output',
        concurrency: 1,
    },
};
