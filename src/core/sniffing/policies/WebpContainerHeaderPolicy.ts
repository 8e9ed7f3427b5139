// src/core/sniffing/policies/WebpContainerHeaderPolicy.ts

import { promises as fs } from 'node:fs';

import type { AnimationSniffPolicy } from '../../../@types/index.js';
import { config } from '../../../config/index.js';

const RIFF_TAG = Buffer.from('RIFF', 'ascii');
const WEBP_TAG = Buffer.from('WEBP', 'ascii');
const WEBP_TAG_OFFSET = 8;

/**
 * Header sniff for WEBP: the file counts as animated when its header is a RIFF container of form
 * type `WEBP`. This confirms the container family only; it does not look for ANIM/ANMF chunks.
 * The form type sits at offset 8; offset 12 already holds the first chunk's FourCC (`VP8 `,
 * `VP8L` or `VP8X`), so the tag is never looked for there.
 */
export class WebpContainerHeaderPolicy implements AnimationSniffPolicy {
    /**
     * @param {string} inputPath - The file to sniff.
     * @return {Promise<boolean>} False for short files; rejects when the file cannot be opened or read.
     */
    public async isAnimated(inputPath: string): Promise<boolean> {
        const header = await readHeader(inputPath, config.sniffing.headerLength);
        if (header.length < config.sniffing.headerLength) {
            return false;
        }
        return isWebpContainer(header);
    }
}

/**
 * Checks a file header for the RIFF magic followed by the `WEBP` form type.
 */
export function isWebpContainer(header: Uint8Array): boolean {
    const bytes = Buffer.from(header.buffer, header.byteOffset, header.byteLength);
    return (
        bytes.subarray(0, RIFF_TAG.length).equals(RIFF_TAG) &&
        bytes.subarray(WEBP_TAG_OFFSET, WEBP_TAG_OFFSET + WEBP_TAG.length).equals(WEBP_TAG)
    );
}

async function readHeader(inputPath: string, length: number): Promise<Buffer> {
    const handle = await fs.open(inputPath, 'r');
    try {
        const header = Buffer.alloc(length);
        const { bytesRead } = await handle.read(header, 0, length, 0);
        return header.subarray(0, bytesRead);
    } finally {
        await handle.close();
    }
}
