// src/core/sniffing/policies/GifFrameCountPolicy.ts

import sharp from 'sharp';

import type { AnimationSniffPolicy } from '../../../@types/index.js';

/**
 * Stricter GIF policy: animated only when the decoder reports more than one page.
 * Rejects when the file cannot be probed; the sniffer then treats it as static.
 */
export class GifFrameCountPolicy implements AnimationSniffPolicy {
    public async isAnimated(inputPath: string): Promise<boolean> {
        const { pages } = await sharp(inputPath).metadata();
        return (pages ?? 1) > 1;
    }
}
