// src/core/sniffing/policies/AlwaysAnimatedPolicy.ts

import type { AnimationSniffPolicy } from '../../../@types/index.js';

/**
 * High-recall policy: every file of the extension counts as animated, whatever its frame count.
 * Used for GIF, where a frame count needs a full parse. The extractor's first-frame path handles
 * single-frame files just as well.
 */
export class AlwaysAnimatedPolicy implements AnimationSniffPolicy {
    public async isAnimated(_inputPath: string): Promise<boolean> {
        return true;
    }
}
