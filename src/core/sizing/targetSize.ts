// src/core/sizing/targetSize.ts

import type { StageResult, StickerSize } from '../../@types/index.js';
import { config } from '../../config/index.js';
import { fail, StickerError, succeed } from '../../errors/StickerError.js';

/**
 * Computes the sticker size for a source of `width` x `height`.
 *
 * The long edge always becomes the target edge (512), so small sources are upscaled as well; the
 * short edge keeps the aspect ratio and is truncated, never rounded. Square sources take the
 * landscape branch. A short edge that truncates to zero is raised to one pixel.
 *
 * @example
 * computeTargetSize(1024, 512); // { width: 512, height: 256 }
 * computeTargetSize(300, 600);  // { width: 256, height: 512 }
 */
export function computeTargetSize(width: number, height: number): StageResult<StickerSize> {
    if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
        return fail(StickerError.decode(`Cannot size a ${width}x${height} image`, { width, height }));
    }

    const edge = config.sticker.targetEdge;
    // Integer form of floor(edge / (width / height)), free of floating point drift.
    if (width >= height) {
        return succeed({ width: edge, height: Math.max(1, Math.floor((edge * height) / width)) });
    }
    return succeed({ width: Math.max(1, Math.floor((edge * width) / height)), height: edge });
}

function isPositiveInteger(value: number): boolean {
    return Number.isInteger(value) && value > 0;
}
