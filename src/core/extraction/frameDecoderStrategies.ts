// src/core/extraction/frameDecoderStrategies.ts

import type { FrameDecoder } from '../../@types/index.js';
import { GifuctFirstFrameDecoder } from './strategies/GifuctFirstFrameDecoder.js';
import { SharpFirstFrameDecoder } from './strategies/SharpFirstFrameDecoder.js';
import { SharpStillDecoder } from './strategies/SharpStillDecoder.js';

export enum SupportedFrameDecoders {
    SharpStill = 'sharp-still',
    SharpFirstFrame = 'sharp-first-frame',
    GifuctFirstFrame = 'gifuct-first-frame',
}

/**
 * Mapping of decoder identifiers to their implementations.
 */
export const FrameDecoderStrategyMap: Record<SupportedFrameDecoders, FrameDecoder> = {
    [SupportedFrameDecoders.SharpStill]: new SharpStillDecoder(),
    [SupportedFrameDecoders.SharpFirstFrame]: new SharpFirstFrameDecoder(),
    [SupportedFrameDecoders.GifuctFirstFrame]: new GifuctFirstFrameDecoder(),
};

/**
 * Decoders tried for static and for animated sources, in order of preference.
 */
export const DecoderChains: Record<'static' | 'animated', SupportedFrameDecoders[]> = {
    static: [SupportedFrameDecoders.SharpStill],
    animated: [SupportedFrameDecoders.SharpFirstFrame, SupportedFrameDecoders.GifuctFirstFrame],
};

/**
 * Resolves the decoder chain for a source.
 */
export function getDecoderChain(animated: boolean): FrameDecoder[] {
    return DecoderChains[animated ? 'animated' : 'static'].map((name) => FrameDecoderStrategyMap[name]);
}
