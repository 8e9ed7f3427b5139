// src/core/encoding/encoderStrategies.ts

import { type ImageEncoder, OutputFormat } from '../../@types/index.js';
import { PngEncoder } from './strategies/PngEncoder.js';
import { WebpEncoder } from './strategies/WebpEncoder.js';

/**
 * Mapping of output formats to their encoders.
 */
export const EncoderStrategyMap: Record<OutputFormat, ImageEncoder> = {
    [OutputFormat.PNG]: new PngEncoder(),
    [OutputFormat.WEBP]: new WebpEncoder(),
};
