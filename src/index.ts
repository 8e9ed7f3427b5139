// src/index.ts

export * from './@types/index.js';
export { config } from './config/index.js';
export { StickerError, StickerErrorKind } from './errors/StickerError.js';
export { isAnimated } from './core/sniffing/animationSniffer.js';
export { computeTargetSize } from './core/sizing/targetSize.js';
export { resizeToSticker } from './core/sizing/resize.js';
export { extractFrame } from './core/extraction/frameExtractor.js';
export { ensureAlpha } from './core/alpha/ensureAlpha.js';
export { saveImage } from './core/encoding/encoder.js';
export { processImage } from './core/pipeline/index.js';
export { processDirectory } from './core/batch/index.js';
export { summarizeResults, writeReport } from './core/batch/report.js';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils.js';
