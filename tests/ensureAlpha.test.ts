import { describe, expect, it } from 'vitest';

import { ensureAlpha } from '../src/core/alpha/ensureAlpha.js';
import { StickerErrorKind } from '../src/errors/StickerError.js';
import type { RasterImage } from '../src/@types/index.js';

function rgbGradient(width: number, height: number): RasterImage {
    const data = Buffer.alloc(width * height * 3);
    for (let i = 0; i < data.length; i++) {
        data[i] = i % 251;
    }
    return { width, height, channels: 3, data };
}

describe('ensureAlpha', () => {
    it('should add an opaque alpha plane to a 3-channel image', () => {
        const source = rgbGradient(100, 50);
        const result = ensureAlpha(source);
        if (!result.success) throw result.error;
        const { width, height, channels, data } = result.value;

        expect({ width, height, channels }).toEqual({ width: 100, height: 50, channels: 4 });
        expect(data.length).toBe(100 * 50 * 4);
        for (let pixel = 0; pixel < 100 * 50; pixel++) {
            expect(data[pixel * 4 + 3]).toBe(255);
        }
    });

    it('should keep the colour samples of every pixel', () => {
        const source = rgbGradient(3, 2);
        const result = ensureAlpha(source);
        if (!result.success) throw result.error;

        expect([...result.value.data.subarray(0, 8)]).toEqual([0, 1, 2, 255, 3, 4, 5, 255]);
        expect([...result.value.data.subarray(20, 24)]).toEqual([15, 16, 17, 255]);
    });

    it('should not modify the input raster', () => {
        const source = rgbGradient(4, 4);
        const before = Buffer.from(source.data);
        ensureAlpha(source);
        expect(source.channels).toBe(3);
        expect(source.data.equals(before)).toBe(true);
    });

    it('should pass a 4-channel image through unchanged', () => {
        const source: RasterImage = { width: 2, height: 1, channels: 4, data: Buffer.from([1, 2, 3, 4, 5, 6, 7, 8]) };
        const result = ensureAlpha(source);
        expect(result).toEqual({ success: true, value: source });
        if (result.success) {
            expect(result.value).toBe(source);
        }
    });

    it('should be idempotent', () => {
        const once = ensureAlpha(rgbGradient(10, 5));
        if (!once.success) throw once.error;
        const twice = ensureAlpha(once.value);
        if (!twice.success) throw twice.error;

        expect(twice.value).toEqual(once.value);
    });

    it('should reject other channel layouts', () => {
        for (const channels of [1, 2] as const) {
            const result = ensureAlpha({ width: 2, height: 2, channels, data: Buffer.alloc(4 * channels) });
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe(StickerErrorKind.UnsupportedFormat);
            }
        }
    });
});
