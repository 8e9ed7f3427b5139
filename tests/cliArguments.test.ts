import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';

import {
    buildProcessingOptions,
    parseConcurrency,
    parsePattern,
    parseQuality,
    resolveOutputPath,
} from '../src/cli/arguments.js';
import { OutputFormat } from '../src/@types/index.js';

describe('parseQuality', () => {
    it('should keep values inside the range', () => {
        expect(parseQuality('1')).toBe(1);
        expect(parseQuality('75')).toBe(75);
        expect(parseQuality('100')).toBe(100);
    });

    it('should clamp values outside the range', () => {
        expect(parseQuality('0')).toBe(1);
        expect(parseQuality('-20')).toBe(1);
        expect(parseQuality('250')).toBe(100);
    });

    it('should reject values that are not numbers', () => {
        expect(() => parseQuality('high')).toThrow(InvalidArgumentError);
    });
});

describe('parsePattern', () => {
    it('should accept a bare star and extension patterns', () => {
        expect(parsePattern('*')).toBe('*');
        expect(parsePattern('*.jpg')).toBe('*.jpg');
        expect(parsePattern('*.tar.gz')).toBe('*.tar.gz');
    });

    it('should reject other globs', () => {
        for (const pattern of ['a*', '*.', '*.*', 'img/*.png', '', '**']) {
            expect(() => parsePattern(pattern)).toThrow(InvalidArgumentError);
        }
    });
});

describe('parseConcurrency', () => {
    it('should accept positive integers', () => {
        expect(parseConcurrency('1')).toBe(1);
        expect(parseConcurrency('8')).toBe(8);
    });

    it('should reject zero, negatives and text', () => {
        for (const value of ['0', '-3', 'many']) {
            expect(() => parseConcurrency(value)).toThrow(InvalidArgumentError);
        }
    });
});

describe('resolveOutputPath', () => {
    it('should append the format extension to a bare single-file output', () => {
        expect(resolveOutputPath('output', OutputFormat.PNG, false)).toBe('output.png');
        expect(resolveOutputPath('output', OutputFormat.WEBP, false)).toBe('output.webp');
    });

    it('should keep an explicit extension', () => {
        expect(resolveOutputPath('sticker.png', OutputFormat.WEBP, false)).toBe('sticker.png');
    });

    it('should use the batch output directory as given', () => {
        expect(resolveOutputPath('stickers', OutputFormat.WEBP, true)).toBe('stickers');
    });
});

describe('buildProcessingOptions', () => {
    it('should select the format from the webp flag', () => {
        const base = { output: 'output', quality: 90, pattern: '*.gif', concurrency: 1 };

        expect(buildProcessingOptions(base)).toEqual({ format: OutputFormat.PNG, quality: 90, pattern: '*.gif' });
        expect(buildProcessingOptions({ ...base, webp: true })).toEqual({
            format: OutputFormat.WEBP,
            quality: 90,
            pattern: '*.gif',
        });
    });
});
