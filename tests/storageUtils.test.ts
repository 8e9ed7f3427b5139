import { promises as fs } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
    buildOutputPath,
    ensureOutputDirectory,
    getFormatExtension,
    isDirectory,
    listMatchingFiles,
    matchesPattern,
    writeBufferAtomically,
} from '../src/utils/storage/storageUtils.js';
import { StickerErrorKind } from '../src/errors/StickerError.js';
import { OutputFormat } from '../src/@types/index.js';
import { makeTempDir, removeDir } from './helpers/fixtures.js';

describe('matchesPattern', () => {
    it('should match everything with a bare star', () => {
        expect(matchesPattern('a.jpg', '*')).toBe(true);
        expect(matchesPattern('README', '*')).toBe(true);
    });

    it('should match extensions ignoring case', () => {
        expect(matchesPattern('a.JPG', '*.jpg')).toBe(true);
        expect(matchesPattern('a.jpg', '*.JPG')).toBe(true);
        expect(matchesPattern('a.jpeg', '*.jpg')).toBe(false);
        expect(matchesPattern('archive.tar.gz', '*.gz')).toBe(true);
    });

    it('should match nothing for other patterns', () => {
        expect(matchesPattern('a.jpg', 'a*')).toBe(false);
        expect(matchesPattern('a.jpg', '*.')).toBe(false);
        expect(matchesPattern('a.jpg', '')).toBe(false);
    });
});

describe('buildOutputPath', () => {
    it('should replace the extension with the format extension', () => {
        expect(buildOutputPath('/in/cat.JPG', '/out', OutputFormat.WEBP)).toBe(path.join('/out', 'cat.webp'));
        expect(buildOutputPath('/in/cat.gif', '/out', OutputFormat.PNG)).toBe(path.join('/out', 'cat.png'));
        expect(buildOutputPath('/in/no-extension', 'out', OutputFormat.PNG)).toBe(path.join('out', 'no-extension.png'));
    });

    it('should expose the extension of each format', () => {
        expect(getFormatExtension(OutputFormat.PNG)).toBe('.png');
        expect(getFormatExtension(OutputFormat.WEBP)).toBe('.webp');
    });
});

describe('file system helpers', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(tempDir);
    });

    it('should create nested output directories and accept existing ones', async () => {
        const nested = path.join(tempDir, 'a', 'b');

        expect(await ensureOutputDirectory(nested)).toEqual({ success: true, value: undefined });
        expect(await ensureOutputDirectory(nested)).toEqual({ success: true, value: undefined });
        expect(await isDirectory(nested)).toEqual({ success: true, value: true });
    });

    it('should list matching regular files in sorted order', async () => {
        for (const name of ['b.png', 'a.png', 'c.jpg']) {
            await fs.writeFile(path.join(tempDir, name), '');
        }
        await fs.mkdir(path.join(tempDir, 'dir.png'));

        const result = await listMatchingFiles(tempDir, '*.png');

        expect(result).toEqual({ success: true, value: [path.join(tempDir, 'a.png'), path.join(tempDir, 'b.png')] });
    });

    it('should report an unreadable directory as an IO error', async () => {
        const result = await listMatchingFiles(path.join(tempDir, 'missing'), '*');

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.kind).toBe(StickerErrorKind.IO);
        }
    });

    it('should write atomically and leave no temporary file behind', async () => {
        const target = path.join(tempDir, 'file.bin');
        await fs.writeFile(target, 'old');

        await writeBufferAtomically(target, Buffer.from('new'));

        expect(await fs.readFile(target, 'utf8')).toBe('new');
        expect(await fs.readdir(tempDir)).toEqual(['file.bin']);
    });

    it('should remove the temporary file when the rename fails', async () => {
        const target = path.join(tempDir, 'occupied');
        await fs.mkdir(target);
        await fs.writeFile(path.join(target, 'inside'), '');

        await expect(writeBufferAtomically(target, Buffer.from('data'))).rejects.toThrow();

        expect(await fs.readdir(tempDir)).toEqual(['occupied']);
    });

    it('should keep every concurrent write to one target intact', async () => {
        const target = path.join(tempDir, 'shared.bin');
        const payloads = ['first', 'second', 'third', 'fourth'];

        await Promise.all(payloads.map((payload) => writeBufferAtomically(target, Buffer.from(payload))));

        expect(payloads).toContain(await fs.readFile(target, 'utf8'));
        expect(await fs.readdir(tempDir)).toEqual(['shared.bin']);
    });

    it('should tell directories from files and missing paths', async () => {
        const file = path.join(tempDir, 'file.txt');
        await fs.writeFile(file, '');

        expect(await isDirectory(tempDir)).toEqual({ success: true, value: true });
        expect(await isDirectory(file)).toEqual({ success: true, value: false });
        expect(await isDirectory(path.join(tempDir, 'missing'))).toEqual({ success: true, value: false });
    });

    it('should report a path below a regular file as an IO error', async () => {
        const file = path.join(tempDir, 'img.png');
        await fs.writeFile(file, '');

        const result = await isDirectory(path.join(file, 'x'));

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.kind).toBe(StickerErrorKind.IO);
            expect(result.error.message).toContain(`Cannot inspect "${path.join(file, 'x')}"`);
        }
    });
});
