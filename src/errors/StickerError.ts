// src/errors/StickerError.ts

import type { StageResult } from '../@types/result.js';

export enum StickerErrorKind {
    Decode = 'DecodeError',
    UnsupportedFormat = 'UnsupportedFormatError',
    Encode = 'EncodeError',
    IO = 'IOError',
    NoMatch = 'NoMatchError',
    Unexpected = 'UnexpectedError',
}

interface StickerErrorOptions {
    readonly kind: StickerErrorKind;
    readonly message: string;
    readonly metadata?: Record<string, unknown>;
    readonly cause?: unknown;
}

export class StickerError extends Error {
    public readonly kind: StickerErrorKind;
    public readonly metadata: Record<string, unknown>;

    constructor(options: StickerErrorOptions) {
        super(options.message, { cause: options.cause });
        this.name = options.kind;
        this.kind = options.kind;
        this.metadata = options.metadata ?? {};
    }

    public static fromUnknown(error: unknown, kind = StickerErrorKind.Unexpected): StickerError {
        if (error instanceof StickerError) {
            return error;
        }

        const cause = error instanceof Error ? error : new Error(String(error));
        return new StickerError({ kind, message: cause.message, cause });
    }

    public static decode(message: string, metadata?: Record<string, unknown>, cause?: unknown): StickerError {
        return new StickerError({ kind: StickerErrorKind.Decode, message, metadata, cause });
    }

    public static unsupportedFormat(message: string, metadata?: Record<string, unknown>): StickerError {
        return new StickerError({ kind: StickerErrorKind.UnsupportedFormat, message, metadata });
    }

    public static encode(message: string, metadata?: Record<string, unknown>, cause?: unknown): StickerError {
        return new StickerError({ kind: StickerErrorKind.Encode, message, metadata, cause });
    }

    public static io(message: string, metadata?: Record<string, unknown>, cause?: unknown): StickerError {
        return new StickerError({ kind: StickerErrorKind.IO, message, metadata, cause });
    }

    public static noMatch(message: string, metadata?: Record<string, unknown>): StickerError {
        return new StickerError({ kind: StickerErrorKind.NoMatch, message, metadata });
    }
}

export function succeed<T>(value: T): StageResult<T> {
    return { success: true, value };
}

export function fail<T>(error: StickerError): StageResult<T> {
    return { success: false, error };
}

/**
 * Renders a caught value as a message without assuming it is an Error.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
