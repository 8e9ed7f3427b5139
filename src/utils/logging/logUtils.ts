// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger, LogLevel } from '../../@types/index.js';

import chalk, { type ChalkInstance } from 'chalk';

interface LevelStyle {
    readonly tag: string;
    readonly paint: ChalkInstance;
    readonly sink: keyof ILogFacility;
}

const LEVEL_STYLES: Record<LogLevel, LevelStyle> = {
    info: { tag: 'INFO', paint: chalk.blue, sink: 'log' },
    success: { tag: 'SUCCESS', paint: chalk.green, sink: 'log' },
    warn: { tag: 'WARNING', paint: chalk.yellow, sink: 'warn' },
    error: { tag: 'ERROR', paint: chalk.red, sink: 'error' },
    debug: { tag: 'DEBUG', paint: chalk.magenta, sink: 'log' },
};

const loggerMap = new Map<string, ILogger>();

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger writing one colored `[LEVEL] name :: message` line per call. Every message is kept
 * per level, debug included; debug lines only reach the facility when verbose.
 */
class Logger implements ILogger {
    private readonly history: Record<LogLevel, string[]> = {
        info: [],
        success: [],
        warn: [],
        error: [],
        debug: [],
    };

    constructor(
        readonly name: string,
        private readonly facility: ILogFacility,
        readonly verbose = false,
    ) {}

    get debugMessages(): string[] {
        return this.history.debug;
    }

    get warnMessages(): string[] {
        return this.history.warn;
    }

    get errorMessages(): string[] {
        return this.history.error;
    }

    info(message: string): void {
        this.emit('info', message);
    }

    success(message: string): void {
        this.emit('success', message);
    }

    warn(message: string): void {
        this.emit('warn', message);
    }

    error(message: string): void {
        this.emit('error', message);
    }

    debug(message: string): void {
        this.emit('debug', message, this.verbose);
    }

    private emit(level: LogLevel, message: string, print = true): void {
        this.history[level].push(message);
        if (!print) return;
        const { tag, paint, sink } = LEVEL_STYLES[level];
        this.facility[sink](paint(`[${tag}] ${this.name} :: ${message}`));
    }
}

/**
 * Retrieves a logger by name, creating it on first use. Later calls with the same name
 * return the existing instance and ignore `logFacility` and `verbose`.
 *
 * @param {string} name - The name shown in every line.
 * @param {ILogFacility} [logFacility=console] - Where the formatted lines go.
 * @param {boolean} [verbose=false] - Whether debug lines are printed.
 */
export function getLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    let logger = loggerMap.get(name);
    if (!logger) {
        logger = new Logger(name, logFacility, verbose);
        loggerMap.set(name, logger);
    }
    return logger;
}
