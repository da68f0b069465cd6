/**
 * Console logger with chalk colouring and an optional error-log file
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    success(message: string): void;
    warn(message: string): void;
    error(message: string, error?: unknown): void;
    /** Same logger, with error lines also appended to `errorLogFile` */
    withErrorLog(errorLogFile: string): Logger;
}

export interface LoggerOptions {
    level?: LogLevel;
    /** Error lines are appended here with a timestamp */
    errorLogFile?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function timestamp(): string {
    return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

export class ConsoleLogger implements Logger {
    private readonly level: LogLevel;
    private readonly errorLogFile?: string;

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.errorLogFile = options.errorLogFile;
    }

    withErrorLog(errorLogFile: string): ConsoleLogger {
        return new ConsoleLogger({ level: this.level, errorLogFile });
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    debug(message: string): void {
        if (this.enabled('debug')) console.log(chalk.gray(message));
    }

    info(message: string): void {
        if (this.enabled('info')) console.log(message);
    }

    success(message: string): void {
        if (this.enabled('info')) console.log(chalk.green(message));
    }

    warn(message: string): void {
        if (this.enabled('warn')) console.warn(chalk.yellow(message));
    }

    error(message: string, error?: unknown): void {
        const detail = error instanceof Error ? `: ${error.message}` : error !== undefined ? `: ${String(error)}` : '';
        if (this.enabled('error')) console.error(chalk.red(`${message}${detail}`));
        this.appendToErrorLog(`${message}${detail}`);
    }

    private appendToErrorLog(line: string): void {
        if (!this.errorLogFile) return;
        try {
            mkdirSync(dirname(this.errorLogFile), { recursive: true });
            appendFileSync(this.errorLogFile, `[${timestamp()}] ${line}\n`, 'utf-8');
        } catch (writeError) {
            console.error(chalk.red(`Could not write error log ${this.errorLogFile}:`), writeError);
        }
    }
}

/**
 * Logger that drops everything, for library callers that bring their own reporting
 */
export const silentLogger: Logger = new ConsoleLogger({ level: 'silent' });
