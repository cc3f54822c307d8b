import { appendFileSync } from 'node:fs';
import { format, inspect } from 'node:util';
import chalk from 'chalk';
import { configuration } from '@/configuration';

type Level = 'DEBUG' | 'INFO' | 'WARN';

export class Logger {
    constructor(
        private readonly logFile: string | null,
        private readonly debugToConsole: boolean,
    ) {}

    debug(message: string, ...args: unknown[]): void {
        const line = this.line('DEBUG', message, args);
        this.toFile(line);
        if (this.debugToConsole && !this.logFile) {
            console.error(chalk.gray(line));
        }
    }

    /**
     * Same as debug, but truncates long strings inside the payload so that
     * poll responses with many events stay readable.
     */
    debugLargeJson(message: string, data: unknown, maxStringLength = 200): void {
        const truncated = JSON.stringify(data, (_key, value: unknown) => {
            if (typeof value === 'string' && value.length > maxStringLength) {
                return `${value.slice(0, maxStringLength)}... [${value.length - maxStringLength} more chars]`;
            }
            return value;
        }, 2);
        this.debug(message, truncated ?? String(data));
    }

    info(message: string, ...args: unknown[]): void {
        this.toFile(this.line('INFO', message, args));
        console.log(format(message, ...args));
    }

    warn(message: string, ...args: unknown[]): void {
        this.toFile(this.line('WARN', message, args));
        console.warn(chalk.yellow(format(message, ...args)));
    }

    private line(level: Level, message: string, args: unknown[]): string {
        const rendered = args
            .map((arg) => (typeof arg === 'string' ? arg : inspect(arg, { depth: 4, breakLength: Infinity })))
            .join(' ');
        const time = new Date().toISOString();
        return rendered.length > 0 ? `[${time}] ${level} ${message} ${rendered}` : `[${time}] ${level} ${message}`;
    }

    private toFile(line: string): void {
        if (!this.logFile) {
            return;
        }
        try {
            appendFileSync(this.logFile, line + '\n');
        } catch (error) {
            console.error(chalk.red(`Failed to write log file ${this.logFile}:`), error);
        }
    }
}

export const logger = new Logger(configuration.logFile, configuration.isDebug);
