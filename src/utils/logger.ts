import * as fs from 'fs';
import * as path from 'path';

export interface Logger {
    log(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
    debug(...args: unknown[]): void;
}

export interface FileLoggerOptions {
    filePath?: string;      // Relative paths resolve against cwd
    prefix?: string;
    verbose?: boolean;
    console?: boolean;      // Mirror lines to stdout/stderr (default: true)
}

export function formatArgs(args: unknown[]): string {
    return args.map(arg => {
        if (arg instanceof Error) return arg.message;
        return typeof arg === 'object' && arg !== null ? JSON.stringify(arg, null, 2) : String(arg);
    }).join(' ');
}

// Appends timestamped lines to the log file and mirrors them to the console
export class FileLogger implements Logger {
    private logFilePath: string;
    private logStream: fs.WriteStream | null = null;
    private prefix: string;
    private verbose: boolean;
    private mirror: boolean;

    constructor(options: FileLoggerOptions = {}) {
        this.logFilePath = path.resolve(process.cwd(), options.filePath ?? 'wavelog-transport.log');
        this.prefix = options.prefix ?? 'WL-TRANSPORT:';
        this.verbose = options.verbose ?? false;
        this.mirror = options.console ?? true;
        this.initLogFile();
    }

    private initLogFile() {
        try {
            this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
            this.logStream.on('error', (error) => {
                console.error('Log file write failed:', error.message);
                this.logStream = null;
            });
        } catch (error) {
            console.error('Failed to create log file:', error);
        }
    }

    public getFilePath(): string {
        return this.logFilePath;
    }

    log(...args: unknown[]) {
        this.write(formatArgs(args), false);
    }

    error(...args: unknown[]) {
        this.write(formatArgs(['ERROR:', ...args]), true);
    }

    warn(...args: unknown[]) {
        this.write(formatArgs(['WARN:', ...args]), true);
    }

    debug(...args: unknown[]) {
        if (!this.verbose) return;
        this.write(formatArgs(args), false);
    }

    close(): Promise<void> {
        return new Promise((resolve) => {
            const stream = this.logStream;
            this.logStream = null;
            if (!stream) {
                resolve();
                return;
            }
            stream.end(() => resolve());
        });
    }

    private write(message: string, toStderr: boolean): void {
        const timestamp = new Date().toISOString();
        const line = `${this.prefix} ${message}`;

        if (this.logStream) {
            this.logStream.write(`[${timestamp}] ${line}\n`);
        }

        if (!this.mirror) return;
        if (toStderr) {
            console.error(line);
        } else {
            console.log(line);
        }
    }
}

/**
 * Logger that keeps lines in memory, for tests and dry runs.
 */
export class MemoryLogger implements Logger {
    public readonly lines: string[] = [];
    private verbose: boolean;

    constructor(verbose: boolean = true) {
        this.verbose = verbose;
    }

    log(...args: unknown[]) {
        this.lines.push(formatArgs(args));
    }

    warn(...args: unknown[]) {
        this.lines.push(formatArgs(['WARN:', ...args]));
    }

    error(...args: unknown[]) {
        this.lines.push(formatArgs(['ERROR:', ...args]));
    }

    debug(...args: unknown[]) {
        if (this.verbose) this.lines.push(formatArgs(args));
    }
}
