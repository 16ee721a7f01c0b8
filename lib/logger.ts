import {randomUUID} from 'node:crypto';

export interface Logger {
    readonly runId: string;
    readonly verbose: boolean;
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
    verbose?: boolean;
    runId?: string;
    clock?: () => Date;
}

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

// `<ISO timestamp> <LEVEL> [runId] message`, debug only when verbose.
export function createLogger(options: LoggerOptions = {}): Logger {
    const runId = options.runId ?? randomUUID().slice(0, 8);
    const verbose = options.verbose ?? false;
    const clock = options.clock ?? (() => new Date());

    const line = (level: Level, message: string) =>
        `${clock().toISOString()} ${level} [${runId}] ${message}`;

    return {
        runId,
        verbose,
        debug(message, ...details) {
            if (verbose) {
                console.log(line('DEBUG', message), ...details);
            }
        },
        info(message, ...details) {
            console.log(line('INFO', message), ...details);
        },
        warn(message, ...details) {
            console.warn(line('WARN', message), ...details);
        },
        error(message, ...details) {
            console.error(line('ERROR', message), ...details);
        },
    };
}

export function maskSecret(secret: string): string {
    if (secret.length <= 8) {
        return '***';
    }
    return `${secret.substring(0, 4)}...${secret.substring(secret.length - 4)}`;
}
