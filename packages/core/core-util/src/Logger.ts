/**
 * Classification of a log entry.
 * ACCESS lines are one per completed request: "<METHOD> <URL> <STATUS>".
 */
export enum LogType {
    ACCESS = 'ACCESS',
    INFO = 'INFO',
    WARN = 'WARN',
    ERROR = 'ERROR',
}

/**
 * WindLogger - Append-only logging sink.
 *
 * Injected into the components that log (resources through ResourceContext,
 * the server through the DI container) instead of being a process global,
 * so a test can hand in a MemoryLogger and assert on what was written.
 */
export interface WindLogger {
    log(message: string, type: LogType): void;
}

/**
 * DI token for WindLogger injection.
 */
export const LOGGER_TOKEN = Symbol.for('WindLogger');

/**
 * Writes "[TYPE] message" to the console.
 */
export class ConsoleLogger implements WindLogger {
    log(message: string, type: LogType): void {
        const line = `[${type}] ${message}`;
        switch (type) {
            case LogType.ERROR:
                console.error(line);
                break;
            case LogType.WARN:
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    }
}

export class LogEntry {
    constructor(
        public message: string,
        public type: LogType,
    ) {}
}

/**
 * Keeps every entry in memory, in order.
 */
export class MemoryLogger implements WindLogger {
    readonly entries: LogEntry[] = [];

    log(message: string, type: LogType): void {
        this.entries.push(new LogEntry(message, type));
    }

    messages(type: LogType): string[] {
        return this.entries.filter((entry) => entry.type === type).map((entry) => entry.message);
    }

    clear(): void {
        this.entries.length = 0;
    }
}
