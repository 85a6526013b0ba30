import { format } from "node:util";
import { InvalidArgumentError } from "commander";

export type LogLevel = "debug" | "info" | "warning" | "error" | "critical";

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    source: string;
    message: string;
}

export type LogSink = (entry: LogEntry) => void;

const SEVERITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warning: 30,
    error: 40,
    critical: 50,
};

const LEVEL_NAMES: Record<string, LogLevel> = {
    DEBUG: "debug",
    INFO: "info",
    WARNING: "warning",
    WARN: "warning",
    ERROR: "error",
    CRITICAL: "critical",
    FATAL: "critical",
};

/**
 * Map a level name such as "INFO" or "warning" to a LogLevel.
 * Throws commander's InvalidArgumentError so it can be used as an option parser.
 */
export function parseLogLevel(name: string): LogLevel {
    const level = LEVEL_NAMES[name.trim().toUpperCase()];
    if (level === undefined) {
        throw new InvalidArgumentError(
            `Invalid log level: ${name}. Expected one of ${Object.keys(LEVEL_NAMES).join(", ")}.`
        );
    }
    return level;
}

/** Writes to stderr so the engine output on stdout stays untouched. */
export const consoleSink: LogSink = (entry) => {
    console.error(
        `${entry.timestamp} ${entry.level.toUpperCase()} [${entry.source}] ${entry.message}`
    );
};

/**
 * Leveled logger handle. Created once per program run from the --debug
 * option and handed to every step that logs.
 */
export class Logger {
    constructor(
        readonly level: LogLevel,
        readonly source = "cwl",
        private readonly sink: LogSink = consoleSink
    ) {}

    isEnabled(level: LogLevel): boolean {
        return SEVERITY[level] >= SEVERITY[this.level];
    }

    /** Same threshold and sink, different source tag. */
    child(source: string): Logger {
        return new Logger(this.level, source, this.sink);
    }

    debug(...args: unknown[]): void {
        this.log("debug", args);
    }

    info(...args: unknown[]): void {
        this.log("info", args);
    }

    warning(...args: unknown[]): void {
        this.log("warning", args);
    }

    error(...args: unknown[]): void {
        this.log("error", args);
    }

    critical(...args: unknown[]): void {
        this.log("critical", args);
    }

    private log(level: LogLevel, args: unknown[]): void {
        if (!this.isEnabled(level)) return;
        this.sink({
            timestamp: new Date().toISOString(),
            level,
            source: this.source,
            message: format(...args),
        });
    }
}
