import { ownerName } from "../errors/helpers";
import type { LoggerContext } from "../types";
import type { LogDetails, LogEntry, LogHandler, LogLevel } from "./types";

const SEVERITY: Record<LogLevel, number> = { debug: 0, warn: 1, error: 2 };

export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();

    /** Entries below `level` are dropped before reaching any handler. */
    constructor(private level: LogLevel = "debug") {}

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: LogDetails): void {
        this.emit("debug", code, message, details);
    }

    warn(code: string, message: string, details?: LogDetails): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: LogDetails): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: LogDetails): void {
        if (SEVERITY[level] < SEVERITY[this.level]) return;

        const entry: LogEntry = { level, code, message, timestamp: Date.now() };
        if (details) {
            const { owner, ...rest } = details;
            if (owner) entry.owner = ownerName(owner);
            if (Object.keys(rest).length > 0) entry.details = rest;
        }
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
