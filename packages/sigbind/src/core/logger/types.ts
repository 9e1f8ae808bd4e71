export type LogLevel = "debug" | "warn" | "error";

/** Structured details of a log call. `owner` is the listener owner the entry is about. */
export type LogDetails = Record<string, unknown> & { owner?: object };

export type LogEntry = {
    level: LogLevel;
    code: string;
    message: string;
    /** Display name of the listener owner, lifted out of the details. */
    owner?: string;
    details?: Record<string, unknown>;
    timestamp: number;
};

export type LogHandler = (entry: LogEntry) => void;
