import type { LogDetails } from "./logger/types";

export interface LoggerContext {
    debug(code: string, message: string, details?: LogDetails): void;
    warn(code: string, message: string, details?: LogDetails): void;
    error(code: string, message: string, details?: LogDetails): void;
}
