import type { LogEntry, LogHandler } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const magenta = "\x1b[35m";
const reset = "\x1b[0m";

function formatTime(ts: number): string {
    const d = new Date(ts);
    return [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":");
}

function colorizeValue(value: unknown): string {
    if (value === null) return `${magenta}null${reset}`;
    if (value === undefined) return `${dim}undefined${reset}`;
    if (typeof value === "string") return `${green}"${value}"${reset}`;
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return `${yellow}${String(value)}${reset}`;
    }
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        return `[${value.map(colorizeValue).join(`${dim},${reset} `)}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${cyan}${k}${reset}${dim}:${reset} ${colorizeValue(v)}`);
        return `${dim}{${reset} ${pairs.join(`${dim},${reset} `)} ${dim}}${reset}`;
    }
    return String(value);
}

/** `HH:MM:SS [sigbind] code(owner) → message {details}`, routed to the matching console method. */
export function createConsoleHandler(): LogHandler {
    return (entry: LogEntry) => {
        const time = formatTime(entry.timestamp);
        const tag = entry.level === "debug" ? "sigbind" : entry.level;
        const detailsPart = entry.details ? ` ${colorizeValue(entry.details)}` : "";
        const ownerPart = entry.owner ? `(${cyan}${entry.owner}${reset})` : "";
        const line = `${time} [${tag}] ${entry.code}${ownerPart} \u2192 ${entry.message}${detailsPart}`;

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
