import { ownerName } from "../errors/helpers";

/** Runtime type name of a value, as shown in mismatch messages. */
export function typeName(value: unknown): string {
    if (value === null) return "null";
    if (value === undefined) return "undefined";
    if (Array.isArray(value)) return "Array";
    if (typeof value === "function") return "function";
    if (typeof value === "object") return ownerName(value);
    return typeof value;
}
