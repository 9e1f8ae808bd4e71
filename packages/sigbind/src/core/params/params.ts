import type { ParamType } from "./types";

type Constructor<T> = abstract new (...args: never[]) => T;

function define<T>(name: string, accepts: (value: unknown) => boolean, nullable = false): ParamType<T> {
    return {
        name,
        nullable,
        accepts,
        value() {
            throw new Error("phantom method, not callable");
        },
    };
}

/**
 * Parameter type builders for {@link defineSignal}.
 *
 * @example
 * const Move = defineSignal("Move", [param.instanceOf(Vector), param.number()]);
 */
export const param = {
    string: (): ParamType<string> => define<string>("string", (v) => typeof v === "string"),
    number: (): ParamType<number> => define<number>("number", (v) => typeof v === "number"),
    integer: (): ParamType<number> => define<number>("integer", (v) => Number.isInteger(v)),
    boolean: (): ParamType<boolean> => define<boolean>("boolean", (v) => typeof v === "boolean"),
    bigint: (): ParamType<bigint> => define<bigint>("bigint", (v) => typeof v === "bigint"),
    symbol: (): ParamType<symbol> => define<symbol>("symbol", (v) => typeof v === "symbol"),
    func: (): ParamType<(...args: never[]) => unknown> =>
        define<(...args: never[]) => unknown>("function", (v) => typeof v === "function"),

    /** Any non-null object. */
    object: <T extends object = object>(name = "object"): ParamType<T> =>
        define<T>(name, (v) => typeof v === "object" || typeof v === "function"),

    instanceOf: <T>(ctor: Constructor<T>, name: string = ctor.name): ParamType<T> =>
        define<T>(name, (v) => v instanceof ctor),

    /** An array, optionally checking every element against `item`. */
    array: <T = unknown>(item?: ParamType<T>): ParamType<T[]> =>
        define<T[]>(`${item?.name ?? "unknown"}[]`, (v) => {
            if (!Array.isArray(v)) return false;
            const itemType = item;
            if (!itemType) return true;
            return v.every((el: unknown) =>
                el === null || el === undefined ? itemType.nullable : itemType.accepts(el),
            );
        }),

    literal: <T extends string | number | boolean>(...values: T[]): ParamType<T> =>
        define<T>(values.map((v) => JSON.stringify(v)).join(" | "), (v) => values.some((allowed) => allowed === v)),

    custom: <T>(name: string, guard: (value: unknown) => value is T): ParamType<T> => define<T>(name, guard),

    unknown: (): ParamType<unknown> => define<unknown>("unknown", () => true, true),

    /** Allow `null` (and an absent value) in place of `inner`. */
    nullable: <T>(inner: ParamType<T>): ParamType<T | null> =>
        define<T | null>(`${inner.name} | null`, (v) => inner.accepts(v), true),
};
