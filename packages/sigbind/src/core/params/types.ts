/**
 * Runtime descriptor of one positional signal parameter.
 *
 * `accepts` is only asked about non-null values; whether `null`/`undefined`
 * is allowed is decided by `nullable`.
 */
export interface ParamType<T = unknown> {
    readonly name: string;
    readonly nullable: boolean;
    accepts(value: unknown): boolean;
    /** @internal Phantom method for type extraction. Never called. */
    value(): T;
}

/** Extract the value type described by a {@link ParamType}. */
export type ParamValue<P> = P extends ParamType<infer T> ? T : never;
