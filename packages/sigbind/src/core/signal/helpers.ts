import { defaultSignalCatalog, isReservedId, type SignalCatalog } from "../catalog/catalog";
import { InvalidSignalDefinitionError } from "../errors/errors";
import { ordinal } from "../errors/helpers";
import type { ParamType } from "../params/types";
import type { SignalKind, SignalKindInstance } from "./types";

export type SignalOptions = {
    /** Skip this kind during automatic discovery. Defaults to true for `sigbind:` ids. */
    builtin?: boolean;
    /** Catalog to record the kind in; `null` records nowhere. */
    catalog?: SignalCatalog | null;
};

function isParamType(value: unknown): value is ParamType {
    if (typeof value !== "object" || value === null) return false;
    return (
        typeof Reflect.get(value, "name") === "string" &&
        typeof Reflect.get(value, "nullable") === "boolean" &&
        typeof Reflect.get(value, "accepts") === "function"
    );
}

export function isSignalKind(value: unknown): value is SignalKindInstance {
    if (typeof value !== "object" || value === null) return false;
    return (
        typeof Reflect.get(value, "id") === "string" &&
        Array.isArray(Reflect.get(value, "params")) &&
        typeof Reflect.get(value, "builtin") === "boolean"
    );
}

/**
 * Define a signal kind.
 *
 * @example
 * const Ping = defineSignal("Ping");
 * const Move = defineSignal("Move", [param.instanceOf(Vector), param.number()]);
 */
export function defineSignal(id: string, params?: [], options?: SignalOptions): SignalKind<[]>;
export function defineSignal<A>(id: string, params: [ParamType<A>], options?: SignalOptions): SignalKind<[A]>;
export function defineSignal<A, B>(
    id: string,
    params: [ParamType<A>, ParamType<B>],
    options?: SignalOptions,
): SignalKind<[A, B]>;
export function defineSignal<A, B, C>(
    id: string,
    params: [ParamType<A>, ParamType<B>, ParamType<C>],
    options?: SignalOptions,
): SignalKind<[A, B, C]>;
export function defineSignal<A, B, C, D>(
    id: string,
    params: [ParamType<A>, ParamType<B>, ParamType<C>, ParamType<D>],
    options?: SignalOptions,
): SignalKind<[A, B, C, D]>;
export function defineSignal(id: string, params: readonly ParamType[], options?: SignalOptions): SignalKindInstance;
export function defineSignal(
    id: string,
    params: readonly ParamType[] = [],
    options: SignalOptions = {},
): SignalKindInstance {
    if (typeof id !== "string" || id.trim().length === 0) {
        throw new InvalidSignalDefinitionError("defineSignal: id must be a non-empty string");
    }
    params.forEach((p: unknown, i) => {
        if (!isParamType(p)) {
            throw new InvalidSignalDefinitionError(
                `defineSignal("${id}"): the ${ordinal(i + 1)} parameter is not a parameter type`,
            );
        }
    });

    const kind: SignalKindInstance = Object.freeze({
        id,
        params: Object.freeze([...params]),
        builtin: options.builtin ?? isReservedId(id),
        args(): unknown[] {
            throw new Error("phantom method, not callable");
        },
    });

    if (options.catalog !== null) {
        (options.catalog ?? defaultSignalCatalog).add(kind);
    }
    return kind;
}
