import type { ParamType } from "../params/types";
import type { ListenerCardinality } from "./enums";

/**
 * Identity of one signal: its id and positional parameter types.
 *
 * Kinds are compared by object identity. The `id` is a display name that is
 * also used for id-based lookup, so it must be unique within a registry.
 */
export interface SignalKind<TArgs extends unknown[] = unknown[]> {
    readonly id: string;
    readonly params: readonly ParamType[];
    /** Built-in kinds are skipped by automatic discovery. */
    readonly builtin: boolean;
    /** @internal Phantom method carrying the argument tuple type. Never called. */
    args(): TArgs;
}

/** Type-erased kind for heterogeneous collections. */
export type SignalKindInstance = SignalKind<unknown[]>;

/** Argument tuple of a signal kind. */
export type SignalArgs<K> = K extends SignalKind<infer TArgs> ? TArgs : never;

/** Any function, used for listener identity. */
export type ListenerMethod = (...args: never) => unknown;

/** A listener whose arguments are checked at dispatch time rather than by the compiler. */
export type DynamicListener = (...args: unknown[]) => unknown;

/** One (owner, method, cardinality) binding held by a {@link Signal}. */
export interface ListenerBinding<TArgs extends unknown[] = unknown[]> {
    readonly owner: object;
    readonly method: ListenerMethod;
    readonly name: string;
    readonly cardinality: ListenerCardinality;
    call(args: TArgs): void;
}

export type ListenerSpec<TArgs extends unknown[]> = {
    owner: object;
    method: (...args: TArgs) => unknown;
    /** Display name for diagnostics. Defaults to the method's name. */
    name?: string;
    cardinality?: ListenerCardinality;
};

/**
 * Callbacks a {@link Signal} uses while dispatching.
 *
 * - `isAlive` is asked before every listener call.
 * - `expire` is told about owners found dead.
 * - `release` receives each spent binding once it has been purged.
 */
export interface DispatchContext {
    isAlive(owner: object): boolean;
    expire(owner: object): void;
    release(binding: ListenerBinding): void;
}
