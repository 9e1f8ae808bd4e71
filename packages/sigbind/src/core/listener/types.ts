import type { ListenerCardinality } from "../signal/enums";
import type { DynamicListener, SignalKind, SignalKindInstance } from "../signal/types";

/** Anything constructible, including abstract classes. */
export type ListenerClass<TOwner extends object = object> = abstract new (...args: never[]) => TOwner;

/** Names of `TOwner` methods that can receive `TArgs`. */
export type ListenerKey<TOwner, TArgs extends unknown[]> = {
    [K in keyof TOwner]-?: TOwner[K] extends (...args: TArgs) => unknown ? K : never;
}[keyof TOwner] &
    string;

/** One `.on()` / `.once()` entry recorded for a class. */
export type ListenerDeclaration = {
    kind: SignalKindInstance;
    method: string;
    cardinality: ListenerCardinality;
};

/** A declaration resolved against a live owner. */
export type ResolvedListener = {
    kind: SignalKindInstance;
    method: DynamicListener;
    /** `Class.method`, used in diagnostics. */
    name: string;
    cardinality: ListenerCardinality;
};

/** Finds the listener methods of an owner. */
export interface ListenerDiscovery {
    resolve(owner: object): ResolvedListener[];
}

export interface ListenerDeclarationBuilder<TOwner extends object> {
    /** Listen to every invocation of `kind`. */
    on<TArgs extends unknown[]>(
        kind: SignalKind<TArgs>,
        method: ListenerKey<TOwner, TArgs>,
    ): ListenerDeclarationBuilder<TOwner>;
    /** Listen to the first invocation of `kind` after each bind. */
    once<TArgs extends unknown[]>(
        kind: SignalKind<TArgs>,
        method: ListenerKey<TOwner, TArgs>,
    ): ListenerDeclarationBuilder<TOwner>;
}
