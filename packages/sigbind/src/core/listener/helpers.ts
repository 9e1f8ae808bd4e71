import { ListenerDeclarationError } from "../errors/errors";
import { ListenerCardinality } from "../signal/enums";
import { isSignalKind } from "../signal/helpers";
import type { DynamicListener, SignalKind } from "../signal/types";
import { defaultListenerCatalog, type ListenerCatalog } from "./catalog";
import type { ListenerClass, ListenerDeclarationBuilder, ListenerKey } from "./types";

export function isCallable(value: unknown): value is DynamicListener {
    return typeof value === "function";
}

/**
 * Declare which methods of `ctor` listen to which signals.
 * Subclasses inherit the declarations of their base classes.
 *
 * @example
 * declareListeners(Player)
 *     .on(Move, "onMove")
 *     .once(Ping, "onFirstPing");
 */
export function declareListeners<TOwner extends object>(
    ctor: ListenerClass<TOwner>,
    catalog: ListenerCatalog = defaultListenerCatalog,
): ListenerDeclarationBuilder<TOwner> {
    if (typeof ctor !== "function") {
        throw new ListenerDeclarationError("declareListeners: expected a class");
    }

    const add = <TArgs extends unknown[]>(
        kind: SignalKind<TArgs>,
        method: ListenerKey<TOwner, TArgs>,
        cardinality: ListenerCardinality,
    ): void => {
        if (!isSignalKind(kind)) {
            throw new ListenerDeclarationError(`declareListeners(${ctor.name}): "${method}" must listen to a signal kind`);
        }
        if (typeof method !== "string" || method.length === 0) {
            throw new ListenerDeclarationError(
                `declareListeners(${ctor.name}): listener of signal "${kind.id}" needs a method name`,
            );
        }
        catalog.declare(ctor, { kind, method, cardinality });
    };

    const builder: ListenerDeclarationBuilder<TOwner> = {
        on(kind, method) {
            add(kind, method, ListenerCardinality.EVERY);
            return builder;
        },
        once(kind, method) {
            add(kind, method, ListenerCardinality.ONCE);
            return builder;
        },
    };
    return builder;
}
