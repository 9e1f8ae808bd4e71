import { DuplicateListenerError } from "../errors/errors";
import { ownerName } from "../errors/helpers";
import { ListenerCardinality } from "./enums";
import type {
    DispatchContext,
    ListenerBinding,
    ListenerMethod,
    ListenerSpec,
    SignalKind,
    SignalKindInstance,
} from "./types";

const DETACHED_CONTEXT: DispatchContext = {
    isAlive: () => true,
    expire() {},
    release() {},
};

/**
 * A typed event channel with an ordered list of listener bindings.
 *
 * Removal is collect-then-purge: bindings that are spent (ONCE listeners that
 * fired, owners found dead) or removed while a dispatch is running stay in the
 * list until the outermost pass over this signal ends, so iteration is never
 * disturbed.
 */
export class Signal<TArgs extends unknown[] = unknown[]> {
    private readonly listeners: ListenerBinding<TArgs>[] = [];
    private readonly spent = new Set<ListenerBinding<TArgs>>();
    private readonly removed = new Set<ListenerBinding<TArgs>>();
    private depth = 0;

    constructor(readonly kind: SignalKind<TArgs>) {}

    get id(): string {
        return this.kind.id;
    }

    get parameterCount(): number {
        return this.kind.params.length;
    }

    /** Number of bindings that will still be called by the next dispatch. */
    get listenerCount(): number {
        return this.bindings().length;
    }

    get isDispatching(): boolean {
        return this.depth > 0;
    }

    /** Narrow a type-erased signal to the kind it was created for. */
    is<T extends unknown[]>(kind: SignalKind<T>): this is Signal<T> {
        const own: SignalKindInstance = this.kind;
        return own === kind;
    }

    /** Live bindings in dispatch order. */
    bindings(): ListenerBinding<TArgs>[] {
        return this.listeners.filter((b) => !this.spent.has(b) && !this.removed.has(b));
    }

    has(owner: object, method: ListenerMethod): boolean {
        return this.bindings().some((b) => b.owner === owner && b.method === method);
    }

    /**
     * Append a binding. Dispatch order is binding order.
     * @throws {DuplicateListenerError} If the same owner and method are already bound.
     */
    addListener(spec: ListenerSpec<TArgs>): ListenerBinding<TArgs> {
        const { owner, method } = spec;
        const name = spec.name ?? (method.name || "anonymous");
        if (this.has(owner, method)) {
            throw new DuplicateListenerError(this.id, ownerName(owner), name);
        }

        const binding: ListenerBinding<TArgs> = {
            owner,
            method,
            name,
            cardinality: spec.cardinality ?? ListenerCardinality.EVERY,
            call(args) {
                method.apply(owner, args);
            },
        };
        this.listeners.push(binding);
        return binding;
    }

    /** Bind a plain function. Returns an unsubscribe function. */
    subscribe(
        handler: (...args: TArgs) => void,
        cardinality: ListenerCardinality = ListenerCardinality.EVERY,
    ): () => void {
        const binding = this.addListener({ owner: handler, method: handler, cardinality });
        return () => {
            this.removeListener(binding);
        };
    }

    /**
     * Remove a binding, or the first live binding of a callback. Returns false if nothing matched.
     * While this signal is dispatching the removal takes effect after the pass.
     */
    removeListener(target: ListenerBinding<TArgs> | ListenerMethod): boolean {
        const binding =
            typeof target === "function" ? this.bindings().find((b) => b.method === target) : target;
        if (!binding) return false;

        const index = this.listeners.indexOf(binding);
        if (index === -1 || this.removed.has(binding)) return false;

        if (this.depth > 0) {
            this.removed.add(binding);
        } else {
            this.listeners.splice(index, 1);
            this.spent.delete(binding);
        }
        return true;
    }

    /**
     * Call every live binding in order with `args`.
     *
     * Arguments are not validated here; {@link SignalDispatcher.invoke} does that.
     * A listener that throws aborts the rest of the pass; purging still happens.
     */
    invoke(context: DispatchContext, ...args: TArgs): void {
        const pass = [...this.listeners];
        this.depth++;
        try {
            for (const binding of pass) {
                if (this.spent.has(binding)) continue;

                if (!context.isAlive(binding.owner)) {
                    this.spent.add(binding);
                    context.expire(binding.owner);
                    continue;
                }

                if (binding.cardinality === ListenerCardinality.ONCE) {
                    this.spent.add(binding);
                }
                binding.call(args);
            }
        } finally {
            this.depth--;
            if (this.depth === 0) {
                this.purge(context);
            }
        }
    }

    /** Invoke without a dispatcher: every owner is treated as alive. */
    dispatch(...args: TArgs): void {
        this.invoke(DETACHED_CONTEXT, ...args);
    }

    private purge(context: DispatchContext): void {
        if (this.spent.size === 0 && this.removed.size === 0) return;

        const released = [...this.spent];
        const kept = this.listeners.filter((b) => !this.spent.has(b) && !this.removed.has(b));
        this.listeners.splice(0, this.listeners.length, ...kept);
        this.spent.clear();
        this.removed.clear();

        for (const binding of released) {
            context.release(binding);
        }
    }
}
