/**
 * Contract: Signal -- ordered listener bindings with deferred removal.
 *
 * Sections:
 *   1. defineSignal (identity, catalog, validation)
 *   2. Adding and removing listeners
 *   3. Dispatch order and arguments
 *   4. Removal while dispatching
 *   5. ONCE bindings and dead owners
 *   6. subscribe / dispatch
 */
import { describe, expect, it, vi } from "vitest";
import { SignalCatalog } from "../catalog/catalog";
import { DuplicateListenerError, InvalidSignalDefinitionError } from "../errors/errors";
import { param } from "../params/params";
import type { ParamType } from "../params/types";
import { ListenerCardinality } from "./enums";
import { defineSignal, isSignalKind } from "./helpers";
import { Signal } from "./signal";
import type { DispatchContext } from "./types";

function createContext(overrides: Partial<DispatchContext> = {}): DispatchContext {
    return {
        isAlive: vi.fn(() => true),
        expire: vi.fn(),
        release: vi.fn(),
        ...overrides,
    };
}

describe("defineSignal", () => {
    // -- 1. defineSignal --
    it("creates a frozen kind with id and params", () => {
        const catalog = new SignalCatalog();
        const Score = defineSignal("Score", [param.string(), param.integer()], { catalog });
        expect(Score.id).toBe("Score");
        expect(Score.params.map((p) => p.name)).toEqual(["string", "integer"]);
        expect(Score.builtin).toBe(false);
        expect(Object.isFrozen(Score)).toBe(true);
    });

    it("records the kind in the given catalog once", () => {
        const catalog = new SignalCatalog();
        const Ping = defineSignal("Ping", [], { catalog });
        catalog.add(Ping);
        expect(catalog.list()).toEqual([Ping]);
    });

    it("records nowhere when catalog is null", () => {
        const catalog = new SignalCatalog();
        defineSignal("Detached", [], { catalog: null });
        expect(catalog.size).toBe(0);
    });

    it("two definitions with the same id are distinct kinds", () => {
        const a = defineSignal("Same", [], { catalog: null });
        const b = defineSignal("Same", [], { catalog: null });
        expect(a).not.toBe(b);
    });

    it("marks reserved ids as builtin", () => {
        const Ready = defineSignal("sigbind:ready", [], { catalog: null });
        expect(Ready.builtin).toBe(true);
        expect(defineSignal("Custom", [], { builtin: true, catalog: null }).builtin).toBe(true);
    });

    it("rejects an empty id", () => {
        expect(() => defineSignal("  ", [], { catalog: null })).toThrow(InvalidSignalDefinitionError);
    });

    it("rejects a parameter list entry that is not a parameter type", () => {
        const bogus: readonly ParamType[] = [param.number(), Object.create(null)];
        expect(() => defineSignal("Bad", bogus, { catalog: null })).toThrow(
            'defineSignal("Bad"): the 2nd parameter is not a parameter type',
        );
    });

    it("isSignalKind recognises kinds", () => {
        expect(isSignalKind(defineSignal("Kind", [], { catalog: null }))).toBe(true);
        expect(isSignalKind({ id: "Kind" })).toBe(false);
        expect(isSignalKind(null)).toBe(false);
    });
});

describe("Signal", () => {
    const Ping = defineSignal("Ping", [], { catalog: null });
    const Count = defineSignal("Count", [param.number()], { catalog: null });

    class Counter {
        total = 0;
        add(n: number): void {
            this.total += n;
        }
    }

    // -- 2. Adding and removing listeners --
    describe("Adding and removing listeners", () => {
        it("exposes id and parameter count from its kind", () => {
            const signal = new Signal(Count);
            expect(signal.id).toBe("Count");
            expect(signal.parameterCount).toBe(1);
            expect(signal.listenerCount).toBe(0);
        });

        it("is() narrows only for its own kind", () => {
            const signal = new Signal(Count);
            expect(signal.is(Count)).toBe(true);
            expect(signal.is(Ping)).toBe(false);
        });

        it("addListener records owner, name and cardinality", () => {
            const signal = new Signal(Count);
            const counter = new Counter();
            const binding = signal.addListener({ owner: counter, method: counter.add });
            expect(binding.owner).toBe(counter);
            expect(binding.name).toBe("add");
            expect(binding.cardinality).toBe(ListenerCardinality.EVERY);
            expect(signal.has(counter, Counter.prototype.add)).toBe(true);
        });

        it("rejects the same owner and method twice", () => {
            const signal = new Signal(Count);
            const counter = new Counter();
            signal.addListener({ owner: counter, method: counter.add, name: "Counter.add" });
            expect(() => signal.addListener({ owner: counter, method: counter.add, name: "Counter.add" })).toThrow(
                DuplicateListenerError,
            );
        });

        it("allows the same method on different owners", () => {
            const signal = new Signal(Count);
            signal.addListener({ owner: new Counter(), method: Counter.prototype.add });
            signal.addListener({ owner: new Counter(), method: Counter.prototype.add });
            expect(signal.listenerCount).toBe(2);
        });

        it("removeListener returns false for unknown bindings", () => {
            const signal = new Signal(Count);
            const other = new Signal(Count);
            const counter = new Counter();
            const binding = other.addListener({ owner: counter, method: counter.add });
            expect(signal.removeListener(binding)).toBe(false);
            expect(other.removeListener(binding)).toBe(true);
            expect(other.removeListener(binding)).toBe(false);
            expect(other.listenerCount).toBe(0);
        });

        it("removeListener accepts a callback and removes its first binding", () => {
            const signal = new Signal(Count);
            const shared = vi.fn();
            signal.addListener({ owner: {}, method: shared });
            signal.addListener({ owner: {}, method: shared });
            expect(signal.removeListener(shared)).toBe(true);
            expect(signal.listenerCount).toBe(1);
            expect(signal.removeListener(() => {})).toBe(false);
        });
    });

    // -- 3. Dispatch order and arguments --
    describe("Dispatch order and arguments", () => {
        it("calls listeners in binding order with the owner as this", () => {
            const signal = new Signal(Count);
            const order: string[] = [];
            const first = new Counter();
            const second = new Counter();
            signal.addListener({
                owner: first,
                method(n: number) {
                    order.push(`first:${n}`);
                },
            });
            signal.addListener({ owner: second, method: second.add });
            signal.addListener({
                owner: first,
                method(n: number) {
                    order.push(`last:${n}`);
                },
            });

            signal.invoke(createContext(), 4);

            expect(order).toEqual(["first:4", "last:4"]);
            expect(second.total).toBe(4);
        });

        it("a throwing listener aborts the pass and propagates", () => {
            const signal = new Signal(Ping);
            const after = vi.fn();
            signal.subscribe(() => {
                throw new Error("boom");
            });
            signal.subscribe(after);
            expect(() => signal.invoke(createContext())).toThrow("boom");
            expect(after).not.toHaveBeenCalled();
            expect(signal.isDispatching).toBe(false);
        });
    });

    // -- 4. Removal while dispatching --
    describe("Removal while dispatching", () => {
        it("a binding removed mid-pass still runs in that pass and is gone afterwards", () => {
            const signal = new Signal(Ping);
            const calls: string[] = [];
            let second: ReturnType<typeof signal.addListener> | undefined;
            signal.addListener({
                owner: {},
                method: () => {
                    calls.push("a");
                    if (second) signal.removeListener(second);
                },
            });
            second = signal.addListener({ owner: {}, method: () => calls.push("b") });

            signal.invoke(createContext());
            expect(calls).toEqual(["a", "b"]);
            expect(signal.listenerCount).toBe(1);

            signal.invoke(createContext());
            expect(calls).toEqual(["a", "b", "a"]);
        });

        it("listeners added mid-pass do not run until the next pass", () => {
            const signal = new Signal(Ping);
            const late = vi.fn();
            let added = false;
            signal.subscribe(() => {
                if (!added) {
                    added = true;
                    signal.subscribe(late);
                }
            });

            signal.invoke(createContext());
            expect(late).not.toHaveBeenCalled();

            signal.invoke(createContext());
            expect(late).toHaveBeenCalledOnce();
        });

        it("removing and re-adding in the same pass keeps one live binding", () => {
            const signal = new Signal(Ping);
            const owner = {};
            const method = vi.fn();
            const binding = signal.addListener({ owner, method });
            signal.subscribe(() => {
                if (signal.removeListener(binding)) {
                    signal.addListener({ owner, method });
                }
            });

            signal.invoke(createContext());
            expect(signal.listenerCount).toBe(2);
            expect(signal.has(owner, method)).toBe(true);
        });

        it("nested dispatch defers purging to the outermost pass", () => {
            const signal = new Signal(Count);
            const seen: number[] = [];
            const context = createContext();
            signal.subscribe((n) => {
                seen.push(n);
                if (n > 0) signal.invoke(context, n - 1);
            }, ListenerCardinality.EVERY);
            signal.subscribe((n) => seen.push(n * 10), ListenerCardinality.ONCE);

            signal.invoke(context, 1);

            // Inner pass sees the ONCE binding first; the outer pass then skips it as spent.
            expect(seen).toEqual([1, 0, 0]);
            expect(context.release).toHaveBeenCalledOnce();
            expect(signal.listenerCount).toBe(1);
        });
    });

    // -- 5. ONCE bindings and dead owners --
    describe("ONCE bindings and dead owners", () => {
        it("a ONCE binding fires once and is released after the pass", () => {
            const signal = new Signal(Ping);
            const context = createContext();
            const handler = vi.fn();
            const binding = signal.addListener({ owner: {}, method: handler, cardinality: ListenerCardinality.ONCE });

            signal.invoke(context);
            signal.invoke(context);

            expect(handler).toHaveBeenCalledOnce();
            expect(context.release).toHaveBeenCalledWith(binding);
            expect(signal.bindings()).toEqual([]);
        });

        it("a ONCE binding invoked re-entrantly from itself fires once", () => {
            const signal = new Signal(Ping);
            const handler = vi.fn(() => signal.invoke(createContext()));
            signal.addListener({ owner: {}, method: handler, cardinality: ListenerCardinality.ONCE });

            signal.invoke(createContext());
            expect(handler).toHaveBeenCalledOnce();
        });

        it("dead owners are skipped, expired and purged", () => {
            const signal = new Signal(Ping);
            const dead = {};
            const alive = {};
            const deadHandler = vi.fn();
            const aliveHandler = vi.fn();
            signal.addListener({ owner: dead, method: deadHandler });
            signal.addListener({ owner: alive, method: aliveHandler });
            const context = createContext({ isAlive: vi.fn((owner: object) => owner !== dead) });

            signal.invoke(context);

            expect(deadHandler).not.toHaveBeenCalled();
            expect(aliveHandler).toHaveBeenCalledOnce();
            expect(context.expire).toHaveBeenCalledWith(dead);
            expect(signal.listenerCount).toBe(1);
            expect(signal.has(dead, deadHandler)).toBe(false);
        });
    });

    // -- 6. subscribe / dispatch --
    describe("subscribe / dispatch", () => {
        it("subscribe returns an unsubscribe function", () => {
            const signal = new Signal(Count);
            const handler = vi.fn();
            const unsubscribe = signal.subscribe(handler);

            signal.dispatch(2);
            unsubscribe();
            signal.dispatch(3);

            expect(handler).toHaveBeenCalledOnce();
            expect(handler).toHaveBeenCalledWith(2);
        });

        it("subscribing the same handler twice throws", () => {
            const signal = new Signal(Ping);
            const handler = (): void => {};
            signal.subscribe(handler);
            expect(() => signal.subscribe(handler)).toThrow(
                'Attempted to add a duplicate "handler" listener for handler on signal "Ping".',
            );
        });
    });
});
