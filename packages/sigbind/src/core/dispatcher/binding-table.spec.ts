/**
 * Contract: ListenerBindingTable -- per-owner binding bookkeeping.
 *
 * Sections:
 *   1. record / get / has
 *   2. forget / delete
 *   3. owners
 */
import { describe, expect, it } from "vitest";
import { defineSignal } from "../signal/helpers";
import { Signal } from "../signal/signal";
import type { BindingEntry } from "./binding-table";
import { ListenerBindingTable } from "./binding-table";

const Tick = defineSignal("Tick", [], { catalog: null });

function entryFor(signal: Signal, owner: object): BindingEntry {
    const binding = signal.addListener({ owner, method: function onTick(): void {} });
    return { signal, binding };
}

describe("ListenerBindingTable", () => {
    // -- 1. record / get / has --
    it("records entries per owner and appends on later records", () => {
        const table = new ListenerBindingTable();
        const signal = new Signal(Tick);
        const owner = {};
        const first = entryFor(signal, owner);
        const second = entryFor(signal, owner);

        table.record(owner, [first]);
        table.record(owner, [second]);

        expect(table.get(owner)).toEqual([first, second]);
        expect(table.has(owner)).toBe(true);
        expect(table.owners()).toEqual([owner]);
    });

    it("ignores empty records", () => {
        const table = new ListenerBindingTable();
        const owner = {};
        table.record(owner, []);
        expect(table.has(owner)).toBe(false);
        expect(table.get(owner)).toEqual([]);
    });

    // -- 2. forget / delete --
    it("forget drops one binding and the owner once empty", () => {
        const table = new ListenerBindingTable();
        const signal = new Signal(Tick);
        const owner = {};
        const first = entryFor(signal, owner);
        const second = entryFor(signal, owner);
        table.record(owner, [first, second]);

        table.forget(owner, first.binding);
        expect(table.get(owner)).toEqual([second]);

        table.forget(owner, second.binding);
        expect(table.has(owner)).toBe(false);
        expect(table.owners()).toEqual([]);
    });

    it("delete returns the removed entries", () => {
        const table = new ListenerBindingTable();
        const signal = new Signal(Tick);
        const owner = {};
        const entry = entryFor(signal, owner);
        table.record(owner, [entry]);

        expect(table.delete(owner)).toEqual([entry]);
        expect(table.delete(owner)).toEqual([]);
    });

    // -- 3. owners --
    it("owners lists owners in record order until they are deleted", () => {
        const table = new ListenerBindingTable();
        const signal = new Signal(Tick);
        const a = {};
        const b = {};
        table.record(a, [entryFor(signal, a)]);
        table.record(b, [entryFor(signal, b)]);

        expect(table.owners()).toEqual([a, b]);
        table.delete(a);
        expect(table.owners()).toEqual([b]);
        expect(table.has(a)).toBe(false);
    });
});
