import type { Signal } from "../signal/signal";
import type { ListenerBinding } from "../signal/types";

export type BindingEntry = {
    signal: Signal;
    binding: ListenerBinding;
};

type OwnerRecord = {
    ref: WeakRef<object>;
    entries: BindingEntry[];
};

/**
 * Owner → (signal, binding) entries created by `bind()`.
 *
 * Owners are held weakly: the table never keeps an owner alive, and owners
 * that have been collected drop out of {@link owners}.
 */
export class ListenerBindingTable {
    private readonly records = new WeakMap<object, OwnerRecord>();
    private readonly refs = new Set<WeakRef<object>>();

    record(owner: object, entries: readonly BindingEntry[]): void {
        if (entries.length === 0) return;

        const existing = this.records.get(owner);
        if (existing) {
            existing.entries.push(...entries);
            return;
        }
        const ref = new WeakRef(owner);
        this.records.set(owner, { ref, entries: [...entries] });
        this.refs.add(ref);
    }

    get(owner: object): readonly BindingEntry[] {
        return this.records.get(owner)?.entries ?? [];
    }

    has(owner: object): boolean {
        return this.records.has(owner);
    }

    /** Drop a single binding, and the owner with it once nothing is left. */
    forget(owner: object, binding: ListenerBinding): void {
        const record = this.records.get(owner);
        if (!record) return;

        const index = record.entries.findIndex((entry) => entry.binding === binding);
        if (index !== -1) record.entries.splice(index, 1);
        if (record.entries.length === 0) this.delete(owner);
    }

    /** Remove the owner and return the entries it had. */
    delete(owner: object): BindingEntry[] {
        const record = this.records.get(owner);
        if (!record) return [];

        this.records.delete(owner);
        this.refs.delete(record.ref);
        return record.entries;
    }

    /** Owners still reachable, in bind order. */
    owners(): object[] {
        const owners: object[] = [];
        for (const ref of this.refs) {
            const owner = ref.deref();
            if (owner === undefined) {
                this.refs.delete(ref);
            } else {
                owners.push(owner);
            }
        }
        return owners;
    }
}
