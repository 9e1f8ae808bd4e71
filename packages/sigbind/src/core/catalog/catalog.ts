import type { SignalKindInstance } from "../signal/types";

/** Namespace prefix reserved for built-in signals, e.g. `sigbind:ready`. */
export const RESERVED_NAMESPACE = "sigbind";

export function isReservedId(id: string): boolean {
    return id.startsWith(`${RESERVED_NAMESPACE}:`);
}

/**
 * Every signal kind defined in the process, in definition order.
 *
 * Automatic registries enumerate a catalog instead of scanning loaded code.
 */
export class SignalCatalog {
    private readonly kinds: SignalKindInstance[] = [];

    add(kind: SignalKindInstance): void {
        if (!this.has(kind)) {
            this.kinds.push(kind);
        }
    }

    has(kind: SignalKindInstance): boolean {
        return this.kinds.includes(kind);
    }

    list(options: { includeBuiltin?: boolean } = {}): SignalKindInstance[] {
        if (options.includeBuiltin) return [...this.kinds];
        return this.kinds.filter((kind) => !kind.builtin);
    }

    get size(): number {
        return this.kinds.length;
    }
}

/** Catalog that {@link defineSignal} records into unless told otherwise. */
export const defaultSignalCatalog = new SignalCatalog();
