import { defaultSignalCatalog } from "../catalog/catalog";
import { RegistryModeError, SignalIdConflictError } from "../errors/errors";
import { Signal } from "../signal/signal";
import type { SignalKind, SignalKindInstance } from "../signal/types";
import { RegistryMode } from "./enums";
import type { RegistryConfig } from "./types";

/**
 * Maps each registered signal kind to exactly one {@link Signal}.
 *
 * Kind ids are unique within a registry so that {@link getById} is unambiguous.
 */
export class SignalRegistry {
    private readonly signals = new Map<SignalKindInstance, Signal>();
    private readonly byId = new Map<string, Signal>();
    private populated = false;

    constructor(private readonly config: RegistryConfig) {}

    get mode(): RegistryMode {
        return this.config.mode;
    }

    get size(): number {
        return this.signals.size;
    }

    /**
     * Register `kind`, creating its Signal if absent.
     * @throws {SignalIdConflictError} If another kind already uses the same id.
     */
    register<TArgs extends unknown[]>(kind: SignalKind<TArgs>): Signal<TArgs> {
        const existing = this.get(kind);
        if (existing) return existing;

        if (this.byId.has(kind.id)) {
            throw new SignalIdConflictError(kind.id);
        }

        const signal = new Signal(kind);
        this.signals.set(kind, signal);
        this.byId.set(kind.id, signal);
        return signal;
    }

    get<TArgs extends unknown[]>(kind: SignalKind<TArgs>): Signal<TArgs> | null {
        const signal = this.byId.get(kind.id);
        if (signal?.is(kind)) return signal;
        return null;
    }

    getById(id: string): Signal | null {
        return this.byId.get(id) ?? null;
    }

    has(kind: SignalKindInstance): boolean {
        return this.signals.has(kind);
    }

    list(): Signal[] {
        return [...this.signals.values()];
    }

    /**
     * Register every non-builtin kind in the catalog.
     * Nothing is registered if any kind conflicts.
     * @throws {RegistryModeError} On a MANUAL registry.
     */
    discoverAndRegister(): void {
        if (this.config.mode !== RegistryMode.AUTOMATIC) {
            throw new RegistryModeError("discoverAndRegister() is only available on AUTOMATIC registries");
        }
        const catalog = this.config.catalog ?? defaultSignalCatalog;
        this.registerAll(catalog.list());
    }

    /**
     * Fill the registry according to its mode. Later calls are no-ops once
     * population has succeeded; a failed population leaves the registry
     * unchanged and can be retried.
     */
    populate(): void {
        if (this.populated) return;

        if (this.config.mode === RegistryMode.AUTOMATIC) {
            this.discoverAndRegister();
        } else {
            this.registerAll(this.config.signals ?? []);
            this.config.onRegister?.(this);
        }
        this.populated = true;
    }

    private registerAll(kinds: readonly SignalKindInstance[]): void {
        const claimed = new Map<string, SignalKindInstance>();
        for (const kind of kinds) {
            const owner = claimed.get(kind.id);
            const existing = this.byId.get(kind.id);
            if ((owner && owner !== kind) || (existing && !existing.is(kind))) {
                throw new SignalIdConflictError(kind.id);
            }
            claimed.set(kind.id, kind);
        }
        for (const kind of kinds) {
            this.register(kind);
        }
    }
}
