import { defaultSignalCatalog, type SignalCatalog } from "../catalog/catalog";
import { SignatureMismatchError, UnregisteredSignalError } from "../errors/errors";
import { ownerName } from "../errors/helpers";
import { DeclaredListenerDiscovery } from "../listener/discovery";
import type { ListenerDiscovery } from "../listener/types";
import { alwaysAlive } from "../liveness/liveness";
import type { LivenessOracle } from "../liveness/types";
import { createConsoleHandler } from "../logger/console-handler";
import { Logger } from "../logger/logger";
import { validateArguments } from "../params/validate";
import { RegistryMode } from "../registry/enums";
import { createRegistry } from "../registry/helpers";
import type { SignalRegistry } from "../registry/registry";
import type { Signal } from "../signal/signal";
import type { DispatchContext, SignalKind } from "../signal/types";
import { type BindingEntry, ListenerBindingTable } from "./binding-table";
import type { DispatcherConfig } from "./types";

const LOG_CODE = "SignalDispatcher";

/**
 * Binds objects' declared listeners to the signals of the active registry and
 * dispatches invocations to them.
 *
 * Unbinding while a dispatch is running is deferred until the dispatch ends.
 * The dispatching state is a single flag, so a nested `invoke()` made from a
 * listener clears it (and drains deferred unbinds) before the outer dispatch
 * finishes. Signals defer their own removals, so the outer pass is unaffected.
 */
export class SignalDispatcher {
    readonly logger: Logger;

    private active: SignalRegistry | null = null;
    private dispatching = false;
    private readonly table = new ListenerBindingTable();
    private readonly pendingUnbinds = new Set<object>();
    private readonly catalog: SignalCatalog;
    private readonly liveness: LivenessOracle;
    private readonly discovery: ListenerDiscovery;
    private readonly context: DispatchContext;

    constructor(config: DispatcherConfig = {}) {
        this.catalog = config.catalog ?? defaultSignalCatalog;
        this.liveness = config.liveness ?? alwaysAlive;
        this.discovery = config.discovery ?? new DeclaredListenerDiscovery();

        this.logger = new Logger(config.logger?.level ?? "warn");
        if (config.logger?.console !== false) {
            this.logger.addHandler(createConsoleHandler());
        }
        for (const handler of config.logger?.handlers ?? []) {
            this.logger.addHandler(handler);
        }

        this.context = {
            isAlive: (owner) => this.isAlive(owner),
            expire: (owner) => this.expire(owner),
            release: (binding) => this.table.forget(binding.owner, binding),
        };

        if (config.registry !== undefined) {
            this.setRegistry(config.registry);
        }
    }

    get registry(): SignalRegistry | null {
        return this.active;
    }

    get isDispatching(): boolean {
        return this.dispatching;
    }

    /**
     * Replace the active registry. Every bound owner is unbound first.
     * Without an argument an AUTOMATIC registry over the dispatcher's catalog is created.
     */
    setRegistry(registry?: SignalRegistry | null): void {
        if (this.active) {
            this.unbindAll();
        }

        const next = registry ?? createRegistry({ mode: RegistryMode.AUTOMATIC, catalog: this.catalog });
        next.populate();
        this.active = next;
        this.logger.debug(LOG_CODE, "Registry installed", { mode: next.mode, signals: next.size });
    }

    getSignal<TArgs extends unknown[]>(kind: SignalKind<TArgs>): Signal<TArgs> | null {
        return this.active?.get(kind) ?? null;
    }

    /**
     * Bind every declared listener of `owner`.
     *
     * All declarations are checked before anything is bound; if adding a
     * binding fails, the ones already added for this call are removed again.
     *
     * @throws {UnregisteredSignalError} A declared signal is not in the active registry.
     * @throws {SignatureMismatchError} A method's parameter count differs from its signal's.
     * @throws {DuplicateListenerError} The owner is already bound.
     */
    bind(owner: object): void {
        const planned = this.discovery.resolve(owner).map((listener) => {
            const signal = this.active?.get(listener.kind) ?? null;
            if (!signal) {
                throw new UnregisteredSignalError(listener.kind.id, ownerName(owner));
            }
            if (listener.method.length !== signal.parameterCount) {
                throw new SignatureMismatchError(
                    signal.id,
                    listener.name,
                    signal.parameterCount,
                    listener.method.length,
                );
            }
            return { signal, listener };
        });

        const added: BindingEntry[] = [];
        try {
            for (const { signal, listener } of planned) {
                const binding = signal.addListener({
                    owner,
                    method: listener.method,
                    name: listener.name,
                    cardinality: listener.cardinality,
                });
                added.push({ signal, binding });
            }
        } catch (error) {
            for (const { signal, binding } of added) {
                signal.removeListener(binding);
            }
            throw error;
        }

        this.table.record(owner, added);
        this.logger.debug(LOG_CODE, "Owner bound", { owner, bindings: added.length });
    }

    /** Remove every binding of `owner`. Deferred while dispatching; no-op for unknown owners. */
    unbind(owner: object): void {
        if (this.dispatching) {
            if (!this.pendingUnbinds.has(owner)) {
                this.pendingUnbinds.add(owner);
                this.logger.debug(LOG_CODE, "Unbind deferred until dispatch ends", { owner });
            }
            return;
        }
        this.detach(owner);
    }

    /** Unbind every owner immediately, even while dispatching. */
    unbindAll(): void {
        this.pendingUnbinds.clear();
        for (const owner of this.table.owners()) {
            this.detach(owner);
        }
    }

    isBound(owner: object): boolean {
        return this.table.has(owner);
    }

    bindingsOf(owner: object): readonly BindingEntry[] {
        return this.table.get(owner);
    }

    /**
     * Validate `args` against `kind` and call its listeners in bind order.
     *
     * @throws {UnregisteredSignalError} `kind` is not in the active registry.
     * @throws {ArityMismatchError | TypeMismatchError} The arguments do not match the signal.
     */
    invoke<TArgs extends unknown[]>(kind: SignalKind<TArgs>, ...args: TArgs): void {
        this.dispatch(() => {
            const signal = this.getSignal(kind);
            if (!signal) {
                throw new UnregisteredSignalError(kind.id);
            }
            validateArguments(signal.id, signal.kind.params, args);
            signal.invoke(this.context, ...args);
        });
    }

    /** Same as {@link invoke}, looking the signal up by id. */
    invokeById(id: string, ...args: unknown[]): void {
        this.dispatch(() => {
            const signal = this.active?.getById(id) ?? null;
            if (!signal) {
                throw new UnregisteredSignalError(id);
            }
            validateArguments(signal.id, signal.kind.params, args);
            signal.invoke(this.context, ...args);
        });
    }

    private dispatch(run: () => void): void {
        this.dispatching = true;
        try {
            run();
        } finally {
            this.dispatching = false;
            this.drainPendingUnbinds();
        }
    }

    private drainPendingUnbinds(): void {
        for (const owner of [...this.pendingUnbinds]) {
            this.pendingUnbinds.delete(owner);
            this.detach(owner);
        }
    }

    private detach(owner: object): void {
        const entries = this.table.delete(owner);
        if (entries.length === 0) return;

        for (const { signal, binding } of entries) {
            signal.removeListener(binding);
        }
        this.logger.debug(LOG_CODE, "Owner unbound", { owner, bindings: entries.length });
    }

    private isAlive(owner: object): boolean {
        try {
            return this.liveness.isAlive(owner);
        } catch (error) {
            this.logger.warn(LOG_CODE, "Liveness check failed, treating owner as gone", {
                owner,
                error: error instanceof Error ? error.message : String(error),
            });
            return false;
        }
    }

    private expire(owner: object): void {
        if (this.table.has(owner) && !this.pendingUnbinds.has(owner)) {
            this.logger.debug(LOG_CODE, "Owner is gone, purging its bindings", { owner });
        }
        this.unbind(owner);
    }
}
