// ── Signals ─────────────────────────────────────────────────────────
export { ListenerCardinality } from "./core/signal/enums";
export { defineSignal, isSignalKind } from "./core/signal/helpers";
export type { SignalOptions } from "./core/signal/helpers";
export { Signal } from "./core/signal/signal";
export type {
    DispatchContext,
    DynamicListener,
    ListenerBinding,
    ListenerMethod,
    ListenerSpec,
    SignalArgs,
    SignalKind,
    SignalKindInstance,
} from "./core/signal/types";
// ── Parameters ──────────────────────────────────────────────────────
export { typeName } from "./core/params/helpers";
export { param } from "./core/params/params";
export type { ParamType, ParamValue } from "./core/params/types";
export { validateArguments } from "./core/params/validate";
// ── Catalog ─────────────────────────────────────────────────────────
export { defaultSignalCatalog, isReservedId, RESERVED_NAMESPACE, SignalCatalog } from "./core/catalog/catalog";
// ── Registry ────────────────────────────────────────────────────────
export { RegistryMode } from "./core/registry/enums";
export { createRegistry } from "./core/registry/helpers";
export { SignalRegistry } from "./core/registry/registry";
export type { AutomaticRegistryConfig, ManualRegistryConfig, RegistryConfig } from "./core/registry/types";
// ── Listeners ───────────────────────────────────────────────────────
export { defaultListenerCatalog, ListenerCatalog } from "./core/listener/catalog";
export { DeclaredListenerDiscovery } from "./core/listener/discovery";
export { declareListeners } from "./core/listener/helpers";
export type {
    ListenerClass,
    ListenerDeclaration,
    ListenerDeclarationBuilder,
    ListenerDiscovery,
    ListenerKey,
    ResolvedListener,
} from "./core/listener/types";
// ── Liveness ────────────────────────────────────────────────────────
export { alwaysAlive, createLivenessOracle, destroyedFlagOracle, LifecycleTracker } from "./core/liveness/liveness";
export type { LivenessOracle } from "./core/liveness/types";
// ── Dispatcher ──────────────────────────────────────────────────────
export type { BindingEntry } from "./core/dispatcher/binding-table";
export { ListenerBindingTable } from "./core/dispatcher/binding-table";
export { SignalDispatcher } from "./core/dispatcher/dispatcher";
export { createDispatcher } from "./core/dispatcher/helpers";
export type { DispatcherConfig, DispatcherLoggerConfig } from "./core/dispatcher/types";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { LogDetails, LogEntry, LogHandler, LogLevel } from "./core/logger/types";
export type { LoggerContext } from "./core/types";
// ── Errors ──────────────────────────────────────────────────────────
export { ErrorCode } from "./core/errors/enums";
export {
    ArityMismatchError,
    DuplicateListenerError,
    InvalidSignalDefinitionError,
    ListenerDeclarationError,
    NullArgumentError,
    RegistryModeError,
    SignalError,
    SignalIdConflictError,
    SignatureMismatchError,
    TypeMismatchError,
    UnregisteredSignalError,
} from "./core/errors/errors";
