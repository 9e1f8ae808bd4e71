import type { SignalCatalog } from "../catalog/catalog";
import type { ListenerDiscovery } from "../listener/types";
import type { LivenessOracle } from "../liveness/types";
import type { LogHandler, LogLevel } from "../logger/types";
import type { SignalRegistry } from "../registry/registry";

export type DispatcherLoggerConfig = {
    /** Extra handlers, added after the console handler. */
    handlers?: LogHandler[];
    /** Print to the console. Default: true. */
    console?: boolean;
    /** Minimum level. Default: "warn". */
    level?: LogLevel;
};

export type DispatcherConfig = {
    /** Installed at construction when present; `null` installs an automatic registry. */
    registry?: SignalRegistry | null;
    /** Catalog for registries the dispatcher creates itself. Default: `defaultSignalCatalog`. */
    catalog?: SignalCatalog;
    /** Default: `alwaysAlive`. */
    liveness?: LivenessOracle;
    /** Default: a `DeclaredListenerDiscovery` over `defaultListenerCatalog`. */
    discovery?: ListenerDiscovery;
    logger?: DispatcherLoggerConfig;
};
