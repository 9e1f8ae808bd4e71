import type { SignalCatalog } from "../catalog/catalog";
import type { SignalKindInstance } from "../signal/types";
import type { RegistryMode } from "./enums";
import type { SignalRegistry } from "./registry";

export type AutomaticRegistryConfig = {
    mode: RegistryMode.AUTOMATIC;
    /** Defaults to `defaultSignalCatalog`. */
    catalog?: SignalCatalog;
};

export type ManualRegistryConfig = {
    mode: RegistryMode.MANUAL;
    signals?: readonly SignalKindInstance[];
    /** Called once by `populate()`, after `signals` are registered. */
    onRegister?: (registry: SignalRegistry) => void;
};

export type RegistryConfig = AutomaticRegistryConfig | ManualRegistryConfig;
