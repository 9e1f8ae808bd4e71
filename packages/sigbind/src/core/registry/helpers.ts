import { RegistryMode } from "./enums";
import { SignalRegistry } from "./registry";
import type { RegistryConfig } from "./types";

/**
 * Create an unpopulated registry. Installing it with
 * `dispatcher.setRegistry()` populates it.
 *
 * @example
 * const registry = createRegistry({ mode: RegistryMode.MANUAL, signals: [Ping, Move] });
 */
export function createRegistry(config: RegistryConfig = { mode: RegistryMode.AUTOMATIC }): SignalRegistry {
    return new SignalRegistry(config);
}
