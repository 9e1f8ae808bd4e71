import { SignalDispatcher } from "./dispatcher";
import type { DispatcherConfig } from "./types";

/**
 * Create a dispatcher. Pass `registry: null` to install an automatic registry
 * right away; leave it out to install one later with `setRegistry()`.
 */
export function createDispatcher(config: DispatcherConfig = {}): SignalDispatcher {
    return new SignalDispatcher(config);
}
