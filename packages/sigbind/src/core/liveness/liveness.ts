import type { LivenessOracle } from "./types";

/** Every owner is alive until it is unbound. */
export const alwaysAlive: LivenessOracle = {
    isAlive: () => true,
};

export function createLivenessOracle(predicate: (owner: object) => boolean): LivenessOracle {
    return { isAlive: (owner) => predicate(owner) };
}

/**
 * Owners exposing `isDestroyed(): boolean` are dead once it returns true.
 * Owners without the method are always alive.
 */
export const destroyedFlagOracle: LivenessOracle = {
    isAlive(owner) {
        const isDestroyed: unknown = Reflect.get(owner, "isDestroyed");
        if (typeof isDestroyed !== "function") return true;
        return Reflect.apply(isDestroyed, owner, []) !== true;
    },
};

/** Explicit lifecycle: owners are alive until {@link markDestroyed} is called. */
export class LifecycleTracker implements LivenessOracle {
    private readonly destroyed = new WeakSet<object>();

    markDestroyed(owner: object): void {
        this.destroyed.add(owner);
    }

    isAlive(owner: object): boolean {
        return !this.destroyed.has(owner);
    }
}
