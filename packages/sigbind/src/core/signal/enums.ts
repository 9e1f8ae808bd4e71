export enum ListenerCardinality {
    /** Fires on every invocation until unbound. */
    EVERY = "every",
    /** Removed after its first invocation. */
    ONCE = "once",
}
