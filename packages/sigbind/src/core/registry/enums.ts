export enum RegistryMode {
    /** Registers every non-builtin kind in a {@link SignalCatalog}. */
    AUTOMATIC = "automatic",
    /** Registers only the kinds it is given. */
    MANUAL = "manual",
}
