export enum ErrorCode {
    UNREGISTERED_SIGNAL = "unregistered-signal",
    ARITY_MISMATCH = "arity-mismatch",
    TYPE_MISMATCH = "type-mismatch",
    NULL_ARGUMENT = "null-argument",
    DUPLICATE_LISTENER = "duplicate-listener",
    SIGNATURE_MISMATCH = "signature-mismatch",
    INVALID_LISTENER = "invalid-listener",
    SIGNAL_ID_CONFLICT = "signal-id-conflict",
    REGISTRY_MODE = "registry-mode",
    INVALID_SIGNAL = "invalid-signal",
}
