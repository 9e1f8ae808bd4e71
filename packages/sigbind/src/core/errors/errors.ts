import { ErrorCode } from "./enums";
import { ordinal } from "./helpers";

/**
 * Base class of every error raised by sigbind itself.
 *
 * Errors thrown from inside a listener are never wrapped, so
 * `err instanceof SignalError` separates dispatcher diagnostics from listener bugs.
 */
export class SignalError extends Error {
    constructor(
        readonly code: ErrorCode,
        message: string,
    ) {
        super(message);
        this.name = new.target.name;
    }
}

/** The signal kind has no Signal in the active registry. */
export class UnregisteredSignalError extends SignalError {
    constructor(
        readonly signalId: string,
        readonly owner?: string,
    ) {
        super(
            ErrorCode.UNREGISTERED_SIGNAL,
            owner === undefined
                ? `Signal "${signalId}" is not registered with the active registry. Register it before invoking it.`
                : `Unable to bind listeners for an instance of "${owner}": signal "${signalId}" is not registered with the active registry.`,
        );
    }
}

export class ArityMismatchError extends SignalError {
    constructor(
        readonly signalId: string,
        readonly expected: number,
        readonly provided: number,
    ) {
        super(
            ErrorCode.ARITY_MISMATCH,
            `Incorrect number of arguments passed to invoke("${signalId}"). Expected ${expected} argument(s) but received ${provided}.`,
        );
    }
}

/** An argument is not accepted by its parameter type. `position` is 1-based. */
export class TypeMismatchError extends SignalError {
    constructor(
        readonly signalId: string,
        readonly position: number,
        readonly expected: string,
        readonly found: string,
        code: ErrorCode = ErrorCode.TYPE_MISMATCH,
        reason = "does not match the signal definition",
    ) {
        super(
            code,
            `Incorrect argument type passed to invoke("${signalId}"). Expected "${expected}" but found "${found}": the ${ordinal(position)} argument ${reason}.`,
        );
    }
}

/** `null` or `undefined` was passed for a parameter that is not nullable. */
export class NullArgumentError extends TypeMismatchError {
    constructor(signalId: string, position: number, expected: string, found: "null" | "undefined") {
        super(signalId, position, expected, found, ErrorCode.NULL_ARGUMENT, "is not nullable");
    }
}

export class DuplicateListenerError extends SignalError {
    constructor(
        readonly signalId: string,
        readonly owner: string,
        readonly listener: string,
    ) {
        super(
            ErrorCode.DUPLICATE_LISTENER,
            `Attempted to add a duplicate "${listener}" listener for ${owner} on signal "${signalId}".`,
        );
    }
}

/** A listener method declares a different number of parameters than its signal. */
export class SignatureMismatchError extends SignalError {
    constructor(
        readonly signalId: string,
        readonly listener: string,
        readonly expected: number,
        readonly found: number,
    ) {
        super(
            ErrorCode.SIGNATURE_MISMATCH,
            `Incorrect number of parameters on listener "${listener}" bound to signal "${signalId}". Expected ${expected} parameter(s) but found ${found}.`,
        );
    }
}

export class ListenerDeclarationError extends SignalError {
    constructor(message: string) {
        super(ErrorCode.INVALID_LISTENER, message);
    }
}

export class SignalIdConflictError extends SignalError {
    constructor(readonly signalId: string) {
        super(
            ErrorCode.SIGNAL_ID_CONFLICT,
            `Signal id "${signalId}" is already registered by a different signal definition.`,
        );
    }
}

export class RegistryModeError extends SignalError {
    constructor(message: string) {
        super(ErrorCode.REGISTRY_MODE, message);
    }
}

export class InvalidSignalDefinitionError extends SignalError {
    constructor(message: string) {
        super(ErrorCode.INVALID_SIGNAL, message);
    }
}
