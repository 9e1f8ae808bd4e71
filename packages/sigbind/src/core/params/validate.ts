import { ArityMismatchError, NullArgumentError, TypeMismatchError } from "../errors/errors";
import { typeName } from "./helpers";
import type { ParamType } from "./types";

/**
 * Check an argument list against a signal's parameter types.
 *
 * @throws {ArityMismatchError} If the argument count differs from the parameter count.
 * @throws {NullArgumentError} If `null`/`undefined` is passed for a non-nullable parameter.
 * @throws {TypeMismatchError} If a value is not accepted by its parameter type.
 */
export function validateArguments(signalId: string, params: readonly ParamType[], args: readonly unknown[]): void {
    if (args.length !== params.length) {
        throw new ArityMismatchError(signalId, params.length, args.length);
    }

    params.forEach((param, i) => {
        const value = args[i];
        if (value === null || value === undefined) {
            if (!param.nullable) {
                throw new NullArgumentError(signalId, i + 1, param.name, value === null ? "null" : "undefined");
            }
            return;
        }
        if (!param.accepts(value)) {
            throw new TypeMismatchError(signalId, i + 1, param.name, typeName(value));
        }
    });
}
