import { ERROR_CODES } from "../../core/errors/canonical_error_codes";
import { CoreError } from "../../core/errors/errors";
import { ERROR_POLICY_REGISTRY, type ErrorMetadata } from "./error_policy_registry";

export const INTERNAL_ERROR_MESSAGE = `${ERROR_CODES.INTERNAL_ERROR} internal error`;

/** Anything that is not already a CoreError is wrapped as INTERNAL_ERROR. */
export function toToolError(error: unknown): CoreError {
  if (error instanceof CoreError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CoreError(ERROR_CODES.INTERNAL_ERROR, message, { cause: error });
}

export function policyFor(error: CoreError): ErrorMetadata {
  return ERROR_POLICY_REGISTRY[error.code];
}

/** The message a client may see; internal details stay in the logs. */
export function publicMessageOf(error: CoreError): string {
  return policyFor(error).publicMessage === "Y" ? error.message : INTERNAL_ERROR_MESSAGE;
}
