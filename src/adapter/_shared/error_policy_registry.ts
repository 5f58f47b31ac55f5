import { ERROR_CODES, type ErrorCode } from "../../core/errors/canonical_error_codes";

export interface ErrorMetadata {
  publicMessage: "Y" | "N";
  httpStatus: number;
  cliExitCode: number;
  retryable: boolean;
}

export const ERROR_POLICY_REGISTRY = {
  [ERROR_CODES.NO_ACTIVE_PROGRAM]: {
    publicMessage: "Y",
    httpStatus: 409,
    cliExitCode: 3,
    retryable: true,
  },
  [ERROR_CODES.SNAPSHOT_NOT_JSON]: {
    publicMessage: "Y",
    httpStatus: 400,
    cliExitCode: 1,
    retryable: false,
  },
  [ERROR_CODES.MALFORMED_SNAPSHOT]: {
    publicMessage: "Y",
    httpStatus: 422,
    cliExitCode: 1,
    retryable: false,
  },
  [ERROR_CODES.INVALID_ARGUMENT]: {
    publicMessage: "Y",
    httpStatus: 400,
    cliExitCode: 1,
    retryable: false,
  },
  [ERROR_CODES.INVALID_BATCH_INPUT]: {
    publicMessage: "Y",
    httpStatus: 400,
    cliExitCode: 1,
    retryable: false,
  },
  [ERROR_CODES.UNSUPPORTED_ACTION_TYPE]: {
    publicMessage: "Y",
    httpStatus: 400,
    cliExitCode: 1,
    retryable: false,
  },
  [ERROR_CODES.ANALYSIS_UNAVAILABLE]: {
    publicMessage: "Y",
    httpStatus: 501,
    cliExitCode: 1,
    retryable: false,
  },
  [ERROR_CODES.ANALYSIS_TIMEOUT]: {
    publicMessage: "Y",
    httpStatus: 504,
    cliExitCode: 4,
    retryable: true,
  },
  [ERROR_CODES.CONFIGURATION_ERROR]: {
    publicMessage: "Y",
    httpStatus: 400,
    cliExitCode: 64,
    retryable: false,
  },
  [ERROR_CODES.INTERNAL_ERROR]: {
    publicMessage: "N",
    httpStatus: 500,
    cliExitCode: 2,
    retryable: false,
  },
} satisfies Record<ErrorCode, ErrorMetadata>;
