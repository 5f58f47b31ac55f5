export const ERROR_CODES = {
  NO_ACTIVE_PROGRAM: "NO_ACTIVE_PROGRAM",
  SNAPSHOT_NOT_JSON: "SNAPSHOT_NOT_JSON",
  MALFORMED_SNAPSHOT: "MALFORMED_SNAPSHOT",
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  INVALID_BATCH_INPUT: "INVALID_BATCH_INPUT",
  UNSUPPORTED_ACTION_TYPE: "UNSUPPORTED_ACTION_TYPE",
  ANALYSIS_UNAVAILABLE: "ANALYSIS_UNAVAILABLE",
  ANALYSIS_TIMEOUT: "ANALYSIS_TIMEOUT",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface CoreErrorShape {
  code: ErrorCode;
  message: string;
  cause?: unknown;
}
