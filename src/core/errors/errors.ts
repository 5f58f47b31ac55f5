import { ERROR_CODES, type CoreErrorShape, type ErrorCode } from "./canonical_error_codes";

export class CoreError extends Error implements CoreErrorShape {
  readonly code: ErrorCode;
  readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(`${code} ${message}`);
    this.name = "CoreError";
    this.code = code;
    this.cause = options?.cause;
  }
}

export class NoActiveProgramError extends CoreError {
  readonly kind = "NoActiveProgram";

  constructor(message = "no active program is bound to the session") {
    super(ERROR_CODES.NO_ACTIVE_PROGRAM, message);
    this.name = "NoActiveProgramError";
  }
}

export class SnapshotParseError extends CoreError {
  readonly kind = "SnapshotParse";

  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.SNAPSHOT_NOT_JSON, message, options);
    this.name = "SnapshotParseError";
  }
}

export class MalformedSnapshotError extends CoreError {
  readonly kind = "MalformedSnapshot";

  constructor(message: string) {
    super(ERROR_CODES.MALFORMED_SNAPSHOT, message);
    this.name = "MalformedSnapshotError";
  }
}

export class InvalidArgumentError extends CoreError {
  readonly kind = "InvalidArgument";
  readonly field: string;

  constructor(field: string, message: string) {
    super(ERROR_CODES.INVALID_ARGUMENT, `${field}: ${message}`);
    this.name = "InvalidArgumentError";
    this.field = field;
  }
}

export class InvalidBatchInputError extends CoreError {
  readonly kind = "InvalidBatchInput";

  constructor(message: string) {
    super(ERROR_CODES.INVALID_BATCH_INPUT, message);
    this.name = "InvalidBatchInputError";
  }
}

export class UnsupportedActionTypeError extends CoreError {
  readonly kind = "UnsupportedActionType";
  readonly actionType: string | null;

  constructor(actionType: string | null) {
    super(ERROR_CODES.UNSUPPORTED_ACTION_TYPE, `unsupported batch action type: ${String(actionType)}`);
    this.name = "UnsupportedActionTypeError";
    this.actionType = actionType;
  }
}

export class AnalysisUnavailableError extends CoreError {
  readonly kind = "AnalysisUnavailable";

  constructor(analysis: string) {
    super(ERROR_CODES.ANALYSIS_UNAVAILABLE, `analysis '${analysis}' is not provided by the bound engine`);
    this.name = "AnalysisUnavailableError";
  }
}

export class AnalysisTimeoutError extends CoreError {
  readonly kind = "AnalysisTimeout";
  readonly seconds: number;

  constructor(seconds: number) {
    super(ERROR_CODES.ANALYSIS_TIMEOUT, `operation timed out after ${seconds} seconds`);
    this.name = "AnalysisTimeoutError";
    this.seconds = seconds;
  }
}

export class ConfigurationError extends CoreError {
  readonly kind = "ConfigurationError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.CONFIGURATION_ERROR, message, options);
    this.name = "ConfigurationError";
  }
}
