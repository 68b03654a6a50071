export class DispatchError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "DispatchError";
  }
}

export class ConfigError extends DispatchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DiscoveryError extends DispatchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DiscoveryError";
  }
}

export class PipelineConfigError extends DispatchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PipelineConfigError";
  }
}

export class WorkDirError extends DispatchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "WorkDirError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  discovery: "DISCOVERY_ERROR",
  dispatch: "DISPATCH_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, { cause: input.cause });
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
