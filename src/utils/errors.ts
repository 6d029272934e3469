/** Ends the run with exit status 1 before any report body is printed. */
export class FatalPreconditionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FatalPreconditionError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/** A converter process could not be started at all (as opposed to exiting non-zero). */
export class ToolInvocationError extends Error {
  constructor(
    message: string,
    readonly command: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ToolInvocationError';
  }
}

export function isFatalError(error: unknown): error is FatalPreconditionError | ConfigurationError {
  return error instanceof FatalPreconditionError || error instanceof ConfigurationError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function truncateDetail(detail: string, limit: number): string {
  const trimmed = detail.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}
