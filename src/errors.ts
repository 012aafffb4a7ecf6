export class SpoilerGuardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SpoilerGuardError';
  }
}

/** Reading or writing the persisted configuration failed. */
export class ConfigIOError extends SpoilerGuardError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`config io failed (${path}): ${describeError(cause)}`);
    this.name = 'ConfigIOError';
    this.path = path;
  }
}

export class PermissionDeniedError extends SpoilerGuardError {
  constructor(message: string) {
    super(message);
    this.name = 'PermissionDeniedError';
  }
}

/** Malformed input; `message` is shown to the user as-is. */
export class ValidationError extends SpoilerGuardError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class RepublishError extends SpoilerGuardError {
  readonly step: 'delete' | 'send';

  constructor(step: 'delete' | 'send', cause: unknown) {
    super(`republish failed at ${step}: ${describeError(cause)}`);
    this.name = 'RepublishError';
    this.step = step;
  }
}

/** Another process is polling updates with the same bot token. */
export class DuplicateInstanceError extends SpoilerGuardError {
  constructor(detail: string) {
    super(`another instance is using this bot token: ${detail}`);
    this.name = 'DuplicateInstanceError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
