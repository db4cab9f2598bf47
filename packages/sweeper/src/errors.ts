class ConfigError extends Error {
  readonly code = 'config' as const;
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid configuration "${path}": ${message}`);
    this.name = 'ConfigError';
    this.path = path;
  }
}

class AuthError extends Error {
  readonly code = 'auth' as const;
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'AuthError';
    this.status = status;
  }
}

class CheckpointError extends Error {
  readonly code = 'checkpoint' as const;
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Unreadable checkpoint "${path}": ${message}`);
    this.name = 'CheckpointError';
    this.path = path;
  }
}

/** A request outside the sweep loop (discovery listings) that has no retry path. */
class ApiRequestError extends Error {
  readonly code = 'api' as const;
  readonly operation: string;

  constructor(operation: string, detail: string) {
    super(`Could not ${operation}: ${detail}`);
    this.name = 'ApiRequestError';
    this.operation = operation;
  }
}

type FatalError = ConfigError | AuthError | CheckpointError | ApiRequestError;

function isFatalError(error: unknown): error is FatalError {
  return (
    error instanceof ConfigError ||
    error instanceof AuthError ||
    error instanceof CheckpointError ||
    error instanceof ApiRequestError
  );
}

export { ConfigError, AuthError, CheckpointError, ApiRequestError, isFatalError };
export type { FatalError };
