/** Startup precondition failure: bad config file or missing environment values. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export type AuthErrorCode =
  | 'Unauthorized'
  | 'InvalidTimestamp'
  | 'TokenExpired'
  | 'NotAuthorized'
  | 'InvalidSignature';

/** Rejected join or action. Callers must abort the attempted operation. */
export class AuthError extends Error {
  readonly code: AuthErrorCode;

  constructor(code: AuthErrorCode, message?: string) {
    super(message ?? code);
    this.name = 'AuthError';
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
