export type AuthErrorKind = 'InvalidCredential' | 'ProviderUnavailable' | 'Throttled' | 'RefreshRejected';
export type ApiErrorKind = 'Unauthorized' | 'NotFound' | 'Unavailable' | 'Malformed';
export type FetchErrorKind = 'NetworkError' | 'Forbidden' | 'Gone';

/**
 * Failure talking to the identity provider.
 */
export class AuthError extends Error {
  public readonly name = 'AuthError';

  constructor(
    public readonly kind: AuthErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * Failure talking to the device API. `status` is the HTTP status when one was received.
 */
export class ApiError extends Error {
  public readonly name = 'ApiError';

  constructor(
    public readonly kind: ApiErrorKind,
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

/**
 * Failure downloading photo bytes from a pre-signed URL.
 */
export class FetchError extends Error {
  public readonly name = 'FetchError';

  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export type SyncError = AuthError | ApiError | FetchError;

export function describeError(err: unknown): string {
  if (err instanceof AuthError || err instanceof ApiError || err instanceof FetchError) {
    return `${err.name}{${err.kind}}: ${err.message}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
