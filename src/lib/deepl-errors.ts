import { STATUS_CODES } from 'node:http';

/** HTTP status DeepL uses when the account's character quota is used up. */
export const QUOTA_EXCEEDED_STATUS = 456;

export type DeepLErrorKind = 'request' | 'transport' | 'api' | 'decode' | 'empty-result';

/**
 * Base class of every error this package throws. Branch on `kind`:
 *
 * ```ts
 * try {
 *   await client.translate('Hello', Languages.German);
 * } catch (error) {
 *   if (isDeepLError(error) && error.kind === 'api' && error.quotaExceeded) {
 *     // wait for the next billing period
 *   }
 * }
 * ```
 */
export abstract class DeepLError extends Error {
  abstract readonly kind: DeepLErrorKind;
}

/** The request could not be built. */
export class DeepLRequestError extends DeepLError {
  readonly kind = 'request' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DeepLRequestError';
  }
}

/** The transport failed to complete the round trip. The original error is the `cause`. */
export class DeepLTransportError extends DeepLError {
  readonly kind = 'transport' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DeepLTransportError';
  }
}

/**
 * DeepL answered with a status other than the one the operation expects.
 */
export class DeepLApiError extends DeepLError {
  readonly kind = 'api' as const;
  /** HTTP status code returned by DeepL. */
  readonly code: number;
  /** Raw response body, when the operation captures it. */
  readonly body?: string;

  constructor(code: number, body?: string) {
    super(renderApiError(code, body));
    this.name = 'DeepLApiError';
    this.code = code;
    this.body = body;
  }

  get quotaExceeded(): boolean {
    return this.code === QUOTA_EXCEEDED_STATUS;
  }
}

/** A success response whose body is not what the operation expects. */
export class DeepLDecodeError extends DeepLError {
  readonly kind = 'decode' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DeepLDecodeError';
  }
}

/** DeepL returned no translation for a single-text request. */
export class DeepLEmptyResultError extends DeepLError {
  readonly kind = 'empty-result' as const;

  constructor() {
    super('deepl responded with no translations');
    this.name = 'DeepLEmptyResultError';
  }
}

/** Every concrete error, discriminated by `kind`. */
export type DeepLClientError =
  | DeepLRequestError
  | DeepLTransportError
  | DeepLApiError
  | DeepLDecodeError
  | DeepLEmptyResultError;

export function isDeepLError(value: unknown): value is DeepLClientError {
  return value instanceof DeepLError;
}

export function renderApiError(code: number, body?: string): string {
  if (code === QUOTA_EXCEEDED_STATUS) {
    return 'Quota exceeded. The character limit has been reached.';
  }

  const status = STATUS_CODES[code] ?? String(code);
  const detail = body?.trim();
  return detail ? `unexpected HTTP status ${status} (${detail})` : `unexpected HTTP status ${status}`;
}
