/**
 * Proxy error taxonomy and the normalizer that maps upstream failures onto it.
 *
 * @packageDocumentation
 */

import { APIError, AuthenticationError, PermissionDeniedError, RateLimitError } from 'openai';

export const ProxyErrorKinds = [
  'Unauthenticated',
  'InvalidCredential',
  'MalformedRequest',
  'EmptyMessageList',
  'NoProviderConfigured',
  'UpstreamRateLimited',
  'UpstreamAuthFailed',
  'UpstreamBadGateway',
  'InternalProxyError',
  'NotFound',
] as const;

export type ProxyErrorKind = (typeof ProxyErrorKinds)[number];

const DEFAULT_STATUS: Record<ProxyErrorKind, number> = {
  Unauthenticated: 401,
  InvalidCredential: 401,
  MalformedRequest: 422,
  EmptyMessageList: 400,
  NoProviderConfigured: 400,
  UpstreamRateLimited: 429,
  UpstreamAuthFailed: 401,
  UpstreamBadGateway: 502,
  InternalProxyError: 500,
  NotFound: 404,
};

/**
 * Error frame payload, also embedded in error bodies.
 */
export interface ErrorDetail {
  message: string;
  type: 'proxy_error';
  code: ProxyErrorKind;
}

/**
 * Body of every non-2xx response.
 */
export interface ErrorBody {
  detail: string;
  error: ErrorDetail;
}

export interface ProxyErrorOptions {
  /** Overrides the kind's default transport status. */
  status?: number;
  upstreamStatus?: number;
}

export class ProxyError extends Error {
  readonly kind: ProxyErrorKind;
  readonly status: number;
  readonly upstreamStatus?: number;

  constructor(kind: ProxyErrorKind, message: string, opts: ProxyErrorOptions = {}) {
    super(message);
    this.name = 'ProxyError';
    this.kind = kind;
    this.status = opts.status ?? DEFAULT_STATUS[kind];
    this.upstreamStatus = opts.upstreamStatus;
  }

  toDetail(): ErrorDetail {
    return { message: this.message, type: 'proxy_error', code: this.kind };
  }

  toBody(): ErrorBody {
    return { detail: this.message, error: this.toDetail() };
  }
}

export function isProxyError(value: unknown): value is ProxyError {
  return value instanceof ProxyError;
}

/**
 * Classify any failure raised while translating, dispatching or relaying.
 *
 * First match wins: rate limit, provider-side auth, structured API error
 * (status passed through, 502 when absent), already-classified proxy errors,
 * then everything else as a 500 without internal detail.
 */
export function normalizeError(failure: unknown): ProxyError {
  if (failure instanceof RateLimitError) {
    return new ProxyError('UpstreamRateLimited', 'Upstream rate limit exceeded', {
      upstreamStatus: failure.status,
    });
  }

  if (failure instanceof AuthenticationError || failure instanceof PermissionDeniedError) {
    return new ProxyError('UpstreamAuthFailed', 'Upstream authentication failed', {
      upstreamStatus: failure.status,
    });
  }

  if (failure instanceof APIError) {
    const status = failure.status;
    if (typeof status === 'number') {
      const upstreamMessage = extractUpstreamMessage(failure.error);
      return new ProxyError(
        'UpstreamBadGateway',
        upstreamMessage ? `Upstream error (${status}): ${upstreamMessage}` : `Upstream error (${status})`,
        { status, upstreamStatus: status }
      );
    }
    return new ProxyError('UpstreamBadGateway', 'Upstream provider unreachable');
  }

  if (failure instanceof ProxyError) {
    return failure;
  }

  return new ProxyError('InternalProxyError', 'Internal proxy error');
}

/**
 * Pull the provider's own message out of a structured error body.
 */
function extractUpstreamMessage(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('message' in body)) return null;
  const { message } = body;
  return typeof message === 'string' && message.length > 0 ? message : null;
}
