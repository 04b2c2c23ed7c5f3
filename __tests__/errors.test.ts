import { describe, it, expect } from 'vitest';
import {
  APIConnectionError,
  APIError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
} from 'openai';
import { ProxyError, isProxyError, normalizeError } from '../src/errors.js';

describe('normalizeError', () => {
  it('maps upstream rate limiting to 429', () => {
    const upstream = APIError.generate(429, { error: { message: 'slow down' } }, undefined, {});
    expect(upstream).toBeInstanceOf(RateLimitError);

    const error = normalizeError(upstream);
    expect(error.kind).toBe('UpstreamRateLimited');
    expect(error.status).toBe(429);
    expect(error.upstreamStatus).toBe(429);
    expect(error.message).toBe('Upstream rate limit exceeded');
  });

  it('maps upstream 401 and 403 to an upstream auth failure', () => {
    const unauthorized = APIError.generate(401, { error: { message: 'bad key' } }, undefined, {});
    const forbidden = APIError.generate(403, { error: { message: 'no access' } }, undefined, {});
    expect(unauthorized).toBeInstanceOf(AuthenticationError);
    expect(forbidden).toBeInstanceOf(PermissionDeniedError);

    const a = normalizeError(unauthorized);
    expect(a.kind).toBe('UpstreamAuthFailed');
    expect(a.status).toBe(401);
    expect(a.message).toBe('Upstream authentication failed');

    const b = normalizeError(forbidden);
    expect(b.kind).toBe('UpstreamAuthFailed');
    expect(b.status).toBe(401);
    expect(b.upstreamStatus).toBe(403);
  });

  it('passes other upstream statuses through', () => {
    const error = normalizeError(
      APIError.generate(503, { error: { message: 'overloaded' } }, undefined, {})
    );
    expect(error.kind).toBe('UpstreamBadGateway');
    expect(error.status).toBe(503);
    expect(error.upstreamStatus).toBe(503);
    expect(error.message).toBe('Upstream error (503): overloaded');
  });

  it('omits the upstream message when there is none', () => {
    const error = normalizeError(APIError.generate(404, undefined, undefined, {}));
    expect(error.status).toBe(404);
    expect(error.message).toBe('Upstream error (404)');
  });

  it('maps an upstream error without a status to 502', () => {
    const error = normalizeError(new APIConnectionError({ message: 'socket hang up' }));
    expect(error.kind).toBe('UpstreamBadGateway');
    expect(error.status).toBe(502);
    expect(error.upstreamStatus).toBeUndefined();
    expect(error.message).toBe('Upstream provider unreachable');
  });

  it('returns proxy errors unchanged', () => {
    const original = new ProxyError('NoProviderConfigured', 'No configured AI providers');
    expect(normalizeError(original)).toBe(original);
    expect(original.status).toBe(400);
  });

  it('hides internal failure detail', () => {
    const error = normalizeError(new TypeError('cannot read properties of undefined'));
    expect(error.kind).toBe('InternalProxyError');
    expect(error.status).toBe(500);
    expect(error.message).toBe('Internal proxy error');
    expect(normalizeError('boom').message).toBe('Internal proxy error');
  });
});

describe('ProxyError', () => {
  it('renders the error body', () => {
    const error = new ProxyError('EmptyMessageList', 'Messages list cannot be empty');
    expect(error.toBody()).toEqual({
      detail: 'Messages list cannot be empty',
      error: { message: 'Messages list cannot be empty', type: 'proxy_error', code: 'EmptyMessageList' },
    });
  });

  it('is recognised by isProxyError', () => {
    expect(isProxyError(new ProxyError('NotFound', 'gone'))).toBe(true);
    expect(isProxyError(new Error('gone'))).toBe(false);
  });
});
