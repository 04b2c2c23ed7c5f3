/**
 * OpenAI-compatible proxy server.
 *
 * Accepts chat and text completion requests in the OpenAI wire format,
 * checks the caller against the master key, routes each request to one
 * configured backend and relays the answer, buffered or as server-sent
 * events.
 *
 * Routes (an optional leading `/v1` is accepted):
 * - `GET /health/readiness` and `GET /`, no auth
 * - `GET /models`
 * - `POST /chat/completions`
 * - `POST /completions`
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { nanoid } from 'nanoid';
import type { z } from 'zod';
import { authenticate } from './auth.js';
import { DEFAULT_MASTER_KEY, type Config } from './config.js';
import { normalizeError, ProxyError } from './errors.js';
import { buildServiceInfo, handleReadinessRequest } from './health.js';
import { defaultLogger, type Logger } from './logger.js';
import type { ProviderRegistry } from './providers/registry.js';
import type { ProviderHandle, StreamChunk } from './providers/types.js';
import { HttpEventSink, StreamRelay } from './relay/index.js';
import { DEFAULT_ROUTING_RULES, selectProvider, type RoutingRules } from './routing/index.js';
import { toChatParams, toCompletionParams } from './translate.js';
import {
  UnifiedChatRequestSchema,
  UnifiedCompletionRequestSchema,
  type ModelList,
} from './types.js';

/** Request bodies above this size are rejected (10 MB). */
export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

/**
 * Proxy server configuration
 */
export interface ProxyServerConfig {
  registry: ProviderRegistry;
  port?: number;
  host?: string;
  masterKey?: string;
  routing?: RoutingRules;
  logger?: Logger;
  /** Chunks buffered per stream between upstream and client (default: 2) */
  streamBufferSize?: number;
  maxBodyBytes?: number;
}

type Route = 'readiness' | 'info' | 'models' | 'chat' | 'completions';

export class ProxyServer {
  private server: http.Server | null = null;
  private readonly registry: ProviderRegistry;
  private readonly logger: Logger;
  private readonly routing: RoutingRules;
  private readonly config: Required<Pick<ProxyServerConfig, 'port' | 'host' | 'masterKey' | 'streamBufferSize' | 'maxBodyBytes'>>;

  constructor(config: ProxyServerConfig) {
    this.registry = config.registry;
    this.logger = config.logger ?? defaultLogger;
    this.routing = config.routing ?? DEFAULT_ROUTING_RULES;
    this.config = {
      port: config.port ?? 4000,
      host: config.host ?? '0.0.0.0',
      masterKey: config.masterKey ?? DEFAULT_MASTER_KEY,
      streamBufferSize: config.streamBufferSize ?? 2,
      maxBodyBytes: config.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
    };
  }

  /**
   * Start the proxy server
   */
  async start(): Promise<void> {
    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        this.logger.error('Unhandled error:', err);
        if (!res.headersSent) {
          this.sendError(res, new ProxyError('InternalProxyError', 'Internal proxy error'));
        } else {
          res.end();
        }
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const { host, port } = this.address();
    this.logger.info(`Proxy listening on http://${host}:${port}`);
  }

  /**
   * Stop the proxy server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.logger.info('Proxy server stopped');
  }

  /**
   * Bound address; the real port when started on port 0.
   */
  address(): { host: string; port: number } {
    const addr = this.server?.address();
    if (!addr || typeof addr === 'string') {
      return { host: this.config.host, port: this.config.port };
    }
    return { host: formatHost(addr), port: addr.port };
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const requestId = nanoid(12);
    res.setHeader('X-Request-Id', requestId);

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');

    // Handle preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');
    const pathname = stripVersionPrefix(url.pathname);
    this.logger.debug(`${requestId} ${req.method ?? 'GET'} ${url.pathname}`);

    try {
      const route = matchRoute(req.method ?? 'GET', pathname);
      if (!route) {
        throw new ProxyError('NotFound', `Unknown endpoint: ${url.pathname}`);
      }

      switch (route) {
        case 'readiness':
          handleReadinessRequest(res);
          return;
        case 'info':
          this.sendJson(res, 200, buildServiceInfo(this.registry));
          return;
      }

      const auth = authenticate(req.headers.authorization, this.config.masterKey);
      if (!auth.ok) throw auth.error;

      switch (route) {
        case 'models':
          this.handleListModels(res);
          return;
        case 'chat':
          await this.handleChatCompletions(req, res, requestId);
          return;
        case 'completions':
          await this.handleCompletions(req, res, requestId);
          return;
      }
    } catch (err) {
      const error = normalizeError(err);
      this.logFailure(error, requestId, err);
      if (res.headersSent) {
        res.end();
        return;
      }
      this.sendError(res, error);
    }
  }

  private handleListModels(res: http.ServerResponse): void {
    const body: ModelList = { object: 'list', data: this.registry.models() };
    this.sendJson(res, 200, body);
  }

  private async handleChatCompletions(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    requestId: string
  ): Promise<void> {
    const request = parseBody(await this.readBody(req), UnifiedChatRequestSchema);
    if (request.messages.length === 0) {
      throw new ProxyError('EmptyMessageList', 'Messages list cannot be empty');
    }

    const params = toChatParams(request);
    const provider = this.resolveProvider(request.model, requestId);

    if (!params.stream) {
      const completion = await provider.createChatCompletion(params);
      this.sendJson(res, 200, completion);
      return;
    }

    const relay = new StreamRelay<StreamChunk>({
      logger: this.logger,
      bufferSize: this.config.streamBufferSize,
    });
    const result = await relay.run(new HttpEventSink(res), (signal) =>
      provider.streamChatCompletion(params, { signal })
    );

    if (result.error) {
      this.logFailure(result.error, requestId);
    } else if (result.state === 'cancelled') {
      this.logger.debug(`${requestId} client disconnected after ${result.frames} frames`);
    }
  }

  private async handleCompletions(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    requestId: string
  ): Promise<void> {
    const request = parseBody(await this.readBody(req), UnifiedCompletionRequestSchema);
    const provider = this.resolveProvider(request.model, requestId);
    const completion = await provider.createCompletion(toCompletionParams(request));
    this.sendJson(res, 200, completion);
  }

  private resolveProvider(model: string, requestId: string): ProviderHandle {
    const decision = selectProvider(model, this.registry, this.routing);
    if (decision.type === 'none') {
      throw new ProxyError('NoProviderConfigured', 'No configured AI providers');
    }
    this.logger.debug(`${requestId} ${model} -> ${decision.provider.id} (${decision.reason})`);
    return decision.provider;
  }

  /**
   * Read request body, up to `maxBodyBytes`.
   */
  private readBody(req: http.IncomingMessage): Promise<string> {
    const limit = this.config.maxBodyBytes;
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let settled = false;

      req.on('data', (chunk: Buffer) => {
        if (settled) return;
        size += chunk.length;
        if (size > limit) {
          settled = true;
          reject(new ProxyError('MalformedRequest', 'Request body too large', { status: 413 }));
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        if (settled) return;
        settled = true;
        resolve(Buffer.concat(chunks).toString('utf8'));
      });
      req.on('error', (err) => {
        if (settled) return;
        settled = true;
        reject(err);
      });
    });
  }

  private sendJson(res: http.ServerResponse, status: number, body: unknown): void {
    const payload = JSON.stringify(body);
    res.writeHead(status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(payload),
    });
    res.end(payload);
  }

  /**
   * Send error response
   */
  private sendError(res: http.ServerResponse, error: ProxyError): void {
    this.sendJson(res, error.status, error.toBody());
  }

  private logFailure(error: ProxyError, requestId: string, cause?: unknown): void {
    const line = `${requestId} ${error.kind} (${error.status}): ${error.message}`;
    switch (error.kind) {
      case 'UpstreamRateLimited':
        this.logger.warn(line);
        break;
      case 'UpstreamAuthFailed':
      case 'UpstreamBadGateway':
        this.logger.error(line);
        break;
      case 'InternalProxyError':
        this.logger.error(line, cause);
        break;
      default:
        this.logger.debug(line);
    }
  }
}

/**
 * Build a server from a loaded config.
 */
export function createProxyServer(config: Config, registry: ProviderRegistry, logger?: Logger): ProxyServer {
  return new ProxyServer({
    registry,
    port: config.port,
    host: config.host,
    masterKey: config.masterKey,
    routing: config.routing,
    streamBufferSize: config.streamBufferSize,
    logger,
  });
}

function stripVersionPrefix(pathname: string): string {
  if (pathname === '/v1') return '/';
  return pathname.startsWith('/v1/') ? pathname.slice(3) : pathname;
}

function matchRoute(method: string, pathname: string): Route | null {
  if (method === 'GET') {
    if (pathname === '/health/readiness') return 'readiness';
    if (pathname === '/') return 'info';
    if (pathname === '/models') return 'models';
  }
  if (method === 'POST') {
    if (pathname === '/chat/completions') return 'chat';
    if (pathname === '/completions') return 'completions';
  }
  return null;
}

/**
 * JSON-decode and validate a request body.
 */
function parseBody<T, I>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, I>): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ProxyError('MalformedRequest', 'Request body is not valid JSON');
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ProxyError('MalformedRequest', `Invalid request: ${issues}`);
  }
  return parsed.data;
}

function formatHost(addr: AddressInfo): string {
  return addr.family === 'IPv6' ? `[${addr.address}]` : addr.address;
}
