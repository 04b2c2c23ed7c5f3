/**
 * Readiness and service-info handlers.
 * @packageDocumentation
 */

import type * as http from 'node:http';
import type { ProviderRegistry, ProviderSummary } from './providers/registry.js';
import { VERSION } from './version.js';

export const SERVICE_NAME = 'compat-proxy';

export interface ServiceInfo {
  name: string;
  version: string;
  features: string[];
  endpoints: Record<string, string>;
  supported_providers: ProviderSummary;
}

/**
 * Handle GET /health/readiness on the proxy server.
 */
export function handleReadinessRequest(res: http.ServerResponse): void {
  const body = JSON.stringify({ status: 'ok', message: 'Proxy is ready' });
  res.writeHead(200, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}

export function buildServiceInfo(registry: ProviderRegistry): ServiceInfo {
  return {
    name: SERVICE_NAME,
    version: VERSION,
    features: ['openai-compatible', 'streaming', 'model-routing', 'azure-identity'],
    endpoints: {
      chat_completions: '/chat/completions',
      completions: '/completions',
      models: '/models',
      health: '/health/readiness',
    },
    supported_providers: registry.describe(),
  };
}
