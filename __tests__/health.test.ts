import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as http from 'node:http';
import { buildServiceInfo, handleReadinessRequest } from '../src/health.js';
import { ProviderRegistry } from '../src/providers/registry.js';
import { VERSION } from '../src/version.js';
import { FakeProvider } from './helpers/fake-provider.js';

describe('Readiness endpoint', () => {
  let server: http.Server;
  let port = 0;

  beforeAll(
    () =>
      new Promise<void>((resolve) => {
        server = http.createServer((req, res) => {
          if (req.url === '/health/readiness') {
            handleReadinessRequest(res);
          } else {
            res.writeHead(404);
            res.end();
          }
        });
        server.listen(0, '127.0.0.1', () => {
          const address = server.address();
          if (address && typeof address !== 'string') port = address.port;
          resolve();
        });
      })
  );

  afterAll(
    () =>
      new Promise<void>((resolve) => {
        server.close(() => resolve());
      })
  );

  it('reports ready', async () => {
    const res = await fetch(`http://127.0.0.1:${port}/health/readiness`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json');
    expect(await res.json()).toEqual({ status: 'ok', message: 'Proxy is ready' });
  });
});

describe('buildServiceInfo', () => {
  it('describes the service and its providers', () => {
    const registry = new ProviderRegistry([
      new FakeProvider({ id: 'azure', kind: 'gateway', authMode: 'identity' }),
    ]);

    const info = buildServiceInfo(registry);

    expect(info.name).toBe('compat-proxy');
    expect(info.version).toBe(VERSION);
    expect(info.features).toContain('streaming');
    expect(info.endpoints).toEqual({
      chat_completions: '/chat/completions',
      completions: '/completions',
      models: '/models',
      health: '/health/readiness',
    });
    expect(info.supported_providers).toEqual({ openai: false, azure_openai: true, azure_identity_enabled: true });
  });

  it('reads the package version', () => {
    expect(VERSION).toBe('1.1.0');
  });
});
