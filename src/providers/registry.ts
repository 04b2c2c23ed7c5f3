/**
 * Provider Registry
 *
 * Holds the provider handles built at startup. The registry is frozen after
 * construction and passed explicitly to whatever needs it; there is no
 * module-level client state.
 *
 * @packageDocumentation
 */

import type { Config } from '../config.js';
import { defaultLogger, type Logger } from '../logger.js';
import type { ModelInfo, ProviderId, ProviderKind } from '../types.js';
import { createAzureProvider, describeAzureAuth, type AzureProviderDeps } from './azure.js';
import { createOpenAIProvider } from './openai.js';
import type { ProviderHandle } from './types.js';

/**
 * Configured-provider map reported by `GET /`.
 */
export interface ProviderSummary {
  openai: boolean;
  azure_openai: boolean;
  azure_identity_enabled: boolean;
}

export interface RegistryDeps extends AzureProviderDeps {
  logger?: Logger;
}

export class ProviderRegistry {
  private readonly handles: ReadonlyMap<ProviderId, ProviderHandle>;

  constructor(handles: Iterable<ProviderHandle> = []) {
    const map = new Map<ProviderId, ProviderHandle>();
    for (const handle of handles) {
      if (map.has(handle.id)) {
        throw new Error(`Duplicate provider: ${handle.id}`);
      }
      map.set(handle.id, handle);
    }
    this.handles = map;
    Object.freeze(this);
  }

  /**
   * Build one handle per configured backend.
   */
  static fromConfig(config: Config, deps: RegistryDeps = {}): ProviderRegistry {
    const logger = deps.logger ?? defaultLogger;
    const handles: ProviderHandle[] = [];

    if (config.openai) {
      handles.push(createOpenAIProvider(config.openai));
      logger.info('OpenAI client initialized');
    }

    if (config.azure) {
      const azure = createAzureProvider(config.azure, deps);
      handles.push(azure);
      logger.info(`Azure OpenAI client initialized (${describeAzureAuth(azure.authMode)})`);
    }

    return new ProviderRegistry(handles);
  }

  get(id: ProviderId): ProviderHandle | undefined {
    return this.handles.get(id);
  }

  has(id: ProviderId): boolean {
    return this.handles.has(id);
  }

  /** Handles in registration order. */
  list(): ProviderHandle[] {
    return [...this.handles.values()];
  }

  /** First registered handle of the given kind. */
  byKind(kind: ProviderKind): ProviderHandle | undefined {
    for (const handle of this.handles.values()) {
      if (handle.kind === kind) return handle;
    }
    return undefined;
  }

  isEmpty(): boolean {
    return this.handles.size === 0;
  }

  /** Models reachable through the registered providers. */
  models(): ModelInfo[] {
    return this.list().flatMap((handle) => [...handle.models]);
  }

  describe(): ProviderSummary {
    const azure = this.handles.get('azure');
    return {
      openai: this.handles.has('openai'),
      azure_openai: azure !== undefined,
      azure_identity_enabled: azure?.authMode === 'identity',
    };
  }
}
