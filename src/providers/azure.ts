/**
 * Azure OpenAI backend.
 *
 * Authenticates with, in order of preference: the ambient identity chain,
 * a pre-issued AD token, or a static API key.
 *
 * @packageDocumentation
 */

import { AzureOpenAI } from 'openai';
import type { AzureProviderConfig } from '../config.js';
import type { ProviderAuthMode } from '../types.js';
import { ClientProvider } from './client.js';
import { createIdentityTokenSupplier, createStaticTokenSupplier, type TokenSupplier } from './credentials.js';

export const DEFAULT_AZURE_MODELS = ['azure-gpt-4', 'azure-gpt-4-turbo', 'azure-gpt-35-turbo'] as const;

export interface AzureProviderDeps {
  /** Replaces the identity chain (tests, custom credentials). */
  identityTokenSupplier?: () => TokenSupplier;
}

type AzureAuth =
  | { mode: 'identity'; supplier: TokenSupplier }
  | { mode: 'ad-token'; supplier: TokenSupplier }
  | { mode: 'api-key'; apiKey: string };

export function createAzureProvider(config: AzureProviderConfig, deps: AzureProviderDeps = {}): ClientProvider {
  const auth = resolveAzureAuth(config, deps);
  const endpoint = config.endpoint.replace(/\/+$/, '');

  // Explicit base URL so OPENAI_BASE_URL (meant for the direct backend) is never picked up
  const client = new AzureOpenAI({
    baseURL: `${endpoint}/openai`,
    deployment: config.deployment,
    apiVersion: config.apiVersion,
    timeout: config.timeoutMs,
    maxRetries: 0,
    // An empty key stops the SDK from reading AZURE_OPENAI_API_KEY next to a token provider
    ...(auth.mode === 'api-key' ? { apiKey: auth.apiKey } : { apiKey: '', azureADTokenProvider: auth.supplier }),
  });

  return new ClientProvider({
    id: 'azure',
    kind: 'gateway',
    authMode: auth.mode,
    baseUrl: endpoint,
    apiVersion: config.apiVersion,
    models: config.models ?? DEFAULT_AZURE_MODELS,
    client,
  });
}

function resolveAzureAuth(config: AzureProviderConfig, deps: AzureProviderDeps): AzureAuth {
  if (config.useIdentity) {
    const supplier = deps.identityTokenSupplier ? deps.identityTokenSupplier() : createIdentityTokenSupplier();
    return { mode: 'identity', supplier };
  }
  if (config.adToken) {
    return { mode: 'ad-token', supplier: createStaticTokenSupplier(config.adToken) };
  }
  if (config.apiKey) {
    return { mode: 'api-key', apiKey: config.apiKey };
  }
  throw new Error('Azure OpenAI provider needs useIdentity, adToken or apiKey');
}

export function describeAzureAuth(mode: ProviderAuthMode): string {
  switch (mode) {
    case 'identity':
      return 'Azure Identity';
    case 'ad-token':
      return 'AD token';
    case 'api-key':
      return 'API key';
  }
}
