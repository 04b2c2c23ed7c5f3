/**
 * Direct OpenAI backend (static API key).
 *
 * @packageDocumentation
 */

import OpenAI from 'openai';
import type { OpenAIProviderConfig } from '../config.js';
import { ClientProvider } from './client.js';

export const DEFAULT_OPENAI_MODELS = ['gpt-4o', 'gpt-4o-mini', 'gpt-4-turbo'] as const;

export function createOpenAIProvider(config: OpenAIProviderConfig): ClientProvider {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    organization: config.organization,
    timeout: config.timeoutMs,
    // One upstream attempt per client request
    maxRetries: 0,
  });

  return new ClientProvider({
    id: 'openai',
    kind: 'direct',
    authMode: 'api-key',
    baseUrl: config.baseUrl,
    models: config.models ?? DEFAULT_OPENAI_MODELS,
    client,
  });
}
