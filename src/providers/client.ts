/**
 * Provider handle backed by the OpenAI SDK. Both the direct and the Azure
 * backends speak the same wire format, so one implementation serves both.
 *
 * @packageDocumentation
 */

import type OpenAI from 'openai';
import type { ModelInfo, ProviderAuthMode, ProviderId, ProviderKind } from '../types.js';
import type {
  CallOptions,
  ChatCallParams,
  ChatCompletion,
  Completion,
  CompletionCallParams,
  ProviderHandle,
  StreamChunk,
} from './types.js';

export interface ClientProviderOptions {
  id: ProviderId;
  kind: ProviderKind;
  authMode: ProviderAuthMode;
  baseUrl: string;
  apiVersion?: string;
  models: readonly string[];
  client: OpenAI;
}

export class ClientProvider implements ProviderHandle {
  readonly id: ProviderId;
  readonly kind: ProviderKind;
  readonly authMode: ProviderAuthMode;
  readonly baseUrl: string;
  readonly apiVersion?: string;
  readonly models: readonly ModelInfo[];
  private readonly client: OpenAI;

  constructor(opts: ClientProviderOptions) {
    this.id = opts.id;
    this.kind = opts.kind;
    this.authMode = opts.authMode;
    this.baseUrl = opts.baseUrl;
    this.apiVersion = opts.apiVersion;
    this.models = Object.freeze(
      opts.models.map((id): ModelInfo => ({ id, object: 'model', owned_by: opts.id }))
    );
    this.client = opts.client;
    Object.freeze(this);
  }

  createChatCompletion(params: ChatCallParams, opts: CallOptions = {}): Promise<ChatCompletion> {
    return this.client.chat.completions.create({ ...params, stream: false }, { signal: opts.signal });
  }

  async streamChatCompletion(params: ChatCallParams, opts: CallOptions = {}): Promise<AsyncIterable<StreamChunk>> {
    return this.client.chat.completions.create({ ...params, stream: true }, { signal: opts.signal });
  }

  createCompletion(params: CompletionCallParams, opts: CallOptions = {}): Promise<Completion> {
    return this.client.completions.create({ ...params, stream: false }, { signal: opts.signal });
  }
}
