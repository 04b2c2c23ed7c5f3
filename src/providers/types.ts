/**
 * Provider capability contract.
 *
 * @packageDocumentation
 */

import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { Completion } from 'openai/resources/completions';
import type { ModelInfo, ProviderAuthMode, ProviderId, ProviderKind } from '../types.js';

/**
 * One incremental delta yielded by a streaming call. The relay forwards it
 * as-is and never looks inside.
 */
export type StreamChunk = ChatCompletionChunk;

export type { ChatCompletion, Completion };

/**
 * Chat call as handed to a provider. Optional fields the client left out
 * are absent, not defaulted.
 */
export interface ChatCallParams {
  model: string;
  messages: ChatCompletionMessageParam[];
  temperature: number;
  max_tokens?: number;
  stream: boolean;
}

export interface CompletionCallParams {
  model: string;
  prompt: string;
  temperature: number;
  max_tokens?: number;
}

export interface CallOptions {
  /** Aborting cancels the in-flight upstream request. */
  signal?: AbortSignal;
}

/**
 * Client bound to exactly one backend. Immutable once built and shared by
 * all in-flight requests.
 */
export interface ProviderHandle {
  readonly id: ProviderId;
  readonly kind: ProviderKind;
  readonly authMode: ProviderAuthMode;
  readonly baseUrl: string;
  readonly apiVersion?: string;
  readonly models: readonly ModelInfo[];

  createChatCompletion(params: ChatCallParams, opts?: CallOptions): Promise<ChatCompletion>;

  /**
   * Resolves once the upstream accepted the request; chunks are pulled from
   * the returned iterable.
   */
  streamChatCompletion(params: ChatCallParams, opts?: CallOptions): Promise<AsyncIterable<StreamChunk>>;

  createCompletion(params: CompletionCallParams, opts?: CallOptions): Promise<Completion>;
}
