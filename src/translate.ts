/**
 * Request Translator
 *
 * Turns validated unified requests into provider call parameters. No I/O.
 *
 * @packageDocumentation
 */

import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ChatCallParams, CompletionCallParams } from './providers/types.js';
import type { ChatMessage, UnifiedChatRequest, UnifiedCompletionRequest } from './types.js';

export function toChatParams(request: UnifiedChatRequest): ChatCallParams {
  const params: ChatCallParams = {
    model: request.model,
    messages: request.messages.map(toMessageParam),
    temperature: request.temperature,
    stream: request.stream,
  };
  if (request.max_tokens != null) params.max_tokens = request.max_tokens;
  return params;
}

export function toCompletionParams(request: UnifiedCompletionRequest): CompletionCallParams {
  const params: CompletionCallParams = {
    model: request.model,
    prompt: request.prompt,
    temperature: request.temperature,
  };
  if (request.max_tokens != null) params.max_tokens = request.max_tokens;
  return params;
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  const name = message.name !== undefined ? { name: message.name } : {};
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content, ...name };
    case 'user':
      return { role: 'user', content: message.content, ...name };
    case 'assistant':
      return { role: 'assistant', content: message.content, ...name };
  }
}
