/**
 * Compat Proxy Core Types
 *
 * Wire schemas for the unified OpenAI-style surface and the provider
 * identifiers shared across the routing and relay layers.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// Provider Types
// ============================================================================

/**
 * Backends the proxy can dispatch to.
 */
export const ProviderIds = ['openai', 'azure'] as const;

export type ProviderId = (typeof ProviderIds)[number];

/**
 * Routing class of a provider.
 *
 * `direct` backends are reached with a static API key; `gateway` backends
 * sit behind an identity-aware endpoint (Azure OpenAI).
 */
export type ProviderKind = 'direct' | 'gateway';

/**
 * How a provider authenticates against its upstream.
 */
export type ProviderAuthMode = 'api-key' | 'ad-token' | 'identity';

// ============================================================================
// Unified Requests
// ============================================================================

export const MessageRoles = ['system', 'user', 'assistant'] as const;

export type MessageRole = (typeof MessageRoles)[number];

export const ChatMessageSchema = z.object({
  role: z.enum(MessageRoles),
  content: z.string(),
  name: z.string().optional(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

/**
 * Body of `POST /chat/completions`.
 *
 * An empty `messages` array passes schema validation on purpose; it is
 * rejected afterwards as `EmptyMessageList` (400) rather than 422.
 */
export const UnifiedChatRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(ChatMessageSchema),
  temperature: z.number().default(0.7),
  max_tokens: z.number().int().positive().nullish(),
  stream: z.boolean().default(false),
});

export type UnifiedChatRequest = z.infer<typeof UnifiedChatRequestSchema>;

/**
 * Body of `POST /completions`. No streaming mode.
 */
export const UnifiedCompletionRequestSchema = z.object({
  model: z.string().min(1),
  prompt: z.string(),
  temperature: z.number().default(0.7),
  max_tokens: z.number().int().positive().nullish(),
});

export type UnifiedCompletionRequest = z.infer<typeof UnifiedCompletionRequestSchema>;

// ============================================================================
// Model Listing
// ============================================================================

/**
 * One entry of `GET /models`.
 */
export interface ModelInfo {
  id: string;
  object: 'model';
  owned_by: ProviderId;
}

export interface ModelList {
  object: 'list';
  data: ModelInfo[];
}
