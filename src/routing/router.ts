/**
 * Model Router
 *
 * Maps a requested model name onto one registered provider. Pure and
 * deterministic: the same model name and registry always give the same
 * decision, so nothing is cached.
 *
 * @packageDocumentation
 */

import type { ProviderRegistry } from '../providers/registry.js';
import type { ProviderHandle } from '../providers/types.js';

/**
 * Name-matching rules.
 */
export interface RoutingRules {
  /** Model prefixes that select the direct provider. */
  directPrefixes: readonly string[];
  /** Model prefixes that select the gateway provider. */
  gatewayPrefixes: readonly string[];
  /** Substrings that select the gateway provider anywhere in the name. */
  familyMarkers: readonly string[];
}

export const DEFAULT_ROUTING_RULES: RoutingRules = Object.freeze({
  directPrefixes: Object.freeze(['gpt-']),
  gatewayPrefixes: Object.freeze(['azure-']),
  familyMarkers: Object.freeze(['gpt']),
});

/**
 * Which rule produced a decision.
 */
export type RoutingReason =
  | 'direct-prefix'
  | 'gateway-prefix'
  | 'family-marker'
  | 'gateway-default'
  | 'direct-fallback';

export type RoutingDecision =
  | { type: 'provider'; provider: ProviderHandle; reason: RoutingReason }
  | { type: 'none' };

/**
 * Select the provider for a model name. First match wins:
 *
 * 1. direct provider + direct prefix
 * 2. gateway provider + gateway prefix or family marker
 * 3. any gateway provider as the default
 * 4. the direct provider as the fallback
 * 5. no provider
 *
 * The gateway is preferred over the direct backend as the default on
 * purpose; keep the order.
 */
export function selectProvider(
  model: string,
  registry: ProviderRegistry,
  rules: RoutingRules = DEFAULT_ROUTING_RULES
): RoutingDecision {
  const direct = registry.byKind('direct');
  const gateway = registry.byKind('gateway');

  if (direct && rules.directPrefixes.some((prefix) => model.startsWith(prefix))) {
    return { type: 'provider', provider: direct, reason: 'direct-prefix' };
  }

  if (gateway) {
    if (rules.gatewayPrefixes.some((prefix) => model.startsWith(prefix))) {
      return { type: 'provider', provider: gateway, reason: 'gateway-prefix' };
    }
    if (rules.familyMarkers.some((marker) => model.includes(marker))) {
      return { type: 'provider', provider: gateway, reason: 'family-marker' };
    }
    return { type: 'provider', provider: gateway, reason: 'gateway-default' };
  }

  if (direct) {
    return { type: 'provider', provider: direct, reason: 'direct-fallback' };
  }

  return { type: 'none' };
}
