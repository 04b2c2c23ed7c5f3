/**
 * Routing module exports.
 *
 * @packageDocumentation
 */

export { selectProvider, DEFAULT_ROUTING_RULES } from './router.js';
export type { RoutingDecision, RoutingReason, RoutingRules } from './router.js';
