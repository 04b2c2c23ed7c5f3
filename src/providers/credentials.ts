/**
 * Bearer-token suppliers for identity-based providers.
 *
 * @packageDocumentation
 */

import { DefaultAzureCredential, getBearerTokenProvider } from '@azure/identity';

export const COGNITIVE_SERVICES_SCOPE = 'https://cognitiveservices.azure.com/.default';

/**
 * Returns a bearer token, or rejects when none can be obtained.
 */
export type TokenSupplier = () => Promise<string>;

/**
 * Token supplier backed by the ambient Azure identity chain
 * (environment, workload identity, managed identity, CLI login).
 */
export function createIdentityTokenSupplier(scope: string = COGNITIVE_SERVICES_SCOPE): TokenSupplier {
  return getBearerTokenProvider(new DefaultAzureCredential(), scope);
}

/**
 * Supplier for a pre-issued AD token.
 */
export function createStaticTokenSupplier(token: string): TokenSupplier {
  return () => Promise.resolve(token);
}
