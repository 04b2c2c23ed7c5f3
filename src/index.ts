/**
 * compat-proxy
 *
 * OpenAI-compatible proxy that routes chat and text completion requests to
 * OpenAI or Azure OpenAI by model name.
 *
 * @example
 * ```typescript
 * import { loadConfig, ProviderRegistry, createProxyServer } from 'compat-proxy';
 *
 * const config = loadConfig();
 * const server = createProxyServer(config, ProviderRegistry.fromConfig(config));
 * await server.start();
 * ```
 *
 * @packageDocumentation
 */

// Server
export { ProxyServer, createProxyServer, DEFAULT_MAX_BODY_BYTES } from './server.js';
export type { ProxyServerConfig } from './server.js';
export { buildServiceInfo, handleReadinessRequest, SERVICE_NAME } from './health.js';
export type { ServiceInfo } from './health.js';

// Configuration
export {
  loadConfig,
  parseConfig,
  getConfigPath,
  checkEnvironment,
  ConfigError,
  DEFAULT_MASTER_KEY,
  DEFAULT_AZURE_API_VERSION,
} from './config.js';
export type {
  Config,
  ConfigInput,
  OpenAIProviderConfig,
  AzureProviderConfig,
  RoutingConfig,
  LoadConfigOptions,
} from './config.js';

// Providers
export { ProviderRegistry } from './providers/registry.js';
export type { ProviderSummary, RegistryDeps } from './providers/registry.js';
export { ClientProvider } from './providers/client.js';
export { createOpenAIProvider, DEFAULT_OPENAI_MODELS } from './providers/openai.js';
export { createAzureProvider, describeAzureAuth, DEFAULT_AZURE_MODELS } from './providers/azure.js';
export type { AzureProviderDeps } from './providers/azure.js';
export {
  COGNITIVE_SERVICES_SCOPE,
  createIdentityTokenSupplier,
  createStaticTokenSupplier,
} from './providers/credentials.js';
export type { TokenSupplier } from './providers/credentials.js';
export type {
  ProviderHandle,
  ChatCallParams,
  CompletionCallParams,
  CallOptions,
  StreamChunk,
} from './providers/types.js';

// Routing
export { selectProvider, DEFAULT_ROUTING_RULES } from './routing/index.js';
export type { RoutingDecision, RoutingReason, RoutingRules } from './routing/index.js';

// Translation, auth and errors
export { toChatParams, toCompletionParams } from './translate.js';
export { authenticate } from './auth.js';
export type { AuthResult } from './auth.js';
export { ProxyError, ProxyErrorKinds, isProxyError, normalizeError } from './errors.js';
export type { ProxyErrorKind, ErrorBody, ErrorDetail } from './errors.js';

// Relay
export * from './relay/index.js';

// Logging
export { createLogger, defaultLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// Types
export * from './types.js';
export { VERSION } from './version.js';
