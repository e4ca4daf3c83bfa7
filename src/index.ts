export { default } from './integration.js';

export { createIndieWeb } from './core.js';
export type {
  ConsentRequest,
  IndieWeb,
  IndieWebDependencies,
  RouteContext,
  RouteHandler,
} from './core.js';
export { configureRuntime, getRuntime } from './runtime.js';

export { EntryStore } from './storage/entry-store.js';
export type { EntryStorageAdapter } from './storage/adapter.js';
export { openDatabase } from './storage/database.js';
export { TokenService, computeCodeChallenge } from './services/token-service.js';
export { WebMentionPipeline } from './services/webmention.js';
export { WebSubHub, createFetchRenderer, signPayload } from './services/websub-hub.js';
export { TrustedDomains } from './services/trusted-domains.js';

export { discoveryLinks, discoveryLinkTags } from './lib/discovery.js';
export { toDocument, toMicroformats } from './lib/content.js';
export { createConsoleLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
export type { EntryEvent } from './lib/events.js';
export * from './lib/errors.js';

export { validateConfig, indieHubConfigSchema } from './validators/config.js';
export type { IndieHubOptions } from './validators/config.js';

export type * from './types/index.js';
