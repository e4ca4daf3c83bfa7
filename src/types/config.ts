import type { SyndicationTarget } from './micropub.js';
import type { RefreshTokenRotation } from './indieauth.js';
import type { SignatureAlgorithm } from './websub.js';

/**
 * Site configuration options
 */
export interface SiteConfig {
  me: string; // REQUIRED: Site URL (canonical), also the owner identity
  name?: string;
  photo?: string;
  email?: string;
}

/**
 * Database configuration options
 */
export interface DatabaseConfig {
  path?: string;
}

/**
 * Micropub configuration options
 */
export interface MicropubConfig {
  endpoint?: string;
  enableUpdates?: boolean;
  enableDeletes?: boolean;
  syndicationTargets?: SyndicationTarget[];
  postPath?: string;
}

/**
 * IndieAuth server configuration options (lifetimes in seconds)
 */
export interface IndieAuthConfig {
  authorizationEndpoint?: string;
  tokenEndpoint?: string;
  introspectionEndpoint?: string;
  revocationEndpoint?: string;
  metadataEndpoint?: string;
  codeLifetime?: number;
  accessTokenLifetime?: number;
  refreshTokenLifetime?: number | null;
  refreshTokenRotation?: RefreshTokenRotation;
  alwaysIssueRefreshToken?: boolean;
  scopes?: string[];
  loginUrl?: string;
}

/**
 * WebMention configuration options
 */
export interface WebMentionConfig {
  endpoint?: string;
  sendOutbound?: boolean;
  requireVouch?: boolean;
  trustedDomainPolicy?: 'verify' | 'skip-backlink';
  maxAttempts?: number;
  backoff?: number; // milliseconds
}

/**
 * WebSub hub configuration options
 */
export interface WebSubConfig {
  endpoint?: string;
  feeds?: string[];
  defaultLeaseSeconds?: number;
  maxLeaseSeconds?: number;
  signatureAlgorithm?: SignatureAlgorithm;
}

/**
 * Outbound HTTP options
 */
export interface HttpConfig {
  timeout?: number; // milliseconds
  userAgent?: string;
}

/**
 * Discovery configuration options
 */
export interface DiscoveryConfig {
  enabled?: boolean;
  includeHeaders?: boolean;
}

/**
 * Security configuration options
 */
export interface SecurityConfig {
  requireScope?: boolean;
  allowedOrigins?: string[];
}

/**
 * Complete integration configuration
 */
export interface IndieHubConfig {
  site: SiteConfig; // REQUIRED
  database?: DatabaseConfig;
  micropub?: MicropubConfig;
  indieauth?: IndieAuthConfig;
  webmention?: WebMentionConfig;
  websub?: WebSubConfig;
  http?: HttpConfig;
  discovery?: DiscoveryConfig;
  security?: SecurityConfig;
}

/**
 * Internal configuration with defaults applied and endpoints made absolute
 */
export interface ResolvedConfig {
  site: SiteConfig;
  database: Required<DatabaseConfig>;
  micropub: Required<MicropubConfig>;
  indieauth: Required<Omit<IndieAuthConfig, 'loginUrl'>> & { loginUrl?: string };
  webmention: Required<WebMentionConfig>;
  websub: Required<WebSubConfig>;
  http: Required<HttpConfig>;
  discovery: Required<DiscoveryConfig>;
  security: Required<SecurityConfig>;
}
