import { z } from "astro/zod";
import type { ResolvedConfig } from "../types/config.js";

/**
 * Syndication target schema
 */
export const syndicationTargetSchema = z.object({
  uid: z.string().url(),
  name: z.string(),
});

/**
 * Site configuration schema
 */
export const siteConfigSchema = z.object({
  me: z.string().url(),
  name: z.string().optional(),
  photo: z.string().url().optional(),
  email: z.string().email().optional(),
});

/**
 * Database configuration schema
 */
export const databaseConfigSchema = z.object({
  path: z.string().min(1).default("indiehub.db"),
});

/**
 * Micropub configuration schema
 */
export const micropubConfigSchema = z.object({
  endpoint: z.string().default("/micropub"),
  enableUpdates: z.boolean().default(true),
  enableDeletes: z.boolean().default(true),
  syndicationTargets: z.array(syndicationTargetSchema).default([]),
  postPath: z.string().startsWith("/").default("/entries"),
});

/**
 * IndieAuth server configuration schema
 */
export const indieAuthConfigSchema = z.object({
  authorizationEndpoint: z.string().default("/auth"),
  tokenEndpoint: z.string().default("/token"),
  introspectionEndpoint: z.string().default("/token/introspect"),
  revocationEndpoint: z.string().default("/token/revoke"),
  metadataEndpoint: z
    .string()
    .default("/.well-known/oauth-authorization-server"),
  codeLifetime: z.number().int().positive().max(3600).default(600),
  accessTokenLifetime: z.number().int().positive().default(3600),
  // null: refresh tokens never expire
  refreshTokenLifetime: z
    .number()
    .int()
    .positive()
    .nullable()
    .default(365 * 24 * 60 * 60),
  refreshTokenRotation: z.enum(["rotate", "reuse"]).default("rotate"),
  alwaysIssueRefreshToken: z.boolean().default(false),
  scopes: z
    .array(z.string())
    .default([
      "create",
      "draft",
      "update",
      "delete",
      "undelete",
      "media",
      "profile",
      "email",
      "offline_access",
    ]),
  loginUrl: z.string().optional(),
});

/**
 * WebMention configuration schema
 */
export const webMentionConfigSchema = z.object({
  endpoint: z.string().default("/webmention"),
  sendOutbound: z.boolean().default(true),
  requireVouch: z.boolean().default(false),
  trustedDomainPolicy: z.enum(["verify", "skip-backlink"]).default("verify"),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  backoff: z.number().min(0).default(1000),
});

/**
 * WebSub hub configuration schema
 */
export const webSubConfigSchema = z.object({
  endpoint: z.string().default("/websub"),
  feeds: z.array(z.string()).default([]),
  defaultLeaseSeconds: z
    .number()
    .int()
    .positive()
    .default(10 * 24 * 60 * 60),
  maxLeaseSeconds: z
    .number()
    .int()
    .positive()
    .default(365 * 24 * 60 * 60),
  signatureAlgorithm: z
    .enum(["sha1", "sha256", "sha384", "sha512"])
    .default("sha256"),
});

/**
 * Outbound HTTP configuration schema
 */
export const httpConfigSchema = z.object({
  timeout: z.number().positive().default(10_000),
  userAgent: z.string().default("astro-indiehub"),
});

/**
 * Discovery configuration schema
 */
export const discoveryConfigSchema = z.object({
  enabled: z.boolean().default(true),
  includeHeaders: z.boolean().default(true),
});

/**
 * Security configuration schema
 */
export const securityConfigSchema = z.object({
  requireScope: z.boolean().default(true),
  allowedOrigins: z.array(z.string()).default(["*"]),
});

/**
 * Complete integration configuration schema
 */
export const indieHubConfigSchema = z.object({
  site: siteConfigSchema,
  database: databaseConfigSchema.optional().default(() => ({})),
  micropub: micropubConfigSchema.optional().default(() => ({})),
  indieauth: indieAuthConfigSchema.optional().default(() => ({})),
  webmention: webMentionConfigSchema.optional().default(() => ({})),
  websub: webSubConfigSchema.optional().default(() => ({})),
  http: httpConfigSchema.optional().default(() => ({})),
  discovery: discoveryConfigSchema.optional().default(() => ({})),
  security: securityConfigSchema.optional().default(() => ({})),
});

export type IndieHubOptions = z.input<typeof indieHubConfigSchema>;

/**
 * Validate and apply defaults to configuration, resolving every endpoint
 * and feed against the site URL.
 */
export function validateConfig(config: unknown): ResolvedConfig {
  const parsed = indieHubConfigSchema.parse(config);
  const me = new URL(parsed.site.me).href;
  const absolute = (path: string) => new URL(path, me).href;

  return {
    ...parsed,
    site: { ...parsed.site, me },
    micropub: {
      ...parsed.micropub,
      endpoint: absolute(parsed.micropub.endpoint),
    },
    indieauth: {
      ...parsed.indieauth,
      authorizationEndpoint: absolute(parsed.indieauth.authorizationEndpoint),
      tokenEndpoint: absolute(parsed.indieauth.tokenEndpoint),
      introspectionEndpoint: absolute(parsed.indieauth.introspectionEndpoint),
      revocationEndpoint: absolute(parsed.indieauth.revocationEndpoint),
      metadataEndpoint: absolute(parsed.indieauth.metadataEndpoint),
      loginUrl:
        parsed.indieauth.loginUrl === undefined
          ? undefined
          : absolute(parsed.indieauth.loginUrl),
    },
    webmention: {
      ...parsed.webmention,
      endpoint: absolute(parsed.webmention.endpoint),
    },
    websub: {
      ...parsed.websub,
      endpoint: absolute(parsed.websub.endpoint),
      feeds: parsed.websub.feeds.map(absolute),
    },
  };
}
