/**
 * Micropub scopes checked by the Micropub endpoint
 */
export const MICROPUB_SCOPES = {
  CREATE: "create",
  DRAFT: "draft",
  UPDATE: "update",
  DELETE: "delete",
  UNDELETE: "undelete",
  MEDIA: "media",
} as const;

/**
 * Scopes the token endpoint itself interprets
 */
export const PROFILE_SCOPES = {
  PROFILE: "profile",
  EMAIL: "email",
  OFFLINE_ACCESS: "offline_access",
} as const;

/**
 * Parse scope string into array, dropping duplicates
 */
export function parseScopes(scopeString: string): string[] {
  return [...new Set(scopeString.split(/\s+/).filter(Boolean))];
}

/**
 * Check if a scope string contains a required scope
 */
export function hasScope(scopeString: string, requiredScope: string): boolean {
  return parseScopes(scopeString).includes(requiredScope);
}

/**
 * Check if a scope string contains all required scopes
 */
export function hasAllScopes(
  scopeString: string,
  requiredScopes: string[],
): boolean {
  const scopes = parseScopes(scopeString);
  return requiredScopes.every((required) => scopes.includes(required));
}

/**
 * Join scopes back into the space-separated wire form
 */
export function formatScopes(scopes: Iterable<string>): string {
  return [...new Set(scopes)].join(" ");
}
