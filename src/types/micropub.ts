/**
 * Microformats2 entry representation
 */
export interface MicroformatsEntry {
  type: string[];
  properties: {
    [key: string]: unknown[];
  };
  children?: MicroformatsEntry[];
}

/**
 * Micropub update operations
 */
export type UpdateOperation =
  | { action: 'replace'; property: string; value: unknown[] }
  | { action: 'add'; property: string; value: unknown[] }
  | { action: 'delete'; property: string; value?: unknown[] };

/**
 * Post metadata returned by storage
 */
export interface PostMetadata {
  url: string | null; // absolute, null while the post is a draft
  uuid: string;
  published: Date;
  modified?: Date;
  deleted?: boolean;
}

/**
 * Result of verifying a bearer token
 */
export interface TokenVerificationResult {
  active: boolean;
  me: string;
  client_id: string;
  scope: string;
  exp?: number;
  iat?: number;
}

/**
 * Syndication target configuration
 */
export interface SyndicationTarget {
  uid: string;
  name: string;
}
