import { createHash, randomBytes } from "node:crypto";
import { and, eq, isNull, lt, or, sql } from "drizzle-orm";
import type { IndieHubDatabase } from "../storage/database.js";
import type { Queryable } from "../storage/entry-store.js";
import { authorizationCodes, tokens, type AuthorizationCodeRow } from "../storage/schema.js";
import { fetchClientInfo, sameOrigin } from "../lib/client-info.js";
import {
  InvalidClientError,
  InvalidGrantError,
  InvalidRequestError,
  InvalidScopeError,
  UnauthorizedError,
} from "../lib/errors.js";
import type { HttpClient } from "../lib/http.js";
import type { Logger } from "../lib/logger.js";
import type { ResolvedConfig } from "../types/config.js";
import type {
  AuthorizationGrant,
  AuthorizationRequest,
  ClientInfo,
  CodeExchangeRequest,
  IntrospectionResponse,
  Profile,
  RefreshRequest,
  ServerMetadata,
  TokenResponse,
  VerifiedToken,
} from "../types/indieauth.js";
import {
  PROFILE_SCOPES,
  formatScopes,
  hasAllScopes,
  hasScope,
  parseScopes,
} from "../validators/scopes.js";

export interface TokenServiceOptions {
  config: Pick<ResolvedConfig, "site" | "indieauth">;
  http: HttpClient;
  now: () => Date;
  logger: Logger;
}

function hashSecret(plain: string): string {
  return createHash("sha256").update(plain).digest("hex");
}

function generateSecret(): string {
  return randomBytes(32).toString("base64url");
}

/**
 * PKCE S256: BASE64URL(SHA256(verifier)) without padding
 */
export function computeCodeChallenge(verifier: string): string {
  return createHash("sha256").update(verifier).digest("base64url");
}

function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/**
 * IndieAuth authorization and token endpoint logic for the single site
 * owner. Codes and tokens are stored as SHA-256 hashes; the plain values
 * are only returned from the call that creates them.
 */
export class TokenService {
  private readonly me: string;

  constructor(
    private readonly db: IndieHubDatabase,
    private readonly options: TokenServiceOptions
  ) {
    this.me = options.config.site.me;
  }

  private get settings() {
    return this.options.config.indieauth;
  }

  /**
   * Validate an authorization request and issue a code for it.
   * @throws InvalidRequestError for a malformed request
   * @throws InvalidClientError when `redirect_uri` is not one the client uses
   */
  async beginAuthorization(request: AuthorizationRequest): Promise<AuthorizationGrant> {
    if (!URL.canParse(request.clientId) || !URL.canParse(request.redirectUri)) {
      throw new InvalidRequestError("client_id and redirect_uri must be absolute URLs");
    }
    if (request.codeChallengeMethod !== "S256") {
      throw new InvalidRequestError("code_challenge_method must be S256");
    }
    if (!request.codeChallenge) {
      throw new InvalidRequestError("Missing code_challenge");
    }

    const client = await this.getClientInfo(request.clientId);
    if (
      !sameOrigin(request.clientId, request.redirectUri) &&
      !client.redirectUris.includes(request.redirectUri)
    ) {
      throw new InvalidClientError(
        `redirect_uri ${request.redirectUri} is not registered for ${request.clientId}`
      );
    }

    const code = generateSecret();
    const now = this.options.now();
    const expiresAt = addSeconds(now, this.settings.codeLifetime);
    const scopes = parseScopes(request.scope);

    this.db
      .insert(authorizationCodes)
      .values({
        codeHash: hashSecret(code),
        clientId: request.clientId,
        redirectUri: request.redirectUri,
        scope: formatScopes(scopes),
        codeChallenge: request.codeChallenge,
        codeChallengeMethod: request.codeChallengeMethod,
        used: false,
        expiresAt,
        createdAt: now,
      })
      .run();

    const redirectTo = new URL(request.redirectUri);
    redirectTo.searchParams.set("code", code);
    if (request.state !== undefined) {
      redirectTo.searchParams.set("state", request.state);
    }
    redirectTo.searchParams.set("iss", this.me);

    return { code, redirectTo: redirectTo.href, expiresAt, client, scopes };
  }

  getClientInfo(clientId: string): Promise<ClientInfo> {
    return fetchClientInfo(this.options.http, clientId, this.options.logger);
  }

  /**
   * Change the scope of an issued, unused code before the client sees it
   */
  async updateScope(code: string, scopes: string[]): Promise<void> {
    const result = this.db
      .update(authorizationCodes)
      .set({ scope: formatScopes(scopes) })
      .where(
        and(eq(authorizationCodes.codeHash, hashSecret(code)), eq(authorizationCodes.used, false))
      )
      .run();
    if (result.changes !== 1) {
      throw new InvalidGrantError("Unknown or used authorization code");
    }
  }

  /**
   * Redeem a code at the authorization endpoint: identifies the user, no
   * token is issued.
   */
  async redeemForProfile(request: CodeExchangeRequest): Promise<{ me: string; profile?: Profile }> {
    const code = this.db.transaction((tx) => this.consumeCode(tx, request));
    const profile = this.profileFor(code.scope);
    return profile ? { me: this.me, profile } : { me: this.me };
  }

  /**
   * Exchange a code for an access token. The code is marked used in the
   * same transaction that checks it, so only one exchange can succeed.
   * @throws InvalidGrantError
   */
  async exchangeCode(request: CodeExchangeRequest): Promise<TokenResponse> {
    return this.db.transaction((tx) => {
      const code = this.consumeCode(tx, request);
      if (!code.scope) {
        throw new InvalidGrantError("Authorization code was issued without a scope");
      }
      return this.issue(tx, code.clientId, code.scope);
    });
  }

  /**
   * Mint a new access token from a refresh token. Under the `rotate`
   * policy the refresh token is replaced as well.
   * @throws InvalidGrantError
   * @throws InvalidScopeError when asking for scopes the grant never had
   */
  async refresh(request: RefreshRequest): Promise<TokenResponse> {
    const now = this.options.now();
    const refreshHash = hashSecret(request.refreshToken);

    return this.db.transaction((tx) => {
      const row = tx.select().from(tokens).where(eq(tokens.refreshTokenHash, refreshHash)).get();
      if (!row || row.revokedAt !== null) {
        throw new InvalidGrantError("Unknown or revoked refresh token");
      }
      if (row.refreshExpiresAt !== null && row.refreshExpiresAt.getTime() <= now.getTime()) {
        throw new InvalidGrantError("Refresh token has expired");
      }
      if (request.clientId !== undefined && request.clientId !== row.clientId) {
        throw new InvalidGrantError("Refresh token was issued to another client");
      }

      let scope = row.scope;
      if (request.scope !== undefined && request.scope.trim() !== "") {
        const requested = parseScopes(request.scope);
        if (!hasAllScopes(row.scope, requested)) {
          throw new InvalidScopeError("A refresh cannot widen the granted scope");
        }
        scope = formatScopes(requested);
      }

      const accessToken = generateSecret();
      const rotate = this.settings.refreshTokenRotation === "rotate";
      const refreshToken = rotate ? generateSecret() : request.refreshToken;
      const lifetime = this.settings.refreshTokenLifetime;

      const result = tx
        .update(tokens)
        .set({
          accessTokenHash: hashSecret(accessToken),
          refreshTokenHash: hashSecret(refreshToken),
          scope,
          expiresAt: addSeconds(now, this.settings.accessTokenLifetime),
          refreshExpiresAt: lifetime === null ? null : addSeconds(now, lifetime),
          lastRefreshAt: now,
        })
        .where(and(eq(tokens.refreshTokenHash, refreshHash), isNull(tokens.revokedAt)))
        .run();
      if (result.changes !== 1) {
        throw new InvalidGrantError("Refresh token was already used");
      }

      return this.tokenResponse(accessToken, refreshToken, scope);
    });
  }

  /**
   * Resolve a bearer token
   * @throws UnauthorizedError when unknown, expired, or revoked
   */
  async verify(accessToken: string): Promise<VerifiedToken> {
    const row = this.db
      .select()
      .from(tokens)
      .where(eq(tokens.accessTokenHash, hashSecret(accessToken)))
      .get();

    if (!row) {
      throw new UnauthorizedError("Unknown access token");
    }
    if (row.revokedAt !== null) {
      throw new UnauthorizedError("The access token has been revoked");
    }
    if (row.expiresAt.getTime() <= this.options.now().getTime()) {
      throw new UnauthorizedError("The access token has expired");
    }

    return {
      me: this.me,
      clientId: row.clientId,
      scope: row.scope,
      expiresAt: row.expiresAt,
      issuedAt: row.lastRefreshAt,
    };
  }

  async introspect(token: string): Promise<IntrospectionResponse> {
    try {
      const verified = await this.verify(token);
      return {
        active: true,
        me: verified.me,
        client_id: verified.clientId,
        scope: verified.scope,
        exp: Math.floor(verified.expiresAt.getTime() / 1000),
        iat: Math.floor(verified.issuedAt.getTime() / 1000),
      };
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        return { active: false };
      }
      throw error;
    }
  }

  /**
   * Revoke the grant an access or refresh token belongs to. Unknown
   * tokens are ignored.
   */
  async revoke(token: string): Promise<boolean> {
    const hash = hashSecret(token);
    const result = this.db
      .update(tokens)
      .set({ revokedAt: this.options.now() })
      .where(
        and(
          or(eq(tokens.accessTokenHash, hash), eq(tokens.refreshTokenHash, hash)),
          isNull(tokens.revokedAt)
        )
      )
      .run();
    return result.changes > 0;
  }

  /**
   * Delete used or expired codes and grants that can no longer be used
   */
  async prune(): Promise<{ codes: number; tokens: number }> {
    const now = this.options.now();

    const codes = this.db
      .delete(authorizationCodes)
      .where(or(eq(authorizationCodes.used, true), lt(authorizationCodes.expiresAt, now)))
      .run();

    const grants = this.db
      .delete(tokens)
      .where(
        or(
          sql`${tokens.revokedAt} IS NOT NULL`,
          and(
            lt(tokens.expiresAt, now),
            or(isNull(tokens.refreshTokenHash), lt(tokens.refreshExpiresAt, now))
          )
        )
      )
      .run();

    return { codes: codes.changes, tokens: grants.changes };
  }

  metadata(): ServerMetadata {
    const settings = this.settings;
    return {
      issuer: this.me,
      authorization_endpoint: settings.authorizationEndpoint,
      token_endpoint: settings.tokenEndpoint,
      introspection_endpoint: settings.introspectionEndpoint,
      introspection_endpoint_auth_methods_supported: ["Bearer"],
      revocation_endpoint: settings.revocationEndpoint,
      revocation_endpoint_auth_methods_supported: ["none"],
      scopes_supported: settings.scopes,
      response_types_supported: ["code"],
      grant_types_supported: ["authorization_code", "refresh_token"],
      service_documentation: "https://indieauth.spec.indieweb.org",
      code_challenge_methods_supported: ["S256"],
      authorization_response_iss_parameter_supported: true,
    };
  }

  /**
   * Profile information released for the `profile` (and `email`) scope
   */
  profileFor(scope: string): Profile | undefined {
    if (!hasScope(scope, PROFILE_SCOPES.PROFILE)) {
      return undefined;
    }

    const site = this.options.config.site;
    const profile: Profile = { url: this.me };
    if (site.name !== undefined) profile.name = site.name;
    if (site.photo !== undefined) profile.photo = site.photo;
    if (site.email !== undefined && hasScope(scope, PROFILE_SCOPES.EMAIL)) {
      profile.email = site.email;
    }
    return profile;
  }

  private consumeCode(tx: Queryable, request: CodeExchangeRequest): AuthorizationCodeRow {
    const codeHash = hashSecret(request.code);
    const row = tx
      .select()
      .from(authorizationCodes)
      .where(eq(authorizationCodes.codeHash, codeHash))
      .get();

    if (!row) {
      throw new InvalidGrantError("Unknown authorization code");
    }
    if (row.used) {
      throw new InvalidGrantError("Authorization code has already been used");
    }
    if (row.expiresAt.getTime() <= this.options.now().getTime()) {
      throw new InvalidGrantError("Authorization code has expired");
    }
    if (row.redirectUri !== request.redirectUri) {
      throw new InvalidGrantError("redirect_uri does not match the authorization request");
    }
    if (request.clientId !== undefined && row.clientId !== request.clientId) {
      throw new InvalidGrantError("client_id does not match the authorization request");
    }
    if (computeCodeChallenge(request.codeVerifier) !== row.codeChallenge) {
      throw new InvalidGrantError("code_verifier does not match the code challenge");
    }

    const result = tx
      .update(authorizationCodes)
      .set({ used: true })
      .where(and(eq(authorizationCodes.codeHash, codeHash), eq(authorizationCodes.used, false)))
      .run();
    if (result.changes !== 1) {
      throw new InvalidGrantError("Authorization code has already been used");
    }

    return { ...row, used: true };
  }

  private issue(tx: Queryable, clientId: string, scope: string): TokenResponse {
    const now = this.options.now();
    const accessToken = generateSecret();
    const withRefresh =
      this.settings.alwaysIssueRefreshToken || hasScope(scope, PROFILE_SCOPES.OFFLINE_ACCESS);
    const refreshToken = withRefresh ? generateSecret() : undefined;
    const lifetime = this.settings.refreshTokenLifetime;

    tx.insert(tokens)
      .values({
        accessTokenHash: hashSecret(accessToken),
        refreshTokenHash: refreshToken === undefined ? null : hashSecret(refreshToken),
        clientId,
        tokenType: "Bearer",
        scope,
        expiresAt: addSeconds(now, this.settings.accessTokenLifetime),
        refreshExpiresAt:
          refreshToken === undefined || lifetime === null ? null : addSeconds(now, lifetime),
        lastRefreshAt: now,
        revokedAt: null,
        createdAt: now,
      })
      .run();

    return this.tokenResponse(accessToken, refreshToken, scope);
  }

  private tokenResponse(
    accessToken: string,
    refreshToken: string | undefined,
    scope: string
  ): TokenResponse {
    const response: TokenResponse = {
      access_token: accessToken,
      token_type: "Bearer",
      scope,
      me: this.me,
      expires_in: this.settings.accessTokenLifetime,
    };
    if (refreshToken !== undefined) {
      response.refresh_token = refreshToken;
    }
    const profile = this.profileFor(scope);
    if (profile) {
      response.profile = profile;
    }
    return response;
  }
}
