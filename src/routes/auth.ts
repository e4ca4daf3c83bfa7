import type { APIRoute } from "astro";
import type { ConsentRequest, IndieWeb, RouteContext } from "../core.js";
import { InvalidRequestError, UnsupportedGrantTypeError } from "../lib/errors.js";
import { formValue, parseFormRequest, requireFormValue } from "../lib/parsers.js";
import { createErrorResponse, errorToResponse, jsonResponse } from "../lib/utils.js";
import { getRuntime } from "../runtime.js";
import type { AuthorizationRequest } from "../types/indieauth.js";

export const prerender = false;

/**
 * GET - Authorization request from a client, answered with the consent step
 */
export const GET: APIRoute = ({ request, url }) =>
	handleAuthorizationRequest(getRuntime(), { request, url });

/**
 * POST - Code redemption for the profile URL only
 */
export const POST: APIRoute = ({ request, url }) =>
	handleProfileRedemption(getRuntime(), { request, url });

/**
 * The owner must be logged in to see the consent step. Without a login
 * page configured the endpoint answers 401.
 */
async function ownerGate(runtime: IndieWeb, request: Request, url: URL): Promise<Response | null> {
	if (runtime.authenticateOwner && (await runtime.authenticateOwner(request))) {
		return null;
	}

	const { loginUrl } = runtime.config.indieauth;
	if (loginUrl) {
		const location = new URL(loginUrl);
		location.searchParams.set("redirect", url.href);
		return new Response(null, { status: 302, headers: { Location: location.href } });
	}
	return createErrorResponse(401, "access_denied", "The site owner must be logged in");
}

export function authorizationRequestFrom(url: URL): AuthorizationRequest {
	const params = url.searchParams;
	const responseType = params.get("response_type") ?? "code";
	if (responseType !== "code") {
		throw new InvalidRequestError(`Unsupported response_type: ${responseType}`);
	}

	const required = (name: string): string => {
		const value = params.get(name);
		if (!value) {
			throw new InvalidRequestError(`Missing ${name}`);
		}
		return value;
	};

	return {
		clientId: required("client_id"),
		redirectUri: required("redirect_uri"),
		codeChallenge: required("code_challenge"),
		codeChallengeMethod: required("code_challenge_method"),
		scope: params.get("scope") ?? "",
		state: params.get("state") ?? undefined,
	};
}

export async function handleAuthorizationRequest(
	runtime: IndieWeb,
	{ request, url }: RouteContext,
): Promise<Response> {
	try {
		const gate = await ownerGate(runtime, request, url);
		if (gate) {
			return gate;
		}

		const authorization = authorizationRequestFrom(url);
		const grant = await runtime.tokens.beginAuthorization(authorization);
		const consent: ConsentRequest = {
			grant,
			request: authorization,
			approveUrl: `${runtime.config.indieauth.authorizationEndpoint.replace(/\/$/, "")}/approve`,
		};

		if (runtime.renderConsent) {
			return await runtime.renderConsent(consent, request);
		}

		const supported = runtime.config.indieauth.scopes;
		return jsonResponse({
			client: grant.client,
			scopes: {
				known: grant.scopes.filter((scope) => supported.includes(scope)),
				unknown: grant.scopes.filter((scope) => !supported.includes(scope)),
				other: supported.filter((scope) => !grant.scopes.includes(scope)),
			},
			redirect_to: grant.redirectTo,
			approve_url: consent.approveUrl,
			expires_at: grant.expiresAt.toISOString(),
		});
	} catch (error) {
		return errorToResponse(error, runtime.logger);
	}
}

export async function handleProfileRedemption(
	runtime: IndieWeb,
	{ request }: RouteContext,
): Promise<Response> {
	try {
		const fields = await parseFormRequest(request);
		const grantType = formValue(fields, "grant_type") ?? "authorization_code";
		if (grantType !== "authorization_code") {
			throw new UnsupportedGrantTypeError(grantType);
		}

		const result = await runtime.tokens.redeemForProfile({
			code: requireFormValue(fields, "code"),
			redirectUri: requireFormValue(fields, "redirect_uri"),
			codeVerifier: requireFormValue(fields, "code_verifier"),
			clientId: formValue(fields, "client_id"),
		});
		return jsonResponse(result);
	} catch (error) {
		return errorToResponse(error, runtime.logger);
	}
}

