import type { APIRoute } from "astro";
import type { IndieWeb, RouteContext } from "../core.js";
import { UnsupportedGrantTypeError } from "../lib/errors.js";
import { formValue, parseFormRequest, requireFormValue } from "../lib/parsers.js";
import { requireAuth } from "../lib/token-verification.js";
import { errorToResponse, jsonResponse } from "../lib/utils.js";
import { getRuntime } from "../runtime.js";
import type { TokenResponse } from "../types/indieauth.js";

export const prerender = false;

/**
 * GET - Verify the bearer token of the request
 */
export const GET: APIRoute = ({ request, url }) =>
	handleTokenVerification(getRuntime(), { request, url });

/**
 * POST - Authorization code and refresh token grants
 */
export const POST: APIRoute = ({ request, url }) =>
	handleTokenRequest(getRuntime(), { request, url });

/**
 * Whether the client ranks form encoding above JSON in `Accept`
 */
export function prefersForm(accept: string | null): boolean {
	if (!accept) return false;
	const types = accept.split(",").map((part) => (part.split(";")[0] ?? "").trim().toLowerCase());
	const form = types.indexOf("application/x-www-form-urlencoded");
	const json = types.indexOf("application/json");
	return form !== -1 && (json === -1 || form < json);
}

function tokenResponse(body: TokenResponse, accept: string | null): Response {
	if (!prefersForm(accept)) {
		return jsonResponse(body);
	}

	const fields = new URLSearchParams();
	for (const [key, value] of Object.entries(body)) {
		if (typeof value === "string" || typeof value === "number") {
			fields.set(key, String(value));
		}
	}
	return new Response(fields.toString(), {
		status: 200,
		headers: {
			"Content-Type": "application/x-www-form-urlencoded",
			"Cache-Control": "no-store",
		},
	});
}

export async function handleTokenVerification(
	runtime: IndieWeb,
	{ request }: RouteContext,
): Promise<Response> {
	try {
		const verification = await requireAuth(request, runtime.tokens);
		return jsonResponse({
			me: verification.me,
			client_id: verification.client_id,
			scope: verification.scope,
		});
	} catch (error) {
		return errorToResponse(error, runtime.logger);
	}
}

export async function handleTokenRequest(
	runtime: IndieWeb,
	{ request }: RouteContext,
): Promise<Response> {
	try {
		const fields = await parseFormRequest(request);
		const grantType = requireFormValue(fields, "grant_type");
		const accept = request.headers.get("accept");

		switch (grantType) {
			case "authorization_code": {
				const response = await runtime.tokens.exchangeCode({
					code: requireFormValue(fields, "code"),
					redirectUri: requireFormValue(fields, "redirect_uri"),
					codeVerifier: requireFormValue(fields, "code_verifier"),
					clientId: formValue(fields, "client_id"),
				});
				return tokenResponse(response, accept);
			}

			case "refresh_token": {
				const response = await runtime.tokens.refresh({
					refreshToken: requireFormValue(fields, "refresh_token"),
					clientId: formValue(fields, "client_id"),
					scope: formValue(fields, "scope"),
				});
				return tokenResponse(response, accept);
			}

			default:
				throw new UnsupportedGrantTypeError(grantType);
		}
	} catch (error) {
		return errorToResponse(error, runtime.logger);
	}
}
