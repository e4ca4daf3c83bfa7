import type { APIRoute } from "astro";
import type { IndieWeb, RouteContext } from "../core.js";
import { InvalidRequestError } from "../lib/errors.js";
import { formValues, parseFormRequest, requireFormValue } from "../lib/parsers.js";
import { createErrorResponse, errorToResponse } from "../lib/utils.js";
import { getRuntime } from "../runtime.js";
import { parseScopes } from "../validators/scopes.js";

export const prerender = false;

/**
 * POST - The owner's answer on the consent form
 */
export const POST: APIRoute = ({ request, url }) =>
	handleApproval(getRuntime(), { request, url });

/**
 * Store the scopes the owner kept, then send the browser back to the
 * client. `redirect_uri` is the redirect URL the consent step was given,
 * carrying `code`, `state` and `iss`.
 */
export async function handleApproval(
	runtime: IndieWeb,
	{ request }: RouteContext,
): Promise<Response> {
	try {
		if (!runtime.authenticateOwner || !(await runtime.authenticateOwner(request))) {
			return createErrorResponse(401, "access_denied", "The site owner must be logged in");
		}

		const fields = await parseFormRequest(request);
		const code = requireFormValue(fields, "code");
		const redirectTo = requireFormValue(fields, "redirect_uri");
		if (!URL.canParse(redirectTo) || new URL(redirectTo).searchParams.get("code") !== code) {
			throw new InvalidRequestError("redirect_uri does not belong to this authorization code");
		}

		const scopes = formValues(fields, "scope").flatMap(parseScopes);
		await runtime.tokens.updateScope(code, scopes);

		return new Response(null, { status: 302, headers: { Location: redirectTo } });
	} catch (error) {
		return errorToResponse(error, runtime.logger);
	}
}
