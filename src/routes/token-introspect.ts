import type { APIRoute } from "astro";
import type { IndieWeb, RouteContext } from "../core.js";
import { parseFormRequest, requireFormValue } from "../lib/parsers.js";
import { requireAuth } from "../lib/token-verification.js";
import { errorToResponse, jsonResponse } from "../lib/utils.js";
import { getRuntime } from "../runtime.js";

export const prerender = false;

/**
 * POST - RFC 7662 token introspection, for callers holding a valid token
 */
export const POST: APIRoute = ({ request, url }) =>
	handleIntrospection(getRuntime(), { request, url });

export async function handleIntrospection(
	runtime: IndieWeb,
	{ request }: RouteContext,
): Promise<Response> {
	try {
		await requireAuth(request, runtime.tokens);
		const fields = await parseFormRequest(request);
		return jsonResponse(await runtime.tokens.introspect(requireFormValue(fields, "token")));
	} catch (error) {
		return errorToResponse(error, runtime.logger);
	}
}
