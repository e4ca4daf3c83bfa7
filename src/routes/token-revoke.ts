import type { APIRoute } from "astro";
import type { IndieWeb, RouteContext } from "../core.js";
import { parseFormRequest, requireFormValue } from "../lib/parsers.js";
import { errorToResponse } from "../lib/utils.js";
import { getRuntime } from "../runtime.js";

export const prerender = false;

/**
 * POST - RFC 7009 revocation by access or refresh token
 */
export const POST: APIRoute = ({ request, url }) =>
	handleRevocation(getRuntime(), { request, url });

export async function handleRevocation(
	runtime: IndieWeb,
	{ request }: RouteContext,
): Promise<Response> {
	try {
		const fields = await parseFormRequest(request);
		const revoked = await runtime.tokens.revoke(requireFormValue(fields, "token"));
		if (revoked) {
			runtime.logger.info("Revoked a token grant");
		}
		// Unknown tokens are answered the same way
		return new Response(null, { status: 200 });
	} catch (error) {
		return errorToResponse(error, runtime.logger);
	}
}
