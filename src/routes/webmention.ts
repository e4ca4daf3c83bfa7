import type { APIRoute } from "astro";
import type { IndieWeb, RouteContext } from "../core.js";
import { formValue, parseFormRequest, requireFormValue } from "../lib/parsers.js";
import { errorToResponse, jsonResponse } from "../lib/utils.js";
import { getRuntime } from "../runtime.js";

export const prerender = false;

/**
 * POST - Receive a webmention. Verification happens after the response.
 */
export const POST: APIRoute = ({ request, url }) =>
	handleWebmention(getRuntime(), { request, url });

export async function handleWebmention(
	runtime: IndieWeb,
	{ request }: RouteContext,
): Promise<Response> {
	try {
		const fields = await parseFormRequest(request);
		const mention = await runtime.webmentions.receive({
			source: requireFormValue(fields, "source"),
			target: requireFormValue(fields, "target"),
			vouch: formValue(fields, "vouch") ?? null,
		});

		const status = `${runtime.config.webmention.endpoint.replace(/\/$/, "")}/${mention.uuid}`;
		return jsonResponse({ status: mention.status, message: mention.message }, 201, {
			Location: status,
		});
	} catch (error) {
		return errorToResponse(error, runtime.logger);
	}
}
