import type { APIRoute } from "astro";
import type { IndieWeb, RouteContext } from "../core.js";
import { NotFoundError } from "../lib/errors.js";
import { errorToResponse, jsonResponse } from "../lib/utils.js";
import { getRuntime } from "../runtime.js";

export const prerender = false;

/**
 * GET - Processing status of a received webmention
 */
export const GET: APIRoute = ({ request, url }) =>
	handleWebmentionStatus(getRuntime(), { request, url });

export async function handleWebmentionStatus(
	runtime: IndieWeb,
	{ url }: RouteContext,
): Promise<Response> {
	try {
		const uuid = decodeURIComponent(url.pathname.replace(/\/$/, "").split("/").pop() ?? "");
		const mention = await runtime.webmentions.getIncoming(uuid);
		if (!mention) {
			throw new NotFoundError(`Webmention not found: ${uuid}`);
		}

		return jsonResponse({
			status: mention.status,
			message: mention.message,
			approved: mention.approved,
			last_modified_at: mention.lastModifiedAt.toISOString(),
		});
	} catch (error) {
		return errorToResponse(error, runtime.logger);
	}
}
