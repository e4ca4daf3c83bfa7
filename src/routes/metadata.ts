import type { APIRoute } from "astro";
import type { IndieWeb, RouteContext } from "../core.js";
import { jsonResponse } from "../lib/utils.js";
import { getRuntime } from "../runtime.js";

export const prerender = false;

/**
 * GET - IndieAuth server metadata
 */
export const GET: APIRoute = ({ request, url }) =>
	handleMetadata(getRuntime(), { request, url });

export async function handleMetadata(runtime: IndieWeb, _context: RouteContext): Promise<Response> {
	return jsonResponse(runtime.tokens.metadata(), 200, {
		"Access-Control-Allow-Origin": "*",
	});
}
