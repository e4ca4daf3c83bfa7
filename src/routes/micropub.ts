import type { APIRoute } from "astro";
import type { IndieWeb, RouteContext } from "../core.js";
import { InsufficientScopeError, InvalidRequestError } from "../lib/errors.js";
import { formToMicroformats, formValue, parseRequest, type ParsedBody } from "../lib/parsers.js";
import { requireAuth } from "../lib/token-verification.js";
import {
	addCorsHeaders,
	createCorsPreflightResponse,
	errorToResponse,
	isAbsoluteUrl,
	jsonResponse,
} from "../lib/utils.js";
import { getRuntime } from "../runtime.js";
import type { MicroformatsEntry, TokenVerificationResult } from "../types/micropub.js";
import {
	convertToUpdateOperations,
	validateMicropubAction,
	validateMicropubCreate,
	type MicropubActionRequest,
} from "../validators/micropub.js";
import { hasScope, MICROPUB_SCOPES } from "../validators/scopes.js";

export const prerender = false;

const SUPPORTED_QUERIES = ["config", "source", "syndicate-to"];

/**
 * OPTIONS - CORS preflight
 */
export const OPTIONS: APIRoute = async ({ request }) => {
	const { config } = getRuntime();
	return createCorsPreflightResponse(
		config.security.allowedOrigins,
		request.headers.get("origin"),
	);
};

/**
 * GET - Query endpoint
 */
export const GET: APIRoute = ({ request, url }) =>
	handleMicropubQuery(getRuntime(), { request, url });

/**
 * POST - Create, update, or delete posts
 */
export const POST: APIRoute = ({ request, url }) =>
	handleMicropubPost(getRuntime(), { request, url });

function cors(runtime: IndieWeb, request: Request) {
	return {
		requestOrigin: request.headers.get("origin"),
		allowedOrigins: runtime.config.security.allowedOrigins,
	};
}

function withCors(runtime: IndieWeb, request: Request, response: Response): Response {
	return addCorsHeaders(
		response,
		runtime.config.security.allowedOrigins,
		request.headers.get("origin"),
	);
}

function requireScope(
	runtime: IndieWeb,
	verification: TokenVerificationResult,
	scope: string,
): void {
	if (runtime.config.security.requireScope && !hasScope(verification.scope, scope)) {
		throw new InsufficientScopeError(scope);
	}
}

export async function handleMicropubQuery(
	runtime: IndieWeb,
	{ request, url }: RouteContext,
): Promise<Response> {
	try {
		await requireAuth(request, runtime.tokens);

		const query = url.searchParams.get("q");
		if (!query) {
			throw new InvalidRequestError("Missing q parameter");
		}

		switch (query) {
			case "config":
				return withCors(runtime, request, jsonResponse({
					"syndicate-to": runtime.config.micropub.syndicationTargets,
					q: SUPPORTED_QUERIES,
				}));

			case "syndicate-to":
				return withCors(runtime, request, jsonResponse({
					"syndicate-to": runtime.config.micropub.syndicationTargets,
				}));

			case "source":
				return withCors(runtime, request, await handleSourceQuery(runtime, url));

			default:
				throw new InvalidRequestError(`Unknown query: ${query}`);
		}
	} catch (error) {
		return errorToResponse(error, runtime.logger, cors(runtime, request));
	}
}

/**
 * `q=source&url=...` returns one post; without `url` it lists recent posts
 */
async function handleSourceQuery(runtime: IndieWeb, url: URL): Promise<Response> {
	const sourceUrl = url.searchParams.get("url");
	const properties = url.searchParams.getAll("properties[]");

	if (!sourceUrl) {
		const limit = Number(url.searchParams.get("limit") ?? "20");
		const entries = await runtime.entries.list({
			limit: Number.isFinite(limit) ? limit : undefined,
		});
		return jsonResponse({
			items: entries.map((entry) => ({
				...entry.content,
				properties: {
					...entry.content.properties,
					...(entry.location ? { url: [entry.location] } : {}),
				},
			})),
		});
	}

	if (!isAbsoluteUrl(sourceUrl)) {
		throw new InvalidRequestError("URL must be absolute");
	}

	const entry = await runtime.entries.getPost(
		sourceUrl,
		properties.length > 0 ? properties : undefined,
	);
	if (!entry) {
		return jsonResponse({ error: "not_found", error_description: "Post not found" }, 404);
	}
	return jsonResponse(entry);
}

export async function handleMicropubPost(
	runtime: IndieWeb,
	{ request }: RouteContext,
): Promise<Response> {
	try {
		const verification = await requireAuth(request, runtime.tokens);
		const body = await parseRequest(request);

		const action = actionOf(body);
		if (action !== null && action !== "create") {
			return withCors(runtime, request, await handleAction(runtime, body, verification));
		}
		return withCors(runtime, request, await handleCreate(runtime, body, verification));
	} catch (error) {
		return errorToResponse(error, runtime.logger, cors(runtime, request));
	}
}

function actionOf(body: ParsedBody): string | null {
	if (body.format === "form") {
		return formValue(body.data, "action") ?? null;
	}
	const { data } = body;
	if (typeof data === "object" && data !== null && "action" in data && typeof data.action === "string") {
		return data.action;
	}
	return null;
}

async function handleCreate(
	runtime: IndieWeb,
	body: ParsedBody,
	verification: TokenVerificationResult,
): Promise<Response> {
	let entry: MicroformatsEntry =
		body.format === "form" ? formToMicroformats(body.data) : validateMicropubCreate(body.data);

	// A draft-only token may create, but only drafts
	if (runtime.config.security.requireScope && !hasScope(verification.scope, MICROPUB_SCOPES.CREATE)) {
		if (!hasScope(verification.scope, MICROPUB_SCOPES.DRAFT)) {
			throw new InsufficientScopeError(MICROPUB_SCOPES.CREATE);
		}
		entry = {
			...entry,
			properties: { ...entry.properties, "post-status": ["draft"] },
		};
	}

	if (
		!entry.properties.content &&
		!entry.properties.name &&
		!entry.properties.photo
	) {
		throw new InvalidRequestError("Post must have content, name, or photo");
	}

	const metadata = await runtime.entries.createPost(entry);
	runtime.logger.info(`Created ${metadata.url ?? `draft ${metadata.uuid}`}`);

	if (metadata.url === null) {
		return jsonResponse({ uuid: metadata.uuid, "post-status": "draft" }, 202);
	}
	return new Response(null, {
		status: 201,
		headers: { Location: metadata.url },
	});
}

async function handleAction(
	runtime: IndieWeb,
	body: ParsedBody,
	verification: TokenVerificationResult,
): Promise<Response> {
	const request: MicropubActionRequest = validateMicropubAction(
		body.format === "form"
			? { action: formValue(body.data, "action"), url: formValue(body.data, "url") }
			: body.data,
	);
	const { micropub } = runtime.config;

	switch (request.action) {
		case "update":
			requireScope(runtime, verification, MICROPUB_SCOPES.UPDATE);
			if (!micropub.enableUpdates) {
				return jsonResponse({ error: "forbidden", error_description: "Updates are disabled" }, 403);
			}
			await runtime.entries.updatePost(request.url, convertToUpdateOperations(request));
			return new Response(null, { status: 204 });

		case "delete":
			requireScope(runtime, verification, MICROPUB_SCOPES.DELETE);
			if (!micropub.enableDeletes) {
				return jsonResponse({ error: "forbidden", error_description: "Deletes are disabled" }, 403);
			}
			await runtime.entries.deletePost(request.url);
			return new Response(null, { status: 204 });

		case "undelete":
			// `undelete` or `delete`
			if (!hasScope(verification.scope, MICROPUB_SCOPES.UNDELETE)) {
				requireScope(runtime, verification, MICROPUB_SCOPES.DELETE);
			}
			if (!micropub.enableDeletes) {
				return jsonResponse({ error: "forbidden", error_description: "Undelete is disabled" }, 403);
			}
			await runtime.entries.undeletePost(request.url);
			return new Response(null, { status: 204 });
	}
}
