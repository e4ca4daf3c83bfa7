import type { APIRoute } from "astro";
import type { IndieWeb, RouteContext } from "../core.js";
import { InvalidRequestError, InvalidTopicError } from "../lib/errors.js";
import {
	formValue,
	formValues,
	parseFormRequest,
	requireFormValue,
	type FormFields,
} from "../lib/parsers.js";
import { errorToResponse } from "../lib/utils.js";
import { getRuntime } from "../runtime.js";
import type { SubscriptionRequest } from "../types/websub.js";

export const prerender = false;

/**
 * POST - Subscriber requests and publisher pings
 */
export const POST: APIRoute = ({ request, url }) =>
	handleHubRequest(getRuntime(), { request, url });

function subscriptionRequest(fields: FormFields): SubscriptionRequest {
	const lease = formValue(fields, "hub.lease_seconds");
	const leaseSeconds = lease === undefined || lease === "" ? null : Number(lease);
	if (leaseSeconds !== null && !Number.isInteger(leaseSeconds)) {
		throw new InvalidRequestError("hub.lease_seconds must be an integer");
	}

	return {
		callback: requireFormValue(fields, "hub.callback"),
		topic: requireFormValue(fields, "hub.topic"),
		leaseSeconds,
		secret: formValue(fields, "hub.secret") ?? null,
	};
}

/**
 * Intent verification runs after the 202 is sent
 */
export async function handleHubRequest(
	runtime: IndieWeb,
	{ request }: RouteContext,
): Promise<Response> {
	try {
		const fields = await parseFormRequest(request);
		const mode = requireFormValue(fields, "hub.mode");
		const { websub, tasks } = runtime;

		switch (mode) {
			case "subscribe": {
				const subscription = subscriptionRequest(fields);
				websub.validateRequest(subscription);
				tasks.run(`websub subscribe ${subscription.callback}`, () =>
					websub.subscribe(subscription),
				);
				return new Response(null, { status: 202 });
			}

			case "unsubscribe": {
				const subscription = {
					callback: requireFormValue(fields, "hub.callback"),
					topic: requireFormValue(fields, "hub.topic"),
				};
				websub.validateRequest(subscription);
				tasks.run(`websub unsubscribe ${subscription.callback}`, () =>
					websub.unsubscribe(subscription),
				);
				return new Response(null, { status: 202 });
			}

			case "publish": {
				const topics = [...formValues(fields, "hub.url"), ...formValues(fields, "hub.topic")];
				if (topics.length === 0) {
					throw new InvalidRequestError("Missing hub.url");
				}
				for (const topic of topics) {
					if (!websub.isPublishedTopic(topic)) {
						throw new InvalidTopicError(topic);
					}
				}
				for (const topic of topics) {
					tasks.run(`websub publish ${topic}`, () => websub.publish(topic));
				}
				return new Response(null, { status: 202 });
			}

			default:
				throw new InvalidRequestError(`Unsupported hub.mode: ${mode}`);
		}
	} catch (error) {
		return errorToResponse(error, runtime.logger);
	}
}
