/**
 * JSON over HTTP
 *
 * Thin fetch wrapper used for the REST calls the pipeline makes directly
 * (embedding, model discovery). Every call carries a deadline and reports
 * failures as UpstreamError values instead of throwing.
 */

import { Result, ok, err } from './result-types.js';
import {
	UpstreamError,
	UpstreamHttpError,
	UpstreamNetworkError,
	UpstreamResponseError,
	type UpstreamService,
	UpstreamTimeoutError,
	errorMessage,
} from './errors/UpstreamErrors.js';

/**
 * Subset of the fetch signature the pipeline relies on
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface JsonRequestOptions {
	/** Service name used in errors and logs */
	service: UpstreamService;

	/** Deadline for the whole exchange, body included */
	timeoutMs: number;

	/** Injected fetch implementation (default: global fetch) */
	fetchFn?: FetchFn;

	/** Caller cancellation */
	signal?: AbortSignal;
}

/** Response bodies kept on HTTP errors are cut to this length */
const MAX_ERROR_BODY_LENGTH = 500;

/**
 * Perform a request and parse the JSON body
 *
 * @returns Parsed body (unvalidated) or the classified failure
 */
export async function requestJson(
	url: string,
	init: RequestInit,
	options: JsonRequestOptions
): Promise<Result<unknown, UpstreamError>> {
	const fetchFn = options.fetchFn ?? fetch;
	const controller = new AbortController();
	let timedOut = false;

	const timer = setTimeout(() => {
		timedOut = true;
		controller.abort();
	}, options.timeoutMs);

	const onCallerAbort = (): void => controller.abort();
	if (options.signal?.aborted) {
		controller.abort();
	} else {
		options.signal?.addEventListener('abort', onCallerAbort, { once: true });
	}

	try {
		let response: Response;
		try {
			response = await fetchFn(url, { ...init, signal: controller.signal });
		} catch (error) {
			return err(classifyThrown(error, options, timedOut));
		}

		if (!response.ok) {
			const body = await readErrorBody(response);
			return err(
				new UpstreamHttpError(
					`HTTP ${response.status}: ${response.statusText || 'request failed'}`,
					options.service,
					response.status,
					body
				)
			);
		}

		try {
			const body: unknown = await response.json();
			return ok(body);
		} catch (error) {
			if (timedOut || controller.signal.aborted) {
				return err(classifyThrown(error, options, timedOut));
			}
			return err(
				new UpstreamResponseError(
					`Invalid JSON from ${options.service}: ${errorMessage(error)}`,
					options.service,
					error
				)
			);
		}
	} finally {
		clearTimeout(timer);
		options.signal?.removeEventListener('abort', onCallerAbort);
	}
}

function classifyThrown(
	error: unknown,
	options: JsonRequestOptions,
	timedOut: boolean
): UpstreamError {
	if (timedOut) {
		return new UpstreamTimeoutError(options.service, options.timeoutMs);
	}
	return new UpstreamNetworkError(
		`${options.service} request failed: ${errorMessage(error)}`,
		options.service,
		error
	);
}

async function readErrorBody(response: Response): Promise<string | undefined> {
	try {
		const text = await response.text();
		return text.slice(0, MAX_ERROR_BODY_LENGTH);
	} catch {
		return undefined;
	}
}
