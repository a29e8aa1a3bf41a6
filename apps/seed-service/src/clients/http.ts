import { ResultAsync, err, ok, type Result } from 'neverthrow';
import { getGlobalDispatcher, request, type Dispatcher } from 'undici';
import { z } from 'zod/v4';
import { StoreErrors, type StoreError } from '../seed/errors.js';

/**
 * Options shared by the service clients
 */
export interface HttpClientOptions {
	/** Service base URL including the version prefix, e.g. http://localhost:9022/v1 */
	baseUrl: string;
	/** Headers and body timeout in milliseconds */
	timeoutMs: number;
	/** Defaults to undici's global dispatcher; tests pass a MockAgent */
	dispatcher?: Dispatcher | undefined;
}

export interface HttpResponse {
	statusCode: number;
	text: string;
}

/** Longest response body quoted back in an error */
const MAX_ERROR_BODY = 500;

/**
 * Minimal JSON-over-HTTP client. Transport failures come back as
 * `unreachable`; status codes are left for the caller to interpret.
 */
export class JsonHttpClient {
	private readonly resource: string;
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly dispatcher: Dispatcher;

	constructor(resource: string, options: HttpClientOptions) {
		this.resource = resource;
		this.baseUrl = options.baseUrl.replace(/\/+$/, '');
		this.timeoutMs = options.timeoutMs;
		this.dispatcher = options.dispatcher ?? getGlobalDispatcher();
	}

	get(path: string): ResultAsync<HttpResponse, StoreError> {
		return this.send('GET', path, undefined);
	}

	put(path: string, payload: unknown): ResultAsync<HttpResponse, StoreError> {
		return this.send('PUT', path, payload);
	}

	private send(method: 'GET' | 'PUT', path: string, payload: unknown): ResultAsync<HttpResponse, StoreError> {
		return ResultAsync.fromPromise(this.execute(method, `${this.baseUrl}${path}`, payload), (error) =>
			StoreErrors.unreachable(this.resource, error),
		);
	}

	private async execute(method: 'GET' | 'PUT', url: string, payload: unknown): Promise<HttpResponse> {
		const headers: Record<string, string> = {
			'Accept': 'application/json',
		};
		if (payload !== undefined) {
			headers['Content-Type'] = 'application/json';
		}

		const { statusCode, body } = await request(url, {
			method,
			headers,
			body: payload === undefined ? null : JSON.stringify(payload),
			dispatcher: this.dispatcher,
			headersTimeout: this.timeoutMs,
			bodyTimeout: this.timeoutMs,
		});

		return { statusCode, text: await body.text() };
	}
}

/**
 * Map a response status to a store error. 404 is `not_found`, 409 and 412
 * are `conflict`, anything else outside 2xx is `http_error`.
 */
export function expectSuccess(resource: string, response: HttpResponse): Result<HttpResponse, StoreError> {
	const { statusCode, text } = response;
	if (statusCode >= 200 && statusCode < 300) {
		return ok(response);
	}
	if (statusCode === 404) {
		return err(StoreErrors.notFound(resource));
	}
	const message = text.slice(0, MAX_ERROR_BODY) || `HTTP ${statusCode}`;
	if (statusCode === 409 || statusCode === 412) {
		return err(StoreErrors.conflict(resource, message));
	}
	return err(StoreErrors.httpError(resource, statusCode, message));
}

/**
 * Parse and validate a JSON response body.
 */
export function parseBody<T extends z.ZodType>(
	resource: string,
	schema: T,
	response: HttpResponse,
): Result<z.infer<T>, StoreError> {
	let raw: unknown;
	try {
		raw = JSON.parse(response.text);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		return err(StoreErrors.invalidResponse(resource, message));
	}

	const parsed = schema.safeParse(raw);
	if (!parsed.success) {
		return err(StoreErrors.invalidResponse(resource, z.prettifyError(parsed.error)));
	}
	return ok(parsed.data);
}

export function encodePath(...segments: string[]): string {
	return segments.map((segment) => `/${encodeURIComponent(segment)}`).join('');
}
