/**
 * Deep module: hides bearer-token handling, URL building and timeouts behind
 * a single `request` call that never throws on HTTP status codes. Status
 * interpretation is the classifier's job.
 */

import type { Auth } from "./auth";
import { ConnectionClosedError, InterfaceError } from "./errors";

export type HttpMethod = "GET" | "POST";

export type QueryParams = Record<string, string | number>;

export interface TransportRequest {
	method: HttpMethod;
	/** Path relative to the base URL; "" targets the base URL itself. */
	path: string;
	params?: QueryParams;
	body?: string;
}

export interface TransportResponse {
	status: number;
	headers: Headers;
	text: string;
	/** Parsed body, or undefined when it is empty or not JSON. */
	json(): unknown;
}

export interface Transport {
	request(request: TransportRequest): Promise<TransportResponse>;
	/** Account id injected into system-engine requests. */
	getAccountId(): Promise<string>;
	close(): Promise<void>;
	readonly closed: boolean;
}

export interface HttpTransportOptions {
	additionalHeaders?: Record<string, string>;
	fetch?: typeof fetch;
	timeoutMs?: number;
	resolveAccountId?: () => Promise<string>;
}

export class HttpTransport implements Transport {
	private readonly baseUrl: string;
	private readonly auth: Auth;
	private readonly additionalHeaders?: Record<string, string>;
	private readonly fetchImpl: typeof fetch;
	private readonly timeoutMs?: number;
	private readonly resolveAccountId?: () => Promise<string>;
	private accountId: Promise<string> | null = null;
	private isClosed = false;

	constructor(baseUrl: string, auth: Auth, options: HttpTransportOptions = {}) {
		if (!baseUrl) {
			throw new InterfaceError("Base URL is required");
		}

		this.baseUrl = baseUrl.replace(/\/+$/, "");
		this.auth = auth;
		this.additionalHeaders = options.additionalHeaders;
		this.fetchImpl = options.fetch ?? globalThis.fetch;
		this.timeoutMs = options.timeoutMs;
		this.resolveAccountId = options.resolveAccountId;

		if (!this.fetchImpl) {
			throw new InterfaceError(
				"Fetch implementation not found. Provide options.fetch or use Node 18+.",
			);
		}
	}

	get closed(): boolean {
		return this.isClosed;
	}

	getBaseUrl(): string {
		return this.baseUrl;
	}

	async getAccountId(): Promise<string> {
		const resolve = this.resolveAccountId;
		if (!resolve) {
			throw new InterfaceError("Account id is not available on this transport");
		}
		this.accountId ??= resolve().catch((error: unknown) => {
			this.accountId = null;
			throw error;
		});
		return await this.accountId;
	}

	async request(request: TransportRequest): Promise<TransportResponse> {
		if (this.isClosed) {
			throw new ConnectionClosedError("Unable to send request: transport closed.");
		}

		const response = await this.send(request);
		if (response.status !== 401) {
			return response;
		}
		// Expired or revoked token: fetch a fresh one and try exactly once more.
		this.auth.invalidate();
		return await this.send(request);
	}

	async close(): Promise<void> {
		this.isClosed = true;
	}

	buildUrl(path: string, params?: QueryParams): string {
		const suffix = path ? `/${path.replace(/^\/+/, "")}` : "";
		const url = `${this.baseUrl}${suffix}`;
		if (!params || Object.keys(params).length === 0) {
			return url;
		}
		const search = new URLSearchParams();
		for (const [key, value] of Object.entries(params)) {
			search.append(key, String(value));
		}
		return `${url}${url.includes("?") ? "&" : "?"}${search.toString()}`;
	}

	private async send(request: TransportRequest): Promise<TransportResponse> {
		const response = await this.fetchImpl(
			this.buildUrl(request.path, request.params),
			{
				method: request.method,
				headers: await this.buildHeaders(request.body !== undefined),
				body: request.body,
				signal:
					this.timeoutMs !== undefined
						? AbortSignal.timeout(this.timeoutMs)
						: undefined,
			},
		);
		const text = await response.text();

		return {
			status: response.status,
			headers: response.headers,
			text,
			json: () => {
				try {
					return text ? JSON.parse(text) : undefined;
				} catch {
					return undefined;
				}
			},
		};
	}

	private async buildHeaders(
		includeBody: boolean,
	): Promise<Record<string, string>> {
		const token = await this.auth.getToken(this.fetchImpl);
		const headers: Record<string, string> = {
			Authorization: `Bearer ${token}`,
			Accept: "application/json",
		};
		if (includeBody) {
			headers["Content-Type"] = "text/plain;charset=UTF-8";
		}
		if (this.additionalHeaders) {
			Object.assign(headers, this.additionalHeaders);
		}
		return headers;
	}
}
