/**
 * In-process stand-in for the gateway and query engines, exposed as a
 * `fetch` implementation. Tests register handlers for the queries they care
 * about; catalog lookups and SET validation are answered by default.
 */

import { type Connection, connect } from "./core/connection";
import { TokenAuth } from "./core/auth";
import { silentLogger } from "./core/logger";
import type { ConnectOptions } from "./core/settings";
import type { RawColType } from "./types/result";

export const TEST_TOKEN = "test-token";
export const TEST_ACCOUNT = "test-account";
export const TEST_ACCOUNT_ID = "test-account-id";
export const TEST_DATABASE = "test_db";
export const TEST_API_ENDPOINT = "https://api.test.local";
export const SYSTEM_ENGINE_HOST = "system.test.local";
export const SYSTEM_ENGINE_URL = `https://${SYSTEM_ENGINE_HOST}/dynamic/query`;
export const USER_ENGINE_HOST = "my-engine.test.local";
export const USER_ENGINE_URL = `https://${USER_ENGINE_HOST}`;

export interface RecordedRequest {
	method: string;
	host: string;
	pathname: string;
	params: Record<string, string>;
	body: string;
	headers: Headers;
}

export type QueryHandler = (
	request: RecordedRequest,
) => Response | undefined | Promise<Response | undefined>;

export interface EngineRow {
	url: string;
	attachedTo: string | null;
	status: string;
}

export function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

export function textResponse(text: string, status = 200): Response {
	return new Response(text, { status });
}

export function queryResult(
	columns: Array<[name: string, type: string]>,
	data: RawColType[][],
): Response {
	return jsonResponse({
		meta: columns.map(([name, type]) => ({ name, type })),
		data,
		rows: data.length,
		statistics: {
			elapsed: 0.001,
			rows_read: data.length,
			bytes_read: 8 * data.length,
			time_before_execution: 0,
			time_to_execute: 0.001,
		},
	});
}

const ENGINE_NAME_FILTER = /engine_name='([^']*)'/;
const DATABASE_NAME_FILTER = /database_name='([^']*)'/;

export class FakeEngine {
	readonly requests: RecordedRequest[] = [];
	readonly accounts = new Map<string, string>([[TEST_ACCOUNT, TEST_ACCOUNT_ID]]);
	readonly engines = new Map<string, EngineRow>([
		["my_engine", { url: USER_ENGINE_HOST, attachedTo: TEST_DATABASE, status: "Running" }],
		["stopped_engine", { url: "stopped-engine.test.local", attachedTo: TEST_DATABASE, status: "Stopped" }],
	]);
	readonly databases = new Set<string>([TEST_DATABASE]);
	/** SET parameter names the engine rejects with 400. */
	readonly invalidParameters = new Set<string>(["some_invalid_parameter"]);

	private readonly handlers: QueryHandler[] = [];

	/** Register a handler; it is consulted before previously registered ones. */
	onQuery(handler: QueryHandler): this {
		this.handlers.unshift(handler);
		return this;
	}

	/** Requests sent to a query engine (gateway calls excluded). */
	queries(host?: string): RecordedRequest[] {
		return this.requests.filter(
			(request) =>
				request.host !== new URL(TEST_API_ENDPOINT).host &&
				(host === undefined || request.host === host),
		);
	}

	readonly fetch: typeof fetch = async (input, init) => {
		const url = new URL(
			typeof input === "string" ? input : input instanceof URL ? input.href : input.url,
		);
		const request: RecordedRequest = {
			method: init?.method ?? "GET",
			host: url.host,
			pathname: url.pathname,
			params: Object.fromEntries(url.searchParams),
			body: typeof init?.body === "string" ? init.body : "",
			headers: new Headers(init?.headers),
		};
		this.requests.push(request);

		if (url.host === new URL(TEST_API_ENDPOINT).host) {
			return this.handleGateway(request);
		}
		for (const handler of this.handlers) {
			const response = await handler(request);
			if (response) {
				return response;
			}
		}
		return this.handleDefault(request);
	};

	private handleGateway(request: RecordedRequest): Response {
		const match = /^\/web\/v3\/account\/([^/]+)\/(resolve|engineUrl)$/.exec(
			request.pathname,
		);
		const accountName = match?.[1] ? decodeURIComponent(match[1]) : undefined;
		const accountId = accountName ? this.accounts.get(accountName) : undefined;
		if (!match || !accountId) {
			return textResponse("not found", 404);
		}
		return match[2] === "resolve"
			? jsonResponse({ id: accountId, region: "us-east-1" })
			: jsonResponse({ engineUrl: SYSTEM_ENGINE_HOST });
	}

	private handleDefault(request: RecordedRequest): Response {
		const { body, params } = request;

		const engineName = ENGINE_NAME_FILTER.exec(body)?.[1];
		if (body.includes("information_schema.engines") && engineName !== undefined) {
			const engine = this.engines.get(engineName);
			return queryResult(
				[
					["url", "text"],
					["attached_to", "text null"],
					["status", "text"],
				],
				engine ? [[engine.url, engine.attachedTo, engine.status]] : [],
			);
		}

		const databaseName = DATABASE_NAME_FILTER.exec(body)?.[1];
		if (body.includes("information_schema.databases") && databaseName !== undefined) {
			return queryResult(
				[["1", "int"]],
				this.databases.has(databaseName) ? [[1]] : [],
			);
		}

		if (body === "select 1") {
			const rejected = Object.keys(params).find((name) =>
				this.invalidParameters.has(name),
			);
			if (rejected) {
				return textResponse(`Unknown setting ${rejected}`, 400);
			}
			return queryResult([["1", "int"]], [[1]]);
		}

		return textResponse("");
	}
}

export function createFakeEngine(): FakeEngine {
	return new FakeEngine();
}

export async function connectToFake(
	engine: FakeEngine,
	overrides: Partial<ConnectOptions> = {},
): Promise<Connection> {
	return await connect({
		auth: new TokenAuth(TEST_TOKEN),
		accountName: TEST_ACCOUNT,
		apiEndpoint: TEST_API_ENDPOINT,
		fetch: engine.fetch,
		logger: silentLogger,
		...overrides,
	});
}
