import { z } from "zod";
import type { Transport } from "./client";
import type { Connection } from "./connection";
import {
	AccountNotFoundError,
	EngineNotFoundError,
	InterfaceError,
} from "./errors";
import { fixUrlSchema } from "./settings";

export const ENGINE_STATUS_RUNNING = "Running";

const ACCOUNT_BY_NAME = "web/v3/account/{account_name}/resolve";
const GATEWAY_HOST_BY_ACCOUNT_NAME = "web/v3/account/{account_name}/engineUrl";
const DYNAMIC_QUERY = "/dynamic/query";

const accountResponseSchema = z.object({
	id: z.string().min(1),
	region: z.string().optional(),
});

const gatewayResponseSchema = z.object({
	engineUrl: z.string().min(1),
});

export interface EngineInfo {
	url: string;
	status: string;
	/** Database the engine is attached to, if any. */
	database?: string;
}

async function gatewayLookup<T>(
	api: Transport,
	template: string,
	accountName: string,
	schema: z.ZodType<T>,
	what: string,
): Promise<T> {
	const path = template.replace(
		"{account_name}",
		encodeURIComponent(accountName),
	);
	const response = await api.request({ method: "GET", path });
	if (response.status === 404) {
		throw new AccountNotFoundError(accountName);
	}
	if (response.status !== 200) {
		throw new InterfaceError(
			`Unable to retrieve ${what} ${path}: ${response.status} ${response.text}`,
		);
	}
	const parsed = schema.safeParse(response.json());
	if (!parsed.success) {
		throw new InterfaceError(`Unable to retrieve ${what} ${path}: malformed response`);
	}
	return parsed.data;
}

export async function resolveAccountId(
	api: Transport,
	accountName: string,
): Promise<string> {
	const account = await gatewayLookup(
		api,
		ACCOUNT_BY_NAME,
		accountName,
		accountResponseSchema,
		"account id",
	);
	return account.id;
}

export async function getSystemEngineUrl(
	api: Transport,
	accountName: string,
): Promise<string> {
	const gateway = await gatewayLookup(
		api,
		GATEWAY_HOST_BY_ACCOUNT_NAME,
		accountName,
		gatewayResponseSchema,
		"system engine endpoint",
	);
	return fixUrlSchema(gateway.engineUrl.replace(/\/+$/, "") + DYNAMIC_QUERY);
}

/** Catalog name of the engine serving `engineUrl`: its first host label. */
export function engineNameFromUrl(engineUrl: string): string {
	const host = new URL(fixUrlSchema(engineUrl)).hostname;
	return (host.split(".")[0] ?? host).replace(/-/g, "_");
}

export async function resolveEngine(
	systemEngine: Connection,
	engineName: string,
): Promise<EngineInfo> {
	return await systemEngine.withCursor(
		async (cursor) => {
			await cursor.execute(
				"SELECT url, attached_to, status FROM information_schema.engines WHERE engine_name=?",
				[engineName],
			);
			const row = await cursor.fetchone();
			if (row === null) {
				throw new EngineNotFoundError(engineName);
			}
			const [url, database, status] = row;
			return {
				url: String(url),
				status: String(status),
				database: database === null || database === undefined ? undefined : String(database),
			};
		},
		{ diagnostics: false },
	);
}

export async function isEngineRunning(
	connection: Connection,
	engineUrl: string,
): Promise<boolean> {
	const systemEngine = connection.systemEngineConnection;
	if (!systemEngine) {
		// The system engine is always running.
		return true;
	}
	const engine = await resolveEngine(systemEngine, engineNameFromUrl(engineUrl));
	return engine.status === ENGINE_STATUS_RUNNING;
}

export async function isDatabaseAvailable(
	connection: Connection,
	databaseName: string,
): Promise<boolean> {
	const systemEngine = connection.systemEngineConnection ?? connection;
	return await systemEngine.withCursor(
		async (cursor) => {
			const rowcount = await cursor.execute(
				"SELECT 1 FROM information_schema.databases WHERE database_name=?",
				[databaseName],
			);
			return rowcount > 0;
		},
		{ diagnostics: false },
	);
}
