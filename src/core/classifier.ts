import type { TransportResponse } from "./client";
import {
	DatabaseNotFoundError,
	EngineNotFoundError,
	EngineNotRunningError,
	HttpError,
	InvalidParameterError,
	OperationalError,
	ProgrammingError,
} from "./errors";
import type { Logger } from "./logger";

/** Control-plane lookups used to explain an ambiguous failure. */
export interface DiagnosticProbes {
	isDatabaseAvailable(databaseName: string): Promise<boolean>;
	isEngineRunning(engineUrl: string): Promise<boolean>;
}

export interface ClassifyContext {
	database?: string;
	engineUrl: string;
	path?: string;
	logger: Logger;
	/** Omitted for requests that must not trigger follow-up queries. */
	probes?: DiagnosticProbes;
	/** Set when the request validates a `SET name = value` directive. */
	setParameter?: string;
}

/**
 * Run a probe. Its failure counts as "unknown" and never replaces the error
 * being classified, except when the probe found the engine gone.
 */
async function runProbe(
	name: string,
	probe: () => Promise<boolean>,
	logger: Logger,
): Promise<boolean | undefined> {
	try {
		return await probe();
	} catch (error) {
		// A missing engine is a diagnosis in its own right.
		if (error instanceof EngineNotFoundError) {
			throw error;
		}
		logger.warn(`Diagnostic probe ${name} failed`, {
			module: "CLASSIFIER",
			error: error instanceof Error ? error.message : String(error),
		});
		return undefined;
	}
}

/**
 * Turn a non-2xx response into the most specific driver error available.
 * Resolves for 2xx responses; rejects otherwise.
 */
export async function raiseIfError(
	response: TransportResponse,
	context: ClassifyContext,
): Promise<void> {
	const { status, text } = response;
	if (status >= 200 && status < 300) {
		return;
	}

	if (status === 400 && context.setParameter !== undefined) {
		throw new InvalidParameterError(context.setParameter, text);
	}

	if (status === 500) {
		throw new OperationalError(`Error executing query:\n${text}`);
	}

	const { probes, logger } = context;

	if (status === 403) {
		const database = context.database;
		if (database && probes) {
			const available = await runProbe(
				"isDatabaseAvailable",
				() => probes.isDatabaseAvailable(database),
				logger,
			);
			if (available === false) {
				throw new DatabaseNotFoundError(database);
			}
		}
		throw new ProgrammingError(text);
	}

	if ((status === 503 || status === 404) && probes) {
		const running = await runProbe(
			"isEngineRunning",
			() => probes.isEngineRunning(context.engineUrl),
			logger,
		);
		if (running === false) {
			throw new EngineNotRunningError(context.engineUrl);
		}
	}

	throw new HttpError(status, text, context.path);
}
