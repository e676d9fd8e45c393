import type { DiagnosticProbes } from "./classifier";
import { HttpTransport, type HttpTransportOptions, type Transport } from "./client";
import { Cursor, type CursorHost, type CursorOptions } from "./cursor";
import {
	ConnectionClosedError,
	EngineNotRunningError,
	InterfaceError,
} from "./errors";
import type { Logger } from "./logger";
import {
	ENGINE_STATUS_RUNNING,
	getSystemEngineUrl,
	isDatabaseAvailable,
	isEngineRunning,
	resolveAccountId,
	resolveEngine,
} from "./resolver";
import { type ConnectOptions, fixUrlSchema, resolveSettings } from "./settings";

export interface ConnectionInit {
	engineUrl: string;
	database?: string;
	transport: Transport;
	logger: Logger;
	/** Control-plane connection; absent when this connection is the system engine. */
	systemEngineConnection?: Connection;
	/** Extra transports whose lifetime ends with this connection. */
	ownedTransports?: Transport[];
}

/**
 * A session against one engine endpoint. Cursors created from a connection
 * share its transport; closing the connection closes them all.
 */
export class Connection implements CursorHost {
	readonly engineUrl: string;
	readonly database: string | undefined;
	readonly transport: Transport;
	readonly logger: Logger;
	readonly systemEngineConnection: Connection | undefined;
	readonly probes: DiagnosticProbes;

	private readonly ownedTransports: Transport[];
	// Weakly held so that abandoned cursors can be collected.
	private readonly cursors = new Set<WeakRef<Cursor>>();
	private readonly cursorRefs = new WeakMap<Cursor, WeakRef<Cursor>>();
	private isClosed = false;

	constructor(init: ConnectionInit) {
		this.engineUrl = init.engineUrl;
		this.database = init.database;
		this.transport = init.transport;
		this.logger = init.logger;
		this.systemEngineConnection = init.systemEngineConnection;
		this.ownedTransports = init.ownedTransports ?? [];
		this.probes = {
			isDatabaseAvailable: (name) => isDatabaseAvailable(this, name),
			isEngineRunning: (url) => isEngineRunning(this, url),
		};
	}

	/** True when this connection targets the system engine. */
	get isSystem(): boolean {
		return this.systemEngineConnection === undefined;
	}

	get closed(): boolean {
		return this.isClosed;
	}

	/** Number of cursors that are still open. */
	get openCursorCount(): number {
		this.pruneCursors();
		return this.cursors.size;
	}

	cursor(options?: CursorOptions): Cursor {
		if (this.isClosed) {
			throw new ConnectionClosedError("Unable to create cursor: connection closed.");
		}
		this.pruneCursors();
		const cursor = new Cursor(this, options);
		const ref = new WeakRef(cursor);
		this.cursors.add(ref);
		this.cursorRefs.set(cursor, ref);
		return cursor;
	}

	/** Unregister a cursor; unknown cursors are ignored. */
	removeCursor(cursor: Cursor): void {
		const ref = this.cursorRefs.get(cursor);
		if (ref) {
			this.cursors.delete(ref);
			this.cursorRefs.delete(cursor);
		}
	}

	/** Drop entries for cursors collected without being closed. */
	private pruneCursors(): void {
		for (const ref of this.cursors) {
			if (!ref.deref()) {
				this.cursors.delete(ref);
			}
		}
	}

	/** Run `fn` with a fresh cursor that is closed however `fn` exits. */
	async withCursor<T>(
		fn: (cursor: Cursor) => Promise<T>,
		options?: CursorOptions,
	): Promise<T> {
		const cursor = this.cursor(options);
		try {
			return await fn(cursor);
		} finally {
			cursor.close();
		}
	}

	/** Transactions are not supported by the engine; this only checks the connection. */
	commit(): void {
		if (this.isClosed) {
			throw new ConnectionClosedError("Unable to commit: connection closed.");
		}
	}

	async close(): Promise<void> {
		if (this.isClosed) {
			return;
		}
		for (const ref of [...this.cursors]) {
			ref.deref()?.close();
		}
		this.cursors.clear();
		this.isClosed = true;
		await this.transport.close();
		for (const transport of this.ownedTransports) {
			await transport.close();
		}
		await this.systemEngineConnection?.close();
		this.logger.debug("Connection closed", {
			module: "CONNECTION",
			engineUrl: this.engineUrl,
		});
	}
}

/**
 * Open a connection.
 *
 * Without `engineName` or `engineUrl` the connection targets the account's
 * system engine. With `engineName` the engine is looked up on the system
 * engine and must be running.
 *
 * @example
 * ```typescript
 * const connection = await connect({
 *   auth: new ClientCredentialsAuth("client-id", "client-secret"),
 *   accountName: "analytics",
 *   engineName: "reporting",
 *   database: "events",
 * });
 * ```
 */
export async function connect(options: ConnectOptions): Promise<Connection> {
	const settings = resolveSettings(options);
	const { auth, accountName, logger } = settings;
	const transportOptions: HttpTransportOptions = {
		additionalHeaders: settings.additionalHeaders,
		fetch: settings.fetch,
		timeoutMs: settings.timeoutMs,
	};

	const api = new HttpTransport(settings.apiEndpoint, auth, transportOptions);
	const systemEngineUrl = await getSystemEngineUrl(api, accountName);
	const systemTransport = new HttpTransport(systemEngineUrl, auth, {
		...transportOptions,
		resolveAccountId: () => resolveAccountId(api, accountName),
	});
	const targetsUserEngine = Boolean(settings.engineName || settings.engineUrl);

	const systemEngine = new Connection({
		engineUrl: systemEngineUrl,
		// Beside a user engine the system connection only serves catalog lookups.
		database: targetsUserEngine ? undefined : settings.database,
		transport: systemTransport,
		logger,
		ownedTransports: [api],
	});
	if (!targetsUserEngine) {
		return systemEngine;
	}

	try {
		let engineUrl = settings.engineUrl;
		let database = settings.database;
		if (settings.engineName) {
			const engine = await resolveEngine(systemEngine, settings.engineName);
			if (engine.status !== ENGINE_STATUS_RUNNING) {
				throw new EngineNotRunningError(settings.engineName);
			}
			if (database !== undefined && database !== engine.database) {
				throw new InterfaceError(
					`Engine ${settings.engineName} is not attached to ${database}, but to ${engine.database ?? "no database"}`,
				);
			}
			database ??= engine.database;
			engineUrl = fixUrlSchema(engine.url);
		}
		if (!engineUrl) {
			throw new InterfaceError("Engine URL could not be determined");
		}

		logger.debug("Connected", { module: "CONNECTION", engineUrl, database });
		return new Connection({
			engineUrl,
			database,
			transport: new HttpTransport(engineUrl, auth, transportOptions),
			logger,
			systemEngineConnection: systemEngine,
		});
	} catch (error) {
		await systemEngine.close();
		throw error;
	}
}

/** Open a connection, run `fn`, and close the connection however `fn` exits. */
export async function withConnection<T>(
	options: ConnectOptions,
	fn: (connection: Connection) => Promise<T>,
): Promise<T> {
	const connection = await connect(options);
	try {
		return await fn(connection);
	} finally {
		await connection.close();
	}
}
