import { Mutex } from "async-mutex";
import { z } from "zod";
import { type DecodeContext, decodeResponse, decodeRow } from "../codec/decode";
import { type Statement, splitFormatSql } from "../codec/statements";
import {
	type ColType,
	type Column,
	EMPTY_ROW_SET,
	type ParameterType,
	QueryStatus,
	type RowSet,
	type Statistics,
	isQueryStatus,
} from "../types/result";
import { type DiagnosticProbes, raiseIfError } from "./classifier";
import type { QueryParams, Transport, TransportResponse } from "./client";
import {
	AsyncExecutionUnavailableError,
	CursorClosedError,
	DataError,
	NoDataError,
	OperationalError,
} from "./errors";
import type { Logger } from "./logger";

export const JSON_OUTPUT_FORMAT = "JSON_Compact";

/** Statements that embed credentials are never logged. */
const SENSITIVE_QUERY = /aws_key_id|credentials/i;

export type CursorState = "none" | "done" | "error";

/** What a cursor needs from the connection that created it. */
export interface CursorHost {
	readonly transport: Transport;
	readonly database: string | undefined;
	readonly engineUrl: string;
	readonly isSystem: boolean;
	readonly logger: Logger;
	readonly probes: DiagnosticProbes;
	removeCursor(cursor: Cursor): void;
}

export interface CursorOptions {
	/**
	 * Run control-plane lookups (database existence, engine status) to
	 * explain 403/404/503 responses. Defaults to true.
	 */
	diagnostics?: boolean;
}

export interface ExecuteOptions {
	/** Send the query verbatim: no splitting, SET handling or placeholders. */
	skipParsing?: boolean;
	/** Submit for server-side asynchronous execution and return its id. */
	asyncExecution?: boolean;
}

export interface ExecuteManyOptions {
	asyncExecution?: boolean;
}

interface ApiRequestOptions {
	path?: string;
	useSetParameters?: boolean;
}

const asyncResponseSchema = z.object({ query_id: z.string().min(1) });
const statusResponseSchema = z.object({ status: z.string() });

/**
 * Executes queries against the connection's engine and iterates their rows.
 * Create through {@link Connection.cursor}.
 *
 * A multi-statement query yields one row-set per statement; fetches read
 * the current row-set and {@link nextset} moves to the next one.
 */
export class Cursor implements AsyncIterable<ColType[]> {
	/** Default number of rows returned by {@link fetchmany}. */
	arraysize = 1;

	private readonly executionLock = new Mutex();
	private readonly parameters = new Map<string, string>();
	private currentState: CursorState = "none";
	private rowSets: RowSet[] = [];
	private rowSetIndex = 0;
	private rowIndex = 0;
	private currentQueryId: string | null = null;
	private isClosed = false;

	constructor(
		private readonly host: CursorHost,
		private readonly options: CursorOptions = {},
	) {}

	get state(): CursorState {
		return this.currentState;
	}

	get closed(): boolean {
		return this.isClosed;
	}

	/** Columns of the current row-set; null for statements without rows. */
	get description(): readonly Column[] | null {
		return this.currentRowSet()?.columns ?? null;
	}

	get rowcount(): number {
		return this.currentRowSet()?.rowcount ?? -1;
	}

	get statistics(): Statistics | null {
		return this.currentRowSet()?.statistics ?? null;
	}

	/** Id of the last server-side asynchronous submission. */
	get queryId(): string | null {
		return this.currentQueryId;
	}

	/** Session parameters applied by previous SET statements. */
	get setParameters(): Readonly<Record<string, string>> {
		return Object.fromEntries(this.parameters);
	}

	execute(
		query: string,
		parameters: readonly ParameterType[] | undefined,
		options: ExecuteOptions & { asyncExecution: true },
	): Promise<string | null>;
	execute(
		query: string,
		parameters?: readonly ParameterType[],
		options?: ExecuteOptions & { asyncExecution?: false },
	): Promise<number>;
	execute(
		query: string,
		parameters?: readonly ParameterType[],
		options?: ExecuteOptions,
	): Promise<number | string | null>;
	/**
	 * Execute a query template.
	 *
	 * Placeholders (`?`) are replaced by the rendered `parameters`;
	 * statements separated by `;` run one after another; `SET name = value`
	 * statements are validated and kept for the cursor's lifetime.
	 *
	 * @returns the row count of the first statement, or the query id for
	 * asynchronous execution (null when only SET statements ran)
	 */
	async execute(
		query: string,
		parameters?: readonly ParameterType[],
		options: ExecuteOptions = {},
	): Promise<number | string | null> {
		this.ensureOpen("execute");
		const parameterSets = parameters && parameters.length > 0 ? [parameters] : [];
		return await this.run(query, parameterSets, options);
	}

	executemany(
		query: string,
		parameterSets: readonly (readonly ParameterType[])[],
		options: { asyncExecution: true },
	): Promise<string | null>;
	executemany(
		query: string,
		parameterSets: readonly (readonly ParameterType[])[],
		options?: { asyncExecution?: false },
	): Promise<number>;
	executemany(
		query: string,
		parameterSets: readonly (readonly ParameterType[])[],
		options?: ExecuteManyOptions,
	): Promise<number | string | null>;
	/** Execute a query template once per parameter set, in order. */
	async executemany(
		query: string,
		parameterSets: readonly (readonly ParameterType[])[],
		options: ExecuteManyOptions = {},
	): Promise<number | string | null> {
		this.ensureOpen("executemany");
		return await this.run(query, parameterSets, {
			asyncExecution: options.asyncExecution,
		});
	}

	async fetchone(): Promise<ColType[] | null> {
		this.ensureOpen("fetchone");
		await this.waitForExecution();
		return this.takeRows(1)[0] ?? null;
	}

	async fetchmany(size: number = this.arraysize): Promise<ColType[][]> {
		this.ensureOpen("fetchmany");
		if (!Number.isInteger(size) || size < 0) {
			throw new DataError(`Invalid fetchmany size: ${size}`);
		}
		await this.waitForExecution();
		return this.takeRows(size);
	}

	async fetchall(): Promise<ColType[][]> {
		this.ensureOpen("fetchall");
		await this.waitForExecution();
		return this.takeRows(Number.POSITIVE_INFINITY);
	}

	/**
	 * Move to the next row-set.
	 * @returns true, or null when there is no further row-set
	 */
	async nextset(): Promise<true | null> {
		this.ensureOpen("nextset");
		await this.waitForExecution();
		this.ensureExecuted();
		if (this.rowSetIndex + 1 >= this.rowSets.length) {
			return null;
		}
		this.rowSetIndex++;
		this.rowIndex = 0;
		return true;
	}

	/** Poll the status of a server-side asynchronous query. */
	async getStatus(queryId: string): Promise<QueryStatus> {
		this.ensureOpen("getStatus");
		let result: QueryStatus;
		try {
			// Status requests reject session parameters and need an empty output format.
			const response = await this.apiRequest(
				"",
				{ query_id: queryId, output_format: "" },
				{ path: "status", useSetParameters: false },
			);
			if (response.status === 400) {
				throw new OperationalError(
					`Asynchronous query ${queryId} status check failed: ${response.status}.`,
				);
			}
			await this.raiseIfError(response, "status");
			const parsed = statusResponseSchema.safeParse(response.json());
			if (!parsed.success) {
				throw new OperationalError(
					"Invalid response to asynchronous query: missing status.",
				);
			}
			const { status } = parsed.data;
			if (status === "") {
				// The engine reports no status until the query is registered.
				result = QueryStatus.NOT_READY;
			} else if (isQueryStatus(status)) {
				result = status;
			} else {
				throw new OperationalError(
					`Invalid response to asynchronous query: unknown status ${status}.`,
				);
			}
		} catch (error) {
			this.currentState = "error";
			throw error;
		}
		return result;
	}

	/**
	 * Ask the engine to cancel a server-side asynchronous query. Poll
	 * {@link getStatus} to observe the outcome.
	 */
	async cancel(queryId: string): Promise<void> {
		this.ensureOpen("cancel");
		await this.apiRequest(
			"",
			{ query_id: queryId, output_format: "" },
			{ path: "cancel", useSetParameters: false },
		);
	}

	/** Forget every parameter applied by SET statements. */
	flushParameters(): void {
		this.ensureOpen("flushParameters");
		this.parameters.clear();
	}

	close(): void {
		if (this.isClosed) {
			return;
		}
		this.isClosed = true;
		this.reset();
		this.parameters.clear();
		this.host.removeCursor(this);
	}

	async *[Symbol.asyncIterator](): AsyncGenerator<ColType[], void, undefined> {
		this.ensureOpen("iterate");
		this.ensureExecuted();
		for (;;) {
			const row = await this.fetchone();
			if (row === null) {
				return;
			}
			yield row;
		}
	}

	private async run(
		query: string,
		parameterSets: readonly (readonly ParameterType[])[],
		options: ExecuteOptions,
	): Promise<number | string | null> {
		return await this.executionLock.runExclusive(async () => {
			this.reset();
			const { logger } = this.host;
			try {
				let statements: Statement[];
				if (options.skipParsing) {
					if (parameterSets.length > 0) {
						logger.warn(
							"Query formatting parameters are provided but skipParsing is specified. They will be ignored.",
							{ module: "CURSOR" },
						);
					}
					statements = [{ kind: "query", sql: query }];
				} else {
					statements = splitFormatSql(query, parameterSets);
				}

				if (
					options.asyncExecution &&
					statements.filter((statement) => statement.kind === "query").length > 1
				) {
					throw new AsyncExecutionUnavailableError(
						"It is not possible to execute multi-statement queries asynchronously.",
					);
				}

				for (const statement of statements) {
					await this.runStatement(statement, options.asyncExecution ?? false);
				}
				this.currentState = "done";
			} catch (error) {
				this.currentState = "error";
				throw error;
			}
			return options.asyncExecution ? this.currentQueryId : this.rowcount;
		});
	}

	private async runStatement(
		statement: Statement,
		asyncExecution: boolean,
	): Promise<void> {
		const { logger } = this.host;
		const startedAt = Date.now();
		if (statement.kind === "set") {
			logger.debug(`Running query: SET ${statement.name} = ${statement.value}`, {
				module: "CURSOR",
			});
		} else if (!SENSITIVE_QUERY.test(statement.sql)) {
			logger.debug(`Running query: ${statement.sql}`, { module: "CURSOR" });
		}

		let rowSet = EMPTY_ROW_SET;
		if (statement.kind === "set") {
			await this.validateSetParameter(statement.name, statement.value);
		} else if (asyncExecution) {
			this.currentQueryId = await this.submitAsync(statement.sql);
		} else {
			const response = await this.apiRequest(statement.sql, {
				output_format: JSON_OUTPUT_FORMAT,
			});
			await this.raiseIfError(response);
			rowSet = decodeResponse(response.text);
		}
		this.rowSets.push(rowSet);

		logger.info(
			`Query fetched ${rowSet.rowcount} rows in ${(Date.now() - startedAt) / 1000} seconds.`,
			{ module: "CURSOR" },
		);
	}

	private async submitAsync(sql: string): Promise<string> {
		if (this.parameters.get("use_standard_sql") === "0") {
			throw new AsyncExecutionUnavailableError(
				"It is not possible to execute queries asynchronously if use_standard_sql=0.",
			);
		}
		const response = await this.apiRequest(sql, {
			async_execution: 1,
			advanced_mode: 1,
			output_format: JSON_OUTPUT_FORMAT,
		});
		await this.raiseIfError(response);
		if (response.text.trim() === "") {
			throw new OperationalError("No response to asynchronous query.");
		}
		const parsed = asyncResponseSchema.safeParse(response.json());
		if (!parsed.success) {
			throw new OperationalError(
				"Invalid response to asynchronous query: missing query_id.",
			);
		}
		return parsed.data.query_id;
	}

	/** Try a SET value on a trivial query; keep it only if accepted. */
	private async validateSetParameter(name: string, value: string): Promise<void> {
		if (name === "async_execution") {
			throw new AsyncExecutionUnavailableError(
				"It is not possible to set async_execution using a SET command. " +
					"Instead, pass it as an option to execute() or executemany().",
			);
		}
		const response = await this.apiRequest("select 1", {
			[name]: value,
			output_format: JSON_OUTPUT_FORMAT,
		});
		await this.raiseIfError(response, undefined, name);
		this.parameters.set(name, value);
	}

	private async apiRequest(
		query: string,
		parameters: QueryParams,
		{ path = "", useSetParameters = true }: ApiRequestOptions = {},
	): Promise<TransportResponse> {
		const params: QueryParams = useSetParameters
			? { ...Object.fromEntries(this.parameters), ...parameters }
			: { ...parameters };
		if (this.host.database) {
			params.database = this.host.database;
		}
		if (this.host.isSystem) {
			params.account_id = await this.host.transport.getAccountId();
		}
		return await this.host.transport.request({
			method: "POST",
			path,
			params,
			body: query,
		});
	}

	private async raiseIfError(
		response: TransportResponse,
		path?: string,
		setParameter?: string,
	): Promise<void> {
		await raiseIfError(response, {
			database: this.host.database,
			engineUrl: this.host.engineUrl,
			path,
			logger: this.host.logger,
			probes: this.options.diagnostics === false ? undefined : this.host.probes,
			setParameter,
		});
	}

	/** Readers proceed only once no execute holds the lock. */
	private async waitForExecution(): Promise<void> {
		while (this.executionLock.isLocked()) {
			await this.executionLock.waitForUnlock();
		}
	}

	private ensureOpen(method: string): void {
		if (this.isClosed) {
			throw new CursorClosedError(method);
		}
	}

	private ensureExecuted(): void {
		if (this.currentState === "none") {
			throw new NoDataError("Query was not run");
		}
	}

	private currentRowSet(): RowSet | undefined {
		return this.rowSets[this.rowSetIndex];
	}

	private decodeContext(): DecodeContext {
		return {
			timeZone: this.parameters.get("time_zone"),
			boolOutputFormat: this.parameters.get("bool_output_format"),
		};
	}

	/** Decode up to `size` rows from the current offset, then advance it. */
	private takeRows(size: number): ColType[][] {
		this.ensureExecuted();
		const rowSet = this.currentRowSet();
		if (this.currentState === "error" || !rowSet?.rows || !rowSet.columns) {
			throw new NoDataError();
		}
		const { rows, columns } = rowSet;
		const end = Math.min(this.rowIndex + size, rows.length);
		const context = this.decodeContext();
		const decoded = rows
			.slice(this.rowIndex, end)
			.map((row) => decodeRow(row, columns, context));
		this.rowIndex = end;
		return decoded;
	}

	private reset(): void {
		this.currentState = "none";
		this.rowSets = [];
		this.rowSetIndex = 0;
		this.rowIndex = 0;
		this.currentQueryId = null;
	}
}
