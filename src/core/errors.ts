/**
 * Driver error taxonomy.
 *
 * Every error raised by the driver extends {@link DriverError} and carries a
 * machine-readable `code`, so callers can branch without string matching:
 *
 * ```typescript
 * try {
 *   await cursor.execute("SELECT * FROM events");
 * } catch (error) {
 *   if (isDriverError(error, "ENGINE_NOT_RUNNING")) {
 *     await startEngine();
 *   }
 * }
 * ```
 */

export type DriverErrorCode =
	| "INTERFACE_ERROR"
	| "ACCOUNT_NOT_FOUND"
	| "CONNECTION_CLOSED"
	| "CURSOR_CLOSED"
	| "DATABASE_ERROR"
	| "OPERATIONAL_ERROR"
	| "INVALID_PARAMETER"
	| "ASYNC_EXECUTION_UNAVAILABLE"
	| "PROGRAMMING_ERROR"
	| "DATA_ERROR"
	| "NO_DATA"
	| "DECODE_ERROR"
	| "PARAMETER_COUNT"
	| "MALFORMED_QUERY"
	| "NOT_SUPPORTED"
	| "ENGINE_ERROR"
	| "ENGINE_NOT_FOUND"
	| "ENGINE_NOT_RUNNING"
	| "DATABASE_NOT_FOUND"
	| "HTTP_ERROR";

export class DriverError extends Error {
	readonly code: DriverErrorCode;

	constructor(message: string, code: DriverErrorCode = "DATABASE_ERROR") {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Errors in how the driver itself was used or configured. */
export class InterfaceError extends DriverError {
	constructor(message: string, code: DriverErrorCode = "INTERFACE_ERROR") {
		super(message, code);
	}
}

export class AccountNotFoundError extends InterfaceError {
	readonly accountName: string;

	constructor(accountName: string) {
		super(`Account "${accountName}" does not exist`, "ACCOUNT_NOT_FOUND");
		this.accountName = accountName;
	}
}

export class ConnectionClosedError extends InterfaceError {
	constructor(message = "Connection is closed.") {
		super(message, "CONNECTION_CLOSED");
	}
}

export class CursorClosedError extends InterfaceError {
	constructor(method: string) {
		super(`Unable to call ${method}: cursor closed.`, "CURSOR_CLOSED");
	}
}

/** Errors reported by, or about, the remote database. */
export class DatabaseError extends DriverError {
	constructor(message: string, code: DriverErrorCode = "DATABASE_ERROR") {
		super(message, code);
	}
}

export class OperationalError extends DatabaseError {
	constructor(message: string, code: DriverErrorCode = "OPERATIONAL_ERROR") {
		super(message, code);
	}
}

/** A `SET name = value` statement the engine refused. */
export class InvalidParameterError extends OperationalError {
	readonly parameter: string;

	constructor(parameter: string, detail: string) {
		super(
			`Invalid value for parameter ${parameter}: ${detail}`,
			"INVALID_PARAMETER",
		);
		this.parameter = parameter;
	}
}

export class AsyncExecutionUnavailableError extends OperationalError {
	constructor(message: string) {
		super(message, "ASYNC_EXECUTION_UNAVAILABLE");
	}
}

export class ProgrammingError extends DatabaseError {
	constructor(message: string) {
		super(message, "PROGRAMMING_ERROR");
	}
}

export class DataError extends DatabaseError {
	constructor(message: string, code: DriverErrorCode = "DATA_ERROR") {
		super(message, code);
	}
}

/** A fetch was attempted with no row data pending. */
export class NoDataError extends DataError {
	constructor(message = "No rows to fetch") {
		super(message, "NO_DATA");
	}
}

export class DecodeError extends DataError {
	constructor(message: string) {
		super(message, "DECODE_ERROR");
	}
}

export class ParameterCountError extends DataError {
	constructor(message: string) {
		super(message, "PARAMETER_COUNT");
	}
}

export class MalformedQueryError extends DataError {
	constructor(message: string) {
		super(message, "MALFORMED_QUERY");
	}
}

export class NotSupportedError extends DatabaseError {
	constructor(message: string) {
		super(message, "NOT_SUPPORTED");
	}
}

export class EngineError extends DatabaseError {
	constructor(message: string, code: DriverErrorCode = "ENGINE_ERROR") {
		super(message, code);
	}
}

export class EngineNotFoundError extends EngineError {
	readonly engineName: string;

	constructor(engineName: string) {
		super(`Engine with name ${engineName} doesn't exist`, "ENGINE_NOT_FOUND");
		this.engineName = engineName;
	}
}

export class EngineNotRunningError extends EngineError {
	constructor(engine: string) {
		super(
			`Engine ${engine} needs to be running to run queries against it.`,
			"ENGINE_NOT_RUNNING",
		);
	}
}

export class DatabaseNotFoundError extends DatabaseError {
	readonly databaseName: string;

	constructor(databaseName: string) {
		super(`Database ${databaseName} does not exist`, "DATABASE_NOT_FOUND");
		this.databaseName = databaseName;
	}
}

/** Non-2xx response that no more specific error explains. */
export class HttpError extends DatabaseError {
	readonly status: number;
	readonly body: string;

	constructor(status: number, body: string, path = "") {
		super(
			`Request${path ? ` to ${path}` : ""} failed with status ${status}${
				body ? `: ${body}` : ""
			}`,
			"HTTP_ERROR",
		);
		this.status = status;
		this.body = body;
	}
}

export function isDriverError(
	value: unknown,
	code?: DriverErrorCode,
): value is DriverError {
	return (
		value instanceof DriverError && (code === undefined || value.code === code)
	);
}
