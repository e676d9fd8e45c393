import Decimal from "decimal.js";

export { Decimal };

export { type Auth, ClientCredentialsAuth, type ClientCredentialsOptions, TokenAuth } from "./core/auth";
export {
	HttpTransport,
	type HttpMethod,
	type HttpTransportOptions,
	type QueryParams,
	type Transport,
	type TransportRequest,
	type TransportResponse,
} from "./core/client";
export {
	type ClassifyContext,
	type DiagnosticProbes,
	raiseIfError,
} from "./core/classifier";
export {
	Connection,
	type ConnectionInit,
	connect,
	withConnection,
} from "./core/connection";
export {
	Cursor,
	type CursorHost,
	type CursorOptions,
	type CursorState,
	type ExecuteManyOptions,
	type ExecuteOptions,
	JSON_OUTPUT_FORMAT,
} from "./core/cursor";
export * from "./core/errors";
export {
	createConsoleLogger,
	type LogContext,
	type Logger,
	type LogLevel,
	type LogModule,
	silentLogger,
} from "./core/logger";
export {
	ENGINE_STATUS_RUNNING,
	type EngineInfo,
	engineNameFromUrl,
	getSystemEngineUrl,
	isDatabaseAvailable,
	isEngineRunning,
	resolveAccountId,
	resolveEngine,
} from "./core/resolver";
export {
	type ConnectionSettings,
	type ConnectOptions,
	connectOptionsSchema,
	DEFAULT_API_ENDPOINT,
	DEFAULT_TIMEOUT_MS,
	fixUrlSchema,
	resolveSettings,
} from "./core/settings";

export { formatColumnType, parseColumnType } from "./codec/column-types";
export { type DecodeContext, decodeResponse, decodeRow, decodeValue } from "./codec/decode";
export { formatValue } from "./codec/format";
export {
	type QueryStatement,
	type SetParameter,
	type Statement,
	splitFormatSql,
	statementToSet,
} from "./codec/statements";

export {
	type ColType,
	type Column,
	type ColumnType,
	EMPTY_ROW_SET,
	type ParameterType,
	QueryStatus,
	type RawColType,
	type RowSet,
	type ScalarTypeName,
	type SqlDate,
	type Statistics,
	sqlDate,
} from "./types/result";
