import type Decimal from "decimal.js";

export type ScalarTypeName =
	| "int"
	| "long"
	| "float"
	| "double"
	| "text"
	| "date"
	| "timestamp"
	| "timestamptz"
	| "boolean"
	| "bytea"
	| "null";

/** Declared type of a result column, parsed from the wire type string. */
export type ColumnType =
	| { kind: ScalarTypeName; nullable: boolean }
	| { kind: "decimal"; precision: number; scale: number; nullable: boolean }
	| { kind: "array"; element: ColumnType; nullable: boolean };

/** A cell as it arrives in the JSON body, before coercion. */
export type RawColType = null | boolean | number | string | RawColType[];

/** A cell after coercion to its column's declared type. */
export type ColType =
	| null
	| boolean
	| number
	| bigint
	| string
	| Decimal
	| Date
	| Buffer
	| ColType[];

/** A calendar date with no time of day, rendered as `'YYYY-MM-DD'`. */
export interface SqlDate {
	readonly kind: "date";
	readonly year: number;
	readonly month: number;
	readonly day: number;
}

export type ParameterType =
	| null
	| undefined
	| boolean
	| number
	| bigint
	| string
	| Decimal
	| Date
	| SqlDate
	| Uint8Array
	| readonly ParameterType[];

export interface Column {
	readonly name: string;
	readonly typeCode: ColumnType;
	readonly displaySize: number | null;
	readonly internalSize: number | null;
	readonly precision: number | null;
	readonly scale: number | null;
	readonly nullOk: boolean | null;
}

export interface Statistics {
	readonly elapsed: number;
	readonly rowsRead: number;
	readonly bytesRead: number;
	readonly timeBeforeExecution: number;
	readonly timeToExecute: number;
	readonly scannedBytesCache?: number;
	readonly scannedBytesStorage?: number;
}

/**
 * Result of exactly one executed statement. `rowcount === -1` and
 * `columns === null` mark a statement that produced no row data.
 */
export interface RowSet {
	readonly rowcount: number;
	readonly columns: readonly Column[] | null;
	readonly statistics: Statistics | null;
	readonly rows: readonly (readonly RawColType[])[] | null;
}

export const EMPTY_ROW_SET: RowSet = {
	rowcount: -1,
	columns: null,
	statistics: null,
	rows: null,
};

export const QueryStatus = {
	RUNNING: "RUNNING",
	ERROR: "ERROR",
	CANCELED: "CANCELED",
	NOT_READY: "NOT_READY",
	STARTED_EXECUTION: "STARTED_EXECUTION",
	PARSE_ERROR: "PARSE_ERROR",
	CANCELED_EXECUTION: "CANCELED_EXECUTION",
	EXECUTION_ERROR: "EXECUTION_ERROR",
	ENDED_SUCCESSFULLY: "ENDED_SUCCESSFULLY",
} as const;

export type QueryStatus = (typeof QueryStatus)[keyof typeof QueryStatus];

export function isQueryStatus(value: string): value is QueryStatus {
	return Object.prototype.hasOwnProperty.call(QueryStatus, value);
}

export function sqlDate(year: number, month: number, day: number): SqlDate {
	return { kind: "date", year, month, day };
}
