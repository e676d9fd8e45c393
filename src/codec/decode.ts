import Decimal from "decimal.js";
import { z } from "zod";
import { DecodeError } from "../core/errors";
import {
	type ColType,
	type Column,
	type ColumnType,
	EMPTY_ROW_SET,
	type RawColType,
	type RowSet,
	type Statistics,
} from "../types/result";
import { formatColumnType, parseColumnType } from "./column-types";

/** Session settings that change how cells are read. */
export interface DecodeContext {
	timeZone?: string;
	boolOutputFormat?: string;
}

const rawValueSchema: z.ZodType<RawColType> = z.lazy(() =>
	z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(rawValueSchema)]),
);

const statisticsSchema = z.object({
	elapsed: z.number(),
	rows_read: z.number(),
	bytes_read: z.number(),
	time_before_execution: z.number(),
	time_to_execute: z.number(),
	scanned_bytes_cache: z.number().optional(),
	scanned_bytes_storage: z.number().optional(),
});

const queryResponseSchema = z.object({
	meta: z.array(z.object({ name: z.string(), type: z.string() })),
	data: z.array(z.array(rawValueSchema)),
	rows: z.number().int(),
	statistics: statisticsSchema.nullish(),
});

function toStatistics(raw: z.infer<typeof statisticsSchema>): Statistics {
	return {
		elapsed: raw.elapsed,
		rowsRead: raw.rows_read,
		bytesRead: raw.bytes_read,
		timeBeforeExecution: raw.time_before_execution,
		timeToExecute: raw.time_to_execute,
		scannedBytesCache: raw.scanned_bytes_cache,
		scannedBytesStorage: raw.scanned_bytes_storage,
	};
}

function toColumn(name: string, rawType: string): Column {
	const typeCode = parseColumnType(rawType);
	return {
		name,
		typeCode,
		displaySize: null,
		internalSize: null,
		precision: typeCode.kind === "decimal" ? typeCode.precision : null,
		scale: typeCode.kind === "decimal" ? typeCode.scale : null,
		nullOk: typeCode.nullable,
	};
}

/**
 * Turn a query response body into a {@link RowSet}. Bodies without column
 * metadata belong to statements with no row data.
 */
export function decodeResponse(body: string): RowSet {
	if (body.trim() === "") {
		return EMPTY_ROW_SET;
	}

	let json: unknown;
	try {
		json = JSON.parse(body);
	} catch (error) {
		throw new DecodeError(
			`Invalid query data format: ${error instanceof Error ? error.message : String(error)}`,
		);
	}
	if (typeof json !== "object" || json === null || !("meta" in json)) {
		return EMPTY_ROW_SET;
	}

	const parsed = queryResponseSchema.safeParse(json);
	if (!parsed.success) {
		throw new DecodeError(
			`Invalid query data format: ${parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
				.join("; ")}`,
		);
	}

	const { meta, data, rows, statistics } = parsed.data;
	return {
		rowcount: rows,
		columns: meta.map((column) => toColumn(column.name, column.type)),
		statistics: statistics ? toStatistics(statistics) : null,
		rows: data,
	};
}

const INTEGER_TEXT = /^[+-]?\d+$/;
const DATE_TEXT = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIMESTAMP_TEXT =
	/^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;
const OFFSET_TEXT = /^([+-])(\d{2})(?::?(\d{2}))?$/;
const UTC_ZONES = new Set(["utc", "etc/utc", "gmt", "z"]);

function fail(value: RawColType, type: ColumnType, reason?: string): never {
	throw new DecodeError(
		`Unable to decode ${JSON.stringify(value)} as ${formatColumnType(type)}${
			reason ? `: ${reason}` : ""
		}`,
	);
}

function decodeInteger(value: RawColType, type: ColumnType): number | bigint {
	if (typeof value === "number") {
		if (!Number.isInteger(value)) fail(value, type);
		return value;
	}
	if (typeof value === "string" && INTEGER_TEXT.test(value)) {
		const asNumber = Number(value);
		return Number.isSafeInteger(asNumber) ? asNumber : BigInt(value);
	}
	return fail(value, type);
}

function decodeFloat(value: RawColType, type: ColumnType): number {
	if (typeof value === "number") return value;
	if (typeof value !== "string") return fail(value, type);

	const text = value.trim().toLowerCase();
	switch (text) {
		case "inf":
		case "+inf":
		case "infinity":
			return Number.POSITIVE_INFINITY;
		case "-inf":
		case "-infinity":
			return Number.NEGATIVE_INFINITY;
		case "nan":
		case "+nan":
		case "-nan":
			return Number.NaN;
	}
	const parsed = Number(text);
	if (text === "" || Number.isNaN(parsed)) return fail(value, type);
	return parsed;
}

function decodeDecimal(value: RawColType, type: ColumnType): Decimal {
	if (typeof value !== "number" && typeof value !== "string") {
		return fail(value, type);
	}
	try {
		return new Decimal(value);
	} catch (error) {
		return fail(value, type, error instanceof Error ? error.message : undefined);
	}
}

function zoneOffsetMillis(timeZone: string, utcMillis: number): number {
	const offset = OFFSET_TEXT.exec(timeZone);
	if (offset) {
		const sign = offset[1] === "-" ? -1 : 1;
		return sign * (Number(offset[2]) * 60 + Number(offset[3] ?? 0)) * 60_000;
	}
	if (UTC_ZONES.has(timeZone.toLowerCase())) {
		return 0;
	}
	const parts = new Intl.DateTimeFormat("en-US", {
		timeZone,
		hourCycle: "h23",
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
		hour: "2-digit",
		minute: "2-digit",
		second: "2-digit",
	}).formatToParts(new Date(utcMillis));
	const field = (name: Intl.DateTimeFormatPartTypes) =>
		Number(parts.find((part) => part.type === name)?.value ?? 0);
	const wallClock = Date.UTC(
		field("year"),
		field("month") - 1,
		field("day"),
		field("hour"),
		field("minute"),
		field("second"),
	);
	return wallClock - Math.floor(utcMillis / 1000) * 1000;
}

function decodeTimestamp(
	value: RawColType,
	type: ColumnType,
	context: DecodeContext,
): Date {
	if (typeof value !== "string") return fail(value, type);
	const match = TIMESTAMP_TEXT.exec(value.trim());
	if (!match) return fail(value, type);

	const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "", zone] =
		match;
	const wallClock = Date.UTC(
		Number(year),
		Number(month) - 1,
		Number(day),
		Number(hour),
		Number(minute),
		Number(second),
		Number(fraction.padEnd(3, "0").slice(0, 3)),
	);

	if (type.kind !== "timestamptz") {
		if (zone) fail(value, type, "unexpected time zone offset");
		return new Date(wallClock);
	}

	const timeZone = zone ?? context.timeZone ?? "UTC";
	try {
		// Re-read the offset at the corrected instant for daylight-saving switches.
		const guess = zoneOffsetMillis(timeZone, wallClock);
		return new Date(wallClock - zoneOffsetMillis(timeZone, wallClock - guess));
	} catch (error) {
		return fail(value, type, error instanceof Error ? error.message : undefined);
	}
}

function decodeDate(value: RawColType, type: ColumnType): Date {
	if (typeof value !== "string") return fail(value, type);
	const match = DATE_TEXT.exec(value.trim());
	if (!match) return fail(value, type);
	return new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
}

function decodeBoolean(
	value: RawColType,
	type: ColumnType,
	context: DecodeContext,
): boolean {
	if (typeof value === "boolean") return value;
	if (value === 1 || value === 0) return value === 1;
	if (typeof value === "string" && context.boolOutputFormat) {
		switch (value.trim().toLowerCase()) {
			case "t":
			case "true":
			case "1":
				return true;
			case "f":
			case "false":
			case "0":
				return false;
		}
	}
	return fail(value, type);
}

function decodeBytes(value: RawColType, type: ColumnType): Buffer {
	if (typeof value !== "string") return fail(value, type);
	if (value.startsWith("\\x")) {
		const hex = value.slice(2);
		if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
			return fail(value, type, "malformed hex encoding");
		}
		return Buffer.from(hex, "hex");
	}
	return Buffer.from(value, "utf8");
}

/** Coerce one raw cell to the native value of its declared type. */
export function decodeValue(
	value: RawColType,
	type: ColumnType,
	context: DecodeContext = {},
): ColType {
	if (value === null) {
		return null;
	}
	if (type.kind === "array") {
		if (!Array.isArray(value)) return fail(value, type, "expected an array");
		const element = type.element;
		return value.map((item) => decodeValue(item, element, context));
	}
	if (Array.isArray(value)) {
		return fail(value, type, "unexpected array");
	}

	switch (type.kind) {
		case "int":
		case "long":
			return decodeInteger(value, type);
		case "float":
		case "double":
			return decodeFloat(value, type);
		case "decimal":
			return decodeDecimal(value, type);
		case "text":
			return typeof value === "string" ? value : String(value);
		case "date":
			return decodeDate(value, type);
		case "timestamp":
		case "timestamptz":
			return decodeTimestamp(value, type, context);
		case "boolean":
			return decodeBoolean(value, type, context);
		case "bytea":
			return decodeBytes(value, type);
		case "null":
			return null;
	}
}

export function decodeRow(
	row: readonly RawColType[],
	columns: readonly Column[],
	context: DecodeContext = {},
): ColType[] {
	if (row.length !== columns.length) {
		throw new DecodeError(
			`Row has ${row.length} values but ${columns.length} columns were described`,
		);
	}
	return columns.map((column, index) =>
		decodeValue(row[index] ?? null, column.typeCode, context),
	);
}
