import Decimal from "decimal.js";
import { DataError } from "../core/errors";
import type { ParameterType, SqlDate } from "../types/result";

const STRING_ESCAPES: Record<string, string> = {
	"'": "''",
	"\0": "\\0",
};

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

function isSqlDate(value: object): value is SqlDate {
	return "kind" in value && value.kind === "date";
}

function formatSqlDate(value: SqlDate): string {
	return `'${pad(value.year, 4)}-${pad(value.month)}-${pad(value.day)}'`;
}

/** `'YYYY-MM-DD HH:MM:SS[.ffffff]'` in UTC. */
function formatTimestamp(value: Date): string {
	if (Number.isNaN(value.getTime())) {
		throw new DataError("Invalid Date cannot be used as a query parameter");
	}
	const date = `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
	const time = `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
	const millis = value.getUTCMilliseconds();
	const fraction = millis > 0 ? `.${pad(millis, 3)}000` : "";
	return `'${date} ${time}${fraction}'`;
}

function formatNumber(value: number): string {
	if (Number.isNaN(value)) return "'nan'";
	if (value === Number.POSITIVE_INFINITY) return "'inf'";
	if (value === Number.NEGATIVE_INFINITY) return "'-inf'";
	return String(value);
}

function formatBytes(value: Uint8Array): string {
	let body = "";
	for (const byte of value) {
		body += `\\x${byte.toString(16).padStart(2, "0")}`;
	}
	return `E'${body}'`;
}

/**
 * Render a bound parameter as a SQL literal.
 */
export function formatValue(value: ParameterType): string {
	if (value === null || value === undefined) {
		return "NULL";
	}
	if (typeof value === "boolean") {
		return value ? "true" : "false";
	}
	if (typeof value === "number") {
		return formatNumber(value);
	}
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "string") {
		return `'${value.replace(/['\0]/g, (ch) => STRING_ESCAPES[ch] ?? ch)}'`;
	}
	if (Decimal.isDecimal(value)) {
		return value.toFixed();
	}
	if (value instanceof Date) {
		return formatTimestamp(value);
	}
	if (value instanceof Uint8Array) {
		return formatBytes(value);
	}
	if (Array.isArray(value)) {
		return `[${value.map((item: ParameterType) => formatValue(item)).join(", ")}]`;
	}
	if (isSqlDate(value)) {
		return formatSqlDate(value);
	}
	throw new DataError(`Unsupported parameter type: ${Object.prototype.toString.call(value)}`);
}
