import Decimal from "decimal.js";
import { describe, expect, it } from "vitest";
import { DecodeError } from "../core/errors";
import {
	type ColType,
	type ColumnType,
	EMPTY_ROW_SET,
	type ParameterType,
	type RawColType,
	type ScalarTypeName,
	sqlDate,
} from "../types/result";
import { formatColumnType, parseColumnType } from "./column-types";
import { decodeResponse, decodeRow, decodeValue } from "./decode";
import { formatValue } from "./format";

const scalar = (kind: ScalarTypeName): ColumnType => ({ kind, nullable: false });

/** The cell the engine sends back for a rendered literal. */
function literalToWire(literal: string): RawColType {
	if (literal === "NULL") return null;
	if (literal === "true" || literal === "false") return literal === "true";
	if (literal.startsWith("E'")) {
		return `\\x${literal.slice(2, -1).replace(/\\x/g, "")}`;
	}
	if (literal.startsWith("'")) {
		return literal.slice(1, -1).replace(/''/g, "'").replace(/\\0/g, "\0");
	}
	return literal;
}

function toWire(value: ParameterType): RawColType {
	if (Array.isArray(value)) {
		return value.map((item: ParameterType) => toWire(item));
	}
	return literalToWire(formatValue(value));
}

describe("parseColumnType", () => {
	it("should map aliases to scalar types", () => {
		expect(parseColumnType("int")).toEqual({ kind: "int", nullable: false });
		expect(parseColumnType("BIGINT")).toEqual({ kind: "long", nullable: false });
		expect(parseColumnType("double precision")).toEqual({
			kind: "double",
			nullable: false,
		});
		expect(parseColumnType("DateTime64(3)")).toEqual({
			kind: "timestamp",
			nullable: false,
		});
	});

	it("should read both nullability spellings", () => {
		expect(parseColumnType("text null")).toEqual({ kind: "text", nullable: true });
		expect(parseColumnType("Nullable(String)")).toEqual({
			kind: "text",
			nullable: true,
		});
	});

	it("should parse decimals and nested arrays", () => {
		expect(parseColumnType("numeric(10, 2) null")).toEqual({
			kind: "decimal",
			precision: 10,
			scale: 2,
			nullable: true,
		});
		expect(parseColumnType("array(array(integer null))")).toEqual({
			kind: "array",
			element: {
				kind: "array",
				element: { kind: "int", nullable: true },
				nullable: false,
			},
			nullable: false,
		});
	});

	it("should reject unknown types", () => {
		expect(() => parseColumnType("geography")).toThrow(
			new DecodeError("Unsupported data type returned: geography"),
		);
	});

	it("should not resolve object prototype names as types", () => {
		expect(() => parseColumnType("constructor")).toThrow(
			new DecodeError("Unsupported data type returned: constructor"),
		);
		expect(() => parseColumnType("toString")).toThrow(
			new DecodeError("Unsupported data type returned: toString"),
		);
	});

	it("should format types back to text", () => {
		expect(formatColumnType(parseColumnType("array(int null)"))).toBe(
			"array(int null)",
		);
		expect(formatColumnType(parseColumnType("decimal(38,3)"))).toBe(
			"decimal(38, 3)",
		);
	});
});

describe("decodeResponse", () => {
	it("should treat an empty body as a statement without rows", () => {
		expect(decodeResponse("")).toBe(EMPTY_ROW_SET);
		expect(decodeResponse("{}")).toBe(EMPTY_ROW_SET);
	});

	it("should describe columns and map statistics", () => {
		const rowSet = decodeResponse(
			JSON.stringify({
				meta: [
					{ name: "id", type: "int" },
					{ name: "price", type: "decimal(38, 3) null" },
				],
				data: [[1, "1.500"]],
				rows: 1,
				statistics: {
					elapsed: 0.5,
					rows_read: 10,
					bytes_read: 80,
					time_before_execution: 0.1,
					time_to_execute: 0.4,
				},
			}),
		);

		expect(rowSet.rowcount).toBe(1);
		expect(rowSet.rows).toEqual([[1, "1.500"]]);
		expect(rowSet.columns).toEqual([
			{
				name: "id",
				typeCode: { kind: "int", nullable: false },
				displaySize: null,
				internalSize: null,
				precision: null,
				scale: null,
				nullOk: false,
			},
			{
				name: "price",
				typeCode: { kind: "decimal", precision: 38, scale: 3, nullable: true },
				displaySize: null,
				internalSize: null,
				precision: 38,
				scale: 3,
				nullOk: true,
			},
		]);
		expect(rowSet.statistics).toEqual({
			elapsed: 0.5,
			rowsRead: 10,
			bytesRead: 80,
			timeBeforeExecution: 0.1,
			timeToExecute: 0.4,
			scannedBytesCache: undefined,
			scannedBytesStorage: undefined,
		});
	});

	it("should reject bodies that are not JSON", () => {
		expect(() => decodeResponse("{")).toThrow(DecodeError);
	});

	it("should reject bodies missing required fields", () => {
		expect(() =>
			decodeResponse(JSON.stringify({ meta: [], data: [] })),
		).toThrow("Invalid query data format: rows: Required");
	});
});

describe("decodeValue", () => {
	it("should pass null through for every type", () => {
		expect(decodeValue(null, scalar("int"))).toBeNull();
		expect(decodeValue(null, { kind: "array", element: scalar("int"), nullable: true })).toBeNull();
	});

	it("should keep safe integers as numbers and widen the rest", () => {
		expect(decodeValue(42, scalar("int"))).toBe(42);
		expect(decodeValue("42", scalar("long"))).toBe(42);
		expect(decodeValue("9007199254740993", scalar("long"))).toBe(
			9007199254740993n,
		);
		expect(() => decodeValue(1.5, scalar("int"))).toThrow(
			"Unable to decode 1.5 as int",
		);
	});

	it("should read special float spellings", () => {
		expect(decodeValue(1.25, scalar("double"))).toBe(1.25);
		expect(decodeValue("inf", scalar("float"))).toBe(Number.POSITIVE_INFINITY);
		expect(decodeValue("-inf", scalar("float"))).toBe(Number.NEGATIVE_INFINITY);
		expect(decodeValue("nan", scalar("double"))).toBeNaN();
		expect(() => decodeValue("abc", scalar("float"))).toThrow(
			'Unable to decode "abc" as float',
		);
	});

	it("should decode decimals exactly", () => {
		const value = decodeValue("12345678901234567890.123", {
			kind: "decimal",
			precision: 38,
			scale: 3,
			nullable: false,
		});
		expect(Decimal.isDecimal(value)).toBe(true);
		expect(String(value)).toBe("12345678901234567890.123");
	});

	it("should decode dates and naive timestamps as UTC", () => {
		expect(decodeValue("2021-01-01", scalar("date"))).toEqual(
			new Date(Date.UTC(2021, 0, 1)),
		);
		expect(decodeValue("2021-01-01 01:01:01.123456", scalar("timestamp"))).toEqual(
			new Date(Date.UTC(2021, 0, 1, 1, 1, 1, 123)),
		);
		expect(() => decodeValue("2021-13", scalar("date"))).toThrow(DecodeError);
	});

	it("should apply explicit offsets and the session time zone", () => {
		expect(decodeValue("2023-05-01 10:00:00+02", scalar("timestamptz"))).toEqual(
			new Date(Date.UTC(2023, 4, 1, 8)),
		);
		expect(decodeValue("2023-05-01 10:00:00", scalar("timestamptz"))).toEqual(
			new Date(Date.UTC(2023, 4, 1, 10)),
		);
		expect(
			decodeValue("2023-05-01 10:00:00", scalar("timestamptz"), {
				timeZone: "+05:30",
			}),
		).toEqual(new Date(Date.UTC(2023, 4, 1, 4, 30)));
		expect(
			decodeValue("2023-05-01 10:00:00", scalar("timestamptz"), {
				timeZone: "Europe/Berlin",
			}),
		).toEqual(new Date(Date.UTC(2023, 4, 1, 8)));
	});

	it("should take the zone offset at the real instant across daylight-saving switches", () => {
		const newYork = { timeZone: "America/New_York" };

		expect(
			decodeValue("2023-03-12 06:30:00", scalar("timestamptz"), newYork),
		).toEqual(new Date(Date.UTC(2023, 2, 12, 10, 30)));
		expect(
			decodeValue("2023-11-05 03:00:00", scalar("timestamptz"), newYork),
		).toEqual(new Date(Date.UTC(2023, 10, 5, 8)));
	});

	it("should reject an offset on a naive timestamp", () => {
		expect(() =>
			decodeValue("2023-05-01 10:00:00+02", scalar("timestamp")),
		).toThrow(
			'Unable to decode "2023-05-01 10:00:00+02" as timestamp: unexpected time zone offset',
		);
	});

	it("should accept text booleans only under a boolean output format", () => {
		expect(decodeValue(true, scalar("boolean"))).toBe(true);
		expect(decodeValue(0, scalar("boolean"))).toBe(false);
		expect(() => decodeValue("t", scalar("boolean"))).toThrow(
			'Unable to decode "t" as boolean',
		);
		expect(
			decodeValue("t", scalar("boolean"), { boolOutputFormat: "postgres" }),
		).toBe(true);
	});

	it("should decode hex-encoded bytes", () => {
		expect(decodeValue("\\x6869", scalar("bytea"))).toEqual(Buffer.from("hi"));
		expect(() => decodeValue("\\x6", scalar("bytea"))).toThrow(
			'Unable to decode "\\\\x6" as bytea: malformed hex encoding',
		);
	});

	it("should decode arrays element by element", () => {
		const type = parseColumnType("array(array(int null))");
		expect(decodeValue([[1, null], [3]], type)).toEqual([[1, null], [3]]);
		expect(() => decodeValue(1, type)).toThrow("expected an array");
		expect(() => decodeValue([1], scalar("int"))).toThrow(
			"Unable to decode [1] as int: unexpected array",
		);
	});
});

describe("decodeRow", () => {
	it("should reject rows that do not match the description", () => {
		const rowSet = decodeResponse(
			JSON.stringify({ meta: [{ name: "a", type: "int" }], data: [], rows: 0 }),
		);
		expect(() => decodeRow([1, 2], rowSet.columns ?? [])).toThrow(
			"Row has 2 values but 1 columns were described",
		);
	});
});

describe("literal round trip", () => {
	const stamp = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678));
	const cases: Array<[string, ParameterType, string, ColType]> = [
		["null", null, "int null", null],
		["true", true, "boolean", true],
		["false", false, "boolean", false],
		["int", 42, "int", 42],
		["long", 12345678901234567890n, "long", 12345678901234567890n],
		["negative double", -1.5, "double", -1.5],
		["infinity", Number.POSITIVE_INFINITY, "double", Number.POSITIVE_INFINITY],
		["nan", Number.NaN, "double", Number.NaN],
		["decimal", new Decimal("123.456"), "decimal(38, 3)", new Decimal("123.456")],
		["quoted text", "it's a \0 test", "text", "it's a \0 test"],
		["empty text", "", "text", ""],
		["unicode text", "ヽ༼ຈل͜ຈ༽ﾉ", "text", "ヽ༼ຈل͜ຈ༽ﾉ"],
		[
			"bytes",
			Buffer.from("bytea_123\n\tヽ༼ຈل͜ຈ༽ﾉ"),
			"bytea",
			Buffer.from("bytea_123\n\tヽ༼ຈل͜ຈ༽ﾉ"),
		],
		["date", sqlDate(2024, 2, 29), "date", new Date(Date.UTC(2024, 1, 29))],
		["timestamp", stamp, "timestamp", stamp],
		["timestamptz", stamp, "timestamptz", stamp],
		["int array", [1, null, 3], "array(int null)", [1, null, 3]],
		[
			"nested text array",
			[["a", "b'c"], []],
			"array(array(text))",
			[["a", "b'c"], []],
		],
	];

	it.each(cases)("should read back a rendered %s", (_name, value, type, expected) => {
		expect(decodeValue(toWire(value), parseColumnType(type))).toEqual(expected);
	});
});
