import { DecodeError } from "../core/errors";
import type { ColumnType, ScalarTypeName } from "../types/result";

const SCALAR_ALIASES: Record<string, ScalarTypeName> = {
	int: "int",
	integer: "int",
	int8: "int",
	int16: "int",
	int32: "int",
	uint8: "int",
	uint16: "int",
	uint32: "int",
	long: "long",
	bigint: "long",
	int64: "long",
	uint64: "long",
	float: "float",
	real: "float",
	float32: "float",
	double: "double",
	"double precision": "double",
	float64: "double",
	text: "text",
	string: "text",
	varchar: "text",
	date: "date",
	date32: "date",
	pgdate: "date",
	timestamp: "timestamp",
	datetime: "timestamp",
	timestampntz: "timestamp",
	timestamptz: "timestamptz",
	boolean: "boolean",
	bool: "boolean",
	bytea: "bytea",
	nothing: "null",
};

const NULL_SUFFIX = /\s+null$/;
const WRAPPED = /^(nullable|array)\((.*)\)$/;
const DECIMAL = /^(?:decimal|numeric)\(\s*(\d+)\s*,\s*(\d+)\s*\)$/;
const DATETIME64 = /^datetime64\(\s*\d+\s*\)$/;

function withNullable(type: ColumnType, nullable: boolean): ColumnType {
	return nullable === type.nullable ? type : { ...type, nullable };
}

/**
 * Parse a declared wire type such as `array(integer null)`,
 * `Nullable(Decimal(38, 3))` or `timestamptz`.
 */
export function parseColumnType(raw: string): ColumnType {
	const normalized = raw.trim().toLowerCase().replace(/\s+/g, " ");

	if (NULL_SUFFIX.test(normalized)) {
		return withNullable(
			parseColumnType(normalized.replace(NULL_SUFFIX, "")),
			true,
		);
	}

	const wrapped = WRAPPED.exec(normalized);
	if (wrapped) {
		const [, wrapper, inner = ""] = wrapped;
		if (wrapper === "nullable") {
			return withNullable(parseColumnType(inner), true);
		}
		return { kind: "array", element: parseColumnType(inner), nullable: false };
	}

	const decimal = DECIMAL.exec(normalized);
	if (decimal) {
		return {
			kind: "decimal",
			precision: Number(decimal[1]),
			scale: Number(decimal[2]),
			nullable: false,
		};
	}

	if (DATETIME64.test(normalized)) {
		return { kind: "timestamp", nullable: false };
	}

	const scalar = Object.hasOwn(SCALAR_ALIASES, normalized)
		? SCALAR_ALIASES[normalized]
		: undefined;
	if (!scalar) {
		throw new DecodeError(`Unsupported data type returned: ${raw}`);
	}
	return { kind: scalar, nullable: false };
}

export function formatColumnType(type: ColumnType): string {
	let base: string;
	switch (type.kind) {
		case "array":
			base = `array(${formatColumnType(type.element)})`;
			break;
		case "decimal":
			base = `decimal(${type.precision}, ${type.scale})`;
			break;
		default:
			base = type.kind;
	}
	return type.nullable ? `${base} null` : base;
}
