/**
 * Statement codec: splits a query template into statements, substitutes `?`
 * placeholders with rendered literals and recognizes `SET name = value`
 * directives.
 *
 * The scanner tracks quoting and comments so that `;` and `?` inside
 * string literals, quoted identifiers and comments are left alone:
 *
 * ```typescript
 * splitFormatSql("SELECT ?; SET time_zone = 'UTC'", [[42]]);
 * // => [{ kind: "query", sql: "SELECT 42" },
 * //     { kind: "set", name: "time_zone", value: "UTC" }]
 * ```
 */

import {
	InterfaceError,
	MalformedQueryError,
	ParameterCountError,
} from "../core/errors";
import type { ParameterType } from "../types/result";
import { formatValue } from "./format";

export interface QueryStatement {
	readonly kind: "query";
	readonly sql: string;
}

export interface SetParameter {
	readonly kind: "set";
	readonly name: string;
	readonly value: string;
}

export type Statement = QueryStatement | SetParameter;

type ScannerState =
	| "normal"
	| "single_quote"
	| "double_quote"
	| "backtick"
	| "block_comment"
	| "line_comment";

/** Statement text split around its placeholders. */
interface ParsedStatement {
	readonly chunks: readonly string[];
}

const CLOSING_QUOTE: Partial<Record<ScannerState, string>> = {
	single_quote: "'",
	double_quote: '"',
	backtick: "`",
};

function parseTemplate(template: string): ParsedStatement[] {
	const statements: ParsedStatement[] = [];
	let chunks: string[] = [];
	let current = "";
	let hasContent = false;
	let state: ScannerState = "normal";

	const endStatement = () => {
		chunks.push(current);
		if (hasContent) {
			const first = chunks[0] ?? "";
			const lastIndex = chunks.length - 1;
			const last = chunks[lastIndex] ?? "";
			chunks[0] = first.trimStart();
			chunks[lastIndex] = (lastIndex === 0 ? chunks[0] : last).trimEnd();
			statements.push({ chunks });
		}
		chunks = [];
		current = "";
		hasContent = false;
	};

	for (let i = 0; i < template.length; i++) {
		const char = template[i] ?? "";
		const next = template[i + 1];

		switch (state) {
			case "normal":
				if (char === "'") {
					state = "single_quote";
					hasContent = true;
					current += char;
				} else if (char === '"') {
					state = "double_quote";
					hasContent = true;
					current += char;
				} else if (char === "`") {
					state = "backtick";
					hasContent = true;
					current += char;
				} else if (char === "/" && next === "*") {
					state = "block_comment";
					current += "/*";
					i++;
				} else if (char === "-" && next === "-") {
					state = "line_comment";
					current += "--";
					i++;
				} else if (char === "\\" && next === "?") {
					hasContent = true;
					current += "?";
					i++;
				} else if (char === "?") {
					hasContent = true;
					chunks.push(current);
					current = "";
				} else if (char === ";") {
					endStatement();
				} else {
					if (char.trim() !== "") hasContent = true;
					current += char;
				}
				break;

			case "single_quote":
			case "double_quote":
			case "backtick": {
				const quote = CLOSING_QUOTE[state];
				if (state === "single_quote" && char === "\\" && next === "?") {
					current += "?";
					i++;
				} else if (char === quote && next === quote) {
					current += char + next;
					i++;
				} else if (char === quote) {
					current += char;
					state = "normal";
				} else {
					current += char;
				}
				break;
			}

			case "block_comment":
				if (char === "*" && next === "/") {
					current += "*/";
					i++;
					state = "normal";
				} else {
					current += char;
				}
				break;

			case "line_comment":
				current += char;
				if (char === "\n" || char === "\r") {
					state = "normal";
				}
				break;
		}
	}

	if (state !== "normal" && state !== "line_comment") {
		throw new MalformedQueryError(
			state === "block_comment"
				? "Unterminated block comment in query"
				: "Unterminated quoted literal in query",
		);
	}
	endStatement();
	return statements;
}

const LEADING_COMMENTS = /^(?:\s+|--[^\n\r]*(?:\r?\n|\r|$)|\/\*[\s\S]*?\*\/)*/;
const SET_KEYWORD = /^set\b/i;
const SET_ASSIGNMENT = /^set\s+([A-Za-z_][\w.]*)\s*=\s*([\s\S]*)$/i;

/**
 * Interpret a rendered statement as a `SET name = value` directive.
 * Returns undefined for any statement that does not start with `SET`.
 */
export function statementToSet(sql: string): SetParameter | undefined {
	const body = sql.replace(LEADING_COMMENTS, "");
	if (!SET_KEYWORD.test(body)) {
		return undefined;
	}
	const match = SET_ASSIGNMENT.exec(body);
	const name = match?.[1];
	const rawValue = match?.[2]?.trim();
	if (!name || !rawValue) {
		throw new InterfaceError(`Invalid set statement format: ${sql}`);
	}
	return { kind: "set", name, value: rawValue.replace(/^'+|'+$/g, "") };
}

function toStatement(sql: string): Statement {
	return statementToSet(sql) ?? { kind: "query", sql };
}

function renderWithoutParameters(statement: ParsedStatement): string {
	return statement.chunks.join("?");
}

/**
 * Split `template` into statements and substitute placeholders.
 *
 * With no parameter sets each statement is emitted once and placeholders
 * are left untouched. With one or more sets the whole template is rendered
 * once per set (set-major, statement-minor); the placeholder counter runs
 * across every statement of a set.
 */
export function splitFormatSql(
	template: string,
	parameterSets: readonly (readonly ParameterType[])[],
): Statement[] {
	const parsed = parseTemplate(template);

	if (parameterSets.length === 0) {
		return parsed.map((statement) =>
			toStatement(renderWithoutParameters(statement)),
		);
	}

	const result: Statement[] = [];
	for (const parameters of parameterSets) {
		let index = 0;
		for (const statement of parsed) {
			let sql = statement.chunks[0] ?? "";
			for (let c = 1; c < statement.chunks.length; c++) {
				if (index >= parameters.length) {
					throw new ParameterCountError(
						`not enough parameters provided for substitution: given ${parameters.length}, found one more`,
					);
				}
				sql += formatValue(parameters[index]) + (statement.chunks[c] ?? "");
				index++;
			}
			result.push(toStatement(sql));
		}
		if (index < parameters.length) {
			throw new ParameterCountError(
				`too many parameters provided for substitution: given ${parameters.length}, used only ${index}`,
			);
		}
	}
	return result;
}
