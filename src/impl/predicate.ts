/**
 * Predicate compiler.
 *
 * Turns declarative filters into a tagged union of conditions, then renders
 * the conditions into a parameterized WHERE clause. Values are always bound;
 * only column identifiers and vetted operator tokens reach the SQL text.
 *
 * @example
 * const where = [
 *   {status: {operator: "in", value: ["paid", "shipped"]}},
 *   {total: {operator: "between", value: [10, 100]}, note: null},
 * ];
 * // WHERE "status" IN (?, ?) AND "total" BETWEEN ? AND ? AND "note" IS NULL
 */

import {PredicateError, UnsafeValueError} from "./errors.js";
import {assertColumn, type TableHandle} from "./introspect.js";
import {
	ident,
	isSQLIdentifier,
	isSQLTemplate,
	TemplateBuilder,
	type SQLTemplate,
} from "./template.js";

// ============================================================================
// Types
// ============================================================================

/**
 * An explicit operator leaf: `{operator: "not in", value: ["a", "b"]}`.
 */
export interface OperatorLeaf {
	operator: string;
	value?: unknown;
}

/**
 * Field → value mapping. A plain value means equality (`null` means IS NULL);
 * an OperatorLeaf applies its operator.
 */
export type Filter = Record<string, unknown>;

/**
 * One filter or several. Everything combines with AND.
 */
export type Where = Filter | readonly Filter[];

export type Condition =
	| {kind: "eq"; field: string; value: unknown}
	| {kind: "null"; field: string; negated: boolean}
	| {kind: "in"; field: string; values: readonly unknown[]; negated: boolean}
	| {kind: "like"; field: string; pattern: unknown; negated: boolean}
	| {
			kind: "between";
			field: string;
			low: unknown;
			high: unknown;
			negated: boolean;
	  }
	| {kind: "custom"; field: string; operator: string; value: unknown};

type KnownOperator =
	| "eq"
	| "in"
	| "not in"
	| "like"
	| "not like"
	| "is null"
	| "is not null"
	| "between"
	| "not between";

const KNOWN_OPERATORS: ReadonlyMap<string, KnownOperator> = new Map([
	["=", "eq"],
	["equals", "eq"],
	["in", "in"],
	["not in", "not in"],
	["like", "like"],
	["not like", "not like"],
	["is null", "is null"],
	["is not null", "is not null"],
	["between", "between"],
	["not between", "not between"],
]);

// Operators that pass through verbatim must be a short run of operator
// symbols, or a few plain words. Nothing that can open a comment, a string,
// a statement or a group. "#" starts a comment on MySQL and "?" is a
// placeholder for mysql2 and better-sqlite3, so neither is a symbol here.
const SYMBOL_OPERATOR = /^[<>=!~*@%^&|+\-/]{1,3}$/;
const WORD_OPERATOR = /^[A-Za-z]+(?: [A-Za-z]+){0,3}$/;
const FORBIDDEN_WORDS = new Set([
	"and",
	"or",
	"union",
	"select",
	"insert",
	"update",
	"delete",
	"drop",
	"alter",
	"create",
	"where",
	"into",
	"exec",
	"execute",
]);

// ============================================================================
// Guards
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (value === null || typeof value !== "object") return false;
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Reject anything the renderer would splice into SQL text instead of binding.
 *
 * @throws UnsafeValueError
 */
export function assertBindable(value: unknown, field: string): void {
	if (isSQLTemplate(value) || isSQLIdentifier(value)) {
		throw new UnsafeValueError(
			`Value for "${field}" is a SQL fragment; pass plain data instead`,
			{field},
		);
	}
	if (typeof value === "symbol" || typeof value === "function") {
		throw new UnsafeValueError(
			`Value for "${field}" cannot be bound as a parameter (${typeof value})`,
			{field},
		);
	}
}

function normalizeOperator(operator: string): string {
	return operator.trim().toLowerCase().replace(/[\s_-]+/g, " ");
}

function assertSafeOperator(operator: string, field: string): void {
	if (SYMBOL_OPERATOR.test(operator)) {
		if (
			operator.includes("--") ||
			operator.includes("/*") ||
			operator.includes("*/")
		) {
			throw new UnsafeValueError(
				`Operator "${operator}" on "${field}" contains a comment marker`,
				{field, operator},
			);
		}
		return;
	}
	if (WORD_OPERATOR.test(operator)) {
		for (const word of operator.toLowerCase().split(" ")) {
			if (FORBIDDEN_WORDS.has(word)) {
				throw new UnsafeValueError(
					`Operator "${operator}" on "${field}" contains the keyword "${word}"`,
					{field, operator},
				);
			}
		}
		return;
	}
	throw new UnsafeValueError(
		`Operator "${operator}" on "${field}" is not a plain operator token`,
		{field, operator},
	);
}

// ============================================================================
// Compilation
// ============================================================================

/**
 * Compile a filter specification against a resolved table.
 *
 * `undefined`, `{}` and `[]` compile to no conditions.
 *
 * @throws UnsafeValueError if a raw fragment is supplied
 * @throws ColumnNotFoundError if a field is not a column of the table
 * @throws PredicateError if an operator's value has the wrong shape
 */
export function compileWhere(
	where: Where | undefined,
	handle: TableHandle,
): Condition[] {
	if (where === undefined) return [];

	const filters: readonly unknown[] = Array.isArray(where) ? where : [where];
	const conditions: Condition[] = [];
	for (const filter of filters) {
		if (!isPlainObject(filter) || isSQLTemplate(filter) || isSQLIdentifier(filter)) {
			throw new UnsafeValueError(
				`Filters on "${handle.name}" must be field-to-value objects, got ${describe(filter)}`,
			);
		}
		for (const [field, value] of Object.entries(filter)) {
			assertColumn(handle, field);
			conditions.push(compileField(field, value));
		}
	}
	return conditions;
}

function describe(value: unknown): string {
	if (typeof value === "string") return "a string";
	if (isSQLTemplate(value)) return "a SQL template";
	if (Array.isArray(value)) return "an array";
	return value === null ? "null" : typeof value;
}

function compileField(field: string, value: unknown): Condition {
	if (value === null || value === undefined) {
		return {kind: "null", field, negated: false};
	}
	assertBindable(value, field);
	if (isPlainObject(value)) {
		if (!("operator" in value)) {
			throw new PredicateError(
				`Object value for "${field}" must be an operator leaf {operator, value}`,
				field,
				"=",
			);
		}
		const {operator} = value;
		if (typeof operator !== "string") {
			throw new UnsafeValueError(`Operator for "${field}" must be a string`, {
				field,
			});
		}
		return compileLeaf(field, operator, value.value);
	}
	if (Array.isArray(value)) {
		throw new PredicateError(
			`Array value for "${field}" is ambiguous; use {operator: "in", value: [...]}`,
			field,
			"=",
		);
	}
	return {kind: "eq", field, value};
}

function compileLeaf(field: string, operator: string, value: unknown): Condition {
	const known = KNOWN_OPERATORS.get(normalizeOperator(operator));
	switch (known) {
		case "eq":
			if (value === null || value === undefined) {
				return {kind: "null", field, negated: false};
			}
			assertBindable(value, field);
			return {kind: "eq", field, value};
		case "in":
		case "not in":
			return {
				kind: "in",
				field,
				values: expectList(field, operator, value),
				negated: known === "not in",
			};
		case "like":
		case "not like":
			assertBindable(value, field);
			return {kind: "like", field, pattern: value, negated: known === "not like"};
		case "is null":
		case "is not null":
			return {kind: "null", field, negated: known === "is not null"};
		case "between":
		case "not between": {
			const [low, high] = expectPair(field, operator, value);
			return {kind: "between", field, low, high, negated: known === "not between"};
		}
		case undefined: {
			const literal = operator.trim();
			assertSafeOperator(literal, field);
			assertBindable(value, field);
			return {kind: "custom", field, operator: literal, value: value ?? null};
		}
	}
}

function expectList(
	field: string,
	operator: string,
	value: unknown,
): readonly unknown[] {
	if (!Array.isArray(value) || value.length === 0) {
		throw new PredicateError(
			`Operator "${operator}" on "${field}" requires a non-empty array`,
			field,
			operator,
		);
	}
	for (const item of value) assertBindable(item, field);
	return value;
}

function expectPair(
	field: string,
	operator: string,
	value: unknown,
): [unknown, unknown] {
	if (!Array.isArray(value) || value.length !== 2) {
		throw new PredicateError(
			`Operator "${operator}" on "${field}" requires a two-element array`,
			field,
			operator,
		);
	}
	const [low, high]: unknown[] = value;
	assertBindable(low, field);
	assertBindable(high, field);
	return [low, high];
}

// ============================================================================
// Rendering
// ============================================================================

function renderCondition(builder: TemplateBuilder, condition: Condition): void {
	builder.value(ident(condition.field));
	switch (condition.kind) {
		case "eq":
			builder.append(" = ").value(condition.value);
			break;
		case "null":
			builder.append(condition.negated ? " IS NOT NULL" : " IS NULL");
			break;
		case "in":
			builder
				.append(condition.negated ? " NOT IN (" : " IN (")
				.list(condition.values)
				.append(")");
			break;
		case "like":
			builder
				.append(condition.negated ? " NOT LIKE " : " LIKE ")
				.value(condition.pattern);
			break;
		case "between":
			builder
				.append(condition.negated ? " NOT BETWEEN " : " BETWEEN ")
				.value(condition.low)
				.append(" AND ")
				.value(condition.high);
			break;
		case "custom":
			builder.append(` ${condition.operator} `).value(condition.value);
			break;
	}
}

/**
 * Render conditions as ` WHERE a AND b`, or an empty template when there
 * are none.
 */
export function renderWhere(conditions: readonly Condition[]): SQLTemplate {
	const builder = new TemplateBuilder();
	for (let i = 0; i < conditions.length; i++) {
		builder.append(i === 0 ? " WHERE " : " AND ");
		renderCondition(builder, conditions[i]);
	}
	return builder.build();
}
