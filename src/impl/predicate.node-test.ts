import {describe, test, expect} from "./node-test-utils.js";
import {compileWhere, renderWhere, type Where} from "./predicate.js";
import type {TableHandle} from "./introspect.js";
import {renderSQL, type SQLDialect} from "./sql.js";
import {createTemplate, ident, makeTemplate} from "./template.js";
import {ColumnNotFoundError, PredicateError, UnsafeValueError} from "./errors.js";

const orders: TableHandle = {
	schema: "main",
	name: "orders",
	columns: ["id", "status", "total", "note"].map((name) => ({
		name,
		type: "TEXT",
		nullable: true,
	})),
	primaryKey: ["id"],
	unique: [],
};

function render(where: Where | undefined, dialect: SQLDialect = "postgresql") {
	return renderSQL(renderWhere(compileWhere(where, orders)), dialect);
}

describe("compileWhere", () => {
	test("scalar means equality", () => {
		expect(render({status: "paid"})).toEqual({
			sql: ' WHERE "status" = $1',
			params: ["paid"],
		});
	});

	test("null means IS NULL", () => {
		expect(render({note: null})).toEqual({sql: ' WHERE "note" IS NULL', params: []});
	});

	test("filters and fields combine with AND", () => {
		expect(
			render([
				{status: {operator: "in", value: ["paid", "shipped"]}},
				{total: {operator: "between", value: [10, 100]}, note: null},
			]),
		).toEqual({
			sql: ' WHERE "status" IN ($1, $2) AND "total" BETWEEN $3 AND $4 AND "note" IS NULL',
			params: ["paid", "shipped", 10, 100],
		});
	});

	test("operator names ignore case and separators", () => {
		expect(render({status: {operator: "NOT_IN", value: ["x"]}}, "mysql")).toEqual({
			sql: " WHERE `status` NOT IN (?)",
			params: ["x"],
		});
		expect(render({status: {operator: "not-like", value: "a%"}}, "sqlite")).toEqual({
			sql: ' WHERE "status" NOT LIKE ?',
			params: ["a%"],
		});
	});

	test("null checks take no value", () => {
		expect(render({note: {operator: "is not null"}})).toEqual({
			sql: ' WHERE "note" IS NOT NULL',
			params: [],
		});
		expect(render({note: {operator: "equals", value: null}})).toEqual({
			sql: ' WHERE "note" IS NULL',
			params: [],
		});
	});

	test("not between", () => {
		expect(render({total: {operator: "not between", value: [1, 2]}})).toEqual({
			sql: ' WHERE "total" NOT BETWEEN $1 AND $2',
			params: [1, 2],
		});
	});

	test("unknown operators pass through with a bound value", () => {
		expect(render({total: {operator: ">=", value: 5}})).toEqual({
			sql: ' WHERE "total" >= $1',
			params: [5],
		});
		expect(render({status: {operator: "ILIKE", value: "p%"}})).toEqual({
			sql: ' WHERE "status" ILIKE $1',
			params: ["p%"],
		});
		expect(render({note: {operator: "is distinct from", value: "x"}})).toEqual({
			sql: ' WHERE "note" is distinct from $1',
			params: ["x"],
		});
	});

	test("empty filters compile to nothing", () => {
		expect(render(undefined)).toEqual({sql: "", params: []});
		expect(render({})).toEqual({sql: "", params: []});
		expect(render([])).toEqual({sql: "", params: []});
	});

	test("values never reach the SQL text", () => {
		const {sql, params} = render({status: "x' OR '1'='1"});
		expect(sql).toBe(' WHERE "status" = $1');
		expect(params).toEqual(["x' OR '1'='1"]);
	});
});

describe("compileWhere errors", () => {
	test("raw string filters are rejected", () => {
		// As it would arrive from an untyped request body
		const raw: Where = JSON.parse('"status = 1"');
		expect(() => compileWhere(raw, orders)).toThrow(UnsafeValueError);
	});

	test("SQL fragments as values are rejected", () => {
		const fragment = createTemplate(makeTemplate(["1 = 1"]), []);
		expect(() => compileWhere({status: fragment}, orders)).toThrow(UnsafeValueError);
		expect(() => compileWhere({status: ident("total")}, orders)).toThrow(
			UnsafeValueError,
		);
	});

	test("unknown columns", () => {
		expect(() => compileWhere({missing: 1}, orders)).toThrow(ColumnNotFoundError);
	});

	test("malformed list and range values", () => {
		expect(() =>
			compileWhere({status: {operator: "in", value: []}}, orders),
		).toThrow(PredicateError);
		expect(() =>
			compileWhere({total: {operator: "between", value: [1, 2, 3]}}, orders),
		).toThrow(PredicateError);
		expect(() => compileWhere({status: ["a", "b"]}, orders)).toThrow(PredicateError);
		expect(() => compileWhere({status: {value: 1}}, orders)).toThrow(PredicateError);
	});

	test("unsafe operator text", () => {
		for (const operator of [
			"= 1 OR 1 =",
			"or",
			"--",
			"; drop",
			"union select",
			"<>)",
			"#",
			">#",
			"?",
			"?|",
		]) {
			expect(() =>
				compileWhere({status: {operator, value: 1}}, orders),
			).toThrow(UnsafeValueError);
		}
	});

	test("a comment operator cannot hide later conditions", () => {
		expect(() =>
			compileWhere([{status: {operator: "#", value: 1}}, {total: 2}], orders),
		).toThrow(UnsafeValueError);
	});

	test("non-string operators", () => {
		expect(() => compileWhere({status: {operator: 1, value: 1}}, orders)).toThrow(
			UnsafeValueError,
		);
	});
});
