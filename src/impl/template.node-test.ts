import {describe, test, expect} from "./node-test-utils.js";
import {
	createTemplate,
	ident,
	isSQLIdentifier,
	isSQLTemplate,
	makeTemplate,
	TemplateBuilder,
} from "./template.js";
import {buildSQL, inlineLiteral, quoteIdent, renderDDL, renderSQL} from "./sql.js";

describe("TemplateBuilder", () => {
	test("keeps one more string than values", () => {
		const template = new TemplateBuilder("DELETE FROM ")
			.value(ident("orders"))
			.append(" WHERE ")
			.value(ident("id"))
			.append(" = ")
			.value(1)
			.build();

		expect([...template.strings]).toEqual(["DELETE FROM ", " WHERE ", " = ", ""]);
		expect(template.values.length).toBe(3);
		expect(isSQLTemplate(template)).toBe(true);
	});

	test("renders per dialect", () => {
		const template = new TemplateBuilder("DELETE FROM ")
			.value(ident("orders"))
			.append(" WHERE ")
			.value(ident("id"))
			.append(" = ")
			.value(1)
			.build();

		expect(renderSQL(template, "postgresql")).toEqual({
			sql: 'DELETE FROM "orders" WHERE "id" = $1',
			params: [1],
		});
		expect(renderSQL(template, "mysql")).toEqual({
			sql: "DELETE FROM `orders` WHERE `id` = ?",
			params: [1],
		});
	});

	test("list separates values", () => {
		const template = new TemplateBuilder("IN (").list([1, 2, 3]).append(")").build();
		expect(renderSQL(template, "sqlite")).toEqual({
			sql: "IN (?, ?, ?)",
			params: [1, 2, 3],
		});
	});

	test("merge splices another template", () => {
		const where = createTemplate(makeTemplate([" WHERE ", " = ", ""]), [
			ident("a"),
			2,
		]);
		const template = new TemplateBuilder("SELECT 1").merge(where).build();
		expect(renderSQL(template, "postgresql")).toEqual({
			sql: 'SELECT 1 WHERE "a" = $1',
			params: [2],
		});
	});

	test("isEmpty", () => {
		const builder = new TemplateBuilder();
		expect(builder.isEmpty).toBe(true);
		builder.append("x");
		expect(builder.isEmpty).toBe(false);
	});

	test("createTemplate rejects mismatched parts", () => {
		expect(() => createTemplate(makeTemplate(["a", "b"]), [])).toThrow(
			"Malformed template",
		);
	});
});

describe("identifiers", () => {
	test("ident markers", () => {
		expect(isSQLIdentifier(ident("orders"))).toBe(true);
		expect(isSQLIdentifier({name: "orders"})).toBe(false);
		expect(isSQLIdentifier("orders")).toBe(false);
	});

	test("quoteIdent escapes quotes", () => {
		expect(quoteIdent('we"ird', "postgresql")).toBe('"we""ird"');
		expect(quoteIdent("a`b", "mysql")).toBe("`a``b`");
	});

	test("identifiers are inlined, values are bound", () => {
		const {sql, params} = buildSQL(
			makeTemplate(["UPDATE ", " SET ", " = ", ""]),
			[ident("orders"), ident("status"), "paid"],
			"postgresql",
		);
		expect(sql).toBe('UPDATE "orders" SET "status" = $1');
		expect(params).toEqual(["paid"]);
	});

	test("buildSQL applies the encoder to parameters only", () => {
		const {sql, params} = buildSQL(
			makeTemplate(["SELECT ", " FROM t WHERE a = ", ""]),
			[ident("a"), true],
			"sqlite",
			(value) => (value === true ? 1 : value),
		);
		expect(sql).toBe('SELECT "a" FROM t WHERE a = ?');
		expect(params).toEqual([1]);
	});

	test("renderDDL rejects parameters", () => {
		const ddl = createTemplate(makeTemplate(["ALTER TABLE ", " ADD ", ""]), [
			ident("t"),
			"oops",
		]);
		expect(() => renderDDL(ddl, "postgresql")).toThrow("Unexpected value in DDL");
	});
});

describe("inlineLiteral", () => {
	test("strings are quoted and escaped", () => {
		expect(inlineLiteral("it's", "postgresql")).toBe("'it''s'");
	});

	test("booleans follow the dialect", () => {
		expect(inlineLiteral(true, "sqlite")).toBe("1");
		expect(inlineLiteral(false, "postgresql")).toBe("FALSE");
	});

	test("null and numbers", () => {
		expect(inlineLiteral(null, "mysql")).toBe("NULL");
		expect(inlineLiteral(2.5, "mysql")).toBe("2.5");
		expect(() => inlineLiteral(Infinity, "mysql")).toThrow("non-finite");
	});
});
