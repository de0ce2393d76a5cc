import {describe, test, expect} from "./node-test-utils.js";
import {
	buildCount,
	buildDelete,
	buildSelect,
	buildUpdate,
	buildUpsert,
	keySetRuns,
	primaryKeyOf,
} from "./query.js";
import {compileWhere} from "./predicate.js";
import type {TableHandle} from "./introspect.js";
import {buildSQL, renderSQL} from "./sql.js";
import {
	ColumnNotFoundError,
	InvalidRecordError,
	MissingMatchFieldError,
	NoPrimaryKeyError,
} from "./errors.js";

function ordersIn(schema: string, primaryKey: string[] = ["id"]): TableHandle {
	return {
		schema,
		name: "orders",
		columns: ["id", "status", "total", "note"].map((name) => ({
			name,
			type: "TEXT",
			nullable: name !== "id",
		})),
		primaryKey,
		unique: [],
	};
}

const sqlite = ordersIn("main");
const pg = ordersIn("public");
const my = ordersIn("app");

describe("buildSelect", () => {
	test("defaults to every column", () => {
		expect(renderSQL(buildSelect(sqlite, {}, "sqlite"), "sqlite")).toEqual({
			sql: 'SELECT "id", "status", "total", "note" FROM "main"."orders"',
			params: [],
		});
	});

	test("projection, filter, sort and paging", () => {
		const template = buildSelect(
			pg,
			{
				columns: ["id", "status"],
				conditions: compileWhere({status: "paid"}, pg),
				sortBy: {column: "id", direction: "desc"},
				limit: 10,
				offset: 20,
			},
			"postgresql",
		);
		expect(renderSQL(template, "postgresql")).toEqual({
			sql: 'SELECT "id", "status" FROM "public"."orders" WHERE "status" = $1 ORDER BY "id" DESC LIMIT 10 OFFSET 20',
			params: ["paid"],
		});
	});

	test("sortBy as a column name sorts ascending", () => {
		const {sql} = renderSQL(
			buildSelect(sqlite, {columns: ["id"], sortBy: "total"}, "sqlite"),
			"sqlite",
		);
		expect(sql).toBe('SELECT "id" FROM "main"."orders" ORDER BY "total" ASC');
	});

	test("offset without limit", () => {
		const parts = {columns: ["id"], offset: 5};
		expect(renderSQL(buildSelect(sqlite, parts, "sqlite"), "sqlite").sql).toBe(
			'SELECT "id" FROM "main"."orders" LIMIT -1 OFFSET 5',
		);
		expect(renderSQL(buildSelect(my, parts, "mysql"), "mysql").sql).toBe(
			"SELECT `id` FROM `app`.`orders` LIMIT 18446744073709551615 OFFSET 5",
		);
		expect(renderSQL(buildSelect(pg, parts, "postgresql"), "postgresql").sql).toBe(
			'SELECT "id" FROM "public"."orders" OFFSET 5',
		);
	});

	test("unknown projection or sort column", () => {
		expect(() => buildSelect(sqlite, {columns: ["nope"]}, "sqlite")).toThrow(
			ColumnNotFoundError,
		);
		expect(() => buildSelect(sqlite, {sortBy: "nope"}, "sqlite")).toThrow(
			ColumnNotFoundError,
		);
	});

	test("limit must be a non-negative integer", () => {
		expect(() => buildSelect(sqlite, {limit: -1}, "sqlite")).toThrow(RangeError);
		expect(() => buildSelect(sqlite, {limit: 1.5}, "sqlite")).toThrow(RangeError);
	});
});

describe("buildCount and buildDelete", () => {
	test("count with a filter", () => {
		const template = buildCount(pg, compileWhere({status: "paid"}, pg));
		expect(renderSQL(template, "postgresql")).toEqual({
			sql: 'SELECT COUNT(*) AS "count" FROM "public"."orders" WHERE "status" = $1',
			params: ["paid"],
		});
	});

	test("delete without a filter", () => {
		expect(renderSQL(buildDelete(sqlite), "sqlite").sql).toBe(
			'DELETE FROM "main"."orders"',
		);
	});

	test("delete with an in filter", () => {
		const conditions = compileWhere(
			{status: {operator: "in", value: ["x", "y"]}},
			sqlite,
		);
		expect(renderSQL(buildDelete(sqlite, conditions), "sqlite")).toEqual({
			sql: 'DELETE FROM "main"."orders" WHERE "status" IN (?, ?)',
			params: ["x", "y"],
		});
	});
});

describe("buildUpdate", () => {
	test("one statement, one value set per record", () => {
		const statement = buildUpdate(
			sqlite,
			[
				{id: 1, status: "shipped"},
				{id: 2, status: "paid"},
			],
			["id"],
		);
		expect(statement.setColumns).toEqual(["status"]);
		expect(statement.valueSets.length).toBe(2);

		const first = buildSQL(statement.strings, statement.valueSets[0], "sqlite");
		expect(first).toEqual({
			sql: 'UPDATE "main"."orders" SET "status" = ? WHERE "id" = ?',
			params: ["shipped", 1],
		});
		const second = buildSQL(statement.strings, statement.valueSets[1], "sqlite");
		expect(second.params).toEqual(["paid", 2]);
	});

	test("several match fields", () => {
		const statement = buildUpdate(pg, [{id: 1, status: "a", total: 3}], ["id", "status"]);
		expect(buildSQL(statement.strings, statement.valueSets[0], "postgresql")).toEqual({
			sql: 'UPDATE "public"."orders" SET "total" = $1 WHERE "id" = $2 AND "status" = $3',
			params: [3, 1, "a"],
		});
	});

	test("a record without a match field", () => {
		expect(() => buildUpdate(sqlite, [{status: "x"}], ["id"])).toThrow(
			MissingMatchFieldError,
		);

		let caught: unknown;
		try {
			buildUpdate(sqlite, [{id: 1, status: "a"}, {status: "b"}], ["id"]);
		} catch (error) {
			caught = error;
		}
		expect(caught instanceof MissingMatchFieldError && caught.index).toBe(1);
	});

	test("later records cannot set extra columns", () => {
		let caught: unknown;
		try {
			buildUpdate(sqlite, [{id: 1, status: "a"}, {id: 2, status: "b", note: "c"}], ["id"]);
		} catch (error) {
			caught = error;
		}
		expect(caught instanceof InvalidRecordError && caught.index).toBe(1);
	});

	test("records must have something to set", () => {
		expect(() => buildUpdate(sqlite, [{id: 1}], ["id"])).toThrow(InvalidRecordError);
		expect(() =>
			buildUpdate(sqlite, [{id: 1, status: "a"}, {id: 2}], ["id"]),
		).toThrow(InvalidRecordError);
	});

	test("needs match fields", () => {
		expect(() => buildUpdate(sqlite, [{id: 1, status: "a"}], [])).toThrow(RangeError);
	});
});

describe("buildUpsert", () => {
	test("SQLite keeps stored values over incoming nulls", () => {
		const template = buildUpsert(sqlite, [{id: 1, total: 10, note: null}], {
			overwriteWithNull: false,
			dialect: "sqlite",
		});
		expect(renderSQL(template, "sqlite")).toEqual({
			sql:
				'INSERT INTO "main"."orders" ("id", "total", "note") VALUES (?, ?, ?) ' +
				'ON CONFLICT ("id") DO UPDATE SET "total" = COALESCE(excluded."total", "total"), ' +
				'"note" = COALESCE(excluded."note", "note") RETURNING "id"',
			params: [1, 10, null],
		});
	});

	test("PostgreSQL qualifies the stored value", () => {
		const template = buildUpsert(pg, [{id: 1, total: 20}], {
			overwriteWithNull: false,
			dialect: "postgresql",
		});
		expect(renderSQL(template, "postgresql").sql).toBe(
			'INSERT INTO "public"."orders" ("id", "total") VALUES ($1, $2) ' +
				'ON CONFLICT ("id") DO UPDATE SET "total" = COALESCE(excluded."total", "orders"."total") ' +
				'RETURNING "id"',
		);
	});

	test("several rows with overwriteWithNull", () => {
		const template = buildUpsert(pg, [{id: 1, note: null}, {note: "x", id: 2}], {
			overwriteWithNull: true,
			dialect: "postgresql",
		});
		expect(renderSQL(template, "postgresql")).toEqual({
			sql:
				'INSERT INTO "public"."orders" ("id", "note") VALUES ($1, $2), ($3, $4) ' +
				'ON CONFLICT ("id") DO UPDATE SET "note" = excluded."note" ' +
				'RETURNING "id"',
			params: [1, null, 2, "x"],
		});
	});

	test("records must name the same columns", () => {
		let caught: unknown;
		try {
			buildUpsert(sqlite, [{id: 1, note: "a"}, {id: 2}], {
				overwriteWithNull: false,
				dialect: "sqlite",
			});
		} catch (error) {
			caught = error;
		}
		expect(caught instanceof InvalidRecordError && caught.index).toBe(1);
	});

	test("MySQL uses ON DUPLICATE KEY UPDATE", () => {
		const records = [{id: 1, total: 20}];
		expect(
			renderSQL(buildUpsert(my, records, {overwriteWithNull: false, dialect: "mysql"}), "mysql")
				.sql,
		).toBe(
			"INSERT INTO `app`.`orders` (`id`, `total`) VALUES (?, ?) " +
				"ON DUPLICATE KEY UPDATE `total` = COALESCE(VALUES(`total`), `total`)",
		);
		expect(
			renderSQL(buildUpsert(my, records, {overwriteWithNull: true, dialect: "mysql"}), "mysql")
				.sql,
		).toBe(
			"INSERT INTO `app`.`orders` (`id`, `total`) VALUES (?, ?) " +
				"ON DUPLICATE KEY UPDATE `total` = VALUES(`total`)",
		);
	});

	test("key-only records reassign the key", () => {
		const template = buildUpsert(sqlite, [{id: 3}], {
			overwriteWithNull: false,
			dialect: "sqlite",
		});
		expect(renderSQL(template, "sqlite").sql).toBe(
			'INSERT INTO "main"."orders" ("id") VALUES (?) ' +
				'ON CONFLICT ("id") DO UPDATE SET "id" = excluded."id" RETURNING "id"',
		);
	});

	test("errors", () => {
		const parts = {overwriteWithNull: false, dialect: "sqlite" as const};
		expect(() => buildUpsert(ordersIn("main", []), [{id: 1}], parts)).toThrow(
			NoPrimaryKeyError,
		);
		expect(() => buildUpsert(sqlite, [{id: 1}, {}], parts)).toThrow(InvalidRecordError);
		expect(() => buildUpsert(sqlite, [{id: 1, nope: 2}], parts)).toThrow(
			ColumnNotFoundError,
		);
	});

	test("helpers", () => {
		expect(keySetRuns([{a: 1}, {a: 2}, {b: 3}, {b: 4, a: 5}, {a: 6, b: 7}, {a: 8}])).toEqual([
			[{a: 1}, {a: 2}],
			[{b: 3}],
			[{b: 4, a: 5}, {a: 6, b: 7}],
			[{a: 8}],
		]);
		expect(keySetRuns([])).toEqual([]);
		expect(primaryKeyOf(sqlite, {id: 4, total: 1})).toEqual({id: 4});
	});
});
