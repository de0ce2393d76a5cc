import {describe, test, expect} from "./node-test-utils.js";
import {pino} from "pino";
import {Database} from "./database.js";
import {FakeDriver, describeColumns} from "./fake-driver.js";
import {createLogger, loggerOptions} from "./logger.js";
import type {SQLDialect} from "./sql.js";

function setup(dialect: SQLDialect) {
	const driver = new FakeDriver(dialect, {
		tables: {orders: describeColumns(["id", "status", "total"], ["id"])},
	});
	const db = new Database(driver, {logger: createLogger("silent")});
	return {driver, db};
}

describe("PostgreSQL statements", () => {
	test("get", async () => {
		const {driver, db} = setup("postgresql");
		await db.open();
		await db.get("orders", {where: {status: "paid"}, limit: 5});

		expect(driver.statements).toEqual([
			{
				sql: 'SELECT "id", "status", "total" FROM "public"."orders" WHERE "status" = $1 LIMIT 5',
				params: ["paid"],
			},
		]);
	});

	test("count converts bigint strings", async () => {
		const {driver, db} = setup("postgresql");
		await db.open();
		driver.returnRows([{count: "7"}]);
		expect(await db.count("orders")).toBe(7);
		expect(driver.sql).toEqual(['SELECT COUNT(*) AS "count" FROM "public"."orders"']);
	});

	test("upsert runs one statement per chunk and keeps key order", async () => {
		const {driver, db} = setup("postgresql");
		await db.open();
		driver
			.returnRows([{id: 1}, {id: 2}])
			.returnRows([{id: 3}, {id: 4}])
			.returnRows([{id: 5}]);

		const keys = await db.upsert(
			"orders",
			[1, 2, 3, 4, 5].map((id) => ({id, total: id * 10})),
			{chunkSize: 2},
		);

		expect(keys).toEqual([{id: 1}, {id: 2}, {id: 3}, {id: 4}, {id: 5}]);
		expect(driver.statements.length).toBe(3);
		expect(driver.statements[2]).toEqual({
			sql:
				'INSERT INTO "public"."orders" ("id", "total") VALUES ($1, $2) ' +
				'ON CONFLICT ("id") DO UPDATE SET "total" = COALESCE(excluded."total", "orders"."total") ' +
				'RETURNING "id"',
			params: [5, 50],
		});
		expect(driver.acquired).toBe(1);
		expect(driver.released).toBe(1);
	});

	test("createTable adds only missing columns", async () => {
		const {driver, db} = setup("postgresql");
		await db.open();

		const result = await db.createTable("orders", [
			{name: "id", type: "integer"},
			{name: "status", type: "text"},
			{name: "shipped_at", type: "datetime"},
			{name: "flag", type: "boolean", default: false},
		]);

		expect(result).toEqual({created: false, added: ["shipped_at", "flag"]});
		expect(driver.sql).toEqual([
			'ALTER TABLE "public"."orders" ADD COLUMN "shipped_at" TIMESTAMPTZ',
			'ALTER TABLE "public"."orders" ADD COLUMN "flag" BOOLEAN DEFAULT FALSE',
		]);
	});
});

describe("MySQL statements", () => {
	test("upsert returns keys from the input", async () => {
		const {driver, db} = setup("mysql");
		await db.open();

		const keys = await db.upsert("orders", [
			{id: 1, total: 2},
			{id: 2, total: 3},
		]);

		expect(keys).toEqual([{id: 1}, {id: 2}]);
		expect(driver.statements).toEqual([
			{
				sql:
					"INSERT INTO `app`.`orders` (`id`, `total`) VALUES (?, ?), (?, ?) " +
					"ON DUPLICATE KEY UPDATE `total` = COALESCE(VALUES(`total`), `total`)",
				params: [1, 2, 2, 3],
			},
		]);
	});

	test("update binds one value set per record", async () => {
		const {driver, db} = setup("mysql");
		await db.open();

		const changed = await db.update(
			"orders",
			[
				{id: 1, status: "paid"},
				{id: 2, status: "void"},
			],
			"id",
		);

		expect(changed).toBe(2);
		expect(driver.statements).toEqual([
			{sql: "UPDATE `app`.`orders` SET `status` = ? WHERE `id` = ?", params: ["paid", 1]},
			{sql: "UPDATE `app`.`orders` SET `status` = ? WHERE `id` = ?", params: ["void", 2]},
		]);
	});

	test("createTable", async () => {
		const {driver, db} = setup("mysql");
		await db.open();

		const result = await db.createTable(
			"customers",
			[
				{name: "id", type: "integer", autoIncrement: true},
				{name: "email", type: {kind: "varchar", length: 255}, nullable: false},
			],
			{primaryKey: "id", unique: ["email"]},
		);

		expect(result).toEqual({created: true, added: []});
		expect(driver.sql).toEqual([
			[
				"CREATE TABLE IF NOT EXISTS `app`.`customers` (",
				"  `id` INT AUTO_INCREMENT,",
				"  `email` VARCHAR(255) NOT NULL,",
				"  PRIMARY KEY (`id`),",
				"  UNIQUE (`email`)",
				")",
			].join("\n"),
		]);
	});
});

describe("statement logging", () => {
	function capture() {
		const lines: Record<string, unknown>[] = [];
		const logger = pino(loggerOptions("info"), {
			write(line: string) {
				lines.push(JSON.parse(line));
			},
		});
		return {lines, logger};
	}

	test("verbose statements log at info", async () => {
		const {lines, logger} = capture();
		const driver = new FakeDriver("postgresql", {
			tables: {orders: describeColumns(["id"], ["id"])},
		});
		const db = new Database(driver, {logger});
		await db.open();

		await db.delete("orders");
		expect(lines).toEqual([]);

		await db.delete("orders", {where: {id: 1}, verbose: true});
		expect(lines.length).toBe(1);
		expect(lines[0].msg).toBe("executing statement");
		expect(lines[0].sql).toBe('DELETE FROM "public"."orders" WHERE "id" = $1');
		expect(lines[0].params).toBe(1);
	});

	test("verbose upserts log each chunk", async () => {
		const {lines, logger} = capture();
		const driver = new FakeDriver("postgresql", {
			tables: {orders: describeColumns(["id", "total"], ["id"])},
		});
		const db = new Database(driver, {logger});
		await db.open();

		await db.upsert("orders", [{id: 1}, {id: 2}], {chunkSize: 1, verbose: true});
		expect(lines.map((line) => line.msg)).toEqual([
			"upserting chunk 1 of 2",
			"executing statement",
			"upserting chunk 2 of 2",
			"executing statement",
		]);
	});
});
