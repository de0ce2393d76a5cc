import {describe, test, expect, beforeEach, afterEach} from "./node-test-utils.js";
import {Database} from "./database.js";
import SQLiteDriver from "../sqlite.js";
import {FakeDriver, describeColumns} from "./fake-driver.js";
import {createLogger} from "./logger.js";
import {ident} from "./template.js";
import {
	ColumnAlreadyExistsError,
	ColumnNotFoundError,
	ConnectionError,
	ConstraintViolationError,
	MissingMatchFieldError,
	NoPrimaryKeyError,
	QueryError,
	TableNotFoundError,
	UnsafeValueError,
	ValidationError,
} from "./errors.js";

const logger = createLogger("silent");

describe("Database lifecycle", () => {
	test("open fails when the database is unreachable", async () => {
		const driver = new FakeDriver("postgresql");
		driver.alive = false;
		const db = new Database(driver, {logger});

		await expect(db.open()).rejects.toThrow(ConnectionError);
		expect(db.opened).toBe(false);
	});

	test("operations require open()", async () => {
		const driver = new FakeDriver("sqlite", {tables: {orders: describeColumns(["id"])}});
		const db = new Database(driver, {logger});

		await expect(db.get("orders")).rejects.toThrow(ConnectionError);
		expect(driver.acquired).toBe(0);
	});

	test("acquire failures become ConnectionError", async () => {
		const driver = new FakeDriver("sqlite");
		driver.acquire = async () => {
			throw new Error("pool exhausted");
		};
		const db = new Database(driver, {logger});
		await db.open();
		await expect(db.count("orders")).rejects.toThrow("Failed to acquire a connection");
	});

	test("connections are released on every path", async () => {
		const driver = new FakeDriver("sqlite", {tables: {orders: describeColumns(["id"])}});
		const db = new Database(driver, {logger});
		await db.open();

		await db.get("orders");
		await expect(db.get("missing")).rejects.toThrow(TableNotFoundError);
		await expect(db.get("orders", {where: {nope: 1}})).rejects.toThrow(ColumnNotFoundError);

		expect(driver.acquired).toBe(3);
		expect(driver.released).toBe(3);
	});

	test("createTable surfaces catalog failures", async () => {
		const driver = new FakeDriver("postgresql");
		const acquire = driver.acquire.bind(driver);
		driver.acquire = async () => ({
			...(await acquire()),
			describeTable: async () => {
				throw new Error("catalog unavailable");
			},
		});
		const db = new Database(driver, {logger});
		await db.open();

		await expect(
			db.createTable("orders", [{name: "id", type: "integer"}], {primaryKey: "id"}),
		).rejects.toThrow("catalog unavailable");
		expect(driver.statements).toEqual([]);
		expect(driver.released).toBe(1);
	});

	test("close closes the driver", async () => {
		const driver = new FakeDriver("sqlite");
		const db = new Database(driver, {logger});
		await db.open();
		await db.close();
		expect(driver.closed).toBe(true);
		expect(db.opened).toBe(false);
	});

	test("options are validated", () => {
		expect(() => new Database(new FakeDriver("sqlite"), {chunkSize: 0})).toThrow(
			ValidationError,
		);
		expect(new Database(new FakeDriver("mysql"), {schema: "reporting"}).schema).toBe(
			"reporting",
		);
		expect(new Database(new FakeDriver("mysql")).schema).toBe("app");
	});
});

describe("Database on SQLite", () => {
	let db: Database;

	beforeEach(async () => {
		db = new Database(new SQLiteDriver(":memory:"), {logger});
		await db.open();
		await db.createTable(
			"orders",
			[
				{name: "id", type: "integer"},
				{name: "status", type: "text"},
				{name: "total", type: "real"},
				{name: "note", type: "text"},
			],
			{primaryKey: "id"},
		);
		await db.upsert("orders", [
			{id: 1, status: "paid", total: 10},
			{id: 2, status: "new", total: 5},
			{id: 3, status: "paid", total: 7.5},
		]);
	});

	afterEach(async () => {
		await db.close();
	});

	describe("get", () => {
		test("filters and sorts", async () => {
			const rows = await db.get("orders", {where: {status: "paid"}, sortBy: "id"});
			expect(rows).toEqual([
				{id: 1, status: "paid", total: 10, note: null},
				{id: 3, status: "paid", total: 7.5, note: null},
			]);
		});

		test("projection, direction and limit", async () => {
			const rows = await db.get("orders", {
				columns: ["id"],
				sortBy: {column: "total", direction: "desc"},
				limit: 2,
			});
			expect(rows).toEqual([{id: 1}, {id: 3}]);
		});

		test("offset without limit", async () => {
			const rows = await db.get("orders", {columns: ["id"], sortBy: "id", offset: 1});
			expect(rows).toEqual([{id: 2}, {id: 3}]);
		});

		test("operators", async () => {
			const rows = await db.get("orders", {
				columns: ["id"],
				where: {total: {operator: ">=", value: 7.5}, note: {operator: "is null"}},
				sortBy: "id",
			});
			expect(rows).toEqual([{id: 1}, {id: 3}]);
		});

		test("no match is an empty list", async () => {
			expect(await db.get("orders", {where: {status: "void"}})).toEqual([]);
		});

		test("limit 0 returns nothing", async () => {
			expect(await db.get("orders", {limit: 0})).toEqual([]);
		});

		test("limit 0 still requires the table", async () => {
			await expect(db.get("nope", {limit: 0})).rejects.toThrow(TableNotFoundError);
		});

		test("negative paging is rejected", async () => {
			await expect(db.get("orders", {limit: -1})).rejects.toThrow(ValidationError);
			await expect(db.get("orders", {offset: 1.5})).rejects.toThrow(ValidationError);
		});

		test("missing table", async () => {
			await expect(db.get("nope")).rejects.toThrow(TableNotFoundError);
		});
	});

	test("count", async () => {
		expect(await db.count("orders")).toBe(3);
		expect(await db.count("orders", {where: {status: "paid"}})).toBe(2);
	});

	describe("update", () => {
		test("returns the affected row count", async () => {
			expect(await db.update("orders", [{id: 2, status: "paid"}], "id")).toBe(1);
			expect(await db.count("orders", {where: {status: "paid"}})).toBe(3);
		});

		test("no matching row updates nothing", async () => {
			expect(await db.update("orders", {id: 99, status: "paid"}, "id")).toBe(0);
		});

		test("several records", async () => {
			const changed = await db.update(
				"orders",
				[
					{id: 1, note: "first"},
					{id: 3, note: "third"},
				],
				["id"],
			);
			expect(changed).toBe(2);
			expect(await db.get("orders", {columns: ["note"], sortBy: "id"})).toEqual([
				{note: "first"},
				{note: null},
				{note: "third"},
			]);
		});

		test("empty input", async () => {
			expect(await db.update("orders", [], "id")).toBe(0);
		});

		test("a missing match field stops before any write", async () => {
			await expect(
				db.update("orders", [{id: 1, status: "void"}, {status: "void"}], "id"),
			).rejects.toThrow(MissingMatchFieldError);
			expect(await db.count("orders", {where: {status: "void"}})).toBe(0);
		});
	});

	describe("delete", () => {
		test("with a filter", async () => {
			expect(
				await db.delete("orders", {where: {status: {operator: "in", value: ["new"]}}}),
			).toBe(1);
			expect(await db.count("orders")).toBe(2);
		});

		test("without a filter removes every row", async () => {
			expect(await db.delete("orders")).toBe(3);
			expect(await db.count("orders")).toBe(0);
		});
	});

	describe("upsert", () => {
		test("a single record returns its key", async () => {
			expect(await db.upsert("orders", {id: 4, total: 1})).toEqual({id: 4});
		});

		test("an empty list does nothing", async () => {
			expect(await db.upsert("orders", [])).toEqual([]);
		});

		test("values are encoded for SQLite", async () => {
			await db.upsert("orders", {id: 5, note: {gift: true}});
			expect(await db.get("orders", {columns: ["note"], where: {id: 5}})).toEqual([
				{note: '{"gift":true}'},
			]);
		});

		test("tables without a primary key", async () => {
			await db.createTable("events", [{name: "name", type: "text"}]);
			await expect(db.upsert("events", [{name: "x"}])).rejects.toThrow(
				NoPrimaryKeyError,
			);
			expect(await db.count("events")).toBe(0);
		});
	});

	describe("catalog", () => {
		test("tableExists", async () => {
			expect(await db.tableExists("orders")).toBe(true);
			expect(await db.tableExists("nope")).toBe(false);
		});

		test("columns in ordinal order", async () => {
			expect(await db.columns("orders")).toEqual(["id", "status", "total", "note"]);
		});

		test("describe", async () => {
			const handle = await db.describe("orders");
			expect([...handle.primaryKey]).toEqual(["id"]);
			expect(handle.columns[0]).toEqual({name: "id", type: "INTEGER", nullable: false});
			expect(handle.columns[2]).toEqual({name: "total", type: "REAL", nullable: true});
		});

		test("tables and views", async () => {
			await db.exec`CREATE VIEW paid_orders AS SELECT id FROM orders WHERE status = 'paid'`;
			expect(await db.tables()).toEqual(["orders"]);
			expect(await db.views()).toEqual(["paid_orders"]);
		});
	});

	describe("addColumn", () => {
		test("adds a column", async () => {
			await db.addColumn("orders", "priority", "integer", {default: 0});
			expect(await db.columns("orders")).toEqual([
				"id",
				"status",
				"total",
				"note",
				"priority",
			]);
			expect(await db.get("orders", {columns: ["priority"], where: {id: 1}})).toEqual([
				{priority: 0},
			]);
		});

		test("existing columns and missing tables", async () => {
			await expect(db.addColumn("orders", "status", "text")).rejects.toThrow(
				ColumnAlreadyExistsError,
			);
			await expect(db.addColumn("nope", "status", "text")).rejects.toThrow(
				TableNotFoundError,
			);
		});
	});

	describe("raw statements", () => {
		test("interpolations are bound", async () => {
			const rows = await db.query`SELECT id FROM orders WHERE status = ${"paid"} ORDER BY id`;
			expect(rows).toEqual([{id: 1}, {id: 3}]);
			expect(await db.exec`UPDATE orders SET note = ${"x"} WHERE total < ${8}`).toBe(2);
		});

		test("fragments cannot be interpolated", async () => {
			await expect(db.query`SELECT ${ident("id")} FROM orders`).rejects.toThrow(
				UnsafeValueError,
			);
		});

		test("driver failures carry the SQL", async () => {
			let caught: unknown;
			try {
				await db.query`SELECT * FROM nowhere`;
			} catch (error) {
				caught = error;
			}
			expect(caught instanceof QueryError && caught.sql).toBe("SELECT * FROM nowhere");
		});

		test("constraint violations are normalized", async () => {
			let caught: unknown;
			try {
				await db.exec`INSERT INTO orders (id) VALUES (${1})`;
			} catch (error) {
				caught = error;
			}
			expect(caught instanceof ConstraintViolationError && caught.kind).toBe("unique");
		});
	});
});
