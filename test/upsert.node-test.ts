import {describe, test, expect, beforeEach, afterEach} from "../src/impl/node-test-utils.js";
import {Database, ConstraintViolationError, createLogger} from "../src/index.js";
import SQLiteDriver from "../src/sqlite.js";
import {FakeDriver, describeColumns} from "../src/impl/fake-driver.js";

const logger = createLogger("silent");

describe("upsert on SQLite", () => {
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
	});

	afterEach(async () => {
		await db.close();
	});

	test("a later null does not erase an earlier value", async () => {
		await db.upsert("orders", [{id: 1, total: 10, note: "fragile"}]);
		await db.upsert("orders", [{id: 1, total: 20, note: null}]);

		expect(await db.get("orders")).toEqual([
			{id: 1, status: null, total: 20, note: "fragile"},
		]);
	});

	test("columns missing from a record keep their stored value", async () => {
		await db.upsert("orders", [{id: 1, total: 10, note: null}]);
		await db.upsert("orders", [{id: 1, total: 20}]);

		expect(await db.get("orders")).toEqual([{id: 1, status: null, total: 20, note: null}]);
	});

	test("overwriteWithNull lets nulls win", async () => {
		await db.upsert("orders", {id: 1, status: "paid", note: "fragile"});
		await db.upsert("orders", {id: 1, note: null}, {overwriteWithNull: true});

		expect(await db.get("orders", {columns: ["status", "note"]})).toEqual([
			{status: "paid", note: null},
		]);
	});

	test("applying the same records twice is idempotent", async () => {
		const records = [
			{id: 1, status: "paid", total: 10, note: null},
			{id: 2, status: "new", total: 5, note: "call first"},
		];
		await db.upsert("orders", records);
		const once = await db.get("orders", {sortBy: "id"});
		await db.upsert("orders", records);

		expect(await db.get("orders", {sortBy: "id"})).toEqual(once);
		expect(await db.count("orders")).toBe(2);
	});

	test("returns keys in input order across chunks", async () => {
		const keys = await db.upsert(
			"orders",
			[5, 3, 9, 1, 7].map((id) => ({id, status: "new"})),
			{chunkSize: 2},
		);
		expect(keys).toEqual([{id: 5}, {id: 3}, {id: 9}, {id: 1}, {id: 7}]);
		expect(await db.count("orders")).toBe(5);
	});

	test("a column a record leaves out keeps its default on insert", async () => {
		await db.exec`CREATE TABLE tickets (id INTEGER PRIMARY KEY, status TEXT NOT NULL DEFAULT 'new', note TEXT)`;

		const keys = await db.upsert("tickets", [{id: 3, status: "paid"}, {id: 4}]);

		expect(keys).toEqual([{id: 3}, {id: 4}]);
		expect(await db.get("tickets", {sortBy: "id"})).toEqual([
			{id: 3, status: "paid", note: null},
			{id: 4, status: "new", note: null},
		]);
	});

	test("overwriteWithNull leaves columns a record does not name", async () => {
		await db.exec`CREATE TABLE tickets (id INTEGER PRIMARY KEY, status TEXT NOT NULL DEFAULT 'new', note TEXT)`;
		await db.upsert("tickets", {id: 2, status: "paid", note: "keep"});

		const keys = await db.upsert(
			"tickets",
			[
				{id: 1, status: "x", note: "y"},
				{id: 2, note: "changed"},
			],
			{overwriteWithNull: true},
		);

		expect(keys).toEqual([{id: 1}, {id: 2}]);
		expect(await db.get("tickets", {sortBy: "id"})).toEqual([
			{id: 1, status: "x", note: "y"},
			{id: 2, status: "paid", note: "changed"},
		]);
	});

	test("records with different columns apply in submission order", async () => {
		await db.upsert("orders", [
			{id: 1, status: "a", note: "first"},
			{id: 1, note: "second"},
			{id: 1, status: "b", note: "third"},
		]);

		expect(await db.get("orders", {columns: ["status", "note"]})).toEqual([
			{status: "b", note: "third"},
		]);
	});
});

describe("chunk failures", () => {
	test("earlier chunks stay applied and a retry completes the write", async () => {
		const db = new Database(new SQLiteDriver(":memory:"), {logger});
		await db.open();
		try {
			await db.exec`CREATE TABLE ledger (id INTEGER PRIMARY KEY, amount REAL CHECK (amount >= 0))`;

			let caught: unknown;
			try {
				await db.upsert(
					"ledger",
					[
						{id: 1, amount: 5},
						{id: 2, amount: -1},
						{id: 3, amount: 2},
					],
					{chunkSize: 1},
				);
			} catch (error) {
				caught = error;
			}
			expect(caught instanceof ConstraintViolationError && caught.kind).toBe("check");
			expect(await db.count("ledger")).toBe(1);

			await db.upsert(
				"ledger",
				[
					{id: 1, amount: 5},
					{id: 2, amount: 1},
					{id: 3, amount: 2},
				],
				{chunkSize: 1},
			);
			expect(await db.get("ledger", {sortBy: "id"})).toEqual([
				{id: 1, amount: 5},
				{id: 2, amount: 1},
				{id: 3, amount: 2},
			]);
		} finally {
			await db.close();
		}
	});
});

describe("chunking", () => {
	for (const [n, size, statements] of [
		[1, 1000, 1],
		[5, 1, 5],
		[6, 3, 2],
		[7, 3, 3],
	]) {
		test(`${n} records in chunks of ${size} take ${statements} statements`, async () => {
			const driver = new FakeDriver("mysql", {
				tables: {orders: describeColumns(["id", "total"], ["id"])},
			});
			const db = new Database(driver, {logger});
			await db.open();

			const records = Array.from({length: n}, (_, i) => ({id: i + 1, total: i}));
			const keys = await db.upsert("orders", records, {chunkSize: size});

			expect(driver.statements.length).toBe(statements);
			expect(keys).toEqual(records.map(({id}) => ({id})));
		});
	}

	test("a chunk splits where the named columns change", async () => {
		const driver = new FakeDriver("mysql", {
			tables: {orders: describeColumns(["id", "total"], ["id"])},
		});
		const db = new Database(driver, {logger});
		await db.open();

		const keys = await db.upsert("orders", [{id: 1, total: 1}, {id: 2}, {id: 3}, {total: 4, id: 4}]);

		expect(keys).toEqual([{id: 1}, {id: 2}, {id: 3}, {id: 4}]);
		expect(driver.statements).toEqual([
			{
				sql:
					"INSERT INTO `app`.`orders` (`id`, `total`) VALUES (?, ?) " +
					"ON DUPLICATE KEY UPDATE `total` = COALESCE(VALUES(`total`), `total`)",
				params: [1, 1],
			},
			{
				sql:
					"INSERT INTO `app`.`orders` (`id`) VALUES (?), (?) " +
					"ON DUPLICATE KEY UPDATE `id` = VALUES(`id`)",
				params: [2, 3],
			},
			{
				sql:
					"INSERT INTO `app`.`orders` (`total`, `id`) VALUES (?, ?) " +
					"ON DUPLICATE KEY UPDATE `total` = COALESCE(VALUES(`total`), `total`)",
				params: [4, 4],
			},
		]);
	});
});
