import {describe, test, expect, beforeEach, afterEach} from "../src/impl/node-test-utils.js";
import {
	Database,
	ConstraintViolationError,
	QueryError,
	ValidationError,
	createLogger,
	type ColumnSpec,
} from "../src/index.js";
import SQLiteDriver from "../src/sqlite.js";

const customers: ColumnSpec[] = [
	{name: "id", type: "integer", autoIncrement: true},
	{name: "name", type: "text", nullable: false},
	{name: "credit", type: {kind: "numeric", precision: 10, scale: 2}},
];

describe("createTable", () => {
	let db: Database;

	beforeEach(async () => {
		db = new Database(new SQLiteDriver(":memory:"), {logger: createLogger("silent")});
		await db.open();
	});

	afterEach(async () => {
		await db.close();
	});

	test("creates a missing table", async () => {
		expect(await db.createTable("customers", customers, {primaryKey: "id"})).toEqual({
			created: true,
			added: [],
		});
		expect(await db.columns("customers")).toEqual(["id", "name", "credit"]);
	});

	test("adds exactly the missing columns to an existing table", async () => {
		await db.createTable("customers", customers, {primaryKey: "id"});
		await db.upsert("customers", {id: 1, name: "Test Customer", credit: 5});
		const before = await db.describe("customers");

		const result = await db.createTable("customers", [
			...customers,
			{name: "a", type: "text"},
			{name: "b", type: "integer", default: 0, nullable: false},
		]);

		expect(result).toEqual({created: false, added: ["a", "b"]});
		const after = await db.describe("customers");
		expect(after.columns.slice(0, 3)).toEqual([...before.columns]);
		expect(after.columns.slice(3)).toEqual([
			{name: "a", type: "TEXT", nullable: true},
			{name: "b", type: "INTEGER", nullable: true},
		]);
		expect(await db.get("customers")).toEqual([
			{id: 1, name: "Test Customer", credit: 5, a: null, b: 0},
		]);
	});

	test("an up-to-date table is left alone", async () => {
		await db.createTable("customers", customers, {primaryKey: "id"});
		expect(await db.createTable("customers", customers)).toEqual({
			created: false,
			added: [],
		});
	});

	test("checkExisting false requires the table to be new", async () => {
		await db.createTable("customers", customers, {primaryKey: "id"});
		await expect(
			db.createTable("customers", customers, {checkExisting: false}),
		).rejects.toThrow(QueryError);
	});

	test("foreign keys are enforced", async () => {
		await db.createTable("customers", customers, {primaryKey: "id"});
		await db.createTable(
			"orders",
			[
				{name: "id", type: "integer"},
				{
					name: "customer_id",
					type: "integer",
					references: {table: "customers", column: "id", onDelete: "cascade"},
				},
			],
			{primaryKey: "id"},
		);

		let caught: unknown;
		try {
			await db.upsert("orders", {id: 1, customer_id: 99});
		} catch (error) {
			caught = error;
		}
		expect(caught instanceof ConstraintViolationError && caught.kind).toBe("foreign_key");
	});

	test("unique constraints are reported by describe", async () => {
		await db.createTable(
			"accounts",
			[
				{name: "id", type: "integer"},
				{name: "email", type: "text"},
			],
			{primaryKey: "id", unique: ["email"]},
		);
		const handle = await db.describe("accounts");
		expect(handle.unique.map((columns) => [...columns])).toEqual([["email"]]);
	});

	test("invalid column specs are rejected before any statement", async () => {
		await expect(db.createTable("t", [])).rejects.toThrow(ValidationError);
		expect(await db.tableExists("t")).toBe(false);
	});
});
