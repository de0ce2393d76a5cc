import {describe, test, expect} from "./node-test-utils.js";
import {
	appendTableRef,
	assertColumn,
	columnNames,
	hasColumn,
	SchemaIntrospector,
} from "./introspect.js";
import {FakeDriver, describeColumns} from "./fake-driver.js";
import {createLogger} from "./logger.js";
import {renderSQL} from "./sql.js";
import {TemplateBuilder} from "./template.js";
import {ColumnNotFoundError, TableNotFoundError} from "./errors.js";

const logger = createLogger("silent");

async function introspector(driver: FakeDriver) {
	return new SchemaIntrospector(await driver.acquire(), driver.defaultSchema, logger);
}

describe("SchemaIntrospector", () => {
	test("resolve returns the live structure", async () => {
		const driver = new FakeDriver("postgresql", {
			tables: {orders: describeColumns(["id", "status"], ["id"])},
		});
		const handle = await (await introspector(driver)).resolve("orders");

		expect(handle.schema).toBe("public");
		expect(handle.name).toBe("orders");
		expect(columnNames(handle)).toEqual(["id", "status"]);
		expect([...handle.primaryKey]).toEqual(["id"]);
	});

	test("an explicit schema wins over the default", async () => {
		const driver = new FakeDriver("postgresql", {
			tables: {orders: describeColumns(["id"])},
		});
		const handle = await (await introspector(driver)).resolve("orders", "sales");
		expect(handle.schema).toBe("sales");
	});

	test("missing tables", async () => {
		const driver = new FakeDriver("sqlite", {
			tables: {empty: describeColumns([])},
		});
		const schema = await introspector(driver);

		await expect(schema.resolve("nope")).rejects.toThrow(TableNotFoundError);
		await expect(schema.resolve("empty")).rejects.toThrow('"main"."empty"');
		await expect(schema.columns("nope")).rejects.toThrow(TableNotFoundError);
		expect(await schema.exists("nope")).toBe(false);
		expect(await schema.exists("empty")).toBe(false);
	});

	test("sees changes between calls", async () => {
		const driver = new FakeDriver("sqlite", {
			tables: {orders: describeColumns(["id"])},
		});
		const schema = await introspector(driver);
		expect(await schema.columns("orders")).toEqual(["id"]);

		driver.tables.set("orders", describeColumns(["id", "note"]));
		expect(await schema.columns("orders")).toEqual(["id", "note"]);
	});

	test("exists reports false when the catalog query fails", async () => {
		const connection = await new FakeDriver("sqlite").acquire();
		const schema = new SchemaIntrospector(
			{
				...connection,
				describeTable: async () => {
					throw new Error("catalog unavailable");
				},
			},
			"main",
			logger,
		);
		expect(await schema.exists("orders")).toBe(false);
		await expect(schema.resolve("orders")).rejects.toThrow("catalog unavailable");
	});
});

describe("handle helpers", () => {
	const handle = {
		schema: "main",
		name: "orders",
		columns: describeColumns(["id", "total"]).columns,
		primaryKey: ["id"],
		unique: [],
	};

	test("hasColumn and assertColumn", () => {
		expect(hasColumn(handle, "total")).toBe(true);
		expect(hasColumn(handle, "Total")).toBe(false);
		expect(() => assertColumn(handle, "nope")).toThrow(
			'Column "nope" does not exist in table "orders". Available columns: id, total',
		);
		expect(() => assertColumn(handle, "nope")).toThrow(ColumnNotFoundError);
	});

	test("appendTableRef qualifies the name", () => {
		const template = appendTableRef(new TemplateBuilder("FROM "), handle).build();
		expect(renderSQL(template, "mysql").sql).toBe("FROM `main`.`orders`");
	});
});
