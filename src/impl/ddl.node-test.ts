import {describe, test, expect} from "./node-test-utils.js";
import {
	generateAddColumn,
	generateCreateTable,
	mapColumnType,
	serverDefaultSQL,
	sqlType,
	validateColumnSpecs,
	type ColumnSpec,
} from "./ddl.js";
import {renderDDL} from "./sql.js";
import {ValidationError} from "./errors.js";

const orderColumns: ColumnSpec[] = [
	{name: "id", type: "integer", autoIncrement: true},
	{
		name: "customer_id",
		type: "integer",
		nullable: false,
		references: {table: "customers", column: "id", onDelete: "cascade"},
	},
	{name: "status", type: {kind: "varchar", length: 32}, default: "new"},
	{name: "created_at", type: "datetime", serverDefault: "now"},
];

describe("generateCreateTable", () => {
	test("SQLite inlines the auto-increment key", () => {
		const ddl = generateCreateTable(
			"main",
			"orders",
			orderColumns,
			{primaryKey: "id", unique: [["customer_id", "status"]], ifNotExists: true},
			"sqlite",
		);

		expect(renderDDL(ddl, "sqlite")).toBe(
			[
				'CREATE TABLE IF NOT EXISTS "main"."orders" (',
				'  "id" INTEGER PRIMARY KEY AUTOINCREMENT,',
				'  "customer_id" INTEGER NOT NULL,',
				`  "status" TEXT DEFAULT 'new',`,
				'  "created_at" TEXT DEFAULT CURRENT_TIMESTAMP,',
				'  UNIQUE ("customer_id", "status"),',
				'  FOREIGN KEY ("customer_id") REFERENCES "customers" ("id") ON DELETE CASCADE',
				")",
			].join("\n"),
		);
	});

	test("PostgreSQL uses identity columns and qualified references", () => {
		const ddl = generateCreateTable(
			"public",
			"orders",
			orderColumns,
			{primaryKey: "id"},
			"postgresql",
		);

		expect(renderDDL(ddl, "postgresql")).toBe(
			[
				'CREATE TABLE "public"."orders" (',
				'  "id" INTEGER GENERATED BY DEFAULT AS IDENTITY,',
				'  "customer_id" INTEGER NOT NULL,',
				`  "status" VARCHAR(32) DEFAULT 'new',`,
				'  "created_at" TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,',
				'  PRIMARY KEY ("id"),',
				'  FOREIGN KEY ("customer_id") REFERENCES "public"."customers" ("id") ON DELETE CASCADE',
				")",
			].join("\n"),
		);
	});

	test("MySQL", () => {
		const ddl = renderDDL(
			generateCreateTable("app", "orders", orderColumns, {primaryKey: "id"}, "mysql"),
			"mysql",
		);

		expect(ddl).toContain("CREATE TABLE `app`.`orders` (");
		expect(ddl).toContain("`id` INT AUTO_INCREMENT,");
		expect(ddl).toContain("`created_at` DATETIME DEFAULT CURRENT_TIMESTAMP,");
		expect(ddl).toContain("PRIMARY KEY (`id`)");
		expect(ddl).toContain("REFERENCES `app`.`customers` (`id`) ON DELETE CASCADE");
	});

	test("composite primary key", () => {
		const ddl = renderDDL(
			generateCreateTable(
				"main",
				"line_items",
				[
					{name: "order_id", type: "integer"},
					{name: "sku", type: "text"},
					{name: "qty", type: "integer", default: 1},
				],
				{primaryKey: ["order_id", "sku"]},
				"sqlite",
			),
			"sqlite",
		);

		expect(ddl).toContain('"qty" INTEGER DEFAULT 1,');
		expect(ddl).toContain('PRIMARY KEY ("order_id", "sku")');
	});

	test("keys must name declared columns", () => {
		expect(() =>
			generateCreateTable("main", "t", [{name: "a", type: "text"}], {primaryKey: "b"}, "sqlite"),
		).toThrow(ValidationError);
	});

	test("SQLite auto-increment must be the sole primary key", () => {
		expect(() =>
			generateCreateTable(
				"main",
				"t",
				[
					{name: "a", type: "integer", autoIncrement: true},
					{name: "b", type: "integer"},
				],
				{primaryKey: ["a", "b"]},
				"sqlite",
			),
		).toThrow(ValidationError);
	});
});

describe("server defaults", () => {
	test("map per dialect", () => {
		expect(serverDefaultSQL("now", "postgresql")).toBe("CURRENT_TIMESTAMP");
		expect(serverDefaultSQL("current_date", "mysql")).toBe("(CURRENT_DATE)");
		expect(serverDefaultSQL("current_time", "sqlite")).toBe("CURRENT_TIME");
	});

	test("MySQL wraps date defaults in parentheses", () => {
		const ddl = generateAddColumn(
			"app",
			"orders",
			{name: "placed_on", type: "date", serverDefault: "current_date"},
			"mysql",
		);
		expect(renderDDL(ddl, "mysql")).toBe(
			"ALTER TABLE `app`.`orders` ADD COLUMN `placed_on` DATE DEFAULT (CURRENT_DATE)",
		);
	});

	test("unknown names are rejected", () => {
		expect(() =>
			validateColumnSpecs([{name: "a", type: "datetime", serverDefault: "tomorrow"}]),
		).toThrow(ValidationError);
	});
});

describe("generateAddColumn", () => {
	test("type only", () => {
		const ddl = generateAddColumn("main", "orders", {name: "note", type: "text"}, "sqlite");
		expect(renderDDL(ddl, "sqlite")).toBe(
			'ALTER TABLE "main"."orders" ADD COLUMN "note" TEXT',
		);
	});

	test("keeps the default but not NOT NULL", () => {
		const ddl = generateAddColumn(
			"public",
			"orders",
			{name: "flag", type: "boolean", default: false, nullable: false},
			"postgresql",
		);
		expect(renderDDL(ddl, "postgresql")).toBe(
			'ALTER TABLE "public"."orders" ADD COLUMN "flag" BOOLEAN DEFAULT FALSE',
		);
	});
});

describe("column types", () => {
	test("logical types map per dialect", () => {
		expect(mapColumnType("boolean", "sqlite")).toBe("INTEGER");
		expect(mapColumnType("json", "postgresql")).toBe("JSONB");
		expect(mapColumnType("uuid", "mysql")).toBe("CHAR(36)");
	});

	test("parameterised types", () => {
		expect(mapColumnType({kind: "numeric", precision: 10, scale: 2}, "mysql")).toBe(
			"DECIMAL(10, 2)",
		);
		expect(mapColumnType({kind: "numeric", precision: 8}, "postgresql")).toBe(
			"NUMERIC(8)",
		);
		expect(mapColumnType({kind: "varchar", length: 10}, "sqlite")).toBe("TEXT");
	});

	test("raw type names", () => {
		expect(mapColumnType(sqlType("CITEXT"), "postgresql")).toBe("CITEXT");
		expect(mapColumnType(sqlType("DOUBLE PRECISION"), "postgresql")).toBe(
			"DOUBLE PRECISION",
		);
		expect(() => sqlType("TEXT; DROP TABLE orders")).toThrow(ValidationError);
	});
});

describe("validateColumnSpecs", () => {
	test("rejects empty and duplicate columns", () => {
		expect(() => validateColumnSpecs([])).toThrow(ValidationError);
		expect(() =>
			validateColumnSpecs([
				{name: "a", type: "text"},
				{name: "a", type: "integer"},
			]),
		).toThrow("Duplicate column");
	});

	test("reports the failing field", () => {
		let caught: unknown;
		try {
			validateColumnSpecs([{name: "a", type: "string"}]);
		} catch (error) {
			caught = error;
		}
		expect(caught instanceof ValidationError && Object.keys(caught.fieldErrors)).toEqual([
			"type",
		]);
	});

	test("default and serverDefault are exclusive", () => {
		expect(() =>
			validateColumnSpecs([{name: "a", type: "datetime", default: "x", serverDefault: "now"}]),
		).toThrow(ValidationError);
	});
});
