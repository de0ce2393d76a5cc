import {describe, test, expect} from "./node-test-utils.js";
import {catalogQueries, describeFromCatalog, tableNames, tableType} from "./catalog.js";

describe("catalogQueries", () => {
	test("placeholders follow the dialect", () => {
		expect(catalogQueries("postgresql").tables).toBe(
			"SELECT table_name AS table_name FROM information_schema.tables " +
				"WHERE table_schema = $1 AND table_type = $2 ORDER BY table_name",
		);
		expect(catalogQueries("mysql").columns).toContain(
			"WHERE table_schema = ? AND table_name = ? ORDER BY ordinal_position",
		);
	});

	test("table types", () => {
		expect(tableType("view")).toBe("VIEW");
		expect(tableType("table")).toBe("BASE TABLE");
	});
});

describe("describeFromCatalog", () => {
	test("no columns means no table", () => {
		expect(describeFromCatalog([], [])).toBeNull();
	});

	test("groups key rows by constraint", () => {
		const description = describeFromCatalog(
			[
				{column_name: "tenant", data_type: "integer", is_nullable: "NO"},
				{column_name: "id", data_type: "integer", is_nullable: "NO"},
				{column_name: "email", data_type: "character varying", is_nullable: "YES"},
				{column_name: "handle", data_type: "text", is_nullable: "YES"},
			],
			[
				{constraint_name: "accounts_pkey", constraint_type: "PRIMARY KEY", column_name: "tenant"},
				{constraint_name: "accounts_pkey", constraint_type: "PRIMARY KEY", column_name: "id"},
				{constraint_name: "accounts_email_key", constraint_type: "UNIQUE", column_name: "email"},
				{constraint_name: "accounts_handle_key", constraint_type: "UNIQUE", column_name: "tenant"},
				{constraint_name: "accounts_handle_key", constraint_type: "UNIQUE", column_name: "handle"},
			],
		);

		expect(description).toEqual({
			columns: [
				{name: "tenant", type: "integer", nullable: false},
				{name: "id", type: "integer", nullable: false},
				{name: "email", type: "character varying", nullable: true},
				{name: "handle", type: "text", nullable: true},
			],
			primaryKey: ["tenant", "id"],
			unique: [["email"], ["tenant", "handle"]],
		});
	});

	test("table names", () => {
		expect(tableNames([{table_name: "a"}, {table_name: "b"}])).toEqual(["a", "b"]);
	});
});
