import {describe, test, expect} from "./node-test-utils.js";
import {encodeValue as encodePostgres} from "../postgres.js";
import {databaseName, encodeValue as encodeMySQL} from "../mysql.js";
import {encodeValue as encodeSQLite, sqlitePath} from "../sqlite.js";
import {ValidationError} from "./errors.js";

describe("SQLite values", () => {
	test("booleans, dates and objects", () => {
		expect(encodeSQLite(true)).toBe(1);
		expect(encodeSQLite(false)).toBe(0);
		expect(encodeSQLite(new Date("2024-01-02T03:04:05.000Z"))).toBe(
			"2024-01-02T03:04:05.000Z",
		);
		expect(encodeSQLite({tags: ["a"]})).toBe('{"tags":["a"]}');
		expect(encodeSQLite(undefined)).toBeNull();
		expect(encodeSQLite("x")).toBe("x");
	});

	test("paths", () => {
		expect(sqlitePath(":memory:")).toBe(":memory:");
		expect(sqlitePath("sqlite:data.db")).toBe("data.db");
		expect(sqlitePath("sqlite:///var/data.db")).toBe("/var/data.db");
		expect(sqlitePath("file:data.db")).toBe("data.db");
	});
});

describe("PostgreSQL values", () => {
	test("primitives pass through", () => {
		expect(encodePostgres("x")).toBe("x");
		expect(encodePostgres(3)).toBe(3);
		expect(encodePostgres(false)).toBe(false);
		expect(encodePostgres(undefined)).toBeNull();
	});

	test("other values become text", () => {
		expect(encodePostgres(12n)).toBe("12");
		expect(encodePostgres({a: 1})).toBe('{"a":1}');
		expect(encodePostgres(new Uint8Array([1, 255]))).toBe("\\x01ff");
	});
});

describe("MySQL values", () => {
	test("objects and bigints", () => {
		expect(encodeMySQL({a: 1})).toBe('{"a":1}');
		expect(encodeMySQL(9007199254740993n)).toBe("9007199254740993");
		expect(encodeMySQL(true)).toBe(true);
	});

	test("database name comes from the URL path", () => {
		expect(databaseName("mysql://user@localhost:3306/shop")).toBe("shop");
		expect(() => databaseName("mysql://user@localhost:3306")).toThrow(ValidationError);
	});
});
