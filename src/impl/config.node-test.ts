import {describe, test, expect} from "./node-test-utils.js";
import {connect, createDriver, dialectFromURL, loadConfig} from "./config.js";
import {createLogger} from "./logger.js";
import {ValidationError} from "./errors.js";

describe("loadConfig", () => {
	test("defaults", () => {
		expect(loadConfig({DATABASE_URL: "postgres://localhost/app"})).toEqual({
			url: "postgres://localhost/app",
			schema: undefined,
			logLevel: "info",
			chunkSize: 1000,
		});
	});

	test("reads every variable", () => {
		const config = loadConfig({
			DATABASE_URL: "sqlite::memory:",
			DATABASE_SCHEMA: "reporting",
			LOG_LEVEL: "debug",
			UPSERT_CHUNK_SIZE: "250",
		});
		expect(config).toEqual({
			url: "sqlite::memory:",
			schema: "reporting",
			logLevel: "debug",
			chunkSize: 250,
		});
	});

	test("rejects missing or malformed values", () => {
		expect(() => loadConfig({})).toThrow(ValidationError);
		expect(() => loadConfig({DATABASE_URL: "x", LOG_LEVEL: "loud"})).toThrow(
			ValidationError,
		);
		expect(() => loadConfig({DATABASE_URL: "x", UPSERT_CHUNK_SIZE: "0"})).toThrow(
			ValidationError,
		);
		expect(() => loadConfig({DATABASE_URL: "x", UPSERT_CHUNK_SIZE: "many"})).toThrow(
			ValidationError,
		);
	});

	test("errors name the offending variable", () => {
		let caught: unknown;
		try {
			loadConfig({DATABASE_URL: "x", LOG_LEVEL: "loud"});
		} catch (error) {
			caught = error;
		}
		expect(caught instanceof ValidationError && Object.keys(caught.fieldErrors)).toEqual([
			"LOG_LEVEL",
		]);
	});
});

describe("dialectFromURL", () => {
	test("known schemes", () => {
		expect(dialectFromURL("postgres://u@localhost/app")).toBe("postgresql");
		expect(dialectFromURL("postgresql://u@localhost/app")).toBe("postgresql");
		expect(dialectFromURL("mysql://u@localhost/app")).toBe("mysql");
		expect(dialectFromURL("sqlite:data.db")).toBe("sqlite");
		expect(dialectFromURL("file:data.db")).toBe("sqlite");
		expect(dialectFromURL(":memory:")).toBe("sqlite");
	});

	test("unknown schemes", () => {
		expect(() => dialectFromURL("redis://localhost")).toThrow(
			'Unsupported database URL scheme "redis"',
		);
		expect(() => dialectFromURL("data.db")).toThrow(ValidationError);
	});
});

describe("connect", () => {
	test("opens an in-memory SQLite database", async () => {
		const db = await connect(":memory:", {logger: createLogger("silent")});
		try {
			expect(db.opened).toBe(true);
			expect(db.driver.dialect).toBe("sqlite");
			expect(db.schema).toBe("main");
			expect(await db.query`SELECT 1 AS one`).toEqual([{one: 1}]);
		} finally {
			await db.close();
		}
	});

	test("createDriver rejects unsupported URLs", async () => {
		await expect(createDriver("redis://localhost")).rejects.toThrow(ValidationError);
	});
});
