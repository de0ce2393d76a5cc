/**
 * Environment configuration and driver selection.
 */

import {z} from "zod";
import {Database} from "./database.js";
import type {Driver} from "./driver.js";
import {ValidationError} from "./errors.js";
import {createLogger, LOG_LEVELS, type Logger, type LogLevel} from "./logger.js";
import type {SQLDialect} from "./sql.js";
import {validate} from "./validate.js";

export const DEFAULT_CHUNK_SIZE = 1000;

const EnvSchema = z.object({
	DATABASE_URL: z.string().min(1),
	DATABASE_SCHEMA: z.string().min(1).optional(),
	LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	UPSERT_CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
});

export interface Config {
	url: string;
	/** Overrides the driver's default schema */
	schema?: string;
	logLevel: LogLevel;
	chunkSize: number;
}

/**
 * Read configuration from environment variables.
 *
 * @throws ValidationError
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const parsed = validate(EnvSchema, env, "environment");
	return {
		url: parsed.DATABASE_URL,
		schema: parsed.DATABASE_SCHEMA,
		logLevel: parsed.LOG_LEVEL,
		chunkSize: parsed.UPSERT_CHUNK_SIZE,
	};
}

/**
 * Pick a dialect from a connection URL's scheme.
 *
 * @throws ValidationError for schemes no driver handles
 */
export function dialectFromURL(url: string): SQLDialect {
	if (url === ":memory:") return "sqlite";
	const scheme = /^([a-z][a-z0-9+.-]*):/i.exec(url)?.[1]?.toLowerCase();
	switch (scheme) {
		case "postgres":
		case "postgresql":
			return "postgresql";
		case "mysql":
			return "mysql";
		case "sqlite":
		case "file":
			return "sqlite";
		default:
			throw new ValidationError(
				`Unsupported database URL scheme "${scheme ?? url}"`,
				{url: ["expected postgres:, postgresql:, mysql:, sqlite: or file:"]},
			);
	}
}

/**
 * Create the driver for a URL. Driver modules load on first use, so only
 * the client for the chosen database has to be installed.
 */
export async function createDriver(url: string): Promise<Driver> {
	switch (dialectFromURL(url)) {
		case "postgresql": {
			const {default: PostgresDriver} = await import("../postgres.js");
			return new PostgresDriver(url);
		}
		case "mysql": {
			const {default: MySQLDriver} = await import("../mysql.js");
			return new MySQLDriver(url);
		}
		case "sqlite": {
			const {default: SQLiteDriver} = await import("../sqlite.js");
			return new SQLiteDriver(url);
		}
	}
}

export interface ConnectOptions {
	logger?: Logger;
}

/**
 * Create a driver from configuration and open a Database on it.
 *
 * @example
 * const db = await connect(loadConfig());
 * const rows = await db.get("orders", {where: {status: "paid"}});
 */
export async function connect(
	config: Config | string,
	options: ConnectOptions = {},
): Promise<Database> {
	const resolved: Config =
		typeof config === "string"
			? {url: config, logLevel: "info", chunkSize: DEFAULT_CHUNK_SIZE}
			: config;
	const driver = await createDriver(resolved.url);
	const db = new Database(driver, {
		schema: resolved.schema,
		chunkSize: resolved.chunkSize,
		logger: options.logger ?? createLogger(resolved.logLevel),
	});
	try {
		await db.open();
	} catch (error) {
		await driver.close();
		throw error;
	}
	return db;
}
