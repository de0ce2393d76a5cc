/**
 * postgres.js adapter for tablekit
 *
 * Provides a Driver implementation for postgres.js.
 * Uses connection pooling - call close() when done to end all connections.
 *
 * Requires: postgres
 */

import postgres from "postgres";
import {
	catalogQueries,
	describeFromCatalog,
	tableNames,
	tableType,
} from "./impl/catalog.js";
import type {
	Connection,
	Driver,
	DynamicRecord,
	RelationKind,
	TableDescription,
} from "./impl/driver.js";
import {toRecords} from "./impl/driver.js";
import {
	ConstraintViolationError,
	errorField,
	type ConstraintKind,
} from "./impl/errors.js";
import {buildSQL} from "./impl/sql.js";

const DIALECT = "postgresql" as const;

const QUERIES = catalogQueries(DIALECT);

const CONSTRAINT_KINDS: Record<string, ConstraintKind> = {
	"23505": "unique",
	"23503": "foreign_key",
	"23514": "check",
	"23502": "not_null",
};

type Sql = ReturnType<typeof postgres>;
type ReservedSql = Awaited<ReturnType<Sql["reserve"]>>;

type Parameter = string | number | boolean | Date | null;

/**
 * Narrow a bound value to what postgres.js serializes without type hints.
 * Objects and arrays go over the wire as JSON text.
 */
export function encodeValue(value: unknown): Parameter {
	if (value === null || value === undefined) return null;
	if (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean" ||
		value instanceof Date
	) {
		return value;
	}
	if (typeof value === "bigint") return value.toString();
	if (value instanceof Uint8Array) {
		return `\\x${Buffer.from(value).toString("hex")}`;
	}
	if (typeof value === "object") return JSON.stringify(value);
	return String(value);
}

function encodeParams(params: readonly unknown[]): Parameter[] {
	return params.map(encodeValue);
}

/**
 * Convert PostgreSQL errors to tablekit errors.
 */
function handleError(error: unknown): never {
	const code = errorField(error, "code");
	const kind = code === undefined ? undefined : CONSTRAINT_KINDS[code];
	if (kind) {
		throw new ConstraintViolationError(
			errorField(error, "message") ?? String(error),
			{
				kind,
				constraint: errorField(error, "constraint_name", "constraint"),
				table: errorField(error, "table_name", "table"),
				column: errorField(error, "column_name", "column"),
			},
			{cause: error},
		);
	}
	throw error;
}

class PostgresConnection implements Connection {
	#sql: ReservedSql;

	constructor(sql: ReservedSql) {
		this.#sql = sql;
	}

	async all(
		strings: TemplateStringsArray,
		values: unknown[],
	): Promise<DynamicRecord[]> {
		try {
			const {sql, params} = buildSQL(strings, values, DIALECT);
			const result = await this.#sql.unsafe(sql, encodeParams(params));
			return toRecords(result);
		} catch (error) {
			return handleError(error);
		}
	}

	async run(strings: TemplateStringsArray, values: unknown[]): Promise<number> {
		try {
			const {sql, params} = buildSQL(strings, values, DIALECT);
			const result = await this.#sql.unsafe(sql, encodeParams(params));
			return result.count;
		} catch (error) {
			return handleError(error);
		}
	}

	async runBatch(
		strings: TemplateStringsArray,
		valueSets: unknown[][],
	): Promise<number> {
		let count = 0;
		try {
			for (const values of valueSets) {
				const {sql, params} = buildSQL(strings, values, DIALECT);
				const result = await this.#sql.unsafe(sql, encodeParams(params), {
					prepare: true,
				});
				count += result.count;
			}
		} catch (error) {
			return handleError(error);
		}
		return count;
	}

	async describeTable(
		name: string,
		schema: string,
	): Promise<TableDescription | null> {
		const columns = await this.#sql.unsafe(QUERIES.columns, [schema, name]);
		const keys = await this.#sql.unsafe(QUERIES.keys, [schema, name]);
		return describeFromCatalog(toRecords(columns), toRecords(keys));
	}

	async listTables(schema: string, kind: RelationKind): Promise<string[]> {
		const rows = await this.#sql.unsafe(QUERIES.tables, [schema, tableType(kind)]);
		return tableNames(toRecords(rows));
	}

	async release(): Promise<void> {
		this.#sql.release();
	}
}

/**
 * Options for the postgres adapter.
 */
export interface PostgresOptions {
	/** Maximum number of connections in the pool (default: 10) */
	max?: number;
	/** Idle timeout in seconds before closing connections (default: 30) */
	idleTimeout?: number;
	/** Connection timeout in seconds (default: 30) */
	connectTimeout?: number;
	/** Schema for operations that don't name one (default: "public") */
	schema?: string;
}

/**
 * PostgreSQL driver using postgres.js.
 *
 * @example
 * import PostgresDriver from "tablekit/postgres";
 * import {Database} from "tablekit";
 *
 * const driver = new PostgresDriver("postgresql://localhost/mydb");
 * const db = new Database(driver);
 * await db.open();
 *
 * // When done:
 * await db.close();
 */
export default class PostgresDriver implements Driver {
	readonly dialect = DIALECT;
	readonly defaultSchema: string;
	readonly supportsReturning = true;
	#sql: Sql;

	constructor(url: string, options: PostgresOptions = {}) {
		this.defaultSchema = options.schema ?? "public";
		this.#sql = postgres(url, {
			max: options.max ?? 10,
			idle_timeout: options.idleTimeout ?? 30,
			connect_timeout: options.connectTimeout ?? 30,
			onnotice: () => {}, // Suppress PostgreSQL NOTICE messages
		});
	}

	async acquire(): Promise<Connection> {
		return new PostgresConnection(await this.#sql.reserve());
	}

	async ping(): Promise<boolean> {
		try {
			await this.#sql.unsafe("SELECT 1");
			return true;
		} catch {
			return false;
		}
	}

	async close(): Promise<void> {
		await this.#sql.end();
	}
}
