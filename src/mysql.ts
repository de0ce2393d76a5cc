/**
 * mysql2 adapter for tablekit
 *
 * Provides a Driver implementation for mysql2.
 * Uses connection pooling - call close() when done to end all connections.
 *
 * Requires: mysql2
 */

import mysql from "mysql2/promise";
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
	ValidationError,
	type ConstraintKind,
} from "./impl/errors.js";
import {buildSQL} from "./impl/sql.js";

const DIALECT = "mysql" as const;

const QUERIES = catalogQueries(DIALECT);

/**
 * mysql2's prepared statements reject undefined and plain objects.
 */
export function encodeValue(value: unknown): unknown {
	if (value === undefined) return null;
	if (typeof value === "bigint") return value.toString();
	if (
		value !== null &&
		typeof value === "object" &&
		!(value instanceof Date) &&
		!(value instanceof Uint8Array)
	) {
		return JSON.stringify(value);
	}
	return value;
}

/**
 * The database named in the URL path, which MySQL calls the schema.
 */
export function databaseName(url: string): string {
	const name = decodeURIComponent(new URL(url).pathname.replace(/^\//, ""));
	if (!name) {
		throw new ValidationError("MySQL URL must name a database", {
			url: ["missing database name in path"],
		});
	}
	return name;
}

/**
 * Convert MySQL errors to tablekit errors.
 */
function handleError(error: unknown): never {
	const code = errorField(error, "code");
	const message = errorField(error, "message") ?? String(error);

	let kind: ConstraintKind | undefined;
	let constraint: string | undefined;
	let table: string | undefined;
	if (code === "ER_DUP_ENTRY") {
		kind = "unique";
		const keyMatch = message.match(/for key '([^']+)'/i);
		constraint = keyMatch ? keyMatch[1] : undefined;
		if (constraint) {
			const parts = constraint.split(".");
			if (parts.length > 1) {
				table = parts[0];
			}
		}
	} else if (
		code === "ER_NO_REFERENCED_ROW_2" ||
		code === "ER_ROW_IS_REFERENCED_2"
	) {
		kind = "foreign_key";
		const constraintMatch = message.match(/CONSTRAINT `([^`]+)`/i);
		constraint = constraintMatch ? constraintMatch[1] : undefined;
		const tableMatch = message.match(/`([^`]+)`\.`([^`]+)`/);
		if (tableMatch) {
			table = tableMatch[2];
		}
	} else if (code === "ER_BAD_NULL_ERROR") {
		kind = "not_null";
	} else if (code === "ER_CHECK_CONSTRAINT_VIOLATED") {
		kind = "check";
	}

	if (kind) {
		throw new ConstraintViolationError(
			message,
			{kind, constraint, table},
			{cause: error},
		);
	}
	throw error;
}

class MySQLConnection implements Connection {
	#connection: mysql.PoolConnection;

	constructor(connection: mysql.PoolConnection) {
		this.#connection = connection;
	}

	async all(
		strings: TemplateStringsArray,
		values: unknown[],
	): Promise<DynamicRecord[]> {
		try {
			const {sql, params} = buildSQL(strings, values, DIALECT, encodeValue);
			const [rows] = await this.#connection.execute<mysql.RowDataPacket[]>(
				sql,
				params,
			);
			// Statements without a result set resolve to a header object
			return Array.isArray(rows) ? toRecords(rows) : [];
		} catch (error) {
			return handleError(error);
		}
	}

	async run(strings: TemplateStringsArray, values: unknown[]): Promise<number> {
		try {
			const {sql, params} = buildSQL(strings, values, DIALECT, encodeValue);
			const [result] = await this.#connection.execute<mysql.ResultSetHeader>(
				sql,
				params,
			);
			return result.affectedRows ?? 0;
		} catch (error) {
			return handleError(error);
		}
	}

	async runBatch(
		strings: TemplateStringsArray,
		valueSets: unknown[][],
	): Promise<number> {
		// execute() caches the prepared statement per connection
		let affected = 0;
		for (const values of valueSets) {
			affected += await this.run(strings, values);
		}
		return affected;
	}

	async describeTable(
		name: string,
		schema: string,
	): Promise<TableDescription | null> {
		const [columns] = await this.#connection.execute<mysql.RowDataPacket[]>(
			QUERIES.columns,
			[schema, name],
		);
		const [keys] = await this.#connection.execute<mysql.RowDataPacket[]>(
			QUERIES.keys,
			[schema, name],
		);
		return describeFromCatalog(toRecords(columns), toRecords(keys));
	}

	async listTables(schema: string, kind: RelationKind): Promise<string[]> {
		const [rows] = await this.#connection.execute<mysql.RowDataPacket[]>(
			QUERIES.tables,
			[schema, tableType(kind)],
		);
		return tableNames(toRecords(rows));
	}

	async release(): Promise<void> {
		this.#connection.release();
	}
}

/**
 * Options for the mysql adapter.
 */
export interface MySQLOptions {
	/** Maximum number of connections in the pool (default: 10) */
	connectionLimit?: number;
	/** Idle timeout in milliseconds (default: 60000) */
	idleTimeout?: number;
	/** Connection timeout in milliseconds (default: 10000) */
	connectTimeout?: number;
}

/**
 * MySQL driver using mysql2.
 *
 * The default schema is the database named in the URL.
 *
 * @example
 * import MySQLDriver from "tablekit/mysql";
 * import {Database} from "tablekit";
 *
 * const driver = new MySQLDriver("mysql://localhost/mydb");
 * const db = new Database(driver);
 * await db.open();
 *
 * // When done:
 * await db.close();
 */
export default class MySQLDriver implements Driver {
	readonly dialect = DIALECT;
	readonly defaultSchema: string;
	readonly supportsReturning = false;
	#pool: mysql.Pool;

	constructor(url: string, options: MySQLOptions = {}) {
		this.defaultSchema = databaseName(url);
		this.#pool = mysql.createPool({
			uri: url,
			connectionLimit: options.connectionLimit ?? 10,
			idleTimeout: options.idleTimeout ?? 60000,
			connectTimeout: options.connectTimeout ?? 10000,
		});
	}

	async acquire(): Promise<Connection> {
		return new MySQLConnection(await this.#pool.getConnection());
	}

	async ping(): Promise<boolean> {
		try {
			await this.#pool.query("SELECT 1");
			return true;
		} catch {
			return false;
		}
	}

	async close(): Promise<void> {
		await this.#pool.end();
	}
}
