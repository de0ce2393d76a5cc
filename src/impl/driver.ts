/**
 * Driver interface - the connection provider boundary.
 *
 * Drivers own connections, parameter binding and catalog queries. The core
 * hands them template parts (strings + values) and never sees native
 * placeholders or client objects.
 */

import type {SQLDialect} from "./sql.js";

/**
 * One row, keyed by column name in column order.
 * Used for every table regardless of its shape.
 */
export type DynamicRecord = Record<string, unknown>;

/**
 * Column as reported by the live catalog.
 */
export interface ColumnInfo {
	name: string;
	/** Catalog type name, e.g. "integer", "character varying", "TEXT" */
	type: string;
	nullable: boolean;
}

/**
 * Catalog answer for one table or view.
 */
export interface TableDescription {
	/** In ordinal order */
	columns: ColumnInfo[];
	/** In key order; empty when the table has no primary key */
	primaryKey: string[];
	/** Column sets of unique constraints (excluding the primary key) */
	unique: string[][];
}

export type RelationKind = "table" | "view";

/**
 * A connection-scoped resource.
 *
 * Obtained from Driver.acquire() and held for the duration of one public
 * operation. Must be released on every exit path.
 */
export interface Connection {
	/**
	 * Execute a query and return all rows.
	 */
	all(strings: TemplateStringsArray, values: unknown[]): Promise<DynamicRecord[]>;

	/**
	 * Execute a statement and return the number of affected rows.
	 */
	run(strings: TemplateStringsArray, values: unknown[]): Promise<number>;

	/**
	 * Execute one statement once per value set and return the summed
	 * affected row count. Drivers prepare the statement once where the
	 * client allows it.
	 */
	runBatch(strings: TemplateStringsArray, valueSets: unknown[][]): Promise<number>;

	/**
	 * Read a table's structure from the catalog.
	 * Returns null when no table or view of that name exists in the schema.
	 */
	describeTable(name: string, schema: string): Promise<TableDescription | null>;

	/**
	 * List table or view names in a schema.
	 */
	listTables(schema: string, kind: RelationKind): Promise<string[]>;

	/**
	 * Return the connection to the driver.
	 */
	release(): Promise<void>;
}

/**
 * Database driver interface.
 */
export interface Driver {
	readonly dialect: SQLDialect;

	/** Schema used when an operation does not name one ("public", "main", the MySQL database) */
	readonly defaultSchema: string;

	/**
	 * Whether this driver supports RETURNING clause for INSERT/UPDATE.
	 * - SQLite: true
	 * - PostgreSQL: true
	 * - MySQL: false
	 */
	readonly supportsReturning: boolean;

	/**
	 * Open a scoped connection.
	 */
	acquire(): Promise<Connection>;

	/**
	 * Liveness probe. Resolves false (never rejects) when the database is unreachable.
	 */
	ping(): Promise<boolean>;

	/**
	 * Close the driver and all pooled connections.
	 */
	close(): Promise<void>;
}

/**
 * Narrow rows returned by untyped clients.
 */
export function isRecord(value: unknown): value is DynamicRecord {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Keep only object rows from a client result.
 */
export function toRecords(rows: readonly unknown[]): DynamicRecord[] {
	return rows.filter(isRecord);
}
