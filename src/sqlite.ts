/**
 * better-sqlite3 adapter for tablekit
 *
 * Provides a Driver implementation for better-sqlite3 (Node.js).
 * The connection is persistent - call close() when done.
 *
 * Requires: better-sqlite3
 */

import Database from "better-sqlite3";
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
import {buildSQL, quoteIdent} from "./impl/sql.js";

const DIALECT = "sqlite" as const;

const CONSTRAINT_KINDS: Record<string, ConstraintKind> = {
	SQLITE_CONSTRAINT_UNIQUE: "unique",
	SQLITE_CONSTRAINT_PRIMARYKEY: "unique",
	SQLITE_CONSTRAINT_FOREIGNKEY: "foreign_key",
	SQLITE_CONSTRAINT_NOTNULL: "not_null",
	SQLITE_CONSTRAINT_CHECK: "check",
};

/**
 * better-sqlite3 binds numbers, strings, bigints, buffers and null only.
 */
export function encodeValue(value: unknown): unknown {
	if (value === undefined) return null;
	if (typeof value === "boolean") return value ? 1 : 0;
	if (value instanceof Date) return value.toISOString();
	if (value !== null && typeof value === "object" && !(value instanceof Uint8Array)) {
		return JSON.stringify(value);
	}
	return value;
}

/**
 * Resolve a filename from ":memory:", "sqlite:path", "sqlite:///abs/path"
 * or "file:path".
 */
export function sqlitePath(url: string): string {
	if (url.startsWith("sqlite://")) return url.slice("sqlite://".length);
	if (url.startsWith("sqlite:")) return url.slice("sqlite:".length);
	if (url.startsWith("file:")) return url.slice("file:".length);
	return url;
}

/**
 * Convert SQLite errors to tablekit errors.
 */
function handleError(error: unknown): never {
	const code = errorField(error, "code");
	if (code?.startsWith("SQLITE_CONSTRAINT")) {
		const message = errorField(error, "message") ?? String(error);
		// Example: "UNIQUE constraint failed: users.email"
		const match = message.match(/constraint failed: (\w+)\.(\w+)/i);
		const table = match ? match[1] : undefined;
		const column = match ? match[2] : undefined;
		throw new ConstraintViolationError(
			message,
			{
				kind: CONSTRAINT_KINDS[code] ?? "unknown",
				constraint: match ? `${table}.${column}` : undefined,
				table,
				column,
			},
			{cause: error},
		);
	}
	throw error;
}

class SQLiteConnection implements Connection {
	#db: Database.Database;

	constructor(db: Database.Database) {
		this.#db = db;
	}

	async all(
		strings: TemplateStringsArray,
		values: unknown[],
	): Promise<DynamicRecord[]> {
		try {
			const {sql, params} = buildSQL(strings, values, DIALECT, encodeValue);
			const statement = this.#db.prepare(sql);
			if (!statement.reader) {
				statement.run(...params);
				return [];
			}
			return toRecords(statement.all(...params));
		} catch (error) {
			return handleError(error);
		}
	}

	async run(strings: TemplateStringsArray, values: unknown[]): Promise<number> {
		try {
			const {sql, params} = buildSQL(strings, values, DIALECT, encodeValue);
			return this.#db.prepare(sql).run(...params).changes;
		} catch (error) {
			return handleError(error);
		}
	}

	async runBatch(
		strings: TemplateStringsArray,
		valueSets: unknown[][],
	): Promise<number> {
		if (valueSets.length === 0) return 0;
		try {
			const {sql} = buildSQL(strings, valueSets[0], DIALECT);
			const statement = this.#db.prepare(sql);
			let changes = 0;
			for (const values of valueSets) {
				const {params} = buildSQL(strings, values, DIALECT, encodeValue);
				changes += statement.run(...params).changes;
			}
			return changes;
		} catch (error) {
			return handleError(error);
		}
	}

	async describeTable(
		name: string,
		schema: string,
	): Promise<TableDescription | null> {
		const columns = toRecords(
			this.#db
				.prepare(`SELECT name, type, "notnull", pk FROM pragma_table_info(?, ?)`)
				.all(name, schema),
		);
		if (columns.length === 0) return null;

		const primaryKey = columns
			.filter((row) => Number(row.pk) > 0)
			.sort((a, b) => Number(a.pk) - Number(b.pk))
			.map((row) => String(row.name));

		const indexes = toRecords(
			this.#db
				.prepare(`SELECT name, "unique", origin FROM pragma_index_list(?, ?)`)
				.all(name, schema),
		);
		const unique: string[][] = [];
		for (const index of indexes) {
			if (Number(index.unique) !== 1 || index.origin === "pk") continue;
			const indexColumns = toRecords(
				this.#db
					.prepare("SELECT name FROM pragma_index_info(?, ?) ORDER BY seqno")
					.all(String(index.name), schema),
			);
			unique.push(indexColumns.map((row) => String(row.name)));
		}

		return {
			columns: columns.map((row) => ({
				name: String(row.name),
				type: String(row.type),
				nullable: Number(row.notnull) === 0 && Number(row.pk) === 0,
			})),
			primaryKey,
			unique,
		};
	}

	async listTables(schema: string, kind: RelationKind): Promise<string[]> {
		const rows = toRecords(
			this.#db
				.prepare(
					`SELECT name FROM ${quoteIdent(schema, DIALECT)}.sqlite_master ` +
						`WHERE type = ? AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\' ORDER BY name`,
				)
				.all(kind),
		);
		return rows.map((row) => String(row.name));
	}

	async release(): Promise<void> {
		// The database handle is shared; nothing to return
	}
}

/**
 * SQLite driver using better-sqlite3.
 *
 * @example
 * import SQLiteDriver from "tablekit/sqlite";
 * import {Database} from "tablekit";
 *
 * const driver = new SQLiteDriver("file:app.db");
 * const db = new Database(driver);
 * await db.open();
 *
 * // When done:
 * await db.close();
 */
export default class SQLiteDriver implements Driver {
	readonly dialect = DIALECT;
	readonly defaultSchema = "main";
	readonly supportsReturning = true;
	#db: Database.Database;

	constructor(url: string) {
		this.#db = new Database(sqlitePath(url));

		// Enable WAL mode for better concurrency
		this.#db.pragma("journal_mode = WAL");

		// Enable foreign key constraints
		this.#db.pragma("foreign_keys = ON");
	}

	async acquire(): Promise<Connection> {
		return new SQLiteConnection(this.#db);
	}

	async ping(): Promise<boolean> {
		try {
			this.#db.prepare("SELECT 1").get();
			return true;
		} catch {
			return false;
		}
	}

	async close(): Promise<void> {
		this.#db.close();
	}
}
