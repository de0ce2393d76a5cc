/**
 * Database facade - the public table operations.
 *
 * Every operation acquires one connection, introspects the table it
 * touches, builds its statements, executes them and releases the
 * connection on every exit path. Nothing about a table's shape is kept
 * between calls.
 */

import {z} from "zod";
import {eachChunk} from "./batch.js";
import {
	ColumnSpecSchema,
	generateAddColumn,
	generateCreateTable,
	validateColumnSpecs,
	type ColumnSpec,
	type ColumnType,
} from "./ddl.js";
import type {Connection, Driver, DynamicRecord} from "./driver.js";
import {
	ColumnAlreadyExistsError,
	ConnectionError,
	isDatabaseError,
	NoPrimaryKeyError,
	QueryError,
	TableNotFoundError,
} from "./errors.js";
import {
	hasColumn,
	SchemaIntrospector,
	type TableHandle,
} from "./introspect.js";
import {createLogger, type Logger} from "./logger.js";
import {assertBindable, compileWhere, type Where} from "./predicate.js";
import {
	buildCount,
	buildDelete,
	buildSelect,
	buildUpdate,
	buildUpsert,
	keySetRuns,
	primaryKeyOf,
	type SortBy,
} from "./query.js";
import {renderSQL} from "./sql.js";
import {createTemplate, type SQLTemplate} from "./template.js";
import {validate} from "./validate.js";

// ============================================================================
// Options
// ============================================================================

export interface DatabaseOptions {
	/** Schema for operations that don't name one (default: the driver's) */
	schema?: string;
	logger?: Logger;
	/** Default upsert chunk size (default: 1000) */
	chunkSize?: number;
}

interface OperationOptions {
	/** Overrides the database's schema for this call */
	schema?: string;
	/** Log each statement at info level */
	verbose?: boolean;
}

export interface GetOptions extends OperationOptions {
	/** Defaults to every column */
	columns?: readonly string[];
	where?: Where;
	limit?: number;
	offset?: number;
	sortBy?: SortBy;
}

export interface CountOptions extends OperationOptions {
	where?: Where;
}

export interface DeleteOptions extends OperationOptions {
	/** Without a filter every row is deleted */
	where?: Where;
}

export interface UpdateOptions extends OperationOptions {}

export interface UpsertOptions extends OperationOptions {
	chunkSize?: number;
	/** Let incoming nulls replace stored values (default: false) */
	overwriteWithNull?: boolean;
}

export interface CreateTableOptions extends OperationOptions {
	primaryKey?: string | readonly string[];
	unique?: readonly (string | readonly string[])[];
	/** Add missing columns to an existing table instead of creating (default: true) */
	checkExisting?: boolean;
}

export interface CreateTableResult {
	created: boolean;
	/** Columns added to a table that already existed */
	added: string[];
}

export interface AddColumnOptions extends OperationOptions {
	default?: ColumnSpec["default"];
}

const PagingSchema = z.object({
	limit: z.number().int().nonnegative().optional(),
	offset: z.number().int().nonnegative().optional(),
});

const UpsertOptionsSchema = z.object({
	chunkSize: z.number().int().positive().optional(),
	overwriteWithNull: z.boolean().optional(),
});

const DatabaseOptionsSchema = z.object({
	schema: z.string().min(1).optional(),
	chunkSize: z.number().int().positive().optional(),
});

function isRecordList(
	value: DynamicRecord | readonly DynamicRecord[],
): value is readonly DynamicRecord[] {
	return Array.isArray(value);
}

function toFieldList(value: string | readonly string[]): string[] {
	return typeof value === "string" ? [value] : [...value];
}

// ============================================================================
// Database
// ============================================================================

/**
 * Schema-agnostic access to the tables of one database.
 *
 * @example
 * const db = new Database(new SQLiteDriver(":memory:"));
 * await db.open();
 * await db.createTable("orders", [
 *   {name: "id", type: "integer"},
 *   {name: "total", type: "real"},
 * ], {primaryKey: "id"});
 * await db.upsert("orders", [{id: 1, total: 10}]);
 * const rows = await db.get("orders", {where: {total: {operator: ">", value: 5}}});
 */
export class Database {
	#driver: Driver;
	#schema: string;
	#logger: Logger;
	#chunkSize: number;
	#opened: boolean = false;

	constructor(driver: Driver, options: DatabaseOptions = {}) {
		const parsed = validate(
			DatabaseOptionsSchema,
			{schema: options.schema, chunkSize: options.chunkSize},
			"database options",
		);
		this.#driver = driver;
		this.#schema = parsed.schema ?? driver.defaultSchema;
		this.#chunkSize = parsed.chunkSize ?? 1000;
		this.#logger = options.logger ?? createLogger();
	}

	get driver(): Driver {
		return this.#driver;
	}

	/** Schema used when an operation does not name one */
	get schema(): string {
		return this.#schema;
	}

	get opened(): boolean {
		return this.#opened;
	}

	/**
	 * Verify the database is reachable.
	 *
	 * @throws ConnectionError if the liveness probe fails
	 */
	async open(): Promise<void> {
		if (this.#opened) return;
		const alive = await this.#driver.ping();
		if (!alive) {
			throw new ConnectionError(
				`Unable to reach the ${this.#driver.dialect} database`,
			);
		}
		this.#opened = true;
		this.#logger.debug({dialect: this.#driver.dialect}, "database opened");
	}

	/**
	 * Close the driver and all pooled connections.
	 */
	async close(): Promise<void> {
		this.#opened = false;
		await this.#driver.close();
	}

	// ==========================================================================
	// Connection Scope
	// ==========================================================================

	async #withConnection<T>(
		fn: (connection: Connection, introspector: SchemaIntrospector) => Promise<T>,
	): Promise<T> {
		if (!this.#opened) {
			throw new ConnectionError("Database is not open; call open() first");
		}
		let connection: Connection;
		try {
			connection = await this.#driver.acquire();
		} catch (error) {
			throw new ConnectionError("Failed to acquire a connection", {
				cause: error,
			});
		}
		try {
			return await fn(
				connection,
				new SchemaIntrospector(connection, this.#schema, this.#logger),
			);
		} finally {
			await connection.release();
		}
	}

	#trace(template: SQLTemplate, verbose: boolean | undefined): string {
		const {sql, params} = renderSQL(template, this.#driver.dialect);
		const level = verbose ? "info" : "debug";
		if (this.#logger.isLevelEnabled(level)) {
			this.#logger[level]({sql, params: params.length}, "executing statement");
		}
		return sql;
	}

	async #execute<T>(
		template: SQLTemplate,
		verbose: boolean | undefined,
		fn: () => Promise<T>,
	): Promise<T> {
		const sql = this.#trace(template, verbose);
		try {
			return await fn();
		} catch (error) {
			if (isDatabaseError(error)) throw error;
			const message = error instanceof Error ? error.message : String(error);
			throw new QueryError(`Query failed: ${message}`, sql, {cause: error});
		}
	}

	#all(
		connection: Connection,
		template: SQLTemplate,
		verbose: boolean | undefined,
	): Promise<DynamicRecord[]> {
		return this.#execute(template, verbose, () =>
			connection.all(template.strings, [...template.values]),
		);
	}

	#run(
		connection: Connection,
		template: SQLTemplate,
		verbose: boolean | undefined,
	): Promise<number> {
		return this.#execute(template, verbose, () =>
			connection.run(template.strings, [...template.values]),
		);
	}

	// ==========================================================================
	// Reads
	// ==========================================================================

	/**
	 * Select rows. Returns an empty array when nothing matches.
	 *
	 * `limit: 0` resolves the table and returns `[]` without selecting.
	 *
	 * @example
	 * await db.get("orders", {
	 *   columns: ["id", "status"],
	 *   where: {status: {operator: "in", value: ["paid", "shipped"]}},
	 *   sortBy: {column: "id", direction: "desc"},
	 *   limit: 10,
	 * });
	 */
	async get(table: string, options: GetOptions = {}): Promise<DynamicRecord[]> {
		const {limit, offset} = validate(
			PagingSchema,
			{limit: options.limit, offset: options.offset},
			"get options",
		);

		return this.#withConnection(async (connection, introspector) => {
			const handle = await introspector.resolve(table, options.schema);
			if (limit === 0) return [];
			const template = buildSelect(
				handle,
				{
					columns: options.columns,
					conditions: compileWhere(options.where, handle),
					limit,
					offset,
					sortBy: options.sortBy,
				},
				this.#driver.dialect,
			);
			return this.#all(connection, template, options.verbose);
		});
	}

	/**
	 * Count rows, optionally filtered.
	 */
	async count(table: string, options: CountOptions = {}): Promise<number> {
		return this.#withConnection(async (connection, introspector) => {
			const handle = await introspector.resolve(table, options.schema);
			const template = buildCount(handle, compileWhere(options.where, handle));
			const rows = await this.#all(connection, template, options.verbose);
			// PostgreSQL returns bigint counts as strings
			return Number(rows[0]?.count ?? 0);
		});
	}

	async tableExists(table: string, schema?: string): Promise<boolean> {
		return this.#withConnection((_connection, introspector) =>
			introspector.exists(table, schema),
		);
	}

	/**
	 * Column names in ordinal order.
	 *
	 * @throws TableNotFoundError
	 */
	async columns(table: string, schema?: string): Promise<string[]> {
		return this.#withConnection((_connection, introspector) =>
			introspector.columns(table, schema),
		);
	}

	/**
	 * Resolve a table's current structure.
	 *
	 * @throws TableNotFoundError
	 */
	async describe(table: string, schema?: string): Promise<TableHandle> {
		return this.#withConnection((_connection, introspector) =>
			introspector.resolve(table, schema),
		);
	}

	async tables(schema?: string): Promise<string[]> {
		return this.#withConnection((connection) =>
			connection.listTables(schema ?? this.#schema, "table"),
		);
	}

	async views(schema?: string): Promise<string[]> {
		return this.#withConnection((connection) =>
			connection.listTables(schema ?? this.#schema, "view"),
		);
	}

	// ==========================================================================
	// Writes
	// ==========================================================================

	/**
	 * Update rows matched by `matchFields`, one statement per record.
	 *
	 * Set columns are the first record's keys other than the match fields.
	 * Returns the total number of affected rows.
	 *
	 * @throws MissingMatchFieldError before any statement runs
	 * @throws InvalidRecordError
	 *
	 * @example
	 * await db.update("orders", [{id: 1, status: "shipped"}], "id"); // 1
	 */
	async update(
		table: string,
		records: DynamicRecord | readonly DynamicRecord[],
		matchFields: string | readonly string[],
		options: UpdateOptions = {},
	): Promise<number> {
		const list = isRecordList(records) ? records : [records];
		if (list.length === 0) return 0;
		const fields = toFieldList(matchFields);

		return this.#withConnection(async (connection, introspector) => {
			const handle = await introspector.resolve(table, options.schema);
			const {strings, valueSets} = buildUpdate(handle, list, fields);
			const template = createTemplate(strings, valueSets[0]);
			return this.#execute(template, options.verbose, () =>
				connection.runBatch(strings, valueSets),
			);
		});
	}

	/**
	 * Delete rows. Without `where`, deletes every row.
	 * Returns the number of rows deleted.
	 */
	async delete(table: string, options: DeleteOptions = {}): Promise<number> {
		return this.#withConnection(async (connection, introspector) => {
			const handle = await introspector.resolve(table, options.schema);
			const template = buildDelete(handle, compileWhere(options.where, handle));
			return this.#run(connection, template, options.verbose);
		});
	}

	/**
	 * Insert records, updating rows whose primary key already exists.
	 *
	 * Records are written in chunks of `chunkSize`, strictly in order.
	 * Each chunk is one statement per run of consecutive records naming
	 * the same columns, so a column a record leaves out is never written. A failing chunk leaves earlier chunks
	 * applied; upserts are idempotent, so the whole call can be retried.
	 *
	 * Returns the primary-key values of each record in input order, or a
	 * single key record when given a single record.
	 *
	 * @throws NoPrimaryKeyError
	 *
	 * @example
	 * await db.upsert("orders", {id: 1, total: 20});
	 * // {id: 1}
	 */
	async upsert(
		table: string,
		record: DynamicRecord,
		options?: UpsertOptions,
	): Promise<DynamicRecord>;
	async upsert(
		table: string,
		records: readonly DynamicRecord[],
		options?: UpsertOptions,
	): Promise<DynamicRecord[]>;
	async upsert(
		table: string,
		input: DynamicRecord | readonly DynamicRecord[],
		options: UpsertOptions = {},
	): Promise<DynamicRecord | DynamicRecord[]> {
		const parsed = validate(
			UpsertOptionsSchema,
			{chunkSize: options.chunkSize, overwriteWithNull: options.overwriteWithNull},
			"upsert options",
		);
		const chunkSize = parsed.chunkSize ?? this.#chunkSize;
		const overwriteWithNull = parsed.overwriteWithNull ?? false;
		const dialect = this.#driver.dialect;

		const many = isRecordList(input);
		const records = many ? input : [input];
		if (records.length === 0) return [];

		const keys = await this.#withConnection(async (connection, introspector) => {
			const handle = await introspector.resolve(table, options.schema);
			if (handle.primaryKey.length === 0) {
				throw new NoPrimaryKeyError(table);
			}
			return eachChunk(records, chunkSize, async (batch, index, total) => {
				if (options.verbose) {
					this.#logger.info(
						{table, records: batch.length},
						`upserting chunk ${index + 1} of ${total}`,
					);
				}
				const keys: DynamicRecord[] = [];
				for (const run of keySetRuns(batch)) {
					const template = buildUpsert(handle, run, {overwriteWithNull, dialect});
					if (this.#driver.supportsReturning) {
						keys.push(...(await this.#all(connection, template, options.verbose)));
					} else {
						await this.#run(connection, template, options.verbose);
						keys.push(...run.map((record) => primaryKeyOf(handle, record)));
					}
				}
				return keys;
			});
		});
		return many ? keys : keys[0];
	}

	// ==========================================================================
	// Schema Evolution
	// ==========================================================================

	/**
	 * Create a table, or bring an existing one up to date.
	 *
	 * With `checkExisting` (the default) an existing table only gains the
	 * columns it is missing; nothing else about it changes.
	 *
	 * @throws ValidationError if the column specs are invalid
	 *
	 * @example
	 * await db.createTable("orders", [
	 *   {name: "id", type: "integer", autoIncrement: true},
	 *   {name: "status", type: {kind: "varchar", length: 32}, default: "new"},
	 *   {name: "created_at", type: "datetime", serverDefault: "now"},
	 * ], {primaryKey: "id"});
	 */
	async createTable(
		table: string,
		columns: readonly ColumnSpec[],
		options: CreateTableOptions = {},
	): Promise<CreateTableResult> {
		const specs = validateColumnSpecs(columns);
		const checkExisting = options.checkExisting ?? true;
		const dialect = this.#driver.dialect;

		return this.#withConnection(async (connection, introspector) => {
			const schema = options.schema ?? this.#schema;
			const handle = checkExisting
				? await this.#resolveIfExists(introspector, table, schema)
				: undefined;
			if (handle) {
				const missing = specs.filter((spec) => !hasColumn(handle, spec.name));
				for (const spec of missing) {
					const ddl = generateAddColumn(schema, table, spec, dialect);
					await this.#run(connection, ddl, options.verbose);
				}
				if (missing.length > 0) {
					this.#logger.info(
						{table, schema, columns: missing.map((s) => s.name)},
						"added missing columns",
					);
				}
				return {created: false, added: missing.map((s) => s.name)};
			}

			const ddl = generateCreateTable(
				schema,
				table,
				specs,
				{
					primaryKey: options.primaryKey,
					unique: options.unique,
					ifNotExists: checkExisting,
				},
				dialect,
			);
			await this.#run(connection, ddl, options.verbose);
			return {created: true, added: []};
		});
	}

	async #resolveIfExists(
		introspector: SchemaIntrospector,
		table: string,
		schema: string,
	): Promise<TableHandle | undefined> {
		try {
			return await introspector.resolve(table, schema);
		} catch (error) {
			if (error instanceof TableNotFoundError) return undefined;
			throw error;
		}
	}

	/**
	 * Add one column to an existing table.
	 *
	 * @throws TableNotFoundError
	 * @throws ColumnAlreadyExistsError
	 */
	async addColumn(
		table: string,
		column: string,
		type: ColumnType,
		options: AddColumnOptions = {},
	): Promise<void> {
		const spec = validate(
			ColumnSpecSchema,
			{name: column, type, default: options.default},
			"column",
		);

		await this.#withConnection(async (connection, introspector) => {
			const handle = await introspector.resolve(table, options.schema);
			if (hasColumn(handle, column)) {
				throw new ColumnAlreadyExistsError(table, column);
			}
			const ddl = generateAddColumn(
				handle.schema,
				table,
				spec,
				this.#driver.dialect,
			);
			await this.#run(connection, ddl, options.verbose);
		});
	}

	// ==========================================================================
	// Raw Queries
	// ==========================================================================

	/**
	 * Run a raw statement and return its rows. Interpolations are always
	 * bound as parameters.
	 *
	 * @example
	 * const [row] = await db.query`SELECT 1 AS is_alive`;
	 */
	async query(
		strings: TemplateStringsArray,
		...values: unknown[]
	): Promise<DynamicRecord[]> {
		const template = this.#rawTemplate(strings, values);
		return this.#withConnection((connection) =>
			this.#all(connection, template, false),
		);
	}

	/**
	 * Run a raw statement and return the number of affected rows.
	 *
	 * @example
	 * await db.exec`UPDATE orders SET status = ${"void"} WHERE total < ${0}`;
	 */
	async exec(strings: TemplateStringsArray, ...values: unknown[]): Promise<number> {
		const template = this.#rawTemplate(strings, values);
		return this.#withConnection((connection) =>
			this.#run(connection, template, false),
		);
	}

	#rawTemplate(strings: TemplateStringsArray, values: unknown[]): SQLTemplate {
		values.forEach((value, i) => assertBindable(value, `parameter ${i + 1}`));
		return createTemplate(strings, values);
	}
}
