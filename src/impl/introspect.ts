/**
 * Schema introspection.
 *
 * Every call goes to the live catalog. Nothing is cached, so a column added
 * by another process is visible on the next call.
 */

import type {Logger} from "pino";
import type {ColumnInfo, Connection} from "./driver.js";
import {ColumnNotFoundError, TableNotFoundError} from "./errors.js";
import {ident, type TemplateBuilder} from "./template.js";

/**
 * A resolved reference to one table in one schema.
 *
 * Built fresh by every introspecting call and discarded afterwards.
 */
export interface TableHandle {
	readonly schema: string;
	readonly name: string;
	/** Never empty for an existing table */
	readonly columns: readonly ColumnInfo[];
	/** Empty when the table has no primary key */
	readonly primaryKey: readonly string[];
	readonly unique: readonly (readonly string[])[];
}

export class SchemaIntrospector {
	#connection: Connection;
	#defaultSchema: string;
	#logger: Logger;

	constructor(connection: Connection, defaultSchema: string, logger: Logger) {
		this.#connection = connection;
		this.#defaultSchema = defaultSchema;
		this.#logger = logger;
	}

	/**
	 * Resolve a table's current structure.
	 *
	 * @throws TableNotFoundError if the table does not exist in the schema
	 */
	async resolve(table: string, schema?: string): Promise<TableHandle> {
		const namespace = schema ?? this.#defaultSchema;
		const description = await this.#connection.describeTable(table, namespace);
		if (!description || description.columns.length === 0) {
			throw new TableNotFoundError(table, namespace);
		}
		return {
			schema: namespace,
			name: table,
			columns: description.columns,
			primaryKey: description.primaryKey,
			unique: description.unique,
		};
	}

	/**
	 * Check whether a table exists. Never throws: a failing catalog query
	 * is logged and reported as false.
	 */
	async exists(table: string, schema?: string): Promise<boolean> {
		const namespace = schema ?? this.#defaultSchema;
		try {
			const description = await this.#connection.describeTable(
				table,
				namespace,
			);
			return description !== null && description.columns.length > 0;
		} catch (error) {
			this.#logger.warn(
				{err: error, table, schema: namespace},
				"table existence check failed",
			);
			return false;
		}
	}

	/**
	 * Column names in ordinal order.
	 */
	async columns(table: string, schema?: string): Promise<string[]> {
		const handle = await this.resolve(table, schema);
		return columnNames(handle);
	}
}

// ============================================================================
// Handle Helpers
// ============================================================================

export function columnNames(handle: TableHandle): string[] {
	return handle.columns.map((c) => c.name);
}

export function hasColumn(handle: TableHandle, column: string): boolean {
	return handle.columns.some((c) => c.name === column);
}

/**
 * @throws ColumnNotFoundError
 */
export function assertColumn(handle: TableHandle, column: string): void {
	if (!hasColumn(handle, column)) {
		throw new ColumnNotFoundError(handle.name, column, columnNames(handle));
	}
}

/**
 * Append the schema-qualified table name: "schema"."table"
 */
export function appendTableRef(
	builder: TemplateBuilder,
	handle: Pick<TableHandle, "schema" | "name">,
): TemplateBuilder {
	return builder
		.value(ident(handle.schema))
		.append(".")
		.value(ident(handle.name));
}
