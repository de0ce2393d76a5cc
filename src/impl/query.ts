/**
 * Statement builders.
 *
 * Each builder takes a resolved TableHandle and returns SQL templates with
 * identifier markers, so the same builder serves every dialect. Column names
 * are checked against the handle before anything is built.
 */

import type {DynamicRecord} from "./driver.js";
import {
	InvalidRecordError,
	MissingMatchFieldError,
	NoPrimaryKeyError,
} from "./errors.js";
import {
	appendTableRef,
	assertColumn,
	columnNames,
	type TableHandle,
} from "./introspect.js";
import {assertBindable, renderWhere, type Condition} from "./predicate.js";
import type {SQLDialect} from "./sql.js";
import {ident, TemplateBuilder, type SQLTemplate} from "./template.js";

// ============================================================================
// Types
// ============================================================================

export type SortDirection = "asc" | "desc";

export type SortBy = string | {column: string; direction?: SortDirection};

export interface SelectParts {
	columns?: readonly string[];
	conditions?: readonly Condition[];
	limit?: number;
	offset?: number;
	sortBy?: SortBy;
}

/**
 * An UPDATE statement prepared once and bound once per record.
 */
export interface BatchStatement {
	strings: TemplateStringsArray;
	valueSets: unknown[][];
	setColumns: string[];
}

// MySQL has no "OFFSET without LIMIT"; this is its documented maximum.
const MYSQL_MAX_LIMIT = "18446744073709551615";

// ============================================================================
// SELECT / COUNT / DELETE
// ============================================================================

/**
 * SELECT <columns> FROM <table> [WHERE ...] [ORDER BY ...] [LIMIT n] [OFFSET m]
 *
 * Limit and offset are validated integers and are inlined.
 */
export function buildSelect(
	handle: TableHandle,
	parts: SelectParts,
	dialect: SQLDialect,
): SQLTemplate {
	const columns =
		parts.columns && parts.columns.length > 0
			? parts.columns
			: columnNames(handle);
	for (const column of columns) assertColumn(handle, column);

	const builder = new TemplateBuilder("SELECT ");
	builder.list(columns.map((c) => ident(c)));
	builder.append(" FROM ");
	appendTableRef(builder, handle);
	builder.merge(renderWhere(parts.conditions ?? []));

	if (parts.sortBy !== undefined) {
		const {column, direction} =
			typeof parts.sortBy === "string"
				? {column: parts.sortBy, direction: "asc" as const}
				: {column: parts.sortBy.column, direction: parts.sortBy.direction ?? "asc"};
		assertColumn(handle, column);
		builder.append(" ORDER BY ").value(ident(column));
		builder.append(direction === "desc" ? " DESC" : " ASC");
	}

	const limit = parts.limit;
	const offset = parts.offset;
	if (limit !== undefined) {
		builder.append(` LIMIT ${assertCount(limit, "limit")}`);
	} else if (offset !== undefined && offset > 0 && dialect !== "postgresql") {
		// SQLite and MySQL only accept OFFSET after LIMIT
		builder.append(
			dialect === "mysql" ? ` LIMIT ${MYSQL_MAX_LIMIT}` : " LIMIT -1",
		);
	}
	if (offset !== undefined && offset > 0) {
		builder.append(` OFFSET ${assertCount(offset, "offset")}`);
	}

	return builder.build();
}

function assertCount(value: number, name: string): number {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
	}
	return value;
}

/**
 * SELECT COUNT(*) AS "count" FROM <table> [WHERE ...]
 */
export function buildCount(
	handle: TableHandle,
	conditions: readonly Condition[] = [],
): SQLTemplate {
	const builder = new TemplateBuilder("SELECT COUNT(*) AS ");
	builder.value(ident("count")).append(" FROM ");
	appendTableRef(builder, handle);
	return builder.merge(renderWhere(conditions)).build();
}

/**
 * DELETE FROM <table> [WHERE ...]
 *
 * With no conditions this deletes every row.
 */
export function buildDelete(
	handle: TableHandle,
	conditions: readonly Condition[] = [],
): SQLTemplate {
	const builder = new TemplateBuilder("DELETE FROM ");
	appendTableRef(builder, handle);
	return builder.merge(renderWhere(conditions)).build();
}

// ============================================================================
// UPDATE
// ============================================================================

/**
 * UPDATE <table> SET <col> = ?, ... WHERE <match> = ? AND ...
 *
 * Set columns come from the first record's non-match keys. Every record
 * must carry every match field and exactly the set columns.
 *
 * @throws MissingMatchFieldError
 * @throws InvalidRecordError
 * @throws ColumnNotFoundError
 */
export function buildUpdate(
	handle: TableHandle,
	records: readonly DynamicRecord[],
	matchFields: readonly string[],
): BatchStatement {
	if (matchFields.length === 0) {
		throw new RangeError(`update on "${handle.name}" needs at least one match field`);
	}
	for (const field of matchFields) assertColumn(handle, field);

	const first = records[0];
	if (first === undefined) {
		throw new RangeError(`update on "${handle.name}" needs at least one record`);
	}
	const setColumns = Object.keys(first).filter((k) => !matchFields.includes(k));
	for (const column of setColumns) assertColumn(handle, column);

	let strings: TemplateStringsArray | undefined;
	const valueSets: unknown[][] = [];
	for (let index = 0; index < records.length; index++) {
		const record = records[index];
		for (const field of matchFields) {
			if (!(field in record)) {
				throw new MissingMatchFieldError(handle.name, field, index);
			}
		}
		const extra = Object.keys(record).find(
			(key) => !matchFields.includes(key) && !setColumns.includes(key),
		);
		if (extra !== undefined) {
			throw new InvalidRecordError(
				`Record ${index} for "${handle.name}" sets column "${extra}" that the first record does not`,
				handle.name,
				index,
			);
		}
		if (setColumns.length === 0) {
			throw new InvalidRecordError(
				`Record ${index} for "${handle.name}" has no columns to set besides ${matchFields.join(", ")}`,
				handle.name,
				index,
			);
		}

		const builder = new TemplateBuilder("UPDATE ");
		appendTableRef(builder, handle);
		builder.append(" SET ");
		setColumns.forEach((column, i) => {
			if (!(column in record)) {
				throw new InvalidRecordError(
					`Record ${index} for "${handle.name}" is missing column "${column}" set by the first record`,
					handle.name,
					index,
				);
			}
			assertBindable(record[column], column);
			if (i > 0) builder.append(", ");
			builder.value(ident(column)).append(" = ").value(record[column]);
		});
		matchFields.forEach((field, i) => {
			assertBindable(record[field], field);
			builder.append(i === 0 ? " WHERE " : " AND ");
			builder.value(ident(field)).append(" = ").value(record[field]);
		});

		const template = builder.build();
		strings ??= template.strings;
		valueSets.push([...template.values]);
	}

	if (strings === undefined) {
		throw new RangeError(`update on "${handle.name}" needs at least one record`);
	}
	return {strings, valueSets, setColumns};
}

// ============================================================================
// UPSERT
// ============================================================================

export interface UpsertParts {
	overwriteWithNull: boolean;
	dialect: SQLDialect;
}

function keySet(record: DynamicRecord): string {
	return JSON.stringify(Object.keys(record).sort());
}

/**
 * Split records into consecutive runs that name the same columns.
 *
 * Each run becomes one INSERT, so a column a record leaves out keeps its
 * DEFAULT on insert and its stored value on conflict.
 */
export function keySetRuns(records: readonly DynamicRecord[]): DynamicRecord[][] {
	const runs: DynamicRecord[][] = [];
	let current: DynamicRecord[] = [];
	let currentKeys: string | undefined;
	for (const record of records) {
		const keys = keySet(record);
		if (keys !== currentKeys && current.length > 0) {
			runs.push(current);
			current = [];
		}
		currentKeys = keys;
		current.push(record);
	}
	if (current.length > 0) runs.push(current);
	return runs;
}

/**
 * One multi-row INSERT that resolves primary-key conflicts per column.
 *
 * PostgreSQL / SQLite (SQLite leaves the existing column unqualified):
 *   INSERT INTO t (a, b) VALUES (?, ?), (?, ?)
 *   ON CONFLICT (pk) DO UPDATE SET a = COALESCE(excluded.a, t.a), ...
 *   RETURNING pk
 *
 * MySQL:
 *   INSERT INTO t (a, b) VALUES (?, ?), (?, ?)
 *   ON DUPLICATE KEY UPDATE a = COALESCE(VALUES(a), a), ...
 *
 * With overwriteWithNull the incoming value always wins, null included.
 * Every record must name the same columns; split mixed input with
 * keySetRuns first.
 *
 * @throws NoPrimaryKeyError
 * @throws InvalidRecordError
 * @throws ColumnNotFoundError
 */
export function buildUpsert(
	handle: TableHandle,
	records: readonly DynamicRecord[],
	parts: UpsertParts,
): SQLTemplate {
	if (handle.primaryKey.length === 0) {
		throw new NoPrimaryKeyError(handle.name);
	}
	if (records.length === 0) {
		throw new RangeError(`upsert on "${handle.name}" needs at least one record`);
	}
	const columns = Object.keys(records[0]);
	const expected = keySet(records[0]);
	records.forEach((record, index) => {
		if (Object.keys(record).length === 0) {
			throw new InvalidRecordError(
				`Record ${index} for "${handle.name}" has no columns`,
				handle.name,
				index,
			);
		}
		if (keySet(record) !== expected) {
			throw new InvalidRecordError(
				`Record ${index} for "${handle.name}" names different columns than record 0`,
				handle.name,
				index,
			);
		}
	});

	for (const column of columns) assertColumn(handle, column);

	const builder = new TemplateBuilder("INSERT INTO ");
	appendTableRef(builder, handle);
	builder.append(" (").list(columns.map((c) => ident(c))).append(") VALUES ");
	records.forEach((record, i) => {
		if (i > 0) builder.append(", ");
		builder.append("(");
		columns.forEach((column, j) => {
			const value = record[column] ?? null;
			assertBindable(value, column);
			if (j > 0) builder.append(", ");
			builder.value(value);
		});
		builder.append(")");
	});

	// Key columns are never reassigned; a key-only chunk still needs one
	// assignment so that conflicting rows come back from RETURNING
	const assigned = columns.filter((c) => !handle.primaryKey.includes(c));
	const keyOnly = assigned.length === 0;
	const updates = keyOnly ? [...handle.primaryKey] : assigned;
	const replace = parts.overwriteWithNull || keyOnly;

	if (parts.dialect === "mysql") {
		builder.append(" ON DUPLICATE KEY UPDATE ");
		updates.forEach((column, i) => {
			if (i > 0) builder.append(", ");
			builder.value(ident(column)).append(" = ");
			if (replace) {
				builder.append("VALUES(").value(ident(column)).append(")");
			} else {
				builder
					.append("COALESCE(VALUES(")
					.value(ident(column))
					.append("), ")
					.value(ident(column))
					.append(")");
			}
		});
		return builder.build();
	}

	builder
		.append(" ON CONFLICT (")
		.list(handle.primaryKey.map((c) => ident(c)))
		.append(") DO UPDATE SET ");
	updates.forEach((column, i) => {
		if (i > 0) builder.append(", ");
		builder.value(ident(column)).append(" = ");
		if (replace) {
			builder.append("excluded.").value(ident(column));
		} else {
			builder.append("COALESCE(excluded.").value(ident(column)).append(", ");
			// PostgreSQL rejects the bare column as ambiguous with excluded
			if (parts.dialect === "postgresql") {
				builder.value(ident(handle.name)).append(".");
			}
			builder.value(ident(column)).append(")");
		}
	});
	builder
		.append(" RETURNING ")
		.list(handle.primaryKey.map((c) => ident(c)));
	return builder.build();
}

/**
 * Primary-key values of submitted records, for drivers without RETURNING.
 */
export function primaryKeyOf(
	handle: TableHandle,
	record: DynamicRecord,
): DynamicRecord {
	const key: DynamicRecord = {};
	for (const column of handle.primaryKey) {
		key[column] = record[column] ?? null;
	}
	return key;
}
