/**
 * information_schema queries shared by the PostgreSQL and MySQL drivers.
 */

import type {DynamicRecord, RelationKind, TableDescription} from "./driver.js";
import {placeholder, type SQLDialect} from "./sql.js";

export interface CatalogQueries {
	/** Params: schema, table */
	columns: string;
	/** Params: schema, table */
	keys: string;
	/** Params: schema, table_type */
	tables: string;
}

export function catalogQueries(dialect: SQLDialect): CatalogQueries {
	const p1 = placeholder(1, dialect);
	const p2 = placeholder(2, dialect);
	return {
		columns:
			"SELECT column_name AS column_name, data_type AS data_type, is_nullable AS is_nullable " +
			"FROM information_schema.columns " +
			`WHERE table_schema = ${p1} AND table_name = ${p2} ` +
			"ORDER BY ordinal_position",
		keys:
			"SELECT tc.constraint_name AS constraint_name, tc.constraint_type AS constraint_type, " +
			"kcu.column_name AS column_name " +
			"FROM information_schema.table_constraints tc " +
			"JOIN information_schema.key_column_usage kcu " +
			"ON tc.constraint_name = kcu.constraint_name " +
			"AND tc.table_schema = kcu.table_schema " +
			"AND tc.table_name = kcu.table_name " +
			`WHERE tc.table_schema = ${p1} AND tc.table_name = ${p2} ` +
			"AND tc.constraint_type IN ('PRIMARY KEY', 'UNIQUE') " +
			"ORDER BY tc.constraint_name, kcu.ordinal_position",
		tables:
			"SELECT table_name AS table_name FROM information_schema.tables " +
			`WHERE table_schema = ${p1} AND table_type = ${p2} ` +
			"ORDER BY table_name",
	};
}

export function tableType(kind: RelationKind): string {
	return kind === "view" ? "VIEW" : "BASE TABLE";
}

/**
 * Assemble a TableDescription from catalog rows.
 * Returns null when there are no columns.
 */
export function describeFromCatalog(
	columnRows: readonly DynamicRecord[],
	keyRows: readonly DynamicRecord[],
): TableDescription | null {
	if (columnRows.length === 0) return null;

	const columns = columnRows.map((row) => ({
		name: String(row.column_name),
		type: String(row.data_type),
		nullable: String(row.is_nullable).toUpperCase() === "YES",
	}));

	const primaryKey: string[] = [];
	const unique = new Map<string, string[]>();
	for (const row of keyRows) {
		const column = String(row.column_name);
		if (row.constraint_type === "PRIMARY KEY") {
			primaryKey.push(column);
		} else {
			const name = String(row.constraint_name);
			const set = unique.get(name) ?? [];
			set.push(column);
			unique.set(name, set);
		}
	}

	return {columns, primaryKey, unique: [...unique.values()]};
}

export function tableNames(rows: readonly DynamicRecord[]): string[] {
	return rows.map((row) => String(row.table_name));
}
