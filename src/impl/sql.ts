/**
 * SQL rendering utilities for all dialects.
 *
 * This is the single source of truth for dialect-specific SQL rendering:
 * - Identifier quoting
 * - Placeholder syntax
 * - Template rendering (for DDL and queries)
 */

import {isSQLIdentifier, type SQLTemplate} from "./template.js";

// ============================================================================
// Types
// ============================================================================

export type SQLDialect = "sqlite" | "postgresql" | "mysql";

/** Driver hook applied to every bound parameter before execution. */
export type ValueEncoder = (value: unknown) => unknown;

// ============================================================================
// Core Helpers
// ============================================================================

/**
 * Quote an identifier based on dialect.
 * MySQL uses backticks, PostgreSQL/SQLite use double quotes.
 */
export function quoteIdent(name: string, dialect: SQLDialect): string {
	if (dialect === "mysql") {
		return `\`${name.replace(/`/g, "``")}\``;
	}
	return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Get placeholder syntax based on dialect.
 * PostgreSQL uses $1, $2, etc. MySQL/SQLite use ?.
 */
export function placeholder(index: number, dialect: SQLDialect): string {
	if (dialect === "postgresql") {
		return `$${index}`;
	}
	return "?";
}

/**
 * Render a literal for DDL DEFAULT clauses, where parameters are not allowed.
 */
export function inlineLiteral(value: unknown, dialect: SQLDialect): string {
	if (value === null || value === undefined) {
		return "NULL";
	}
	if (typeof value === "boolean") {
		if (dialect === "sqlite") return value ? "1" : "0";
		return value ? "TRUE" : "FALSE";
	}
	if (typeof value === "number") {
		if (!Number.isFinite(value)) {
			throw new Error(`Cannot inline non-finite number ${value}`);
		}
		return String(value);
	}
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "string") {
		return `'${value.replace(/'/g, "''")}'`;
	}
	if (value instanceof Date) {
		return `'${value.toISOString()}'`;
	}
	return `'${JSON.stringify(value).replace(/'/g, "''")}'`;
}

// ============================================================================
// Query Building
// ============================================================================

/**
 * Build SQL from template parts with parameter placeholders.
 *
 * This is the shared implementation used by all drivers (MySQL, PostgreSQL, SQLite).
 * Identifiers are inlined directly; other values use placeholders.
 */
export function buildSQL(
	strings: TemplateStringsArray,
	values: readonly unknown[],
	dialect: SQLDialect,
	encode?: ValueEncoder,
): {sql: string; params: unknown[]} {
	let sql = strings[0];
	const params: unknown[] = [];

	for (let i = 0; i < values.length; i++) {
		const value = values[i];
		if (isSQLIdentifier(value)) {
			// Quote identifier based on dialect
			sql += quoteIdent(value.name, dialect) + strings[i + 1];
		} else {
			// Add placeholder and keep value
			sql += placeholder(params.length + 1, dialect) + strings[i + 1];
			params.push(encode ? encode(value) : value);
		}
	}

	return {sql, params};
}

/**
 * Render a DDL template to SQL string.
 * DDL templates only contain identifiers (no parameter placeholders).
 */
export function renderDDL(template: SQLTemplate, dialect: SQLDialect): string {
	const {strings, values} = template;
	let sql = strings[0];
	for (let i = 0; i < values.length; i++) {
		const value = values[i];
		if (isSQLIdentifier(value)) {
			sql += quoteIdent(value.name, dialect);
		} else {
			throw new Error(`Unexpected value in DDL template: ${String(value)}`);
		}
		sql += strings[i + 1];
	}
	return sql;
}

/**
 * Render a template for diagnostics: statement text plus bound parameters.
 */
export function renderSQL(
	template: SQLTemplate,
	dialect: SQLDialect,
): {sql: string; params: unknown[]} {
	return buildSQL(template.strings, template.values, dialect);
}
