/**
 * DDL generation from column specs.
 *
 * Generates CREATE TABLE and ALTER TABLE ... ADD COLUMN statements for
 * SQLite, PostgreSQL, and MySQL. Output templates carry only identifiers;
 * literals and server defaults are inlined because DDL takes no
 * parameters.
 */

import {z} from "zod";
import {ValidationError} from "./errors.js";
import {inlineLiteral, type SQLDialect} from "./sql.js";
import {ident, TemplateBuilder, type SQLTemplate} from "./template.js";
import {validate} from "./validate.js";

// ============================================================================
// Column Types
// ============================================================================

export const LOGICAL_TYPES = [
	"text",
	"integer",
	"bigint",
	"real",
	"numeric",
	"boolean",
	"date",
	"datetime",
	"json",
	"uuid",
] as const;

export type LogicalType = (typeof LOGICAL_TYPES)[number];

const SQL_TYPE = Symbol.for("tablekit:sql-type");

/**
 * A dialect-specific type name passed through verbatim, e.g. CITEXT.
 */
export interface RawSQLType {
	readonly [SQL_TYPE]: true;
	readonly name: string;
}

// Type names like "CITEXT", "DOUBLE PRECISION", "NUMERIC(10, 2)", "TEXT[]"
const RAW_TYPE_PATTERN = /^[A-Za-z][A-Za-z0-9_]*(?: [A-Za-z][A-Za-z0-9_]*)*(?:\(\d+(?:, ?\d+)?\))?(?:\[\])?$/;

/**
 * Use a type name the logical types don't cover.
 *
 * @throws ValidationError if the name is not a plain type name
 */
export function sqlType(name: string): RawSQLType {
	if (!RAW_TYPE_PATTERN.test(name)) {
		throw new ValidationError(`Invalid SQL type name "${name}"`, {
			type: ["must be a plain type name such as CITEXT or NUMERIC(10, 2)"],
		});
	}
	return {[SQL_TYPE]: true, name};
}

export function isRawSQLType(value: unknown): value is RawSQLType {
	return (
		value !== null &&
		typeof value === "object" &&
		SQL_TYPE in value &&
		value[SQL_TYPE] === true
	);
}

export const ColumnTypeSchema = z.union([
	z.enum(LOGICAL_TYPES),
	z.object({kind: z.literal("varchar"), length: z.number().int().positive()}),
	z.object({
		kind: z.literal("numeric"),
		precision: z.number().int().positive(),
		scale: z.number().int().nonnegative().optional(),
	}),
	z.custom<RawSQLType>(isRawSQLType, {message: "Expected a column type"}),
]);

export type ColumnType = z.infer<typeof ColumnTypeSchema>;

// ============================================================================
// Column Specs
// ============================================================================

const IdentifierSchema = z.string().min(1).max(128);

/** Defaults the database computes when a row is inserted */
export const SERVER_DEFAULTS = ["now", "current_date", "current_time"] as const;

export type ServerDefault = (typeof SERVER_DEFAULTS)[number];

const SERVER_DEFAULT_SQL: Record<ServerDefault, Record<SQLDialect, string>> = {
	now: {postgresql: "CURRENT_TIMESTAMP", mysql: "CURRENT_TIMESTAMP", sqlite: "CURRENT_TIMESTAMP"},
	// MySQL takes non-timestamp functions only as parenthesized expressions
	current_date: {postgresql: "CURRENT_DATE", mysql: "(CURRENT_DATE)", sqlite: "CURRENT_DATE"},
	current_time: {postgresql: "CURRENT_TIME", mysql: "(CURRENT_TIME)", sqlite: "CURRENT_TIME"},
};

export function serverDefaultSQL(value: ServerDefault, dialect: SQLDialect): string {
	return SERVER_DEFAULT_SQL[value][dialect];
}

export const ColumnSpecSchema = z
	.object({
		name: IdentifierSchema,
		type: ColumnTypeSchema,
		/** Literal default, rendered into the DDL */
		default: z.union([z.string(), z.number(), z.boolean(), z.null()]).optional(),
		/** Default evaluated by the database, e.g. "now" */
		serverDefault: z.enum(SERVER_DEFAULTS).optional(),
		autoIncrement: z.boolean().optional(),
		/** Columns are nullable unless this is false */
		nullable: z.boolean().optional(),
		references: z
			.object({
				table: IdentifierSchema,
				column: IdentifierSchema,
				/** Defaults to the referencing table's schema */
				schema: IdentifierSchema.optional(),
				onDelete: z.enum(["cascade", "set null", "restrict", "no action"]).optional(),
			})
			.optional(),
	})
	.refine((spec) => spec.default === undefined || spec.serverDefault === undefined, {
		message: "Use either default or serverDefault, not both",
		path: ["default"],
	});

export type ColumnSpec = z.input<typeof ColumnSpecSchema>;

export interface TableOptions {
	primaryKey?: string | readonly string[];
	/** Each entry is one UNIQUE constraint over one or more columns */
	unique?: readonly (string | readonly string[])[];
	ifNotExists?: boolean;
}

/**
 * Validate column specs for a new table.
 *
 * @throws ValidationError
 */
export function validateColumnSpecs(specs: readonly unknown[]): ColumnSpec[] {
	if (specs.length === 0) {
		throw new ValidationError("A table needs at least one column", {
			columns: ["must not be empty"],
		});
	}
	const parsed = specs.map((spec, i) => validate(ColumnSpecSchema, spec, `column spec ${i}`));
	const seen = new Set<string>();
	for (const spec of parsed) {
		if (seen.has(spec.name)) {
			throw new ValidationError(`Duplicate column "${spec.name}"`, {
				[spec.name]: ["declared more than once"],
			});
		}
		seen.add(spec.name);
	}
	return parsed;
}

// ============================================================================
// Type Mapping
// ============================================================================

const TYPE_MAP: Record<LogicalType, Record<SQLDialect, string>> = {
	text: {postgresql: "TEXT", mysql: "TEXT", sqlite: "TEXT"},
	integer: {postgresql: "INTEGER", mysql: "INT", sqlite: "INTEGER"},
	bigint: {postgresql: "BIGINT", mysql: "BIGINT", sqlite: "INTEGER"},
	real: {postgresql: "DOUBLE PRECISION", mysql: "DOUBLE", sqlite: "REAL"},
	numeric: {postgresql: "NUMERIC", mysql: "DECIMAL(65, 30)", sqlite: "NUMERIC"},
	boolean: {postgresql: "BOOLEAN", mysql: "BOOLEAN", sqlite: "INTEGER"},
	date: {postgresql: "DATE", mysql: "DATE", sqlite: "TEXT"},
	datetime: {postgresql: "TIMESTAMPTZ", mysql: "DATETIME", sqlite: "TEXT"},
	json: {postgresql: "JSONB", mysql: "JSON", sqlite: "TEXT"},
	uuid: {postgresql: "UUID", mysql: "CHAR(36)", sqlite: "TEXT"},
};

/**
 * Map a column type to the dialect's type name.
 */
export function mapColumnType(type: ColumnType, dialect: SQLDialect): string {
	if (typeof type === "string") {
		return TYPE_MAP[type][dialect];
	}
	if (isRawSQLType(type)) {
		return type.name;
	}
	if (type.kind === "varchar") {
		// SQLite ignores lengths; TEXT keeps affinity obvious
		return dialect === "sqlite" ? "TEXT" : `VARCHAR(${type.length})`;
	}
	const base = dialect === "mysql" ? "DECIMAL" : "NUMERIC";
	return type.scale === undefined
		? `${base}(${type.precision})`
		: `${base}(${type.precision}, ${type.scale})`;
}

// ============================================================================
// DDL Generation
// ============================================================================

function appendName(
	builder: TemplateBuilder,
	schema: string,
	table: string,
): TemplateBuilder {
	return builder.value(ident(schema)).append(".").value(ident(table));
}

/**
 * Append ` DEFAULT ...` for a column, if it has one.
 */
function appendDefault(
	builder: TemplateBuilder,
	spec: ColumnSpec,
	dialect: SQLDialect,
): void {
	if (spec.serverDefault !== undefined) {
		builder.append(` DEFAULT ${serverDefaultSQL(spec.serverDefault, dialect)}`);
	} else if (spec.default !== undefined) {
		builder.append(` DEFAULT ${inlineLiteral(spec.default, dialect)}`);
	}
}

function toList(value: string | readonly string[] | undefined): string[] {
	if (value === undefined) return [];
	return typeof value === "string" ? [value] : [...value];
}

/**
 * Generate CREATE TABLE DDL as a template with ident markers.
 *
 * @throws ValidationError if keys name undeclared columns, or an
 *   auto-increment column conflicts with the primary key on SQLite
 */
export function generateCreateTable(
	schema: string,
	table: string,
	specs: readonly ColumnSpec[],
	options: TableOptions,
	dialect: SQLDialect,
): SQLTemplate {
	const declared = new Set(specs.map((s) => s.name));
	const primaryKey = toList(options.primaryKey);
	const unique = (options.unique ?? []).map((u) => toList(u));
	for (const column of [...primaryKey, ...unique.flat()]) {
		if (!declared.has(column)) {
			throw new ValidationError(`Key column "${column}" is not declared`, {
				[column]: ["is used in a key but not declared"],
			});
		}
	}

	// SQLite only auto-increments an inline INTEGER PRIMARY KEY
	let inlinePrimary: string | undefined;
	if (dialect === "sqlite") {
		const auto = specs.filter((s) => s.autoIncrement);
		if (auto.length > 0) {
			const column = auto[0].name;
			if (auto.length > 1 || primaryKey.length > 1 || (primaryKey[0] ?? column) !== column) {
				throw new ValidationError(
					`SQLite auto-increment column "${column}" must be the sole primary key`,
					{[column]: ["must be the sole primary key"]},
				);
			}
			inlinePrimary = column;
		}
	}

	const exists = options.ifNotExists ? "IF NOT EXISTS " : "";
	const builder = new TemplateBuilder(`CREATE TABLE ${exists}`);
	appendName(builder, schema, table).append(" (\n  ");

	specs.forEach((spec, i) => {
		if (i > 0) builder.append(",\n  ");
		builder.value(ident(spec.name)).append(" ");
		if (spec.name === inlinePrimary) {
			builder.append("INTEGER PRIMARY KEY AUTOINCREMENT");
			return;
		}
		builder.append(mapColumnType(spec.type, dialect));
		if (spec.autoIncrement) {
			builder.append(
				dialect === "postgresql" ? " GENERATED BY DEFAULT AS IDENTITY" : " AUTO_INCREMENT",
			);
		}
		if (spec.nullable === false) {
			builder.append(" NOT NULL");
		}
		appendDefault(builder, spec, dialect);
	});

	if (primaryKey.length > 0 && inlinePrimary === undefined) {
		builder
			.append(",\n  PRIMARY KEY (")
			.list(primaryKey.map((c) => ident(c)))
			.append(")");
	}

	for (const columns of unique) {
		builder
			.append(",\n  UNIQUE (")
			.list(columns.map((c) => ident(c)))
			.append(")");
	}

	for (const spec of specs) {
		const ref = spec.references;
		if (!ref) continue;
		builder.append(",\n  FOREIGN KEY (").value(ident(spec.name)).append(") REFERENCES ");
		if (dialect === "sqlite") {
			// SQLite resolves parent tables in the child's database only
			builder.value(ident(ref.table));
		} else {
			appendName(builder, ref.schema ?? schema, ref.table);
		}
		builder.append(" (").value(ident(ref.column)).append(")");
		if (ref.onDelete) {
			builder.append(` ON DELETE ${ref.onDelete.toUpperCase()}`);
		}
	}

	return builder.append("\n)").build();
}

/**
 * Generate ALTER TABLE ... ADD COLUMN.
 *
 * Only the type and default are applied: NOT NULL and foreign keys are left
 * out so the statement succeeds on tables that already hold rows.
 */
export function generateAddColumn(
	schema: string,
	table: string,
	spec: ColumnSpec,
	dialect: SQLDialect,
): SQLTemplate {
	const builder = new TemplateBuilder("ALTER TABLE ");
	appendName(builder, schema, table);
	builder.append(" ADD COLUMN ").value(ident(spec.name));
	builder.append(` ${mapColumnType(spec.type, dialect)}`);
	appendDefault(builder, spec, dialect);
	return builder.build();
}
