/**
 * Structured error types for table access.
 *
 * All errors extend DatabaseError, which includes an error code
 * for programmatic error handling.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type DatabaseErrorCode =
	| "CONNECTION_ERROR"
	| "TABLE_NOT_FOUND"
	| "COLUMN_NOT_FOUND"
	| "NO_PRIMARY_KEY"
	| "MISSING_MATCH_FIELD"
	| "COLUMN_ALREADY_EXISTS"
	| "UNSAFE_VALUE"
	| "PREDICATE_ERROR"
	| "INVALID_RECORD"
	| "VALIDATION_ERROR"
	| "QUERY_ERROR"
	| "CONSTRAINT_VIOLATION";

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all database errors.
 *
 * Includes an error code for programmatic handling.
 */
export class DatabaseError extends Error {
	readonly code: DatabaseErrorCode;

	constructor(
		code: DatabaseErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "DatabaseError";
		this.code = code;

		// Maintains proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// Connection Errors
// ============================================================================

/**
 * Thrown when the liveness probe fails, or when an operation runs
 * before open().
 */
export class ConnectionError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("CONNECTION_ERROR", message, options);
		this.name = "ConnectionError";
	}
}

// ============================================================================
// Schema Errors
// ============================================================================

/**
 * Thrown when a table does not exist in the given schema.
 */
export class TableNotFoundError extends DatabaseError {
	readonly table: string;
	readonly schema: string;

	constructor(table: string, schema: string, options?: ErrorOptions) {
		super(
			"TABLE_NOT_FOUND",
			`Table "${schema}"."${table}" does not exist`,
			options,
		);
		this.name = "TableNotFoundError";
		this.table = table;
		this.schema = schema;
	}
}

/**
 * Thrown when a filter, projection, sort or write names a column
 * the table does not have.
 */
export class ColumnNotFoundError extends DatabaseError {
	readonly table: string;
	readonly column: string;

	constructor(table: string, column: string, available: readonly string[]) {
		super(
			"COLUMN_NOT_FOUND",
			`Column "${column}" does not exist in table "${table}". Available columns: ${available.join(", ")}`,
		);
		this.name = "ColumnNotFoundError";
		this.table = table;
		this.column = column;
	}
}

/**
 * Thrown by upsert when the table has no primary key to resolve
 * conflicts against.
 */
export class NoPrimaryKeyError extends DatabaseError {
	readonly table: string;

	constructor(table: string) {
		super("NO_PRIMARY_KEY", `No primary key found for table "${table}"`);
		this.name = "NoPrimaryKeyError";
		this.table = table;
	}
}

/**
 * Thrown by addColumn when the column is already present.
 */
export class ColumnAlreadyExistsError extends DatabaseError {
	readonly table: string;
	readonly column: string;

	constructor(table: string, column: string) {
		super(
			"COLUMN_ALREADY_EXISTS",
			`Column "${column}" already exists in table "${table}"`,
		);
		this.name = "ColumnAlreadyExistsError";
		this.table = table;
		this.column = column;
	}
}

// ============================================================================
// Input Errors
// ============================================================================

/**
 * Thrown by update when a record lacks one of the declared match fields.
 */
export class MissingMatchFieldError extends DatabaseError {
	readonly table: string;
	readonly field: string;
	/** Position of the offending record in the input */
	readonly index: number;

	constructor(table: string, field: string, index: number) {
		super(
			"MISSING_MATCH_FIELD",
			`Record ${index} for table "${table}" is missing match field "${field}"`,
		);
		this.name = "MissingMatchFieldError";
		this.table = table;
		this.field = field;
		this.index = index;
	}
}

/**
 * Thrown when a predicate carries something other than structured
 * data: a raw SQL string, a template, or an operator that is not
 * a plain operator token.
 */
export class UnsafeValueError extends DatabaseError {
	readonly field?: string;
	readonly operator?: string;

	constructor(
		message: string,
		details: {field?: string; operator?: string} = {},
	) {
		super("UNSAFE_VALUE", message);
		this.name = "UnsafeValueError";
		this.field = details.field;
		this.operator = details.operator;
	}
}

/**
 * Thrown when an operator leaf has the wrong value shape, e.g. an empty
 * list for "in" or a non-pair for "between".
 */
export class PredicateError extends DatabaseError {
	readonly field: string;
	readonly operator: string;

	constructor(message: string, field: string, operator: string) {
		super("PREDICATE_ERROR", message);
		this.name = "PredicateError";
		this.field = field;
		this.operator = operator;
	}
}

/**
 * Thrown when write records are not usable, e.g. an update record
 * with nothing to set.
 */
export class InvalidRecordError extends DatabaseError {
	readonly table: string;
	readonly index: number;

	constructor(message: string, table: string, index: number) {
		super("INVALID_RECORD", message);
		this.name = "InvalidRecordError";
		this.table = table;
		this.index = index;
	}
}

/**
 * Thrown when zod validation of column specs, options or configuration fails.
 */
export class ValidationError extends DatabaseError {
	readonly fieldErrors: Record<string, string[]>;

	constructor(
		message: string,
		fieldErrors: Record<string, string[]> = {},
		options?: ErrorOptions,
	) {
		super("VALIDATION_ERROR", message, options);
		this.name = "ValidationError";
		this.fieldErrors = fieldErrors;
	}
}

// ============================================================================
// Execution Errors
// ============================================================================

/**
 * Thrown when a statement fails in the driver.
 */
export class QueryError extends DatabaseError {
	readonly sql?: string;

	constructor(message: string, sql?: string, options?: ErrorOptions) {
		super("QUERY_ERROR", message, options);
		this.name = "QueryError";
		this.sql = sql;
	}
}

export type ConstraintKind =
	| "unique"
	| "foreign_key"
	| "check"
	| "not_null"
	| "unknown";

/**
 * Thrown when a database constraint is violated.
 *
 * Constraint violations are detected at the database level and converted
 * from driver-specific errors into this normalized format. Fields are
 * best-effort; some drivers do not report all of them.
 */
export class ConstraintViolationError extends DatabaseError {
	readonly kind: ConstraintKind;
	readonly constraint?: string;
	readonly table?: string;
	readonly column?: string;

	constructor(
		message: string,
		details: {
			kind: ConstraintKind;
			constraint?: string;
			table?: string;
			column?: string;
		},
		options?: ErrorOptions,
	) {
		super("CONSTRAINT_VIOLATION", message, options);
		this.name = "ConstraintViolationError";
		this.kind = details.kind;
		this.constraint = details.constraint;
		this.table = details.table;
		this.column = details.column;
	}
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a DatabaseError.
 */
export function isDatabaseError(error: unknown): error is DatabaseError {
	return error instanceof DatabaseError;
}

/**
 * Check if an error has a specific error code.
 */
export function hasErrorCode(
	error: unknown,
	code: DatabaseErrorCode,
): error is DatabaseError {
	return isDatabaseError(error) && error.code === code;
}

/**
 * Read a string property from a client error, trying each key in order.
 */
export function errorField(
	error: unknown,
	...keys: string[]
): string | undefined {
	if (error === null || typeof error !== "object") return undefined;
	for (const key of keys) {
		const value: unknown = Reflect.get(error, key);
		if (typeof value === "string" || typeof value === "number") {
			return String(value);
		}
	}
	return undefined;
}
