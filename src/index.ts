/**
 * tablekit - schema-agnostic table access
 *
 * Name a table. Filter, write, upsert and evolve it. No record types.
 */

// ============================================================================
// Database
// ============================================================================

export {
	Database,
	type DatabaseOptions,
	type GetOptions,
	type CountOptions,
	type DeleteOptions,
	type UpdateOptions,
	type UpsertOptions,
	type CreateTableOptions,
	type CreateTableResult,
	type AddColumnOptions,
} from "./impl/database.js";

export {
	loadConfig,
	connect,
	createDriver,
	dialectFromURL,
	DEFAULT_CHUNK_SIZE,
	type Config,
	type ConnectOptions,
} from "./impl/config.js";

export {
	createLogger,
	loggerOptions,
	LOG_LEVELS,
	type Logger,
	type LogLevel,
} from "./impl/logger.js";

// ============================================================================
// Drivers
// ============================================================================

export {
	type Driver,
	type Connection,
	type DynamicRecord,
	type ColumnInfo,
	type TableDescription,
	type RelationKind,
} from "./impl/driver.js";

export {type SQLDialect} from "./impl/sql.js";

// ============================================================================
// Schema
// ============================================================================

export {SchemaIntrospector, type TableHandle} from "./impl/introspect.js";

export {
	sqlType,
	isRawSQLType,
	mapColumnType,
	generateCreateTable,
	generateAddColumn,
	LOGICAL_TYPES,
	SERVER_DEFAULTS,
	serverDefaultSQL,
	ColumnSpecSchema,
	ColumnTypeSchema,
	type ColumnSpec,
	type ColumnType,
	type LogicalType,
	type RawSQLType,
	type ServerDefault,
	type TableOptions,
} from "./impl/ddl.js";

// ============================================================================
// Queries
// ============================================================================

export {
	compileWhere,
	renderWhere,
	type Where,
	type Filter,
	type OperatorLeaf,
	type Condition,
} from "./impl/predicate.js";

export {
	buildSelect,
	buildCount,
	buildDelete,
	buildUpdate,
	buildUpsert,
	type SortBy,
	type SortDirection,
	type SelectParts,
} from "./impl/query.js";

export {chunk, eachChunk} from "./impl/batch.js";

export {ident, isSQLIdentifier, type SQLTemplate, type SQLIdentifier} from "./impl/template.js";

export {renderSQL, renderDDL} from "./impl/sql.js";

// ============================================================================
// Errors
// ============================================================================

export {
	DatabaseError,
	ConnectionError,
	TableNotFoundError,
	ColumnNotFoundError,
	NoPrimaryKeyError,
	ColumnAlreadyExistsError,
	MissingMatchFieldError,
	UnsafeValueError,
	PredicateError,
	InvalidRecordError,
	ValidationError,
	QueryError,
	ConstraintViolationError,
	isDatabaseError,
	hasErrorCode,
	type DatabaseErrorCode,
	type ConstraintKind,
} from "./impl/errors.js";
