/**
 * Recording driver for tests.
 *
 * Renders every statement with the real dialect rules and keeps the text
 * and parameters, so builders can be checked for PostgreSQL and MySQL
 * without a server.
 */

import type {
	Connection,
	Driver,
	DynamicRecord,
	RelationKind,
	TableDescription,
} from "./driver.js";
import {buildSQL, type SQLDialect} from "./sql.js";

export interface RecordedStatement {
	sql: string;
	params: unknown[];
}

export interface FakeDriverOptions {
	defaultSchema?: string;
	tables?: Record<string, TableDescription>;
	views?: string[];
}

export class FakeDriver implements Driver {
	readonly dialect: SQLDialect;
	readonly defaultSchema: string;
	readonly supportsReturning: boolean;

	readonly statements: RecordedStatement[] = [];
	/** Keyed by table name; every schema sees the same tables */
	readonly tables: Map<string, TableDescription>;
	readonly views: string[];
	alive = true;
	acquired = 0;
	released = 0;
	closed = false;
	#rows: DynamicRecord[][] = [];
	#counts: number[] = [];

	constructor(dialect: SQLDialect, options: FakeDriverOptions = {}) {
		this.dialect = dialect;
		this.supportsReturning = dialect !== "mysql";
		this.defaultSchema =
			options.defaultSchema ??
			(dialect === "postgresql" ? "public" : dialect === "mysql" ? "app" : "main");
		this.tables = new Map(Object.entries(options.tables ?? {}));
		this.views = options.views ?? [];
	}

	/** Queue the rows returned by the next all() */
	returnRows(rows: DynamicRecord[]): this {
		this.#rows.push(rows);
		return this;
	}

	/** Queue the count returned by the next run() */
	returnCount(count: number): this {
		this.#counts.push(count);
		return this;
	}

	get sql(): string[] {
		return this.statements.map((s) => s.sql);
	}

	#record(strings: TemplateStringsArray, values: unknown[]): void {
		this.statements.push(buildSQL(strings, values, this.dialect));
	}

	async acquire(): Promise<Connection> {
		this.acquired++;
		return {
			all: async (strings, values) => {
				this.#record(strings, values);
				return this.#rows.shift() ?? [];
			},
			run: async (strings, values) => {
				this.#record(strings, values);
				return this.#counts.shift() ?? 0;
			},
			runBatch: async (strings, valueSets) => {
				let total = 0;
				for (const values of valueSets) {
					this.#record(strings, values);
					total += this.#counts.shift() ?? 1;
				}
				return total;
			},
			describeTable: async (name) => this.tables.get(name) ?? null,
			listTables: async (_schema: string, kind: RelationKind) =>
				kind === "view"
					? [...this.views]
					: [...this.tables.keys()].filter((t) => !this.views.includes(t)),
			release: async () => {
				this.released++;
			},
		};
	}

	async ping(): Promise<boolean> {
		return this.alive;
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}

/**
 * A table description with the given columns, all nullable text.
 */
export function describeColumns(
	columns: string[],
	primaryKey: string[] = [],
): TableDescription {
	return {
		columns: columns.map((name) => ({name, type: "text", nullable: true})),
		primaryKey,
		unique: [],
	};
}
