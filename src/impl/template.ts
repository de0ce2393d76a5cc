/**
 * Template utilities for building SQL statements.
 *
 * - Statements are strings + values pairs, matching tagged template parameters
 * - Statements compose by merging (no string parsing)
 * - Identifiers use ident() markers for deferred quoting
 * - Rendering happens in drivers only
 */

// ============================================================================
// SQL Template
// ============================================================================

const SQL_TEMPLATE = Symbol.for("tablekit:template");

/**
 * A statement as template parts.
 *
 * Maintains invariant: strings.length === values.length + 1
 */
export interface SQLTemplate {
	readonly [SQL_TEMPLATE]: true;
	readonly strings: TemplateStringsArray;
	readonly values: readonly unknown[];
}

/**
 * Create a SQL template from strings and values.
 */
export function createTemplate(
	strings: TemplateStringsArray,
	values: readonly unknown[] = [],
): SQLTemplate {
	if (strings.length !== values.length + 1) {
		throw new Error(
			`Malformed template: ${strings.length} strings for ${values.length} values`,
		);
	}
	return {[SQL_TEMPLATE]: true, strings, values};
}

/**
 * Check if a value is a SQL template.
 */
export function isSQLTemplate(value: unknown): value is SQLTemplate {
	return (
		value !== null &&
		typeof value === "object" &&
		SQL_TEMPLATE in value &&
		value[SQL_TEMPLATE] === true
	);
}

// ============================================================================
// SQL Identifiers
// ============================================================================

const SQL_IDENT = Symbol.for("tablekit:ident");

/**
 * SQL identifier (schema, table or column name) to be quoted by drivers.
 *
 * Quoting happens at render time based on dialect:
 * - MySQL: backticks (`name`)
 * - PostgreSQL/SQLite: double quotes ("name")
 */
export interface SQLIdentifier {
	readonly [SQL_IDENT]: true;
	readonly name: string;
}

/**
 * Create an SQL identifier marker.
 */
export function ident(name: string): SQLIdentifier {
	return {[SQL_IDENT]: true, name};
}

/**
 * Check if a value is an SQL identifier marker.
 */
export function isSQLIdentifier(value: unknown): value is SQLIdentifier {
	return (
		value !== null &&
		typeof value === "object" &&
		SQL_IDENT in value &&
		value[SQL_IDENT] === true
	);
}

// ============================================================================
// Template Building
// ============================================================================

/**
 * Build a TemplateStringsArray from string parts.
 * Used to construct templates programmatically while preserving the .raw property.
 */
export function makeTemplate(parts: string[]): TemplateStringsArray {
	return Object.assign([...parts], {raw: [...parts]});
}

/**
 * Mutable accumulator for building statements piece by piece.
 *
 * @example
 * const b = new TemplateBuilder("DELETE FROM ");
 * b.value(ident("orders"));
 * b.append(" WHERE ");
 * b.value(ident("id")).append(" = ").value(1);
 * b.build(); // DELETE FROM "orders" WHERE "id" = ?
 */
export class TemplateBuilder {
	#strings: string[];
	#values: unknown[] = [];

	constructor(head: string = "") {
		this.#strings = [head];
	}

	/** Append literal SQL text. Never pass user data here. */
	append(text: string): this {
		this.#strings[this.#strings.length - 1] += text;
		return this;
	}

	/** Append an interpolated value (parameter or identifier). */
	value(value: unknown): this {
		this.#values.push(value);
		this.#strings.push("");
		return this;
	}

	/** Append values separated by `separator`. */
	list(values: readonly unknown[], separator: string = ", "): this {
		for (let i = 0; i < values.length; i++) {
			if (i > 0) this.append(separator);
			this.value(values[i]);
		}
		return this;
	}

	/** Merge another template in place. */
	merge(template: SQLTemplate): this {
		mergeTemplate(this.#strings, this.#values, template);
		return this;
	}

	get isEmpty(): boolean {
		return this.#values.length === 0 && this.#strings[0] === "";
	}

	build(): SQLTemplate {
		return createTemplate(makeTemplate(this.#strings), [...this.#values]);
	}
}

/**
 * Merge a template into an accumulator.
 * Mutates the strings and values arrays in place.
 *
 * @param strings - Accumulator strings array (mutated)
 * @param values - Accumulator values array (mutated)
 * @param template - Template to merge
 */
export function mergeTemplate(
	strings: string[],
	values: unknown[],
	template: SQLTemplate,
): void {
	const templateStrings = template.strings;
	const templateValues = template.values;
	// Append first template string to last accumulator string
	strings[strings.length - 1] += templateStrings[0];
	// Push remaining template parts
	for (let i = 0; i < templateValues.length; i++) {
		values.push(templateValues[i]);
		strings.push(templateStrings[i + 1]);
	}
}
