/**
 * expect-style assertions for Node's built-in test runner.
 *
 * Provides describe, test, expect on top of node:test and node:assert.
 */

import {
	afterEach,
	beforeEach,
	describe as nodeDescribe,
	test as nodeTest,
} from "node:test";
import assert from "node:assert";

export {describe, test, beforeEach, afterEach};

const describe = nodeDescribe;
const test = nodeTest;

type ErrorMatcher = string | RegExp | (new (...args: never[]) => Error);

function toValidation(expected: ErrorMatcher): RegExp | ((error: unknown) => boolean) {
	if (typeof expected === "string") {
		return (error) => error instanceof Error && error.message.includes(expected);
	}
	if (expected instanceof RegExp) {
		return expected;
	}
	return (error) => error instanceof expected;
}

export function expect<T>(actual: T) {
	return {
		toBe(expected: T) {
			assert.strictEqual(actual, expected);
		},
		toEqual(expected: unknown) {
			assert.deepStrictEqual(actual, expected);
		},
		toBeNull() {
			assert.strictEqual(actual, null);
		},
		toBeUndefined() {
			assert.strictEqual(actual, undefined);
		},
		toBeTruthy() {
			assert.ok(actual);
		},
		toBeFalsy() {
			assert.ok(!actual);
		},
		toBeGreaterThan(expected: number) {
			assert.ok(typeof actual === "number" && actual > expected);
		},
		toHaveLength(expected: number) {
			assert.ok(Array.isArray(actual) || typeof actual === "string");
			assert.strictEqual(actual.length, expected);
		},
		toContain(expected: unknown) {
			if (Array.isArray(actual)) {
				assert.ok(actual.includes(expected), `expected array to contain ${String(expected)}`);
			} else if (typeof actual === "string" && typeof expected === "string") {
				assert.ok(actual.includes(expected), `expected "${actual}" to contain "${expected}"`);
			} else {
				throw new Error("toContain expects an array or string");
			}
		},
		toMatch(expected: RegExp) {
			assert.ok(typeof actual === "string");
			assert.match(actual, expected);
		},
		toThrow(expected?: ErrorMatcher) {
			if (typeof actual !== "function") {
				throw new Error("toThrow expects a function");
			}
			const fn = () => {
				actual();
			};
			if (expected) {
				assert.throws(fn, toValidation(expected));
			} else {
				assert.throws(fn);
			}
		},
		not: {
			toBe(expected: T) {
				assert.notStrictEqual(actual, expected);
			},
			toEqual(expected: unknown) {
				assert.notDeepStrictEqual(actual, expected);
			},
			toBeNull() {
				assert.notStrictEqual(actual, null);
			},
			toContain(expected: unknown) {
				if (Array.isArray(actual)) {
					assert.ok(!actual.includes(expected));
				} else if (typeof actual === "string" && typeof expected === "string") {
					assert.ok(!actual.includes(expected), `expected "${actual}" not to contain "${expected}"`);
				} else {
					throw new Error("not.toContain expects an array or string");
				}
			},
		},
		rejects: {
			async toThrow(expected?: ErrorMatcher) {
				if (!(actual instanceof Promise)) {
					throw new Error("rejects.toThrow expects a Promise");
				}
				if (expected) {
					await assert.rejects(actual, toValidation(expected));
				} else {
					await assert.rejects(actual);
				}
			},
		},
	};
}
