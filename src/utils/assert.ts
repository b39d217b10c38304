/**
 * Numeric assertions for tests, reporting like `assert.equal`.
 *
 * @module utils/assert
 */
import assert from "node:assert";

type Operator = ">" | ">=" | "<" | "<=";

const HOLDS: Readonly<Record<Operator, (a: number, b: number) => boolean>> = {
	">": (a, b) => a > b,
	">=": (a, b) => a >= b,
	"<": (a, b) => a < b,
	"<=": (a, b) => a <= b,
};

const WORDING: Readonly<Record<Operator, string>> = {
	">": "greater than",
	">=": "greater than or equal to",
	"<": "less than",
	"<=": "less than or equal to",
};

function compare(
	actual: number,
	operator: Operator,
	expected: number,
	message?: string
): void {
	if (HOLDS[operator](actual, expected)) return;
	throw new assert.AssertionError({
		message: message || `${actual} is not ${WORDING[operator]} ${expected}`,
		actual,
		expected: `${operator} ${expected}`,
		operator,
	});
}

export function greaterThan(actual: number, expected: number, message?: string): void {
	compare(actual, ">", expected, message);
}

export function greaterThanOrEqual(
	actual: number,
	expected: number,
	message?: string
): void {
	compare(actual, ">=", expected, message);
}

export function lessThan(actual: number, expected: number, message?: string): void {
	compare(actual, "<", expected, message);
}

export function lessThanOrEqual(
	actual: number,
	expected: number,
	message?: string
): void {
	compare(actual, "<=", expected, message);
}

/**
 * Asserts that `min <= actual <= max`.
 *
 * @example
 * ```typescript
 * between(randomizer.range(6), 0, 5);
 * ```
 */
export function between(actual: number, min: number, max: number, message?: string): void {
	compare(actual, ">=", min, message);
	compare(actual, "<=", max, message);
}
