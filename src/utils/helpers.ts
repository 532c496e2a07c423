import isEqual from "fast-deep-equal";
import { deepClone } from "fast-json-patch";
import sortKeys from "sort-keys";
import type { Scalar } from "../types";

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const isScalar = (value: unknown): value is Scalar =>
	value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean";

/**
 * Canonical JSON text for a scalar, used for identity and ordering
 */
export const canonicalScalar = (value: Scalar): string => JSON.stringify(value);

/**
 * Deep copy of a JSON value. Caller-supplied trees are never shared with results.
 */
export const cloneValue = (value: unknown): unknown => {
	if (typeof value !== "object" || value === null) {
		return value;
	}
	const copy: unknown = deepClone(value);
	return copy;
};

/**
 * Freeze a JSON value and everything beneath it
 */
export const deepFreeze = <T>(value: T): T => {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
};

export const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export { isEqual, sortKeys };
