/**
 * Lossy fallback for values no format can encode: class instances, functions,
 * symbols. They are written as `ClassName@hexid`, where the id is stable for
 * the lifetime of the object.
 */

import { isMapping, isPlainObject } from "../tree/document-value.js";

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

const identityOf = (value: object): number => {
	const existing = identities.get(value);
	if (existing !== undefined) {
		return existing;
	}
	const assigned = nextIdentity++;
	identities.set(value, assigned);
	return assigned;
};

/**
 * The debug string of a value.
 *
 * @example
 * debugString(new Date(0)) // "Date@1"
 * debugString(null) // "null"
 */
export const debugString = (value: unknown): string => {
	if (value === null) {
		return "null";
	}
	if (typeof value === "object" || typeof value === "function") {
		const name =
			typeof value === "function"
				? "Function"
				: (value.constructor?.name ?? "Object");
		return `${name}@${identityOf(value).toString(16)}`;
	}
	return String(value);
};

/**
 * Deep-copy a document-safe value, replacing anything a format cannot encode
 * with its debug string. Mappings come out as `Map`s, plain objects included.
 * Undefined mapping entries are dropped; undefined sequence elements become
 * null.
 */
export const toRenderable = (value: unknown): unknown => {
	if (
		value === null ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean"
	) {
		return value;
	}
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (Array.isArray(value)) {
		return value.map((element) =>
			element === undefined ? null : toRenderable(element),
		);
	}
	if (isMapping(value) || isPlainObject(value)) {
		const result = new Map<string, unknown>();
		const entries = isMapping(value) ? value : Object.entries(value);
		for (const [key, child] of entries) {
			if (child !== undefined) {
				result.set(key, toRenderable(child));
			}
		}
		return result;
	}
	return debugString(value);
};
