/**
 * Value types held by a document tree, plus the guards used to walk them.
 *
 * Mappings are `Map`s so that every key, integer-like or not, keeps the
 * position it was parsed or inserted at.
 */

// ============================================================================
// Document-safe values
// ============================================================================

export type DocumentScalar = string | number | boolean | null;

export type DocumentMapping = Map<string, DocumentValue>;

export type DocumentSequence = Array<DocumentValue>;

/**
 * A value composed only of scalars, mappings and sequences: what a
 * FormatAdapter can render.
 */
export type DocumentValue = DocumentScalar | DocumentMapping | DocumentSequence;

/**
 * The top-level container of a tree. Never a bare scalar.
 */
export type DocumentRoot = DocumentMapping | DocumentSequence;

/**
 * The reserved key that carries a tagged object's type identifier.
 */
export const TAGGED_KEY = "==";

// ============================================================================
// Guards
// ============================================================================

/**
 * Type guard: is the value a tree mapping?
 */
export const isMapping = (value: unknown): value is Map<string, unknown> =>
	value instanceof Map;

/**
 * Type guard: is the value a plain object (object literal or null-prototype
 * object)? Class instances, arrays, Maps and Dates are not.
 */
export const isPlainObject = (
	value: unknown,
): value is Record<string, unknown> => {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		return false;
	}
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
};

export const isSequence = (value: unknown): value is DocumentSequence =>
	Array.isArray(value);

/**
 * A value `set` treats as "remove this key".
 */
export const isRemoval = (value: unknown): value is null | undefined =>
	value === null || value === undefined;
