import { Data } from "effect";

// ============================================================================
// Document Store Contract Errors
// ============================================================================

/**
 * A path operation reached a root of the wrong shape: a dotted path on a
 * sequence-rooted store, or a sequence operation on a mapping-rooted store.
 */
export class UnsupportedShapeError extends Data.TaggedError(
	"UnsupportedShapeError",
)<{
	readonly operation: string;
	readonly expected: "mapping" | "sequence";
	readonly message: string;
}> {}

/**
 * The backing file failed to load, so the store has no root to operate on.
 */
export class StoreNotLoadedError extends Data.TaggedError(
	"StoreNotLoadedError",
)<{
	readonly path: string;
	readonly state: "Uninitialized" | "Loading" | "Failed";
	readonly message: string;
}> {}

export class InvalidPathError extends Data.TaggedError("InvalidPathError")<{
	readonly path: string;
	readonly reason: string;
	readonly message: string;
}> {}

/**
 * A stored value did not decode into the type the caller asked for.
 */
export class TypeMismatchError extends Data.TaggedError("TypeMismatchError")<{
	readonly path: string;
	readonly expected: string;
	readonly message: string;
}> {}

export class IllegalUsageError extends Data.TaggedError("IllegalUsageError")<{
	readonly operation: string;
	readonly message: string;
}> {}

// ============================================================================
// Tagged Object Errors
// ============================================================================

/**
 * A tagged mapping could not be turned back into its domain object.
 * Never surfaces from a read: the bridge logs it and keeps the raw mapping.
 */
export class ReconstructionError extends Data.TaggedError(
	"ReconstructionError",
)<{
	readonly identifier: string;
	readonly reason: "unknown-type" | "not-reconstructable" | "construction-failed";
	readonly message: string;
	readonly cause?: unknown;
}> {}

export class DuplicateTaggedTypeError extends Data.TaggedError(
	"DuplicateTaggedTypeError",
)<{
	readonly identifier: string;
	readonly message: string;
}> {}

// ============================================================================
// Store Error Unions
// ============================================================================

/**
 * Failures every path operation can produce.
 */
export type PathOperationError =
	| UnsupportedShapeError
	| StoreNotLoadedError
	| InvalidPathError;
