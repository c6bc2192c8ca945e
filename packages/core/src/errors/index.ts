// ============================================================================
// Storage Errors (re-exported from storage-errors.ts)
// ============================================================================

export type { PersistenceError } from "./storage-errors.js";
export {
	SerializationError,
	StorageError,
	UnsupportedFormatError,
} from "./storage-errors.js";

// ============================================================================
// Store Errors (re-exported from store-errors.ts)
// ============================================================================

export type { PathOperationError } from "./store-errors.js";
export {
	DuplicateTaggedTypeError,
	IllegalUsageError,
	InvalidPathError,
	ReconstructionError,
	StoreNotLoadedError,
	TypeMismatchError,
	UnsupportedShapeError,
} from "./store-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type { PersistenceError } from "./storage-errors.js";
import type {
	DuplicateTaggedTypeError,
	IllegalUsageError,
	PathOperationError,
	TypeMismatchError,
} from "./store-errors.js";

export type DocumentStoreError =
	| PersistenceError
	| PathOperationError
	| TypeMismatchError
	| IllegalUsageError
	| DuplicateTaggedTypeError;
