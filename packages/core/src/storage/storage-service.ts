import { Context, type Effect } from "effect";
import type { StorageError } from "../errors/storage-errors.js";

// ============================================================================
// StorageAdapter Effect Service
// ============================================================================

/**
 * Where a document's text lives. Paths are opaque to the adapter; the store
 * resolves them before handing them over.
 */
export interface StorageAdapterShape {
	readonly read: (path: string) => Effect.Effect<string, StorageError>;
	/** Replace the whole file. The Node layer does this atomically. */
	readonly write: (
		path: string,
		data: string,
	) => Effect.Effect<void, StorageError>;
	readonly exists: (path: string) => Effect.Effect<boolean, StorageError>;
	readonly remove: (path: string) => Effect.Effect<void, StorageError>;
	/** Make sure the directory that will hold `path` exists. */
	readonly ensureDir: (path: string) => Effect.Effect<void, StorageError>;
}

export class StorageAdapter extends Context.Tag("StorageAdapter")<
	StorageAdapter,
	StorageAdapterShape
>() {}
