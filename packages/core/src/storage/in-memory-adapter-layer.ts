/**
 * In-memory implementation of StorageAdapter as an Effect Layer.
 * Documents live in a Map<string, string> instead of on disk; tests pass
 * their own Map to seed and inspect it.
 */

import { Effect, Layer } from "effect";
import { StorageError } from "../errors/storage-errors.js";
import { StorageAdapter, type StorageAdapterShape } from "./storage-service.js";

// ============================================================================
// In-memory storage adapter
// ============================================================================

const notFound = (
	path: string,
	operation: StorageError["operation"],
): StorageError =>
	new StorageError({
		path,
		operation,
		message: `File not found: ${path}`,
	});

export const makeInMemoryAdapter = (
	store: Map<string, string> = new Map(),
): StorageAdapterShape => ({
	read: (path) =>
		Effect.suspend(() => {
			const content = store.get(path);
			return content === undefined
				? Effect.fail(notFound(path, "read"))
				: Effect.succeed(content);
		}),

	write: (path, data) =>
		Effect.sync(() => {
			store.set(path, data);
		}),

	exists: (path) => Effect.sync(() => store.has(path)),

	remove: (path) =>
		Effect.suspend(() => {
			if (!store.delete(path)) {
				return Effect.fail(notFound(path, "delete"));
			}
			return Effect.void;
		}),

	ensureDir: (_path) => Effect.void,
});

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Creates an in-memory StorageAdapter layer backed by the provided Map.
 */
export const makeInMemoryStorageLayer = (
	store?: Map<string, string>,
): Layer.Layer<StorageAdapter> =>
	Layer.succeed(StorageAdapter, makeInMemoryAdapter(store));

/**
 * In-memory StorageAdapter layer with a fresh empty Map.
 */
export const InMemoryStorageLayer: Layer.Layer<StorageAdapter> =
	makeInMemoryStorageLayer();
