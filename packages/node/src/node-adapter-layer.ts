/**
 * Node.js filesystem implementation of StorageAdapter as an Effect Layer.
 * Writes go to a temp file beside the target and are renamed over it, so a
 * reader never sees a partial document. Failed operations are retried with
 * exponential backoff.
 */

import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import {
	StorageAdapter,
	type StorageAdapterShape,
	StorageError,
} from "@strata/core";
import { Effect, Layer, Schedule } from "effect";

// ============================================================================
// Configuration
// ============================================================================

export interface NodeAdapterConfig {
	readonly maxRetries?: number;
	readonly baseDelay?: number; // milliseconds
	readonly createMissingDirectories?: boolean;
	readonly fileMode?: number;
	readonly dirMode?: number;
}

const defaultConfig: Required<NodeAdapterConfig> = {
	maxRetries: 3,
	baseDelay: 100,
	createMissingDirectories: true,
	fileMode: 0o644,
	dirMode: 0o755,
};

// ============================================================================
// Helpers
// ============================================================================

const toStorageError = (
	path: string,
	operation: StorageError["operation"],
	error: unknown,
): StorageError =>
	new StorageError({
		path,
		operation,
		message:
			error instanceof Error ? error.message : `Unknown ${operation} error`,
		cause: error,
	});

const attempt = <A>(
	path: string,
	operation: StorageError["operation"],
	run: () => Promise<A>,
): Effect.Effect<A, StorageError> =>
	Effect.tryPromise({
		try: run,
		catch: (error) => toStorageError(path, operation, error),
	});

const tempPathFor = (path: string): string =>
	`${path}.tmp.${randomBytes(8).toString("hex")}`;

// ============================================================================
// Adapter
// ============================================================================

const makeAdapter = (
	config: Required<NodeAdapterConfig>,
): StorageAdapterShape => {
	const policy = Schedule.intersect(
		Schedule.exponential(config.baseDelay),
		Schedule.recurs(config.maxRetries),
	);
	const retrying = <A>(
		effect: Effect.Effect<A, StorageError>,
	): Effect.Effect<A, StorageError> => Effect.retry(effect, policy);

	const makeParentDir = (path: string) =>
		attempt(dirname(path), "write", () =>
			fs.mkdir(dirname(path), { recursive: true, mode: config.dirMode }),
		).pipe(Effect.asVoid);

	// a failed rename leaves the temp file behind; remove it, keep the error
	const replaceFile = (path: string, data: string) => {
		const tempPath = tempPathFor(path);
		return attempt(path, "write", () =>
			fs.writeFile(tempPath, data, { mode: config.fileMode }),
		).pipe(
			Effect.andThen(attempt(path, "write", () => fs.rename(tempPath, path))),
			Effect.tapError(() =>
				Effect.promise(() => fs.rm(tempPath, { force: true })),
			),
		);
	};

	return {
		read: (path) =>
			attempt(path, "read", () => fs.readFile(path, "utf-8")).pipe(retrying),

		write: (path, data) =>
			(config.createMissingDirectories ? makeParentDir(path) : Effect.void).pipe(
				Effect.andThen(replaceFile(path, data)),
				retrying,
			),

		exists: (path) =>
			Effect.promise(() =>
				fs.access(path).then(
					() => true,
					() => false,
				),
			),

		remove: (path) =>
			attempt(path, "delete", () => fs.unlink(path)).pipe(retrying),

		ensureDir: (path) => makeParentDir(path).pipe(retrying),
	};
};

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Creates a filesystem StorageAdapter layer.
 *
 * @example
 * ```typescript
 * const layer = makeNodeStorageLayer({ maxRetries: 0, fileMode: 0o600 })
 * ```
 */
export const makeNodeStorageLayer = (
	config: NodeAdapterConfig = {},
): Layer.Layer<StorageAdapter> =>
	Layer.succeed(StorageAdapter, makeAdapter({ ...defaultConfig, ...config }));

/**
 * Filesystem StorageAdapter layer with the default configuration.
 */
export const NodeStorageLayer: Layer.Layer<StorageAdapter> =
	makeNodeStorageLayer();
