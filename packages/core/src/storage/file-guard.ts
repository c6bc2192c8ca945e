/**
 * Readers/writer lock per file path.
 *
 * Each path gets a semaphore with MAX_READERS permits: a reader takes one, a
 * writer takes them all. Paths are compared as given, so callers pass
 * resolved paths when two spellings can name the same file.
 */

import { Context, Effect, Layer } from "effect";

export const MAX_READERS = 64;

// ============================================================================
// FileGuard Effect Service
// ============================================================================

export interface FileGuardShape {
	readonly withRead: <A, E, R>(
		path: string,
		effect: Effect.Effect<A, E, R>,
	) => Effect.Effect<A, E, R>;
	readonly withWrite: <A, E, R>(
		path: string,
		effect: Effect.Effect<A, E, R>,
	) => Effect.Effect<A, E, R>;
}

export class FileGuard extends Context.Tag("FileGuard")<
	FileGuard,
	FileGuardShape
>() {}

export const makeFileGuard = (maxReaders = MAX_READERS): FileGuardShape => {
	const locks = new Map<string, Effect.Semaphore>();

	const lockFor = (path: string): Effect.Semaphore => {
		const existing = locks.get(path);
		if (existing !== undefined) {
			return existing;
		}
		const created = Effect.unsafeMakeSemaphore(maxReaders);
		locks.set(path, created);
		return created;
	};

	return {
		withRead: (path, effect) =>
			Effect.suspend(() => lockFor(path).withPermits(1)(effect)),
		withWrite: (path, effect) =>
			Effect.suspend(() => lockFor(path).withPermits(maxReaders)(effect)),
	};
};

/**
 * The guard shared by every store in the process, so two stores opened on
 * the same path never read a half-written file.
 */
const sharedFileGuard = makeFileGuard();

export const SharedFileGuardLayer: Layer.Layer<FileGuard> = Layer.succeed(
	FileGuard,
	sharedFileGuard,
);

/**
 * A guard private to one layer build.
 */
export const makeFileGuardLayer = (
	maxReaders = MAX_READERS,
): Layer.Layer<FileGuard> =>
	Layer.sync(FileGuard, () => makeFileGuard(maxReaders));
