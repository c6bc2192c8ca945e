import {
	type Duration,
	Effect,
	type Schema,
	type Scope,
	SynchronizedRef,
} from "effect";
import {
	StorageError,
	UnsupportedFormatError,
} from "../errors/storage-errors.js";
import {
	IllegalUsageError,
	InvalidPathError,
	type PathOperationError,
	StoreNotLoadedError,
	type TypeMismatchError,
	UnsupportedShapeError,
} from "../errors/store-errors.js";
import type { FormatAdapter } from "../formats/format-adapter.js";
import {
	type FormatError,
	FormatRegistry,
	formatFromPath,
} from "../formats/format-registry.js";
import {
	findDottedKey,
	isRootPath,
	type PathLadder,
	parsePath,
} from "../path/path-ladder.js";
import {
	rootToNative,
	toDocumentSafe,
	toNative,
} from "../serialization/bridge.js";
import { TaggedTypeRegistry } from "../serialization/tagged-registry.js";
import { FileGuard } from "../storage/file-guard.js";
import { StorageAdapter } from "../storage/storage-service.js";
import {
	getAt,
	isSetAt,
	keysAt,
	replaceSeries as replaceSeriesAt,
	setAt,
	type TreeMapping,
	type TreeRoot,
	type TreeSequence,
} from "../tree/document-tree.js";
import { isMapping, isRemoval } from "../tree/document-value.js";
import { decodeAs } from "./decode.js";
import { makeMutableView, type MutableView } from "./mutable-view.js";
import { type RunnableEffect, withRunPromise } from "./runnable.js";
import { makeSaveQueue } from "./save-queue.js";
import { StoreState, type StoreStateTag } from "./store-state.js";

// ============================================================================
// Configuration
// ============================================================================

export interface DocumentStoreOptions {
	/** Backing file. Omit for a memory-only store. */
	readonly path?: string;
	/** Raw document text to parse instead of reading a file. */
	readonly text?: string;
	/**
	 * Format name or extension, case-insensitive. Defaults to the extension
	 * of `path`, or "json" for a store without one.
	 */
	readonly format?: string;
	/** Start from an empty mapping, and write it, when the file is missing. Default: true */
	readonly createIfMissing?: boolean;
	/** Wait before a scheduled save starts. Default: 0 */
	readonly saveDelay?: Duration.DurationInput;
}

export type DocumentStoreServices =
	| FormatRegistry
	| TaggedTypeRegistry
	| StorageAdapter
	| FileGuard
	| Scope.Scope;

export type OpenError =
	| UnsupportedFormatError
	| FormatError
	| IllegalUsageError;

export type SaveError =
	| FormatError
	| StorageError
	| StoreNotLoadedError
	| IllegalUsageError;

// ============================================================================
// DocumentStore
// ============================================================================

export interface DocumentStore {
	/** Backing file, if any. */
	readonly path: string | undefined;
	/** Name of the format the store parses and renders. */
	readonly format: string;

	readonly state: () => RunnableEffect<StoreStateTag, never>;

	/**
	 * Value at a dotted path, rebuilt into domain objects where tagged.
	 * Missing paths give the default (undefined when none is given).
	 */
	readonly get: (
		path: string,
		defaultValue?: unknown,
	) => RunnableEffect<unknown, PathOperationError>;
	/** Value at a dotted path, decoded with a schema. */
	readonly getAs: <A, I>(
		path: string,
		schema: Schema.Schema<A, I, never>,
		defaultValue?: A,
	) => RunnableEffect<A, PathOperationError | TypeMismatchError>;
	/** Store a value; null or undefined removes the key instead. */
	readonly set: (
		path: string,
		value: unknown,
	) => RunnableEffect<void, PathOperationError | IllegalUsageError>;
	readonly isSet: (path: string) => RunnableEffect<boolean, PathOperationError>;
	/** Keys of the mapping at a path, or of the root when omitted. */
	readonly keys: (
		path?: string,
	) => RunnableEffect<ReadonlyArray<string>, PathOperationError>;
	/** Set every missing path to its default; returns the paths written. */
	readonly ensureDefaults: (
		defaults: Readonly<Record<string, unknown>>,
	) => RunnableEffect<
		ReadonlyArray<string>,
		PathOperationError | IllegalUsageError
	>;

	readonly isSeries: () => RunnableEffect<boolean, StoreNotLoadedError>;
	readonly getSeries: () => RunnableEffect<
		ReadonlyArray<unknown>,
		StoreNotLoadedError | UnsupportedShapeError
	>;
	readonly replaceSeries: (
		values: Iterable<unknown>,
	) => RunnableEffect<
		void,
		StoreNotLoadedError | UnsupportedShapeError | IllegalUsageError
	>;

	/** Render the current tree in the store's format. */
	readonly render: () => RunnableEffect<
		string,
		FormatError | StoreNotLoadedError | IllegalUsageError
	>;
	/** Write the tree to `target`, or to the backing file. */
	readonly save: (target?: string) => RunnableEffect<void, SaveError>;
	/** Queue a background save of the backing file. */
	readonly scheduleSave: () => RunnableEffect<void, never>;
	/** Wait for queued background saves. */
	readonly flush: () => RunnableEffect<void, never>;
	/**
	 * Re-read the backing file. Returns the resulting state. A file whose
	 * root shape differs from the loaded one is rejected and the store keeps
	 * its current tree.
	 */
	readonly reload: () => RunnableEffect<
		StoreStateTag,
		UnsupportedShapeError | IllegalUsageError
	>;

	readonly view: (path: string, defaultValue?: unknown) => MutableView;
}

// ============================================================================
// Helpers
// ============================================================================

const MEMORY = "<memory>";

const shapeOf = (root: TreeRoot): "mapping" | "sequence" =>
	Array.isArray(root) ? "sequence" : "mapping";

const requireMappingRoot = (
	root: TreeRoot,
	operation: string,
): Effect.Effect<TreeMapping, UnsupportedShapeError> =>
	Array.isArray(root)
		? Effect.fail(
				new UnsupportedShapeError({
					operation,
					expected: "mapping",
					message: `Cannot ${operation} by path on a sequence document`,
				}),
			)
		: Effect.succeed(root);

const requireSequenceRoot = (
	root: TreeRoot,
	operation: string,
): Effect.Effect<TreeSequence, UnsupportedShapeError> =>
	Array.isArray(root)
		? Effect.succeed(root)
		: Effect.fail(
				new UnsupportedShapeError({
					operation,
					expected: "sequence",
					message: `Cannot ${operation} on a mapping document`,
				}),
			);

const resolveFormat = (
	options: DocumentStoreOptions,
): Effect.Effect<string, UnsupportedFormatError> => {
	if (options.format !== undefined) {
		return Effect.succeed(options.format);
	}
	if (options.path === undefined) {
		return Effect.succeed("json");
	}
	const fromPath = formatFromPath(options.path);
	return fromPath === undefined
		? Effect.fail(
				new UnsupportedFormatError({
					format: "",
					message: `Cannot infer a format from '${options.path}'; pass one explicitly`,
				}),
			)
		: Effect.succeed(fromPath);
};

// ============================================================================
// openDocumentStore
// ============================================================================

/**
 * Open a document store.
 *
 * - `{ path }` reads the file under the file guard. A missing file starts
 *   an empty mapping (unless `createIfMissing` is false). A read or parse
 *   failure is logged and leaves the store Failed; every path operation
 *   then fails with StoreNotLoadedError.
 * - `{ text }` parses the text directly and fails on invalid input.
 * - neither gives an empty memory-only store.
 *
 * The store's background save queue lives in the surrounding Scope and is
 * flushed when it closes.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const store = yield* openDocumentStore({ path: "./settings.yaml" })
 *   yield* store.set("server.port", 8080)
 *   yield* store.save()
 * })
 * ```
 */
export const openDocumentStore = (
	options: DocumentStoreOptions = {},
): Effect.Effect<DocumentStore, OpenError, DocumentStoreServices> =>
	Effect.gen(function* () {
		if (options.path !== undefined && options.text !== undefined) {
			return yield* Effect.fail(
				new IllegalUsageError({
					operation: "open",
					message: "A store is opened from a path or from text, not both",
				}),
			);
		}

		const formats = yield* FormatRegistry;
		const registry = yield* TaggedTypeRegistry;
		const storage = yield* StorageAdapter;
		const fileGuard = yield* FileGuard;

		const format = yield* resolveFormat(options);
		const adapter: FormatAdapter = yield* formats.resolve(format);
		const filePath = options.path;
		const createIfMissing = options.createIfMissing ?? true;
		const location = filePath ?? MEMORY;

		const state = yield* SynchronizedRef.make<StoreState>(
			StoreState.Uninitialized(),
		);
		const treeGuard = yield* Effect.makeSemaphore(1);
		const guarded = treeGuard.withPermits(1);

		// ====================================================================
		// File I/O
		// ====================================================================

		const writeFile = (
			target: string,
			snapshot: unknown,
		): Effect.Effect<void, FormatError | StorageError> =>
			fileGuard.withWrite(
				target,
				Effect.gen(function* () {
					const text = yield* formats.render(snapshot, adapter.name);
					yield* storage.ensureDir(target);
					yield* storage.write(target, text);
				}),
			);

		const loadFile = (
			path: string,
		): Effect.Effect<TreeRoot, FormatError | StorageError> =>
			Effect.gen(function* () {
				const text = yield* fileGuard.withRead(
					path,
					Effect.gen(function* () {
						if (!(yield* storage.exists(path))) {
							return undefined;
						}
						return yield* storage.read(path);
					}),
				);
				if (text === undefined) {
					if (!createIfMissing) {
						return yield* Effect.fail(
							new StorageError({
								path,
								operation: "read",
								message: `File not found: ${path}`,
							}),
						);
					}
					const empty = adapter.emptyMapping();
					yield* writeFile(path, empty);
					return empty;
				}
				const parsed = yield* formats.parse(text, adapter.name);
				return yield* rootToNative(parsed, registry);
			});

		const logLoadFailure = (path: string, error: FormatError | StorageError) =>
			Effect.logError(`Failed to load ${path}: ${error.message}`).pipe(
				Effect.annotateLogs({ path, format: adapter.name }),
			);

		// ====================================================================
		// State access
		// ====================================================================

		const requireRoot: Effect.Effect<TreeRoot, StoreNotLoadedError> =
			Effect.gen(function* () {
				const current = yield* SynchronizedRef.get(state);
				if (current._tag === "Ready") {
					return current.root;
				}
				return yield* Effect.fail(
					new StoreNotLoadedError({
						path: location,
						state: current._tag,
						message:
							current._tag === "Failed"
								? `Document ${location} failed to load`
								: `Document ${location} is not loaded yet`,
					}),
				);
			});

		const mappingRoot = (operation: string) =>
			Effect.flatMap(requireRoot, (root) =>
				requireMappingRoot(root, operation),
			);

		const sequenceRoot = (operation: string) =>
			Effect.flatMap(requireRoot, (root) =>
				requireSequenceRoot(root, operation),
			);

		// ====================================================================
		// Unguarded operations (callers hold the tree guard)
		// ====================================================================

		const writeValue = (
			root: TreeMapping,
			path: string,
			ladder: PathLadder,
			value: unknown,
		): Effect.Effect<void, InvalidPathError | IllegalUsageError> =>
			Effect.gen(function* () {
				if (isRemoval(value)) {
					setAt(root, ladder, undefined, adapter);
					return;
				}
				const safe = yield* toDocumentSafe(value, registry);
				const dotted = findDottedKey(safe);
				if (dotted !== undefined) {
					return yield* Effect.fail(
						new InvalidPathError({
							path,
							reason: "dotted-key",
							message: `Key '${dotted}' inside the value for '${path}' contains '.' and could not be addressed by path`,
						}),
					);
				}
				if (isRootPath(ladder) && !isMapping(safe)) {
					return yield* Effect.fail(
						new IllegalUsageError({
							operation: "set",
							message: "Only a mapping can replace the document root",
						}),
					);
				}
				setAt(root, ladder, safe, adapter);
			});

		const readValue = (path: string) =>
			Effect.gen(function* () {
				const ladder = yield* parsePath(path);
				const root = yield* mappingRoot("get");
				return isSetAt(root, ladder, adapter)
					? yield* toNative(getAt(root, ladder, adapter), registry)
					: undefined;
			});

		const snapshot: Effect.Effect<
			unknown,
			StoreNotLoadedError | IllegalUsageError
		> = guarded(
			Effect.flatMap(requireRoot, (root) => toDocumentSafe(root, registry)),
		);

		// ====================================================================
		// Public operations
		// ====================================================================

		const get = (path: string, defaultValue?: unknown) =>
			withRunPromise(
				guarded(readValue(path)).pipe(
					Effect.map((value) => (value === undefined ? defaultValue : value)),
				),
			);

		const getAs = <A, I>(
			path: string,
			schema: Schema.Schema<A, I, never>,
			defaultValue?: A,
		) =>
			withRunPromise(
				Effect.gen(function* () {
					const value = yield* guarded(readValue(path));
					if (value === undefined && defaultValue !== undefined) {
						return defaultValue;
					}
					return yield* decodeAs(path, schema, value);
				}),
			);

		const set = (path: string, value: unknown) =>
			withRunPromise(
				guarded(
					Effect.gen(function* () {
						const ladder = yield* parsePath(path);
						const root = yield* mappingRoot("set");
						yield* writeValue(root, path, ladder, value);
					}),
				),
			);

		const isSet = (path: string) =>
			withRunPromise(
				guarded(
					Effect.gen(function* () {
						const ladder = yield* parsePath(path);
						const root = yield* mappingRoot("isSet");
						return isSetAt(root, ladder, adapter);
					}),
				),
			);

		const keys = (path = "") =>
			withRunPromise(
				guarded(
					Effect.gen(function* () {
						const ladder = yield* parsePath(path);
						const root = yield* mappingRoot("keys");
						return keysAt(root, ladder, adapter) ?? [];
					}),
				),
			);

		const ensureDefaults = (defaults: Readonly<Record<string, unknown>>) =>
			withRunPromise(
				guarded(
					Effect.gen(function* () {
						const root = yield* mappingRoot("ensureDefaults");
						const written: Array<string> = [];
						for (const [path, value] of Object.entries(defaults)) {
							const ladder = yield* parsePath(path);
							if (isSetAt(root, ladder, adapter) || isRemoval(value)) {
								continue;
							}
							yield* writeValue(root, path, ladder, value);
							written.push(path);
						}
						return written;
					}),
				),
			);

		const isSeries = () =>
			withRunPromise(
				guarded(Effect.map(requireRoot, (root) => Array.isArray(root))),
			);

		const getSeries = () =>
			withRunPromise(
				guarded(
					Effect.gen(function* () {
						const root = yield* sequenceRoot("getSeries");
						const copy = yield* toNative(root, registry);
						return Array.isArray(copy) ? copy : [];
					}),
				),
			);

		const replaceSeries = (values: Iterable<unknown>) =>
			withRunPromise(
				guarded(
					Effect.gen(function* () {
						const root = yield* sequenceRoot("replaceSeries");
						const safe = yield* toDocumentSafe(Array.from(values), registry);
						replaceSeriesAt(root, Array.isArray(safe) ? safe : []);
					}),
				),
			);

		const render = () =>
			withRunPromise(
				Effect.flatMap(snapshot, (copy) => formats.render(copy, adapter.name)),
			);

		const save = (target?: string) =>
			withRunPromise(
				Effect.gen(function* () {
					const destination = target ?? filePath;
					if (destination === undefined) {
						return yield* Effect.fail(
							new IllegalUsageError({
								operation: "save",
								message: "A memory-only store needs a target path to save to",
							}),
						);
					}
					const copy = yield* snapshot;
					yield* writeFile(destination, copy);
				}),
			);

		const saveQueue = yield* makeSaveQueue(save(), {
			delay: options.saveDelay,
			annotations: { path: location, format: adapter.name },
		});

		const reloadFile = (path: string) =>
			guarded(
				Effect.gen(function* () {
					const previous = yield* SynchronizedRef.get(state);
					yield* SynchronizedRef.set(state, StoreState.Loading());
					const loaded = yield* Effect.either(loadFile(path));
					if (loaded._tag === "Left") {
						yield* logLoadFailure(path, loaded.left);
						yield* SynchronizedRef.set(
							state,
							StoreState.Failed({ cause: loaded.left }),
						);
						return "Failed" as const;
					}
					const root = loaded.right;
					if (
						previous._tag === "Ready" &&
						shapeOf(previous.root) !== shapeOf(root)
					) {
						yield* SynchronizedRef.set(state, previous);
						return yield* Effect.fail(
							new UnsupportedShapeError({
								operation: "reload",
								expected: shapeOf(previous.root),
								message: `Reloaded ${path} is a ${shapeOf(root)}, but the store holds a ${shapeOf(previous.root)}`,
							}),
						);
					}
					yield* SynchronizedRef.set(state, StoreState.Ready({ root }));
					return "Ready" as const;
				}),
			);

		const reload = () =>
			withRunPromise(
				Effect.gen(function* () {
					if (filePath === undefined) {
						return yield* Effect.fail(
							new IllegalUsageError({
								operation: "reload",
								message: "A memory-only store has no file to reload",
							}),
						);
					}
					return yield* reloadFile(filePath);
				}),
			);

		// ====================================================================
		// Initial load
		// ====================================================================

		yield* SynchronizedRef.set(state, StoreState.Loading());
		if (filePath !== undefined) {
			const loaded = yield* Effect.either(loadFile(filePath));
			if (loaded._tag === "Left") {
				yield* logLoadFailure(filePath, loaded.left);
				yield* SynchronizedRef.set(
					state,
					StoreState.Failed({ cause: loaded.left }),
				);
			} else {
				yield* SynchronizedRef.set(
					state,
					StoreState.Ready({ root: loaded.right }),
				);
			}
		} else {
			const root =
				options.text === undefined
					? adapter.emptyMapping()
					: yield* formats
							.parse(options.text, adapter.name)
							.pipe(Effect.flatMap((parsed) => rootToNative(parsed, registry)));
			yield* SynchronizedRef.set(state, StoreState.Ready({ root }));
		}

		const store: DocumentStore = {
			path: filePath,
			format: adapter.name,
			state: () =>
				withRunPromise(
					Effect.map(SynchronizedRef.get(state), (current) => current._tag),
				),
			get,
			getAs,
			set,
			isSet,
			keys,
			ensureDefaults,
			isSeries,
			getSeries,
			replaceSeries,
			render,
			save,
			scheduleSave: () => withRunPromise(saveQueue.schedule),
			flush: () => withRunPromise(saveQueue.flush),
			reload,
			view: (path, defaultValue) => makeMutableView(store, path, defaultValue),
		};
		return store;
	});
