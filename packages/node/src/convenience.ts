/**
 * Convenience wrappers that remove manual layer wiring for file-backed
 * stores.
 */

import { resolve } from "node:path";
import {
	DefaultFormatsLayer,
	type DocumentStore,
	type DocumentStoreOptions,
	type DuplicateTaggedTypeError,
	type EnumType,
	type FileGuard,
	type FormatAdapter,
	type FormatRegistry,
	makeFormatRegistryLayer,
	makeTaggedTypeLayer,
	type OpenError,
	openDocumentStore,
	SharedFileGuardLayer,
	type StorageAdapter,
	type TaggedType,
	type TaggedTypeRegistry,
} from "@strata/core";
import { Effect, Layer, type Scope } from "effect";
import {
	type NodeAdapterConfig,
	makeNodeStorageLayer,
} from "./node-adapter-layer.js";

export interface NodeStoreLayerOptions {
	/** Tagged types the stores reconstruct on read. */
	readonly types?: ReadonlyArray<TaggedType>;
	readonly enums?: ReadonlyArray<EnumType>;
	/** Replaces the built-in JSON, YAML and XML adapters. */
	readonly formats?: ReadonlyArray<FormatAdapter>;
	readonly storage?: NodeAdapterConfig;
}

/**
 * Build every service a file-backed store needs: filesystem storage, the
 * format registry, the tagged-type registry and the process-wide file guard.
 */
export const makeNodeStoreLayer = (
	options: NodeStoreLayerOptions = {},
): Layer.Layer<
	StorageAdapter | FormatRegistry | TaggedTypeRegistry | FileGuard,
	DuplicateTaggedTypeError
> =>
	Layer.mergeAll(
		makeNodeStorageLayer(options.storage),
		options.formats === undefined
			? DefaultFormatsLayer
			: makeFormatRegistryLayer(options.formats),
		makeTaggedTypeLayer(options.types ?? [], options.enums ?? []),
		SharedFileGuardLayer,
	);

/**
 * Open a file-backed document store on the local filesystem.
 *
 * The path is resolved against the working directory, so every store on
 * the same file shares one lock. The returned Effect only requires `Scope`,
 * which flushes background saves when it closes.
 *
 * @example
 * ```typescript
 * const program = Effect.scoped(
 *   Effect.gen(function* () {
 *     const store = yield* openNodeDocumentStore({ path: "config.yml" })
 *     yield* store.set("motd", "hello")
 *     yield* store.save()
 *   }),
 * )
 * ```
 */
export const openNodeDocumentStore = (
	options: DocumentStoreOptions,
	layerOptions?: NodeStoreLayerOptions,
): Effect.Effect<
	DocumentStore,
	OpenError | DuplicateTaggedTypeError,
	Scope.Scope
> =>
	openDocumentStore({
		...options,
		path: options.path === undefined ? undefined : resolve(options.path),
	}).pipe(Effect.provide(makeNodeStoreLayer(layerOptions)));
