/**
 * Main entry point for @strata/core.
 *
 * Exports the Effect-based API: the document store, its format adapters,
 * the tagged-type registry, storage services and typed errors.
 */

// ============================================================================
// Document Store
// ============================================================================

export { openDocumentStore } from "./store/document-store.js";

export type {
	DocumentStore,
	DocumentStoreOptions,
	DocumentStoreServices,
	OpenError,
	SaveError,
} from "./store/document-store.js";

export { makeMutableView } from "./store/mutable-view.js";
export type { MutableView } from "./store/mutable-view.js";

export { withRunPromise } from "./store/runnable.js";
export type { RunnableEffect } from "./store/runnable.js";

export { StoreState } from "./store/store-state.js";
export type { StoreStateTag } from "./store/store-state.js";

export { makeSaveQueue } from "./store/save-queue.js";
export type { SaveQueue, SaveQueueOptions } from "./store/save-queue.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	DuplicateTaggedTypeError,
	IllegalUsageError,
	InvalidPathError,
	ReconstructionError,
	SerializationError,
	StorageError,
	StoreNotLoadedError,
	TypeMismatchError,
	UnsupportedFormatError,
	UnsupportedShapeError,
} from "./errors/index.js";

export type {
	DocumentStoreError,
	PathOperationError,
	PersistenceError,
} from "./errors/index.js";

// ============================================================================
// Paths and Trees
// ============================================================================

export {
	findDottedKey,
	isRootPath,
	joinPath,
	parsePath,
	splitPath,
} from "./path/path-ladder.js";
export type { PathLadder } from "./path/path-ladder.js";

export {
	getAt,
	isSeries,
	isSetAt,
	keysAt,
	replaceSeries,
	setAt,
	traverse,
} from "./tree/document-tree.js";
export type {
	ContainerFactory,
	TreeMapping,
	TreeRoot,
	TreeSequence,
} from "./tree/document-tree.js";

export {
	isMapping,
	isPlainObject,
	isRemoval,
	isSequence,
	TAGGED_KEY,
} from "./tree/document-value.js";
export type {
	DocumentMapping,
	DocumentRoot,
	DocumentScalar,
	DocumentSequence,
	DocumentValue,
} from "./tree/document-value.js";

// ============================================================================
// Serialization Bridge and Tagged Types
// ============================================================================

export { rootToNative, toDocumentSafe, toNative } from "./serialization/bridge.js";
export { debugString, toRenderable } from "./serialization/debug-string.js";

export {
	defineEnumType,
	defineTaggedType,
	EmptyTaggedTypeLayer,
	makeTaggedTypeLayer,
	makeTaggedTypeRegistry,
	schemaTaggedType,
	TaggedTypeRegistry,
} from "./serialization/tagged-registry.js";
export type {
	EnumType,
	TaggedType,
	TaggedTypeRegistryShape,
} from "./serialization/tagged-registry.js";

// ============================================================================
// Formats
// ============================================================================

export type { FormatAdapter } from "./formats/format-adapter.js";
export {
	FormatRegistry,
	formatFromPath,
	makeFormatRegistry,
	makeFormatRegistryLayer,
} from "./formats/format-registry.js";
export type { FormatError, FormatRegistryShape } from "./formats/format-registry.js";

export {
	jsonAdapter,
	parseOrdered,
	prettyPrintJson,
	stringifyOrdered,
} from "./formats/json.js";
export type { JsonAdapterOptions } from "./formats/json.js";
export { yamlAdapter } from "./formats/yaml.js";
export type { YamlAdapterOptions } from "./formats/yaml.js";
export { isXmlName, xmlAdapter } from "./formats/xml.js";
export type { XmlAdapterOptions } from "./formats/xml.js";

export { DefaultFormatsLayer } from "./formats/presets.js";

// ============================================================================
// Storage
// ============================================================================

export { StorageAdapter } from "./storage/storage-service.js";
export type { StorageAdapterShape } from "./storage/storage-service.js";

export {
	InMemoryStorageLayer,
	makeInMemoryAdapter,
	makeInMemoryStorageLayer,
} from "./storage/in-memory-adapter-layer.js";

export {
	FileGuard,
	MAX_READERS,
	makeFileGuard,
	makeFileGuardLayer,
	SharedFileGuardLayer,
} from "./storage/file-guard.js";
export type { FileGuardShape } from "./storage/file-guard.js";

export { getFileExtension } from "./utils/path.js";
