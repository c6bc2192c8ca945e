import { Effect, HashMap, Layer, Logger } from "effect";
import { DefaultFormatsLayer } from "../src/formats/presets.js";
import {
	defineTaggedType,
	makeTaggedTypeLayer,
	type EnumType,
	type TaggedType,
} from "../src/serialization/tagged-registry.js";
import { makeFileGuardLayer } from "../src/storage/file-guard.js";
import { makeInMemoryStorageLayer } from "../src/storage/in-memory-adapter-layer.js";
import type { StorageAdapter } from "../src/storage/storage-service.js";
import type { DocumentStoreServices } from "../src/store/document-store.js";
import { isMapping, isPlainObject } from "../src/tree/document-value.js";

// ============================================================================
// Domain types used across tests
// ============================================================================

export class Point {
	constructor(
		readonly cx: number,
		readonly cy: number,
	) {}
}

export const PointType = defineTaggedType<Point>({
	identifier: "com.example.Point",
	is: (value): value is Point => value instanceof Point,
	toMapping: (point) => ({ cx: point.cx, cy: point.cy }),
	fromMapping: (mapping) => new Point(Number(mapping.cx), Number(mapping.cy)),
});

// ============================================================================
// Mapping conversion
// ============================================================================

/**
 * Build tree mappings from object literals, recursively.
 */
export const tree = (value: unknown): unknown => {
	if (isPlainObject(value)) {
		return new Map(
			Object.entries(value).map(([key, child]): [string, unknown] => [
				key,
				tree(child),
			]),
		);
	}
	if (Array.isArray(value)) {
		return value.map((element: unknown) => tree(element));
	}
	return value;
};

/**
 * Turn tree mappings back into plain objects, recursively, for comparison
 * against object literals.
 */
export const plain = (value: unknown): unknown => {
	if (isMapping(value)) {
		return Object.fromEntries(
			Array.from(value, ([key, child]): [string, unknown] => [key, plain(child)]),
		);
	}
	if (Array.isArray(value)) {
		return value.map((element: unknown) => plain(element));
	}
	return value;
};

/**
 * Keys of a tree mapping, in order. Undefined for anything else.
 */
export const keysOf = (value: unknown): ReadonlyArray<string> | undefined =>
	isMapping(value) ? Array.from(value.keys()) : undefined;

// ============================================================================
// Log capture
// ============================================================================

export interface CapturedLog {
	readonly level: string;
	readonly message: string;
	readonly annotations: Readonly<Record<string, unknown>>;
}

const messageText = (message: unknown): string =>
	Array.isArray(message) ? message.map(String).join(" ") : String(message);

export const makeLogCapture = () => {
	const logs: Array<CapturedLog> = [];
	const layer = Logger.replace(
		Logger.defaultLogger,
		Logger.make(({ logLevel, message, annotations }) => {
			logs.push({
				level: logLevel.label,
				message: messageText(message),
				annotations: Object.fromEntries(HashMap.toEntries(annotations)),
			});
		}),
	);
	return { logs, layer };
};

// ============================================================================
// Store environment
// ============================================================================

export interface TestEnvOptions {
	readonly files?: Readonly<Record<string, string>>;
	readonly types?: ReadonlyArray<TaggedType>;
	readonly enums?: ReadonlyArray<EnumType>;
	/** Storage built over the env's files, in place of the in-memory layer. */
	readonly storage?: (files: Map<string, string>) => Layer.Layer<StorageAdapter>;
}

/**
 * In-memory files, the default formats, an isolated file guard and a log
 * capture, wired into one `run` helper that also closes the store's scope.
 */
export const makeTestEnv = (options: TestEnvOptions = {}) => {
	const files = new Map(Object.entries(options.files ?? {}));
	const capture = makeLogCapture();
	const layer = Layer.mergeAll(
		options.storage?.(files) ?? makeInMemoryStorageLayer(files),
		DefaultFormatsLayer,
		makeTaggedTypeLayer(options.types ?? [], options.enums ?? []),
		makeFileGuardLayer(),
		capture.layer,
	);
	const run = <A, E>(effect: Effect.Effect<A, E, DocumentStoreServices>) =>
		Effect.runPromise(effect.pipe(Effect.scoped, Effect.provide(layer)));
	return { files, logs: capture.logs, layer, run };
};
