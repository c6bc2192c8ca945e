/**
 * Conversion between tree-native values and document-safe values.
 *
 * Both directions build a new value and never mutate their input.
 */

import { Effect } from "effect";
import {
	IllegalUsageError,
	ReconstructionError,
} from "../errors/store-errors.js";
import {
	isMapping,
	isPlainObject,
	TAGGED_KEY,
} from "../tree/document-value.js";
import type { TreeRoot } from "../tree/document-tree.js";
import type { TaggedTypeRegistryShape } from "./tagged-registry.js";

// ============================================================================
// toDocumentSafe
// ============================================================================

const isIterable = (value: object): value is Iterable<unknown> =>
	Symbol.iterator in value;

const encode = (
	value: unknown,
	registry: TaggedTypeRegistryShape,
	ancestors: Set<object>,
): unknown => {
	if (typeof value !== "object" || value === null) {
		if (typeof value === "symbol") {
			return registry.enumName(value) ?? value;
		}
		return value;
	}

	if (ancestors.has(value)) {
		throw new IllegalUsageError({
			operation: "toDocumentSafe",
			message: "Cannot store a value that contains itself",
		});
	}
	ancestors.add(value);
	try {
		if (isPlainObject(value)) {
			return encodeEntries(Object.entries(value), registry, ancestors);
		}

		const enumName = registry.enumName(value);
		if (enumName !== undefined) {
			return enumName;
		}

		const tagged = registry.match(value);
		if (tagged !== undefined) {
			const result = new Map<string, unknown>([[TAGGED_KEY, tagged.identifier]]);
			for (const [key, child] of Object.entries(tagged.toMapping(value))) {
				if (key !== TAGGED_KEY) {
					result.set(key, encode(child, registry, ancestors));
				}
			}
			return result;
		}

		if (value instanceof Map) {
			return encodeEntries(
				Array.from(value, ([key, child]): [string, unknown] => [String(key), child]),
				registry,
				ancestors,
			);
		}

		if (isIterable(value)) {
			return Array.from(value, (element: unknown) =>
				encode(element, registry, ancestors),
			);
		}

		return value;
	} finally {
		ancestors.delete(value);
	}
};

const encodeEntries = (
	entries: ReadonlyArray<readonly [string, unknown]>,
	registry: TaggedTypeRegistryShape,
	ancestors: Set<object>,
): Map<string, unknown> => {
	const result = new Map<string, unknown>();
	for (const [key, child] of entries) {
		result.set(key, encode(child, registry, ancestors));
	}
	return result;
};

/**
 * Convert a tree-native value into its document-safe form.
 *
 * - plain objects and `Map`s become `Map` mappings in entry order, values
 *   converted recursively
 * - registered tagged types become their mapping form, with the reserved
 *   identifier key first
 * - registered enum members and symbols become their name
 * - arrays, `Set`s and other iterables become sequences
 * - anything else is returned unchanged
 *
 * Fails with IllegalUsageError for self-containing values, or when a tagged
 * type's `toMapping` throws.
 */
export const toDocumentSafe = (
	value: unknown,
	registry: TaggedTypeRegistryShape,
): Effect.Effect<unknown, IllegalUsageError> =>
	Effect.try({
		try: () => encode(value, registry, new Set()),
		catch: (error) =>
			error instanceof IllegalUsageError
				? error
				: new IllegalUsageError({
						operation: "toDocumentSafe",
						message: `Failed to convert value: ${error instanceof Error ? error.message : String(error)}`,
					}),
	});

// ============================================================================
// toNative
// ============================================================================

const entriesOf = (
	value: unknown,
): Iterable<readonly [string, unknown]> | undefined => {
	if (isMapping(value)) {
		return value;
	}
	return isPlainObject(value) ? Object.entries(value) : undefined;
};

const reconstruct = (
	mapping: Map<string, unknown>,
	raw: unknown,
	registry: TaggedTypeRegistryShape,
	failures: Array<ReconstructionError>,
): unknown => {
	const identifier = mapping.get(TAGGED_KEY);
	if (typeof identifier !== "string") {
		return raw;
	}

	const type = registry.lookup(identifier);
	if (type === undefined) {
		failures.push(
			new ReconstructionError({
				identifier,
				reason: "unknown-type",
				message: `Attempted to deserialize unregistered type '${identifier}'`,
			}),
		);
		return raw;
	}
	if (type.fromMapping === undefined) {
		failures.push(
			new ReconstructionError({
				identifier,
				reason: "not-reconstructable",
				message: `Type '${identifier}' has no mapping constructor`,
			}),
		);
		return raw;
	}

	const entries = Object.fromEntries(
		Array.from(mapping).filter(([key]) => key !== TAGGED_KEY),
	);
	try {
		return type.fromMapping(entries);
	} catch (error) {
		failures.push(
			new ReconstructionError({
				identifier,
				reason: "construction-failed",
				message: `Error while instantiating '${identifier}': ${error instanceof Error ? error.message : String(error)}`,
				cause: error,
			}),
		);
		return raw;
	}
};

/**
 * With `plain`, mappings come out as plain objects for callers; without it
 * they stay `Map`s for the tree.
 */
const decode = (
	value: unknown,
	registry: TaggedTypeRegistryShape,
	failures: Array<ReconstructionError>,
	plain: boolean,
): unknown => {
	const entries = entriesOf(value);
	if (entries !== undefined) {
		const copy = new Map<string, unknown>();
		for (const [key, child] of entries) {
			copy.set(key, decode(child, registry, failures, plain));
		}
		return reconstruct(
			copy,
			plain ? Object.fromEntries(copy) : copy,
			registry,
			failures,
		);
	}
	if (Array.isArray(value)) {
		return value.map((element: unknown) =>
			decode(element, registry, failures, plain),
		);
	}
	return value;
};

const logFailures = (
	failures: ReadonlyArray<ReconstructionError>,
): Effect.Effect<void> =>
	Effect.forEach(
		failures,
		(failure) =>
			Effect.logError(failure.message).pipe(
				Effect.annotateLogs({
					identifier: failure.identifier,
					reason: failure.reason,
				}),
			),
		{ discard: true },
	);

/**
 * Convert a document value into tree-native form, rebuilding tagged objects.
 *
 * Mappings are converted bottom-up and returned as plain objects. A mapping
 * whose reserved key names a registered type is handed, without that key, to
 * the type's mapping constructor. When the type is unknown, has no mapping
 * constructor, or the constructor throws, the failure is logged and the raw
 * mapping is kept.
 */
export const toNative = (
	value: unknown,
	registry: TaggedTypeRegistryShape,
): Effect.Effect<unknown> =>
	Effect.suspend(() => {
		const failures: Array<ReconstructionError> = [];
		const result = decode(value, registry, failures, true);
		return logFailures(failures).pipe(Effect.as(result));
	});

/**
 * Convert a parsed root for the tree. Nested mappings stay `Map`s. The root
 * itself is never reconstructed, so a root mapping stays a mapping even if
 * it carries the reserved key.
 */
export const rootToNative = (
	root: TreeRoot,
	registry: TaggedTypeRegistryShape,
): Effect.Effect<TreeRoot> =>
	Effect.suspend(() => {
		const failures: Array<ReconstructionError> = [];
		let result: TreeRoot;
		if (Array.isArray(root)) {
			result = root.map((element: unknown) =>
				decode(element, registry, failures, false),
			);
		} else {
			result = new Map(
				Array.from(root, ([key, child]): [string, unknown] => [
					key,
					decode(child, registry, failures, false),
				]),
			);
		}
		return logFailures(failures).pipe(Effect.as(result));
	});
