import { Context, Effect, Layer, Stream } from "effect";
import {
	SerializationError,
	UnsupportedFormatError,
} from "../errors/storage-errors.js";
import type { TreeRoot } from "../tree/document-tree.js";
import { getFileExtension } from "../utils/path.js";
import type { FormatAdapter } from "./format-adapter.js";

// ============================================================================
// FormatRegistry Effect Service
// ============================================================================

export type FormatError = SerializationError | UnsupportedFormatError;

export interface FormatRegistryShape {
	/** Find the adapter for a format name or file extension, case-insensitively. */
	readonly resolve: (
		format: string,
	) => Effect.Effect<FormatAdapter, UnsupportedFormatError>;
	readonly parse: (
		text: string,
		format: string,
	) => Effect.Effect<TreeRoot, FormatError>;
	/** Collect a stream of text or UTF-8 bytes, then parse it. */
	readonly parseStream: <E>(
		stream: Stream.Stream<string | Uint8Array, E>,
		format: string,
	) => Effect.Effect<TreeRoot, FormatError | E>;
	readonly render: (
		root: unknown,
		format: string,
	) => Effect.Effect<string, FormatError>;
	/** Names of the registered formats, in registration order. */
	readonly formats: ReadonlyArray<string>;
}

export class FormatRegistry extends Context.Tag("FormatRegistry")<
	FormatRegistry,
	FormatRegistryShape
>() {}

/**
 * The format implied by a file path: its extension, lower-cased, or
 * undefined when it has none.
 */
export const formatFromPath = (path: string): string | undefined => {
	const extension = getFileExtension(path);
	return extension.length > 0 ? extension : undefined;
};

const describe = (error: unknown): string =>
	error instanceof Error ? error.message : "Unknown error";

const collectText = <E>(
	stream: Stream.Stream<string | Uint8Array, E>,
): Effect.Effect<string, E> =>
	Effect.suspend(() => {
		const decoder = new TextDecoder();
		return stream.pipe(
			Stream.map((chunk) =>
				typeof chunk === "string"
					? chunk
					: decoder.decode(chunk, { stream: true }),
			),
			Stream.mkString,
			Effect.map((text) => text + decoder.decode()),
		);
	});

// ============================================================================
// makeFormatRegistry: Compositor for building FormatRegistry from adapters
// ============================================================================

/**
 * Builds a FormatRegistry from FormatAdapter instances.
 *
 * The compositor:
 * 1. Builds a name/extension → adapter lookup map, lower-cased
 * 2. Wraps parse/render in Effect.try with SerializationError
 * 3. Produces UnsupportedFormatError for unknown formats
 * 4. Logs a warning on duplicate names or extensions (last wins)
 */
export const makeFormatRegistry = (
	adapters: ReadonlyArray<FormatAdapter>,
): Effect.Effect<FormatRegistryShape> =>
	Effect.gen(function* () {
		const lookup = new Map<string, FormatAdapter>();
		for (const adapter of adapters) {
			const keys = new Set(
				[adapter.name, ...adapter.extensions].map((key) => key.toLowerCase()),
			);
			for (const key of keys) {
				const existing = lookup.get(key);
				if (existing !== undefined && existing !== adapter) {
					yield* Effect.logWarning(
						`Duplicate format '${key}': '${existing.name}' overwritten by '${adapter.name}'`,
					);
				}
				lookup.set(key, adapter);
			}
		}

		const supported = Array.from(lookup.keys()).join(", ");

		const resolve = (
			format: string,
		): Effect.Effect<FormatAdapter, UnsupportedFormatError> => {
			const adapter = lookup.get(format.toLowerCase());
			if (adapter === undefined) {
				return Effect.fail(
					new UnsupportedFormatError({
						format,
						message:
							supported.length > 0
								? `Unsupported format '${format}'. Available formats: ${supported}`
								: `Unsupported format '${format}'. No formats registered.`,
					}),
				);
			}
			return Effect.succeed(adapter);
		};

		const parse = (
			text: string,
			format: string,
		): Effect.Effect<TreeRoot, FormatError> =>
			Effect.flatMap(resolve(format), (adapter) =>
				Effect.try({
					try: () => adapter.parse(text),
					catch: (error) =>
						new SerializationError({
							format: adapter.name,
							message: `Failed to parse ${adapter.name} data: ${describe(error)}`,
							cause: error,
						}),
				}),
			);

		return {
			resolve,
			parse,
			parseStream: (stream, format) =>
				Effect.flatMap(resolve(format), (adapter) =>
					Effect.flatMap(collectText(stream), (text) =>
						parse(text, adapter.name),
					),
				),
			render: (root, format) =>
				Effect.flatMap(resolve(format), (adapter) =>
					Effect.try({
						try: () => adapter.render(root),
						catch: (error) =>
							new SerializationError({
								format: adapter.name,
								message: `Failed to render ${adapter.name} data: ${describe(error)}`,
								cause: error,
							}),
					}),
				),
			formats: Array.from(new Set(adapters.map((adapter) => adapter.name))),
		} satisfies FormatRegistryShape;
	});

/**
 * Creates a FormatRegistry Layer from FormatAdapter instances.
 */
export const makeFormatRegistryLayer = (
	adapters: ReadonlyArray<FormatAdapter>,
): Layer.Layer<FormatRegistry> =>
	Layer.effect(FormatRegistry, makeFormatRegistry(adapters));
