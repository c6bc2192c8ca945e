import YAML from "yaml";
import { toRenderable } from "../serialization/debug-string.js";
import { isMapping, isSequence } from "../tree/document-value.js";
import type { TreeRoot } from "../tree/document-tree.js";
import { isBlank, plainContainers, type FormatAdapter } from "./format-adapter.js";

/**
 * Options for the YAML adapter.
 */
export interface YamlAdapterOptions {
	readonly indent?: number;
	readonly lineWidth?: number;
}

/**
 * Mappings parsed with `mapAsMap` may carry non-string keys (`10:`, `true:`).
 * Tree keys are always strings.
 */
const withStringKeys = (value: unknown): unknown => {
	if (value instanceof Map) {
		return new Map(
			Array.from(value, ([key, child]): [string, unknown] => [
				String(key),
				withStringKeys(child),
			]),
		);
	}
	if (Array.isArray(value)) {
		return value.map((element: unknown) => withStringKeys(element));
	}
	return value;
};

/**
 * Creates a YAML adapter. Output is block style. Mappings are parsed as
 * `Map`s, so key order round-trips.
 *
 * @param options.indent - Spaces per nesting level (default: 4)
 * @param options.lineWidth - Column at which long strings fold; 0 never folds (default: 0)
 *
 * @example
 * ```typescript
 * const adapter = yamlAdapter({ indent: 2 })
 * const layer = makeFormatRegistryLayer([adapter])
 * ```
 */
export const yamlAdapter = (options?: YamlAdapterOptions): FormatAdapter => {
	const indent = options?.indent ?? 4;
	const lineWidth = options?.lineWidth ?? 0;

	return {
		...plainContainers,
		name: "yaml",
		extensions: ["yaml", "yml"],
		parse: (text): TreeRoot => {
			if (isBlank(text)) {
				return new Map();
			}
			const parsed = withStringKeys(YAML.parse(text, { mapAsMap: true }));
			if (parsed === null || parsed === undefined) {
				return new Map();
			}
			if (isMapping(parsed) || isSequence(parsed)) {
				return parsed;
			}
			throw new Error(
				`Expected a mapping or sequence at the document root, got ${typeof parsed}`,
			);
		},
		render: (root) => YAML.stringify(toRenderable(root), { indent, lineWidth }),
	};
};
