import { jsonAdapter } from "./json.js";
import { makeFormatRegistryLayer } from "./format-registry.js";
import { xmlAdapter } from "./xml.js";
import { yamlAdapter } from "./yaml.js";

// ============================================================================
// Preset Layers: Pre-configured FormatRegistry Layers
// ============================================================================

/**
 * A FormatRegistry Layer with the built-in formats at their default settings:
 * - JSON (.json)
 * - YAML (.yaml, .yml)
 * - XML (.xml)
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const registry = yield* FormatRegistry
 *   return yield* registry.render({ name: "Alice" }, "yaml")
 * })
 *
 * Effect.runPromise(program.pipe(Effect.provide(DefaultFormatsLayer)))
 * ```
 */
export const DefaultFormatsLayer = makeFormatRegistryLayer([
	jsonAdapter(),
	yamlAdapter(),
	xmlAdapter(),
]);
