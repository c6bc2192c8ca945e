import type { ContainerFactory, TreeRoot } from "../tree/document-tree.js";

// ============================================================================
// FormatAdapter: Plugin point for document formats
// ============================================================================

/**
 * A FormatAdapter binds a document format to its parser and renderer:
 * - A name (e.g., "json", "yaml", "xml")
 * - Supported file extensions without dots (e.g., ["yaml", "yml"])
 * - Synchronous parse/render functions that throw on failure
 * - Constructors for the format's native empty containers
 *
 * The FormatRegistry wraps parse/render in Effect.try with proper error
 * tagging. Adapters hold no state and may be shared between stores.
 */
export interface FormatAdapter extends ContainerFactory {
	readonly name: string;
	readonly extensions: ReadonlyArray<string>;
	/**
	 * Parse text into a root container. Empty or whitespace-only text yields
	 * an empty mapping; a bare scalar document throws.
	 */
	readonly parse: (text: string) => TreeRoot;
	/**
	 * Render a document-safe root. Values the format cannot express are
	 * written as their debug string.
	 */
	readonly render: (root: unknown) => string;
}

export const isBlank = (text: string): boolean => text.trim().length === 0;

/**
 * Default container constructors shared by the built-in adapters.
 */
export const plainContainers: ContainerFactory = {
	emptyMapping: () => new Map(),
	emptySequence: () => [],
};
