/**
 * @strata/node - Node.js adapter for Strata
 *
 * Re-exports everything from @strata/core plus filesystem storage.
 */

export * from "@strata/core";
export {
	makeNodeStoreLayer,
	type NodeStoreLayerOptions,
	openNodeDocumentStore,
} from "./convenience.js";
export type { NodeAdapterConfig } from "./node-adapter-layer.js";
export {
	makeNodeStorageLayer,
	NodeStorageLayer,
} from "./node-adapter-layer.js";
