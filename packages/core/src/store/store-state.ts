import { Data } from "effect";
import type { TreeRoot } from "../tree/document-tree.js";

/**
 * Lifecycle of a DocumentStore's root.
 *
 * Uninitialized → Loading → Ready | Failed. A reload passes through Loading
 * again. Path operations only succeed in Ready.
 */
export type StoreState = Data.TaggedEnum<{
	Uninitialized: {};
	Loading: {};
	Ready: { readonly root: TreeRoot };
	Failed: { readonly cause: unknown };
}>;

export const StoreState = Data.taggedEnum<StoreState>();

export type StoreStateTag = StoreState["_tag"];
