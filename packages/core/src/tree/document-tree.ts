/**
 * In-place operations over a store's root container.
 *
 * The root is owned by one DocumentStore and mutated under its tree guard;
 * nothing here locks. Values held in the tree are "tree-native": document
 * values plus whatever domain objects the serialization bridge rebuilt.
 */

import { isRootPath, type PathLadder } from "../path/path-ladder.js";
import { isMapping, TAGGED_KEY } from "./document-value.js";

export type TreeMapping = Map<string, unknown>;
export type TreeSequence = Array<unknown>;
export type TreeRoot = TreeMapping | TreeSequence;

/**
 * Constructors for a format's native empty containers.
 */
export interface ContainerFactory {
	readonly emptyMapping: () => TreeMapping;
	readonly emptySequence: () => TreeSequence;
}

export const isSeries = (root: TreeRoot): root is TreeSequence =>
	Array.isArray(root);

/**
 * Walk every segment but the last, starting at the root mapping.
 *
 * With `create`, missing (or non-mapping) intermediates are replaced by a new
 * empty mapping. Without it, the walk gives up as soon as an intermediate is
 * missing, and the result is undefined: the final key cannot exist.
 *
 * @example
 * const root = new Map()
 * traverse(root, true, ["a", "b", "c"], factory) // returns the new, empty mapping at a.b
 * traverse(root, false, ["x", "y"], factory) // returns undefined
 */
export const traverse = (
	root: TreeMapping,
	create: boolean,
	ladder: PathLadder,
	factory: ContainerFactory,
): TreeMapping | undefined => {
	let container = root;
	for (let i = 0; i < ladder.length - 1; i++) {
		const segment = ladder[i];
		const next = container.get(segment);
		if (isMapping(next)) {
			container = next;
			continue;
		}
		if (!create) {
			return undefined;
		}
		const created = factory.emptyMapping();
		container.set(segment, created);
		container = created;
	}
	return container;
};

const leafKey = (ladder: PathLadder): string => ladder[ladder.length - 1];

/**
 * Read the value at a ladder. The root ladder returns the root itself.
 */
export const getAt = (
	root: TreeMapping,
	ladder: PathLadder,
	factory: ContainerFactory,
): unknown => {
	if (isRootPath(ladder)) {
		return root;
	}
	const container = traverse(root, false, ladder, factory);
	if (container === undefined) {
		return undefined;
	}
	return container.get(leafKey(ladder));
};

export const isSetAt = (
	root: TreeMapping,
	ladder: PathLadder,
	factory: ContainerFactory,
): boolean => {
	if (isRootPath(ladder)) {
		return true;
	}
	const container = traverse(root, false, ladder, factory);
	return container !== undefined && container.has(leafKey(ladder));
};

/**
 * Store a value at a ladder, creating intermediate mappings as needed.
 * `undefined` removes the key instead. At the root ladder a mapping value
 * replaces the root's entries and `undefined` clears it.
 *
 * @returns true if the tree changed
 */
export const setAt = (
	root: TreeMapping,
	ladder: PathLadder,
	value: unknown,
	factory: ContainerFactory,
): boolean => {
	if (isRootPath(ladder)) {
		const hadEntries = root.size > 0;
		root.clear();
		if (isMapping(value)) {
			for (const [key, child] of value) {
				root.set(key, child);
			}
			return true;
		}
		return hadEntries;
	}

	const key = leafKey(ladder);
	if (value === undefined) {
		const container = traverse(root, false, ladder, factory);
		return container !== undefined && container.delete(key);
	}

	const container = traverse(root, true, ladder, factory);
	// traverse only returns undefined when create is false
	if (container === undefined) {
		return false;
	}
	container.set(key, value);
	return true;
};

/**
 * Keys of the mapping at a ladder, or undefined when nothing there is a
 * mapping. The reserved type-identifier key is left out.
 */
export const keysAt = (
	root: TreeMapping,
	ladder: PathLadder,
	factory: ContainerFactory,
): ReadonlyArray<string> | undefined => {
	const value = getAt(root, ladder, factory);
	return isMapping(value)
		? Array.from(value.keys()).filter((key) => key !== TAGGED_KEY)
		: undefined;
};

/**
 * Replace a sequence root's contents wholesale, keeping its identity.
 */
export const replaceSeries = (
	root: TreeSequence,
	values: ReadonlyArray<unknown>,
): void => {
	root.splice(0, root.length, ...values);
};
