import { describe, expect, it } from "vitest";
import { plainContainers } from "../src/formats/format-adapter.js";
import {
	getAt,
	isSeries,
	isSetAt,
	keysAt,
	replaceSeries,
	setAt,
	traverse,
	type TreeMapping,
} from "../src/tree/document-tree.js";
import { plain, tree } from "./helpers.js";

const factory = plainContainers;

const rootOf = (value: Record<string, unknown>): TreeMapping =>
	new Map(
		Object.entries(value).map(([key, child]): [string, unknown] => [
			key,
			tree(child),
		]),
	);

describe("traverse", () => {
	it("creates missing intermediates when asked to", () => {
		const root = rootOf({});
		const container = traverse(root, true, ["a", "b", "c"], factory);
		expect(container).toEqual(new Map());
		expect(plain(root)).toEqual({ a: { b: {} } });
	});

	it("gives up on a missing intermediate without create", () => {
		const root = rootOf({ a: {} });
		expect(traverse(root, false, ["a", "b", "c"], factory)).toBeUndefined();
		expect(plain(root)).toEqual({ a: {} });
	});

	it("replaces a scalar intermediate when creating", () => {
		const root = rootOf({ a: 5 });
		traverse(root, true, ["a", "b"], factory);
		expect(plain(root)).toEqual({ a: {} });
	});

	it("stops at a scalar intermediate without create", () => {
		const root = rootOf({ a: 5 });
		expect(traverse(root, false, ["a", "b"], factory)).toBeUndefined();
	});
});

describe("getAt / setAt / isSetAt", () => {
	it("creates intermediate mappings on set", () => {
		const root = rootOf({});
		expect(setAt(root, ["a", "b", "c"], 5, factory)).toBe(true);
		expect(getAt(root, ["a", "b", "c"], factory)).toBe(5);
		expect(plain(getAt(root, ["a", "b"], factory))).toEqual({ c: 5 });
	});

	it("removes a key when given undefined", () => {
		const root = rootOf({ a: { b: 1, c: 2 } });
		expect(setAt(root, ["a", "b"], undefined, factory)).toBe(true);
		expect(isSetAt(root, ["a", "b"], factory)).toBe(false);
		expect(plain(root)).toEqual({ a: { c: 2 } });
	});

	it("does not create intermediates when removing", () => {
		const root = rootOf({});
		expect(setAt(root, ["x", "y"], undefined, factory)).toBe(false);
		expect(root.size).toBe(0);
	});

	it("reports missing keys as unset", () => {
		const root = rootOf({ a: { b: null } });
		expect(isSetAt(root, ["a", "b"], factory)).toBe(true);
		expect(isSetAt(root, ["a", "z"], factory)).toBe(false);
		expect(isSetAt(root, ["q", "r", "s"], factory)).toBe(false);
		expect(getAt(root, ["q", "r", "s"], factory)).toBeUndefined();
	});

	it("does not see inherited properties", () => {
		const root = rootOf({});
		expect(isSetAt(root, ["toString"], factory)).toBe(false);
		expect(getAt(root, ["hasOwnProperty"], factory)).toBeUndefined();
	});

	it("treats the root ladder as the whole document", () => {
		const root = rootOf({ a: 1 });
		expect(getAt(root, [""], factory)).toBe(root);
		expect(isSetAt(root, [""], factory)).toBe(true);

		expect(setAt(root, [""], tree({ b: 2 }), factory)).toBe(true);
		expect(plain(root)).toEqual({ b: 2 });

		expect(setAt(root, [""], undefined, factory)).toBe(true);
		expect(root.size).toBe(0);
		expect(setAt(root, [""], undefined, factory)).toBe(false);
	});

	it("lists keys of the mapping at a ladder", () => {
		const root = rootOf({ a: { x: 1, y: 2 }, b: 3 });
		expect(keysAt(root, [""], factory)).toEqual(["a", "b"]);
		expect(keysAt(root, ["a"], factory)).toEqual(["x", "y"]);
		expect(keysAt(root, ["b"], factory)).toBeUndefined();
	});

	it("keeps integer-like keys where they were inserted", () => {
		const root = rootOf({});
		setAt(root, ["m", "b"], 1, factory);
		setAt(root, ["m", "10"], 2, factory);
		setAt(root, ["m", "a"], 3, factory);
		expect(keysAt(root, ["m"], factory)).toEqual(["b", "10", "a"]);
	});

	it("leaves the type identifier key out of the key list", () => {
		const root = rootOf({});
		setAt(
			root,
			["x"],
			new Map<string, unknown>([
				["==", "com.example.Point"],
				["cx", 1],
				["cy", 2],
			]),
			factory,
		);
		expect(keysAt(root, ["x"], factory)).toEqual(["cx", "cy"]);
	});
});

describe("sequence roots", () => {
	it("recognizes a sequence root", () => {
		expect(isSeries([])).toBe(true);
		expect(isSeries(new Map())).toBe(false);
	});

	it("replaces contents in place", () => {
		const root = [1, 2, 3];
		const same = root;
		replaceSeries(root, ["a"]);
		expect(same).toEqual(["a"]);
	});
});
