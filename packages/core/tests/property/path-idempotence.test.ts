import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { plainContainers } from "../../src/formats/format-adapter.js";
import { stringifyOrdered } from "../../src/formats/json.js";
import { getAt, setAt, type TreeMapping } from "../../src/tree/document-tree.js";
import { key, scalar } from "./generators.js";

describe("path idempotence", () => {
	it("setting a value twice leaves the tree as setting it once", () => {
		fc.assert(
			fc.property(fc.array(key, { minLength: 1, maxLength: 4 }), scalar, (ladder, value) => {
				const root: TreeMapping = new Map();
				setAt(root, ladder, value, plainContainers);
				const once = stringifyOrdered(root);
				setAt(root, ladder, value, plainContainers);
				expect(stringifyOrdered(root)).toBe(once);
				expect(getAt(root, ladder, plainContainers)).toEqual(value);
			}),
		);
	});
});
