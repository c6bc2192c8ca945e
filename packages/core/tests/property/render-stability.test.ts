/**
 * Property-based tests for format adapters: rendering what an adapter parsed
 * gives the same text, and parsing what it rendered gives the same tree,
 * key order included.
 */
import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import type { FormatAdapter } from "../../src/formats/format-adapter.js";
import { jsonAdapter, stringifyOrdered } from "../../src/formats/json.js";
import { xmlAdapter } from "../../src/formats/xml.js";
import { yamlAdapter } from "../../src/formats/yaml.js";
import { document } from "./generators.js";

const adapters: ReadonlyArray<FormatAdapter> = [jsonAdapter(), yamlAdapter(), xmlAdapter()];

describe.each(adapters.map((adapter): [string, FormatAdapter] => [adapter.name, adapter]))(
	"%s render stability",
	(_name, adapter) => {
		it("renders its own parse output to the same text", () => {
			fc.assert(
				fc.property(document, (doc) => {
					const once = adapter.render(adapter.parse(adapter.render(doc)));
					const twice = adapter.render(adapter.parse(once));
					expect(twice).toBe(once);
				}),
			);
		});

		it("reads back the document it rendered, in order", () => {
			fc.assert(
				fc.property(document, (doc) => {
					const parsed = adapter.parse(adapter.render(doc));
					expect(parsed).toEqual(doc);
					expect(stringifyOrdered(parsed)).toBe(stringifyOrdered(doc));
				}),
			);
		});
	},
);
