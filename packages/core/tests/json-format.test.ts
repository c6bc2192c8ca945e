import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
	jsonAdapter,
	parseOrdered,
	prettyPrintJson,
	stringifyOrdered,
} from "../src/formats/json.js";
import { keysOf, plain, tree } from "./helpers.js";

describe("prettyPrintJson", () => {
	it("lays out nested containers", () => {
		expect(prettyPrintJson('{"a":[1,2]}', 2)).toBe(
			'{\n  "a": [\n    1,\n    2\n  ]\n}',
		);
	});

	it("keeps empty containers on one line", () => {
		expect(prettyPrintJson('{"a":{},"b":[]}', 4)).toBe(
			'{\n    "a": {},\n    "b": []\n}',
		);
	});

	it("copies brackets, commas and escaped quotes inside strings", () => {
		const compact = JSON.stringify({ "k,{": 'say "hi", [ok]: \\' });
		expect(prettyPrintJson(compact, 2)).toBe(
			'{\n  "k,{": "say \\"hi\\", [ok]: \\\\"\n}',
		);
	});

	it("matches JSON.stringify for any value and indent", () => {
		fc.assert(
			fc.property(fc.jsonValue(), fc.integer({ min: 1, max: 8 }), (value, indent) => {
				expect(prettyPrintJson(JSON.stringify(value), indent)).toBe(
					JSON.stringify(value, null, indent),
				);
			}),
		);
	});
});

describe("jsonAdapter", () => {
	const adapter = jsonAdapter();

	it("renders with four-space indentation and a trailing newline", () => {
		expect(adapter.render({ a: 1, b: [true, null], c: {} })).toBe(
			'{\n    "a": 1,\n    "b": [\n        true,\n        null\n    ],\n    "c": {}\n}\n',
		);
	});

	it("honors a custom indent", () => {
		expect(jsonAdapter({ indent: 2 }).render({ a: { b: 1 } })).toBe(
			'{\n  "a": {\n    "b": 1\n  }\n}\n',
		);
	});

	it("reads blank text as an empty mapping", () => {
		expect(adapter.parse("")).toEqual(new Map());
		expect(adapter.parse("  \n\t")).toEqual(new Map());
	});

	it("reads a sequence root", () => {
		expect(adapter.parse("[1, 2]")).toEqual([1, 2]);
	});

	it("rejects a scalar root", () => {
		expect(() => adapter.parse("42")).toThrow(
			"Expected an object or array at the document root, got number",
		);
		expect(() => adapter.parse("null")).toThrow(
			"Expected an object or array at the document root, got null",
		);
	});

	it("writes values it cannot encode as debug strings", () => {
		const rendered = adapter.render({ when: new Date(0) });
		expect(rendered).toMatch(/^\{\n {4}"when": "Date@[0-9a-f]+"\n\}\n$/);
	});

	it("drops undefined entries", () => {
		expect(adapter.render({ a: undefined, b: 1 })).toBe('{\n    "b": 1\n}\n');
	});

	it("keeps key order through parse and render", () => {
		const parsed = adapter.parse('{"b": 1, "10": 2, "a": 3}');
		expect(keysOf(parsed)).toEqual(["b", "10", "a"]);
		expect(adapter.render(parsed)).toBe(
			'{\n    "b": 1,\n    "10": 2,\n    "a": 3\n}\n',
		);
	});

	it("keeps nested key order inside sequences", () => {
		const parsed = adapter.parse('[{"z": {"2": true, "1": false}}]');
		const first = Array.isArray(parsed) ? parsed[0] : undefined;
		const inner = first instanceof Map ? first.get("z") : undefined;
		expect(keysOf(inner)).toEqual(["2", "1"]);
	});

	it("renders identically after a round trip", () => {
		const text = adapter.render({ name: "Alice", scores: [1, 2.5], meta: { ok: false } });
		expect(adapter.render(adapter.parse(text))).toBe(text);
	});
});

describe("parseOrdered", () => {
	it("decodes escapes, numbers and literals", () => {
		const parsed = parseOrdered(
			' { "s" : "a\\"b\\\\c\\u00e9" , "n" : -1.5e2 , "t" : true , "f" : false , "z" : null , "e" : [ ] } ',
		);
		expect(plain(parsed)).toEqual({
			s: 'a"b\\c\u00e9',
			n: -150,
			t: true,
			f: false,
			z: null,
			e: [],
		});
	});

	it("rejects what JSON.parse rejects", () => {
		expect(() => parseOrdered('{"a": 1,}')).toThrow(SyntaxError);
	});

	it("reads the same values as JSON.parse", () => {
		fc.assert(
			fc.property(fc.jsonValue(), (value) => {
				const text = JSON.stringify(value);
				expect(plain(parseOrdered(text))).toEqual(JSON.parse(text));
			}),
		);
	});
});

describe("stringifyOrdered", () => {
	it("writes Map entries in insertion order", () => {
		expect(
			stringifyOrdered(
				new Map<string, unknown>([
					["b", 1],
					["10", [true, null]],
				]),
			),
		).toBe('{"b":1,"10":[true,null]}');
	});

	it("matches JSON.stringify on the same entries", () => {
		fc.assert(
			fc.property(fc.jsonValue(), (value) => {
				expect(stringifyOrdered(tree(value))).toBe(JSON.stringify(value));
			}),
		);
	});
});
