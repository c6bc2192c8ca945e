import { Effect, Stream } from "effect";
import { describe, expect, it } from "vitest";
import { formatFromPath, makeFormatRegistry } from "../src/formats/format-registry.js";
import { jsonAdapter } from "../src/formats/json.js";
import { xmlAdapter } from "../src/formats/xml.js";
import { yamlAdapter } from "../src/formats/yaml.js";
import { makeLogCapture, plain } from "./helpers.js";

const registry = Effect.runSync(
	makeFormatRegistry([jsonAdapter(), yamlAdapter(), xmlAdapter()]),
);

describe("formatFromPath", () => {
	it("takes the lower-cased extension", () => {
		expect(formatFromPath("/data/Settings.YML")).toBe("yml");
		expect(formatFromPath("archive.tar.json")).toBe("json");
	});

	it("returns undefined without an extension", () => {
		expect(formatFromPath("/data/README")).toBeUndefined();
	});
});

describe("makeFormatRegistry", () => {
	it("lists format names in registration order", () => {
		expect(registry.formats).toEqual(["json", "yaml", "xml"]);
	});

	it("resolves names and extensions case-insensitively", () => {
		expect(Effect.runSync(registry.resolve("YML")).name).toBe("yaml");
		expect(Effect.runSync(registry.resolve("Json")).name).toBe("json");
	});

	it("fails for an unknown format", () => {
		const error = Effect.runSync(Effect.flip(registry.resolve("toml")));
		expect(error._tag).toBe("UnsupportedFormatError");
		expect(error.message).toBe(
			"Unsupported format 'toml'. Available formats: json, yaml, yml, xml",
		);
	});

	it("says so when nothing is registered", () => {
		const empty = Effect.runSync(makeFormatRegistry([]));
		const error = Effect.runSync(Effect.flip(empty.resolve("json")));
		expect(error.message).toBe("Unsupported format 'json'. No formats registered.");
	});

	it("wraps parse failures", () => {
		const error = Effect.runSync(Effect.flip(registry.parse("42", "json")));
		expect(error._tag).toBe("SerializationError");
		expect(error.message).toBe(
			"Failed to parse json data: Expected an object or array at the document root, got number",
		);
	});

	it("parses a stream of text chunks", () => {
		const root = Effect.runSync(
			registry.parseStream(Stream.make('{"a"', ":1}"), "json"),
		);
		expect(plain(root)).toEqual({ a: 1 });
	});

	it("parses a stream of bytes", () => {
		const bytes = new TextEncoder().encode("count: 3\n");
		const root = Effect.runSync(
			registry.parseStream(Stream.make(bytes.slice(0, 4), bytes.slice(4)), "yaml"),
		);
		expect(plain(root)).toEqual({ count: 3 });
	});

	it("passes stream failures through", () => {
		const error = Effect.runSync(
			Effect.flip(registry.parseStream(Stream.fail("disk gone"), "json")),
		);
		expect(error).toBe("disk gone");
	});

	it("renders through the named adapter", () => {
		expect(Effect.runSync(registry.render({ a: 1 }, "yml"))).toBe("a: 1\n");
	});

	it("warns when a later adapter takes over a name", () => {
		const capture = makeLogCapture();
		const replaced = Effect.runSync(
			makeFormatRegistry([jsonAdapter(), jsonAdapter({ indent: 2 })]).pipe(
				Effect.provide(capture.layer),
			),
		);
		expect(capture.logs).toEqual([
			{
				level: "WARN",
				message: "Duplicate format 'json': 'json' overwritten by 'json'",
				annotations: {},
			},
		]);
		expect(Effect.runSync(replaced.render({ a: 1 }, "json"))).toBe('{\n  "a": 1\n}\n');
	});
});
