import { toRenderable } from "../serialization/debug-string.js";
import { isMapping, isSequence } from "../tree/document-value.js";
import type { TreeRoot } from "../tree/document-tree.js";
import { isBlank, plainContainers, type FormatAdapter } from "./format-adapter.js";

/**
 * Options for the JSON adapter.
 */
export interface JsonAdapterOptions {
	readonly indent?: number;
}

/**
 * Re-indent compact JSON text.
 *
 * A line break and indentation follow every `{`, `[` and `,`; closing
 * brackets are dedented onto their own line and keys are followed by `": "`.
 * Brackets and commas inside string literals are copied as-is, including
 * escaped quotes. Whitespace outside strings is dropped. Empty containers
 * stay `{}` and `[]`.
 *
 * @example
 * prettyPrintJson('{"a":[1,2]}', 2)
 * // {
 * //   "a": [
 * //     1,
 * //     2
 * //   ]
 * // }
 */
export const prettyPrintJson = (compact: string, indent = 4): string => {
	const unit = " ".repeat(indent);
	let depth = 0;
	let inString = false;
	let escaped = false;
	let out = "";

	const newline = () => `\n${unit.repeat(depth)}`;

	for (let i = 0; i < compact.length; i++) {
		const ch = compact[i];

		if (inString) {
			out += ch;
			if (escaped) {
				escaped = false;
			} else if (ch === "\\") {
				escaped = true;
			} else if (ch === '"') {
				inString = false;
			}
			continue;
		}

		switch (ch) {
			case '"':
				inString = true;
				out += ch;
				break;
			case "{":
			case "[": {
				const close = ch === "{" ? "}" : "]";
				if (compact[i + 1] === close) {
					out += ch + close;
					i++;
					break;
				}
				depth++;
				out += ch + newline();
				break;
			}
			case "}":
			case "]":
				depth--;
				out += newline() + ch;
				break;
			case ",":
				out += ch + newline();
				break;
			case ":":
				out += ": ";
				break;
			case " ":
			case "\t":
			case "\n":
			case "\r":
				break;
			default:
				out += ch;
		}
	}

	return out;
};

// ============================================================================
// Ordered reading and writing
// ============================================================================

const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const WHITESPACE = /[ \t\n\r]*/y;

/**
 * Walks JSON text that `JSON.parse` has already accepted, building mappings
 * as `Map`s so keys keep their textual order. String and number tokens are
 * decoded by `JSON.parse` and `Number` themselves.
 */
class OrderedReader {
	private position = 0;

	constructor(private readonly text: string) {}

	read(): unknown {
		const value = this.value();
		this.skipWhitespace();
		return value;
	}

	private skipWhitespace(): void {
		WHITESPACE.lastIndex = this.position;
		WHITESPACE.test(this.text);
		this.position = WHITESPACE.lastIndex;
	}

	private value(): unknown {
		this.skipWhitespace();
		const ch = this.text[this.position];
		switch (ch) {
			case "{":
				return this.mapping();
			case "[":
				return this.sequence();
			case '"':
				return this.string();
			case "t":
				this.position += 4;
				return true;
			case "f":
				this.position += 5;
				return false;
			case "n":
				this.position += 4;
				return null;
			default:
				return this.number();
		}
	}

	private mapping(): Map<string, unknown> {
		const result = new Map<string, unknown>();
		this.position++;
		this.skipWhitespace();
		if (this.text[this.position] === "}") {
			this.position++;
			return result;
		}
		for (;;) {
			this.skipWhitespace();
			const key = this.string();
			this.skipWhitespace();
			this.position++; // ":"
			result.set(key, this.value());
			this.skipWhitespace();
			if (this.text[this.position++] === "}") {
				return result;
			}
		}
	}

	private sequence(): Array<unknown> {
		const result: Array<unknown> = [];
		this.position++;
		this.skipWhitespace();
		if (this.text[this.position] === "]") {
			this.position++;
			return result;
		}
		for (;;) {
			result.push(this.value());
			this.skipWhitespace();
			if (this.text[this.position++] === "]") {
				return result;
			}
		}
	}

	private string(): string {
		const start = this.position;
		let end = start + 1;
		while (this.text[end] !== '"') {
			end += this.text[end] === "\\" ? 2 : 1;
		}
		this.position = end + 1;
		const decoded: unknown = JSON.parse(this.text.slice(start, end + 1));
		return String(decoded);
	}

	private number(): number {
		NUMBER.lastIndex = this.position;
		const match = NUMBER.exec(this.text);
		if (match === null) {
			throw new Error(`Unexpected token at position ${this.position}`);
		}
		this.position = NUMBER.lastIndex;
		return Number(match[0]);
	}
}

/**
 * Parse JSON text with mappings as insertion-ordered `Map`s.
 *
 * @example
 * parseOrdered('{"b": 1, "10": 2}') // Map { "b" => 1, "10" => 2 }
 */
export const parseOrdered = (text: string): unknown => {
	JSON.parse(text);
	return new OrderedReader(text).read();
};

/**
 * Compact JSON for a renderable value, writing `Map` entries in order.
 */
export const stringifyOrdered = (value: unknown): string => {
	if (isMapping(value)) {
		const members = Array.from(
			value,
			([key, child]) => `${JSON.stringify(key)}:${stringifyOrdered(child)}`,
		);
		return `{${members.join(",")}}`;
	}
	if (isSequence(value)) {
		return `[${value.map((element) => stringifyOrdered(element)).join(",")}]`;
	}
	return JSON.stringify(value);
};

const toRoot = (parsed: unknown): TreeRoot => {
	if (isMapping(parsed) || isSequence(parsed)) {
		return parsed;
	}
	throw new Error(
		`Expected an object or array at the document root, got ${parsed === null ? "null" : typeof parsed}`,
	);
};

/**
 * Creates a JSON adapter. Output is indented by `prettyPrintJson` and ends
 * with a newline. Key order is kept in both directions.
 *
 * @example
 * ```typescript
 * const adapter = jsonAdapter({ indent: 2 })
 * const layer = makeFormatRegistryLayer([adapter])
 * ```
 */
export const jsonAdapter = (options?: JsonAdapterOptions): FormatAdapter => {
	const indent = options?.indent ?? 4;

	return {
		...plainContainers,
		name: "json",
		extensions: ["json"],
		parse: (text) =>
			isBlank(text) ? new Map() : toRoot(parseOrdered(text)),
		render: (root) =>
			`${prettyPrintJson(stringifyOrdered(toRenderable(root)), indent)}\n`,
	};
};
