import { XMLBuilder, XMLParser } from "fast-xml-parser";
import { toRenderable } from "../serialization/debug-string.js";
import { isMapping } from "../tree/document-value.js";
import type { TreeRoot } from "../tree/document-tree.js";
import { isBlank, plainContainers, type FormatAdapter } from "./format-adapter.js";

/**
 * Options for the XML adapter.
 */
export interface XmlAdapterOptions {
	readonly indent?: number;
	readonly rootName?: string;
}

// ============================================================================
// Element layout
// ============================================================================
//
//   <document>
//       <name>Alice</name>
//       <age type="number">30</age>
//       <tags type="sequence">
//           <item>a</item>
//       </tags>
//       <entry key="==">geo.Point</entry>
//   </document>
//
// Strings carry no type attribute. A key that is not a valid element name is
// written as <entry key="...">.

const DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const TEXT = "#text";
const ATTRIBUTES = ":@";
const ATTR_PREFIX = "@_";
const ENTRY = "entry";
const ITEM = "item";

type ValueType = "number" | "boolean" | "null" | "mapping" | "sequence";

type OrderedNode = Record<string, unknown>;

const ELEMENT_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export const isXmlName = (key: string): boolean =>
	ELEMENT_NAME.test(key) && !key.toLowerCase().startsWith("xml");

// ============================================================================
// Rendering
// ============================================================================

const typed = (
	name: string,
	children: Array<OrderedNode>,
	type: ValueType | undefined,
	key?: string,
): OrderedNode => {
	const attributes: Record<string, string> = {};
	if (key !== undefined) {
		attributes[`${ATTR_PREFIX}key`] = key;
	}
	if (type !== undefined) {
		attributes[`${ATTR_PREFIX}type`] = type;
	}
	const node: OrderedNode = { [name]: children };
	if (Object.keys(attributes).length > 0) {
		node[ATTRIBUTES] = attributes;
	}
	return node;
};

const text = (value: string): Array<OrderedNode> =>
	value.length === 0 ? [] : [{ [TEXT]: value }];

const toElement = (name: string, value: unknown, key?: string): OrderedNode => {
	if (value === null) {
		return typed(name, [], "null", key);
	}
	if (typeof value === "number") {
		return typed(name, text(String(value)), "number", key);
	}
	if (typeof value === "boolean") {
		return typed(name, text(String(value)), "boolean", key);
	}
	if (Array.isArray(value)) {
		return typed(
			name,
			value.map((element: unknown) => toElement(ITEM, element)),
			"sequence",
			key,
		);
	}
	if (isMapping(value)) {
		return typed(name, mappingChildren(value), "mapping", key);
	}
	return typed(name, text(String(value)), undefined, key);
};

const mappingChildren = (
	mapping: ReadonlyMap<string, unknown>,
): Array<OrderedNode> =>
	Array.from(mapping, ([key, child]) =>
		isXmlName(key) ? toElement(key, child) : toElement(ENTRY, child, key),
	);

// ============================================================================
// Parsing
// ============================================================================

const isOrderedNode = (value: unknown): value is OrderedNode =>
	typeof value === "object" && value !== null && !Array.isArray(value);

// processing instructions come through as "?name" keys
const elementName = (node: OrderedNode): string | undefined =>
	Object.keys(node).find(
		(key) => key !== ATTRIBUTES && key !== TEXT && !key.startsWith("?"),
	);

const childNodes = (node: OrderedNode, name: string): Array<OrderedNode> => {
	const children = node[name];
	return Array.isArray(children) ? children.filter(isOrderedNode) : [];
};

const attribute = (node: OrderedNode, name: string): string | undefined => {
	const attributes = node[ATTRIBUTES];
	if (!isOrderedNode(attributes)) {
		return undefined;
	}
	const value = attributes[`${ATTR_PREFIX}${name}`];
	return value === undefined ? undefined : String(value);
};

const elements = (children: ReadonlyArray<OrderedNode>): Array<OrderedNode> =>
	children.filter((child) => elementName(child) !== undefined);

const textContent = (children: ReadonlyArray<OrderedNode>): string =>
	children
		.filter((child) => TEXT in child)
		.map((child) => String(child[TEXT]))
		.join("");

const fromElement = (node: OrderedNode, name: string): unknown => {
	const children = childNodes(node, name);
	const type = attribute(node, "type");
	switch (type) {
		case "null":
			return null;
		case "number":
			return Number(textContent(children).trim());
		case "boolean":
			return textContent(children).trim() === "true";
		case "sequence":
			return fromItems(children);
		case "mapping":
			return fromEntries(children);
		case undefined:
			return elements(children).length > 0
				? fromEntries(children)
				: textContent(children);
		default:
			throw new Error(`Unknown value type '${type}' on <${name}>`);
	}
};

const fromItems = (children: ReadonlyArray<OrderedNode>): Array<unknown> =>
	elements(children).flatMap((child) => {
		const name = elementName(child);
		return name === undefined ? [] : [fromElement(child, name)];
	});

const fromEntries = (
	children: ReadonlyArray<OrderedNode>,
): Map<string, unknown> => {
	const mapping = new Map<string, unknown>();
	for (const child of elements(children)) {
		const name = elementName(child);
		if (name === undefined) {
			continue;
		}
		const key = name === ENTRY ? (attribute(child, "key") ?? name) : name;
		mapping.set(key, fromElement(child, name));
	}
	return mapping;
};

/**
 * Creates an XML adapter backed by fast-xml-parser in ordered mode, so
 * element order round-trips.
 *
 * @example
 * ```typescript
 * const adapter = xmlAdapter({ indent: 2, rootName: "settings" })
 * const layer = makeFormatRegistryLayer([adapter])
 * ```
 */
export const xmlAdapter = (options?: XmlAdapterOptions): FormatAdapter => {
	const indent = options?.indent ?? 4;
	const rootName = options?.rootName ?? "document";

	const parser = new XMLParser({
		preserveOrder: true,
		ignoreAttributes: false,
		attributeNamePrefix: ATTR_PREFIX,
		parseTagValue: false,
		parseAttributeValue: false,
		trimValues: false,
		ignoreDeclaration: true,
	});

	const builder = new XMLBuilder({
		preserveOrder: true,
		ignoreAttributes: false,
		attributeNamePrefix: ATTR_PREFIX,
		format: true,
		indentBy: " ".repeat(indent),
		suppressEmptyNode: true,
	});

	return {
		...plainContainers,
		name: "xml",
		extensions: ["xml"],
		parse: (source): TreeRoot => {
			if (isBlank(source)) {
				return new Map();
			}
			const parsed: unknown = parser.parse(source, true);
			const nodes = Array.isArray(parsed) ? parsed.filter(isOrderedNode) : [];
			const root = elements(nodes)[0];
			const name = root === undefined ? undefined : elementName(root);
			if (root === undefined || name === undefined) {
				return new Map();
			}
			const children = childNodes(root, name);
			return attribute(root, "type") === "sequence"
				? fromItems(children)
				: fromEntries(children);
		},
		render: (root) => {
			const renderable = toRenderable(root);
			const children = Array.isArray(renderable)
				? renderable.map((element: unknown) => toElement(ITEM, element))
				: isMapping(renderable)
					? mappingChildren(renderable)
					: [];
			const document = typed(
				rootName,
				children,
				Array.isArray(renderable) ? "sequence" : undefined,
			);
			const body = String(builder.build([document])).trim();
			return `${DECLARATION}\n${body}\n`;
		},
	};
};
