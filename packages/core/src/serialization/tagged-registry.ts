/**
 * Tagged-type registry: maps a type identifier string to the functions that
 * turn a domain value into a mapping and back.
 *
 * The registry is built once, when its Layer is constructed, and is
 * read-only afterwards. There is no unregister path.
 */

import { Context, Effect, Layer, Schema } from "effect";
import { DuplicateTaggedTypeError } from "../errors/store-errors.js";

// ============================================================================
// Type definitions
// ============================================================================

/**
 * A domain type that can describe itself as a mapping.
 *
 * `fromMapping` is the type's mapping constructor. It receives the stored
 * entries with the reserved identifier key already stripped. A type without
 * one can be written but not read back as a domain object.
 */
export interface TaggedType<A = unknown> {
	readonly identifier: string;
	is(value: unknown): value is A;
	toMapping(value: A): Readonly<Record<string, unknown>>;
	fromMapping?(mapping: Readonly<Record<string, unknown>>): A;
}

/**
 * A closed set of named members. Members are written as their name and read
 * back as that name.
 */
export interface EnumType {
	readonly identifier: string;
	readonly members: Readonly<Record<string, unknown>>;
}

/**
 * Define a tagged type from explicit functions.
 *
 * @example
 * ```typescript
 * class Point {
 *   constructor(readonly x: number, readonly y: number) {}
 * }
 *
 * const PointType = defineTaggedType({
 *   identifier: "geo.Point",
 *   is: (u): u is Point => u instanceof Point,
 *   toMapping: (p) => ({ x: p.x, y: p.y }),
 *   fromMapping: (m) => new Point(Number(m.x), Number(m.y)),
 * })
 * ```
 */
export const defineTaggedType = <A>(definition: TaggedType<A>): TaggedType<A> =>
	definition;

/**
 * Define a tagged type from an Effect Schema, typically a `Schema.Class`.
 *
 * Writing encodes the value through the schema; reading decodes the stored
 * entries, so a mapping that fails validation is reported as a failed
 * reconstruction.
 */
export const schemaTaggedType = <
	A,
	I extends { readonly [key: string]: unknown },
>(
	identifier: string,
	schema: Schema.Schema<A, I, never>,
): TaggedType<A> => {
	const is = Schema.is(schema);
	const encode = Schema.encodeSync(schema);
	const decode = Schema.decodeUnknownSync(schema);
	return {
		identifier,
		is: (value: unknown): value is A => is(value),
		toMapping: (value) => encode(value),
		fromMapping: (mapping) => decode(mapping),
	};
};

export const defineEnumType = (
	identifier: string,
	members: Readonly<Record<string, unknown>>,
): EnumType => ({ identifier, members });

// ============================================================================
// TaggedTypeRegistry Effect Service
// ============================================================================

export interface TaggedTypeRegistryShape {
	/** Find the type registered under an identifier. */
	readonly lookup: (identifier: string) => TaggedType | undefined;
	/** Find the first registered type that recognizes a value. */
	readonly match: (value: unknown) => TaggedType | undefined;
	/** The member name of a registered enum value. */
	readonly enumName: (value: unknown) => string | undefined;
	readonly identifiers: ReadonlyArray<string>;
}

export class TaggedTypeRegistry extends Context.Tag("TaggedTypeRegistry")<
	TaggedTypeRegistry,
	TaggedTypeRegistryShape
>() {}

/**
 * Build a registry from tagged and enum types. Identifiers must be unique
 * across both lists.
 */
export const makeTaggedTypeRegistry = (
	types: ReadonlyArray<TaggedType>,
	enums: ReadonlyArray<EnumType> = [],
): Effect.Effect<TaggedTypeRegistryShape, DuplicateTaggedTypeError> =>
	Effect.gen(function* () {
		const byIdentifier = new Map<string, TaggedType>();
		const seen = new Set<string>();

		const claim = (
			identifier: string,
		): Effect.Effect<void, DuplicateTaggedTypeError> =>
			seen.has(identifier)
				? Effect.fail(
						new DuplicateTaggedTypeError({
							identifier,
							message: `Tagged type '${identifier}' is registered more than once`,
						}),
					)
				: Effect.sync(() => {
						seen.add(identifier);
					});

		for (const type of types) {
			yield* claim(type.identifier);
			byIdentifier.set(type.identifier, type);
		}

		const enumNames = new Map<unknown, string>();
		for (const enumType of enums) {
			yield* claim(enumType.identifier);
			for (const [name, member] of Object.entries(enumType.members)) {
				enumNames.set(member, name);
			}
		}

		const ordered = Object.freeze([...types]);
		const identifiers = Object.freeze([...seen]);

		return {
			lookup: (identifier) => byIdentifier.get(identifier),
			match: (value) => ordered.find((type) => type.is(value)),
			enumName: (value) => {
				if (typeof value === "symbol") {
					return Symbol.keyFor(value) ?? value.description;
				}
				return enumNames.get(value);
			},
			identifiers,
		} satisfies TaggedTypeRegistryShape;
	});

/**
 * Creates a TaggedTypeRegistry Layer. Build it once at program start.
 */
export const makeTaggedTypeLayer = (
	types: ReadonlyArray<TaggedType>,
	enums: ReadonlyArray<EnumType> = [],
): Layer.Layer<TaggedTypeRegistry, DuplicateTaggedTypeError> =>
	Layer.effect(TaggedTypeRegistry, makeTaggedTypeRegistry(types, enums));

/**
 * A registry with no tagged types. Registered symbols still render as names.
 */
export const EmptyTaggedTypeLayer: Layer.Layer<TaggedTypeRegistry> =
	Layer.effect(
		TaggedTypeRegistry,
		makeTaggedTypeRegistry([]).pipe(Effect.orDie),
	);
