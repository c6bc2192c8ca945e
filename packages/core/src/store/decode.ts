import { Effect, Schema } from "effect";
import { TypeMismatchError } from "../errors/store-errors.js";

/**
 * Decode a value read from a path, failing with TypeMismatchError when it
 * does not fit the schema.
 */
export const decodeAs = <A, I>(
	path: string,
	schema: Schema.Schema<A, I, never>,
	value: unknown,
): Effect.Effect<A, TypeMismatchError> =>
	Schema.decodeUnknown(schema)(value).pipe(
		Effect.mapError(
			(error) =>
				new TypeMismatchError({
					path,
					expected: String(schema.ast),
					message: `Value at '${path}' does not match ${String(schema.ast)}: ${error.message}`,
				}),
		),
	);
