import { Effect, type Schema } from "effect";
import type {
	IllegalUsageError,
	PathOperationError,
	TypeMismatchError,
} from "../errors/store-errors.js";
import { decodeAs } from "./decode.js";
import type { DocumentStore } from "./document-store.js";
import { type RunnableEffect, withRunPromise } from "./runnable.js";

/**
 * A path and its default, bound to one store. Pass it around instead of
 * repeating the path.
 *
 * @example
 * ```typescript
 * const port = store.view("server.port", 8080)
 * yield* port.set(9090)
 * const current = yield* port.as(Schema.Number)
 * ```
 */
export interface MutableView {
	readonly path: string;
	readonly defaultValue: unknown;
	readonly get: () => RunnableEffect<unknown, PathOperationError>;
	readonly set: (
		value: unknown,
	) => RunnableEffect<void, PathOperationError | IllegalUsageError>;
	readonly isSet: () => RunnableEffect<boolean, PathOperationError>;
	/** The value, or the default when unset, decoded with a schema. */
	readonly as: <A, I>(
		schema: Schema.Schema<A, I, never>,
	) => RunnableEffect<A, PathOperationError | TypeMismatchError>;
}

export const makeMutableView = (
	store: DocumentStore,
	path: string,
	defaultValue?: unknown,
): MutableView => ({
	path,
	defaultValue,
	get: () => store.get(path, defaultValue),
	set: (value) => store.set(path, value),
	isSet: () => store.isSet(path),
	as: (schema) =>
		withRunPromise(
			Effect.flatMap(store.get(path, defaultValue), (value) =>
				decodeAs(path, schema, value),
			),
		),
});
