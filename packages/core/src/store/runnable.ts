import { Effect } from "effect";

/**
 * An Effect with a `.runPromise` convenience getter, for callers outside
 * Effect. The getter runs the effect once and caches the promise.
 *
 * @example
 * ```typescript
 * const name = await store.get("user.name").runPromise
 * ```
 */
export type RunnableEffect<A, E> = Effect.Effect<A, E, never> & {
	readonly runPromise: Promise<A>;
};

/**
 * Attach a lazy `runPromise` getter to an Effect value.
 */
export const withRunPromise = <A, E>(
	effect: Effect.Effect<A, E, never>,
): RunnableEffect<A, E> => {
	let cached: Promise<A> | undefined;
	Object.defineProperty(effect, "runPromise", {
		get() {
			if (cached === undefined) {
				cached = Effect.runPromise(effect);
			}
			return cached;
		},
		enumerable: false,
		configurable: true,
	});
	return effect as RunnableEffect<A, E>;
};
