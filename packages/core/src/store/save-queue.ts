import {
	type Duration,
	Effect,
	Fiber,
	Ref,
	type Scope,
	SynchronizedRef,
} from "effect";

// ============================================================================
// SaveQueue: coalescing background saves
// ============================================================================

export interface SaveQueue {
	/**
	 * Queue a save. A schedule while another save is still pending is
	 * absorbed by it. Once the queue has shut down, the save runs on the
	 * caller's fiber instead.
	 */
	readonly schedule: Effect.Effect<void>;
	/**
	 * Wait for every save scheduled so far to finish.
	 */
	readonly flush: Effect.Effect<void>;
	/**
	 * Whether a save is waiting to start.
	 */
	readonly isPending: Effect.Effect<boolean>;
}

export interface SaveQueueOptions {
	/** Wait before a queued save starts. Default: 0 */
	readonly delay?: Duration.DurationInput;
	/** Annotations for the log entry of a failed save. */
	readonly annotations?: Readonly<Record<string, unknown>>;
}

/**
 * Creates a SaveQueue for one store. Saves run one at a time, in the order
 * they were queued; each waits for the previous one before starting.
 *
 * Failures of background saves are logged once here, never propagated. When
 * the scope closes, the queue stops forking and flushes what is already
 * queued.
 */
export const makeSaveQueue = <E>(
	save: Effect.Effect<void, E>,
	options: SaveQueueOptions = {},
): Effect.Effect<SaveQueue, never, Scope.Scope> =>
	Effect.gen(function* () {
		const delay = options.delay ?? 0;
		const pending = yield* Ref.make(false);
		const closed = yield* Ref.make(false);
		const tail = yield* SynchronizedRef.make<
			Fiber.RuntimeFiber<void> | undefined
		>(undefined);

		const logged = save.pipe(
			Effect.catchAllCause((cause) =>
				Effect.logError("Background save failed", cause).pipe(
					Effect.annotateLogs(options.annotations ?? {}),
				),
			),
		);

		const job = (previous: Fiber.RuntimeFiber<void> | undefined) =>
			Effect.gen(function* () {
				if (previous !== undefined) {
					yield* Fiber.await(previous);
				}
				yield* Effect.sleep(delay);
				yield* Ref.set(pending, false);
				yield* logged;
			});

		const flush = Effect.gen(function* () {
			const last = yield* SynchronizedRef.get(tail);
			if (last !== undefined) {
				yield* Fiber.await(last);
			}
		});

		const schedule = Effect.gen(function* () {
			if (yield* Ref.get(closed)) {
				yield* logged;
				return;
			}
			const claimed = yield* Ref.modify(pending, (isPending) => [
				!isPending,
				true,
			]);
			if (!claimed) {
				return;
			}
			yield* SynchronizedRef.updateEffect(tail, (previous) =>
				Effect.forkDaemon(job(previous)),
			);
		});

		yield* Effect.addFinalizer(() =>
			Ref.set(closed, true).pipe(Effect.zipRight(flush)),
		);

		return {
			schedule,
			flush,
			isPending: Ref.get(pending),
		} satisfies SaveQueue;
	});
