/**
 * Dotted path parsing. A path is split into a "ladder" of segment keys; the
 * empty path addresses the root mapping itself.
 */

import { Effect } from "effect";
import { InvalidPathError } from "../errors/store-errors.js";
import { isMapping, isSequence, TAGGED_KEY } from "../tree/document-value.js";

export type PathLadder = ReadonlyArray<string>;

const FORBIDDEN_SEGMENTS: ReadonlySet<string> = new Set([
	"__proto__",
	"constructor",
	"prototype",
]);

/**
 * Split a dotted path into its segments.
 *
 * @example
 * splitPath("server.port") // ["server", "port"]
 * splitPath("") // [""]
 */
export const splitPath = (path: string): PathLadder => path.split(".");

/**
 * True for the ladder of the empty path, which means "the root" rather than
 * a child named "".
 */
export const isRootPath = (ladder: PathLadder): boolean =>
	ladder.length === 1 && ladder[0] === "";

/**
 * Split and validate a path. Empty inner segments ("a..b", ".a", "a."),
 * prototype-polluting segments and the tagged-object identifier key are
 * rejected.
 */
export const parsePath = (
	path: string,
): Effect.Effect<PathLadder, InvalidPathError> => {
	const ladder = splitPath(path);
	if (isRootPath(ladder)) {
		return Effect.succeed(ladder);
	}
	for (const segment of ladder) {
		if (segment === "") {
			return Effect.fail(
				new InvalidPathError({
					path,
					reason: "empty-segment",
					message: `Path '${path}' contains an empty segment`,
				}),
			);
		}
		if (FORBIDDEN_SEGMENTS.has(segment)) {
			return Effect.fail(
				new InvalidPathError({
					path,
					reason: "forbidden-segment",
					message: `Path '${path}' uses the reserved segment '${segment}'`,
				}),
			);
		}
		if (segment === TAGGED_KEY) {
			return Effect.fail(
				new InvalidPathError({
					path,
					reason: "reserved-key",
					message: `Path '${path}' addresses the type identifier key '${TAGGED_KEY}'`,
				}),
			);
		}
	}
	return Effect.succeed(ladder);
};

/**
 * Join segments back into a dotted path.
 */
export const joinPath = (ladder: PathLadder): string => ladder.join(".");

/**
 * Find the first mapping key inside `value` that contains a ".". Such a key
 * could be stored but never addressed again by path.
 *
 * @returns The dotted location of the offending key, or undefined if none.
 */
export const findDottedKey = (
	value: unknown,
	prefix = "",
): string | undefined => {
	if (isMapping(value)) {
		for (const [key, child] of value) {
			const location = prefix ? `${prefix}.${key}` : key;
			if (key.includes(".")) {
				return location;
			}
			const nested = findDottedKey(child, location);
			if (nested !== undefined) {
				return nested;
			}
		}
		return undefined;
	}
	if (isSequence(value)) {
		for (let i = 0; i < value.length; i++) {
			const nested = findDottedKey(value[i], prefix ? `${prefix}.${i}` : `${i}`);
			if (nested !== undefined) {
				return nested;
			}
		}
	}
	return undefined;
};
