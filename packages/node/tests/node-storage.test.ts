import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StorageAdapter, type StorageAdapterShape } from "@strata/core";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	type NodeAdapterConfig,
	makeNodeStorageLayer,
} from "../src/node-adapter-layer.js";

// ============================================================================
// Helpers
// ============================================================================

let tempDir: string;

beforeEach(async () => {
	tempDir = join(tmpdir(), `strata-storage-${randomBytes(8).toString("hex")}`);
	await fs.mkdir(tempDir, { recursive: true });
});

afterEach(async () => {
	await fs.rm(tempDir, { recursive: true, force: true });
});

const withStorage = <A, E>(
	program: (storage: StorageAdapterShape) => Effect.Effect<A, E>,
	config: NodeAdapterConfig = { maxRetries: 0 },
) =>
	Effect.runPromise(
		Effect.flatMap(StorageAdapter, program).pipe(
			Effect.provide(makeNodeStorageLayer(config)),
		),
	);

// ============================================================================
// Node Storage Adapter Tests
// ============================================================================

describe("makeNodeStorageLayer", () => {
	it("writes and reads back a file, creating missing directories", async () => {
		const path = join(tempDir, "nested", "deeper", "doc.json");
		const text = await withStorage((storage) =>
			storage.write(path, '{"a": 1}').pipe(Effect.zipRight(storage.read(path))),
		);
		expect(text).toBe('{"a": 1}');
		expect(await fs.readFile(path, "utf-8")).toBe('{"a": 1}');
	});

	it("replaces a file without leaving temp files behind", async () => {
		const path = join(tempDir, "doc.yaml");
		await withStorage((storage) =>
			storage.write(path, "a: 1\n").pipe(Effect.zipRight(storage.write(path, "a: 2\n"))),
		);
		expect(await fs.readFile(path, "utf-8")).toBe("a: 2\n");
		expect(await fs.readdir(tempDir)).toEqual(["doc.yaml"]);
	});

	it("reports whether a file exists and removes it", async () => {
		const path = join(tempDir, "gone.json");
		const result = await withStorage((storage) =>
			Effect.gen(function* () {
				const before = yield* storage.exists(path);
				yield* storage.write(path, "{}");
				const written = yield* storage.exists(path);
				yield* storage.remove(path);
				const after = yield* storage.exists(path);
				return { before, written, after };
			}),
		);
		expect(result).toEqual({ before: false, written: true, after: false });
	});

	it("fails a read of a missing file with StorageError", async () => {
		const path = join(tempDir, "missing.json");
		const error = await withStorage((storage) => Effect.flip(storage.read(path)));
		expect(error._tag).toBe("StorageError");
		expect(error.operation).toBe("read");
		expect(error.path).toBe(path);
	});

	it("fails a removal of a missing file", async () => {
		const error = await withStorage((storage) =>
			Effect.flip(storage.remove(join(tempDir, "missing.json"))),
		);
		expect(error.operation).toBe("delete");
	});

	it("leaves missing directories alone when told to", async () => {
		const path = join(tempDir, "absent", "doc.json");
		const error = await withStorage((storage) => Effect.flip(storage.write(path, "{}")), {
			maxRetries: 0,
			createMissingDirectories: false,
		});
		expect(error.operation).toBe("write");
		expect(await fs.readdir(tempDir)).toEqual([]);
	});

	it("creates the parent directory of a path", async () => {
		const path = join(tempDir, "made", "doc.json");
		await withStorage((storage) => storage.ensureDir(path));
		const stat = await fs.stat(join(tempDir, "made"));
		expect(stat.isDirectory()).toBe(true);
	});

	it("retries a failing read before giving up", async () => {
		const path = join(tempDir, "late.json");
		const started = Date.now();
		const error = await withStorage((storage) => Effect.flip(storage.read(path)), {
			maxRetries: 2,
			baseDelay: 10,
		});
		expect(error.operation).toBe("read");
		expect(Date.now() - started).toBeGreaterThanOrEqual(25);
	});
});
