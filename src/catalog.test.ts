import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TaskCatalog } from "./catalog/catalog.js";
import { multiplyRandomMatrices, primesUpTo, randomFileIo, sortRandomArray } from "./catalog/benchmarks.js";
import { loadTaskSet, parseTaskSet, shuffleTasks } from "./scheduling/task-set.js";
import { ConfigError, ExecutionError } from "./errors.js";

test("sieve returns the primes up to and including the bound", () => {
  assert.deepEqual(primesUpTo(30), [2, 3, 5, 7, 11, 13, 17, 19, 23, 29]);
  assert.deepEqual(primesUpTo(1), []);
  assert.equal(primesUpTo(7).at(-1), 7);
});

test("matmul produces an n x n result", () => {
  const result = multiplyRandomMatrices(4);
  assert.equal(result.length, 4);
  for (const row of result) assert.equal(row.length, 4);
});

test("array sort returns ascending values", () => {
  const sorted = sortRandomArray(500);
  assert.equal(sorted.length, 500);
  for (let i = 1; i < sorted.length; i++) assert.ok(sorted[i - 1] <= sorted[i]);
});

test("file io touches whole chunks of an existing file", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "benchmesh-io-"));
  const file = path.join(dir, "data.bin");
  await writeFile(file, Buffer.alloc(4096, 7));
  try {
    const bytes = await randomFileIo(file, 3);
    assert.equal(bytes, 3 * 4096);
    // Every byte is the same value, so reversing chunks leaves the content unchanged.
    assert.deepEqual(await readFile(file), Buffer.alloc(4096, 7));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("catalog knows the four benchmark task types", () => {
  const catalog = new TaskCatalog();
  assert.deepEqual(
    catalog.list().map((d) => d.type),
    ["matmul", "primes", "array", "fileIO"]
  );
  assert.equal(catalog.has("primes"), true);
  assert.equal(catalog.has("render"), false);
  assert.deepEqual(catalog.defaultParameters("matmul"), { size: 425 });
});

test("catalog executes a task and returns elapsed seconds", async () => {
  const catalog = new TaskCatalog();
  const elapsed = await catalog.execute("primes", { max_n: 1000 });
  assert.equal(typeof elapsed, "number");
  assert.ok(elapsed >= 0);
});

test("catalog rejects unknown types and bad parameters with ExecutionError", async () => {
  const catalog = new TaskCatalog();
  await assert.rejects(
    catalog.execute("render", {}),
    (err: unknown) => err instanceof ExecutionError && err.code === "unknown_task_type"
  );
  await assert.rejects(
    catalog.execute("matmul", {}),
    (err: unknown) => err instanceof ExecutionError && err.code === "invalid_parameters"
  );
  await assert.rejects(
    catalog.execute("array", { array_size: 2.5 }),
    (err: unknown) => err instanceof ExecutionError && err.code === "invalid_parameters"
  );
});

test("fileIO without a configured file fails as an ExecutionError", async () => {
  const catalog = new TaskCatalog();
  await assert.rejects(
    catalog.execute("fileIO", { num_rw: 1 }),
    (err: unknown) => err instanceof ExecutionError && err.code === "io_file_missing"
  );
});

test("fileIO on a missing path wraps the fs error", async () => {
  const catalog = new TaskCatalog({ ioFilePath: path.join(os.tmpdir(), "benchmesh-no-such-file.bin") });
  await assert.rejects(
    catalog.execute("fileIO", { num_rw: 1 }),
    (err: unknown) => err instanceof ExecutionError && err.code === "task_failed"
  );
});

// ── Task set seeding ───────────────────────────────────────────────────────

test("bundled task file seeds the thirteen-task mix with catalog defaults", async () => {
  const tasks = await loadTaskSet(new TaskCatalog());
  assert.equal(tasks.length, 13);
  const counts = new Map<string, number>();
  for (const t of tasks) counts.set(t.type, (counts.get(t.type) ?? 0) + 1);
  assert.deepEqual(Object.fromEntries(counts), { array: 3, fileIO: 2, matmul: 3, primes: 5 });
  assert.deepEqual(tasks[0], { type: "array", parameters: { array_size: 5_000_000 } });
  assert.ok(Object.isFrozen(tasks[0]));
  assert.ok(Object.isFrozen(tasks[0].parameters));
});

test("task entries may override parameters", () => {
  const tasks = parseTaskSet(new TaskCatalog(), {
    tasks: [{ type: "matmul", count: 2, parameters: { size: 16 } }, { type: "primes" }],
  });
  assert.deepEqual(tasks, [
    { type: "matmul", parameters: { size: 16 } },
    { type: "matmul", parameters: { size: 16 } },
    { type: "primes", parameters: { max_n: 2_400_000 } },
  ]);
});

test("malformed task files raise ConfigError", () => {
  const catalog = new TaskCatalog();
  assert.throws(() => parseTaskSet(catalog, []), ConfigError);
  assert.throws(() => parseTaskSet(catalog, { tasks: [{ type: "render" }] }), ConfigError);
  assert.throws(() => parseTaskSet(catalog, { tasks: [{ type: "matmul", count: -1 }] }), ConfigError);
  assert.throws(
    () => parseTaskSet(catalog, { tasks: [{ type: "matmul", parameters: { size: 0 } }] }),
    ConfigError
  );
});

test("shuffle keeps the multiset and does not touch the input", () => {
  const input = ["a", "b", "c", "d"];
  const shuffled = shuffleTasks(input, () => 0);
  assert.deepEqual(input, ["a", "b", "c", "d"]);
  assert.deepEqual(shuffled, ["b", "c", "d", "a"]);
});
