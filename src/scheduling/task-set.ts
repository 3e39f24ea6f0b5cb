import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { isRecord, isTaskType, type TaskSpec } from "../contracts.js";
import { ConfigError, errorMessage } from "../errors.js";
import type { TaskCatalog } from "../catalog/catalog.js";

export const DEFAULT_TASK_FILE = fileURLToPath(
  new URL("../../config/default-tasks.json", import.meta.url)
);

/**
 * Task file shape:
 *   { "tasks": [ { "type": "matmul", "count": 3, "parameters": { "size": 200 } } ] }
 * `count` defaults to 1; missing parameters fall back to the catalog defaults.
 */
export async function loadTaskSet(catalog: TaskCatalog, filePath = DEFAULT_TASK_FILE): Promise<TaskSpec[]> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(await readFile(filePath, "utf8"));
  } catch (err) {
    throw new ConfigError(`cannot read task file ${filePath}: ${errorMessage(err)}`);
  }
  return parseTaskSet(catalog, decoded);
}

export function parseTaskSet(catalog: TaskCatalog, decoded: unknown): TaskSpec[] {
  if (!isRecord(decoded) || !Array.isArray(decoded.tasks)) {
    throw new ConfigError('task file must be an object with a "tasks" array');
  }

  const specs: TaskSpec[] = [];
  for (const [idx, entry] of decoded.tasks.entries()) {
    if (!isRecord(entry) || typeof entry.type !== "string" || !isTaskType(entry.type)) {
      throw new ConfigError(`tasks[${idx}] has no known "type"`);
    }
    const type = entry.type;
    const count = entry.count ?? 1;
    if (typeof count !== "number" || !Number.isInteger(count) || count < 0) {
      throw new ConfigError(`tasks[${idx}].count must be a non-negative integer`);
    }

    const parameters = catalog.defaultParameters(type);
    if (entry.parameters !== undefined) {
      if (!isRecord(entry.parameters)) {
        throw new ConfigError(`tasks[${idx}].parameters must be an object`);
      }
      for (const [key, value] of Object.entries(entry.parameters)) {
        if (typeof value !== "number") {
          throw new ConfigError(`tasks[${idx}].parameters.${key} must be a number`);
        }
        parameters[key] = value;
      }
    }
    try {
      catalog.validate(type, parameters);
    } catch (err) {
      throw new ConfigError(`tasks[${idx}]: ${errorMessage(err)}`);
    }

    for (let n = 0; n < count; n++) specs.push(createTaskSpec(type, parameters));
  }
  return specs;
}

export function createTaskSpec(type: TaskSpec["type"], parameters: TaskSpec["parameters"]): TaskSpec {
  return Object.freeze({ type, parameters: Object.freeze({ ...parameters }) });
}

/** Fisher-Yates; returns a new array. */
export function shuffleTasks<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
