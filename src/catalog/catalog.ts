import { isTaskType, type TaskParameters, type TaskType } from "../contracts.js";
import { ExecutionError, errorMessage } from "../errors.js";
import { multiplyRandomMatrices, primesUpTo, randomFileIo, sortRandomArray } from "./benchmarks.js";

/** What a worker needs from the catalog: a named-task dispatch. */
export interface TaskDispatcher {
  has(taskType: string): boolean;
  /** Resolves with elapsed seconds; rejects with ExecutionError. */
  execute(taskType: string, parameters: TaskParameters): Promise<number>;
}

export interface TaskDefinition {
  type: TaskType;
  /** Required parameters; each must be a positive integer. */
  parameters: readonly string[];
  defaults: Readonly<TaskParameters>;
  run(parameters: TaskParameters): Promise<unknown> | unknown;
}

export class TaskCatalog implements TaskDispatcher {
  private readonly definitions: ReadonlyMap<TaskType, TaskDefinition>;

  constructor(options: { ioFilePath?: string } = {}) {
    const definitions: TaskDefinition[] = [
      {
        type: "matmul",
        parameters: ["size"],
        defaults: { size: 425 },
        run: (p) => multiplyRandomMatrices(p.size),
      },
      {
        type: "primes",
        parameters: ["max_n"],
        defaults: { max_n: 2_400_000 },
        run: (p) => primesUpTo(p.max_n),
      },
      {
        type: "array",
        parameters: ["array_size"],
        defaults: { array_size: 5_000_000 },
        run: (p) => sortRandomArray(p.array_size),
      },
      {
        type: "fileIO",
        parameters: ["num_rw"],
        defaults: { num_rw: 1_000_000 },
        run: (p) => {
          if (!options.ioFilePath) {
            throw new ExecutionError("fileIO", "io_file_missing", "BENCHMESH_IO_FILE_PATH is not set");
          }
          return randomFileIo(options.ioFilePath, p.num_rw);
        },
      },
    ];
    this.definitions = new Map(definitions.map((d) => [d.type, d]));
  }

  has(taskType: string): boolean {
    return isTaskType(taskType) && this.definitions.has(taskType);
  }

  list(): TaskDefinition[] {
    return [...this.definitions.values()];
  }

  defaultParameters(taskType: TaskType): TaskParameters {
    return { ...this.require(taskType).defaults };
  }

  /** Throws ExecutionError when `parameters` does not match the task's schema. */
  validate(taskType: string, parameters: TaskParameters): TaskDefinition {
    const definition = this.require(taskType);
    for (const name of definition.parameters) {
      const value = parameters[name];
      if (value === undefined) {
        throw new ExecutionError(taskType, "invalid_parameters", `${taskType} requires ${name}`);
      }
      if (!Number.isInteger(value) || value <= 0) {
        throw new ExecutionError(
          taskType,
          "invalid_parameters",
          `${taskType}.${name} must be a positive integer, got ${value}`
        );
      }
    }
    return definition;
  }

  async execute(taskType: string, parameters: TaskParameters): Promise<number> {
    const definition = this.validate(taskType, parameters);
    const started = performance.now();
    try {
      await definition.run(parameters);
    } catch (err) {
      if (err instanceof ExecutionError) throw err;
      throw new ExecutionError(taskType, "task_failed", `${taskType} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return (performance.now() - started) / 1000;
  }

  private require(taskType: string): TaskDefinition {
    const definition = isTaskType(taskType) ? this.definitions.get(taskType) : undefined;
    if (!definition) {
      throw new ExecutionError(taskType, "unknown_task_type", `unknown task type "${taskType}"`);
    }
    return definition;
  }
}
