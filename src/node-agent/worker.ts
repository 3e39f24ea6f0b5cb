import type { Endpoint, TaskParameters } from "../contracts.js";
import type { Log } from "../log.js";
import type { TaskDispatcher } from "../catalog/catalog.js";
import { noopReporter, type LifecycleReporter } from "../reporting/lifecycle-reporter.js";
import { ProtocolError, RegistrationError } from "../errors.js";
import { exchange } from "../transport/exchange-client.js";
import { nowSeconds } from "../protocol/event-wire.js";
import {
  formatFinish,
  formatRegister,
  formatTaskRequest,
  parseAssign,
  parseRegisterConfirm,
} from "../protocol/scheduler-wire.js";

export interface NodeWorkerOptions {
  nodeId: string;
  scheduler: Endpoint;
  dispatcher: TaskDispatcher;
  log: Log;
  reporter?: LifecycleReporter;
  requestTimeoutMs?: number;
}

export interface CompletedTask {
  taskType: string;
  parameters: TaskParameters;
  durationSeconds: number;
}

export interface WorkerRunSummary {
  nodeId: string;
  schedulerHostname?: string;
  completed: CompletedTask[];
}

/**
 * Registers with one scheduler, then requests and runs tasks until it is told
 * to rest. Every round trip uses a fresh connection. Network failures, unknown
 * task types and task failures all end the run; nothing is retried.
 */
export class NodeWorker {
  private readonly reporter: LifecycleReporter;
  private readonly requestTimeoutMs: number;

  constructor(private readonly options: NodeWorkerOptions) {
    this.reporter = options.reporter ?? noopReporter;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
  }

  get nodeId(): string {
    return this.options.nodeId;
  }

  async register(): Promise<string | undefined> {
    const reply = await this.send(formatRegister(this.nodeId));
    const confirmation = parseRegisterConfirm(reply);
    if (!confirmation.confirmed) {
      throw new RegistrationError(
        "registration_refused",
        `scheduler did not confirm registration: "${reply}"`
      );
    }
    this.options.log.info(
      { nodeId: this.nodeId, schedulerHostname: confirmation.schedulerHostname },
      "registered with scheduler"
    );
    return confirmation.schedulerHostname;
  }

  async run(): Promise<WorkerRunSummary> {
    const { log, dispatcher } = this.options;
    const schedulerHostname = await this.register();
    const completed: CompletedTask[] = [];

    try {
      while (true) {
        const assignment = parseAssign(await this.send(formatTaskRequest(this.nodeId)));
        if (assignment.kind === "rest") {
          log.info({ nodeId: this.nodeId, completed: completed.length }, "REST received, stopping");
          break;
        }

        const { taskType, parameters } = assignment;
        if (!dispatcher.has(taskType)) {
          throw new ProtocolError("unknown_task_type", `scheduler assigned unknown task type "${taskType}"`);
        }

        this.reporter.report({ node: this.nodeId, kind: "TASK_REQUESTED", time: nowSeconds() });
        log.info({ nodeId: this.nodeId, taskType, parameters }, "running task");

        const durationSeconds = await dispatcher.execute(taskType, parameters);

        await this.send(formatFinish(durationSeconds, this.nodeId));
        this.reporter.report({
          node: this.nodeId,
          kind: "TASK_FINISHED",
          time: nowSeconds(),
          taskName: taskType,
        });
        log.info({ nodeId: this.nodeId, taskType, durationSeconds }, "task finished");
        completed.push({ taskType, parameters, durationSeconds });
      }
    } finally {
      await this.reporter.flush();
    }

    return { nodeId: this.nodeId, schedulerHostname, completed };
  }

  private send(message: string): Promise<string> {
    return exchange(this.options.scheduler, message, this.requestTimeoutMs);
  }
}
