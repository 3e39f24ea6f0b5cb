import os from "node:os";
import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import type { AddressInfo } from "node:net";
import type { Endpoint, PopOrder, TaskSpec } from "./contracts.js";
import { loadSchedulerConfig } from "./config.js";
import { TaskCatalog } from "./catalog/catalog.js";
import { InMemorySchedulerStore, type SchedulerStore } from "./scheduling/store.js";
import { createSchedulerHandler } from "./scheduling/handler.js";
import { loadTaskSet, shuffleTasks } from "./scheduling/task-set.js";
import { ExchangeServer } from "./transport/exchange-server.js";
import { createReporter, type LifecycleReporter } from "./reporting/lifecycle-reporter.js";
import { installPlugins } from "./plugins/host.js";
import type { ServicePlugin } from "./plugins/types.js";
import { PROMETHEUS_CONTENT_TYPE, renderMetrics } from "./metrics.js";

export interface SchedulerOptions {
  tasks: readonly TaskSpec[];
  popOrder?: PopOrder;
  store?: SchedulerStore;
  /** Where TASK_ASSIGNED events go; omit to send none. */
  eventLogger?: Endpoint;
  eventTimeoutMs?: number;
  reporter?: LifecycleReporter;
  readTimeoutMs?: number;
  schedulerHostname?: string;
  plugins?: ServicePlugin[];
  logLevel?: string;
}

export interface SchedulerService {
  app: FastifyInstance;
  exchange: ExchangeServer;
  store: SchedulerStore;
  reporter: LifecycleReporter;
  close(): Promise<void>;
}

export async function buildScheduler(options: SchedulerOptions): Promise<SchedulerService> {
  const app = Fastify({
    logger: { level: options.logLevel ?? "info" },
    forceCloseConnections: true,
  });
  const store = options.store ?? new InMemorySchedulerStore(options.tasks, { popOrder: options.popOrder });
  const reporter =
    options.reporter ?? createReporter(options.eventLogger, app.log, options.eventTimeoutMs);
  const host = await installPlugins(app, options.plugins);

  const exchange = new ExchangeServer(
    createSchedulerHandler({
      store,
      log: app.log,
      reporter,
      ctx: host.ctx,
      schedulerHostname: options.schedulerHostname ?? os.hostname(),
    }),
    { log: app.log, readTimeoutMs: options.readTimeoutMs }
  );

  app.get("/health", async () => ({ ok: true }));

  app.get("/v1/status", async () => ({ ok: true, ...store.status() }));

  app.get("/v1/nodes", async () => ({ ok: true, nodes: store.listNodes() }));

  app.get("/metrics", async (_req, reply) => {
    const status = store.status();
    const telemetry = host.telemetry;
    const events = (type: string) => telemetry?.eventCount(type) ?? 0;

    reply.header("content-type", PROMETHEUS_CONTENT_TYPE);
    return reply.send(
      renderMetrics([
        {
          name: "benchmesh_http_requests_total",
          help: "Total HTTP requests processed",
          type: "counter",
          value: telemetry?.httpRequests() ?? 0,
        },
        {
          name: "benchmesh_tasks_assigned_total",
          help: "Tasks handed to nodes since startup",
          type: "counter",
          value: events("task.assigned"),
        },
        {
          name: "benchmesh_rest_replies_total",
          help: "REST replies sent to nodes since startup",
          type: "counter",
          value: events("task.rest"),
        },
        {
          name: "benchmesh_unmatched_finishes_total",
          help: "FINISH reports with nothing in flight",
          type: "counter",
          value: events("task.unmatched_finish"),
        },
        { name: "benchmesh_tasks_total", help: "Seeded task count", type: "gauge", value: status.total },
        {
          name: "benchmesh_queue_depth",
          help: "Tasks still waiting",
          type: "gauge",
          value: status.waiting,
        },
        {
          name: "benchmesh_tasks_in_flight",
          help: "Tasks assigned and not yet finished",
          type: "gauge",
          value: status.inFlight.length,
        },
        {
          name: "benchmesh_tasks_finished",
          help: "Tasks reported finished",
          type: "gauge",
          value: status.finished,
        },
        {
          name: "benchmesh_tasks_abandoned",
          help: "Assignments displaced by a second request from the same node",
          type: "gauge",
          value: status.abandoned.length,
        },
        {
          name: "benchmesh_nodes_registered",
          help: "Registered nodes",
          type: "gauge",
          value: status.nodes.length,
        },
      ])
    );
  });

  app.addHook("onClose", async () => {
    await exchange.close();
    await reporter.flush();
  });

  return { app, exchange, store, reporter, close: () => app.close() };
}

export async function startScheduler() {
  const config = loadSchedulerConfig();
  const catalog = new TaskCatalog();
  const seeded = await loadTaskSet(catalog, config.taskFile);
  const tasks = config.shuffle ? shuffleTasks(seeded) : seeded;

  const service = await buildScheduler({
    tasks,
    popOrder: config.popOrder,
    eventLogger: config.eventLogger,
    eventTimeoutMs: config.eventTimeoutMs,
    readTimeoutMs: config.readTimeoutMs,
    logLevel: config.logLevel,
  });
  const { app } = service;

  const tcp: AddressInfo = await service.exchange.listen(config.port, config.host);
  await app.listen({ host: config.host, port: config.statusPort });
  app.log.info(
    { tasks: tasks.map((t) => t.type), popOrder: config.popOrder },
    `benchmesh scheduler accepting nodes on ${tcp.address}:${tcp.port}`
  );

  const shutdown = (signal: string) => {
    app.log.info({ signal }, "shutting down scheduler");
    service.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "scheduler shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return service;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startScheduler().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
