import { PassThrough } from "node:stream";
import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { loadEventLoggerConfig } from "./config.js";
import { TaskTimeline } from "./timeline/timeline.js";
import { computeStats, groupStats } from "./timeline/stats.js";
import { exportSnapshot } from "./timeline/export.js";
import { createIngestHandler } from "./timeline/ingest.js";
import { ExchangeServer } from "./transport/exchange-server.js";
import { installPlugins } from "./plugins/host.js";
import type { ServiceEvent, ServicePlugin } from "./plugins/types.js";
import { PROMETHEUS_CONTENT_TYPE, renderMetrics } from "./metrics.js";
import { errorMessage } from "./errors.js";

export interface EventLoggerOptions {
  timeline?: TaskTimeline;
  /** Directory for snapshot exports; exports are disabled without it. */
  exportDir?: string;
  /** Periodic export; 0 or absent disables it. */
  exportIntervalMs?: number;
  /** Export once more when the service closes. Default true when exportDir is set. */
  exportOnClose?: boolean;
  readTimeoutMs?: number;
  /** Receipt time in seconds, used for events without TIME. */
  clock?: () => number;
  plugins?: ServicePlugin[];
  logLevel?: string;
}

export interface EventLoggerService {
  app: FastifyInstance;
  exchange: ExchangeServer;
  timeline: TaskTimeline;
  /** Null when no export directory is configured. */
  exportNow(): Promise<string | null>;
  close(): Promise<void>;
}

export async function buildEventLogger(options: EventLoggerOptions = {}): Promise<EventLoggerService> {
  const app = Fastify({
    logger: { level: options.logLevel ?? "info" },
    forceCloseConnections: true,
  });
  const timeline = options.timeline ?? new TaskTimeline();
  const host = await installPlugins(app, options.plugins);

  const exchange = new ExchangeServer(
    createIngestHandler({ timeline, log: app.log, ctx: host.ctx, clock: options.clock }),
    { log: app.log, readTimeoutMs: options.readTimeoutMs }
  );

  const writeExport = async (dir: string): Promise<string> => {
    const file = await exportSnapshot(timeline.snapshot(), dir);
    app.log.info({ file }, "timeline exported");
    host.ctx.emit({ type: "timeline.exported", at: Date.now(), detail: { file } });
    return file;
  };

  // Exports run one at a time; a failed one rejects its own caller only.
  let exportQueue: Promise<void> = Promise.resolve();
  const exportNow = (): Promise<string | null> => {
    const dir = options.exportDir;
    if (!dir) return Promise.resolve(null);
    const run = exportQueue.then(() => writeExport(dir));
    exportQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };

  app.get("/health", async () => ({ ok: true }));

  app.get("/v1/stats", async () => ({ ok: true, stats: computeStats(timeline.snapshot()) }));

  app.get("/v1/snapshot", async () => {
    const { events, tasks } = timeline.snapshot();
    return { ok: true, events, tasks };
  });

  app.get<{ Params: { instanceId: string } }>("/v1/tasks/:instanceId", async (req, reply) => {
    const task = timeline.getInstance(req.params.instanceId);
    if (!task) return reply.code(404).send({ ok: false, error: "instance_not_found" });
    return { ok: true, task };
  });

  app.get<{ Params: { node: string } }>("/v1/nodes/:node/stats", async (req, reply) => {
    const snapshot = timeline.snapshot();
    const seen = snapshot.events.some((e) => e.node === req.params.node);
    if (!seen) return reply.code(404).send({ ok: false, error: "node_not_found" });

    const tasks = Object.values(snapshot.tasks).filter((t) => t.node === req.params.node);
    return { ok: true, node: req.params.node, ...groupStats(tasks), tasks };
  });

  app.get<{ Params: { taskType: string } }>("/v1/task-types/:taskType/stats", async (req, reply) => {
    const tasks = Object.values(timeline.snapshot().tasks).filter(
      (t) => t.taskType === req.params.taskType
    );
    if (tasks.length === 0) return reply.code(404).send({ ok: false, error: "task_type_not_found" });
    return { ok: true, taskType: req.params.taskType, ...groupStats(tasks), tasks };
  });

  app.post("/v1/export", async (_req, reply) => {
    const file = await exportNow();
    if (!file) return reply.code(409).send({ ok: false, error: "export_disabled" });
    return { ok: true, file };
  });

  app.get("/v1/events", (req, reply) => {
    const stream = new PassThrough();
    stream.write(": connected\n\n");

    const unsubscribe = host.subscribe((event: ServiceEvent) => {
      if (event.type.startsWith("lifecycle.")) stream.write(`data: ${JSON.stringify(event)}\n\n`);
    });

    req.raw.on("close", () => {
      unsubscribe();
      if (!stream.destroyed) stream.end();
    });

    reply.header("content-type", "text/event-stream; charset=utf-8");
    reply.header("cache-control", "no-cache");
    reply.header("x-accel-buffering", "no");
    return reply.send(stream);
  });

  app.get("/metrics", async (_req, reply) => {
    const stats = computeStats(timeline.snapshot());

    reply.header("content-type", PROMETHEUS_CONTENT_TYPE);
    return reply.send(
      renderMetrics([
        {
          name: "benchmesh_http_requests_total",
          help: "Total HTTP requests processed",
          type: "counter",
          value: host.telemetry?.httpRequests() ?? 0,
        },
        {
          name: "benchmesh_events_total",
          help: "Lifecycle events recorded",
          type: "counter",
          value: stats.totalEvents,
        },
        {
          name: "benchmesh_task_instances",
          help: "Task instances opened by TASK_ASSIGNED",
          type: "gauge",
          value: stats.totalInstances,
        },
        {
          name: "benchmesh_task_instances_completed",
          help: "Task instances with a correlated TASK_FINISHED",
          type: "gauge",
          value: stats.durations?.count ?? 0,
        },
        {
          name: "benchmesh_orphaned_finishes_total",
          help: "TASK_FINISHED events with no open instance",
          type: "counter",
          value: stats.orphanedFinishes,
        },
      ])
    );
  });

  let exportTimer: ReturnType<typeof setInterval> | null = null;
  if (options.exportDir && options.exportIntervalMs && options.exportIntervalMs > 0) {
    exportTimer = setInterval(() => {
      exportNow().catch((err: unknown) =>
        app.log.error({ err: errorMessage(err) }, "periodic export failed")
      );
    }, options.exportIntervalMs);
  }

  app.addHook("onClose", async () => {
    if (exportTimer) clearInterval(exportTimer);
    await exchange.close();
    if (options.exportOnClose ?? true) await exportNow();
    else await exportQueue;
    app.log.info({ summary: computeStats(timeline.snapshot()) }, "event logger summary");
  });

  return { app, exchange, timeline, exportNow, close: () => app.close() };
}

export async function startEventLogger() {
  const config = loadEventLoggerConfig();
  const service = await buildEventLogger({
    exportDir: config.exportDir,
    exportIntervalMs: config.exportIntervalMs,
    readTimeoutMs: config.readTimeoutMs,
    logLevel: config.logLevel,
  });
  const { app } = service;

  const tcp = await service.exchange.listen(config.port, config.host);
  await app.listen({ host: config.host, port: config.statusPort });
  app.log.info(
    { exportDir: config.exportDir },
    `benchmesh event logger listening on ${tcp.address}:${tcp.port}`
  );

  const shutdown = (signal: string) => {
    app.log.info({ signal }, "shutting down event logger");
    service.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "event logger shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return service;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startEventLogger().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
