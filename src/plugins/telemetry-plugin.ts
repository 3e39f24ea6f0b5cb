import type { FastifyInstance } from "fastify";
import type { ServicePlugin, ServicePluginContext } from "./types.js";

export interface TelemetrySnapshot {
  http: { requests: number; byStatus: Record<string, number> };
  /** Service events seen, keyed by event type. */
  events: Record<string, number>;
  /** Epoch milliseconds of the most recent service event. */
  lastEventAt: number | null;
}

export interface TelemetryPlugin extends ServicePlugin {
  httpRequests(): number;
  eventCount(type: string): number;
  snapshot(): TelemetrySnapshot;
}

/** Counts HTTP responses and service events for the `/metrics` routes. */
export function createTelemetryPlugin(): TelemetryPlugin {
  let requests = 0;
  let lastEventAt: number | null = null;
  const byStatus = new Map<number, number>();
  const byEvent = new Map<string, number>();

  const snapshot = (): TelemetrySnapshot => ({
    http: {
      requests,
      byStatus: Object.fromEntries([...byStatus].map(([code, n]) => [String(code), n])),
    },
    events: Object.fromEntries(byEvent),
    lastEventAt,
  });

  return {
    name: "telemetry",
    httpRequests: () => requests,
    eventCount: (type) => byEvent.get(type) ?? 0,
    snapshot,
    register(app: FastifyInstance, ctx: ServicePluginContext) {
      app.addHook("onResponse", async (_req, reply) => {
        requests += 1;
        byStatus.set(reply.statusCode, (byStatus.get(reply.statusCode) ?? 0) + 1);
      });

      const forward = ctx.emit;
      ctx.emit = (event) => {
        byEvent.set(event.type, (byEvent.get(event.type) ?? 0) + 1);
        lastEventAt = event.at;
        forward(event);
      };

      app.get("/v1/plugins/telemetry", async () => ({ ok: true, ...snapshot() }));
    },
  };
}
