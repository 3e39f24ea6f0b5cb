import type { FastifyInstance } from "fastify";
import type { ServiceEvent, ServicePlugin, ServicePluginContext } from "./types.js";
import { createTelemetryPlugin, type TelemetryPlugin } from "./telemetry-plugin.js";

export interface PluginHost {
  ctx: ServicePluginContext;
  /** Installed only when no plugin list is given; the metrics counters read from it. */
  telemetry: TelemetryPlugin | null;
  subscribe(listener: (event: ServiceEvent) => void): () => void;
}

export async function installPlugins(
  app: FastifyInstance,
  plugins?: ServicePlugin[]
): Promise<PluginHost> {
  const ctx: ServicePluginContext = { emit() {} };
  const telemetry = plugins === undefined ? createTelemetryPlugin() : null;

  for (const plugin of plugins ?? []) await plugin.register(app, ctx);
  if (telemetry) await telemetry.register(app, ctx);

  // Wrap after the plugins so subscribers see every event.
  const listeners = new Set<(event: ServiceEvent) => void>();
  const prevEmit = ctx.emit;
  ctx.emit = (event: ServiceEvent) => {
    prevEmit(event);
    for (const listener of listeners) listener(event);
  };

  return {
    ctx,
    telemetry,
    subscribe(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
  };
}
