import { pino } from "pino";
import type { FastifyBaseLogger } from "fastify";

/** The logger shape shared by fastify's `app.log` and standalone pino instances. */
export type Log = FastifyBaseLogger;

export function createLogger(name: string, level = process.env.BENCHMESH_LOG_LEVEL ?? "info"): Log {
  return pino({ name, level });
}
