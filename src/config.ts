import os from "node:os";
import type { Endpoint, PopOrder } from "./contracts.js";
import { ConfigError } from "./errors.js";

type Env = Record<string, string | undefined>;

export interface SchedulerConfig {
  host: string;
  port: number;
  statusPort: number;
  popOrder: PopOrder;
  taskFile?: string;
  shuffle: boolean;
  eventLogger?: Endpoint;
  eventTimeoutMs: number;
  readTimeoutMs: number;
  logLevel: string;
}

export interface EventLoggerConfig {
  host: string;
  port: number;
  statusPort: number;
  exportDir: string;
  exportIntervalMs: number;
  readTimeoutMs: number;
  logLevel: string;
}

export interface WorkerConfig {
  nodeId: string;
  scheduler: Endpoint;
  eventLogger?: Endpoint;
  eventTimeoutMs: number;
  requestTimeoutMs: number;
  ioFilePath?: string;
  logLevel: string;
}

export function loadSchedulerConfig(env: Env = process.env): SchedulerConfig {
  return {
    host: env.BENCHMESH_SCHEDULER_HOST ?? "0.0.0.0",
    port: readPort(env, "BENCHMESH_SCHEDULER_PORT", 5000),
    statusPort: readPort(env, "BENCHMESH_SCHEDULER_STATUS_PORT", 8787),
    popOrder: readPopOrder(env.BENCHMESH_POP_ORDER),
    taskFile: env.BENCHMESH_TASK_FILE || undefined,
    shuffle: readBoolean(env, "BENCHMESH_SHUFFLE", true),
    eventLogger: readOptionalEndpoint(env, "BENCHMESH_EVENT_LOGGER"),
    eventTimeoutMs: readPositiveInt(env, "BENCHMESH_EVENT_TIMEOUT_MS", 1_000),
    readTimeoutMs: readPositiveInt(env, "BENCHMESH_READ_TIMEOUT_MS", 5_000),
    logLevel: env.BENCHMESH_LOG_LEVEL ?? "info",
  };
}

export function loadEventLoggerConfig(env: Env = process.env): EventLoggerConfig {
  return {
    host: env.BENCHMESH_LOGGER_HOST ?? "0.0.0.0",
    port: readPort(env, "BENCHMESH_LOGGER_PORT", 5001),
    statusPort: readPort(env, "BENCHMESH_LOGGER_STATUS_PORT", 8788),
    exportDir: env.BENCHMESH_EXPORT_DIR ?? "logs",
    exportIntervalMs: readNonNegativeInt(env, "BENCHMESH_EXPORT_INTERVAL_MS", 0),
    readTimeoutMs: readPositiveInt(env, "BENCHMESH_READ_TIMEOUT_MS", 5_000),
    logLevel: env.BENCHMESH_LOG_LEVEL ?? "info",
  };
}

export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  return {
    nodeId: env.BENCHMESH_NODE_ID || os.hostname(),
    scheduler: parseEndpoint(env.BENCHMESH_SCHEDULER ?? "127.0.0.1:5000", "BENCHMESH_SCHEDULER"),
    eventLogger: readOptionalEndpoint(env, "BENCHMESH_EVENT_LOGGER"),
    eventTimeoutMs: readPositiveInt(env, "BENCHMESH_EVENT_TIMEOUT_MS", 1_000),
    requestTimeoutMs: readPositiveInt(env, "BENCHMESH_REQUEST_TIMEOUT_MS", 10_000),
    ioFilePath: env.BENCHMESH_IO_FILE_PATH || undefined,
    logLevel: env.BENCHMESH_LOG_LEVEL ?? "info",
  };
}

export function parseEndpoint(raw: string, name: string): Endpoint {
  const idx = raw.lastIndexOf(":");
  if (idx <= 0) throw new ConfigError(`${name} must be host:port, got "${raw}"`);
  return { host: raw.slice(0, idx), port: toPort(raw.slice(idx + 1), name) };
}

function readOptionalEndpoint(env: Env, name: string): Endpoint | undefined {
  const raw = env[name];
  return raw ? parseEndpoint(raw, name) : undefined;
}

function readPopOrder(raw: string | undefined): PopOrder {
  if (raw === undefined || raw === "") return "lifo";
  const value = raw.toLowerCase();
  if (value === "lifo" || value === "fifo") return value;
  throw new ConfigError(`BENCHMESH_POP_ORDER must be "lifo" or "fifo", got "${raw}"`);
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  if (["1", "true", "yes", "on"].includes(raw.toLowerCase())) return true;
  if (["0", "false", "no", "off"].includes(raw.toLowerCase())) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

function readPort(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  return raw === undefined || raw === "" ? fallback : toPort(raw, name);
}

function toPort(raw: string, name: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ConfigError(`${name} has an invalid port "${raw}"`);
  }
  return port;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const value = readNonNegativeInt(env, name, fallback);
  if (value === 0) throw new ConfigError(`${name} must be greater than zero`);
  return value;
}

function readNonNegativeInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}
