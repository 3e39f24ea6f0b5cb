import type { FastifyInstance } from "fastify";

export interface ServiceEvent {
  type: string;
  at: number;
  nodeId?: string;
  taskType?: string;
  instanceId?: string;
  detail?: Record<string, unknown>;
}

export interface ServicePluginContext {
  emit(event: ServiceEvent): void;
}

export interface ServicePlugin {
  name: string;
  register(app: FastifyInstance, ctx: ServicePluginContext): Promise<void> | void;
}
