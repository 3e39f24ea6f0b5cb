export const TASK_TYPES = ["matmul", "primes", "array", "fileIO"] as const;

export type TaskType = (typeof TASK_TYPES)[number];

export type TaskParameters = Record<string, number>;

export interface TaskSpec {
  readonly type: TaskType;
  readonly parameters: Readonly<TaskParameters>;
}

export type PopOrder = "lifo" | "fifo";

export interface Endpoint {
  host: string;
  port: number;
}

export interface NodeIdentity {
  id: string;
  registeredAt: number;
}

export interface InFlightAssignment {
  nodeId: string;
  task: TaskSpec;
  assignedAt: number;
}

export interface FinishedAssignment extends InFlightAssignment {
  durationSeconds: number;
  finishedAt: number;
}

export interface SchedulerStatus {
  popOrder: PopOrder;
  total: number;
  waiting: number;
  inFlight: InFlightAssignment[];
  finished: number;
  abandoned: InFlightAssignment[];
  nodes: NodeIdentity[];
  complete: boolean;
}

export const LIFECYCLE_EVENT_KINDS = ["TASK_REQUESTED", "TASK_ASSIGNED", "TASK_FINISHED"] as const;

export type LifecycleEventKind = (typeof LIFECYCLE_EVENT_KINDS)[number];

export interface LifecycleEvent {
  readonly node: string;
  readonly kind: LifecycleEventKind;
  /** Seconds; the epoch is whatever the sender's clock uses. */
  readonly time: number;
  readonly taskName?: string;
  /** Set by the event logger when the event was correlated to an instance. */
  readonly instanceId?: string;
}

export interface TaskInstance {
  instanceId: string;
  taskType: string;
  node: string;
  assignedTime: number;
  finishedTime?: number;
  duration?: number;
  events: LifecycleEvent[];
}

export interface TimelineSnapshot {
  events: LifecycleEvent[];
  tasks: Record<string, TaskInstance>;
  orphanedFinishes: number;
}

export interface ExportedSnapshot {
  exportedAt: number;
  exportedAtIso: string;
  events: LifecycleEvent[];
  tasks: Record<string, TaskInstance>;
}

export function isTaskType(value: string): value is TaskType {
  return (TASK_TYPES as readonly string[]).includes(value);
}

export function isLifecycleEventKind(value: string): value is LifecycleEventKind {
  return (LIFECYCLE_EVENT_KINDS as readonly string[]).includes(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
