import type { LifecycleEventKind, TaskInstance, TimelineSnapshot } from "../contracts.js";

export interface DurationStats {
  count: number;
  mean: number;
  min: number;
  max: number;
}

export interface GroupStats {
  total: number;
  completed: number;
  pending: number;
  durations: DurationStats | null;
}

export interface TimelineStats {
  totalEvents: number;
  totalInstances: number;
  orphanedFinishes: number;
  eventsByKind: Record<LifecycleEventKind, number>;
  nodes: Record<string, GroupStats>;
  taskTypes: Record<string, GroupStats>;
  durations: DurationStats | null;
}

export function summarizeDurations(values: number[]): DurationStats | null {
  if (values.length === 0) return null;
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { count: values.length, mean: sum / values.length, min, max };
}

export function groupStats(instances: TaskInstance[]): GroupStats {
  const durations = completedDurations(instances);
  return {
    total: instances.length,
    completed: durations.length,
    pending: instances.length - durations.length,
    durations: summarizeDurations(durations),
  };
}

/** Aggregates a snapshot; durations only count completed instances. */
export function computeStats(snapshot: TimelineSnapshot): TimelineStats {
  const eventsByKind: Record<LifecycleEventKind, number> = {
    TASK_REQUESTED: 0,
    TASK_ASSIGNED: 0,
    TASK_FINISHED: 0,
  };
  for (const event of snapshot.events) eventsByKind[event.kind] += 1;

  const instances = Object.values(snapshot.tasks);
  const byNode = groupBy(instances, (t) => t.node);
  const byType = groupBy(instances, (t) => t.taskType);

  return {
    totalEvents: snapshot.events.length,
    totalInstances: instances.length,
    orphanedFinishes: snapshot.orphanedFinishes,
    eventsByKind,
    nodes: mapValues(byNode, groupStats),
    taskTypes: mapValues(byType, groupStats),
    durations: summarizeDurations(completedDurations(instances)),
  };
}

function completedDurations(instances: TaskInstance[]): number[] {
  const out: number[] = [];
  for (const t of instances) if (t.duration !== undefined) out.push(t.duration);
  return out;
}

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const bucket = groups.get(k);
    if (bucket) bucket.push(item);
    else groups.set(k, [item]);
  }
  return groups;
}

function mapValues<T, R>(groups: Map<string, T>, fn: (value: T) => R): Record<string, R> {
  const out: Record<string, R> = {};
  for (const [k, v] of groups) out[k] = fn(v);
  return out;
}
