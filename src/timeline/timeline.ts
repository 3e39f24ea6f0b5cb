import type { LifecycleEvent, TaskInstance, TimelineSnapshot } from "../contracts.js";

export type RecordOutcome =
  | { status: "created"; instanceId: string; event: LifecycleEvent }
  | { status: "completed"; instanceId: string; event: LifecycleEvent; duration?: number }
  | { status: "orphaned"; event: LifecycleEvent }
  | { status: "logged"; event: LifecycleEvent };

/**
 * Raw event log plus the per-instance timelines rebuilt from it.
 *
 * Senders never name instances. An ASSIGNED event opens `<type>_<n>`; a
 * FINISHED event closes the most recently opened instance with the same type
 * and node that is still open. That join is only right while a node never runs
 * two tasks of one type at the same time.
 */
export class TaskTimeline {
  private readonly events: LifecycleEvent[] = [];
  // Map iteration order is insertion order, which the finish scan relies on.
  private readonly instances = new Map<string, TaskInstance>();
  private readonly counters = new Map<string, number>();
  private orphanedFinishes = 0;

  record(incoming: LifecycleEvent): RecordOutcome {
    const taskName = incoming.taskName;

    if (incoming.kind === "TASK_ASSIGNED" && taskName) {
      const n = (this.counters.get(taskName) ?? 0) + 1;
      this.counters.set(taskName, n);
      const instanceId = `${taskName}_${n}`;
      const event = this.append({ ...incoming, instanceId });
      this.instances.set(instanceId, {
        instanceId,
        taskType: taskName,
        node: event.node,
        assignedTime: event.time,
        events: [event],
      });
      return { status: "created", instanceId, event };
    }

    if (incoming.kind === "TASK_FINISHED" && taskName) {
      const open = this.findOpenInstance(taskName, incoming.node);
      if (!open) {
        this.orphanedFinishes += 1;
        return { status: "orphaned", event: this.append({ ...incoming }) };
      }
      const event = this.append({ ...incoming, instanceId: open.instanceId });
      open.events.push(event);
      open.finishedTime = event.time;
      open.duration = event.time - open.assignedTime;
      return { status: "completed", instanceId: open.instanceId, event, duration: open.duration };
    }

    return { status: "logged", event: this.append({ ...incoming }) };
  }

  getInstance(instanceId: string): TaskInstance | undefined {
    const instance = this.instances.get(instanceId);
    return instance ? cloneInstance(instance) : undefined;
  }

  get size(): { events: number; instances: number } {
    return { events: this.events.length, instances: this.instances.size };
  }

  /** Detached copy; safe to aggregate or serialise while recording continues. */
  snapshot(): TimelineSnapshot {
    const tasks: Record<string, TaskInstance> = {};
    for (const [id, instance] of this.instances) tasks[id] = cloneInstance(instance);
    return {
      events: [...this.events],
      tasks,
      orphanedFinishes: this.orphanedFinishes,
    };
  }

  private append(event: LifecycleEvent): LifecycleEvent {
    const frozen = Object.freeze(event);
    this.events.push(frozen);
    return frozen;
  }

  private findOpenInstance(taskType: string, node: string): TaskInstance | undefined {
    const all = [...this.instances.values()];
    for (let i = all.length - 1; i >= 0; i--) {
      const candidate = all[i];
      if (
        candidate.taskType === taskType &&
        candidate.node === node &&
        candidate.finishedTime === undefined
      ) {
        return candidate;
      }
    }
    return undefined;
  }
}

function cloneInstance(instance: TaskInstance): TaskInstance {
  return { ...instance, events: [...instance.events] };
}
