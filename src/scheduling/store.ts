import type {
  FinishedAssignment,
  InFlightAssignment,
  NodeIdentity,
  PopOrder,
  SchedulerStatus,
  TaskSpec,
} from "../contracts.js";

export interface AssignOutcome {
  task: TaskSpec | null;
  /** True when the requester was not registered and got registered on the way. */
  implicitlyRegistered: boolean;
  /** A previous assignment the node asked past without finishing it. */
  displaced?: InFlightAssignment;
}

export interface SchedulerStore {
  registerNode(nodeId: string): { node: NodeIdentity; created: boolean };
  assignNext(nodeId: string): AssignOutcome;
  /** Null when the node has nothing in flight. */
  finish(nodeId: string, durationSeconds: number): FinishedAssignment | null;
  listNodes(): NodeIdentity[];
  status(): SchedulerStatus;
}

/**
 * Queue, in-flight map, node registry and finished list for one scheduler.
 *
 * Every method is synchronous and runs to completion on the event loop, so it
 * acts as the single lock over all four structures: a pop and the matching
 * in-flight entry are written in the same turn.
 */
export class InMemorySchedulerStore implements SchedulerStore {
  private readonly waiting: TaskSpec[];
  private readonly total: number;
  private readonly nodes = new Map<string, NodeIdentity>();
  private readonly inFlight = new Map<string, InFlightAssignment>();
  private readonly finished: FinishedAssignment[] = [];
  private readonly abandoned: InFlightAssignment[] = [];
  private readonly popOrder: PopOrder;
  private readonly now: () => number;

  constructor(tasks: readonly TaskSpec[], options: { popOrder?: PopOrder; now?: () => number } = {}) {
    this.waiting = [...tasks];
    this.total = tasks.length;
    // Tail-first matches the historical behaviour; whether that was deliberate is unknown.
    this.popOrder = options.popOrder ?? "lifo";
    this.now = options.now ?? Date.now;
  }

  registerNode(nodeId: string): { node: NodeIdentity; created: boolean } {
    const existing = this.nodes.get(nodeId);
    if (existing) return { node: { ...existing }, created: false };
    const node: NodeIdentity = { id: nodeId, registeredAt: this.now() };
    this.nodes.set(nodeId, node);
    return { node: { ...node }, created: true };
  }

  assignNext(nodeId: string): AssignOutcome {
    const implicitlyRegistered = !this.nodes.has(nodeId);
    if (implicitlyRegistered) this.nodes.set(nodeId, { id: nodeId, registeredAt: this.now() });

    const task = (this.popOrder === "lifo" ? this.waiting.pop() : this.waiting.shift()) ?? null;
    if (!task) return { task: null, implicitlyRegistered };

    const displaced = this.inFlight.get(nodeId);
    if (displaced) this.abandoned.push(displaced);
    this.inFlight.set(nodeId, { nodeId, task, assignedAt: this.now() });

    return displaced ? { task, implicitlyRegistered, displaced } : { task, implicitlyRegistered };
  }

  finish(nodeId: string, durationSeconds: number): FinishedAssignment | null {
    const assignment = this.inFlight.get(nodeId);
    if (!assignment) return null;
    this.inFlight.delete(nodeId);
    const done: FinishedAssignment = { ...assignment, durationSeconds, finishedAt: this.now() };
    this.finished.push(done);
    return done;
  }

  listNodes(): NodeIdentity[] {
    return [...this.nodes.values()].map((n) => ({ ...n }));
  }

  status(): SchedulerStatus {
    return {
      popOrder: this.popOrder,
      total: this.total,
      waiting: this.waiting.length,
      inFlight: [...this.inFlight.values()].map((a) => ({ ...a })),
      finished: this.finished.length,
      abandoned: this.abandoned.map((a) => ({ ...a })),
      nodes: this.listNodes(),
      complete: this.finished.length === this.total,
    };
  }
}
