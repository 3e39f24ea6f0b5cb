import { isLifecycleEventKind, type LifecycleEvent } from "../contracts.js";
import { ProtocolError } from "../errors.js";

/**
 * Parses `NODE <node> EVENT <kind> [TIME <seconds>] [TASK <type>]`.
 *
 * Pairs may come in any order; tokens that do not start a known pair are
 * skipped, and a repeated key keeps its last value. `receivedAt` (seconds)
 * stands in for a missing TIME.
 */
export function parseEventMessage(raw: string, receivedAt: number): LifecycleEvent {
  const parts = raw.trim().split(/\s+/);
  let node: string | undefined;
  let kind: string | undefined;
  let time: string | undefined;
  let taskName: string | undefined;

  let i = 0;
  while (i < parts.length) {
    const key = parts[i];
    const value = parts[i + 1];
    if (value === undefined) break;
    if (key === "NODE") node = value;
    else if (key === "EVENT") kind = value;
    else if (key === "TIME") time = value;
    else if (key === "TASK") taskName = value;
    else {
      i += 1;
      continue;
    }
    i += 2;
  }

  if (!node || !kind) {
    throw new ProtocolError("missing_fields", `event without NODE or EVENT: "${raw}"`);
  }
  if (!isLifecycleEventKind(kind)) {
    throw new ProtocolError("unknown_event", `unknown event kind "${kind}"`);
  }

  let seconds = receivedAt;
  if (time !== undefined) {
    seconds = Number(time);
    if (!Number.isFinite(seconds)) {
      throw new ProtocolError("invalid_time", `invalid TIME value "${time}"`);
    }
  }

  if (kind !== "TASK_REQUESTED" && !taskName) {
    throw new ProtocolError("missing_task", `${kind} without TASK`);
  }

  return taskName === undefined
    ? { node, kind, time: seconds }
    : { node, kind, time: seconds, taskName };
}

export function formatEventMessage(event: LifecycleEvent): string {
  const parts = ["NODE", event.node, "EVENT", event.kind, "TIME", String(event.time)];
  if (event.taskName) parts.push("TASK", event.taskName);
  return parts.join(" ");
}

export function nowSeconds(): number {
  return Date.now() / 1000;
}
