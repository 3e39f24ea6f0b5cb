import type { Log } from "../log.js";
import type { ExchangeHandler, PeerInfo } from "../transport/exchange-server.js";
import type { ServicePluginContext } from "../plugins/types.js";
import type { TaskTimeline } from "./timeline.js";
import { UnmatchedFinishError } from "../errors.js";
import { nowSeconds, parseEventMessage } from "../protocol/event-wire.js";

/** One lifecycle event per connection; nothing is written back. */
export function createIngestHandler(deps: {
  timeline: TaskTimeline;
  log: Log;
  ctx: ServicePluginContext;
  clock?: () => number;
}): ExchangeHandler {
  const { timeline, log, ctx } = deps;
  const clock = deps.clock ?? nowSeconds;

  return (message: string, peer: PeerInfo) => {
    const outcome = timeline.record(parseEventMessage(message, clock()));
    const { event } = outcome;

    if (outcome.status === "orphaned") {
      const anomaly = new UnmatchedFinishError(
        event.node,
        `${event.taskName ?? "unknown"} finished on ${event.node} with no open instance`
      );
      log.warn({ nodeId: event.node, taskType: event.taskName, code: anomaly.code }, anomaly.message);
    } else {
      log.info(
        {
          nodeId: event.node,
          kind: event.kind,
          taskType: event.taskName,
          instanceId: event.instanceId,
          peer: peer.address,
        },
        "lifecycle event logged"
      );
    }

    ctx.emit({
      type: `lifecycle.${outcome.status}`,
      at: Date.now(),
      nodeId: event.node,
      taskType: event.taskName,
      instanceId: event.instanceId,
      detail: { event },
    });
    return null;
  };
}
