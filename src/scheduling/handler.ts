import type { Log } from "../log.js";
import type { ExchangeHandler, PeerInfo } from "../transport/exchange-server.js";
import type { LifecycleReporter } from "../reporting/lifecycle-reporter.js";
import type { ServicePluginContext } from "../plugins/types.js";
import type { SchedulerStore } from "./store.js";
import { RegistrationError, UnmatchedFinishError } from "../errors.js";
import { nowSeconds } from "../protocol/event-wire.js";
import {
  formatAssign,
  formatRegisterConfirm,
  parseSchedulerRequest,
} from "../protocol/scheduler-wire.js";

export interface SchedulerHandlerDeps {
  store: SchedulerStore;
  log: Log;
  reporter: LifecycleReporter;
  ctx: ServicePluginContext;
  schedulerHostname: string;
}

export function createSchedulerHandler(deps: SchedulerHandlerDeps): ExchangeHandler {
  const { store, log, reporter, ctx, schedulerHostname } = deps;
  let completionAnnounced = false;

  return (message: string, peer: PeerInfo) => {
    const request = parseSchedulerRequest(message);

    switch (request.type) {
      case "register": {
        const { created } = store.registerNode(request.hostname);
        if (created) {
          log.info({ nodeId: request.hostname, peer: peer.address }, "node registered");
          ctx.emit({ type: "node.registered", at: Date.now(), nodeId: request.hostname });
        } else {
          log.info({ nodeId: request.hostname }, "node re-registered");
        }
        return formatRegisterConfirm(schedulerHostname);
      }

      case "request": {
        const nodeId = request.nodeId ?? peer.address;
        const outcome = store.assignNext(nodeId);

        if (outcome.implicitlyRegistered) {
          const notice = new RegistrationError(
            "implicit_registration",
            `task request from unregistered node ${nodeId}`
          );
          log.warn({ nodeId, code: notice.code }, notice.message);
          ctx.emit({ type: "node.registered", at: Date.now(), nodeId, detail: { implicit: true } });
        }

        if (!outcome.task) {
          log.info({ nodeId }, "queue empty, sent REST");
          ctx.emit({ type: "task.rest", at: Date.now(), nodeId });
          return formatAssign(null);
        }

        if (outcome.displaced) {
          log.warn(
            { nodeId, abandonedTaskType: outcome.displaced.task.type },
            "task requested before previous task finished; previous assignment abandoned"
          );
          ctx.emit({
            type: "task.abandoned",
            at: Date.now(),
            nodeId,
            taskType: outcome.displaced.task.type,
          });
        }

        const { type } = outcome.task;
        log.info({ nodeId, taskType: type, remaining: store.status().waiting }, "task assigned");
        ctx.emit({ type: "task.assigned", at: Date.now(), nodeId, taskType: type });
        reporter.report({ node: nodeId, kind: "TASK_ASSIGNED", time: nowSeconds(), taskName: type });
        return formatAssign(outcome.task);
      }

      case "finish": {
        const nodeId = request.nodeId ?? peer.address;
        const done = store.finish(nodeId, request.durationSeconds);
        if (!done) {
          const anomaly = new UnmatchedFinishError(
            nodeId,
            `node ${nodeId} sent FINISH with nothing in flight`
          );
          log.warn({ nodeId, code: anomaly.code }, anomaly.message);
          ctx.emit({ type: "task.unmatched_finish", at: Date.now(), nodeId });
          return null;
        }

        const status = store.status();
        log.info(
          {
            nodeId,
            taskType: done.task.type,
            durationSeconds: done.durationSeconds,
            finished: status.finished,
            total: status.total,
          },
          "task finished"
        );
        ctx.emit({
          type: "task.finished",
          at: Date.now(),
          nodeId,
          taskType: done.task.type,
          detail: { durationSeconds: done.durationSeconds },
        });

        if (status.complete && !completionAnnounced) {
          completionAnnounced = true;
          log.info({ total: status.total }, "all tasks completed");
          ctx.emit({ type: "run.complete", at: Date.now(), detail: { total: status.total } });
        }
        return null;
      }
    }
  };
}
