import type { Endpoint, LifecycleEvent } from "../contracts.js";
import type { Log } from "../log.js";
import { errorMessage } from "../errors.js";
import { exchange } from "../transport/exchange-client.js";
import { formatEventMessage } from "../protocol/event-wire.js";

export interface LifecycleReporter {
  /** Fire-and-forget; never throws and never blocks the caller. */
  report(event: LifecycleEvent): void;
  /** Waits for sends already started. */
  flush(): Promise<void>;
}

export class TcpLifecycleReporter implements LifecycleReporter {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly endpoint: Endpoint,
    private readonly log: Log,
    private readonly timeoutMs = 1_000
  ) {}

  report(event: LifecycleEvent): void {
    const send: Promise<void> = exchange(this.endpoint, formatEventMessage(event), this.timeoutMs)
      .then(() => undefined)
      .catch((err: unknown) => {
        this.log.debug(
          { kind: event.kind, nodeId: event.node, err: errorMessage(err) },
          "lifecycle event dropped"
        );
      })
      .finally(() => this.inFlight.delete(send));
    this.inFlight.add(send);
  }

  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }
}

export const noopReporter: LifecycleReporter = {
  report() {},
  async flush() {},
};

export function createReporter(
  endpoint: Endpoint | undefined,
  log: Log,
  timeoutMs?: number
): LifecycleReporter {
  return endpoint ? new TcpLifecycleReporter(endpoint, log, timeoutMs) : noopReporter;
}
