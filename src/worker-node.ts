import { loadWorkerConfig } from "./config.js";
import { createLogger } from "./log.js";
import { TaskCatalog } from "./catalog/catalog.js";
import { createReporter } from "./reporting/lifecycle-reporter.js";
import { NodeWorker } from "./node-agent/worker.js";
import { BenchmeshError, errorMessage } from "./errors.js";

async function main() {
  const config = loadWorkerConfig();
  const log = createLogger(`worker:${config.nodeId}`, config.logLevel);

  const worker = new NodeWorker({
    nodeId: config.nodeId,
    scheduler: config.scheduler,
    dispatcher: new TaskCatalog({ ioFilePath: config.ioFilePath }),
    reporter: createReporter(config.eventLogger, log, config.eventTimeoutMs),
    requestTimeoutMs: config.requestTimeoutMs,
    log,
  });

  try {
    const summary = await worker.run();
    log.info(
      { completed: summary.completed.length, schedulerHostname: summary.schedulerHostname },
      "worker done"
    );
  } catch (err) {
    log.fatal(
      {
        code: err instanceof BenchmeshError ? err.code : "unexpected",
        scheduler: `${config.scheduler.host}:${config.scheduler.port}`,
        err: errorMessage(err),
      },
      "worker aborted"
    );
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error("[worker] fatal", err);
  process.exit(1);
});
