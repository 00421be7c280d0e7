import { CollectorServer } from "./collector/server.ts";
import { createCollectorMetrics } from "./metrics/metrics.ts";
import { createLogger } from "./logger.ts";

const logger = createLogger({ service: "collector" });
const collector = new CollectorServer({ logger, metrics: createCollectorMetrics({ defaults: true }) });

try {
  await collector.start();
} catch (e) {
  logger.fatal({ err: e }, "collector_start_failed");
  process.exit(1);
}

async function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, "shutdown_signal");
  const force = setTimeout(() => {
    logger.error("force exit waiting for collector close");
    process.exit(1);
  }, 5000);
  force.unref();
  await collector.stop();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}
