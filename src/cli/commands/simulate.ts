/**
 * `fridge simulate`: post synthetic readings to the ingestion endpoint.
 */

import { createLogger } from "../../infrastructure/logging/logger.js";
import { parseSimulationArgs } from "../../simulator/options.js";
import { runSimulation } from "../../simulator/runner.js";
import { blank, bold, cyan, dim, formatDuration, printKeyValue, section, success, warn, white } from "../ui.js";

export const simulateCommand = async (args: readonly string[]): Promise<void> => {
  const parsed = parseSimulationArgs(args, process.env);
  if (!parsed.ok) {
    throw new Error(parsed.error);
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    warn("Interrupted, stopping sensors…");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  const options = { ...parsed.value, signal: controller.signal };

  section("Sensor simulation");
  printKeyValue([
    ["Endpoint", options.url],
    ["Fridges", String(options.fridgeCount)],
    ["Interval", formatDuration(options.intervalMs)],
    ["Runtime", formatDuration(options.runtimeMs)],
    ["Faulty fridge", options.faulty ? `#${options.faulty.fridgeNo}` : "off"],
  ]);
  blank();

  const logger = createLogger("info", { service: "simulator" });
  const started = performance.now();
  try {
    const summary = await runSimulation(options, { logger });
    blank();
    success(
      `Sent ${bold(white(String(summary.sent)))} readings in ${formatDuration(performance.now() - started)}`,
    );
    if (summary.failed > 0) {
      warn(`${summary.failed} readings were rejected or could not be delivered`);
    }
    blank();
    process.stdout.write(`  ${dim("Check the monitor logs or")} ${cyan("GET /api/fridge-reading/recent")}\n\n`);
  } finally {
    process.off("SIGINT", onSigint);
  }
};
