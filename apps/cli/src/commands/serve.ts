/**
 * Command: tensorpeer serve
 */
import { serveNeuron } from "@tensorpeer/neuron";
import { createLogger } from "@tensorpeer/effect-runtime";
import { resolveConfig } from "../resolve.js";

export async function serveCmd(args: string[]): Promise<void> {
  const config = await resolveConfig(args);
  const log = createLogger(config.logLevel);

  const controller = new AbortController();
  const stop = (signal: string) => {
    if (controller.signal.aborted) return;
    log.info("shutting down after the current epoch", { signal });
    controller.abort();
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  log.info("starting neuron", {
    hotkey: config.hotkey,
    ledger: config.ledgerUrl,
    port: config.axon.port,
    localTrain: config.localTrain,
    remoteTrain: config.remoteTrain,
  });
  await serveNeuron(config, { signal: controller.signal, log });
}
