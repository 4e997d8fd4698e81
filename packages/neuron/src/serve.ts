/**
 * Assemble a neuron from its config and run it until aborted.
 */
import { Effect } from "effect";
import * as path from "node:path";
import { SeededRng, errorMessage } from "@tensorpeer/core";
import { backendRegistry } from "@tensorpeer/tensor";
import { countParams, initNucleus } from "@tensorpeer/model";
import {
  DataLoader, FileCheckpoint, createOptimizerRegistry, loadText, restoreCheckpoint, type DataBatch,
} from "@tensorpeer/train";
import { createLogger, type Log } from "@tensorpeer/effect-runtime";
import type { NeuronConfig } from "./config.js";
import { HttpLedgerClient, type LedgerClient } from "./ledger.js";
import { Metagraph } from "./metagraph.js";
import { AdmissionController } from "./admission.js";
import { ModelState } from "./state.js";
import { nucleusCallbacks } from "./callbacks.js";
import { BackwardDispatcher } from "./dispatcher.js";
import { CHECKPOINT_FILE, EpochScheduler } from "./scheduler.js";
import { createRemoteMetricsSink, fanoutMetricsSink, openJsonlMetricsSink, type MetricsSink } from "./metrics.js";
import { createAxonApp, startAxon } from "./axon.js";

export interface ServeOptions {
  signal?: AbortSignal;
  log?: Log;
  /** Defaults to an HttpLedgerClient on `config.ledgerUrl`. */
  ledger?: LedgerClient;
}

export async function serveNeuron(config: NeuronConfig, opts: ServeOptions = {}): Promise<void> {
  const log = opts.log ?? createLogger(config.logLevel);
  const ledger = opts.ledger ?? new HttpLedgerClient({ url: config.ledgerUrl, timeoutMs: config.ledgerTimeoutMs });

  // ── Model ────────────────────────────────────────────────────────────────
  const backend = backendRegistry.get("cpu_ref");
  const params = initNucleus(config.nucleus, backend);
  const optimizer = createOptimizerRegistry({ lr: config.learningRate, momentum: config.momentum }).get("sgd");
  const checkpoint = new FileCheckpoint();
  const checkpointFile = path.join(config.fullPath, CHECKPOINT_FILE);

  let bestLoss = Infinity;
  if (!config.restart) {
    const loaded = await Effect.runPromise(
      Effect.either(restoreCheckpoint(checkpoint, checkpointFile, config.nucleus, params, optimizer)),
    );
    if (loaded._tag === "Right") {
      bestLoss = loaded.right.bestLoss;
      log.info("loaded checkpoint", { file: checkpointFile, block: loaded.right.block, bestLoss });
    } else {
      log.warn("starting from fresh weights", { reason: loaded.left.message });
    }
  }
  log.info("nucleus ready", { params: countParams(params), backend: backend.name });

  const state = new ModelState(config.nucleus, params, optimizer, backend);

  // ── Registry view ────────────────────────────────────────────────────────
  const metagraph = new Metagraph(ledger);
  await metagraph.sync();
  const minAllowedWeights = await ledger.minAllowedWeights();
  log.info("metagraph synced", { n: metagraph.n, block: metagraph.block, minAllowedWeights });

  // ── Serving ──────────────────────────────────────────────────────────────
  const callbacks = nucleusCallbacks({
    config: config.nucleus,
    params,
    rng: new SeededRng(config.nucleus.seed),
    enabled: config.synapses,
  });
  const admission = new AdmissionController(config.blacklist, metagraph, minAllowedWeights);
  const dispatcher = new BackwardDispatcher(state, callbacks, config.remoteTrain, log);
  const app = createAxonApp({ hotkey: config.hotkey, admission, callbacks, dispatcher, state, log });

  // ── Local training and metrics ────────────────────────────────────────────────────────
  let batches: Iterator<DataBatch> | null = null;
  if (config.localTrain && config.corpusPath !== null) {
    const text = await loadText(config.corpusPath);
    const loader = DataLoader.fromText(text, config.batchSize, config.nucleus.seqLen, config.nucleus.seed);
    log.info("corpus loaded", { file: config.corpusPath, tokens: loader.length });
    batches = loader.batches();
  }

  const sinks: MetricsSink[] = [];
  if (config.metrics.jsonl) {
    sinks.push(await openJsonlMetricsSink(path.join(config.fullPath, "metrics.jsonl"), 10, log));
  }
  if (config.metrics.url !== null && config.metrics.secret !== null) {
    sinks.push(
      createRemoteMetricsSink({
        url: config.metrics.url,
        secret: config.metrics.secret,
        runId: config.hotkey,
        flushInterval: config.metrics.flushIntervalMs,
        log,
      }),
    );
  }
  const metrics = fanoutMetricsSink(sinks);

  const axon = startAxon(app, config.axon.host, config.axon.port, log);

  const scheduler = new EpochScheduler({
    config,
    ledger,
    metagraph,
    state,
    batches,
    checkpoint,
    metrics,
    log,
    bestLoss,
  });

  try {
    await scheduler.run(opts.signal);
  } catch (e) {
    log.error("epoch loop failed", { error: errorMessage(e) });
    throw e;
  } finally {
    await metrics.close();
    await axon.close();
  }
}
