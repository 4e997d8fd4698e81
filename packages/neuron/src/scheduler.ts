/**
 * The epoch loop.
 *
 * Each epoch: read the block height and our registry row, train on local
 * batches (or idle) until the epoch's block range is used up, apply one
 * optimizer update folding in local loss and remote gradients, report, and
 * every `blocksPerSetWeights` blocks commit a weight vector to the ledger.
 */
import { Effect } from "effect";
import * as path from "node:path";
import type { Checkpoint, TensorData } from "@tensorpeer/core";
import { DatasetError, LedgerError, errorMessage } from "@tensorpeer/core";
import { Tape, add, scale, type Ctx, type Variable } from "@tensorpeer/autograd";
import { localLoss } from "@tensorpeer/model";
import { buildCheckpointState, clipGradNorm, type DataBatch } from "@tensorpeer/train";
import { silentLog, type Log } from "@tensorpeer/effect-runtime";
import type { NeuronConfig } from "./config.js";
import type { LedgerClient, PeerRecord } from "./ledger.js";
import type { Metagraph } from "./metagraph.js";
import type { MetricsSink } from "./metrics.js";
import type { ModelGuard, ModelState } from "./state.js";

export const CHECKPOINT_FILE = "model.tpck";

export type SchedulerConfig = Pick<
  NeuronConfig,
  | "hotkey"
  | "blocksPerEpoch"
  | "blocksPerSetWeights"
  | "blockTimeMs"
  | "blockPollMs"
  | "localTrain"
  | "learningRate"
  | "clipMaxNorm"
  | "waitForInclusion"
  | "fullPath"
>;

export interface EpochSchedulerDeps {
  config: SchedulerConfig;
  ledger: LedgerClient;
  metagraph: Metagraph;
  state: ModelState;
  /** Local training batches; required when `localTrain` is on. */
  batches: Iterator<DataBatch> | null;
  checkpoint: Checkpoint;
  metrics: MetricsSink;
  log?: Log;
  /** Best local loss so far (from the loaded checkpoint). */
  bestLoss?: number;
  /** Block of the last weight commit; read from the ledger when omitted. */
  lastCommitBlock?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface EpochSummary {
  startBlock: number;
  endBlock: number;
  iterations: number;
  /** Mean local loss over the epoch, null without local iterations. */
  localLoss: number | null;
  /** Remote samples folded into this epoch's update. */
  gradientCount: number;
  updated: boolean;
  saved: boolean;
  committed: boolean;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// ── Loss accumulator ───────────────────────────────────────────────────────

/** Local losses of one epoch, recorded on a tape that lives as long as the epoch. */
class LossAccumulator {
  readonly tape = new Tape();
  private losses: Variable[] = [];
  private total = 0;

  get iterations(): number {
    return this.losses.length;
  }

  get mean(): number | null {
    return this.losses.length > 0 ? this.total / this.losses.length : null;
  }

  push(loss: Variable): void {
    this.losses.push(loss);
    this.total += loss.data.data[0];
  }

  /** Backpropagate the mean loss onto the parameters. */
  backward(ctx: Ctx): void {
    if (this.losses.length === 0) return;
    let sum = this.losses[0];
    for (let i = 1; i < this.losses.length; i++) sum = add(ctx, sum, this.losses[i]);
    const meanLoss = scale(ctx, sum, 1 / this.losses.length);
    this.tape.backward(meanLoss, ctx.backend);
  }

  dispose(): void {
    this.tape.clear();
    this.losses = [];
  }
}

// ── Scheduler ──────────────────────────────────────────────────────────────

export class EpochScheduler {
  private readonly config: SchedulerConfig;
  private readonly ledger: LedgerClient;
  private readonly metagraph: Metagraph;
  private readonly state: ModelState;
  private readonly batches: Iterator<DataBatch> | null;
  private readonly checkpoint: Checkpoint;
  private readonly metrics: MetricsSink;
  private readonly log: Log;
  private readonly sleep: (ms: number) => Promise<void>;
  private _bestLoss: number;
  private lastCommitBlock: number | null;
  private readonly pendingCommits = new Set<Promise<void>>();

  constructor(deps: EpochSchedulerDeps) {
    this.config = deps.config;
    this.ledger = deps.ledger;
    this.metagraph = deps.metagraph;
    this.state = deps.state;
    this.batches = deps.batches;
    this.checkpoint = deps.checkpoint;
    this.metrics = deps.metrics;
    this.log = deps.log ?? silentLog;
    this.sleep = deps.sleep ?? defaultSleep;
    this._bestLoss = deps.bestLoss ?? Infinity;
    this.lastCommitBlock = deps.lastCommitBlock ?? null;
  }

  get bestLoss(): number {
    return this._bestLoss;
  }

  /** Weight commits still in flight. */
  get pendingCommitCount(): number {
    return this.pendingCommits.size;
  }

  /** Run epochs until `signal` aborts, then wait for in-flight commits. */
  async run(signal?: AbortSignal): Promise<void> {
    this.log.info("epoch loop started", {
      blocksPerEpoch: this.config.blocksPerEpoch,
      localTrain: this.config.localTrain,
    });
    while (!signal?.aborted) {
      await this.runEpoch(signal);
    }
    await this.drain();
    this.log.info("epoch loop stopped");
  }

  async drain(): Promise<void> {
    await Promise.all([...this.pendingCommits]);
  }

  async runEpoch(signal?: AbortSignal): Promise<EpochSummary> {
    // EPOCH_START
    const startBlock = await this.ledger.currentBlock();
    const self = await this.ledger.neuronForKey(this.config.hotkey);
    if (!self) {
      throw new LedgerError({
        message: `hotkey ${this.config.hotkey} is not registered`,
        method: "ledger_neuronForKey",
      });
    }
    if (this.lastCommitBlock === null) this.lastCommitBlock = startBlock;
    const endBlock = startBlock + this.config.blocksPerEpoch;
    const acc = new LossAccumulator();

    try {
      // TRAIN_OR_WAIT
      const currentBlock = await this.trainOrWait(acc, startBlock, endBlock, signal);

      // MAYBE_UPDATE
      const update = await this.maybeUpdate(acc, currentBlock);

      // REPORT
      this.report(self, update.gradientCount, acc.mean, currentBlock);
      this.log.info("epoch done", {
        block: currentBlock,
        iterations: acc.iterations,
        loss: acc.mean ?? undefined,
        remote: update.gradientCount,
        updated: update.updated,
      });

      // MAYBE_COMMIT_WEIGHTS
      const committed = await this.maybeCommitWeights(currentBlock, self.uid);

      return {
        startBlock,
        endBlock,
        iterations: acc.iterations,
        localLoss: acc.mean,
        gradientCount: update.gradientCount,
        updated: update.updated,
        saved: update.saved,
        committed,
      };
    } finally {
      acc.dispose();
    }
  }

  // ── Phases ───────────────────────────────────────────────────────────────

  private async trainOrWait(
    acc: LossAccumulator,
    startBlock: number,
    endBlock: number,
    signal?: AbortSignal,
  ): Promise<number> {
    let current = startBlock;
    let lastTrained: number | null = null;
    while (current < endBlock && !signal?.aborted) {
      if (this.config.localTrain) {
        if (current !== lastTrained) {
          await this.trainStep(acc);
          lastTrained = current;
        } else {
          await this.sleep(this.config.blockPollMs);
        }
      } else {
        await this.sleep(this.config.blockTimeMs);
      }
      current = await this.ledger.currentBlock();
    }
    return current;
  }

  private async trainStep(acc: LossAccumulator): Promise<void> {
    if (!this.batches) {
      throw new DatasetError({ message: "local training is on but no dataset was provided" });
    }
    const next = this.batches.next();
    if (next.done) return;
    const { inputs, targets } = next.value;
    await this.state.exclusive((guard) => {
      const ctx: Ctx = { tape: acc.tape, backend: guard.backend };
      acc.push(localLoss(ctx, this.state.nucleusConfig, guard.params, inputs, targets));
    });
  }

  private maybeUpdate(
    acc: LossAccumulator,
    block: number,
  ): Promise<{ updated: boolean; saved: boolean; gradientCount: number }> {
    return this.state.exclusive(async (guard) => {
      const gradientCount = guard.gradientCount;
      if (acc.iterations === 0 && gradientCount === 0) {
        return { updated: false, saved: false, gradientCount };
      }

      acc.backward({ tape: acc.tape, backend: guard.backend });
      const lr = gradientCount > 0 ? this.config.learningRate / gradientCount : this.config.learningRate;
      guard.optimizer.setLr(lr);
      const gradNorm = this.step(guard);
      guard.resetGradients();
      this.log.debug("model updated", { lr, gradNorm, remote: gradientCount });

      const mean = acc.mean;
      let saved = false;
      if (mean !== null && mean < this._bestLoss) {
        saved = await this.saveCheckpoint(guard, block, mean);
        if (saved) this._bestLoss = mean;
      }
      return { updated: true, saved, gradientCount };
    });
  }

  /** Clip, step and zero. Returns the pre-clip gradient norm. */
  private step(guard: ModelGuard): number {
    const params = guard.parameters();
    const gradNorm = clipGradNorm(guard.backend, params.values(), this.config.clipMaxNorm);
    const data = new Map<string, TensorData>();
    const grads = new Map<string, TensorData>();
    for (const [name, v] of params) {
      data.set(name, v.data);
      if (v.grad) grads.set(name, v.grad);
    }
    guard.optimizer.step(data, grads);
    guard.zeroGrad();
    return gradNorm;
  }

  private async saveCheckpoint(guard: ModelGuard, block: number, loss: number): Promise<boolean> {
    const file = path.join(this.config.fullPath, CHECKPOINT_FILE);
    const state = buildCheckpointState(this.state.nucleusConfig, guard.params, guard.optimizer, block, loss);
    return Effect.runPromise(
      this.checkpoint.save(file, state).pipe(
        Effect.as(true),
        Effect.tap(() => Effect.sync(() => this.log.info("saved model", { file, loss }))),
        Effect.catchAll((e) =>
          Effect.sync(() => {
            this.log.error("checkpoint save failed", { file, error: e.message });
            return false;
          }),
        ),
      ),
    );
  }

  private report(self: PeerRecord, gradientCount: number, loss: number | null, block: number): void {
    const record: Record<string, number> = {
      stake: self.stake,
      rank: self.rank,
      trust: self.trust,
      consensus: self.consensus,
      incentive: self.incentive,
      emission: self.emission,
      gradient_count: gradientCount,
    };
    if (loss !== null) record["local/loss"] = loss;
    this.metrics.log(record, block);
  }

  private async maybeCommitWeights(currentBlock: number, uid: number): Promise<boolean> {
    const last = this.lastCommitBlock ?? currentBlock;
    if (currentBlock - last <= this.config.blocksPerSetWeights) return false;
    // the attempt itself advances the cadence, whatever its outcome
    this.lastCommitBlock = currentBlock;

    const n = Math.max(this.metagraph.n, uid + 1);
    const uids = Array.from({ length: n }, (_, i) => i);
    const weights = uids.map((u) => (u === uid ? 1 : 0));

    const attempt = this.commit(uids, weights, currentBlock);
    if (this.config.waitForInclusion) {
      await attempt;
    } else {
      this.pendingCommits.add(attempt);
      void attempt.finally(() => this.pendingCommits.delete(attempt));
    }
    return true;
  }

  /** Submit weights, then resync the metagraph. Never rejects. */
  private async commit(uids: number[], weights: number[], block: number): Promise<void> {
    try {
      const ok = await this.ledger.setWeights(uids, weights, this.config.waitForInclusion);
      if (ok) this.log.info("set weights", { block, n: uids.length });
      else this.log.error("timeout setting weights", { block });
    } catch (e) {
      this.log.error("failed to set weights", { block, error: errorMessage(e) });
    }
    try {
      await this.metagraph.sync();
    } catch (e) {
      this.log.warn("metagraph sync failed", { error: errorMessage(e) });
    }
  }
}
