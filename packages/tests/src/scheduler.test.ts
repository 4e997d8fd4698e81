import { describe, it, expect } from "vitest";
import type { NucleusConfig } from "@tensorpeer/core";
import { SeededRng } from "@tensorpeer/core";
import { CpuRefBackend } from "@tensorpeer/tensor";
import { initNucleus } from "@tensorpeer/model";
import { SGD, type DataBatch } from "@tensorpeer/train";
import {
  BackwardDispatcher,
  EpochScheduler,
  Metagraph,
  ModelState,
  nucleusCallbacks,
  type SchedulerConfig,
  type SnapshotNeuron,
} from "@tensorpeer/neuron";
import { FakeLedger, MemoryCheckpoint, RecordingSink, captureLog, peer } from "./fakes.js";

const nucleus: NucleusConfig = { vocabSize: 8, nEmbd: 4, hiddenDim: 4, seqLen: 3, seed: 3 };
const B = new CpuRefBackend();

const batch: DataBatch = {
  inputs: { shape: [2, 3], dtype: "i32", data: Int32Array.of(1, 2, 3, 4, 5, 6) },
  targets: { shape: [2, 3], dtype: "i32", data: Int32Array.of(2, 3, 4, 5, 6, 7) },
};

function* countingBatches(counter: { n: number }): Generator<DataBatch, void, undefined> {
  for (;;) {
    counter.n++;
    yield batch;
  }
}

interface SetupOptions {
  config?: Partial<SchedulerConfig>;
  neurons?: SnapshotNeuron[];
  withData?: boolean;
  bestLoss?: number;
  lastCommitBlock?: number;
}

async function setup(opts: SetupOptions = {}) {
  const ledger = new FakeLedger(opts.neurons ?? [peer(0, "other"), peer(1, "self", { stake: 7, rank: 0.5 })], 100);
  const metagraph = new Metagraph(ledger);
  await metagraph.sync();
  const optimizer = new SGD({ lr: 0.1, momentum: 0.8 });
  const state = new ModelState(nucleus, initNucleus(nucleus, B), optimizer, B);
  const sink = new RecordingSink();
  const checkpoint = new MemoryCheckpoint();
  const log = captureLog();
  const sleeps: number[] = [];
  const consumed = { n: 0 };
  const config: SchedulerConfig = {
    hotkey: "self",
    blocksPerEpoch: 3,
    blocksPerSetWeights: 100,
    blockTimeMs: 12_000,
    blockPollMs: 1_000,
    localTrain: false,
    learningRate: 0.1,
    clipMaxNorm: 1,
    waitForInclusion: true,
    fullPath: "/tmp/neuron-test",
    ...opts.config,
  };
  let onSleep = (): void | Promise<void> => {};
  const scheduler = new EpochScheduler({
    config,
    ledger,
    metagraph,
    state,
    batches: opts.withData === false ? null : countingBatches(consumed),
    checkpoint,
    metrics: sink,
    log,
    bestLoss: opts.bestLoss,
    lastCommitBlock: opts.lastCommitBlock,
    sleep: async (ms) => {
      sleeps.push(ms);
      await onSleep();
    },
  });
  return {
    ledger,
    metagraph,
    state,
    optimizer,
    sink,
    checkpoint,
    log,
    sleeps,
    consumed,
    scheduler,
    setOnSleep: (fn: () => void | Promise<void>) => {
      onSleep = fn;
    },
  };
}

describe("EpochScheduler: training and updates", () => {
  it("a zero-block epoch trains nothing and skips the update", async () => {
    const t = await setup({ config: { blocksPerEpoch: 0, localTrain: true } });
    const summary = await t.scheduler.runEpoch();

    expect(summary).toEqual({
      startBlock: 100,
      endBlock: 100,
      iterations: 0,
      localLoss: null,
      gradientCount: 0,
      updated: false,
      saved: false,
      committed: false,
    });
    expect(t.consumed.n).toBe(0);
    expect(t.optimizer.stepCount).toBe(0);
    expect(t.sink.records).toEqual([
      {
        step: 100,
        record: { stake: 7, rank: 0.5, trust: 0, consensus: 0, incentive: 0, emission: 0, gradient_count: 0 },
      },
    ]);
  });

  it("trains one batch per block, updates and saves the best model", async () => {
    const t = await setup({ config: { localTrain: true } });
    const summary = await t.scheduler.runEpoch();

    expect(summary.iterations).toBe(3);
    expect(t.consumed.n).toBe(3);
    expect(t.sleeps).toEqual([]);
    expect(summary.endBlock).toBe(103);
    expect(summary.updated).toBe(true);
    expect(summary.saved).toBe(true);
    expect(summary.localLoss).toBeGreaterThan(0);
    expect(t.scheduler.bestLoss).toBe(summary.localLoss);

    expect(t.optimizer.stepCount).toBe(1);
    expect(t.optimizer.lr).toBe(0.1);
    expect(t.state.params.fc.grad).toBeNull();

    const saved = t.checkpoint.saved.get("/tmp/neuron-test/model.tpck");
    expect(saved?.block).toBe(103);
    expect(saved?.bestLoss).toBe(summary.localLoss);
    expect(t.sink.records[0].record["local/loss"]).toBe(summary.localLoss);
  });

  it("waits for a new block before the next local batch", async () => {
    const t = await setup({ config: { localTrain: true, blocksPerEpoch: 2 } });
    t.ledger.step = 0;
    t.setOnSleep(() => {
      t.ledger.block += 1;
    });

    const summary = await t.scheduler.runEpoch();
    expect(summary.iterations).toBe(2);
    expect(t.consumed.n).toBe(2);
    expect(t.sleeps).toEqual([1_000, 1_000]);
  });

  it("does not save when the loss is no better than the best so far", async () => {
    const t = await setup({ config: { localTrain: true }, bestLoss: 0 });
    const summary = await t.scheduler.runEpoch();
    expect(summary.updated).toBe(true);
    expect(summary.saved).toBe(false);
    expect(t.scheduler.bestLoss).toBe(0);
    expect(t.checkpoint.saved.size).toBe(0);
  });

  it("keeps the best loss when the save fails", async () => {
    const t = await setup({ config: { localTrain: true } });
    t.checkpoint.failSaves = true;
    const summary = await t.scheduler.runEpoch();
    expect(summary.saved).toBe(false);
    expect(t.scheduler.bestLoss).toBe(Infinity);
    expect(t.log.entries.find((e) => e.message === "checkpoint save failed")?.fields).toEqual({
      file: "/tmp/neuron-test/model.tpck",
      error: "disk full writing /tmp/neuron-test/model.tpck",
    });
  });

  it("remote gradients divide the learning rate and reset the counter", async () => {
    const t = await setup({ config: { blocksPerEpoch: 2 } });
    await t.state.exclusive((g) => g.addGradients(4));

    const summary = await t.scheduler.runEpoch();
    expect(t.sleeps).toEqual([12_000, 12_000]);
    expect(summary.gradientCount).toBe(4);
    expect(summary.updated).toBe(true);
    expect(summary.saved).toBe(false);
    expect(t.optimizer.lr).toBe(0.025);
    expect(await t.state.exclusive((g) => g.gradientCount)).toBe(0);
    expect(t.sink.records[0].record).toEqual({
      stake: 7, rank: 0.5, trust: 0, consensus: 0, incentive: 0, emission: 0, gradient_count: 4,
    });
  });

  it("fails when local training has no dataset", async () => {
    const t = await setup({ config: { localTrain: true }, withData: false });
    await expect(t.scheduler.runEpoch()).rejects.toThrow("local training is on but no dataset was provided");
  });

  it("fails when the hotkey is not registered", async () => {
    const t = await setup({ config: { hotkey: "ghost" } });
    await expect(t.scheduler.runEpoch()).rejects.toThrow("hotkey ghost is not registered");
  });
});

describe("EpochScheduler: shared model lock", () => {
  function remoteBackward(state: ModelState): () => Promise<unknown> {
    const callbacks = nucleusCallbacks({
      config: nucleus,
      params: state.params,
      rng: new SeededRng(1),
      enabled: { textLastHiddenState: true, textCausalLm: false, textSeq2Seq: false },
    });
    const dispatcher = new BackwardDispatcher(state, callbacks, true);
    const input = B.fromArray([1, 2, 3], [1, 3], "i32");
    return () => dispatcher.dispatch([input], [B.ones([1, 3, 4])], [{ kind: "textLastHiddenState" }]);
  }

  it("gradients dispatched before the update are folded into it", async () => {
    const t = await setup({ config: { blocksPerEpoch: 1 } });
    const backward = remoteBackward(t.state);
    t.setOnSleep(async () => {
      await backward();
    });

    const summary = await t.scheduler.runEpoch();
    expect(t.sleeps).toEqual([12_000]);
    expect(summary.gradientCount).toBe(1);
    expect(summary.updated).toBe(true);
    expect(t.optimizer.stepCount).toBe(1);
    expect(await t.state.exclusive((g) => g.gradientCount)).toBe(0);
    expect(t.state.params.fc.grad).toBeNull();
  });

  it("a dispatch issued during the update waits for it and lands after", async () => {
    const t = await setup({ config: { localTrain: true, blocksPerEpoch: 1 } });
    const backward = remoteBackward(t.state);
    let pending: Promise<unknown> | null = null;
    let lockedDuringSave = false;
    t.checkpoint.onSave = () => {
      lockedDuringSave = t.state.isLocked();
      pending = backward();
    };

    const summary = await t.scheduler.runEpoch();
    expect(summary.saved).toBe(true);
    expect(lockedDuringSave).toBe(true);
    expect(summary.gradientCount).toBe(0);
    expect(t.optimizer.stepCount).toBe(1);

    expect(pending).not.toBeNull();
    await pending;
    expect(await t.state.exclusive((g) => g.gradientCount)).toBe(1);
    expect(t.state.params.fc.grad).not.toBeNull();
  });
});

describe("EpochScheduler: weight commits", () => {
  it("commits all weight on itself once the cadence has passed", async () => {
    const t = await setup({ config: { blocksPerEpoch: 2, blocksPerSetWeights: 5 }, lastCommitBlock: 90 });

    const first = await t.scheduler.runEpoch();
    expect(first.committed).toBe(true);
    expect(t.ledger.setWeightsCalls).toEqual([{ uids: [0, 1], weights: [0, 1], waitForInclusion: true }]);
    expect(t.ledger.syncCount).toBe(2);
    expect(t.log.entries.some((e) => e.level === "info" && e.message === "set weights")).toBe(true);

    // blocks 103..105: 105 - 102 is inside the cadence
    const second = await t.scheduler.runEpoch();
    expect(second.committed).toBe(false);
    expect(t.ledger.setWeightsCalls).toHaveLength(1);
  });

  it("sizes the weight vector to cover its own uid", async () => {
    const t = await setup({
      config: { blocksPerEpoch: 1, blocksPerSetWeights: 0 },
      neurons: [peer(0, "a"), peer(3, "self")],
      lastCommitBlock: 0,
    });
    await t.scheduler.runEpoch();
    expect(t.ledger.setWeightsCalls[0].uids).toEqual([0, 1, 2, 3]);
    expect(t.ledger.setWeightsCalls[0].weights).toEqual([0, 0, 0, 1]);
  });

  it("a commit that never resolves does not stall the epoch", async () => {
    const t = await setup({
      config: { blocksPerEpoch: 1, blocksPerSetWeights: 0, waitForInclusion: false },
      lastCommitBlock: 0,
    });
    t.ledger.setWeightsBehaviour = "hang";

    const summary = await t.scheduler.runEpoch();
    expect(summary.committed).toBe(true);
    expect(t.scheduler.pendingCommitCount).toBe(1);
    expect(t.ledger.setWeightsCalls[0].waitForInclusion).toBe(false);
  });

  it("logs a rejected commit and carries on", async () => {
    const t = await setup({ config: { blocksPerEpoch: 2, blocksPerSetWeights: 0 }, lastCommitBlock: 0 });
    t.ledger.setWeightsBehaviour = "throw";

    const summary = await t.scheduler.runEpoch();
    expect(summary.committed).toBe(true);
    expect(t.log.entries.find((e) => e.message === "failed to set weights")).toEqual({
      level: "error",
      message: "failed to set weights",
      fields: { block: 102, error: "extrinsic rejected" },
    });
    expect(t.ledger.syncCount).toBe(2);
  });

  it("logs a commit that was not included", async () => {
    const t = await setup({ config: { blocksPerEpoch: 1, blocksPerSetWeights: 0 }, lastCommitBlock: 0 });
    t.ledger.setWeightsBehaviour = "timeout";
    await t.scheduler.runEpoch();
    expect(t.log.entries.find((e) => e.level === "error")?.message).toBe("timeout setting weights");
  });
});

describe("EpochScheduler.run", () => {
  it("finishes the current epoch after abort and returns", async () => {
    const t = await setup({ config: { blocksPerEpoch: 5 } });
    const controller = new AbortController();
    t.setOnSleep(() => controller.abort());

    await t.scheduler.run(controller.signal);
    expect(t.sleeps).toEqual([12_000]);
    expect(t.sink.records).toHaveLength(1);
    expect(t.sink.records[0].step).toBe(101);
  });
});
