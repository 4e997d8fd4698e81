import { describe, it, expect } from "vitest";
import type { NucleusConfig, TensorData } from "@tensorpeer/core";
import { SeededRng } from "@tensorpeer/core";
import { CpuRefBackend } from "@tensorpeer/tensor";
import { Variable, scale } from "@tensorpeer/autograd";
import { initNucleus } from "@tensorpeer/model";
import { SGD } from "@tensorpeer/train";
import { BackwardDispatcher, ModelState, nucleusCallbacks, type CallbackMap } from "@tensorpeer/neuron";

const config: NucleusConfig = { vocabSize: 8, nEmbd: 4, hiddenDim: 3, seqLen: 3, seed: 5 };
const B = new CpuRefBackend();

function makeState(): ModelState {
  return new ModelState(config, initNucleus(config, B), new SGD({ lr: 0.1 }), B);
}

function tokens(rows: number[][]): TensorData {
  return B.fromArray(rows.flat(), [rows.length, rows[0].length], "i32");
}

async function gradientCount(state: ModelState): Promise<number> {
  return state.exclusive((g) => g.gradientCount);
}

describe("BackwardDispatcher", () => {
  it("returns no results when remote training is off", async () => {
    const state = makeState();
    const callbacks = nucleusCallbacks({
      config,
      params: state.params,
      rng: new SeededRng(1),
      enabled: { textLastHiddenState: true, textCausalLm: true, textSeq2Seq: false },
    });
    const dispatcher = new BackwardDispatcher(state, callbacks, false);
    const input = tokens([[1, 2, 3]]);
    const results = await dispatcher.dispatch([input], [B.ones([1, 3, 3])], [{ kind: "textLastHiddenState" }]);
    expect(results).toEqual([]);
    expect(await gradientCount(state)).toBe(0);
    expect(state.params.fc.grad).toBeNull();
  });

  it("backpropagates each item and counts samples", async () => {
    const state = makeState();
    const callbacks = nucleusCallbacks({
      config,
      params: state.params,
      rng: new SeededRng(1),
      enabled: { textLastHiddenState: true, textCausalLm: true, textSeq2Seq: false },
    });
    const dispatcher = new BackwardDispatcher(state, callbacks, true);

    const results = await dispatcher.dispatch(
      [tokens([[1, 2, 3], [4, 5, 6]]), tokens([[7, 0, 1]]), tokens([[2, 2, 2]])],
      [B.ones([2, 3, 3]), B.ones([1, 3, 8]), B.ones([1, 3])],
      [{ kind: "textLastHiddenState" }, { kind: "textSeq2Seq" }, { kind: "textCausalLm" }],
    );

    expect(results).toEqual([
      { code: "Success", message: "Success" },
      { code: "NotImplemented", message: "Not Implemented" },
      { code: "UnknownException", message: "gradient shape [1, 3] does not match output shape [1, 3, 8]" },
    ]);
    // only the first item reached the parameters: 2 samples
    expect(await gradientCount(state)).toBe(2);
    expect(state.params.fc.grad).not.toBeNull();
    expect(state.params.lmHead.grad).toBeNull();
  });

  it("normalizes the incoming gradient by its sum", async () => {
    const state = makeState();
    const w = new Variable(B.fromArray([1, 1], [1, 2]), true);
    const callbacks: CallbackMap = new Map();
    callbacks.set("textCausalLm", (ctx) => scale(ctx, w, 1));
    const dispatcher = new BackwardDispatcher(state, callbacks, true);

    const results = await dispatcher.dispatch(
      [tokens([[1, 2]])],
      [B.fromArray([1, 3], [1, 2])],
      [{ kind: "textCausalLm" }],
    );

    expect(results).toEqual([{ code: "Success", message: "Success" }]);
    const g = Array.from(w.grad?.data ?? []);
    expect(g[0]).toBeCloseTo(0.25, 4);
    expect(g[1]).toBeCloseTo(0.75, 4);
    expect(await gradientCount(state)).toBe(1);
  });

  it("converts integer gradients before normalizing", async () => {
    const state = makeState();
    const w = new Variable(B.fromArray([0, 0], [1, 2]), true);
    const callbacks: CallbackMap = new Map();
    callbacks.set("textCausalLm", (ctx) => scale(ctx, w, 1));
    const dispatcher = new BackwardDispatcher(state, callbacks, true);

    await dispatcher.dispatch([tokens([[1, 2]])], [B.fromArray([1, 1], [1, 2], "i32")], [{ kind: "textCausalLm" }]);
    expect(w.grad?.dtype).toBe("f32");
    expect(w.grad?.data[0]).toBeCloseTo(0.5, 4);
  });

  it("isolates a failing callback from the rest of the batch", async () => {
    const state = makeState();
    const w = new Variable(B.fromArray([1], [1, 1]), true);
    const callbacks: CallbackMap = new Map();
    callbacks.set("textLastHiddenState", () => {
      throw new Error("boom");
    });
    callbacks.set("textCausalLm", (ctx) => scale(ctx, w, 2));
    callbacks.set("textSeq2Seq", () => new Variable(B.zeros([1, 1], "i32"), false));
    const dispatcher = new BackwardDispatcher(state, callbacks, true);
    const input = tokens([[3]]);

    const results = await dispatcher.dispatch(
      [input, input, input, input],
      [B.ones([1, 1]), B.ones([1, 1]), B.ones([1, 1])],
      [{ kind: "textLastHiddenState" }, { kind: "textCausalLm" }, { kind: "textSeq2Seq" }, { kind: "textCausalLm" }],
    );

    expect(results).toEqual([
      { code: "UnknownException", message: "boom" },
      { code: "Success", message: "Success" },
      { code: "UnknownException", message: "textSeq2Seq output does not require grad" },
      { code: "UnknownException", message: "textCausalLm: missing gradient" },
    ]);
    expect(await gradientCount(state)).toBe(1);
  });

  it("releases the model lock when it is done", async () => {
    const state = makeState();
    const dispatcher = new BackwardDispatcher(state, new Map(), true);
    const pending = dispatcher.dispatch([tokens([[1]])], [B.ones([1, 1])], [{ kind: "textCausalLm" }]);
    expect(await pending).toEqual([{ code: "NotImplemented", message: "Not Implemented" }]);
    expect(state.isLocked()).toBe(false);
  });
});
