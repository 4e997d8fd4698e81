/**
 * Backward gradient dispatcher: applies gradients sent by remote callers
 * to the shared model parameters.
 */
import type { TensorData } from "@tensorpeer/core";
import { AutogradError, copyArray, errorMessage } from "@tensorpeer/core";
import { withGradTape, type Ctx } from "@tensorpeer/autograd";
import type { DispatchResult } from "@tensorpeer/synapse";
import { silentLog, type Log } from "@tensorpeer/effect-runtime";
import type { CallbackMap, SynapseRef } from "./callbacks.js";
import type { ModelGuard, ModelState } from "./state.js";

export class BackwardDispatcher {
  constructor(
    private readonly state: ModelState,
    private readonly callbacks: CallbackMap,
    private readonly remoteTrain: boolean,
    private readonly log: Log = silentLog,
  ) {}

  /**
   * One result per synapse, in order. Never rejects: per-item failures are
   * reported as UnknownException.
   */
  async dispatch(
    inputs: readonly TensorData[],
    grads: readonly TensorData[],
    synapses: readonly SynapseRef[],
  ): Promise<DispatchResult[]> {
    if (!this.remoteTrain) return [];
    try {
      return await this.state.exclusive((guard) =>
        withGradTape(guard.backend, (ctx) =>
          synapses.map((synapse, i) => this.backwardOne(ctx, guard, synapse, inputs[i], grads[i])),
        ),
      );
    } catch (e) {
      this.log.error("backward dispatch failed", { error: errorMessage(e) });
      return synapses.map((): DispatchResult => ({ code: "UnknownException", message: errorMessage(e) }));
    }
  }

  private backwardOne(
    ctx: Ctx,
    guard: ModelGuard,
    synapse: SynapseRef,
    input: TensorData | undefined,
    grad: TensorData | undefined,
  ): DispatchResult {
    const callback = this.callbacks.get(synapse.kind);
    if (!callback) return { code: "NotImplemented", message: "Not Implemented" };
    if (!input || !grad) {
      return { code: "UnknownException", message: `${synapse.kind}: missing ${input ? "gradient" : "input"}` };
    }
    try {
      const out = callback(ctx, input, synapse);
      if (!out.requiresGrad) {
        throw new AutogradError({ message: `${synapse.kind} output does not require grad` });
      }
      const g: TensorData = grad.dtype === "f32" ? grad : { ...grad, dtype: "f32", data: copyArray("f32", grad.data) };
      const total = ctx.backend.sum(g).data[0];
      const normalized = ctx.backend.scale(g, 1 / (total + 1e-5));
      // the tape is retained: later items may backpropagate through it too
      ctx.tape.backward(out, ctx.backend, normalized);
      guard.addGradients(input.shape[0]);
      return { code: "Success", message: "Success" };
    } catch (e) {
      this.log.debug("backward item failed", { synapse: synapse.kind, error: errorMessage(e) });
      return { code: "UnknownException", message: errorMessage(e) };
    }
  }
}
