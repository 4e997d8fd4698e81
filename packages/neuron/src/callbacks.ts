/**
 * Per-synapse compute callbacks over the nucleus.
 */
import type { NucleusConfig, Rng, TensorData } from "@tensorpeer/core";
import { Variable, type Ctx } from "@tensorpeer/autograd";
import { causalLmForward, encodeForward, generate, type NucleusParams } from "@tensorpeer/model";
import {
  TextSeq2SeqForwardCall,
  defaultSeq2SeqParams,
  type SynapseKind,
} from "@tensorpeer/synapse";

/** Anything that names a synapse kind; forward calls qualify. */
export interface SynapseRef {
  readonly kind: SynapseKind;
}

/**
 * Forward compute for one synapse. Differentiable callbacks record on
 * `ctx.tape` and return an output with `requiresGrad`.
 */
export type ComputeCallback = (ctx: Ctx, input: TensorData, synapse: SynapseRef) => Variable;

export type CallbackMap = Map<SynapseKind, ComputeCallback>;

export interface NucleusCallbackOptions {
  config: NucleusConfig;
  params: NucleusParams;
  rng: Rng;
  enabled: Readonly<Record<SynapseKind, boolean>>;
}

export function nucleusCallbacks(opts: NucleusCallbackOptions): CallbackMap {
  const { config, params, rng, enabled } = opts;
  const callbacks: CallbackMap = new Map();

  if (enabled.textLastHiddenState) {
    callbacks.set("textLastHiddenState", (ctx, input) => encodeForward(ctx, config, params, input));
  }
  if (enabled.textCausalLm) {
    callbacks.set("textCausalLm", (ctx, input) => causalLmForward(ctx, config, params, input));
  }
  if (enabled.textSeq2Seq) {
    callbacks.set("textSeq2Seq", (ctx, input, synapse) => {
      const p = synapse instanceof TextSeq2SeqForwardCall ? synapse.params : defaultSeq2SeqParams;
      const out = generate(config, params, ctx.backend, rng, input, {
        numToGenerate: p.numToGenerate,
        doSample: p.doSample,
        temperature: p.temperature,
        topk: p.topk,
        topP: p.topP,
        repetitionPenalty: p.repetitionPenalty,
        noRepeatNgramSize: p.noRepeatNgramSize,
        maxTimeMs: p.maxTime * 1000,
      });
      // sampled token ids carry no gradient
      return new Variable(out, false);
    });
  }
  return callbacks;
}
