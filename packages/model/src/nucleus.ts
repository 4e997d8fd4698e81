/**
 * The served model ("nucleus").
 *
 * A deliberately small network:
 * - Token embedding [vocab, nEmbd]
 * - Projection to the hidden state: relu(x @ fc + fcBias) -> [B, T, hiddenDim]
 * - Language model head: hidden @ lmHead -> [B, T, vocab]
 */
import type { NucleusConfig, Backend, TensorData } from "@tensorpeer/core";
import { ModelError, SeededRng, shapeSize, shapesEqual, formatShape } from "@tensorpeer/core";
import { Variable, type Ctx, add, matmul, relu, reshape, embedding, crossEntropy } from "@tensorpeer/autograd";

// ── Parameter initialization ───────────────────────────────────────────────

export interface NucleusParams {
  /** Token embeddings [vocabSize, nEmbd] */
  embed: Variable;
  /** Hidden projection [nEmbd, hiddenDim] */
  fc: Variable;
  fcBias: Variable;
  /** Language model head [hiddenDim, vocabSize] */
  lmHead: Variable;
}

function initWeight(rng: SeededRng, shape: number[], std: number): Variable {
  const data = new Float32Array(shapeSize(shape));
  for (let i = 0; i < data.length; i++) data[i] = rng.nextGauss() * std;
  return new Variable({ shape, dtype: "f32", data }, true);
}

export function initNucleus(config: NucleusConfig, backend: Backend): NucleusParams {
  const { vocabSize, nEmbd, hiddenDim, seed } = config;
  const rng = new SeededRng(seed);
  return {
    embed: initWeight(rng, [vocabSize, nEmbd], 0.02),
    fc: initWeight(rng, [nEmbd, hiddenDim], 1 / Math.sqrt(nEmbd)),
    fcBias: new Variable(backend.zeros([hiddenDim], "f32"), true),
    lmHead: initWeight(rng, [hiddenDim, vocabSize], 0.02),
  };
}

// ── Forward ────────────────────────────────────────────────────────────────

function checkTokens(config: NucleusConfig, tokens: TensorData): [number, number] {
  if (tokens.dtype !== "i32" || tokens.shape.length !== 2) {
    throw new ModelError({ message: `expected i32 tokens [batch, seq], got ${tokens.dtype} ${formatShape(tokens.shape)}` });
  }
  for (let i = 0; i < tokens.data.length; i++) {
    const t = tokens.data[i];
    if (t < 0 || t >= config.vocabSize) {
      throw new ModelError({ message: `token ${t} outside vocabulary of ${config.vocabSize}` });
    }
  }
  return [tokens.shape[0], tokens.shape[1]];
}

/** Last hidden state: [B, T] tokens -> [B, T, hiddenDim]. */
export function encodeForward(ctx: Ctx, config: NucleusConfig, params: NucleusParams, tokens: TensorData): Variable {
  const [B, T] = checkTokens(config, tokens);
  const x = reshape(ctx, embedding(ctx, params.embed, tokens), [B * T, config.nEmbd]);
  const h = relu(ctx, add(ctx, matmul(ctx, x, params.fc), params.fcBias));
  return reshape(ctx, h, [B, T, config.hiddenDim]);
}

/** Causal LM logits: [B, T] tokens -> [B, T, vocabSize]. */
export function causalLmForward(ctx: Ctx, config: NucleusConfig, params: NucleusParams, tokens: TensorData): Variable {
  const [B, T] = tokens.shape;
  const h = reshape(ctx, encodeForward(ctx, config, params, tokens), [B * T, config.hiddenDim]);
  return reshape(ctx, matmul(ctx, h, params.lmHead), [B, T, config.vocabSize]);
}

/** Next-token cross-entropy of `inputs` against `targets`, both [B, T]. */
export function localLoss(
  ctx: Ctx,
  config: NucleusConfig,
  params: NucleusParams,
  inputs: TensorData,
  targets: TensorData,
): Variable {
  if (!shapesEqual(inputs.shape, targets.shape)) {
    throw new ModelError({
      message: `inputs ${formatShape(inputs.shape)} and targets ${formatShape(targets.shape)} differ`,
    });
  }
  const [B, T] = inputs.shape;
  const logits = reshape(ctx, causalLmForward(ctx, config, params, inputs), [B * T, config.vocabSize]);
  const flatTargets: TensorData = { shape: [B * T], dtype: "i32", data: targets.data };
  return crossEntropy(ctx, logits, flatTargets);
}

// ── Parameters ─────────────────────────────────────────────────────────────

export function collectParams(params: NucleusParams): Map<string, Variable> {
  return new Map([
    ["embed", params.embed],
    ["fc", params.fc],
    ["fcBias", params.fcBias],
    ["lmHead", params.lmHead],
  ]);
}

export function countParams(params: NucleusParams): number {
  let total = 0;
  for (const [, v] of collectParams(params)) total += shapeSize(v.data.shape);
  return total;
}

/** Copy saved tensors into live parameters; shapes must match exactly. */
export function loadParams(params: NucleusParams, saved: Map<string, TensorData>): void {
  for (const [name, variable] of collectParams(params)) {
    const td = saved.get(name);
    if (!td) throw new ModelError({ message: `checkpoint is missing parameter "${name}"` });
    if (!shapesEqual(td.shape, variable.data.shape)) {
      throw new ModelError({
        message: `parameter "${name}" has shape ${formatShape(td.shape)}, expected ${formatShape(variable.data.shape)}`,
      });
    }
    variable.data.data.set(td.data);
  }
}
