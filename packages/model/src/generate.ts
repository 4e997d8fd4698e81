/**
 * Autoregressive generation from the nucleus (forward-only).
 */
import type { NucleusConfig, Backend, Rng, TensorData } from "@tensorpeer/core";
import { noGradCtx } from "@tensorpeer/autograd";
import { causalLmForward, type NucleusParams } from "./nucleus.js";

export interface GenerateOptions {
  readonly numToGenerate: number;
  readonly doSample: boolean;
  readonly temperature: number;
  /** 0 disables top-k filtering. */
  readonly topk: number;
  /** 1 disables nucleus filtering. */
  readonly topP: number;
  readonly repetitionPenalty: number;
  /** 0 disables n-gram blocking. */
  readonly noRepeatNgramSize: number;
  /** Wall-clock budget in ms; remaining positions repeat the last token. */
  readonly maxTimeMs?: number;
}

/** Ban tokens that would complete an n-gram already present in `seq`. */
function bannedByNgram(seq: readonly number[], n: number): Set<number> {
  const banned = new Set<number>();
  if (n <= 0 || seq.length < n) return banned;
  const prefix = seq.slice(seq.length - n + 1);
  for (let i = 0; i + n <= seq.length; i++) {
    let match = true;
    for (let j = 0; j < n - 1; j++) {
      if (seq[i + j] !== prefix[j]) {
        match = false;
        break;
      }
    }
    if (match) banned.add(seq[i + n - 1]);
  }
  return banned;
}

function pickToken(logits: Float32Array, opts: GenerateOptions, rng: Rng): number {
  const vocab = logits.length;
  if (!opts.doSample || opts.temperature <= 0) {
    let best = 0;
    for (let v = 1; v < vocab; v++) if (logits[v] > logits[best]) best = v;
    return best;
  }

  for (let v = 0; v < vocab; v++) logits[v] /= opts.temperature;

  // Top-k filtering
  if (opts.topk > 0 && opts.topk < vocab) {
    const sorted = Array.from(logits).sort((a, b) => b - a);
    const threshold = sorted[opts.topk - 1];
    for (let v = 0; v < vocab; v++) if (logits[v] < threshold) logits[v] = -Infinity;
  }

  let max = -Infinity;
  for (let v = 0; v < vocab; v++) max = Math.max(max, logits[v]);
  const probs = new Float32Array(vocab);
  let total = 0;
  for (let v = 0; v < vocab; v++) {
    probs[v] = Number.isFinite(logits[v]) ? Math.exp(logits[v] - max) : 0;
    total += probs[v];
  }

  // Top-p (nucleus) filtering: keep the smallest prefix reaching topP mass.
  const order = Array.from(probs.keys()).filter((v) => probs[v] > 0).sort((a, b) => probs[b] - probs[a]);
  let keep = order.length;
  if (opts.topP > 0 && opts.topP < 1) {
    let mass = 0;
    for (let i = 0; i < order.length; i++) {
      mass += probs[order[i]];
      if (mass >= total * opts.topP) {
        keep = i + 1;
        break;
      }
    }
  }

  let kept = 0;
  for (let i = 0; i < keep; i++) kept += probs[order[i]];
  const r = rng.next() * kept;
  let cum = 0;
  for (let i = 0; i < keep; i++) {
    cum += probs[order[i]];
    if (r < cum) return order[i];
  }
  return order[keep - 1] ?? 0;
}

/**
 * Continue every row of `prompt` ([B, T] i32) by `numToGenerate` tokens.
 * Returns only the generated part as [B, numToGenerate] i32.
 */
export function generate(
  config: NucleusConfig,
  params: NucleusParams,
  backend: Backend,
  rng: Rng,
  prompt: TensorData,
  opts: GenerateOptions,
  now: () => number = Date.now,
): TensorData {
  const [B, T] = prompt.shape;
  const n = opts.numToGenerate;
  const out = new Int32Array(B * n);
  const ctx = noGradCtx(backend);
  const deadline = opts.maxTimeMs !== undefined ? now() + opts.maxTimeMs : Infinity;

  for (let b = 0; b < B; b++) {
    const seq = Array.from(prompt.data.subarray(b * T, (b + 1) * T));
    for (let i = 0; i < n; i++) {
      if (now() > deadline) {
        out.fill(seq[seq.length - 1] ?? 0, b * n + i, (b + 1) * n);
        break;
      }
      // each position's logits depend only on its own token, so the last one suffices
      const last: TensorData = { shape: [1, 1], dtype: "i32", data: Int32Array.of(seq[seq.length - 1] ?? 0) };
      const logits = Float32Array.from(causalLmForward(ctx, config, params, last).data.data);

      if (opts.repetitionPenalty !== 1) {
        for (const t of new Set(seq)) {
          logits[t] = logits[t] > 0 ? logits[t] / opts.repetitionPenalty : logits[t] * opts.repetitionPenalty;
        }
      }
      for (const t of bannedByNgram(seq, opts.noRepeatNgramSize)) logits[t] = -Infinity;

      const next = pickToken(logits, opts, rng);
      seq.push(next);
      out[b * n + i] = next;
    }
  }
  return { shape: [B, n], dtype: "i32", data: out };
}
