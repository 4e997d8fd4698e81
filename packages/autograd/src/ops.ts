/**
 * Differentiable operations: each wraps a backend op and records its
 * backward closure on the tape.
 *
 * Every function takes a context (tape + backend) and Variable inputs and
 * returns a Variable output.
 */
import type { TensorData, Backend, Shape } from "@tensorpeer/core";
import { AutogradError, shapeSize, shapesEqual, formatShape } from "@tensorpeer/core";
import { Variable, type Tape } from "./tape.js";

export type Ctx = { readonly tape: Tape; readonly backend: Backend };

// helper: create output variable and record on tape
function record(
  ctx: Ctx,
  data: TensorData,
  inputs: Variable[],
  backward: (outGrad: TensorData, b: Backend, needsGrad: readonly boolean[]) => (TensorData | null)[],
): Variable {
  const out = new Variable(data, inputs.some((v) => v.requiresGrad));
  ctx.tape.record({ output: out, inputs, backward });
  return out;
}

// ── Arithmetic ─────────────────────────────────────────────────────────────

export function add(ctx: Ctx, a: Variable, b: Variable): Variable {
  const aShape = a.data.shape, bShape = b.data.shape;
  return record(ctx, ctx.backend.add(a.data, b.data), [a, b], (g, B) => [
    reduceBroadcast(B, g, aShape),
    reduceBroadcast(B, g, bShape),
  ]);
}

export function mul(ctx: Ctx, a: Variable, b: Variable): Variable {
  const aData = a.data, bData = b.data;
  return record(ctx, ctx.backend.mul(aData, bData), [a, b], (g, B, needsGrad) => [
    needsGrad[0] ? reduceBroadcast(B, B.mul(g, bData), aData.shape) : null,
    needsGrad[1] ? reduceBroadcast(B, B.mul(g, aData), bData.shape) : null,
  ]);
}

export function scale(ctx: Ctx, a: Variable, s: number): Variable {
  return record(ctx, ctx.backend.scale(a.data, s), [a], (g, B) => [B.scale(g, s)]);
}

// ── Matmul ─────────────────────────────────────────────────────────────────

/** 2-D matmul: [M, K] x [K, N] -> [M, N]. */
export function matmul(ctx: Ctx, a: Variable, b: Variable): Variable {
  const aData = a.data, bData = b.data;
  if (aData.shape.length !== 2 || bData.shape.length !== 2) {
    throw new AutogradError({
      message: `matmul expects 2-D operands, got ${formatShape(aData.shape)} x ${formatShape(bData.shape)}`,
    });
  }
  return record(ctx, ctx.backend.matmul(aData, bData), [a, b], (g, B, needsGrad) => [
    // dL/dA = G @ B^T, dL/dB = A^T @ G
    needsGrad[0] ? B.matmul(g, B.transpose(bData, 0, 1)) : null,
    needsGrad[1] ? B.matmul(B.transpose(aData, 0, 1), g) : null,
  ]);
}

// ── Reductions ─────────────────────────────────────────────────────────────

export function sum(ctx: Ctx, a: Variable, axis?: number, keepdims?: boolean): Variable {
  const aShape = a.data.shape;
  return record(ctx, ctx.backend.sum(a.data, axis, keepdims), [a], (g, B) => [
    broadcastTo(B, restoreAxis(g, aShape, axis), aShape),
  ]);
}

export function mean(ctx: Ctx, a: Variable, axis?: number, keepdims?: boolean): Variable {
  const aShape = a.data.shape;
  const n = axis !== undefined ? aShape[axis < 0 ? aShape.length + axis : axis] : shapeSize(aShape);
  return record(ctx, ctx.backend.mean(a.data, axis, keepdims), [a], (g, B) => [
    B.scale(broadcastTo(B, restoreAxis(g, aShape, axis), aShape), 1 / n),
  ]);
}

// ── Element-wise ───────────────────────────────────────────────────────────

export function relu(ctx: Ctx, a: Variable): Variable {
  const aData = a.data;
  return record(ctx, ctx.backend.relu(aData), [a], (g, B) => {
    const mask = new Float32Array(aData.data.length);
    for (let i = 0; i < mask.length; i++) mask[i] = aData.data[i] > 0 ? 1 : 0;
    return [B.mul(g, { shape: aData.shape, dtype: "f32", data: mask })];
  });
}

// ── NN ops ─────────────────────────────────────────────────────────────────

export function embedding(ctx: Ctx, weight: Variable, indices: TensorData): Variable {
  const wData = weight.data;
  return record(ctx, ctx.backend.embedding(wData, indices), [weight], (g, B) => {
    // scatter gradients back to the rows that were looked up
    const [vocab, dim] = wData.shape;
    const grad = B.zeros([vocab, dim], "f32");
    for (let i = 0; i < indices.data.length; i++) {
      const row = indices.data[i] * dim;
      for (let d = 0; d < dim; d++) grad.data[row + d] += g.data[i * dim + d];
    }
    return [grad];
  });
}

/** logits: [N, C], targets: [N]. Mean negative log-likelihood. */
export function crossEntropy(ctx: Ctx, logits: Variable, targets: TensorData): Variable {
  const logitsData = logits.data;
  return record(ctx, ctx.backend.crossEntropy(logitsData, targets), [logits], (g, B) => {
    // (softmax(logits) - one_hot(targets)) * g / N
    const [N, C] = logitsData.shape;
    const probs = B.softmax(logitsData, -1);
    const oneHot = new Float32Array(N * C);
    for (let i = 0; i < N; i++) oneHot[i * C + targets.data[i]] = 1;
    const diff = B.sub(probs, { shape: [N, C], dtype: "f32", data: oneHot });
    return [B.scale(diff, g.data[0] / N)];
  });
}

// ── Reshape ────────────────────────────────────────────────────────────────

export function reshape(ctx: Ctx, a: Variable, shape: Shape): Variable {
  const origShape = a.data.shape;
  return record(ctx, ctx.backend.reshape(a.data, shape), [a], (g, B) => [B.reshape(g, origShape)]);
}

// ── Helpers ────────────────────────────────────────────────────────────────

/** Reduce grad to match target shape (undo broadcasting). */
function reduceBroadcast(B: Backend, grad: TensorData, target: Shape): TensorData {
  if (shapesEqual(grad.shape, target)) return grad;
  let result = grad;
  while (result.shape.length > target.length) result = B.sum(result, 0);
  for (let i = 0; i < target.length; i++) {
    if (target[i] === 1 && result.shape[i] !== 1) result = B.sum(result, i, true);
  }
  return shapeSize(target) === 1 && result.shape.length !== target.length ? B.reshape(result, target) : result;
}

/** Re-insert a reduced axis as size 1 so the grad broadcasts back. */
function restoreAxis(g: TensorData, shape: Shape, axis?: number): TensorData {
  if (axis === undefined || g.shape.length === shape.length) return g;
  const ax = axis < 0 ? shape.length + axis : axis;
  const kept = [...g.shape];
  kept.splice(ax, 0, 1);
  return { ...g, shape: kept };
}

/** Broadcast a (possibly reduced) tensor to a target shape. */
function broadcastTo(B: Backend, t: TensorData, target: Shape): TensorData {
  if (shapesEqual(t.shape, target)) return t;
  return B.add(B.zeros(target, "f32"), t);
}
