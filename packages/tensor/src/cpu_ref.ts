/**
 * cpu_ref -- Reference CPU backend for the tensorpeer tensor system.
 *
 * Every operation is a straightforward loop over typed arrays.
 * The goal is correctness, not speed.
 */

import {
  type Backend,
  type TensorData,
  type Dtype,
  type Shape,
  type NumericArray,
  shapeSize,
  shapeStrides,
  allocArray,
  copyArray,
  broadcastShape,
  broadcastStrides,
  stridedOffset,
  formatShape,
} from "@tensorpeer/core";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeTensor(shape: Shape, dtype: Dtype, data: NumericArray): TensorData {
  return { shape, dtype, data };
}

function allocTensor(shape: Shape, dtype: Dtype): TensorData {
  return makeTensor(shape, dtype, allocArray(dtype, shapeSize(shape)));
}

/** Normalise a possibly-negative axis to [0, ndim). */
function normalizeAxis(axis: number, ndim: number): number {
  const a = axis < 0 ? axis + ndim : axis;
  if (a < 0 || a >= ndim) throw new Error(`axis ${axis} out of range for ndim ${ndim}`);
  return a;
}

/** Mixed int/float operands compute in f32. */
function commonDtype(a: Dtype, b: Dtype): Dtype {
  return a === "i32" && b === "i32" ? "i32" : "f32";
}

function binaryOp(a: TensorData, b: TensorData, fn: (x: number, y: number) => number): TensorData {
  const dtype = commonDtype(a.dtype, b.dtype);
  const shape = broadcastShape(a.shape, b.shape);
  const size = shapeSize(shape);
  const out = allocArray(dtype, size);
  const sameA = shapeSize(a.shape) === size && a.shape.length === shape.length;
  const sameB = shapeSize(b.shape) === size && b.shape.length === shape.length;
  const sa = broadcastStrides(a.shape, shape);
  const sb = broadcastStrides(b.shape, shape);
  for (let i = 0; i < size; i++) {
    const ia = sameA ? i : stridedOffset(i, shape, sa);
    const ib = sameB ? i : stridedOffset(i, shape, sb);
    out[i] = fn(a.data[ia], b.data[ib]);
  }
  return makeTensor(shape, dtype, out);
}

function unaryOp(a: TensorData, fn: (x: number) => number): TensorData {
  const out = allocArray(a.dtype, a.data.length);
  for (let i = 0; i < a.data.length; i++) out[i] = fn(a.data[i]);
  return makeTensor(a.shape, a.dtype, out);
}

/**
 * Visit every 1-D line along `axis`: calls `fn(base, stride, len)` where
 * the line's elements live at `base + j * stride` for j in [0, len).
 */
function forEachLine(shape: Shape, axis: number, fn: (base: number, stride: number, len: number, line: number) => void): void {
  const strides = shapeStrides(shape);
  const len = shape[axis];
  const stride = strides[axis];
  const lines = len === 0 ? 0 : shapeSize(shape) / len;
  for (let line = 0; line < lines; line++) {
    // decompose `line` over every dim except `axis`
    let rem = line;
    let base = 0;
    for (let d = shape.length - 1; d >= 0; d--) {
      if (d === axis) continue;
      const coord = rem % shape[d];
      rem = (rem - coord) / shape[d];
      base += coord * strides[d];
    }
    fn(base, stride, len, line);
  }
}

function reducedShape(shape: Shape, axis: number, keepdims: boolean): number[] {
  const out: number[] = [];
  for (let d = 0; d < shape.length; d++) {
    if (d !== axis) out.push(shape[d]);
    else if (keepdims) out.push(1);
  }
  return out;
}

// ---------------------------------------------------------------------------
// CpuRefBackend
// ---------------------------------------------------------------------------

export class CpuRefBackend implements Backend {
  readonly name = "cpu_ref";

  // ── creation ────────────────────────────────────────────────────────────

  zeros(shape: Shape, dtype: Dtype = "f32"): TensorData {
    return allocTensor(shape, dtype);
  }

  ones(shape: Shape, dtype: Dtype = "f32"): TensorData {
    return this.full(shape, 1, dtype);
  }

  full(shape: Shape, value: number, dtype: Dtype = "f32"): TensorData {
    const t = allocTensor(shape, dtype);
    t.data.fill(value);
    return t;
  }

  fromArray(data: ArrayLike<number>, shape: Shape, dtype: Dtype = "f32"): TensorData {
    const size = shapeSize(shape);
    if (data.length !== size) {
      throw new Error(`Data length ${data.length} does not match shape ${formatShape(shape)}`);
    }
    return makeTensor([...shape], dtype, copyArray(dtype, data));
  }

  // ── math ────────────────────────────────────────────────────────────────

  add(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => x + y);
  }

  sub(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => x - y);
  }

  mul(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => x * y);
  }

  div(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => x / y);
  }

  /** [..., M, K] x [K, N] or batched [..., M, K] x [..., K, N] with equal batch dims. */
  matmul(a: TensorData, b: TensorData): TensorData {
    const an = a.shape.length;
    const bn = b.shape.length;
    if (an < 2 || bn < 2) {
      throw new Error(`matmul requires at least 2D tensors, got ${formatShape(a.shape)} x ${formatShape(b.shape)}`);
    }
    const M = a.shape[an - 2];
    const K = a.shape[an - 1];
    const N = b.shape[bn - 1];
    if (b.shape[bn - 2] !== K) {
      throw new Error(`matmul shape mismatch: ${formatShape(a.shape)} x ${formatShape(b.shape)}`);
    }

    const batchShape = a.shape.slice(0, an - 2);
    const batch = shapeSize(batchShape);
    // b is either shared across the batch (2-D) or carries the same batch dims
    const bShared = bn === 2;
    if (!bShared && shapeSize(b.shape.slice(0, bn - 2)) !== batch) {
      throw new Error(`matmul batch mismatch: ${formatShape(a.shape)} x ${formatShape(b.shape)}`);
    }

    const dtype = commonDtype(a.dtype, b.dtype);
    const out = allocArray(dtype, batch * M * N);
    for (let p = 0; p < batch; p++) {
      const aOff = p * M * K;
      const bOff = bShared ? 0 : p * K * N;
      const oOff = p * M * N;
      for (let m = 0; m < M; m++) {
        for (let n = 0; n < N; n++) {
          let s = 0;
          for (let k = 0; k < K; k++) s += a.data[aOff + m * K + k] * b.data[bOff + k * N + n];
          out[oOff + m * N + n] = s;
        }
      }
    }
    return makeTensor([...batchShape, M, N], dtype, out);
  }

  sum(a: TensorData, axis?: number, keepdims = false): TensorData {
    if (axis === undefined) {
      let s = 0;
      for (let i = 0; i < a.data.length; i++) s += a.data[i];
      return makeTensor(keepdims ? a.shape.map(() => 1) : [], a.dtype, copyArray(a.dtype, [s]));
    }
    const ax = normalizeAxis(axis, a.shape.length);
    const out = allocArray(a.dtype, a.shape[ax] === 0 ? 0 : shapeSize(a.shape) / a.shape[ax]);
    forEachLine(a.shape, ax, (base, stride, len, line) => {
      let s = 0;
      for (let j = 0; j < len; j++) s += a.data[base + j * stride];
      out[line] = s;
    });
    return makeTensor(reducedShape(a.shape, ax, keepdims), a.dtype, out);
  }

  mean(a: TensorData, axis?: number, keepdims = false): TensorData {
    const n = axis === undefined ? a.data.length : a.shape[normalizeAxis(axis, a.shape.length)];
    const s = this.sum({ ...a, dtype: "f32", data: copyArray("f32", a.data) }, axis, keepdims);
    return this.scale(s, 1 / n);
  }

  // ── element-wise ────────────────────────────────────────────────────────

  neg(a: TensorData): TensorData {
    return unaryOp(a, (x) => -x);
  }

  exp(a: TensorData): TensorData {
    return unaryOp(a, Math.exp);
  }

  log(a: TensorData): TensorData {
    return unaryOp(a, Math.log);
  }

  scale(a: TensorData, s: number): TensorData {
    return unaryOp(a, (x) => x * s);
  }

  // ── nn ──────────────────────────────────────────────────────────────────

  /** weight: [vocab, dim], indices: any shape of token ids -> [...indices.shape, dim] */
  embedding(weight: TensorData, indices: TensorData): TensorData {
    const [vocab, dim] = weight.shape;
    const outShape = [...indices.shape, dim];
    const out = allocArray(weight.dtype, shapeSize(outShape));
    for (let i = 0; i < indices.data.length; i++) {
      const idx = indices.data[i];
      if (idx < 0 || idx >= vocab) throw new Error(`embedding index ${idx} out of range for vocab ${vocab}`);
      out.set(weight.data.subarray(idx * dim, idx * dim + dim), i * dim);
    }
    return makeTensor(outShape, weight.dtype, out);
  }

  relu(a: TensorData): TensorData {
    return unaryOp(a, (x) => (x > 0 ? x : 0));
  }

  softmax(a: TensorData, axis?: number): TensorData {
    const ax = normalizeAxis(axis ?? a.shape.length - 1, a.shape.length);
    const out = allocArray("f32", a.data.length);
    forEachLine(a.shape, ax, (base, stride, len) => {
      let max = -Infinity;
      for (let j = 0; j < len; j++) max = Math.max(max, a.data[base + j * stride]);
      let sumExp = 0;
      for (let j = 0; j < len; j++) {
        const e = Math.exp(a.data[base + j * stride] - max);
        out[base + j * stride] = e;
        sumExp += e;
      }
      for (let j = 0; j < len; j++) out[base + j * stride] /= sumExp;
    });
    return makeTensor(a.shape, "f32", out);
  }

  logSoftmax(a: TensorData, axis?: number): TensorData {
    // x - max - log(sum(exp(x - max)))
    const ax = normalizeAxis(axis ?? a.shape.length - 1, a.shape.length);
    const out = allocArray("f32", a.data.length);
    forEachLine(a.shape, ax, (base, stride, len) => {
      let max = -Infinity;
      for (let j = 0; j < len; j++) max = Math.max(max, a.data[base + j * stride]);
      let sumExp = 0;
      for (let j = 0; j < len; j++) sumExp += Math.exp(a.data[base + j * stride] - max);
      const lse = max + Math.log(sumExp);
      for (let j = 0; j < len; j++) out[base + j * stride] = a.data[base + j * stride] - lse;
    });
    return makeTensor(a.shape, "f32", out);
  }

  /** logits: [N, C], targets: [N] class ids. Returns the mean NLL as a scalar. */
  crossEntropy(logits: TensorData, targets: TensorData): TensorData {
    const [N, C] = logits.shape;
    const logProbs = this.logSoftmax(logits, 1);
    let loss = 0;
    for (let i = 0; i < N; i++) loss -= logProbs.data[i * C + targets.data[i]];
    return makeTensor([], "f32", Float32Array.of(loss / N));
  }

  // ── reshape ─────────────────────────────────────────────────────────────

  reshape(a: TensorData, shape: Shape): TensorData {
    if (shapeSize(shape) !== shapeSize(a.shape)) {
      throw new Error(`Cannot reshape ${formatShape(a.shape)} to ${formatShape(shape)}: size mismatch`);
    }
    return makeTensor([...shape], a.dtype, copyArray(a.dtype, a.data));
  }

  transpose(a: TensorData, dim0: number, dim1: number): TensorData {
    const ndim = a.shape.length;
    const d0 = normalizeAxis(dim0, ndim);
    const d1 = normalizeAxis(dim1, ndim);
    const newShape = [...a.shape];
    newShape[d0] = a.shape[d1];
    newShape[d1] = a.shape[d0];

    // read the source through permuted strides
    const src = shapeStrides(a.shape);
    const perm = [...src];
    perm[d0] = src[d1];
    perm[d1] = src[d0];
    const out = allocArray(a.dtype, a.data.length);
    for (let i = 0; i < out.length; i++) out[i] = a.data[stridedOffset(i, newShape, perm)];
    return makeTensor(newShape, a.dtype, out);
  }

  // ── utility ─────────────────────────────────────────────────────────────

  argmax(a: TensorData, axis?: number): TensorData {
    const first = (base: number, stride: number, len: number): number => {
      let best = -Infinity;
      let idx = 0;
      for (let j = 0; j < len; j++) {
        const v = a.data[base + j * stride];
        if (v > best) {
          best = v;
          idx = j;
        }
      }
      return idx;
    };
    if (axis === undefined) return makeTensor([], "i32", Int32Array.of(first(0, 1, a.data.length)));

    const ax = normalizeAxis(axis, a.shape.length);
    const outShape = reducedShape(a.shape, ax, false);
    const out = new Int32Array(shapeSize(outShape));
    forEachLine(a.shape, ax, (base, stride, len, line) => {
      out[line] = first(base, stride, len);
    });
    return makeTensor(outShape, "i32", out);
  }

  clone(a: TensorData): TensorData {
    return makeTensor([...a.shape], a.dtype, copyArray(a.dtype, a.data));
  }

  // ── comparison ──────────────────────────────────────────────────────────

  equal(a: TensorData, b: TensorData): boolean {
    if (a.dtype !== b.dtype || a.shape.length !== b.shape.length) return false;
    for (let d = 0; d < a.shape.length; d++) if (a.shape[d] !== b.shape[d]) return false;
    for (let i = 0; i < a.data.length; i++) if (a.data[i] !== b.data[i]) return false;
    return true;
  }

  allClose(a: TensorData, b: TensorData, atol = 1e-5, rtol = 1e-8): boolean {
    if (a.shape.length !== b.shape.length) return false;
    for (let d = 0; d < a.shape.length; d++) if (a.shape[d] !== b.shape[d]) return false;
    for (let i = 0; i < a.data.length; i++) {
      if (Math.abs(a.data[i] - b.data[i]) > atol + rtol * Math.abs(b.data[i])) return false;
    }
    return true;
  }
}
