/**
 * NumPy-style broadcasting shared by the CPU backend and autograd ops.
 * Shapes are right-aligned; size-1 dimensions stretch to match.
 */
import type { Shape } from "./types.js";
import { formatShape } from "./types.js";

/** Result shape of broadcasting `a` against `b`. Throws when incompatible. */
export function broadcastShape(a: Shape, b: Shape): number[] {
  const ndim = Math.max(a.length, b.length);
  const out = new Array<number>(ndim);
  for (let i = 0; i < ndim; i++) {
    const da = a[a.length - ndim + i] ?? 1;
    const db = b[b.length - ndim + i] ?? 1;
    if (da !== db && da !== 1 && db !== 1) {
      throw new Error(`Cannot broadcast shapes ${formatShape(a)} and ${formatShape(b)}`);
    }
    out[i] = Math.max(da, db);
  }
  return out;
}

/**
 * Strides for reading `src` as if it had `target` shape: stretched
 * dimensions get stride 0. `target` must be a valid broadcast of `src`.
 */
export function broadcastStrides(src: Shape, target: Shape): number[] {
  const ndim = target.length;
  const pad = ndim - src.length;
  const strides = new Array<number>(ndim);
  let str = 1;
  for (let i = ndim - 1; i >= 0; i--) {
    const d = i < pad ? 1 : src[i - pad];
    strides[i] = d === 1 && target[i] !== 1 ? 0 : str;
    str *= d;
  }
  return strides;
}

/** Map a flat index in `shape` to a flat source offset through `strides`. */
export function stridedOffset(flat: number, shape: Shape, strides: readonly number[]): number {
  let off = 0;
  let rem = flat;
  for (let d = shape.length - 1; d >= 0; d--) {
    const coord = rem % shape[d];
    rem = (rem - coord) / shape[d];
    off += coord * strides[d];
  }
  return off;
}
