/**
 * Core types for the tensorpeer system.
 */

// ── Dtype ──────────────────────────────────────────────────────────────────
export type Dtype = "f32" | "i32";

export type NumericArray = Float32Array | Int32Array;

export function dtypeBytes(d: Dtype): number {
  switch (d) {
    case "f32": return 4;
    case "i32": return 4;
  }
}

/** Allocate a zero-filled backing array for a dtype. */
export function allocArray(d: Dtype, size: number): NumericArray {
  switch (d) {
    case "f32": return new Float32Array(size);
    case "i32": return new Int32Array(size);
  }
}

/** Copy values into a fresh backing array of the given dtype (i32 truncates). */
export function copyArray(d: Dtype, src: ArrayLike<number>): NumericArray {
  switch (d) {
    case "f32": return Float32Array.from(src);
    case "i32": return Int32Array.from(src);
  }
}

// ── Shape helpers ──────────────────────────────────────────────────────────
export type Shape = readonly number[];

export function shapeSize(shape: Shape): number {
  let s = 1;
  for (const d of shape) s *= d;
  return s;
}

export function shapeStrides(shape: Shape): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

export function shapesEqual(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

export function formatShape(shape: Shape): string {
  return `[${shape.join(", ")}]`;
}

// ── Nucleus config ─────────────────────────────────────────────────────────
export interface NucleusConfig {
  readonly vocabSize: number;
  /** Width of the token embedding. */
  readonly nEmbd: number;
  /** Width of the hidden state served to callers. */
  readonly hiddenDim: number;
  /** Tokens per training window. */
  readonly seqLen: number;
  readonly seed: number;
}

export const defaultNucleusConfig: NucleusConfig = {
  vocabSize: 256,
  nEmbd: 32,
  hiddenDim: 64,
  seqLen: 32,
  seed: 42,
};
