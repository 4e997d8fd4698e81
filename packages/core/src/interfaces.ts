/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import type { Effect } from "effect";
import type { CheckpointError } from "./errors.js";
import type { Dtype, NumericArray, Shape, NucleusConfig } from "./types.js";

// ── Tensor (lightweight handle) ────────────────────────────────────────────
export interface TensorData {
  readonly shape: Shape;
  readonly dtype: Dtype;
  readonly data: NumericArray;
}

// ── Backend ────────────────────────────────────────────────────────────────
export interface Backend {
  readonly name: string;

  // creation
  zeros(shape: Shape, dtype?: Dtype): TensorData;
  ones(shape: Shape, dtype?: Dtype): TensorData;
  full(shape: Shape, value: number, dtype?: Dtype): TensorData;
  fromArray(data: ArrayLike<number>, shape: Shape, dtype?: Dtype): TensorData;

  // math
  add(a: TensorData, b: TensorData): TensorData;
  sub(a: TensorData, b: TensorData): TensorData;
  mul(a: TensorData, b: TensorData): TensorData;
  div(a: TensorData, b: TensorData): TensorData;
  matmul(a: TensorData, b: TensorData): TensorData;
  sum(a: TensorData, axis?: number, keepdims?: boolean): TensorData;
  mean(a: TensorData, axis?: number, keepdims?: boolean): TensorData;

  // element-wise
  neg(a: TensorData): TensorData;
  exp(a: TensorData): TensorData;
  log(a: TensorData): TensorData;
  scale(a: TensorData, s: number): TensorData;

  // nn
  embedding(weight: TensorData, indices: TensorData): TensorData;
  relu(a: TensorData): TensorData;
  softmax(a: TensorData, axis?: number): TensorData;
  logSoftmax(a: TensorData, axis?: number): TensorData;
  crossEntropy(logits: TensorData, targets: TensorData): TensorData;

  // reshape
  reshape(a: TensorData, shape: Shape): TensorData;
  transpose(a: TensorData, dim0: number, dim1: number): TensorData;

  // utility
  argmax(a: TensorData, axis?: number): TensorData;
  clone(a: TensorData): TensorData;

  // comparison
  equal(a: TensorData, b: TensorData): boolean;
  allClose(a: TensorData, b: TensorData, atol?: number, rtol?: number): boolean;
}

// ── Optimizer ──────────────────────────────────────────────────────────────
export interface OptimizerState {
  readonly step: number;
  readonly buffers: Map<string, TensorData>;
}

export interface Optimizer {
  readonly name: string;
  /** Current learning rate. */
  readonly lr: number;
  setLr(lr: number): void;
  step(params: Map<string, TensorData>, grads: Map<string, TensorData>): void;
  stateDict(): OptimizerState;
  loadStateDict(state: OptimizerState): void;
}

// ── Checkpoint ─────────────────────────────────────────────────────────────
export interface CheckpointState {
  readonly nucleusConfig: NucleusConfig;
  readonly params: Map<string, TensorData>;
  readonly optimizerState: OptimizerState;
  readonly configHash: string;
  /** Block height at which the checkpoint was written. */
  readonly block: number;
  readonly bestLoss: number;
}

export interface Checkpoint {
  save(path: string, state: CheckpointState): Effect.Effect<void, CheckpointError>;
  load(path: string): Effect.Effect<CheckpointState, CheckpointError>;
}

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  next(): number;
  nextGauss(): number;
  nextInt(n: number): number;
  seed(s: number): void;
}
