/**
 * Tape-based autograd engine.
 *
 * Each differentiable op records itself on a tape. backward() walks the
 * tape in reverse, calling each op's backward closure. Recorded entries
 * survive a backward pass (the graph is retained) until clear() is called,
 * so several roots recorded on one tape can each be backpropagated.
 */
import type { TensorData, Backend } from "@tensorpeer/core";
import { AutogradError, shapesEqual, formatShape } from "@tensorpeer/core";

// ── TapeEntry ──────────────────────────────────────────────────────────────
export interface TapeEntry {
  /** The output variable of this op */
  readonly output: Variable;
  /** Inputs to this op */
  readonly inputs: readonly Variable[];
  /** Gradients for each input given the output grad; null where not needed. */
  backward(outGrad: TensorData, backend: Backend, needsGrad: readonly boolean[]): (TensorData | null)[];
}

// ── Variable ───────────────────────────────────────────────────────────────
let nextId = 0;

export class Variable {
  readonly id: number;
  data: TensorData;
  grad: TensorData | null = null;
  readonly requiresGrad: boolean;

  constructor(data: TensorData, requiresGrad = false) {
    this.id = nextId++;
    this.data = data;
    this.requiresGrad = requiresGrad;
  }
}

// ── Tape ───────────────────────────────────────────────────────────────────
export class Tape {
  private entries: TapeEntry[] = [];

  /** A tape that drops every record: forward-only evaluation. */
  static disabled(): Tape {
    return new Tape(false);
  }

  constructor(readonly enabled = true) {}

  record(entry: TapeEntry): void {
    if (this.enabled) this.entries.push(entry);
  }

  /**
   * Backward pass from `root`, seeded with `initialGrad` (ones by default).
   *
   * Gradients accumulate into leaf variables (parameters). Intermediate
   * gradients from any earlier backward on this tape are reset first, so
   * a retained graph never replays a previous root's contribution.
   */
  backward(root: Variable, backend: Backend, initialGrad?: TensorData): void {
    if (!this.enabled) {
      throw new AutogradError({ message: "backward() on a tape that is not recording" });
    }
    if (initialGrad && !shapesEqual(initialGrad.shape, root.data.shape)) {
      throw new AutogradError({
        message: `gradient shape ${formatShape(initialGrad.shape)} does not match output shape ${formatShape(root.data.shape)}`,
      });
    }

    for (const entry of this.entries) entry.output.grad = null;
    root.grad = initialGrad ? backend.clone(initialGrad) : backend.ones(root.data.shape, "f32");

    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      const outGrad = entry.output.grad;
      if (!outGrad) continue;

      const needsGrad = entry.inputs.map((inp) => inp.requiresGrad);
      const inputGrads = entry.backward(outGrad, backend, needsGrad);

      for (let j = 0; j < entry.inputs.length; j++) {
        const input = entry.inputs[j];
        const g = inputGrads[j];
        if (!input.requiresGrad || !g) continue;
        input.grad = input.grad ? backend.add(input.grad, g) : backend.clone(g);
      }
    }
  }

  /** Drop every recorded entry and the gradients held by intermediates. */
  clear(): void {
    for (const entry of this.entries) entry.output.grad = null;
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }
}
