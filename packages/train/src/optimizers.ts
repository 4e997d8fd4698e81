/**
 * SGD with momentum, and global-norm gradient clipping.
 */
import type { Backend, TensorData, Optimizer, OptimizerState } from "@tensorpeer/core";
import { OptimizerError, Registry, shapesEqual, formatShape } from "@tensorpeer/core";

// ── SGD ────────────────────────────────────────────────────────────────────

export interface SGDConfig {
  lr: number;
  momentum: number;
}

/**
 * buf = momentum * buf + grad; param -= lr * buf
 * (plain SGD when momentum is 0).
 */
export class SGD implements Optimizer {
  readonly name = "sgd";
  private _step = 0;
  private _lr: number;
  private readonly momentum: number;
  private readonly buffers = new Map<string, Float32Array>();

  constructor(config: Partial<SGDConfig> = {}) {
    this._lr = config.lr ?? 0.01;
    this.momentum = config.momentum ?? 0;
  }

  get lr(): number {
    return this._lr;
  }

  setLr(lr: number): void {
    if (!(lr > 0) || !Number.isFinite(lr)) {
      throw new OptimizerError({ message: `learning rate must be a positive number, got ${lr}` });
    }
    this._lr = lr;
  }

  step(params: Map<string, TensorData>, grads: Map<string, TensorData>): void {
    this._step++;
    for (const [name, param] of params) {
      const grad = grads.get(name);
      if (!grad) continue;
      if (!shapesEqual(param.shape, grad.shape)) {
        throw new OptimizerError({
          message: `gradient for "${name}" has shape ${formatShape(grad.shape)}, parameter is ${formatShape(param.shape)}`,
        });
      }
      const p = param.data;
      const g = grad.data;
      if (this.momentum === 0) {
        for (let i = 0; i < p.length; i++) p[i] -= this._lr * g[i];
        continue;
      }
      let buf = this.buffers.get(name);
      if (!buf) {
        // first step: the buffer starts as the gradient itself
        buf = Float32Array.from(g);
        this.buffers.set(name, buf);
      } else {
        for (let i = 0; i < buf.length; i++) buf[i] = this.momentum * buf[i] + g[i];
      }
      for (let i = 0; i < p.length; i++) p[i] -= this._lr * buf[i];
    }
  }

  stateDict(): OptimizerState {
    const buffers = new Map<string, TensorData>();
    for (const [name, buf] of this.buffers) {
      buffers.set(`momentum.${name}`, { shape: [buf.length], dtype: "f32", data: Float32Array.from(buf) });
    }
    return { step: this._step, buffers };
  }

  loadStateDict(state: OptimizerState): void {
    this._step = state.step;
    this.buffers.clear();
    for (const [key, td] of state.buffers) {
      if (!key.startsWith("momentum.")) continue;
      this.buffers.set(key.slice("momentum.".length), Float32Array.from(td.data));
    }
  }

  get stepCount(): number {
    return this._step;
  }
}

// ── Gradient clipping ──────────────────────────────────────────────────────

export interface GradHolder {
  grad: TensorData | null;
}

/**
 * Scale every gradient so their joint L2 norm is at most `maxNorm`.
 * Returns the norm measured before clipping.
 */
export function clipGradNorm(backend: Backend, holders: Iterable<GradHolder>, maxNorm: number): number {
  const list = [...holders];
  let sq = 0;
  for (const h of list) {
    if (!h.grad) continue;
    const g = h.grad.data;
    for (let i = 0; i < g.length; i++) sq += g[i] * g[i];
  }
  const norm = Math.sqrt(sq);
  if (norm > maxNorm && norm > 0) {
    const clipCoef = maxNorm / (norm + 1e-6);
    for (const h of list) {
      if (h.grad) h.grad = backend.scale(h.grad, clipCoef);
    }
  }
  return norm;
}

// ── Registry ───────────────────────────────────────────────────────────────

export type OptimizerName = "sgd";

export function createOptimizerRegistry(config: Partial<SGDConfig> = {}): Registry<OptimizerName, Optimizer> {
  return new Registry<OptimizerName, Optimizer>("optimizer").register("sgd", () => new SGD(config));
}
