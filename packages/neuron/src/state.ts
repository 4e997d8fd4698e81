/**
 * Shared model state: parameters, optimizer and the remote gradient
 * counter, all behind one ModelLock.
 */
import type { Backend, NucleusConfig, Optimizer } from "@tensorpeer/core";
import { ModelError } from "@tensorpeer/core";
import type { Variable } from "@tensorpeer/autograd";
import { collectParams, type NucleusParams } from "@tensorpeer/model";
import { ModelLock } from "@tensorpeer/effect-runtime";

/** Handle into the model state, valid only inside `exclusive`. */
export interface ModelGuard {
  readonly params: NucleusParams;
  readonly backend: Backend;
  readonly optimizer: Optimizer;
  /** Samples that received a remote backward pass since the last update. */
  readonly gradientCount: number;
  addGradients(samples: number): void;
  resetGradients(): void;
  /** Drop accumulated parameter gradients. */
  zeroGrad(): void;
  parameters(): Map<string, Variable>;
}

export class ModelState {
  private readonly lock = new ModelLock();
  private gradientCount = 0;

  constructor(
    readonly nucleusConfig: NucleusConfig,
    readonly params: NucleusParams,
    readonly optimizer: Optimizer,
    readonly backend: Backend,
  ) {}

  /** Run `fn` holding the model lock. The guard goes stale when `fn` settles. */
  exclusive<T>(fn: (guard: ModelGuard) => T | Promise<T>): Promise<T> {
    return this.lock.run(async () => {
      let live = true;
      const count = () => this.gradientCount;
      const check = () => {
        if (!live) throw new ModelError({ message: "model guard used after its lock was released" });
      };
      const guard: ModelGuard = {
        params: this.params,
        backend: this.backend,
        optimizer: this.optimizer,
        get gradientCount() {
          return count();
        },
        addGradients: (samples) => {
          check();
          this.gradientCount += samples;
        },
        resetGradients: () => {
          check();
          this.gradientCount = 0;
        },
        zeroGrad: () => {
          check();
          for (const [, v] of collectParams(this.params)) v.grad = null;
        },
        parameters: () => collectParams(this.params),
      };
      try {
        return await fn(guard);
      } finally {
        live = false;
      }
    });
  }

  isLocked(): boolean {
    return this.lock.isLocked();
  }
}
