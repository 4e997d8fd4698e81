/**
 * The model-update lock: a single-permit effect Semaphore exposed as a
 * promise API. Critical sections run one at a time in FIFO order and the
 * permit is returned on every exit path.
 */
import { Cause, Effect, Exit } from "effect";

export class ModelLock {
  private readonly semaphore = Effect.unsafeMakeSemaphore(1);
  private held = false;

  /** Run `fn` while holding the lock; resolves or rejects with its outcome. */
  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    const body = Effect.tryPromise({
      try: async () => {
        this.held = true;
        try {
          return await fn();
        } finally {
          this.held = false;
        }
      },
      catch: (e) => e,
    });
    const exit = await Effect.runPromiseExit(this.semaphore.withPermits(1)(body));
    if (Exit.isSuccess(exit)) return exit.value;
    throw Cause.squash(exit.cause);
  }

  isLocked(): boolean {
    return this.held;
  }
}
