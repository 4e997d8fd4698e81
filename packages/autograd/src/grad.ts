/**
 * Explicit gradient-tracking contexts.
 */
import type { Backend } from "@tensorpeer/core";
import { Tape } from "./tape.js";
import type { Ctx } from "./ops.js";

/**
 * Run `fn` with a fresh recording tape. The tape (and every intermediate it
 * holds) is released on every exit path, including throws.
 */
export function withGradTape<T>(backend: Backend, fn: (ctx: Ctx) => T): T {
  const tape = new Tape();
  try {
    return fn({ tape, backend });
  } finally {
    tape.clear();
  }
}

/** Forward-only context: ops run but nothing is recorded. */
export function noGradCtx(backend: Backend): Ctx {
  return { tape: Tape.disabled(), backend };
}
