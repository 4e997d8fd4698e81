export { Variable, Tape, type TapeEntry } from "./tape.js";
export {
  type Ctx,
  add, mul, scale,
  matmul,
  sum, mean,
  relu,
  embedding, crossEntropy,
  reshape,
} from "./ops.js";
export { withGradTape, noGradCtx } from "./grad.js";
