export {
  type NucleusParams,
  initNucleus,
  encodeForward,
  causalLmForward,
  localLoss,
  collectParams,
  countParams,
  loadParams,
} from "./nucleus.js";
export { type GenerateOptions, generate } from "./generate.js";
