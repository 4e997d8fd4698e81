export {
  SGD, clipGradNorm, createOptimizerRegistry,
  type SGDConfig, type GradHolder, type OptimizerName,
} from "./optimizers.js";
export { DataLoader, byteTokens, loadText, type DataBatch } from "./data.js";
export { FileCheckpoint, buildCheckpointState, restoreCheckpoint } from "./checkpoint.js";
