/**
 * Resolve the neuron config from CLI args and the environment.
 */
import { loadNeuronConfig, type NeuronConfig } from "@tensorpeer/neuron";
import { parseKV, splitConfigArg } from "./parse.js";

export async function resolveConfig(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<NeuronConfig> {
  const { file, overrides } = splitConfigArg(parseKV(args));
  const secret = env.TENSORPEER_METRICS_SECRET;
  if (secret && overrides["metrics.secret"] === undefined) overrides["metrics.secret"] = secret;
  return loadNeuronConfig(file, overrides);
}
