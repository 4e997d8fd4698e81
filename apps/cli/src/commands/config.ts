/**
 * Command: tensorpeer config
 */
import { resolveConfig } from "../resolve.js";

export async function configCmd(args: string[]): Promise<void> {
  const config = await resolveConfig(args);
  const shown = config.metrics.secret === null ? config : { ...config, metrics: { ...config.metrics, secret: "***" } };
  console.log(JSON.stringify(shown, null, 2));
}
