/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

/** Split off `--config=<file>`; everything else is a config override. */
export function splitConfigArg(kv: Record<string, string>): { file: string | undefined; overrides: Record<string, string> } {
  const { config: file, ...overrides } = kv;
  return { file, overrides };
}

/** Parse `KEY=value` lines, skipping blanks and `#` comments. */
export function parseEnvFile(content: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    out[key] = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
  }
  return out;
}
