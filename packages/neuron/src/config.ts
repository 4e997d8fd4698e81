/**
 * Neuron configuration: defaults, JSON file merge, CLI overrides and
 * validation.
 */
import * as fs from "node:fs/promises";
import { z } from "zod";
import { ConfigError, defaultNucleusConfig, errorMessage } from "@tensorpeer/core";

// ── Schema ─────────────────────────────────────────────────────────────────

const BlacklistConfigSchema = z
  .object({
    /** Master switch: when off no request is ever rejected. */
    enabled: z.boolean(),
    registration: z.boolean(),
    allowNonRegistered: z.boolean(),
    stake: z.object({ enabled: z.boolean(), min: z.number().nonnegative() }).strict(),
    validator: z.boolean(),
    time: z.object({ enabled: z.boolean(), seconds: z.number().nonnegative() }).strict(),
  })
  .strict();

export const NeuronConfigSchema = z
  .object({
    hotkey: z.string(),
    ledgerUrl: z.string().url(),
    ledgerTimeoutMs: z.number().int().positive(),
    blocksPerEpoch: z.number().int().nonnegative(),
    blocksPerSetWeights: z.number().int().nonnegative(),
    /** One block period; the idle wait when local training is off. */
    blockTimeMs: z.number().int().nonnegative(),
    /** Poll interval while waiting for the next block during local training. */
    blockPollMs: z.number().int().nonnegative(),
    localTrain: z.boolean(),
    remoteTrain: z.boolean(),
    /** Base rate; divided by the remote gradient count when one arrived. */
    learningRate: z.number().positive(),
    momentum: z.number().min(0).lt(1),
    clipMaxNorm: z.number().positive(),
    batchSize: z.number().int().positive(),
    corpusPath: z.string().nullable(),
    waitForInclusion: z.boolean(),
    restart: z.boolean(),
    /** Directory holding the checkpoint and metrics log. */
    fullPath: z.string().min(1),
    logLevel: z.enum(["debug", "info", "warn", "error", "none"]),
    metrics: z
      .object({
        jsonl: z.boolean(),
        url: z.string().url().nullable(),
        secret: z.string().nullable(),
        flushIntervalMs: z.number().int().positive(),
      })
      .strict(),
    axon: z.object({ host: z.string(), port: z.number().int().min(0).max(65535) }).strict(),
    synapses: z
      .object({ textLastHiddenState: z.boolean(), textCausalLm: z.boolean(), textSeq2Seq: z.boolean() })
      .strict(),
    nucleus: z
      .object({
        vocabSize: z.number().int().positive(),
        nEmbd: z.number().int().positive(),
        hiddenDim: z.number().int().positive(),
        seqLen: z.number().int().positive(),
        seed: z.number().int(),
      })
      .strict(),
    blacklist: BlacklistConfigSchema,
  })
  .strict();

export type NeuronConfig = z.infer<typeof NeuronConfigSchema>;
export type BlacklistConfig = z.infer<typeof BlacklistConfigSchema>;

export const defaultNeuronConfig: NeuronConfig = {
  hotkey: "",
  ledgerUrl: "http://127.0.0.1:9944",
  ledgerTimeoutMs: 10_000,
  blocksPerEpoch: 10,
  blocksPerSetWeights: 100,
  blockTimeMs: 12_000,
  blockPollMs: 1_000,
  localTrain: false,
  remoteTrain: false,
  learningRate: 0.1,
  momentum: 0.8,
  clipMaxNorm: 1.0,
  batchSize: 4,
  corpusPath: null,
  waitForInclusion: false,
  restart: false,
  fullPath: "./neuron",
  logLevel: "info",
  metrics: { jsonl: true, url: null, secret: null, flushIntervalMs: 5_000 },
  axon: { host: "0.0.0.0", port: 8091 },
  synapses: { textLastHiddenState: true, textCausalLm: true, textSeq2Seq: true },
  nucleus: { ...defaultNucleusConfig },
  blacklist: {
    enabled: false,
    registration: false,
    allowNonRegistered: false,
    stake: { enabled: false, min: 10 },
    validator: false,
    time: { enabled: false, seconds: 1 },
  },
};

// ── Merge helpers ──────────────────────────────────────────────────────────

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function deepMerge(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(patch)) {
    const prev = out[k];
    out[k] = isRecord(prev) && isRecord(v) ? deepMerge(prev, v) : v;
  }
  return out;
}

/** Coerce a CLI string to the type of the value it replaces. */
function coerce(key: string, raw: string, current: unknown): unknown {
  if (typeof current === "number") {
    const n = Number(raw);
    if (raw.trim() === "" || Number.isNaN(n)) throw new ConfigError({ message: `--${key} expects a number, got "${raw}"` });
    return n;
  }
  if (typeof current === "boolean") {
    if (raw === "true" || raw === "1") return true;
    if (raw === "false" || raw === "0") return false;
    throw new ConfigError({ message: `--${key} expects true/false, got "${raw}"` });
  }
  // "null" clears a nullable string key
  if (raw === "null" && (current === null || typeof current === "string")) return null;
  return raw;
}

/**
 * Apply `--dotted.key=value` overrides. Keys must name an existing leaf of
 * the config; the value is coerced to that leaf's type.
 */
export function applyOverrides(config: Record<string, unknown>, kv: Record<string, string>): Record<string, unknown> {
  let out = config;
  for (const [key, raw] of Object.entries(kv)) {
    if (key === "config") continue;
    const parts = key.split(".");
    let node: unknown = out;
    for (const p of parts) node = isRecord(node) ? node[p] : undefined;
    if (node === undefined || isRecord(node)) {
      throw new ConfigError({ message: `unknown config key "${key}"` });
    }
    let patch: Record<string, unknown> = { [parts[parts.length - 1]]: coerce(key, raw, node) };
    for (let i = parts.length - 2; i >= 0; i--) patch = { [parts[i]]: patch };
    out = deepMerge(out, patch);
  }
  return out;
}

// ── Validation ─────────────────────────────────────────────────────────────

/** Parse and cross-check a merged config object. */
export function validateNeuronConfig(raw: unknown): NeuronConfig {
  const result = NeuronConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigError({ message: `invalid config: ${issues}` });
  }
  const config = result.data;
  if (config.hotkey.trim() === "") {
    throw new ConfigError({ message: "hotkey is required" });
  }
  if (config.localTrain && config.corpusPath === null) {
    throw new ConfigError({ message: "localTrain needs corpusPath" });
  }
  if (config.localTrain && config.nucleus.vocabSize < 256) {
    throw new ConfigError({ message: `byte-level corpus needs nucleus.vocabSize >= 256, got ${config.nucleus.vocabSize}` });
  }
  if (config.metrics.url !== null && config.metrics.secret === null) {
    throw new ConfigError({ message: "metrics.url needs metrics.secret" });
  }
  return config;
}

/**
 * defaults <- JSON file (if any) <- CLI overrides, then validate.
 */
export async function loadNeuronConfig(file?: string, overrides: Record<string, string> = {}): Promise<NeuronConfig> {
  let merged: Record<string, unknown> = { ...defaultNeuronConfig };
  if (file) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(file, "utf-8"));
    } catch (e) {
      throw new ConfigError({ message: `cannot read config ${file}: ${errorMessage(e)}`, cause: e });
    }
    if (!isRecord(parsed)) throw new ConfigError({ message: `config ${file} must hold a JSON object` });
    merged = deepMerge(merged, parsed);
  }
  return validateNeuronConfig(applyOverrides(merged, overrides));
}
