import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  applyOverrides,
  defaultNeuronConfig,
  loadNeuronConfig,
  validateNeuronConfig,
  type NeuronConfig,
} from "@tensorpeer/neuron";

const base: NeuronConfig = { ...defaultNeuronConfig, hotkey: "self" };

describe("validateNeuronConfig", () => {
  it("accepts the defaults once a hotkey is set", () => {
    expect(validateNeuronConfig(base)).toEqual(base);
  });

  it("requires a hotkey", () => {
    expect(() => validateNeuronConfig(defaultNeuronConfig)).toThrow("hotkey is required");
  });

  it("reports schema violations with their path", () => {
    expect(() => validateNeuronConfig({ ...base, blocksPerEpoch: -1 })).toThrow("invalid config: blocksPerEpoch:");
    expect(() => validateNeuronConfig({ ...base, bogus: 1 })).toThrow("Unrecognized key(s) in object: 'bogus'");
  });

  it("cross-checks local training and metrics settings", () => {
    expect(() => validateNeuronConfig({ ...base, localTrain: true })).toThrow("localTrain needs corpusPath");
    expect(() =>
      validateNeuronConfig({
        ...base,
        localTrain: true,
        corpusPath: "corpus.txt",
        nucleus: { ...base.nucleus, vocabSize: 128 },
      }),
    ).toThrow("byte-level corpus needs nucleus.vocabSize >= 256, got 128");
    expect(() =>
      validateNeuronConfig({ ...base, metrics: { ...base.metrics, url: "http://metrics.test" } }),
    ).toThrow("metrics.url needs metrics.secret");
  });
});

describe("applyOverrides", () => {
  it("coerces each value to the type of the key it replaces", () => {
    const out = validateNeuronConfig(
      applyOverrides(base, {
        "blacklist.stake.min": "25",
        localTrain: "true",
        corpusPath: "data/corpus.txt",
        hotkey: "5Fexample",
        config: "ignored.json",
      }),
    );
    expect(out.blacklist.stake).toEqual({ enabled: false, min: 25 });
    expect(out.localTrain).toBe(true);
    expect(out.corpusPath).toBe("data/corpus.txt");
    expect(out.hotkey).toBe("5Fexample");
    expect(out.blacklist.time).toEqual(defaultNeuronConfig.blacklist.time);
  });

  it("null clears a nullable key", () => {
    const withCorpus = applyOverrides(base, { corpusPath: "corpus.txt" });
    expect(validateNeuronConfig(applyOverrides(withCorpus, { corpusPath: "null" })).corpusPath).toBeNull();
    expect(() => validateNeuronConfig(applyOverrides(base, { hotkey: "null" }))).toThrow("invalid config: hotkey:");
  });

  it("rejects unknown keys and malformed values", () => {
    expect(() => applyOverrides(base, { nope: "1" })).toThrow('unknown config key "nope"');
    expect(() => applyOverrides(base, { "blacklist.stake": "1" })).toThrow('unknown config key "blacklist.stake"');
    expect(() => applyOverrides(base, { blocksPerEpoch: "ten" })).toThrow(
      '--blocksPerEpoch expects a number, got "ten"',
    );
    expect(() => applyOverrides(base, { localTrain: "yes" })).toThrow('--localTrain expects true/false, got "yes"');
  });
});

describe("loadNeuronConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "tensorpeer-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("layers defaults, file and overrides", async () => {
    const file = path.join(dir, "neuron.json");
    await fs.writeFile(file, JSON.stringify({ hotkey: "self", blacklist: { enabled: true }, axon: { port: 8100 } }));

    const config = await loadNeuronConfig(file, { "axon.port": "9000" });
    expect(config.blacklist.enabled).toBe(true);
    expect(config.blacklist.stake.min).toBe(10);
    expect(config.axon).toEqual({ host: "0.0.0.0", port: 9000 });
  });

  it("fails on a missing or non-object file", async () => {
    const missing = path.join(dir, "absent.json");
    await expect(loadNeuronConfig(missing)).rejects.toThrow(`cannot read config ${missing}:`);

    const list = path.join(dir, "list.json");
    await fs.writeFile(list, "[1, 2]");
    await expect(loadNeuronConfig(list)).rejects.toThrow(`config ${list} must hold a JSON object`);
  });

  it("works without a file", async () => {
    const config = await loadNeuronConfig(undefined, { hotkey: "self", remoteTrain: "1" });
    expect(config.remoteTrain).toBe(true);
  });
});
