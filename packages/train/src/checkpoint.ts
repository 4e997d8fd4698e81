/**
 * Checkpoint save/load.
 *
 * Binary layout:
 *   [4 bytes: magic "TPCK"]
 *   [4 bytes: uint32 LE header JSON byte length]
 *   [N bytes: header JSON (UTF-8)]
 *   [remaining: concatenated raw little-endian tensor data, in header order]
 */
import { Effect } from "effect";
import { z } from "zod";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CheckpointState, Checkpoint, TensorData, Optimizer, NucleusConfig } from "@tensorpeer/core";
import { CheckpointError, allocArray, dtypeBytes, errorMessage, hashConfig, shapeSize } from "@tensorpeer/core";
import { collectParams, loadParams, type NucleusParams } from "@tensorpeer/model";

const MAGIC = Buffer.from("TPCK");

const TensorEntrySchema = z.object({
  name: z.string(),
  shape: z.array(z.number().int().nonnegative()),
  dtype: z.enum(["f32", "i32"]),
});

const HeaderSchema = z.object({
  nucleusConfig: z.object({
    vocabSize: z.number().int().positive(),
    nEmbd: z.number().int().positive(),
    hiddenDim: z.number().int().positive(),
    seqLen: z.number().int().positive(),
    seed: z.number().int(),
  }),
  configHash: z.string(),
  block: z.number().int().nonnegative(),
  // JSON has no Infinity: null means "no loss recorded yet"
  bestLoss: z.number().nullable(),
  optimizerStep: z.number().int().nonnegative(),
  tensors: z.array(TensorEntrySchema),
});

type TensorEntry = z.infer<typeof TensorEntrySchema>;

// ── Binary save ──────────────────────────────────────────────────────────────

async function saveBinary(file: string, state: CheckpointState): Promise<void> {
  const tensors: TensorEntry[] = [];
  const chunks: TensorData[] = [];
  const add = (name: string, td: TensorData) => {
    tensors.push({ name, shape: [...td.shape], dtype: td.dtype });
    chunks.push(td);
  };
  for (const [name, td] of state.params) add(`p.${name}`, td);
  for (const [name, td] of state.optimizerState.buffers) add(`o.${name}`, td);

  const header = JSON.stringify({
    nucleusConfig: state.nucleusConfig,
    configHash: state.configHash,
    block: state.block,
    bestLoss: Number.isFinite(state.bestLoss) ? state.bestLoss : null,
    optimizerStep: state.optimizerState.step,
    tensors,
  } satisfies z.input<typeof HeaderSchema>);
  const headerBuf = Buffer.from(header, "utf-8");
  const lenBuf = Buffer.alloc(4);
  lenBuf.writeUInt32LE(headerBuf.length, 0);

  await fs.mkdir(path.dirname(file), { recursive: true });
  // write to a sibling then rename, so a crash never leaves a torn checkpoint
  const tmp = `${file}.tmp`;
  const handle = await fs.open(tmp, "w");
  try {
    await handle.write(MAGIC);
    await handle.write(lenBuf);
    await handle.write(headerBuf);
    for (const td of chunks) {
      await handle.write(Buffer.from(td.data.buffer, td.data.byteOffset, td.data.byteLength));
    }
  } finally {
    await handle.close();
  }
  await fs.rename(tmp, file);
}

// ── Binary load ──────────────────────────────────────────────────────────────

function loadBinary(raw: Buffer): CheckpointState {
  if (raw.length < 8 || !raw.subarray(0, 4).equals(MAGIC)) {
    throw new Error("not a checkpoint file (bad magic)");
  }
  let offset = 4;
  const headerLen = raw.readUInt32LE(offset);
  offset += 4;
  const parsed: unknown = JSON.parse(raw.subarray(offset, offset + headerLen).toString("utf-8"));
  const header = HeaderSchema.parse(parsed);
  offset += headerLen;

  const params = new Map<string, TensorData>();
  const buffers = new Map<string, TensorData>();
  for (const t of header.tensors) {
    const count = shapeSize(t.shape);
    const byteLen = count * dtypeBytes(t.dtype);
    if (offset + byteLen > raw.length) throw new Error(`truncated tensor data for "${t.name}"`);
    // copy into a fresh, aligned array
    const data = allocArray(t.dtype, count);
    Buffer.from(data.buffer).set(raw.subarray(offset, offset + byteLen));
    offset += byteLen;

    const td: TensorData = { shape: t.shape, dtype: t.dtype, data };
    if (t.name.startsWith("p.")) params.set(t.name.slice(2), td);
    else if (t.name.startsWith("o.")) buffers.set(t.name.slice(2), td);
  }

  return {
    nucleusConfig: header.nucleusConfig,
    params,
    optimizerState: { step: header.optimizerStep, buffers },
    configHash: header.configHash,
    block: header.block,
    bestLoss: header.bestLoss ?? Infinity,
  };
}

// ── FileCheckpoint ─────────────────────────────────────────────────────────

export class FileCheckpoint implements Checkpoint {
  save(file: string, state: CheckpointState): Effect.Effect<void, CheckpointError> {
    return Effect.tryPromise({
      try: () => saveBinary(file, state),
      catch: (e) => new CheckpointError({ message: `Failed to save checkpoint ${file}: ${errorMessage(e)}`, cause: e }),
    });
  }

  load(file: string): Effect.Effect<CheckpointState, CheckpointError> {
    return Effect.tryPromise({
      try: async () => loadBinary(await fs.readFile(file)),
      catch: (e) => new CheckpointError({ message: `Failed to load checkpoint ${file}: ${errorMessage(e)}`, cause: e }),
    });
  }
}

/** Snapshot the live model and optimizer into a checkpoint state. */
export function buildCheckpointState(
  nucleusConfig: NucleusConfig,
  params: NucleusParams,
  optimizer: Optimizer,
  block: number,
  bestLoss: number,
): CheckpointState {
  const snapshot = new Map<string, TensorData>();
  for (const [name, v] of collectParams(params)) snapshot.set(name, v.data);
  return {
    nucleusConfig,
    params: snapshot,
    optimizerState: optimizer.stateDict(),
    configHash: hashConfig(nucleusConfig),
    block,
    bestLoss,
  };
}

/**
 * Load `file` into the live model and optimizer. Fails without touching
 * either when the checkpoint was written for a different nucleus config.
 */
export function restoreCheckpoint(
  checkpoint: Checkpoint,
  file: string,
  nucleusConfig: NucleusConfig,
  params: NucleusParams,
  optimizer: Optimizer,
): Effect.Effect<CheckpointState, CheckpointError> {
  const expected = hashConfig(nucleusConfig);
  return checkpoint.load(file).pipe(
    Effect.filterOrFail(
      (state) => state.configHash === expected,
      (state) =>
        new CheckpointError({
          message: `checkpoint ${file} was written for config ${state.configHash}, configured nucleus is ${expected}`,
        }),
    ),
    Effect.flatMap((state) =>
      Effect.try({
        try: () => {
          loadParams(params, state.params);
          optimizer.loadStateDict(state.optimizerState);
          return state;
        },
        catch: (e) => new CheckpointError({ message: `Failed to restore checkpoint ${file}: ${errorMessage(e)}`, cause: e }),
      }),
    ),
  );
}
