/**
 * Dataset provider: byte-level tokens from a text corpus, served as an
 * infinite stream of random contiguous windows.
 */
import * as fs from "node:fs/promises";
import type { Rng, TensorData } from "@tensorpeer/core";
import { DatasetError, SeededRng } from "@tensorpeer/core";

export interface DataBatch {
  /** Input token ids [B, T] */
  inputs: TensorData;
  /** Target token ids [B, T] (inputs shifted by one) */
  targets: TensorData;
}

/** UTF-8 bytes as token ids; the vocabulary is the 256 byte values. */
export function byteTokens(text: string): Int32Array {
  return Int32Array.from(Buffer.from(text, "utf-8"));
}

export class DataLoader {
  private readonly tokens: Int32Array;
  private readonly rng: Rng;
  private readonly batchSize: number;
  private readonly seqLen: number;

  constructor(tokens: Int32Array, rng: Rng, batchSize: number, seqLen: number) {
    if (tokens.length <= seqLen) {
      throw new DatasetError({
        message: `corpus has ${tokens.length} tokens; need at least ${seqLen + 1} for a window of ${seqLen}`,
      });
    }
    this.tokens = tokens;
    this.rng = rng;
    this.batchSize = batchSize;
    this.seqLen = seqLen;
  }

  static fromText(text: string, batchSize: number, seqLen: number, seed = 42): DataLoader {
    return new DataLoader(byteTokens(text), new SeededRng(seed), batchSize, seqLen);
  }

  /** Get a random batch of contiguous windows. */
  nextBatch(): DataBatch {
    const B = this.batchSize;
    const T = this.seqLen;
    const maxStart = this.tokens.length - T;
    const inputs = new Int32Array(B * T);
    const targets = new Int32Array(B * T);
    for (let b = 0; b < B; b++) {
      const start = this.rng.nextInt(maxStart);
      inputs.set(this.tokens.subarray(start, start + T), b * T);
      targets.set(this.tokens.subarray(start + 1, start + T + 1), b * T);
    }
    return {
      inputs: { shape: [B, T], dtype: "i32", data: inputs },
      targets: { shape: [B, T], dtype: "i32", data: targets },
    };
  }

  /** A fresh, never-ending batch stream. Each call starts a new iterator. */
  *batches(): Generator<DataBatch, void, undefined> {
    for (;;) yield this.nextBatch();
  }

  get length(): number {
    return this.tokens.length;
  }
}

/** Load a text corpus from disk. */
export async function loadText(file: string): Promise<string> {
  try {
    return await fs.readFile(file, "utf-8");
  } catch (e) {
    throw new DatasetError({ message: `cannot read corpus ${file}`, cause: e });
  }
}
