/**
 * Tensor serializers for the wire.
 *
 * raw   [u8 dtype][u8 ndim][u32 LE dim]*ndim [little-endian element bytes]
 * f16   same header; f32 elements stored as IEEE half (lossy), i32 exact
 * json  {"dtype","shape","data"} as UTF-8 JSON, finite values only
 */
import { z } from "zod";
import type { TensorData, Dtype, NumericArray } from "@tensorpeer/core";
import {
  Registry, SerializerError, allocArray, copyArray, dtypeBytes, shapeSize, errorMessage,
  f32ToF16Bits, f16BitsToF32,
} from "@tensorpeer/core";
import type { SerializerKind } from "./types.js";

export interface TensorSerializer {
  readonly kind: SerializerKind;
  serialize(t: TensorData): Uint8Array;
  deserialize(bytes: Uint8Array): TensorData;
}

// ── Binary header ──────────────────────────────────────────────────────────

const DTYPE_CODES: readonly Dtype[] = ["f32", "i32"];

function writeHeader(t: TensorData, payloadBytes: number): { buf: Buffer; offset: number } {
  const offset = 2 + 4 * t.shape.length;
  const buf = Buffer.alloc(offset + payloadBytes);
  buf.writeUInt8(DTYPE_CODES.indexOf(t.dtype), 0);
  buf.writeUInt8(t.shape.length, 1);
  t.shape.forEach((d, i) => buf.writeUInt32LE(d, 2 + 4 * i));
  return { buf, offset };
}

function readHeader(bytes: Uint8Array): { dtype: Dtype; shape: number[]; offset: number; buf: Buffer } {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (buf.length < 2) throw new SerializerError({ message: "tensor payload shorter than its header" });
  const dtype = DTYPE_CODES[buf.readUInt8(0)];
  if (dtype === undefined) throw new SerializerError({ message: `unknown dtype code ${buf.readUInt8(0)}` });
  const ndim = buf.readUInt8(1);
  const offset = 2 + 4 * ndim;
  if (buf.length < offset) throw new SerializerError({ message: "tensor payload shorter than its header" });
  const shape: number[] = [];
  for (let i = 0; i < ndim; i++) shape.push(buf.readUInt32LE(2 + 4 * i));
  return { dtype, shape, offset, buf };
}

function elementCount(shape: readonly number[]): number {
  const n = shapeSize(shape);
  if (!Number.isSafeInteger(n)) {
    throw new SerializerError({ message: `tensor shape [${shape.join(", ")}] is too large` });
  }
  return n;
}

function expectLength(actual: number, expected: number): void {
  if (actual !== expected) {
    throw new SerializerError({ message: `tensor payload has ${actual} bytes, header implies ${expected}` });
  }
}

// ── raw ────────────────────────────────────────────────────────────────────

export const rawSerializer: TensorSerializer = {
  kind: "raw",
  serialize(t) {
    const { buf, offset } = writeHeader(t, t.data.byteLength);
    buf.set(new Uint8Array(t.data.buffer, t.data.byteOffset, t.data.byteLength), offset);
    return buf;
  },
  deserialize(bytes) {
    const { dtype, shape, offset, buf } = readHeader(bytes);
    const n = elementCount(shape);
    // checked before allocating: the header dims come from the caller
    expectLength(buf.length - offset, n * dtypeBytes(dtype));
    const data = allocArray(dtype, n);
    new Uint8Array(data.buffer).set(buf.subarray(offset));
    return { shape, dtype, data };
  },
};

// ── f16 ────────────────────────────────────────────────────────────────────

export const f16Serializer: TensorSerializer = {
  kind: "f16",
  serialize(t) {
    if (t.dtype === "i32") return rawSerializer.serialize(t);
    const { buf, offset } = writeHeader(t, t.data.length * 2);
    for (let i = 0; i < t.data.length; i++) buf.writeUInt16LE(f32ToF16Bits(t.data[i]), offset + 2 * i);
    return buf;
  },
  deserialize(bytes) {
    const { dtype, shape, offset, buf } = readHeader(bytes);
    if (dtype === "i32") return rawSerializer.deserialize(bytes);
    const n = elementCount(shape);
    expectLength(buf.length - offset, n * 2);
    const data = new Float32Array(n);
    for (let i = 0; i < n; i++) data[i] = f16BitsToF32(buf.readUInt16LE(offset + 2 * i));
    return { shape, dtype, data };
  },
};

// ── json ───────────────────────────────────────────────────────────────────

const JsonTensorSchema = z.object({
  dtype: z.enum(["f32", "i32"]),
  shape: z.array(z.number().int().nonnegative()),
  data: z.array(z.number()),
});

export const jsonSerializer: TensorSerializer = {
  kind: "json",
  serialize(t) {
    for (const v of t.data) {
      if (!Number.isFinite(v)) throw new SerializerError({ message: `json tensors carry finite values only, got ${v}` });
    }
    return Buffer.from(JSON.stringify({ dtype: t.dtype, shape: [...t.shape], data: Array.from(t.data) }), "utf-8");
  },
  deserialize(bytes) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(Buffer.from(bytes).toString("utf-8"));
    } catch (e) {
      throw new SerializerError({ message: `invalid JSON tensor: ${errorMessage(e)}`, cause: e });
    }
    const result = JsonTensorSchema.safeParse(parsed);
    if (!result.success) throw new SerializerError({ message: `invalid JSON tensor: ${result.error.message}` });
    const { dtype, shape, data } = result.data;
    expectLength(data.length, elementCount(shape));
    const arr: NumericArray = copyArray(dtype, data);
    return { shape, dtype, data: arr };
  },
};

// ── Registry ───────────────────────────────────────────────────────────────

export const serializerRegistry = new Registry<SerializerKind, TensorSerializer>("serializer")
  .register("raw", () => rawSerializer)
  .register("json", () => jsonSerializer)
  .register("f16", () => f16Serializer);

export function serializer(kind: SerializerKind): TensorSerializer {
  return serializerRegistry.get(kind);
}

/** Serialize and base64-encode for a JSON wire field. */
export function encodeTensor(kind: SerializerKind, t: TensorData): string {
  return Buffer.from(serializer(kind).serialize(t)).toString("base64");
}

/** Inverse of encodeTensor. */
export function decodeTensor(kind: SerializerKind, b64: string): TensorData {
  return serializer(kind).deserialize(Buffer.from(b64, "base64"));
}
