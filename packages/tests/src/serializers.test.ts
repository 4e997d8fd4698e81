import { describe, it, expect } from "vitest";
import type { TensorData } from "@tensorpeer/core";
import { SerializerError } from "@tensorpeer/core";
import {
  decodeTensor,
  encodeTensor,
  f16Serializer,
  jsonSerializer,
  rawSerializer,
  serializer,
  serializerRegistry,
} from "@tensorpeer/synapse";

const tokens: TensorData = { shape: [2, 2], dtype: "i32", data: Int32Array.of(1, -2, 300, 4) };
const floats: TensorData = { shape: [3], dtype: "f32", data: Float32Array.of(1.5, -2, 0.1) };

/** A binary header for an f32 tensor of `dims`, followed by `payloadBytes` zero bytes. */
function headerOnly(dims: number[], payloadBytes: number): Buffer {
  const buf = Buffer.alloc(2 + 4 * dims.length + payloadBytes);
  buf.writeUInt8(0, 0);
  buf.writeUInt8(dims.length, 1);
  dims.forEach((d, i) => buf.writeUInt32LE(d, 2 + 4 * i));
  return buf;
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

describe("raw serializer", () => {
  it("writes dtype, rank, dims, then element bytes", () => {
    const bytes = rawSerializer.serialize(tokens);
    expect(bytes.length).toBe(2 + 4 * 2 + 16);
    expect(bytes[0]).toBe(1);
    expect(bytes[1]).toBe(2);
    expect(bytes[2]).toBe(2);
    expect(bytes[6]).toBe(2);
  });

  it("restores shape, dtype and values", () => {
    const back = rawSerializer.deserialize(rawSerializer.serialize(tokens));
    expect(back.shape).toEqual([2, 2]);
    expect(back.dtype).toBe("i32");
    expect(Array.from(back.data)).toEqual([1, -2, 300, 4]);
  });

  it("rejects a truncated payload", () => {
    const bytes = rawSerializer.serialize({ shape: [2], dtype: "f32", data: Float32Array.of(1, 2) });
    expect(() => rawSerializer.deserialize(bytes.subarray(0, bytes.length - 1))).toThrow(
      "tensor payload has 7 bytes, header implies 8",
    );
  });

  it("rejects an unknown dtype code", () => {
    expect(() => rawSerializer.deserialize(Uint8Array.of(5, 0))).toThrow("unknown dtype code 5");
  });

  it("checks the payload against a huge header before allocating", () => {
    const e = thrown(() => rawSerializer.deserialize(headerOnly([100_000_000], 10)));
    expect(e).toBeInstanceOf(SerializerError);
    expect(e instanceof SerializerError && e.message).toBe("tensor payload has 10 bytes, header implies 400000000");
  });

  it("rejects a shape whose element count overflows", () => {
    const e = thrown(() => rawSerializer.deserialize(headerOnly([0xffffffff, 0xffffffff], 4)));
    expect(e).toBeInstanceOf(SerializerError);
    expect(e instanceof SerializerError && e.message).toBe("tensor shape [4294967295, 4294967295] is too large");
  });
});

describe("f16 serializer", () => {
  it("halves the payload of float tensors", () => {
    expect(f16Serializer.serialize(floats).length).toBe(2 + 4 + 3 * 2);
  });

  it("keeps representable values and rounds the rest", () => {
    const back = f16Serializer.deserialize(f16Serializer.serialize(floats));
    expect(back.dtype).toBe("f32");
    expect(back.data[0]).toBe(1.5);
    expect(back.data[1]).toBe(-2);
    expect(back.data[2]).toBeCloseTo(0.1, 3);
    expect(back.data[2]).not.toBe(floats.data[2]);
  });

  it("checks the payload against the header before allocating", () => {
    expect(() => f16Serializer.deserialize(headerOnly([100_000_000], 10))).toThrow(
      "tensor payload has 10 bytes, header implies 200000000",
    );
    expect(thrown(() => f16Serializer.deserialize(headerOnly([0xffffffff, 0xffffffff], 0)))).toBeInstanceOf(
      SerializerError,
    );
  });

  it("sends integer tensors exactly", () => {
    expect(Buffer.from(f16Serializer.serialize(tokens))).toEqual(Buffer.from(rawSerializer.serialize(tokens)));
    expect(Array.from(f16Serializer.deserialize(f16Serializer.serialize(tokens)).data)).toEqual([1, -2, 300, 4]);
  });
});

describe("json serializer", () => {
  it("writes readable JSON", () => {
    const text = Buffer.from(jsonSerializer.serialize(tokens)).toString("utf-8");
    expect(JSON.parse(text)).toEqual({ dtype: "i32", shape: [2, 2], data: [1, -2, 300, 4] });
  });

  it("rejects malformed input", () => {
    expect(() => jsonSerializer.deserialize(Buffer.from("{"))).toThrow("invalid JSON tensor:");
    expect(() => jsonSerializer.deserialize(Buffer.from('{"dtype":"f64","shape":[1],"data":[1]}'))).toThrow(
      "invalid JSON tensor:",
    );
  });

  it("refuses non-finite values, which JSON cannot carry", () => {
    for (const bad of [NaN, Infinity, -Infinity]) {
      const t: TensorData = { shape: [2], dtype: "f32", data: Float32Array.of(1, bad) };
      expect(() => jsonSerializer.serialize(t)).toThrow(`json tensors carry finite values only, got ${bad}`);
    }
  });

  it("rejects data that does not fill the shape", () => {
    const bytes = Buffer.from('{"dtype":"f32","shape":[3],"data":[1]}');
    expect(() => jsonSerializer.deserialize(bytes)).toThrow("tensor payload has 1 bytes, header implies 3");
  });
});

describe("serializer registry", () => {
  it("has one serializer per kind", () => {
    expect(serializerRegistry.list()).toEqual(["raw", "json", "f16"]);
    expect(serializer("json")).toBe(jsonSerializer);
  });

  it("base64 helpers wrap the selected serializer", () => {
    const b64 = encodeTensor("raw", tokens);
    expect(b64).toBe(Buffer.from(rawSerializer.serialize(tokens)).toString("base64"));
    expect(Array.from(decodeTensor("raw", b64).data)).toEqual([1, -2, 300, 4]);
  });
});
