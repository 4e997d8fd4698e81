import { describe, it, expect } from "vitest";
import { CpuRefBackend, backendRegistry } from "@tensorpeer/tensor";

describe("CpuRefBackend", () => {
  const B = new CpuRefBackend();

  it("zeros", () => {
    const t = B.zeros([2, 3]);
    expect(t.shape).toEqual([2, 3]);
    expect(Array.from(t.data)).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it("ones and full", () => {
    expect(Array.from(B.ones([3]).data)).toEqual([1, 1, 1]);
    const f = B.full([2], 7, "i32");
    expect(f.dtype).toBe("i32");
    expect(Array.from(f.data)).toEqual([7, 7]);
  });

  it("fromArray rejects a length that does not fit the shape", () => {
    expect(() => B.fromArray([1, 2, 3], [2, 2])).toThrow("does not match shape [2, 2]");
  });

  it("add broadcasts a row over a matrix", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const b = B.fromArray([10, 20, 30], [3]);
    const c = B.add(a, b);
    expect(c.shape).toEqual([2, 3]);
    expect(Array.from(c.data)).toEqual([11, 22, 33, 14, 25, 36]);
  });

  it("matmul 2x2", () => {
    // [[1,2],[3,4]] @ [[5,6],[7,8]] = [[19,22],[43,50]]
    const a = B.fromArray([1, 2, 3, 4], [2, 2]);
    const b = B.fromArray([5, 6, 7, 8], [2, 2]);
    const c = B.matmul(a, b);
    expect(c.shape).toEqual([2, 2]);
    expect(Array.from(c.data)).toEqual([19, 22, 43, 50]);
  });

  it("matmul shares a 2-D right operand across the batch", () => {
    const a = B.fromArray([1, 0, 0, 1, 2, 0, 0, 2], [2, 2, 2]);
    const b = B.fromArray([1, 2, 3, 4], [2, 2]);
    const c = B.matmul(a, b);
    expect(c.shape).toEqual([2, 2, 2]);
    expect(Array.from(c.data)).toEqual([1, 2, 3, 4, 2, 4, 6, 8]);
  });

  it("softmax sums to 1", () => {
    const x = B.fromArray([1, 2, 3], [1, 3]);
    const s = B.softmax(x, -1);
    const sum = Array.from(s.data).reduce((a, b) => a + b, 0);
    expect(sum).toBeCloseTo(1.0, 5);
  });

  it("embedding", () => {
    const weight = B.fromArray([0.1, 0.2, 0.3, 0.4, 0.5, 0.6], [3, 2]);
    const indices = B.fromArray([0, 2], [2], "i32");
    const out = B.embedding(weight, indices);
    expect(out.shape).toEqual([2, 2]);
    expect(out.data[0]).toBeCloseTo(0.1);
    expect(out.data[1]).toBeCloseTo(0.2);
    expect(out.data[2]).toBeCloseTo(0.5);
    expect(out.data[3]).toBeCloseTo(0.6);
  });

  it("embedding rejects an index outside the vocabulary", () => {
    const weight = B.zeros([3, 2]);
    expect(() => B.embedding(weight, B.fromArray([3], [1], "i32"))).toThrow("out of range for vocab 3");
  });

  it("crossEntropy of uniform logits is log(C)", () => {
    const logits = B.zeros([2, 4]);
    const targets = B.fromArray([0, 3], [2], "i32");
    const loss = B.crossEntropy(logits, targets);
    expect(loss.shape).toEqual([]);
    expect(loss.data[0]).toBeCloseTo(Math.log(4), 5);
  });

  it("transpose", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const t = B.transpose(a, 0, 1);
    expect(t.shape).toEqual([3, 2]);
    expect(Array.from(t.data)).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it("reshape", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const r = B.reshape(a, [3, 2]);
    expect(r.shape).toEqual([3, 2]);
    expect(Array.from(r.data)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("sum all and along an axis", () => {
    const a = B.fromArray([1, 2, 3, 4], [2, 2]);
    expect(B.sum(a).data[0]).toBe(10);
    const s = B.sum(a, 0);
    expect(s.shape).toEqual([2]);
    expect(Array.from(s.data)).toEqual([4, 6]);
    expect(B.sum(a, 1, true).shape).toEqual([2, 1]);
  });

  it("mean of an i32 tensor is f32", () => {
    const m = B.mean(B.fromArray([1, 2], [2], "i32"));
    expect(m.dtype).toBe("f32");
    expect(m.data[0]).toBe(1.5);
  });

  it("argmax along the last axis", () => {
    const a = B.fromArray([0.1, 0.9, 0.0, 0.7, 0.2, 0.1], [2, 3]);
    const idx = B.argmax(a, -1);
    expect(idx.dtype).toBe("i32");
    expect(Array.from(idx.data)).toEqual([1, 0]);
  });

  it("equal and allClose", () => {
    const a = B.fromArray([1, 2], [2]);
    expect(B.equal(a, B.clone(a))).toBe(true);
    expect(B.equal(a, B.fromArray([1, 2], [2], "i32"))).toBe(false);
    expect(B.allClose(a, B.fromArray([1, 2 + 1e-7], [2]))).toBe(true);
  });

  it("is registered as cpu_ref", () => {
    expect(backendRegistry.list()).toEqual(["cpu_ref"]);
    expect(backendRegistry.get("cpu_ref").name).toBe("cpu_ref");
  });
});
