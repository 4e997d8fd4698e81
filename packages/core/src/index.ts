export * from "./types.js";
export * from "./errors.js";
export type * from "./interfaces.js";
export { Registry } from "./registry.js";
export { SeededRng } from "./rng.js";
export { hashConfig } from "./hash.js";
export { broadcastShape, broadcastStrides, stridedOffset } from "./broadcast.js";
export { f32ToF16Bits, f16BitsToF32 } from "./f16.js";
