/**
 * @tensorpeer/tensor -- Tensor backends.
 */
import { Registry } from "@tensorpeer/core";
import type { Backend } from "@tensorpeer/core";
import { CpuRefBackend } from "./cpu_ref.js";

export { CpuRefBackend };
export type { Backend, TensorData, Dtype, Shape } from "@tensorpeer/core";

// ── Backend registry ──────────────────────────────────────────────────────

export type BackendName = "cpu_ref";

export const backendRegistry = new Registry<BackendName, Backend>("backend");
backendRegistry.register("cpu_ref", () => new CpuRefBackend());
