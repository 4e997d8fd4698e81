/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class BackendError extends Data.TaggedError("BackendError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class AutogradError extends Data.TaggedError("AutogradError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class OptimizerError extends Data.TaggedError("OptimizerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class CheckpointError extends Data.TaggedError("CheckpointError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ModelError extends Data.TaggedError("ModelError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class DatasetError extends Data.TaggedError("DatasetError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class SerializerError extends Data.TaggedError("SerializerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** A remote peer answered with a non-success return code. */
export class RemoteCallError extends Data.TaggedError("RemoteCallError")<{
  readonly message: string;
  readonly code: string;
}> {}

export class LedgerError extends Data.TaggedError("LedgerError")<{
  readonly message: string;
  readonly method?: string;
  readonly cause?: unknown;
}> {}

/** Best-effort message extraction for anything thrown. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  return String(e);
}
