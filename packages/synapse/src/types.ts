/**
 * Synapse kinds, return codes, serializer selectors and the JSON wire
 * schemas exchanged between peers.
 */
import { z } from "zod";

// ── Enumerations ───────────────────────────────────────────────────────────

export const SYNAPSE_KINDS = ["textLastHiddenState", "textCausalLm", "textSeq2Seq"] as const;
export type SynapseKind = (typeof SYNAPSE_KINDS)[number];

export const RETURN_CODES = [
  "Success",
  "NotImplemented",
  "UnknownException",
  "Blacklisted",
  "Timeout",
  "InvalidRequest",
  "RequestDeserializationException",
  "ResponseSerializationException",
] as const;
export type ReturnCode = (typeof RETURN_CODES)[number];

export const SERIALIZER_KINDS = ["raw", "json", "f16"] as const;
export type SerializerKind = (typeof SERIALIZER_KINDS)[number];

/** One block period, in seconds. Default request timeout. */
export const BLOCK_TIME_SECONDS = 12;

// ── Wire schemas ───────────────────────────────────────────────────────────

const SynapseKindSchema = z.enum(SYNAPSE_KINDS);
const ReturnCodeSchema = z.enum(RETURN_CODES);
const SerializerKindSchema = z.enum(SERIALIZER_KINDS);

export const Seq2SeqParamsSchema = z.object({
  topk: z.number().int().nonnegative(),
  numToGenerate: z.number().int().positive(),
  numBeams: z.number().int().positive(),
  noRepeatNgramSize: z.number().int().nonnegative(),
  earlyStopping: z.boolean(),
  numReturnSequences: z.number().int().positive(),
  doSample: z.boolean(),
  topP: z.number().min(0).max(1),
  temperature: z.number().nonnegative(),
  repetitionPenalty: z.number().positive(),
  lengthPenalty: z.number(),
  /** Seconds the server may spend generating. */
  maxTime: z.number().positive(),
  numBeamGroups: z.number().int().positive(),
});
export type Seq2SeqParams = z.infer<typeof Seq2SeqParamsSchema>;

export const defaultSeq2SeqParams: Seq2SeqParams = {
  topk: 50,
  numToGenerate: 256,
  numBeams: 5,
  noRepeatNgramSize: 2,
  earlyStopping: false,
  numReturnSequences: 1,
  doSample: false,
  topP: 0.95,
  temperature: 1.0,
  repetitionPenalty: 1.0,
  lengthPenalty: 1.0,
  maxTime: 150,
  numBeamGroups: 1,
};

const ForwardRequestBase = {
  /** base64 of the serialized input tensor */
  input: z.string(),
  inputSerializer: SerializerKindSchema,
  outputSerializer: SerializerKindSchema,
  /** seconds */
  timeout: z.number().positive(),
};

export const ForwardRequestSchema = z.discriminatedUnion("synapse", [
  z.object({ synapse: z.literal("textLastHiddenState"), ...ForwardRequestBase }),
  z.object({ synapse: z.literal("textCausalLm"), ...ForwardRequestBase }),
  z.object({ synapse: z.literal("textSeq2Seq"), ...ForwardRequestBase, params: Seq2SeqParamsSchema }),
]);
export type ForwardRequest = z.infer<typeof ForwardRequestSchema>;

export const ForwardResponseSchema = z.object({
  /** base64 of the serialized output tensor; null on failure */
  output: z.string().nullable(),
  code: ReturnCodeSchema,
  message: z.string(),
});
export type ForwardResponse = z.infer<typeof ForwardResponseSchema>;

export const BackwardRequestSchema = z.object({
  serializer: SerializerKindSchema,
  items: z.array(
    z.object({
      synapse: SynapseKindSchema,
      input: z.string(),
      grad: z.string(),
    }),
  ),
});
export type BackwardRequest = z.infer<typeof BackwardRequestSchema>;

export const DispatchResultSchema = z.object({
  code: z.enum(["Success", "NotImplemented", "UnknownException"]),
  message: z.string(),
});
export type DispatchResult = z.infer<typeof DispatchResultSchema>;

export const BackwardResponseSchema = z.object({
  code: ReturnCodeSchema,
  message: z.string(),
  results: z.array(DispatchResultSchema),
});
export type BackwardResponse = z.infer<typeof BackwardResponseSchema>;
