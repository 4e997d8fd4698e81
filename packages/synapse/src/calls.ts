/**
 * Forward-call envelopes, one per synapse kind.
 *
 * A call carries the input tensor, a write-once output slot, the timeout,
 * the serializer selectors and any per-kind algorithm parameters. The
 * caller side uses toWireRequest / fromWireResponse; the serving side
 * rebuilds the call from the request and answers with toWireResponse.
 */
import { Data } from "effect";
import type { TensorData, Shape } from "@tensorpeer/core";
import { RemoteCallError, SerializerError, errorMessage, formatShape } from "@tensorpeer/core";
import {
  BLOCK_TIME_SECONDS,
  ForwardResponseSchema,
  defaultSeq2SeqParams,
  type ForwardRequest,
  type ForwardResponse,
  type ReturnCode,
  type Seq2SeqParams,
  type SerializerKind,
  type SynapseKind,
} from "./types.js";
import { decodeTensor, encodeTensor } from "./serializers.js";

export class OutputAlreadySetError extends Data.TaggedError("OutputAlreadySetError")<{
  readonly message: string;
}> {}

export interface CallOptions {
  /** seconds */
  timeout?: number;
  inputSerializer?: SerializerKind;
  outputSerializer?: SerializerKind;
}

export interface ForwardCall {
  readonly kind: SynapseKind;
  readonly input: TensorData;
  readonly timeout: number;
  readonly inputSerializer: SerializerKind;
  readonly outputSerializer: SerializerKind;
  readonly output: TensorData | null;
  getInputShape(): Shape;
  /** null until the output slot is filled */
  getOutputShape(): Shape | null;
  setOutput(t: TensorData): void;
  toWireRequest(): ForwardRequest;
  fromWireResponse(response: unknown): TensorData;
  toWireResponse(): ForwardResponse;
}

/** Shared state and codec plumbing; subclasses supply kind, checks and extra fields. */
abstract class BaseForwardCall implements ForwardCall {
  abstract readonly kind: SynapseKind;
  readonly timeout: number;
  readonly inputSerializer: SerializerKind;
  readonly outputSerializer: SerializerKind;
  private _output: TensorData | null = null;

  constructor(readonly input: TensorData, opts: CallOptions = {}) {
    if (input.dtype !== "i32" || input.shape.length !== 2) {
      throw new SerializerError({
        message: `text synapses take i32 token ids [batch, seq], got ${input.dtype} ${formatShape(input.shape)}`,
      });
    }
    this.timeout = opts.timeout ?? BLOCK_TIME_SECONDS;
    this.inputSerializer = opts.inputSerializer ?? "raw";
    this.outputSerializer = opts.outputSerializer ?? "raw";
  }

  get output(): TensorData | null {
    return this._output;
  }

  getInputShape(): Shape {
    return this.input.shape;
  }

  getOutputShape(): Shape | null {
    return this._output ? this._output.shape : null;
  }

  setOutput(t: TensorData): void {
    if (this._output) {
      throw new OutputAlreadySetError({ message: `${this.kind}: output already set` });
    }
    this.checkOutput(t);
    this._output = t;
  }

  /** Throws when `t` cannot be this call's output. */
  protected abstract checkOutput(t: TensorData): void;

  protected baseRequest() {
    return {
      input: encodeTensor(this.inputSerializer, this.input),
      inputSerializer: this.inputSerializer,
      outputSerializer: this.outputSerializer,
      timeout: this.timeout,
    };
  }

  abstract toWireRequest(): ForwardRequest;

  fromWireResponse(response: unknown): TensorData {
    const parsed = ForwardResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new SerializerError({ message: `malformed ${this.kind} response: ${parsed.error.message}` });
    }
    const { code, message, output } = parsed.data;
    // the return code is authoritative: never decode a failed payload
    if (code !== "Success") {
      throw new RemoteCallError({ message: `Remote Server Failure: ${message}`, code });
    }
    if (output === null) {
      throw new SerializerError({ message: `${this.kind} response reported Success without an output` });
    }
    const t = decodeTensor(this.outputSerializer, output);
    this.setOutput(t);
    return t;
  }

  toWireResponse(): ForwardResponse {
    if (!this._output) return failureResponse("ResponseSerializationException", `${this.kind}: no output to send`);
    try {
      return { output: encodeTensor(this.outputSerializer, this._output), code: "Success", message: "Success" };
    } catch (e) {
      return failureResponse("ResponseSerializationException", errorMessage(e));
    }
  }

  protected expectLeading(t: TensorData, dims: number, rank: number): void {
    const lead = this.input.shape.slice(0, dims);
    const ok = t.shape.length === rank && lead.every((d, i) => t.shape[i] === d);
    if (!ok) {
      throw new SerializerError({
        message: `${this.kind}: output ${formatShape(t.shape)} does not fit input ${formatShape(this.input.shape)}`,
      });
    }
  }
}

export function failureResponse(code: Exclude<ReturnCode, "Success">, message: string): ForwardResponse {
  return { output: null, code, message };
}

// ── Last hidden state ──────────────────────────────────────────────────────

/** [batch, seq] token ids -> [batch, seq, hidden] */
export class TextLastHiddenStateForwardCall extends BaseForwardCall {
  readonly kind = "textLastHiddenState";

  protected checkOutput(t: TensorData): void {
    this.expectLeading(t, 2, 3);
  }

  toWireRequest(): ForwardRequest {
    return { synapse: this.kind, ...this.baseRequest() };
  }
}

// ── Causal LM ──────────────────────────────────────────────────────────────

/** [batch, seq] token ids -> [batch, seq, vocab] logits */
export class TextCausalLmForwardCall extends BaseForwardCall {
  readonly kind = "textCausalLm";

  protected checkOutput(t: TensorData): void {
    this.expectLeading(t, 2, 3);
  }

  toWireRequest(): ForwardRequest {
    return { synapse: this.kind, ...this.baseRequest() };
  }
}

// ── Seq2Seq ────────────────────────────────────────────────────────────────

/** [batch, seq] prompt -> [batch, numToGenerate] generated token ids */
export class TextSeq2SeqForwardCall extends BaseForwardCall {
  readonly kind = "textSeq2Seq";
  readonly params: Seq2SeqParams;

  constructor(input: TensorData, params: Partial<Seq2SeqParams> = {}, opts: CallOptions = {}) {
    super(input, opts);
    this.params = { ...defaultSeq2SeqParams, ...params };
  }

  protected checkOutput(t: TensorData): void {
    this.expectLeading(t, 1, 2);
    if (t.dtype !== "i32") {
      throw new SerializerError({ message: `${this.kind}: generations must be i32 token ids, got ${t.dtype}` });
    }
  }

  toWireRequest(): ForwardRequest {
    return { synapse: this.kind, ...this.baseRequest(), params: this.params };
  }
}

// ── Serving side ───────────────────────────────────────────────────────────

/** Rebuild the call a peer described in `req`. Decoding errors propagate. */
export function callFromWireRequest(req: ForwardRequest): ForwardCall {
  const input = decodeTensor(req.inputSerializer, req.input);
  const opts: CallOptions = {
    timeout: req.timeout,
    inputSerializer: req.inputSerializer,
    outputSerializer: req.outputSerializer,
  };
  switch (req.synapse) {
    case "textLastHiddenState": return new TextLastHiddenStateForwardCall(input, opts);
    case "textCausalLm": return new TextCausalLmForwardCall(input, opts);
    case "textSeq2Seq": return new TextSeq2SeqForwardCall(input, req.params, opts);
  }
}
