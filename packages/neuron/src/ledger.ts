/**
 * Ledger (chain registry) client.
 *
 * The neuron only needs a handful of calls: the current block height, its
 * own registry row, a full metagraph snapshot, the minimum weight count a
 * validator must set, and weight submission. HttpLedgerClient speaks
 * JSON-RPC 2.0 over fetch.
 */
import { z } from "zod";
import { LedgerError, errorMessage } from "@tensorpeer/core";

// ── Records ────────────────────────────────────────────────────────────────

const PeerRecordSchema = z.object({
  uid: z.number().int().nonnegative(),
  hotkey: z.string(),
  stake: z.number(),
  rank: z.number(),
  trust: z.number(),
  consensus: z.number(),
  incentive: z.number(),
  emission: z.number(),
  isRegistered: z.boolean(),
});
export type PeerRecord = z.infer<typeof PeerRecordSchema>;

const SnapshotNeuronSchema = PeerRecordSchema.extend({
  /** Outgoing weights as [uid, weight] pairs. */
  weights: z.array(z.tuple([z.number().int().nonnegative(), z.number()])),
});
export type SnapshotNeuron = z.infer<typeof SnapshotNeuronSchema>;

const MetagraphSnapshotSchema = z.object({
  block: z.number().int().nonnegative(),
  neurons: z.array(SnapshotNeuronSchema),
});
export type MetagraphSnapshot = z.infer<typeof MetagraphSnapshotSchema>;

export interface LedgerClient {
  currentBlock(): Promise<number>;
  /** null when the key has no registry row. */
  neuronForKey(hotkey: string): Promise<PeerRecord | null>;
  /** Resolves true once accepted (or included, when waiting). */
  setWeights(uids: readonly number[], weights: readonly number[], waitForInclusion: boolean): Promise<boolean>;
  minAllowedWeights(): Promise<number>;
  metagraphSnapshot(): Promise<MetagraphSnapshot>;
}

// ── JSON-RPC ───────────────────────────────────────────────────────────────

const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.number(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string(), data: z.unknown().optional() }).optional(),
});

export interface HttpLedgerClientOptions {
  url: string;
  /** Per-request timeout (ms). */
  timeoutMs?: number;
}

export class HttpLedgerClient implements LedgerClient {
  private readonly url: string;
  private readonly timeoutMs: number;
  private requestId = 1;

  constructor(opts: HttpLedgerClientOptions) {
    this.url = opts.url;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  private async send<T>(method: string, params: unknown[], schema: z.ZodType<T>): Promise<T> {
    const request = { jsonrpc: "2.0", method, params, id: this.requestId++ };

    let body: unknown;
    try {
      const res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        throw new LedgerError({ message: `HTTP ${res.status} from ledger`, method });
      }
      body = await res.json();
    } catch (e) {
      if (e instanceof LedgerError) throw e;
      throw new LedgerError({ message: `ledger request failed: ${errorMessage(e)}`, method, cause: e });
    }

    const envelope = JsonRpcResponseSchema.safeParse(body);
    if (!envelope.success) {
      throw new LedgerError({ message: `malformed JSON-RPC response: ${envelope.error.message}`, method });
    }
    if (envelope.data.error) {
      throw new LedgerError({ message: envelope.data.error.message, method });
    }
    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new LedgerError({ message: `unexpected result: ${result.error.message}`, method });
    }
    return result.data;
  }

  currentBlock(): Promise<number> {
    return this.send("ledger_currentBlock", [], z.number().int().nonnegative());
  }

  neuronForKey(hotkey: string): Promise<PeerRecord | null> {
    return this.send("ledger_neuronForKey", [hotkey], PeerRecordSchema.nullable());
  }

  setWeights(uids: readonly number[], weights: readonly number[], waitForInclusion: boolean): Promise<boolean> {
    return this.send(
      "ledger_setWeights",
      [{ uids: [...uids], weights: [...weights], waitForInclusion }],
      z.boolean(),
    );
  }

  minAllowedWeights(): Promise<number> {
    return this.send("ledger_minAllowedWeights", [], z.number().int().nonnegative());
  }

  metagraphSnapshot(): Promise<MetagraphSnapshot> {
    return this.send("ledger_metagraph", [], MetagraphSnapshotSchema);
  }
}
