/**
 * Local view of the registry, refreshed from the ledger on demand.
 */
import type { LedgerClient, SnapshotNeuron } from "./ledger.js";

/** What the admission controller needs to judge a caller. */
export interface AdmissionView {
  uidOf(hotkey: string): number | null;
  stake(uid: number): number;
  /** Number of peers this uid assigns nonzero weight to. */
  outgoingWeightCount(uid: number): number;
}

export class Metagraph implements AdmissionView {
  private neurons: SnapshotNeuron[] = [];
  private byHotkey = new Map<string, number>();
  private _block = 0;

  constructor(private readonly ledger: LedgerClient) {}

  async sync(): Promise<void> {
    const snapshot = await this.ledger.metagraphSnapshot();
    const neurons = [...snapshot.neurons].sort((a, b) => a.uid - b.uid);
    this.neurons = neurons;
    this.byHotkey = new Map(neurons.map((n) => [n.hotkey, n.uid]));
    this._block = snapshot.block;
  }

  get n(): number {
    return this.neurons.length;
  }

  get block(): number {
    return this._block;
  }

  get hotkeys(): string[] {
    return this.neurons.map((n) => n.hotkey);
  }

  uidOf(hotkey: string): number | null {
    return this.byHotkey.get(hotkey) ?? null;
  }

  private row(uid: number): SnapshotNeuron | undefined {
    return this.neurons.find((n) => n.uid === uid);
  }

  stake(uid: number): number {
    return this.row(uid)?.stake ?? 0;
  }

  weights(uid: number): [number, number][] {
    return this.row(uid)?.weights ?? [];
  }

  outgoingWeightCount(uid: number): number {
    return this.weights(uid).filter(([, w]) => w > 0).length;
  }
}
