/**
 * Admission control ("blacklist"): an ordered chain of policies run against
 * every incoming request before any compute happens.
 */
import type { BlacklistConfig } from "./config.js";
import type { AdmissionView } from "./metagraph.js";

export type AdmissionPolicy = "registration" | "stake" | "validator" | "rateLimit";

export type AdmissionDecision =
  | { readonly _tag: "Accept" }
  | { readonly _tag: "Reject"; readonly policy: AdmissionPolicy; readonly reason: string };

const accept: AdmissionDecision = { _tag: "Accept" };

const reject = (policy: AdmissionPolicy, reason: string): AdmissionDecision => ({ _tag: "Reject", policy, reason });

export class AdmissionController {
  /** Last request time per caller key (ms). Never evicted. */
  private readonly lastSeenAt = new Map<string, number>();

  constructor(
    private readonly config: BlacklistConfig,
    private readonly view: AdmissionView,
    /** Outgoing weights a caller must set to count as a validator. */
    private readonly minAllowedWeights: number,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Run the chain. `requestKind` only labels the decision today; every
   * kind is judged by the same policies.
   */
  evaluate(pubkey: string, requestKind: string): AdmissionDecision {
    if (!this.config.enabled) return accept;

    const uid = this.view.uidOf(pubkey);
    const registered = uid !== null;

    if (this.config.registration && !registered && !this.config.allowNonRegistered) {
      return reject("registration", `${pubkey} is not registered`);
    }

    // allowNonRegistered only waives the registration policy: without a row
    // an unregistered caller fails stake and validator
    if (this.config.stake.enabled) {
      const stake = uid === null ? 0 : this.view.stake(uid);
      if (uid === null || stake < this.config.stake.min) {
        return reject("stake", `stake ${stake} below ${this.config.stake.min} for ${requestKind}`);
      }
    }

    if (this.config.validator) {
      if (uid === null) return reject("validator", `${pubkey} has no registry row`);
      const count = this.view.outgoingWeightCount(uid);
      if (count < this.minAllowedWeights) {
        return reject("validator", `${count} outgoing weights, need ${this.minAllowedWeights}`);
      }
    }

    if (this.config.time.enabled) {
      const now = this.now();
      const prev = this.lastSeenAt.get(pubkey);
      this.lastSeenAt.set(pubkey, now);
      if (prev !== undefined && now - prev < this.config.time.seconds * 1000) {
        return reject("rateLimit", `${now - prev}ms since last request, window is ${this.config.time.seconds}s`);
      }
    }

    return accept;
  }

  isBlacklisted(pubkey: string, requestKind: string): boolean {
    return this.evaluate(pubkey, requestKind)._tag === "Reject";
  }

  lastSeen(pubkey: string): number | undefined {
    return this.lastSeenAt.get(pubkey);
  }
}
