export {
  NeuronConfigSchema,
  defaultNeuronConfig,
  applyOverrides,
  validateNeuronConfig,
  loadNeuronConfig,
  type NeuronConfig,
  type BlacklistConfig,
} from "./config.js";
export {
  HttpLedgerClient,
  type HttpLedgerClientOptions,
  type LedgerClient,
  type PeerRecord,
  type SnapshotNeuron,
  type MetagraphSnapshot,
} from "./ledger.js";
export { Metagraph, type AdmissionView } from "./metagraph.js";
export { AdmissionController, type AdmissionDecision, type AdmissionPolicy } from "./admission.js";
export { ModelState, type ModelGuard } from "./state.js";
export {
  nucleusCallbacks,
  type ComputeCallback,
  type CallbackMap,
  type SynapseRef,
  type NucleusCallbackOptions,
} from "./callbacks.js";
export { BackwardDispatcher } from "./dispatcher.js";
export {
  EpochScheduler,
  CHECKPOINT_FILE,
  type EpochSchedulerDeps,
  type EpochSummary,
  type SchedulerConfig,
} from "./scheduler.js";
export {
  openJsonlMetricsSink,
  createRemoteMetricsSink,
  fanoutMetricsSink,
  type MetricsSink,
  type MetricsRecord,
  type RemoteMetricsSinkConfig,
} from "./metrics.js";
export { createAxonApp, startAxon, HOTKEY_HEADER, type AxonDeps, type AxonServer } from "./axon.js";
export { serveNeuron, type ServeOptions } from "./serve.js";
