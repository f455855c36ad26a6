export { ConnectivityMonitor, DEFAULT_PROBE_SCHEDULE } from "./connectivity.js";
export type {
  Connectivity,
  ConnectivityListener,
  ConnectivityMonitorOptions,
  ConnectivityProbe,
  ConnectivityState,
} from "./connectivity.js";
export { QueueDrain } from "./queue-drain.js";
export type { DrainResult, QueueDrainOptions, ReplayOutcome } from "./queue-drain.js";
export { DEFAULT_PROFESSION, SyncEngine } from "./sync-engine.js";
export type { SyncEngineListener, SyncEngineOptions } from "./sync-engine.js";
export {
  OFFLINE_NOTICE_TEXT,
  SEND_FAILED_TEXT,
  offlineNoticeMessage,
  toChatMessage,
  welcomeMessage,
  welcomeText,
} from "./view-model.js";
export type { Notice, SyncViewState } from "./view-model.js";
