export {
  createLocalSessionIdFactory,
  formatSessionId,
  localSessionId,
  parseSessionId,
  remoteSessionId,
  sameSessionId,
  sessionIdFromKey,
  sessionKey,
} from "./session-id.js";
export type { SessionId } from "./session-id.js";
export { DEFAULT_SESSION_TITLE, isJsonObject, readQueuedMessagePayload } from "./types.js";
export type {
  ChatMessage,
  JsonObject,
  JsonValue,
  Message,
  MessageStatus,
  MessageTurn,
  MessageType,
  NewPendingOperation,
  PendingEntityKind,
  PendingOperation,
  PendingOperationKind,
  QueuedMessagePayload,
  RemoteRecordRef,
  Session,
  SessionSummary,
} from "./types.js";
export {
  HYDRATION_TRANSITIONS,
  InvalidTransitionError,
  MESSAGE_STATUS_TRANSITIONS,
  canTransitionHydration,
  canTransitionMessage,
  transitionHydration,
  transitionMessage,
} from "./state-machines.js";
export type { HydrationState } from "./state-machines.js";
export {
  compareMessages,
  parseTimestamp,
  sortMessages,
  sortSessionsByCreatedAt,
  toSessionSummary,
} from "./ordering.js";
export { SyncError, isSyncError, toError } from "./errors.js";
export type { SyncErrorKind, SyncErrorOptions } from "./errors.js";
export { createLogger, silentLogger } from "./logger.js";
export type { CreateLoggerOptions, Logger } from "./logger.js";
