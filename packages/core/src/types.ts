import type { SessionId } from "./session-id.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export const DEFAULT_SESSION_TITLE = "New Chat";

export interface Session {
  id: SessionId;
  title: string;
  /** ISO-8601. Sole sort key for session listing (descending). */
  createdAt: string;
  /** Context tag applied at creation; null for sessions first seen on the server. */
  profession: string | null;
  isSynced: boolean;
}

/** Projection used by session lists. */
export interface SessionSummary {
  id: SessionId;
  title: string;
  createdAt: string;
}

export type MessageType = "user" | "assistant";

export type MessageStatus = "sending" | "sent" | "failed";

/** Which half of a backend user/assistant record a local row represents. */
export type MessageTurn = "user" | "assistant";

export interface RemoteRecordRef {
  recordId: string;
  turn: MessageTurn;
}

export interface Message {
  id: string;
  sessionId: SessionId;
  content: string;
  type: MessageType;
  /** ISO-8601. Intra-session order is ascending timestamp. */
  timestamp: string;
  status: MessageStatus;
  isSynced: boolean;
  metadata: JsonObject | null;
  /** Set on rows materialized from a full-session server fetch. */
  remote: RemoteRecordRef | null;
}

/**
 * A message as shown to the presentation layer. Transient rows (welcome and
 * offline notices) are never persisted and have no session.
 */
export interface ChatMessage {
  id: string;
  sessionId: SessionId | null;
  content: string;
  type: MessageType;
  timestamp: string;
  status: MessageStatus;
  isSynced: boolean;
  metadata: JsonObject | null;
  transient: boolean;
}

export type PendingEntityKind = "message" | "session";

export type PendingOperationKind = "create" | "update" | "delete";

export interface PendingOperation {
  id: number;
  entityKind: PendingEntityKind;
  operation: PendingOperationKind;
  entityId: string;
  /** Session the operation belongs to; follows the session when it is re-keyed. */
  sessionId: SessionId | null;
  payload: JsonObject;
  enqueuedAt: string;
  attempts: number;
  lastError: string | null;
}

export type NewPendingOperation = Omit<PendingOperation, "id" | "attempts" | "lastError">;

/** Payload carried by a queued message/create, enough to replay it later. */
export type QueuedMessagePayload = {
  messageId: string;
  content: string;
  userId: string;
  profession: string;
  timestamp: string;
};

export function readQueuedMessagePayload(payload: JsonObject): QueuedMessagePayload | null {
  const { messageId, content, userId, profession, timestamp } = payload;
  if (
    typeof messageId !== "string" ||
    typeof content !== "string" ||
    typeof userId !== "string" ||
    typeof profession !== "string" ||
    typeof timestamp !== "string"
  ) {
    return null;
  }
  return { messageId, content, userId, profession, timestamp };
}
