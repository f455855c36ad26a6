import {
  SyncError,
  isJsonObject,
  sessionIdFromKey,
  sessionKey,
  silentLogger,
  type JsonObject,
  type Logger,
  type Message,
  type MessageStatus,
  type MessageTurn,
  type MessageType,
  type NewPendingOperation,
  type PendingEntityKind,
  type PendingOperation,
  type PendingOperationKind,
  type Session,
  type SessionId,
} from "@chatsync/core";
import type { SqliteDatabase } from "./database.js";
import type { MessageRow, PendingOpRow, SessionRow } from "./types.js";

/**
 * Durable mirror of sessions, messages and the pending-operation queue.
 * Every method is atomic on its own; methods that touch more than one row run
 * in a single transaction.
 */
export interface LocalStore {
  listSessions(): Session[];
  getSession(id: SessionId): Session | null;
  /** Insert-or-replace keyed by session id. Never duplicates a row. */
  upsertSession(session: Session): void;
  /** Move a session, its messages and its queued operations to a new id. */
  reassignSession(from: SessionId, to: SessionId): void;
  deleteSession(id: SessionId): void;

  /** Messages of one session, ascending by timestamp. */
  listMessages(sessionId: SessionId): Message[];
  getMessage(id: string): Message | null;
  saveMessage(message: Message): void;
  updateMessageStatus(id: string, status: MessageStatus): void;
  markMessageSynced(id: string): void;
  /** Drop the session's synced rows and insert `messages`; unsynced rows stay. */
  replaceSyncedMessages(sessionId: SessionId, messages: readonly Message[]): void;

  enqueue(operation: NewPendingOperation): PendingOperation;
  /** Persist a message together with the operation that will replay it. */
  saveQueuedMessage(message: Message, operation: NewPendingOperation): PendingOperation;
  /** FIFO by enqueue order. */
  listPending(): PendingOperation[];
  getPending(id: number): PendingOperation | null;
  removePending(id: number): void;
  recordPendingFailure(id: number, error: string): void;
  pendingCount(): number;

  clear(): void;
}

// ==========================================================================
// Row mapping
// ==========================================================================

const MESSAGE_TYPES: readonly MessageType[] = ["user", "assistant"];
const MESSAGE_STATUSES: readonly MessageStatus[] = ["sending", "sent", "failed"];
const ENTITY_KINDS: readonly PendingEntityKind[] = ["message", "session"];
const OPERATION_KINDS: readonly PendingOperationKind[] = ["create", "update", "delete"];

function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new SyncError("local-storage", `Unexpected value "${value}" in column ${column}`);
  }
  return match;
}

function parseJsonColumn(text: string | null, column: string): JsonObject | null {
  if (text === null) return null;
  const parsed: unknown = JSON.parse(text);
  if (!isJsonObject(parsed)) {
    throw new SyncError("local-storage", `Column ${column} does not hold a JSON object`);
  }
  return parsed;
}

function rowToSession(r: SessionRow): Session {
  return {
    id: sessionIdFromKey(r.id),
    title: r.title,
    createdAt: r.created_at,
    profession: r.profession,
    isSynced: r.is_synced === 1,
  };
}

function rowToMessage(r: MessageRow): Message {
  const turn: MessageTurn | null = r.turn === null ? null : oneOf(MESSAGE_TYPES, r.turn, "turn");
  return {
    id: r.id,
    sessionId: sessionIdFromKey(r.session_id),
    content: r.content,
    type: oneOf(MESSAGE_TYPES, r.type, "type"),
    timestamp: r.timestamp,
    status: oneOf(MESSAGE_STATUSES, r.status, "status"),
    isSynced: r.is_synced === 1,
    metadata: parseJsonColumn(r.metadata, "metadata"),
    remote:
      r.remote_record_id !== null && turn !== null
        ? { recordId: r.remote_record_id, turn }
        : null,
  };
}

function rowToPending(r: PendingOpRow): PendingOperation {
  return {
    id: r.id,
    entityKind: oneOf(ENTITY_KINDS, r.entity_kind, "entity_kind"),
    operation: oneOf(OPERATION_KINDS, r.operation, "operation"),
    entityId: r.entity_id,
    sessionId: r.session_id === null ? null : sessionIdFromKey(r.session_id),
    payload: parseJsonColumn(r.payload, "payload") ?? {},
    enqueuedAt: r.enqueued_at,
    attempts: r.attempts,
    lastError: r.last_error,
  };
}

const MESSAGE_ORDER = "ORDER BY timestamp ASC, CASE type WHEN 'user' THEN 0 ELSE 1 END, rowid ASC";

// ==========================================================================
// SQLite implementation
// ==========================================================================

export class SqliteLocalStore implements LocalStore {
  private readonly db: SqliteDatabase;
  private readonly logger: Logger;

  constructor(db: SqliteDatabase, options?: { logger?: Logger }) {
    this.db = db;
    this.logger = (options?.logger ?? silentLogger()).child({ component: "store" });
  }

  // --------------------------------------------------------------------------
  // Sessions
  // --------------------------------------------------------------------------

  listSessions(): Session[] {
    return this.guard("listSessions", () =>
      this.db
        .prepare<[], SessionRow>("SELECT * FROM chat_sessions")
        .all()
        .map(rowToSession),
    );
  }

  getSession(id: SessionId): Session | null {
    return this.guard("getSession", () => {
      const r = this.db
        .prepare<[number], SessionRow>("SELECT * FROM chat_sessions WHERE id = ?")
        .get(sessionKey(id));
      return r ? rowToSession(r) : null;
    });
  }

  upsertSession(session: Session): void {
    this.guard("upsertSession", () => this.writeSession(session));
  }

  reassignSession(from: SessionId, to: SessionId): void {
    const fromKey = sessionKey(from);
    const toKey = sessionKey(to);
    if (fromKey === toKey) return;

    this.transaction("reassignSession", () => {
      const target = this.db
        .prepare<[number], { id: number }>("SELECT id FROM chat_sessions WHERE id = ?")
        .get(toKey);

      if (target) {
        this.db
          .prepare("UPDATE chat_messages SET session_id = ? WHERE session_id = ?")
          .run(toKey, fromKey);
        this.db.prepare("DELETE FROM chat_sessions WHERE id = ?").run(fromKey);
      } else {
        // ON UPDATE CASCADE carries the messages along
        this.db
          .prepare("UPDATE chat_sessions SET id = ?, is_synced = 1 WHERE id = ?")
          .run(toKey, fromKey);
      }

      this.db
        .prepare("UPDATE pending_ops SET session_id = ? WHERE session_id = ?")
        .run(toKey, fromKey);
    });

    this.logger.debug({ from: fromKey, to: toKey }, "session re-keyed");
  }

  deleteSession(id: SessionId): void {
    this.guard("deleteSession", () => {
      this.db.prepare("DELETE FROM chat_sessions WHERE id = ?").run(sessionKey(id));
    });
  }

  // --------------------------------------------------------------------------
  // Messages
  // --------------------------------------------------------------------------

  listMessages(sessionId: SessionId): Message[] {
    return this.guard("listMessages", () =>
      this.db
        .prepare<[number], MessageRow>(
          `SELECT * FROM chat_messages WHERE session_id = ? ${MESSAGE_ORDER}`,
        )
        .all(sessionKey(sessionId))
        .map(rowToMessage),
    );
  }

  getMessage(id: string): Message | null {
    return this.guard("getMessage", () => {
      const r = this.db
        .prepare<[string], MessageRow>("SELECT * FROM chat_messages WHERE id = ?")
        .get(id);
      return r ? rowToMessage(r) : null;
    });
  }

  saveMessage(message: Message): void {
    this.guard("saveMessage", () => this.writeMessage(message));
  }

  updateMessageStatus(id: string, status: MessageStatus): void {
    this.guard("updateMessageStatus", () => {
      this.db.prepare("UPDATE chat_messages SET status = ? WHERE id = ?").run(status, id);
    });
  }

  markMessageSynced(id: string): void {
    this.guard("markMessageSynced", () => {
      this.db.prepare("UPDATE chat_messages SET is_synced = 1 WHERE id = ?").run(id);
    });
  }

  replaceSyncedMessages(sessionId: SessionId, messages: readonly Message[]): void {
    this.transaction("replaceSyncedMessages", () => {
      this.db
        .prepare("DELETE FROM chat_messages WHERE session_id = ? AND is_synced = 1")
        .run(sessionKey(sessionId));
      for (const message of messages) {
        this.writeMessage(message);
      }
    });
  }

  // --------------------------------------------------------------------------
  // Pending operations
  // --------------------------------------------------------------------------

  enqueue(operation: NewPendingOperation): PendingOperation {
    return this.guard("enqueue", () => this.writePending(operation));
  }

  saveQueuedMessage(message: Message, operation: NewPendingOperation): PendingOperation {
    return this.transaction("saveQueuedMessage", () => {
      this.writeMessage(message);
      return this.writePending(operation);
    });
  }

  listPending(): PendingOperation[] {
    return this.guard("listPending", () =>
      this.db
        .prepare<[], PendingOpRow>("SELECT * FROM pending_ops ORDER BY id ASC")
        .all()
        .map(rowToPending),
    );
  }

  getPending(id: number): PendingOperation | null {
    return this.guard("getPending", () => {
      const r = this.db
        .prepare<[number], PendingOpRow>("SELECT * FROM pending_ops WHERE id = ?")
        .get(id);
      return r ? rowToPending(r) : null;
    });
  }

  removePending(id: number): void {
    this.guard("removePending", () => {
      this.db.prepare("DELETE FROM pending_ops WHERE id = ?").run(id);
    });
  }

  recordPendingFailure(id: number, error: string): void {
    this.guard("recordPendingFailure", () => {
      this.db
        .prepare("UPDATE pending_ops SET attempts = attempts + 1, last_error = ? WHERE id = ?")
        .run(error, id);
    });
  }

  pendingCount(): number {
    return this.guard("pendingCount", () => {
      const r = this.db.prepare<[], { c: number }>("SELECT count(*) AS c FROM pending_ops").get();
      return r ? r.c : 0;
    });
  }

  clear(): void {
    this.transaction("clear", () => {
      this.db.exec("DELETE FROM pending_ops");
      this.db.exec("DELETE FROM chat_messages");
      this.db.exec("DELETE FROM chat_sessions");
    });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private writeSession(session: Session): void {
    this.db
      .prepare(
        `INSERT INTO chat_sessions (id, title, created_at, updated_at, profession, is_synced)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           title = excluded.title,
           created_at = excluded.created_at,
           updated_at = excluded.updated_at,
           profession = COALESCE(excluded.profession, chat_sessions.profession),
           is_synced = MAX(chat_sessions.is_synced, excluded.is_synced)`,
      )
      .run(
        sessionKey(session.id),
        session.title,
        session.createdAt,
        new Date().toISOString(),
        session.profession,
        session.isSynced ? 1 : 0,
      );
  }

  /** is_synced only ever moves from 0 to 1. */
  private writeMessage(message: Message): void {
    this.db
      .prepare(
        `INSERT INTO chat_messages
         (id, session_id, content, type, timestamp, status, is_synced, metadata, remote_record_id, turn)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           session_id = excluded.session_id,
           content = excluded.content,
           type = excluded.type,
           timestamp = excluded.timestamp,
           status = excluded.status,
           is_synced = MAX(chat_messages.is_synced, excluded.is_synced),
           metadata = excluded.metadata,
           remote_record_id = excluded.remote_record_id,
           turn = excluded.turn`,
      )
      .run(
        message.id,
        sessionKey(message.sessionId),
        message.content,
        message.type,
        message.timestamp,
        message.status,
        message.isSynced ? 1 : 0,
        message.metadata ? JSON.stringify(message.metadata) : null,
        message.remote?.recordId ?? null,
        message.remote?.turn ?? null,
      );
  }

  private writePending(operation: NewPendingOperation): PendingOperation {
    const result = this.db
      .prepare(
        `INSERT INTO pending_ops (entity_kind, operation, entity_id, session_id, payload, enqueued_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        operation.entityKind,
        operation.operation,
        operation.entityId,
        operation.sessionId === null ? null : sessionKey(operation.sessionId),
        JSON.stringify(operation.payload),
        operation.enqueuedAt,
      );
    return { ...operation, id: Number(result.lastInsertRowid), attempts: 0, lastError: null };
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof SyncError) throw error;
      throw new SyncError("local-storage", `Local store ${action} failed`, { cause: error });
    }
  }

  private transaction<T>(action: string, fn: () => T): T {
    return this.guard(action, () => {
      this.db.exec("BEGIN");
      try {
        const result = fn();
        this.db.exec("COMMIT");
        return result;
      } catch (error) {
        this.db.exec("ROLLBACK");
        throw error;
      }
    });
  }
}
