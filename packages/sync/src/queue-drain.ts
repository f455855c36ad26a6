import { randomUUID } from "node:crypto";
import {
  isSyncError,
  parseSessionId,
  readQueuedMessagePayload,
  remoteSessionId,
  silentLogger,
  toError,
  type Logger,
  type PendingOperation,
  type SessionId,
} from "@chatsync/core";
import type { Gateway } from "@chatsync/gateway";
import type { LocalStore } from "@chatsync/storage";

export type ReplayOutcome = "replayed" | "skipped" | "discarded";

export interface DrainResult {
  replayed: number;
  /** Entries whose message was already acknowledged; removed without a request. */
  skipped: number;
  /** Entries that can never be replayed (unreadable payload, no remote counterpart). */
  discarded: number;
  /** The entry that failed and stopped the drain, if any. */
  failedOperationId: number | null;
  remaining: number;
}

export interface QueueDrainOptions {
  store: LocalStore;
  gateway: Gateway;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
  /** Called after a local-only session has been moved to its server id. */
  onSessionRekeyed?: (from: SessionId, to: SessionId) => void;
}

/**
 * Replays the pending-operation queue in enqueue order. The first failure stops
 * the pass so later entries never overtake it; the failed entry keeps its place
 * with its attempt count bumped.
 */
export class QueueDrain {
  private readonly store: LocalStore;
  private readonly gateway: Gateway;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly onSessionRekeyed?: (from: SessionId, to: SessionId) => void;

  constructor(options: QueueDrainOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.logger = (options.logger ?? silentLogger()).child({ component: "drain" });
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.onSessionRekeyed = options.onSessionRekeyed;
  }

  async drain(): Promise<DrainResult> {
    const result: DrainResult = {
      replayed: 0,
      skipped: 0,
      discarded: 0,
      failedOperationId: null,
      remaining: 0,
    };

    // Re-read every pass: a replay can re-key the sessions of later entries.
    for (let next = this.store.listPending()[0]; next; next = this.store.listPending()[0]) {
      let outcome: ReplayOutcome;
      try {
        outcome = await this.replay(next);
      } catch (error) {
        if (isSyncError(error, "local-storage")) throw error;
        const err = toError(error);
        this.store.recordPendingFailure(next.id, err.message);
        this.logger.warn(
          { operationId: next.id, attempts: next.attempts + 1, err },
          "replay failed; leaving entry queued",
        );
        result.failedOperationId = next.id;
        break;
      }
      this.store.removePending(next.id);
      result[outcome] += 1;
    }

    result.remaining = this.store.pendingCount();
    if (result.replayed + result.skipped + result.discarded > 0) {
      this.logger.info(result, "queue drained");
    }
    return result;
  }

  async replay(op: PendingOperation): Promise<ReplayOutcome> {
    if (op.entityKind === "message" && op.operation === "create") {
      return this.replayMessageCreate(op);
    }
    if (op.entityKind === "session" && op.operation !== "create") {
      return this.replaySessionChange(op);
    }
    this.logger.warn(
      { operationId: op.id, entityKind: op.entityKind, operation: op.operation },
      "no remote operation for queued entry; discarding",
    );
    return "discarded";
  }

  private async replayMessageCreate(op: PendingOperation): Promise<ReplayOutcome> {
    const payload = readQueuedMessagePayload(op.payload);
    if (!payload) {
      this.logger.warn({ operationId: op.id }, "unreadable message payload; discarding");
      return "discarded";
    }

    const local = this.store.getMessage(payload.messageId);
    if (local?.isSynced) return "skipped";

    const sessionId = op.sessionId;
    const reply = await this.gateway.processMessage({
      message: payload.content,
      userId: payload.userId,
      profession: payload.profession,
      timestamp: payload.timestamp,
      // a local-only session is unknown to the server; it opens a fresh one
      sessionId: sessionId?.kind === "remote" ? sessionId.value : null,
      clientMessageId: payload.messageId,
    });

    let target = sessionId;
    if (sessionId?.kind === "local") {
      if (reply.sessionId !== null) {
        target = remoteSessionId(reply.sessionId);
        this.store.reassignSession(sessionId, target);
        this.onSessionRekeyed?.(sessionId, target);
      } else {
        this.logger.warn({ operationId: op.id }, "server assigned no session to a local session");
      }
    }

    if (local) {
      this.store.updateMessageStatus(local.id, "sent");
      this.store.markMessageSynced(local.id);
    }

    if (target) {
      this.store.saveMessage({
        id: this.generateId(),
        sessionId: target,
        content: reply.response,
        type: "assistant",
        timestamp: this.now().toISOString(),
        status: "sent",
        isSynced: true,
        metadata: reply.metadata,
        remote: null,
      });
    }
    return "replayed";
  }

  private async replaySessionChange(op: PendingOperation): Promise<ReplayOutcome> {
    const id = parseSessionId(op.entityId);
    if (id?.kind !== "remote") {
      this.logger.warn({ operationId: op.id, entityId: op.entityId }, "session has no server id");
      return "discarded";
    }

    if (op.operation === "delete") {
      await this.gateway.deleteSession(id.value);
      return "replayed";
    }

    const { title } = op.payload;
    if (typeof title !== "string") {
      this.logger.warn({ operationId: op.id }, "session update without a title; discarding");
      return "discarded";
    }
    await this.gateway.renameSession(id.value, title);
    return "replayed";
  }
}
