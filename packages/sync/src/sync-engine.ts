import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";
import {
  DEFAULT_SESSION_TITLE,
  createLocalSessionIdFactory,
  formatSessionId,
  remoteSessionId,
  sameSessionId,
  silentLogger,
  sortMessages,
  sortSessionsByCreatedAt,
  toError,
  toSessionSummary,
  transitionHydration,
  transitionMessage,
  type ChatMessage,
  type HydrationState,
  type Logger,
  type Message,
  type QueuedMessagePayload,
  type SessionId,
  type SessionSummary,
} from "@chatsync/core";
import type {
  CredentialProvider,
  Gateway,
  ProcessMessageResult,
  RemoteMessageRecord,
  RemoteSession,
} from "@chatsync/gateway";
import type { LocalStore } from "@chatsync/storage";
import type { Connectivity } from "./connectivity.js";
import { QueueDrain, type DrainResult } from "./queue-drain.js";
import {
  OFFLINE_NOTICE_TEXT,
  SEND_FAILED_TEXT,
  offlineNoticeMessage,
  toChatMessage,
  welcomeMessage,
  type Notice,
  type SyncViewState,
} from "./view-model.js";

export const DEFAULT_PROFESSION = "professional";

export type SyncEngineListener = (state: SyncViewState) => void;

export interface SyncEngineOptions {
  store: LocalStore;
  gateway: Gateway;
  connectivity: Connectivity;
  credentials: CredentialProvider;
  /** Context tag for new sessions and the welcome message. */
  profession?: string;
  logger?: Logger;
  /** Receives every error swallowed by a background flow. */
  onError?: (error: Error, context: string) => void;
  now?: () => Date;
  generateId?: () => string;
  createLocalSessionId?: () => SessionId;
}

/** The send waiting on delivery, and the session view it was started from. */
interface InflightSend {
  message: ChatMessage;
  /** Follows a re-key of a local-only session while the send is queued behind the drain. */
  sessionId: SessionId | null;
  generation: number;
}

/** One backend record becomes a user row and an assistant row. */
function splitRemoteRecord(record: RemoteMessageRecord, sessionId: SessionId): Message[] {
  const base = {
    sessionId,
    timestamp: record.timestamp,
    status: "sent" as const,
    isSynced: true,
  };
  return [
    {
      ...base,
      id: `${record.id}_user`,
      content: record.userMessage,
      type: "user",
      metadata: null,
      remote: { recordId: record.id, turn: "user" },
    },
    {
      ...base,
      id: `${record.id}_assistant`,
      content: record.assistantResponse,
      type: "assistant",
      metadata: record.metadata,
      remote: { recordId: record.id, turn: "assistant" },
    },
  ];
}

function toStoredMessage(message: ChatMessage, sessionId: SessionId): Message {
  return {
    id: message.id,
    sessionId,
    content: message.content,
    type: message.type,
    timestamp: message.timestamp,
    status: message.status,
    isSynced: message.isSynced,
    metadata: message.metadata,
    remote: null,
  };
}

function isLocalFlight(flight: InflightSend): boolean {
  return flight.sessionId?.kind === "local";
}

/**
 * Offline-first orchestration of sessions and messages. Every mutation lands in
 * the local store first; the server is consulted only when the connectivity
 * source reports online and a credential is available. Listeners receive a
 * fresh {@link SyncViewState} after each change.
 *
 * All methods run on one event loop. The only concurrency guards are the
 * single in-flight send, the load-generation check that discards a stale
 * session load, and the shared drain promise.
 */
export class SyncEngine extends EventEmitter {
  private sessions: SessionSummary[] = [];
  private activeSessionId: SessionId | null = null;
  private messages: ChatMessage[] = [];
  private hydration: HydrationState = "idle";
  private inflight: InflightSend | null = null;
  private notice: Notice | null = null;
  private pendingCount = 0;

  private loadGeneration = 0;
  private draining: Promise<DrainResult> | null = null;
  private background: Promise<void> = Promise.resolve();
  private unsubscribe: (() => void) | null = null;

  private readonly store: LocalStore;
  private readonly gateway: Gateway;
  private readonly connectivity: Connectivity;
  private readonly credentials: CredentialProvider;
  private readonly profession: string;
  private readonly logger: Logger;
  private readonly onError?: (error: Error, context: string) => void;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly createLocalSessionId: () => SessionId;
  private readonly drainer: QueueDrain;

  constructor(options: SyncEngineOptions) {
    super();
    this.store = options.store;
    this.gateway = options.gateway;
    this.connectivity = options.connectivity;
    this.credentials = options.credentials;
    this.profession = options.profession ?? DEFAULT_PROFESSION;
    this.logger = (options.logger ?? silentLogger()).child({ component: "engine" });
    this.onError = options.onError;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.createLocalSessionId =
      options.createLocalSessionId ?? createLocalSessionIdFactory(() => this.now().getTime());
    this.drainer = new QueueDrain({
      store: this.store,
      gateway: this.gateway,
      logger: options.logger,
      now: this.now,
      generateId: this.generateId,
      onSessionRekeyed: (from, to) => this.followRekey(from, to),
    });
    this.messages = [welcomeMessage(null, this.profession, this.timestamp())];
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /** Subscribe to connectivity and load the local projection. */
  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.connectivity.subscribe(this.handleConnectivity);
    this.refreshSessions();
    this.refreshPendingCount();
    this.emitChange();
    if (this.connectivity.isOnline) {
      this.runInBackground("reconnect", () => this.synchronize());
    }
  }

  /** Stop listening. In-flight requests are not aborted. */
  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Resolves once every background flow started so far has finished. */
  idle(): Promise<void> {
    return this.background;
  }

  getState(): SyncViewState {
    return {
      sessions: [...this.sessions],
      activeSessionId: this.activeSessionId,
      messages: [...this.messages],
      hydration: this.hydration,
      isOnline: this.connectivity.isOnline,
      isAwaitingReply: this.inflight !== null,
      notice: this.notice,
      pendingCount: this.pendingCount,
    };
  }

  subscribe(listener: SyncEngineListener): () => void {
    this.on("change", listener);
    return () => {
      this.off("change", listener);
    };
  }

  // --------------------------------------------------------------------------
  // Sessions
  // --------------------------------------------------------------------------

  /**
   * Local sessions, newest first, merged with the server's list when it can be
   * reached. Remote failures leave the local projection in place.
   */
  async listSessions(): Promise<SessionSummary[]> {
    this.refreshSessions();
    if (!(await this.canReachServer())) {
      this.emitChange();
      return [...this.sessions];
    }

    let remote: RemoteSession[];
    try {
      remote = await this.gateway.listSessions();
    } catch (error) {
      this.logger.warn({ err: toError(error) }, "session list refresh failed; using local data");
      this.emitChange();
      return [...this.sessions];
    }

    for (const session of remote) {
      this.store.upsertSession({
        id: remoteSessionId(session.id),
        title: session.title,
        createdAt: session.createdAt !== "" ? session.createdAt : this.timestamp(),
        profession: null,
        isSynced: true,
      });
    }
    this.refreshSessions();
    this.emitChange();
    return [...this.sessions];
  }

  /**
   * Make `sessionId` active and hydrate its messages. Re-entering the active
   * session is a no-op; a load superseded by another one leaves the projection
   * to the newer load.
   */
  async loadSession(sessionId: SessionId): Promise<void> {
    if (sameSessionId(this.activeSessionId, sessionId)) return;

    const generation = ++this.loadGeneration;
    this.activeSessionId = sessionId;
    this.messages = [];
    this.beginHydration();
    this.emitChange();

    let hydrated = false;
    try {
      this.messages = this.projectMessages(sessionId);
      this.emitChange();

      if (sessionId.kind === "remote" && (await this.canReachServer())) {
        await this.hydrateFromServer(sessionId, sessionId.value);
      }
      if (generation === this.loadGeneration) {
        this.messages = this.projectMessages(sessionId);
      }
      hydrated = true;
    } finally {
      if (generation === this.loadGeneration) {
        this.hydration = transitionHydration(this.hydration, hydrated ? "loaded" : "idle");
        this.emitChange();
      }
    }
  }

  /** Leave the active session; the next send starts a new one. */
  newChat(): void {
    this.loadGeneration += 1;
    this.activeSessionId = null;
    this.endHydration();
    this.messages = [welcomeMessage(null, this.profession, this.timestamp())];
    this.notice = null;
    this.emitChange();
  }

  // --------------------------------------------------------------------------
  // Messages
  // --------------------------------------------------------------------------

  /**
   * Send a user message. Resolves false without side effects when the text is
   * blank or another send is still waiting on its reply.
   */
  async sendMessage(text: string, profession: string = this.profession): Promise<boolean> {
    const content = text.trim();
    if (content.length === 0 || this.inflight) return false;

    const message: ChatMessage = {
      id: this.generateId(),
      sessionId: this.activeSessionId,
      content,
      type: "user",
      timestamp: this.timestamp(),
      status: "sending",
      isSynced: false,
      metadata: null,
      transient: false,
    };
    this.notice = null;
    this.messages = [...this.messages, message];
    await this.deliver(message, profession);
    return true;
  }

  /** Re-send a failed user message from the active projection. */
  async retryMessage(messageId: string): Promise<boolean> {
    if (this.inflight) return false;
    const failed = this.messages.find(
      (m) => m.id === messageId && m.type === "user" && m.status === "failed",
    );
    if (!failed) return false;

    const retried: ChatMessage = { ...failed, status: transitionMessage(failed.status, "sending") };
    if (this.store.getMessage(retried.id)) {
      this.store.updateMessageStatus(retried.id, "sending");
    }
    this.replaceInProjection(retried);
    this.notice = null;
    await this.deliver(retried, this.profession);
    return true;
  }

  dismissNotice(): void {
    if (this.notice === null) return;
    this.notice = null;
    this.emitChange();
  }

  // --------------------------------------------------------------------------
  // Queue
  // --------------------------------------------------------------------------

  /** Replay queued operations. A drain already running is joined. */
  drainQueue(): Promise<DrainResult> {
    if (!this.draining) {
      this.draining = this.runDrain().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  /** Refresh the session list, then drain the queue. */
  async synchronize(): Promise<DrainResult> {
    await this.listSessions();
    return this.drainQueue();
  }

  /** Forget everything stored locally (sign-out). */
  reset(): void {
    this.store.clear();
    this.loadGeneration += 1;
    this.sessions = [];
    this.activeSessionId = null;
    this.endHydration();
    this.messages = [welcomeMessage(null, this.profession, this.timestamp())];
    this.notice = null;
    this.pendingCount = 0;
    this.emitChange();
  }

  // --------------------------------------------------------------------------
  // Delivery
  // --------------------------------------------------------------------------

  private async deliver(message: ChatMessage, profession: string): Promise<void> {
    const flight: InflightSend = {
      message,
      sessionId: this.activeSessionId,
      generation: this.loadGeneration,
    };
    this.inflight = flight;
    this.emitChange();
    try {
      let online = await this.canReachServer();
      if (online && isLocalFlight(flight)) {
        // earlier queued messages must reach the server first and re-key the session
        await this.drainQueue();
        online = !isLocalFlight(flight);
      }
      if (online) {
        await this.sendOnline(flight, profession);
      } else {
        this.sendOffline(flight, profession);
      }
    } finally {
      this.inflight = null;
      this.refreshPendingCount();
      this.emitChange();
    }
  }

  private sendOffline(flight: InflightSend, profession: string): void {
    const { message } = flight;
    const visible = this.isViewing(flight);
    let sessionId = flight.sessionId;
    if (sessionId === null) {
      sessionId = this.createLocalSessionId();
      this.store.upsertSession({
        id: sessionId,
        title: DEFAULT_SESSION_TITLE,
        createdAt: message.timestamp,
        profession,
        isSynced: false,
      });
      flight.sessionId = sessionId;
      if (visible) this.activeSessionId = sessionId;
      this.refreshSessions();
    }

    // "sent" here means accepted by the local queue, not acknowledged by the server
    const sent: ChatMessage = {
      ...message,
      sessionId,
      status: transitionMessage(message.status, "sent"),
    };
    const payload: QueuedMessagePayload = {
      messageId: sent.id,
      content: sent.content,
      userId: this.credentials.currentUserId(),
      profession,
      timestamp: sent.timestamp,
    };

    try {
      this.store.saveQueuedMessage(toStoredMessage(sent, sessionId), {
        entityKind: "message",
        operation: "create",
        entityId: sent.id,
        sessionId,
        payload,
        enqueuedAt: this.timestamp(),
      });
    } catch (error) {
      if (visible) {
        this.replaceInProjection({
          ...message,
          sessionId,
          status: transitionMessage(message.status, "failed"),
        });
      }
      throw error;
    }

    if (visible) {
      this.replaceInProjection(sent);
      this.messages = [...this.messages, offlineNoticeMessage(sent, this.timestamp())];
      this.notice = { kind: "offline", text: OFFLINE_NOTICE_TEXT };
    }
    this.logger.info(
      { messageId: sent.id, sessionId: formatSessionId(sessionId) },
      "message queued for later delivery",
    );
  }

  private async sendOnline(flight: InflightSend, profession: string): Promise<void> {
    const sessionId = flight.sessionId;
    const pending: ChatMessage = { ...flight.message, sessionId };
    if (sessionId !== null) {
      try {
        this.ensureSessionRow(sessionId);
        this.store.saveMessage(toStoredMessage(pending, sessionId));
      } catch (error) {
        if (this.isViewing(flight)) {
          this.replaceInProjection({
            ...pending,
            status: transitionMessage(pending.status, "failed"),
          });
        }
        throw error;
      }
    }

    let reply: ProcessMessageResult;
    try {
      reply = await this.gateway.processMessage({
        message: pending.content,
        userId: this.credentials.currentUserId(),
        profession,
        timestamp: pending.timestamp,
        sessionId: sessionId?.kind === "remote" ? sessionId.value : null,
        clientMessageId: pending.id,
      });
    } catch (error) {
      this.failSend(flight, pending, error);
      return;
    }

    let target = sessionId;
    if (target === null) {
      if (reply.sessionId !== null) {
        target = remoteSessionId(reply.sessionId);
        this.store.upsertSession({
          id: target,
          title: DEFAULT_SESSION_TITLE,
          createdAt: pending.timestamp,
          profession,
          isSynced: true,
        });
        flight.sessionId = target;
        // the user may have opened another session while waiting
        if (this.isViewing(flight)) this.activeSessionId = target;
        await this.listSessions();
      } else {
        this.logger.warn({ messageId: pending.id }, "reply carried no session id; not persisted");
      }
    }

    const sent: ChatMessage = {
      ...pending,
      sessionId: target,
      status: transitionMessage(pending.status, "sent"),
      isSynced: target !== null,
    };
    const assistant: ChatMessage = {
      id: this.generateId(),
      sessionId: target,
      content: reply.response,
      type: "assistant",
      timestamp: this.timestamp(),
      status: "sent",
      isSynced: target !== null,
      metadata: reply.metadata,
      transient: false,
    };
    if (target !== null) {
      this.ensureSessionRow(target);
      this.store.saveMessage(toStoredMessage(sent, target));
      this.store.saveMessage(toStoredMessage(assistant, target));
    }

    if (!this.isViewing(flight)) {
      this.logger.debug({ messageId: sent.id }, "reply stored for a session no longer shown");
      return;
    }
    this.replaceInProjection(sent);
    this.messages = [...this.messages, assistant];
  }

  /** Failed sends stay in history and wait for an explicit retry; nothing is queued. */
  private failSend(flight: InflightSend, message: ChatMessage, error: unknown): void {
    const failed: ChatMessage = {
      ...message,
      status: transitionMessage(message.status, "failed"),
    };
    if (message.sessionId !== null) {
      this.store.updateMessageStatus(failed.id, "failed");
    }
    if (this.isViewing(flight)) {
      this.replaceInProjection(failed);
      this.notice = { kind: "error", text: SEND_FAILED_TEXT };
    }
    this.logger.warn({ err: toError(error), messageId: failed.id }, "send failed");
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private readonly handleConnectivity = (online: boolean): void => {
    if (online && this.notice?.kind === "offline") {
      this.notice = null;
    }
    this.emitChange();
    if (online) {
      this.runInBackground("reconnect", () => this.synchronize());
    }
  };

  private async runDrain(): Promise<DrainResult> {
    if (!(await this.canReachServer())) {
      return {
        replayed: 0,
        skipped: 0,
        discarded: 0,
        failedOperationId: null,
        remaining: this.store.pendingCount(),
      };
    }
    const result = await this.drainer.drain();
    this.refreshPendingCount();
    this.refreshSessions();
    this.reprojectActive();
    this.emitChange();
    return result;
  }

  private async hydrateFromServer(sessionId: SessionId, serverId: number): Promise<void> {
    let records: RemoteMessageRecord[];
    try {
      records = await this.gateway.listMessages(serverId);
    } catch (error) {
      this.logger.warn(
        { err: toError(error), sessionId: serverId },
        "session hydration failed; showing local messages",
      );
      return;
    }
    if (records.length > 0) this.ensureSessionRow(sessionId);
    this.store.replaceSyncedMessages(
      sessionId,
      records.flatMap((record) => splitRemoteRecord(record, sessionId)),
    );
  }

  private async canReachServer(): Promise<boolean> {
    if (!this.connectivity.isOnline) return false;
    const token = await this.credentials.currentIdToken();
    if (token === null) {
      this.logger.debug("no credential; staying on local data");
      return false;
    }
    return true;
  }

  /** True while the view the send started from is still the one shown. */
  private isViewing(flight: InflightSend): boolean {
    return flight.generation === this.loadGeneration;
  }

  /**
   * A server session opened by id, without a list refresh, has no local row yet.
   * Add a placeholder so its messages can be stored; a later refresh fills it in.
   */
  private ensureSessionRow(sessionId: SessionId): void {
    if (sessionId.kind !== "remote" || this.store.getSession(sessionId)) return;
    this.store.upsertSession({
      id: sessionId,
      title: DEFAULT_SESSION_TITLE,
      createdAt: this.timestamp(),
      profession: null,
      isSynced: true,
    });
    this.refreshSessions();
  }

  /** The drain moved a local-only session to its server id. */
  private followRekey(from: SessionId, to: SessionId): void {
    if (sameSessionId(this.activeSessionId, from)) {
      this.activeSessionId = to;
    }
    if (this.inflight && sameSessionId(this.inflight.sessionId, from)) {
      this.inflight.sessionId = to;
    }
    this.messages = this.messages.map((m) =>
      sameSessionId(m.sessionId, from) ? { ...m, sessionId: to } : m,
    );
  }

  private projectMessages(sessionId: SessionId): ChatMessage[] {
    const rows = this.store.listMessages(sessionId).map(toChatMessage);
    if (rows.length === 0) {
      return [welcomeMessage(sessionId, this.profession, this.timestamp())];
    }
    return sortMessages(rows, this.now().getTime());
  }

  /** Rebuild the active projection from the store, keeping an unsaved in-flight message. */
  private reprojectActive(): void {
    if (this.activeSessionId === null || this.hydration === "loading") return;
    const messages = this.projectMessages(this.activeSessionId);
    const inflight = this.inflight;
    if (
      inflight &&
      this.isViewing(inflight) &&
      !messages.some((m) => m.id === inflight.message.id)
    ) {
      messages.push({ ...inflight.message, sessionId: this.activeSessionId });
    }
    this.messages = messages;
  }

  private replaceInProjection(message: ChatMessage): void {
    let found = false;
    this.messages = this.messages.map((m) => {
      if (m.id !== message.id) return m;
      found = true;
      return message;
    });
    if (!found) {
      this.messages = [...this.messages, message];
    }
  }

  private refreshSessions(): void {
    this.sessions = sortSessionsByCreatedAt(
      this.store.listSessions().map(toSessionSummary),
      this.now().getTime(),
    );
  }

  private refreshPendingCount(): void {
    this.pendingCount = this.store.pendingCount();
  }

  private beginHydration(): void {
    if (this.hydration === "loading") {
      this.hydration = transitionHydration(this.hydration, "idle");
    }
    this.hydration = transitionHydration(this.hydration, "loading");
  }

  private endHydration(): void {
    if (this.hydration !== "idle") {
      this.hydration = transitionHydration(this.hydration, "idle");
    }
  }

  private runInBackground(context: string, task: () => Promise<unknown>): void {
    const run = task().then(
      () => undefined,
      (error: unknown) => {
        const err = toError(error);
        this.logger.error({ err, context }, "background sync failed");
        this.onError?.(err, context);
      },
    );
    this.background = this.background.then(() => run);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private emitChange(): void {
    this.emit("change", this.getState());
  }
}
