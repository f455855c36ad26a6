import { describe, it, expect, vi, afterEach } from "vitest";
import Database from "better-sqlite3";
import {
  SyncError,
  localSessionId,
  remoteSessionId,
  type Message,
  type SessionId,
} from "@chatsync/core";
import {
  StaticCredentialProvider,
  type Gateway,
  type ProcessMessageRequest,
  type ProcessMessageResult,
  type RemoteMessageRecord,
  type RemoteSession,
} from "@chatsync/gateway";
import { SqliteLocalStore, ensureStorageSchema } from "@chatsync/storage";
import type { Connectivity, ConnectivityListener } from "../connectivity.js";
import { SyncEngine } from "../sync-engine.js";
import { OFFLINE_NOTICE_TEXT, SEND_FAILED_TEXT, welcomeText } from "../view-model.js";

// ============================================================================
// Test doubles
// ============================================================================

class ManualConnectivity implements Connectivity {
  private readonly listeners = new Set<ConnectivityListener>();

  constructor(public isOnline: boolean) {}

  subscribe(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  set(online: boolean): void {
    if (online === this.isOnline) return;
    this.isOnline = online;
    for (const listener of this.listeners) listener(online);
  }
}

class FakeGateway implements Gateway {
  listSessions = vi.fn(async (): Promise<RemoteSession[]> => []);
  listMessages = vi.fn(async (_sessionId: number): Promise<RemoteMessageRecord[]> => []);
  processMessage = vi.fn(
    async (_request: ProcessMessageRequest): Promise<ProcessMessageResult> => ({
      sessionId: null,
      response: "ok",
      metadata: null,
    }),
  );
  renameSession = vi.fn(async (_sessionId: number, _title: string): Promise<void> => {});
  deleteSession = vi.fn(async (_sessionId: number): Promise<void> => {});
  checkHealth = vi.fn(async (): Promise<boolean> => true);
}

const openDbs: Database.Database[] = [];

function setup(options: { online?: boolean; token?: string | null } = {}) {
  const db = new Database(":memory:");
  db.pragma("foreign_keys = ON");
  ensureStorageSchema(db);
  openDbs.push(db);

  const store = new SqliteLocalStore(db);
  const gateway = new FakeGateway();
  const connectivity = new ManualConnectivity(options.online ?? false);
  const onError = vi.fn();
  let ids = 0;
  let clock = Date.parse("2026-05-01T10:00:00.000Z");

  const engine = new SyncEngine({
    store,
    gateway,
    connectivity,
    credentials: new StaticCredentialProvider(
      "user-1",
      options.token === undefined ? "test-token" : options.token,
    ),
    profession: "teacher",
    onError,
    now: () => new Date((clock += 1000)),
    generateId: () => `id-${++ids}`,
  });
  return { db, store, gateway, connectivity, engine, onError };
}

function seedSession(store: SqliteLocalStore, id: SessionId, title = "Planning"): void {
  store.upsertSession({
    id,
    title,
    createdAt: "2026-04-01T08:00:00.000Z",
    profession: "teacher",
    isSynced: id.kind === "remote",
  });
}

function seedMessage(store: SqliteLocalStore, message: Partial<Message> & { id: string }): void {
  store.saveMessage({
    sessionId: remoteSessionId(7),
    content: message.id,
    type: "user",
    timestamp: "2026-05-01T09:00:00.000Z",
    status: "sent",
    isSynced: false,
    metadata: null,
    remote: null,
    ...message,
  });
}

function requireSession(id: SessionId | null): SessionId {
  if (!id) throw new Error("expected an active session");
  return id;
}

afterEach(() => {
  for (const db of openDbs.splice(0)) db.close();
});

// ============================================================================
// Session listing
// ============================================================================

describe("listSessions", () => {
  it("returns the local projection newest first without touching the network offline", async () => {
    const { engine, store, gateway } = setup();
    store.upsertSession({
      id: remoteSessionId(1),
      title: "Older",
      createdAt: "2026-01-01T00:00:00.000Z",
      profession: null,
      isSynced: true,
    });
    store.upsertSession({
      id: remoteSessionId(2),
      title: "Newer",
      createdAt: "2026-03-01T00:00:00.000Z",
      profession: null,
      isSynced: true,
    });

    const sessions = await engine.listSessions();

    expect(sessions.map((s) => s.title)).toEqual(["Newer", "Older"]);
    expect(gateway.listSessions).not.toHaveBeenCalled();
  });

  it("merges the server list by id without duplicating rows", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(1), "A");
    gateway.listSessions.mockResolvedValueOnce([
      { id: 1, title: "B", createdAt: "2026-04-01T08:00:00.000Z" },
    ]);

    const sessions = await engine.listSessions();

    expect(sessions).toEqual([
      { id: { kind: "remote", value: 1 }, title: "B", createdAt: "2026-04-01T08:00:00.000Z" },
    ]);
    expect(store.listSessions()).toHaveLength(1);
    expect(store.getSession(remoteSessionId(1))?.title).toBe("B");
  });

  it("stays on local data when the server fails", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(1), "A");
    gateway.listSessions.mockRejectedValueOnce(new SyncError("server-status", "HTTP 500"));

    const sessions = await engine.listSessions();

    expect(sessions.map((s) => s.title)).toEqual(["A"]);
  });

  it("stays local when no credential is available", async () => {
    const { engine, gateway } = setup({ online: true, token: null });
    await engine.listSessions();
    expect(gateway.listSessions).not.toHaveBeenCalled();
  });
});

// ============================================================================
// Session load
// ============================================================================

describe("loadSession", () => {
  it("replaces synced rows with two rows per server record and keeps unsynced rows", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(7));
    seedMessage(store, { id: "stale", isSynced: true, timestamp: "2026-05-01T08:00:00.000Z" });
    seedMessage(store, { id: "pending", isSynced: false, timestamp: "2026-05-01T09:30:00.000Z" });
    gateway.listMessages.mockResolvedValueOnce([
      {
        id: "9",
        userMessage: "Q",
        assistantResponse: "A",
        timestamp: "2026-05-01T09:00:00.000Z",
        metadata: { sources: ["handbook"] },
      },
    ]);

    await engine.loadSession(remoteSessionId(7));

    const state = engine.getState();
    expect(state.hydration).toBe("loaded");
    expect(state.messages.map((m) => m.id)).toEqual(["9_user", "9_assistant", "pending"]);
    expect(state.messages[1]?.metadata).toEqual({ sources: ["handbook"] });
    expect(store.getMessage("stale")).toBeNull();
    expect(store.getMessage("9_user")?.isSynced).toBe(true);
    expect(gateway.listMessages).toHaveBeenCalledWith(7);
  });

  it("fetches at most once for repeated loads of the active session", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(7));

    await Promise.all([
      engine.loadSession(remoteSessionId(7)),
      engine.loadSession(remoteSessionId(7)),
    ]);
    await engine.loadSession(remoteSessionId(7));

    expect(gateway.listMessages).toHaveBeenCalledTimes(1);
  });

  it("shows local messages and clears loading when the fetch fails", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(7));
    seedMessage(store, { id: "local-1" });
    gateway.listMessages.mockRejectedValueOnce(new SyncError("network", "timeout"));

    await engine.loadSession(remoteSessionId(7));

    const state = engine.getState();
    expect(state.hydration).toBe("loaded");
    expect(state.messages.map((m) => m.id)).toEqual(["local-1"]);
  });

  it("never fetches local-only sessions and shows the welcome message when empty", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, localSessionId(-1000));

    await engine.loadSession(localSessionId(-1000));

    const [welcome] = engine.getState().messages;
    expect(gateway.listMessages).not.toHaveBeenCalled();
    expect(welcome).toMatchObject({ transient: true, type: "assistant" });
    expect(welcome?.content).toBe(welcomeText("teacher"));
  });

  it("lets a newer load win over a slower earlier one", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(1));
    seedSession(store, remoteSessionId(2));
    let release: (records: RemoteMessageRecord[]) => void = () => {};
    gateway.listMessages.mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          release = resolve;
        }),
    );

    const first = engine.loadSession(remoteSessionId(1));
    await vi.waitFor(() => expect(gateway.listMessages).toHaveBeenCalledTimes(1));
    await engine.loadSession(remoteSessionId(2));
    release([
      {
        id: "5",
        userMessage: "late",
        assistantResponse: "reply",
        timestamp: "2026-05-01T09:00:00.000Z",
        metadata: null,
      },
    ]);
    await first;

    const state = engine.getState();
    expect(state.activeSessionId).toEqual({ kind: "remote", value: 2 });
    expect(state.hydration).toBe("loaded");
    expect(state.messages.map((m) => m.id)).toEqual(["welcome"]);
    // the late response is still persisted for its own session
    expect(store.getMessage("5_user")?.sessionId).toEqual({ kind: "remote", value: 1 });
  });
});

// ============================================================================
// Send
// ============================================================================

describe("sendMessage", () => {
  it("offline with no session: creates a local session and queues one create", async () => {
    const { engine, store, gateway } = setup();
    engine.start();

    expect(await engine.sendMessage("hello")).toBe(true);

    const state = engine.getState();
    const active = requireSession(state.activeSessionId);
    expect(active.kind).toBe("local");
    expect(active.value).toBeLessThan(0);
    expect(state.sessions.map((s) => s.id)).toEqual([active]);

    expect(store.listMessages(active)).toEqual([
      expect.objectContaining({ id: "id-1", content: "hello", status: "sent", isSynced: false }),
    ]);
    const notices = state.messages.filter((m) => m.id.startsWith("offline-"));
    expect(notices).toHaveLength(1);
    expect(notices[0]).toMatchObject({ content: OFFLINE_NOTICE_TEXT, transient: true });

    const pending = store.listPending();
    expect(pending).toHaveLength(1);
    expect(pending[0]).toMatchObject({
      entityKind: "message",
      operation: "create",
      entityId: "id-1",
      sessionId: active,
    });
    expect(pending[0]?.payload).toMatchObject({ messageId: "id-1", content: "hello", userId: "user-1" });
    expect(state.pendingCount).toBe(1);
    expect(state.notice).toEqual({ kind: "offline", text: OFFLINE_NOTICE_TEXT });
    expect(gateway.processMessage).not.toHaveBeenCalled();
  });

  it("online with no session: adopts the server session and syncs both turns", async () => {
    const { engine, store, gateway } = setup({ online: true });
    gateway.processMessage.mockResolvedValueOnce({ sessionId: 42, response: "hi", metadata: null });

    await engine.sendMessage("hello");

    const state = engine.getState();
    expect(state.activeSessionId).toEqual({ kind: "remote", value: 42 });
    expect(
      store.listMessages(remoteSessionId(42)).map((m) => [m.type, m.content, m.isSynced]),
    ).toEqual([
      ["user", "hello", true],
      ["assistant", "hi", true],
    ]);
    expect(gateway.processMessage).toHaveBeenCalledWith(
      expect.objectContaining({
        message: "hello",
        userId: "user-1",
        profession: "teacher",
        sessionId: null,
        clientMessageId: "id-1",
      }),
    );
    expect(gateway.listSessions).toHaveBeenCalledTimes(1);
    expect(state.pendingCount).toBe(0);
    expect(state.isAwaitingReply).toBe(false);
  });

  it("online failure flips the message to failed without queueing it", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(7));
    await engine.loadSession(remoteSessionId(7));
    gateway.processMessage.mockRejectedValueOnce(new SyncError("network", "down"));

    await engine.sendMessage("hello");

    const state = engine.getState();
    expect(state.messages.find((m) => m.id === "id-1")?.status).toBe("failed");
    expect(store.getMessage("id-1")).toMatchObject({ status: "failed", isSynced: false });
    expect(store.pendingCount()).toBe(0);
    expect(state.notice).toEqual({ kind: "error", text: SEND_FAILED_TEXT });
  });

  it("keeps a failed first message in the projection only", async () => {
    const { engine, store, gateway } = setup({ online: true });
    gateway.processMessage.mockRejectedValueOnce(new SyncError("server-status", "HTTP 502"));

    await engine.sendMessage("hello");

    expect(engine.getState().messages.find((m) => m.id === "id-1")?.status).toBe("failed");
    expect(store.getMessage("id-1")).toBeNull();
    expect(store.listSessions()).toHaveLength(0);
  });

  it("falls back to the offline path without a credential", async () => {
    const { engine, store, gateway } = setup({ online: true, token: null });
    await engine.sendMessage("hello");
    expect(gateway.processMessage).not.toHaveBeenCalled();
    expect(store.pendingCount()).toBe(1);
  });

  it("rejects blank text and a second send while one is waiting", async () => {
    const { engine, gateway } = setup({ online: true });
    expect(await engine.sendMessage("   ")).toBe(false);

    let answer: (result: ProcessMessageResult) => void = () => {};
    gateway.processMessage.mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          answer = resolve;
        }),
    );
    const first = engine.sendMessage("one");
    expect(engine.getState().isAwaitingReply).toBe(true);
    expect(await engine.sendMessage("two")).toBe(false);

    await vi.waitFor(() => expect(gateway.processMessage).toHaveBeenCalledTimes(1));
    answer({ sessionId: 3, response: "r", metadata: null });
    expect(await first).toBe(true);
    expect(engine.getState().isAwaitingReply).toBe(false);
  });
});

describe("retryMessage", () => {
  it("re-sends a failed message with the same id", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(7));
    await engine.loadSession(remoteSessionId(7));
    gateway.processMessage.mockRejectedValueOnce(new SyncError("network", "down"));
    await engine.sendMessage("hello");

    gateway.processMessage.mockResolvedValueOnce({ sessionId: 7, response: "done", metadata: null });
    expect(await engine.retryMessage("id-1")).toBe(true);

    expect(gateway.processMessage).toHaveBeenLastCalledWith(
      expect.objectContaining({ clientMessageId: "id-1", sessionId: 7 }),
    );
    expect(store.getMessage("id-1")).toMatchObject({ status: "sent", isSynced: true });
    expect(engine.getState().notice).toBeNull();
    expect(store.listMessages(remoteSessionId(7)).map((m) => m.content)).toEqual(["hello", "done"]);
  });

  it("queues the retry when offline", async () => {
    const { engine, store, gateway, connectivity } = setup({ online: true });
    seedSession(store, remoteSessionId(7));
    await engine.loadSession(remoteSessionId(7));
    gateway.processMessage.mockRejectedValueOnce(new SyncError("network", "down"));
    await engine.sendMessage("hello");

    connectivity.set(false);
    expect(await engine.retryMessage("id-1")).toBe(true);

    expect(store.getMessage("id-1")?.status).toBe("sent");
    expect(store.listPending().map((op) => op.entityId)).toEqual(["id-1"]);
  });

  it("ignores messages that have not failed", async () => {
    const { engine } = setup();
    await engine.sendMessage("hello");
    expect(await engine.retryMessage("id-1")).toBe(false);
    expect(await engine.retryMessage("missing")).toBe(false);
  });
});

// ============================================================================
// Queue drain
// ============================================================================

describe("drainQueue", () => {
  it("replays on reconnect, re-keys the local session and marks the row synced", async () => {
    const { engine, store, gateway, connectivity } = setup();
    engine.start();
    await engine.sendMessage("hello");
    const local = requireSession(engine.getState().activeSessionId);
    gateway.processMessage.mockResolvedValueOnce({ sessionId: 42, response: "hi", metadata: null });

    connectivity.set(true);
    await engine.idle();

    expect(gateway.processMessage).toHaveBeenCalledWith(
      expect.objectContaining({ sessionId: null, clientMessageId: "id-1", message: "hello" }),
    );
    expect(store.listPending()).toEqual([]);
    expect(store.getMessage("id-1")?.isSynced).toBe(true);
    expect(store.getSession(local)).toBeNull();
    expect(store.listMessages(remoteSessionId(42)).map((m) => m.content)).toEqual(["hello", "hi"]);

    const state = engine.getState();
    expect(state.activeSessionId).toEqual({ kind: "remote", value: 42 });
    expect(state.pendingCount).toBe(0);
    expect(state.isOnline).toBe(true);
    expect(state.notice).toBeNull();
  });

  it("stops at the first failure and keeps strict order", async () => {
    const { engine, store, gateway, connectivity } = setup();
    await engine.sendMessage("first");
    await engine.sendMessage("second");
    connectivity.set(true);
    gateway.processMessage.mockRejectedValueOnce(new SyncError("network", "down"));

    const failed = await engine.drainQueue();

    expect(failed).toMatchObject({ replayed: 0, remaining: 2 });
    expect(gateway.processMessage).toHaveBeenCalledTimes(1);
    const [head] = store.listPending();
    expect(head).toMatchObject({ entityId: "id-1", attempts: 1, lastError: "down" });

    gateway.processMessage
      .mockResolvedValueOnce({ sessionId: 50, response: "a", metadata: null })
      .mockResolvedValueOnce({ sessionId: 50, response: "b", metadata: null });
    const drained = await engine.drainQueue();

    expect(drained).toMatchObject({ replayed: 2, remaining: 0, failedOperationId: null });
    // the second entry followed its session to the server id
    expect(gateway.processMessage.mock.calls[2]?.[0]).toMatchObject({
      clientMessageId: "id-2",
      sessionId: 50,
    });
  });

  it("skips entries whose message is already synced", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(5));
    store.saveQueuedMessage(
      {
        id: "dup",
        sessionId: remoteSessionId(5),
        content: "hello",
        type: "user",
        timestamp: "2026-05-01T09:00:00.000Z",
        status: "sent",
        isSynced: true,
        metadata: null,
        remote: null,
      },
      {
        entityKind: "message",
        operation: "create",
        entityId: "dup",
        sessionId: remoteSessionId(5),
        payload: {
          messageId: "dup",
          content: "hello",
          userId: "user-1",
          profession: "teacher",
          timestamp: "2026-05-01T09:00:00.000Z",
        },
        enqueuedAt: "2026-05-01T09:00:00.000Z",
      },
    );

    const result = await engine.drainQueue();

    expect(result).toMatchObject({ skipped: 1, replayed: 0, remaining: 0 });
    expect(gateway.processMessage).not.toHaveBeenCalled();
  });

  it("replays session updates and deletes and discards what has no server id", async () => {
    const { engine, store, gateway } = setup({ online: true });
    const base = { entityKind: "session" as const, payload: {}, enqueuedAt: "2026-05-01T09:00:00Z" };
    store.enqueue({
      ...base,
      operation: "update",
      entityId: "5",
      sessionId: null,
      payload: { title: "Renamed" },
    });
    store.enqueue({ ...base, operation: "delete", entityId: "6", sessionId: null });
    store.enqueue({ ...base, operation: "delete", entityId: "local:99", sessionId: null });

    const result = await engine.drainQueue();

    expect(gateway.renameSession).toHaveBeenCalledWith(5, "Renamed");
    expect(gateway.deleteSession).toHaveBeenCalledWith(6);
    expect(gateway.deleteSession).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ replayed: 2, discarded: 1, remaining: 0 });
  });

  it("joins a drain that is already running", () => {
    const { engine } = setup({ online: true });
    const a = engine.drainQueue();
    const b = engine.drainQueue();
    expect(a).toBe(b);
    return a;
  });

  it("leaves the queue alone while offline", async () => {
    const { engine, gateway } = setup();
    await engine.sendMessage("hello");
    const result = await engine.drainQueue();
    expect(result).toMatchObject({ replayed: 0, remaining: 1 });
    expect(gateway.processMessage).not.toHaveBeenCalled();
  });

  it("reports background failures to onError instead of rejecting", async () => {
    const { engine, store, gateway, connectivity, onError } = setup();
    engine.start();
    gateway.listSessions.mockResolvedValueOnce([
      { id: 1, title: "A", createdAt: "2026-04-01T08:00:00.000Z" },
    ]);
    vi.spyOn(store, "upsertSession").mockImplementation(() => {
      throw new SyncError("local-storage", "disk full");
    });

    connectivity.set(true);
    await engine.idle();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(expect.any(SyncError), "reconnect");
  });
});

// ============================================================================
// View state
// ============================================================================

describe("view state", () => {
  it("notifies subscribers until they unsubscribe", async () => {
    const { engine } = setup();
    const listener = vi.fn();
    const unsubscribe = engine.subscribe(listener);

    engine.newChat();
    expect(listener).toHaveBeenCalledTimes(1);
    unsubscribe();
    engine.newChat();
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("newChat leaves the active session and shows the welcome message", async () => {
    const { engine, store } = setup();
    seedSession(store, remoteSessionId(7));
    await engine.loadSession(remoteSessionId(7));

    engine.newChat();

    const state = engine.getState();
    expect(state.activeSessionId).toBeNull();
    expect(state.hydration).toBe("idle");
    expect(state.messages.map((m) => m.id)).toEqual(["welcome"]);
  });

  it("dismissNotice clears the notice", async () => {
    const { engine } = setup();
    await engine.sendMessage("hello");
    expect(engine.getState().notice?.kind).toBe("offline");
    engine.dismissNotice();
    expect(engine.getState().notice).toBeNull();
  });

  it("reset clears the store and the projection", async () => {
    const { engine, store } = setup();
    await engine.sendMessage("hello");

    engine.reset();

    const state = engine.getState();
    expect(store.listSessions()).toEqual([]);
    expect(store.pendingCount()).toBe(0);
    expect(state.sessions).toEqual([]);
    expect(state.activeSessionId).toBeNull();
    expect(state.pendingCount).toBe(0);
    expect(state.messages.map((m) => m.id)).toEqual(["welcome"]);
  });
});

// ============================================================================
// Sessions opened by id
// ============================================================================

describe("sessions known only to the server", () => {
  it("hydrates a session that has no local row yet", async () => {
    const { engine, store, gateway } = setup({ online: true });
    gateway.listMessages.mockResolvedValueOnce([
      {
        id: "9",
        userMessage: "Q",
        assistantResponse: "A",
        timestamp: "2026-05-01T09:00:00.000Z",
        metadata: null,
      },
    ]);

    await engine.loadSession(remoteSessionId(42));

    const state = engine.getState();
    expect(state.hydration).toBe("loaded");
    expect(state.messages.map((m) => m.id)).toEqual(["9_user", "9_assistant"]);
    expect(store.getSession(remoteSessionId(42))).toMatchObject({
      title: "New Chat",
      profession: null,
      isSynced: true,
    });
    expect(state.sessions.map((s) => s.id)).toEqual([remoteSessionId(42)]);
  });

  it("sends into a session that has no local row yet", async () => {
    const { engine, store, gateway } = setup({ online: true });
    gateway.processMessage.mockResolvedValueOnce({ sessionId: 42, response: "hi", metadata: null });
    await engine.loadSession(remoteSessionId(42));

    expect(await engine.sendMessage("hello")).toBe(true);

    const state = engine.getState();
    expect(gateway.processMessage.mock.calls[0]?.[0].sessionId).toBe(42);
    expect(state.messages.map((m) => [m.id, m.status])).toEqual([
      ["welcome", "sent"],
      ["id-1", "sent"],
      ["id-2", "sent"],
    ]);
    expect(store.listMessages(remoteSessionId(42)).map((m) => m.content)).toEqual(["hello", "hi"]);
    expect(state.notice).toBeNull();
  });

  it("marks the message failed when it cannot be stored before sending", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(7));
    await engine.loadSession(remoteSessionId(7));
    vi.spyOn(store, "saveMessage").mockImplementationOnce(() => {
      throw new SyncError("local-storage", "disk full");
    });

    await expect(engine.sendMessage("hello")).rejects.toThrow("disk full");

    const state = engine.getState();
    expect(state.messages.find((m) => m.id === "id-1")?.status).toBe("failed");
    expect(state.isAwaitingReply).toBe(false);
    expect(gateway.processMessage).not.toHaveBeenCalled();
  });
});

// ============================================================================
// Session switches while a reply is outstanding
// ============================================================================

describe("switching sessions during a send", () => {
  function holdReply(gateway: FakeGateway) {
    const held = {
      answer: (_result: ProcessMessageResult) => {},
      refuse: (_error: Error) => {},
    };
    gateway.processMessage.mockImplementationOnce(
      () =>
        new Promise((resolve, reject) => {
          held.answer = resolve;
          held.refuse = reject;
        }),
    );
    return held;
  }

  it("stores the reply with the session it was sent from", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(7));
    seedSession(store, remoteSessionId(8));
    await engine.loadSession(remoteSessionId(7));
    const held = holdReply(gateway);

    const sending = engine.sendMessage("for seven");
    await vi.waitFor(() => expect(gateway.processMessage).toHaveBeenCalledTimes(1));
    await engine.loadSession(remoteSessionId(8));
    held.answer({ sessionId: 7, response: "reply for seven", metadata: null });
    await sending;

    const state = engine.getState();
    expect(state.activeSessionId).toEqual(remoteSessionId(8));
    expect(state.messages.map((m) => m.id)).toEqual(["welcome"]);
    expect(state.notice).toBeNull();
    expect(store.listMessages(remoteSessionId(7)).map((m) => m.content)).toEqual([
      "for seven",
      "reply for seven",
    ]);
    expect(store.listMessages(remoteSessionId(8))).toEqual([]);
  });

  it("does not move the view to a session the server assigns after a switch", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(8));
    const held = holdReply(gateway);

    const sending = engine.sendMessage("hello");
    await vi.waitFor(() => expect(gateway.processMessage).toHaveBeenCalledTimes(1));
    await engine.loadSession(remoteSessionId(8));
    held.answer({ sessionId: 42, response: "hi", metadata: null });
    await sending;

    const state = engine.getState();
    expect(state.activeSessionId).toEqual(remoteSessionId(8));
    expect(state.messages.map((m) => m.id)).toEqual(["welcome"]);
    expect(state.messages[0]?.sessionId).toEqual(remoteSessionId(8));
    expect(state.notice).toBeNull();
    expect(state.sessions.map((s) => s.id)).toEqual([remoteSessionId(42), remoteSessionId(8)]);
    expect(store.listMessages(remoteSessionId(42)).map((m) => m.content)).toEqual(["hello", "hi"]);
  });

  it("records a failure without raising a notice in the new view", async () => {
    const { engine, store, gateway } = setup({ online: true });
    seedSession(store, remoteSessionId(7));
    seedSession(store, remoteSessionId(8));
    await engine.loadSession(remoteSessionId(7));
    const held = holdReply(gateway);

    const sending = engine.sendMessage("for seven");
    await vi.waitFor(() => expect(gateway.processMessage).toHaveBeenCalledTimes(1));
    await engine.loadSession(remoteSessionId(8));
    held.refuse(new SyncError("server-status", "502"));
    await sending;

    const state = engine.getState();
    expect(state.notice).toBeNull();
    expect(state.messages.map((m) => m.id)).toEqual(["welcome"]);
    expect(store.getMessage("id-1")?.status).toBe("failed");
  });
});

describe("connectivity in the view state", () => {
  it("follows the connectivity source before start", () => {
    const { engine, connectivity } = setup({ online: true });

    expect(engine.getState().isOnline).toBe(true);
    connectivity.set(false);
    expect(engine.getState().isOnline).toBe(false);
  });
});
