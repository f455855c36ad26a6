import axios, {
  isAxiosError,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from "axios";
import type { z } from "zod";
import { SyncError, silentLogger, type JsonObject, type Logger } from "@chatsync/core";
import type { CredentialProvider } from "./credentials.js";
import {
  MessageListResponseSchema,
  ProcessResponseSchema,
  SessionListResponseSchema,
  StatusEnvelopeSchema,
} from "./schemas.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

// ============================================================================
// Wire-independent shapes
// ============================================================================

export interface RemoteSession {
  id: number;
  title: string;
  createdAt: string;
}

/** One backend record holds a user turn and the assistant's answer to it. */
export interface RemoteMessageRecord {
  id: string;
  userMessage: string;
  assistantResponse: string;
  timestamp: string;
  metadata: JsonObject | null;
}

export interface ProcessMessageRequest {
  message: string;
  userId: string;
  profession: string;
  timestamp: string;
  /** Server session id, or null to let the backend open a new session. */
  sessionId: number | null;
  clientMessageId: string;
}

export interface ProcessMessageResult {
  sessionId: number | null;
  response: string;
  metadata: JsonObject | null;
}

/** The backend operations the sync engine depends on. */
export interface Gateway {
  listSessions(): Promise<RemoteSession[]>;
  listMessages(sessionId: number): Promise<RemoteMessageRecord[]>;
  processMessage(request: ProcessMessageRequest): Promise<ProcessMessageResult>;
  renameSession(sessionId: number, title: string): Promise<void>;
  deleteSession(sessionId: number): Promise<void>;
  checkHealth(): Promise<boolean>;
}

export interface RemoteGatewayOptions {
  baseUrl: string;
  credentials: CredentialProvider;
  timeoutMs?: number;
  /** Preconfigured axios instance; tests pass one with an in-process adapter. */
  http?: AxiosInstance;
  logger?: Logger;
}

// ============================================================================
// HTTP implementation
// ============================================================================

export class RemoteGateway implements Gateway {
  private readonly http: AxiosInstance;
  private readonly credentials: CredentialProvider;
  private readonly logger: Logger;

  constructor(options: RemoteGatewayOptions) {
    this.credentials = options.credentials;
    this.logger = (options.logger ?? silentLogger()).child({ component: "gateway" });
    this.http = options.http ?? axios.create();
    this.http.defaults.baseURL = options.baseUrl.replace(/\/+$/, "");
    this.http.defaults.timeout = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async listSessions(): Promise<RemoteSession[]> {
    const body = await this.request(
      { method: "GET", url: "/api/chats" },
      SessionListResponseSchema,
    );
    return body.sessions.map((s) => ({ id: s.id, title: s.title, createdAt: s.created_at }));
  }

  async listMessages(sessionId: number): Promise<RemoteMessageRecord[]> {
    const body = await this.request(
      { method: "GET", url: `/api/chats/${sessionId}/messages` },
      MessageListResponseSchema,
    );
    return body.messages.map((m) => ({
      id: m.id,
      userMessage: m.user_message,
      assistantResponse: m.assistant_response,
      timestamp: m.timestamp,
      metadata: m.metadata,
    }));
  }

  async processMessage(request: ProcessMessageRequest): Promise<ProcessMessageResult> {
    const body = await this.request(
      {
        method: "POST",
        url: "/api/agents/process",
        data: {
          message: request.message,
          user_id: request.userId,
          context: { profession: request.profession },
          timestamp: request.timestamp,
          session_id: request.sessionId,
          client_message_id: request.clientMessageId,
        },
      },
      ProcessResponseSchema,
    );
    return {
      sessionId: body.session_id ?? null,
      response: body.response,
      metadata: body.metadata,
    };
  }

  async renameSession(sessionId: number, title: string): Promise<void> {
    await this.send({ method: "PATCH", url: `/api/chats/${sessionId}`, data: { title } });
  }

  async deleteSession(sessionId: number): Promise<void> {
    await this.send({ method: "DELETE", url: `/api/chats/${sessionId}` });
  }

  /** Unauthenticated reachability probe. Never throws. */
  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.http.request({
        method: "GET",
        url: "/api/health",
        validateStatus: () => true,
      });
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      this.logger.debug({ err: error }, "health probe failed");
      return false;
    }
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async request<S extends z.ZodTypeAny>(
    config: AxiosRequestConfig,
    schema: S,
  ): Promise<z.output<S>> {
    const data = await this.send(config);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new SyncError(
        "invalid-response",
        `${requestLabel(config)} returned an unexpected body`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  /** Authenticated request; resolves with the raw body of a successful response. */
  private async send(config: AxiosRequestConfig): Promise<unknown> {
    const token = await this.credentials.currentIdToken();
    if (!token) {
      throw new SyncError("auth-absent", "No credential available");
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        ...config,
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json",
        },
        validateStatus: () => true,
      });
    } catch (error) {
      const reason = isAxiosError(error) ? (error.code ?? error.message) : String(error);
      this.logger.debug({ request: requestLabel(config), reason }, "request failed");
      throw new SyncError("network", `${requestLabel(config)} failed: ${reason}`, { cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new SyncError(
        "server-status",
        `${requestLabel(config)} returned HTTP ${response.status}`,
        { status: response.status },
      );
    }

    const envelope = StatusEnvelopeSchema.safeParse(response.data);
    const status = envelope.success ? envelope.data.status : undefined;
    if (status !== undefined && status !== "success") {
      throw new SyncError(
        "server-status",
        `${requestLabel(config)} reported status "${status}"`,
        { status: response.status },
      );
    }

    return response.data;
  }
}

function requestLabel(config: AxiosRequestConfig): string {
  return `${(config.method ?? "GET").toUpperCase()} ${config.url ?? ""}`;
}
