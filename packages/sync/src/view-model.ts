import type {
  ChatMessage,
  HydrationState,
  Message,
  SessionId,
  SessionSummary,
} from "@chatsync/core";

export const OFFLINE_NOTICE_TEXT =
  "You're offline. Your message has been saved and will be sent when you're back online.";

export const SEND_FAILED_TEXT = "Failed to send message. Please try again.";

export interface Notice {
  kind: "error" | "offline";
  text: string;
}

/** Everything the presentation layer renders. */
export interface SyncViewState {
  /** Newest first. */
  sessions: SessionSummary[];
  activeSessionId: SessionId | null;
  /** Ascending by timestamp, transient rows included. */
  messages: ChatMessage[];
  hydration: HydrationState;
  isOnline: boolean;
  /** A send is waiting on the assistant. */
  isAwaitingReply: boolean;
  notice: Notice | null;
  pendingCount: number;
}

export function welcomeText(profession: string): string {
  return (
    `Hello! I'm your AI assistant. I'm here to help you with anything related to your ` +
    `profession as a ${profession}. How can I assist you today?`
  );
}

export function welcomeMessage(
  sessionId: SessionId | null,
  profession: string,
  timestamp: string,
): ChatMessage {
  return {
    id: "welcome",
    sessionId,
    content: welcomeText(profession),
    type: "assistant",
    timestamp,
    status: "sent",
    isSynced: false,
    metadata: null,
    transient: true,
  };
}

export function offlineNoticeMessage(replyTo: ChatMessage, timestamp: string): ChatMessage {
  return {
    id: `offline-${replyTo.id}`,
    sessionId: replyTo.sessionId,
    content: OFFLINE_NOTICE_TEXT,
    type: "assistant",
    timestamp,
    status: "sent",
    isSynced: false,
    metadata: null,
    transient: true,
  };
}

export function toChatMessage(message: Message): ChatMessage {
  return {
    id: message.id,
    sessionId: message.sessionId,
    content: message.content,
    type: message.type,
    timestamp: message.timestamp,
    status: message.status,
    isSynced: message.isSynced,
    metadata: message.metadata,
    transient: false,
  };
}
