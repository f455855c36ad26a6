import type { ChatMessage, Message, Session, SessionSummary } from "./types.js";

/**
 * Parse an ISO timestamp to epoch millis. Unparseable values sort as `fallback`
 * (callers pass "now"), which is an approximation: such rows float to the
 * position of the current time instead of failing the whole sort.
 */
export function parseTimestamp(value: string, fallback: number): number {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function toSessionSummary(session: Session): SessionSummary {
  return { id: session.id, title: session.title, createdAt: session.createdAt };
}

/** Newest first. */
export function sortSessionsByCreatedAt<T extends Pick<SessionSummary, "createdAt">>(
  sessions: readonly T[],
  now: number = Date.now(),
): T[] {
  return [...sessions].sort(
    (a, b) => parseTimestamp(b.createdAt, now) - parseTimestamp(a.createdAt, now),
  );
}

const TURN_RANK = { user: 0, assistant: 1 } as const;

type Orderable = Pick<Message | ChatMessage, "timestamp" | "type">;

/**
 * Ascending timestamp. A backend record yields a user and an assistant row with
 * the same timestamp, so ties put the user turn first.
 */
export function compareMessages(a: Orderable, b: Orderable, now: number = Date.now()): number {
  const delta = parseTimestamp(a.timestamp, now) - parseTimestamp(b.timestamp, now);
  if (delta !== 0) return delta;
  return TURN_RANK[a.type] - TURN_RANK[b.type];
}

export function sortMessages<T extends Orderable>(messages: readonly T[], now = Date.now()): T[] {
  return [...messages].sort((a, b) => compareMessages(a, b, now));
}
