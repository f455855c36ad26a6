import type { MessageStatus } from "./types.js";

export type HydrationState = "idle" | "loading" | "loaded";

export class InvalidTransitionError extends Error {
  readonly machine: string;
  readonly from: string;
  readonly to: string;

  constructor(machine: string, from: string, to: string) {
    super(`Invalid ${machine} transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    this.machine = machine;
    this.from = from;
    this.to = to;
  }
}

// ==========================================================================
// Message status
// ==========================================================================

/**
 * sending → sent    server acknowledged, or durably queued while offline
 * sending → failed  online send failed; waits for an explicit retry
 * failed  → sending explicit retry
 */
export const MESSAGE_STATUS_TRANSITIONS: Readonly<Record<MessageStatus, readonly MessageStatus[]>> =
  {
    sending: ["sent", "failed"],
    sent: [],
    failed: ["sending"],
  };

export function canTransitionMessage(from: MessageStatus, to: MessageStatus): boolean {
  return MESSAGE_STATUS_TRANSITIONS[from].includes(to);
}

export function transitionMessage(from: MessageStatus, to: MessageStatus): MessageStatus {
  if (!canTransitionMessage(from, to)) {
    throw new InvalidTransitionError("message status", from, to);
  }
  return to;
}

// ==========================================================================
// Session hydration
// ==========================================================================

export const HYDRATION_TRANSITIONS: Readonly<Record<HydrationState, readonly HydrationState[]>> = {
  idle: ["loading"],
  loading: ["loaded", "idle"],
  loaded: ["loading", "idle"],
};

export function canTransitionHydration(from: HydrationState, to: HydrationState): boolean {
  return HYDRATION_TRANSITIONS[from].includes(to);
}

export function transitionHydration(from: HydrationState, to: HydrationState): HydrationState {
  if (!canTransitionHydration(from, to)) {
    throw new InvalidTransitionError("hydration", from, to);
  }
  return to;
}
