/**
 * Session identifiers live in two id spaces: server-assigned ids (positive) and
 * local-only ids minted on this device before the backend has seen the session.
 * Local ids are stored as negative integers so both spaces share one column.
 */
export type SessionId =
  | { readonly kind: "local"; readonly value: number }
  | { readonly kind: "remote"; readonly value: number };

export function remoteSessionId(value: number): SessionId {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RangeError(`Server session ids must be positive integers, got ${value}`);
  }
  return { kind: "remote", value };
}

export function localSessionId(value: number): SessionId {
  if (!Number.isSafeInteger(value) || value >= 0) {
    throw new RangeError(`Local session ids must be negative integers, got ${value}`);
  }
  return { kind: "local", value };
}

/** Storage key for a session id. Local ids are already negative. */
export function sessionKey(id: SessionId): number {
  return id.value;
}

export function sessionIdFromKey(key: number): SessionId {
  return key < 0 ? localSessionId(key) : remoteSessionId(key);
}

export function sameSessionId(a: SessionId | null, b: SessionId | null): boolean {
  if (a === null || b === null) return a === b;
  return a.kind === b.kind && a.value === b.value;
}

export function formatSessionId(id: SessionId): string {
  return id.kind === "local" ? `local:${-id.value}` : String(id.value);
}

/**
 * Parse a user-supplied id. Accepts a plain integer (sign decides the space)
 * or the `local:<n>` form produced by {@link formatSessionId}.
 */
export function parseSessionId(input: string): SessionId | null {
  const trimmed = input.trim();
  const local = /^local:(\d+)$/.exec(trimmed);
  if (local) {
    const value = Number(local[1]);
    return value > 0 ? localSessionId(-value) : null;
  }
  if (!/^-?\d+$/.test(trimmed)) return null;
  const value = Number(trimmed);
  if (value === 0 || !Number.isSafeInteger(value)) return null;
  return sessionIdFromKey(value);
}

/**
 * Mints local-only ids as `-epochMillis`. Two sessions created within the same
 * millisecond still get distinct ids: the generator never repeats a value and
 * keeps ids strictly decreasing.
 */
export function createLocalSessionIdFactory(now: () => number = Date.now): () => SessionId {
  let last = 0;
  return () => {
    let value = -Math.max(1, Math.floor(now()));
    if (last !== 0 && value >= last) {
      value = last - 1;
    }
    last = value;
    return localSessionId(value);
  };
}
