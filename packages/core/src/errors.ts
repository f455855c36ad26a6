export type SyncErrorKind =
  | "auth-absent"
  | "network"
  | "server-status"
  | "invalid-response"
  | "local-storage";

export interface SyncErrorOptions {
  status?: number;
  cause?: unknown;
}

export class SyncError extends Error {
  readonly kind: SyncErrorKind;
  readonly status: number | undefined;

  constructor(kind: SyncErrorKind, message: string, options?: SyncErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "SyncError";
    this.kind = kind;
    this.status = options?.status;
  }
}

export function isSyncError(error: unknown, kind?: SyncErrorKind): error is SyncError {
  return error instanceof SyncError && (kind === undefined || error.kind === kind);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
