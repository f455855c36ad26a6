import { EventEmitter } from "node:events";
import cron, { type ScheduledTask } from "node-cron";
import { silentLogger, toError, type Logger } from "@chatsync/core";

export type ConnectivityState = "unknown" | "online" | "offline";

export type ConnectivityListener = (online: boolean) => void;

/** Resolves true when the backend is reachable. */
export type ConnectivityProbe = () => Promise<boolean>;

/** What the sync engine needs from a reachability source. */
export interface Connectivity {
  readonly isOnline: boolean;
  subscribe(listener: ConnectivityListener): () => void;
}

export const DEFAULT_PROBE_SCHEDULE = "*/15 * * * * *";

export interface ConnectivityMonitorOptions {
  probe: ConnectivityProbe;
  /** node-cron expression (seconds field allowed). */
  schedule?: string;
  /** A new state must hold this long before it is published. 0 publishes immediately. */
  settleMs?: number;
  logger?: Logger;
  onError?: (error: Error, context: string) => void;
}

/**
 * Tracks backend reachability. State starts as "unknown" (reported offline)
 * until the first probe completes, and listeners hear only real transitions.
 */
export class ConnectivityMonitor extends EventEmitter implements Connectivity {
  private state: ConnectivityState = "unknown";
  private task: ScheduledTask | null = null;
  private settleTimer: NodeJS.Timeout | null = null;
  private inflight: Promise<boolean> | null = null;

  private readonly probe: ConnectivityProbe;
  private readonly schedule: string;
  private readonly settleMs: number;
  private readonly logger: Logger;
  private readonly onError?: (error: Error, context: string) => void;

  constructor(options: ConnectivityMonitorOptions) {
    super();
    this.probe = options.probe;
    this.schedule = options.schedule ?? DEFAULT_PROBE_SCHEDULE;
    this.settleMs = options.settleMs ?? 0;
    this.logger = (options.logger ?? silentLogger()).child({ component: "connectivity" });
    this.onError = options.onError;
  }

  get currentState(): ConnectivityState {
    return this.state;
  }

  get isOnline(): boolean {
    return this.state === "online";
  }

  /** Probe once, then keep probing on the schedule until `stop()`. */
  async start(): Promise<void> {
    if (this.task) return;
    if (!cron.validate(this.schedule)) {
      throw new Error(`Invalid probe schedule: ${this.schedule}`);
    }
    this.task = cron.schedule(this.schedule, () => {
      this.check().catch((error: unknown) => {
        this.onError?.(toError(error), "connectivity-probe");
      });
    });
    await this.check();
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
    if (this.settleTimer) {
      clearTimeout(this.settleTimer);
      this.settleTimer = null;
    }
  }

  subscribe(listener: ConnectivityListener): () => void {
    this.on("change", listener);
    return () => {
      this.off("change", listener);
    };
  }

  /** Probe now. Concurrent calls share one probe. */
  check(): Promise<boolean> {
    if (!this.inflight) {
      this.inflight = this.runProbe().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /** Feed an observation from outside (OS reachability events, failed requests). */
  report(online: boolean): void {
    if (this.state === "unknown" || this.settleMs <= 0) {
      this.apply(online);
      return;
    }

    if (this.settleTimer) {
      clearTimeout(this.settleTimer);
      this.settleTimer = null;
    }
    // flapped back before the window closed
    if (online === this.isOnline) return;

    this.settleTimer = setTimeout(() => {
      this.settleTimer = null;
      this.apply(online);
    }, this.settleMs);
    this.settleTimer.unref();
  }

  private async runProbe(): Promise<boolean> {
    let online: boolean;
    try {
      online = await this.probe();
    } catch (error) {
      this.logger.debug({ err: error }, "probe threw; treating as offline");
      online = false;
    }
    this.report(online);
    return online;
  }

  private apply(online: boolean): void {
    const next: ConnectivityState = online ? "online" : "offline";
    if (next === this.state) return;
    const previous = this.state;
    this.state = next;
    this.logger.info({ from: previous, to: next }, "connectivity changed");
    this.emit("change", online);
  }
}
