import type { AxiosInstance } from "axios";
import { createLogger, toError, type Logger } from "@chatsync/core";
import { RemoteGateway, StaticCredentialProvider } from "@chatsync/gateway";
import {
  SqliteLocalStore,
  ensureStorageSchema,
  openDatabase,
  type SqliteDatabase,
} from "@chatsync/storage";
import { ConnectivityMonitor, SyncEngine } from "@chatsync/sync";
import type { ResolvedSettings } from "./settings.js";

export interface Runtime {
  settings: ResolvedSettings;
  logger: Logger;
  db: SqliteDatabase;
  store: SqliteLocalStore;
  gateway: RemoteGateway;
  monitor: ConnectivityMonitor;
  engine: SyncEngine;
  /** Probe connectivity once so the engine knows which path to take. */
  open(): Promise<void>;
  close(): void;
}

export interface RuntimeOptions {
  logger?: Logger;
  /** Preconfigured axios instance for the gateway. */
  http?: AxiosInstance;
}

/** Wire every component once; commands receive the result instead of building their own. */
export function createRuntime(settings: ResolvedSettings, options: RuntimeOptions = {}): Runtime {
  const logger =
    options.logger ?? createLogger({ level: settings.logLevel, destination: process.stderr });
  const onError = (error: Error, context: string): void => {
    logger.error({ err: error, context }, "background failure");
  };

  const db = openDatabase(settings.dbPath);
  ensureStorageSchema(db);
  const store = new SqliteLocalStore(db, { logger });
  const credentials = new StaticCredentialProvider(settings.userId, settings.idToken);
  const gateway = new RemoteGateway({
    baseUrl: settings.apiBaseUrl,
    credentials,
    timeoutMs: settings.requestTimeoutMs,
    http: options.http,
    logger,
  });
  const monitor = new ConnectivityMonitor({
    probe: () => gateway.checkHealth(),
    schedule: settings.probeSchedule,
    logger,
    onError,
  });
  const engine = new SyncEngine({
    store,
    gateway,
    connectivity: monitor,
    credentials,
    profession: settings.profession,
    logger,
    onError,
  });

  return {
    settings,
    logger,
    db,
    store,
    gateway,
    monitor,
    engine,
    async open() {
      const online = await monitor.check();
      logger.debug({ online }, "runtime ready");
    },
    close() {
      engine.stop();
      monitor.stop();
      try {
        db.close();
      } catch (error) {
        logger.warn({ err: toError(error) }, "closing the database failed");
      }
    },
  };
}
