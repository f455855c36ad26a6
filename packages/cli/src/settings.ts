import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

/** Every key is optional; invalid values drop out of their layer instead of failing it. */
export const SettingsSchema = z.object({
  apiBaseUrl: z.string().url().optional().catch(undefined),
  userId: z.string().min(1).optional().catch(undefined),
  idToken: z.string().min(1).optional().catch(undefined),
  profession: z.string().min(1).optional().catch(undefined),
  dbPath: z.string().min(1).optional().catch(undefined),
  requestTimeoutMs: z.number().int().positive().optional().catch(undefined),
  /** node-cron expression for the connectivity probe. */
  probeSchedule: z.string().min(1).optional().catch(undefined),
  logLevel: z.enum(LOG_LEVELS).optional().catch(undefined),
});

export type ChatsyncSettings = z.infer<typeof SettingsSchema>;

export type SettingKey = keyof ChatsyncSettings;

export const SETTING_KEYS = Object.keys(SettingsSchema.shape).filter(isSettingKey);

export function isSettingKey(key: string): key is SettingKey {
  return Object.hasOwn(SettingsSchema.shape, key);
}

export interface ResolvedSettings {
  apiBaseUrl: string;
  userId: string;
  idToken: string | null;
  profession: string;
  dbPath: string;
  requestTimeoutMs: number;
  probeSchedule: string;
  logLevel: (typeof LOG_LEVELS)[number];
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** Global chatsync data directory. */
export function getDataDir(home: string = homedir()): string {
  return join(home, ".chatsync");
}

function globalSettingsPath(home?: string): string {
  return join(getDataDir(home), "settings.json");
}

function projectSettingsPath(workspace: string): string {
  return join(workspace, ".chatsync", "settings.json");
}

function projectLocalSettingsPath(workspace: string): string {
  return join(workspace, ".chatsync", "settings.local.json");
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

const ENV_KEYS = {
  CHATSYNC_API_BASE_URL: "apiBaseUrl",
  CHATSYNC_USER_ID: "userId",
  CHATSYNC_ID_TOKEN: "idToken",
  CHATSYNC_PROFESSION: "profession",
  CHATSYNC_DB_PATH: "dbPath",
  CHATSYNC_LOG_LEVEL: "logLevel",
} as const satisfies Record<string, SettingKey>;

export interface LoadSettingsOptions {
  env?: NodeJS.ProcessEnv;
  /** Home directory holding `.chatsync/settings.json`. */
  home?: string;
}

export interface LoadedSettings {
  settings: ResolvedSettings;
  /** Files that exist but could not be read as JSON. */
  warnings: string[];
}

function parseLayer(raw: unknown): ChatsyncSettings {
  const parsed = SettingsSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}

function loadJsonLayer(path: string, warnings: string[]): ChatsyncSettings {
  if (!existsSync(path)) return {};
  try {
    return parseLayer(JSON.parse(readFileSync(path, "utf-8")));
  } catch (error) {
    warnings.push(`Ignoring ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
}

function envLayer(env: NodeJS.ProcessEnv): ChatsyncSettings {
  const raw: Record<string, string> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") raw[key] = value;
  }
  return parseLayer(raw);
}

function copyDefined<K extends SettingKey>(
  target: ChatsyncSettings,
  source: ChatsyncSettings,
  key: K,
): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

/** Later layers win key by key; unset keys never erase earlier values. */
export function mergeSettings(...layers: ChatsyncSettings[]): ChatsyncSettings {
  const merged: ChatsyncSettings = {};
  for (const layer of layers) {
    for (const key of SETTING_KEYS) copyDefined(merged, layer, key);
  }
  return merged;
}

export function resolveSettings(settings: ChatsyncSettings, home?: string): ResolvedSettings {
  return {
    apiBaseUrl: settings.apiBaseUrl ?? "http://localhost:8000",
    userId: settings.userId ?? "",
    idToken: settings.idToken ?? null,
    profession: settings.profession ?? "professional",
    dbPath: settings.dbPath ?? join(getDataDir(home), "chatsync.db"),
    requestTimeoutMs: settings.requestTimeoutMs ?? 60_000,
    probeSchedule: settings.probeSchedule ?? "*/15 * * * * *",
    logLevel: settings.logLevel ?? "info",
  };
}

/**
 * Load settings with layered override: global → project → project-local →
 * environment. Missing files are skipped; malformed ones are skipped with a
 * warning.
 */
export function loadSettings(workspace: string, options: LoadSettingsOptions = {}): LoadedSettings {
  const warnings: string[] = [];
  const merged = mergeSettings(
    loadJsonLayer(globalSettingsPath(options.home), warnings),
    loadJsonLayer(projectSettingsPath(workspace), warnings),
    loadJsonLayer(projectLocalSettingsPath(workspace), warnings),
    envLayer(options.env ?? process.env),
  );
  return { settings: resolveSettings(merged, options.home), warnings };
}

/** Read one settings file as stored, for read-modify-write. */
export function readSettingsFile(path: string): ChatsyncSettings {
  return loadJsonLayer(path, []);
}

// ---------------------------------------------------------------------------
// Writers
// ---------------------------------------------------------------------------

function writeSettingsFile(path: string, settings: ChatsyncSettings): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(settings, null, 2) + "\n");
}

export function writeGlobalSettings(settings: ChatsyncSettings, home?: string): string {
  const path = globalSettingsPath(home);
  writeSettingsFile(path, settings);
  return path;
}

export function writeProjectSettings(workspace: string, settings: ChatsyncSettings): string {
  const path = projectSettingsPath(workspace);
  writeSettingsFile(path, settings);
  return path;
}

export function writeProjectLocalSettings(workspace: string, settings: ChatsyncSettings): string {
  const path = projectLocalSettingsPath(workspace);
  writeSettingsFile(path, settings);
  return path;
}

export const settingsPaths = {
  global: globalSettingsPath,
  project: projectSettingsPath,
  projectLocal: projectLocalSettingsPath,
};
