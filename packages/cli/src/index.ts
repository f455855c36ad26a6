import { Command, CommanderError } from "commander";
import {
  formatSessionId,
  parseSessionId,
  toError,
  type ChatMessage,
  type SessionId,
} from "@chatsync/core";
import { createRuntime, type Runtime } from "./runtime.js";
import {
  isSettingKey,
  loadSettings,
  mergeSettings,
  readSettingsFile,
  settingsPaths,
  SettingsSchema,
  writeGlobalSettings,
  writeProjectLocalSettings,
  writeProjectSettings,
  type ResolvedSettings,
} from "./settings.js";

export { createRuntime } from "./runtime.js";
export type { Runtime, RuntimeOptions } from "./runtime.js";
export * from "./settings.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface RunOptions {
  io?: CliIO;
  /** Directory whose `.chatsync/` holds project settings. */
  workspace?: string;
  /** Builds the runtime for commands that need one. */
  runtime?: (settings: ResolvedSettings) => Runtime;
  env?: NodeJS.ProcessEnv;
  home?: string;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function formatMessage(message: ChatMessage): string {
  const who = message.type === "user" ? "you" : "assistant";
  let marker = "";
  if (message.status === "failed") marker = " [failed]";
  else if (message.type === "user" && !message.isSynced && !message.transient) marker = " [queued]";
  return `${who}${marker}: ${message.content}`;
}

/** Run the CLI and resolve with the process exit code. */
export async function run(argv: string[] = process.argv, options: RunOptions = {}): Promise<number> {
  const io = options.io ?? consoleIO;
  const workspace = options.workspace ?? process.cwd();
  const buildRuntime = options.runtime ?? ((settings: ResolvedSettings) => createRuntime(settings));
  let exitCode = 0;

  const fail = (message: string): void => {
    io.err(message);
    exitCode = 1;
  };

  /** Open a runtime for one command and always close it. */
  async function withRuntime(action: (runtime: Runtime) => Promise<void>): Promise<void> {
    const { settings, warnings } = loadSettings(workspace, { env: options.env, home: options.home });
    for (const warning of warnings) io.err(warning);
    const runtime = buildRuntime(settings);
    try {
      await runtime.open();
      await action(runtime);
    } finally {
      runtime.close();
    }
  }

  function parseIdArgument(input: string): SessionId | null {
    const id = parseSessionId(input);
    if (!id) fail(`Invalid session id: ${input}`);
    return id;
  }

  const program = new Command()
    .name("chatsync")
    .description("Offline-first chat client")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  // ── chatsync sessions ──────────────────────────────────────────────
  program
    .command("sessions")
    .description("List chat sessions, newest first")
    .action(async () => {
      await withRuntime(async ({ engine }) => {
        const sessions = await engine.listSessions();
        if (sessions.length === 0) {
          io.out("No sessions");
          return;
        }
        for (const session of sessions) {
          io.out(`${formatSessionId(session.id)}\t${session.createdAt}\t${session.title}`);
        }
      });
    });

  // ── chatsync show <sessionId> ──────────────────────────────────────
  program
    .command("show")
    .description("Show the messages of a session")
    .argument("<sessionId>", "server id, or local:<n> for a session not yet synced")
    .action(async (input: string) => {
      const id = parseIdArgument(input);
      if (!id) return;
      await withRuntime(async ({ engine }) => {
        await engine.loadSession(id);
        for (const message of engine.getState().messages) io.out(formatMessage(message));
      });
    });

  // ── chatsync send <text...> ────────────────────────────────────────
  program
    .command("send")
    .description("Send a message; queued locally when the backend is unreachable")
    .argument("<text...>", "message text")
    .option("--session <id>", "continue an existing session")
    .option("--profession <name>", "context tag for the assistant")
    .action(async (words: string[], opts: { session?: string; profession?: string }) => {
      const sessionId = opts.session === undefined ? null : parseIdArgument(opts.session);
      if (opts.session !== undefined && !sessionId) return;

      await withRuntime(async ({ engine, settings }) => {
        if (sessionId) await engine.loadSession(sessionId);
        const before = new Set(engine.getState().messages.map((m) => m.id));
        const accepted = await engine.sendMessage(words.join(" "), opts.profession ?? settings.profession);
        if (!accepted) {
          fail("Nothing to send");
          return;
        }

        const state = engine.getState();
        for (const message of state.messages) {
          if (!before.has(message.id)) io.out(formatMessage(message));
        }
        if (state.activeSessionId) io.out(`session ${formatSessionId(state.activeSessionId)}`);
        if (state.notice?.kind === "error") fail(state.notice.text);
      });
    });

  // ── chatsync retry <messageId> ─────────────────────────────────────
  program
    .command("retry")
    .description("Re-send a message that failed")
    .argument("<messageId>", "id of the failed message")
    .action(async (messageId: string) => {
      await withRuntime(async ({ engine, store }) => {
        const stored = store.getMessage(messageId);
        if (stored) await engine.loadSession(stored.sessionId);
        if (!(await engine.retryMessage(messageId))) {
          fail(`No failed message with id ${messageId}`);
          return;
        }
        const retried = engine.getState().messages.find((m) => m.id === messageId);
        if (retried) io.out(formatMessage(retried));
        const notice = engine.getState().notice;
        if (notice?.kind === "error") fail(notice.text);
      });
    });

  // ── chatsync queue ─────────────────────────────────────────────────
  program
    .command("queue")
    .description("List operations waiting to be replayed")
    .action(async () => {
      await withRuntime(async ({ store }) => {
        const pending = store.listPending();
        if (pending.length === 0) {
          io.out("Queue is empty");
          return;
        }
        for (const op of pending) {
          const session = op.sessionId ? formatSessionId(op.sessionId) : "-";
          const error = op.lastError ? `\t${op.lastError}` : "";
          io.out(
            `#${op.id}\t${op.entityKind}/${op.operation}\t${op.entityId}\t${session}\tattempts=${op.attempts}${error}`,
          );
        }
      });
    });

  // ── chatsync sync ──────────────────────────────────────────────────
  program
    .command("sync")
    .description("Refresh sessions and replay the queue")
    .action(async () => {
      await withRuntime(async ({ engine, monitor }) => {
        if (!monitor.isOnline) {
          fail("Backend unreachable; nothing replayed");
          return;
        }
        const result = await engine.synchronize();
        io.out(
          `replayed ${result.replayed}, skipped ${result.skipped}, ` +
            `discarded ${result.discarded}, remaining ${result.remaining}`,
        );
        if (result.failedOperationId !== null) {
          fail(`Operation #${result.failedOperationId} failed; it stays queued`);
        }
      });
    });

  // ── chatsync reset ─────────────────────────────────────────────────
  program
    .command("reset")
    .description("Delete all local sessions, messages and queued operations")
    .action(async () => {
      await withRuntime(async ({ engine }) => {
        engine.reset();
        io.out("Local data cleared");
      });
    });

  // ── chatsync config ────────────────────────────────────────────────
  const config = program.command("config").description("Show or change settings");

  config
    .command("show", { isDefault: true })
    .description("Print the resolved settings")
    .action(() => {
      const { settings } = loadSettings(workspace, { env: options.env, home: options.home });
      const masked = { ...settings, idToken: settings.idToken ? "***" : null };
      io.out(JSON.stringify(masked, null, 2));
    });

  config
    .command("set")
    .description("Write one setting to a settings file")
    .argument("<key>", "setting name")
    .argument("<value>", "new value")
    .option("--global", "write ~/.chatsync/settings.json")
    .option("--local", "write .chatsync/settings.local.json (not meant for version control)")
    .action((key: string, value: string, opts: { global?: boolean; local?: boolean }) => {
      if (!isSettingKey(key)) {
        fail(`Unknown setting: ${key}`);
        return;
      }
      const raw = key === "requestTimeoutMs" ? Number(value) : value;
      const update = SettingsSchema.parse({ [key]: raw });
      if (update[key] === undefined) {
        fail(`Invalid value for ${key}: ${value}`);
        return;
      }

      let path: string;
      if (opts.global) {
        const current = readSettingsFile(settingsPaths.global(options.home));
        path = writeGlobalSettings(mergeSettings(current, update), options.home);
      } else if (opts.local) {
        const current = readSettingsFile(settingsPaths.projectLocal(workspace));
        path = writeProjectLocalSettings(workspace, mergeSettings(current, update));
      } else {
        const current = readSettingsFile(settingsPaths.project(workspace));
        path = writeProjectSettings(workspace, mergeSettings(current, update));
      }
      io.out(`${key} written to ${path}`);
    });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    fail(toError(error).message);
  }
  return exitCode;
}
