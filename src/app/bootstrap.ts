import { run } from "@grammyjs/runner";
import type { Bot, Context } from "grammy";
import { loadConfig, type AppConfig } from "../config";
import { ConversationSession } from "../core/session/conversation-session";
import { SessionRouter } from "../core/session/session-router";
import { RecordSink } from "../services/record-sink";
import { CourseCatalog } from "../storage/course-catalog";
import { SheetDataSource } from "../storage/sheet-data-source";
import { SheetRecordWriter } from "../storage/sheet-record-writer";
import { GoogleSheetsClient, type SheetsClient } from "../storage/sheets-client";
import { FileAuditLogger, type AuditLogger } from "../utils/audit";
import type { EventDispatcher } from "../handlers";
import {
  createTelegramBot,
  registerBotCommands,
  registerBotHandlers,
  registerBotMiddleware,
} from "./telegram-bot";

interface RunnerPort {
  isRunning(): boolean;
  stop(): Promise<void> | void;
}

export interface BootstrappedApplication {
  bot: Bot<Context>;
  runner: RunnerPort;
  router: SessionRouter;
  sink: RecordSink;
  shutdown: () => Promise<void>;
}

export interface BootstrapDependencies {
  config?: AppConfig;
  createTelegramBot?: (token: string) => Bot<Context>;
  registerBotMiddleware?: (bot: Bot<Context>) => void;
  registerBotCommands?: (bot: Bot<Context>, dispatcher: EventDispatcher) => Promise<void>;
  registerBotHandlers?: (bot: Bot<Context>, dispatcher: EventDispatcher) => void;
  startRunner?: (bot: Bot<Context>) => RunnerPort;
  fetchBotInfo?: (bot: Bot<Context>) => Promise<{ username?: string }>;
  createSheetsClient?: (config: AppConfig) => SheetsClient;
  createAuditLogger?: (config: AppConfig) => AuditLogger;
  now?: () => Date;
}

export async function bootstrapApplication(
  dependencies: BootstrapDependencies = {}
): Promise<BootstrappedApplication> {
  const config = dependencies.config ?? loadConfig();
  const createBot = dependencies.createTelegramBot ?? createTelegramBot;
  const registerMiddleware = dependencies.registerBotMiddleware ?? registerBotMiddleware;
  const registerCommands = dependencies.registerBotCommands ?? registerBotCommands;
  const registerHandlers = dependencies.registerBotHandlers ?? registerBotHandlers;
  const startRunner = dependencies.startRunner ?? ((bot: Bot<Context>): RunnerPort => run(bot));
  const fetchBotInfo =
    dependencies.fetchBotInfo ?? ((bot: Bot<Context>) => bot.api.getMe());
  const createSheetsClient =
    dependencies.createSheetsClient ??
    ((cfg: AppConfig) =>
      new GoogleSheetsClient({
        spreadsheetId: cfg.sheet.spreadsheetId,
        keyFile: cfg.sheet.credentialsPath,
      }));
  const createAuditLogger =
    dependencies.createAuditLogger ??
    ((cfg: AppConfig) => new FileAuditLogger({ path: cfg.auditLogPath, json: cfg.auditLogJson }));
  const now = dependencies.now ?? (() => new Date());

  const { sheet } = config;
  const sheets = createSheetsClient(config);
  const courseSource = new SheetDataSource(sheets, sheet.dataTab, sheet.courseColumn);
  const staffSource = new SheetDataSource(sheets, sheet.dataTab, sheet.staffColumn);
  const catalog = new CourseCatalog(sheets, {
    tab: sheet.dataTab,
    courseColumn: sheet.courseColumn,
    codeColumn: sheet.codeColumn,
  });
  const writer = new SheetRecordWriter(sheets, catalog, {
    tab: sheet.registerTab,
    insertRow: sheet.insertRow,
  });
  const sink = new RecordSink(writer, { drainIntervalMs: config.drainIntervalMs });
  const audit = createAuditLogger(config);

  const router = new SessionRouter(
    (userId) =>
      new ConversationSession(userId, {
        authSecretHash: config.authSecretHash,
        courseSource,
        staffSource,
        records: sink,
        audit,
        pageLength: config.selectorPageSize,
        utcOffsetHours: config.utcOffsetHours,
        now,
      }),
    { idleTtlMs: config.sessionIdleTtlMs }
  );

  const bot = createBot(config.telegramToken);
  registerMiddleware(bot);
  await registerCommands(bot, router);
  registerHandlers(bot, router);

  console.log("=".repeat(50));
  console.log("Consult intake bot");
  console.log("=".repeat(50));
  console.log(`Spreadsheet: ${sheet.spreadsheetId} (${sheet.dataTab} -> ${sheet.registerTab})`);

  const botInfo = await fetchBotInfo(bot);
  console.log(`Bot started: @${botInfo.username}`);

  sink.start();
  router.startCleanupTimer();

  const runner = startRunner(bot);
  console.log(`[STARTUP] PID: ${process.pid}`);
  console.log("[STARTUP] Bot runner started");

  const shutdown = async (): Promise<void> => {
    if (runner.isRunning()) {
      console.log("[SHUTDOWN] Step 1: Stopping bot runner...");
      await runner.stop();
    } else {
      console.log("[SHUTDOWN] Step 1: Bot runner already stopped");
    }
    console.log("[SHUTDOWN] Step 2: Stopping session cleanup...");
    router.stopCleanupTimer();
    console.log(`[SHUTDOWN] Step 3: Flushing ${sink.pending} queued record(s)...`);
    const written = await sink.flush();
    console.log(`[SHUTDOWN] Step 4: Wrote ${written} record(s)`);
  };

  return { bot, runner, router, sink, shutdown };
}
