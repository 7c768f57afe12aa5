import { Bot, type Context } from "grammy";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { AppConfig } from "../config";
import { hashSecret } from "../core/session/state-machine";
import type { EventDispatcher } from "../handlers";
import type { SheetRow, SheetsClient } from "../storage/sheets-client";
import type { ReplyPort } from "../types/transport";
import { bootstrapApplication } from "./bootstrap";

const CONFIG: AppConfig = {
  telegramToken: "test-token",
  authSecretHash: hashSecret("test-secret"),
  sheet: {
    credentialsPath: "cred.json",
    spreadsheetId: "test-spreadsheet",
    dataTab: "DATA",
    registerTab: "REGISTER",
    staffColumn: "STAFF",
    courseColumn: "COURSE",
    codeColumn: "CODE",
    insertRow: 4,
  },
  selectorPageSize: 5,
  utcOffsetHours: -4,
  drainIntervalMs: 5000,
  sessionIdleTtlMs: 0,
  auditLogPath: "/tmp/consult-intake-audit.test.log",
  auditLogJson: false,
};

class FakeSheetsClient implements SheetsClient {
  readonly inserted: Array<{ tab: string; rowNumber: number; values: string[] }> = [];

  async readRecords(tab: string): Promise<SheetRow[]> {
    return tab === "DATA" ? [{ STAFF: "Luis", COURSE: "CALC1", CODE: "MAT101" }] : [];
  }

  async insertRow(tab: string, rowNumber: number, values: string[]): Promise<void> {
    this.inserted.push({ tab, rowNumber, values });
  }
}

const silentReply: ReplyPort = {
  sendText: async () => {},
  sendKeyboard: async () => 1,
  editKeyboard: async () => {},
  acknowledge: async () => {},
};

function setup() {
  let running = true;
  const sheets = new FakeSheetsClient();
  const registerMiddleware = vi.fn((_bot: Bot<Context>) => {});
  const registerCommands = vi.fn(async (_bot: Bot<Context>, _dispatcher: EventDispatcher) => {});
  const registerHandlers = vi.fn((_bot: Bot<Context>, _dispatcher: EventDispatcher) => {});
  const runnerStop = vi.fn(async () => {
    running = false;
  });
  const bot = new Bot<Context>("test-token");

  const start = () =>
    bootstrapApplication({
      config: CONFIG,
      createTelegramBot: () => bot,
      registerBotMiddleware: registerMiddleware,
      registerBotCommands: registerCommands,
      registerBotHandlers: registerHandlers,
      startRunner: () => ({ isRunning: () => running, stop: runnerStop }),
      fetchBotInfo: async () => ({ username: "intake_test_bot" }),
      createSheetsClient: () => sheets,
      createAuditLogger: () => ({ log: async () => {} }),
    });

  return { bot, sheets, registerMiddleware, registerCommands, registerHandlers, runnerStop, start };
}

describe("bootstrapApplication", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("registers middleware, commands and handlers against the router", async () => {
    const { bot, registerMiddleware, registerCommands, registerHandlers, start } = setup();

    const app = await start();

    expect(registerMiddleware).toHaveBeenCalledWith(bot);
    expect(registerCommands).toHaveBeenCalledWith(bot, app.router);
    expect(registerHandlers).toHaveBeenCalledWith(bot, app.router);
    expect(app.sink.isRunning).toBe(true);

    await app.shutdown();
  });

  test("sessions use the configured secret", async () => {
    const { start } = setup();
    const app = await start();

    await app.router.dispatch({ kind: "command", name: "start", userId: 9, reply: silentReply });
    await app.router.dispatch({ kind: "command", name: "auth", userId: 9, reply: silentReply });
    await app.router.dispatch({
      kind: "message",
      text: "test-secret",
      userId: 9,
      reply: silentReply,
    });

    expect(app.router.getSession(9)?.authState).toBe("authenticated");
    await app.shutdown();
  });

  test("shutdown stops the runner and flushes queued records to the sheet", async () => {
    const { sheets, runnerStop, start } = setup();
    const app = await start();
    app.sink.enqueue({
      studentName: "Ana",
      courseName: "CALC1",
      assistantName: "Luis",
      auxiliaryName: "Marta",
      receivedDate: "2024/05/10 15:30:00",
      startDate: "2024/05/10 15:31:00",
      endDate: "2024/05/10 16:30:00",
    });

    await app.shutdown();

    expect(runnerStop).toHaveBeenCalledTimes(1);
    expect(app.sink.isRunning).toBe(false);
    expect(sheets.inserted).toEqual([
      {
        tab: "REGISTER",
        rowNumber: 4,
        values: [
          "Ana",
          "CALC1",
          "MAT101",
          "2024/05/10 15:30:00",
          "2024/05/10 15:31:00",
          "2024/05/10 16:30:00",
          "=E4-D4",
          "=F4-E4",
          "Luis",
          "Marta",
        ],
      },
    ]);
  });
});
