/**
 * One user's consult-entry dialog.
 *
 * Two machines run side by side: AuthState gates access with a shared
 * secret, InputState walks the entry steps. Selector steps are answered with
 * inline keyboards; the session owns one course selector, one staff selector
 * (reused for the assistant and the supporting member) and one date wheel.
 *
 * A session is not re-entrant. SessionRouter serializes every event for a
 * user before it reaches handle().
 */

import { Messages, SELECTOR_PROMPTS, formatRecordSummary } from "../../constants/messages";
import type { DataSource } from "../../types/data-source";
import { completeDraft, createEmptyDraft, type FormDraft } from "../../types/form-record";
import type { KeyboardLayout } from "../../types/keyboard";
import type {
  CallbackEvent,
  CommandEvent,
  MessageEvent,
  ReplyPort,
  TransportEvent,
  UserId,
} from "../../types/transport";
import type { RecordQueue } from "../../services/record-sink";
import { noopAuditLogger, type AuditLogger } from "../../utils/audit";
import { DateWheelSelector } from "../selectors/date-wheel-selector";
import { PaginatedSelector } from "../selectors/paginated-selector";
import type { Selector, SelectorOutcome } from "../selectors/selector";
import { PendingSelectionMap } from "./pending-selection-map";
import {
  checkSecret,
  fieldForInputState,
  guardEntry,
  isEntryInProgress,
  isSelectorStep,
  nextInputState,
  type AuthState,
  type InputState,
  type SelectorStep,
} from "./state-machine";

export interface ConversationSessionOptions {
  authSecretHash: string;
  courseSource: DataSource;
  staffSource: DataSource;
  records: RecordQueue;
  audit?: AuditLogger;
  pageLength?: number;
  utcOffsetHours?: number;
  now?: () => Date;
}

export interface SessionHandleResult {
  /** True when the event logged an authenticated user out. */
  loggedOut: boolean;
}

const CONTINUE: SessionHandleResult = { loggedOut: false };

export class ConversationSession {
  private auth: AuthState = "idle";
  private input: InputState = "idle";
  private draft: FormDraft = createEmptyDraft();
  private lastActivity: number;

  private readonly courseSelector: PaginatedSelector;
  private readonly staffSelector: PaginatedSelector;
  private readonly dateSelector: DateWheelSelector;
  private readonly pendingSelections = new PendingSelectionMap();

  private readonly authSecretHash: string;
  private readonly records: RecordQueue;
  private readonly audit: AuditLogger;
  private readonly now: () => Date;

  constructor(
    readonly userId: UserId,
    options: ConversationSessionOptions
  ) {
    this.authSecretHash = options.authSecretHash;
    this.records = options.records;
    this.audit = options.audit ?? noopAuditLogger;
    this.now = options.now ?? (() => new Date());
    this.lastActivity = this.now().getTime();

    this.courseSelector = new PaginatedSelector(options.courseSource, {
      pageLength: options.pageLength,
    });
    this.staffSelector = new PaginatedSelector(options.staffSource, {
      pageLength: options.pageLength,
    });
    this.dateSelector = new DateWheelSelector({
      now: this.now,
      utcOffsetHours: options.utcOffsetHours,
    });
  }

  get authState(): AuthState {
    return this.auth;
  }

  get inputState(): InputState {
    return this.input;
  }

  get record(): Readonly<FormDraft> {
    return { ...this.draft };
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  async handle(event: TransportEvent): Promise<SessionHandleResult> {
    this.lastActivity = this.now().getTime();

    try {
      switch (event.kind) {
        case "command":
          return await this.handleCommand(event);
        case "message":
          await this.handleMessage(event);
          return CONTINUE;
        case "callback":
          await this.handleCallback(event);
          return CONTINUE;
      }
    } catch (error) {
      console.error(`[Session ${this.userId}] Failed to handle ${event.kind}:`, error);
      return CONTINUE;
    }
  }

  // ============== Commands ==============

  private async handleCommand(event: CommandEvent): Promise<SessionHandleResult> {
    const { reply } = event;

    switch (event.name) {
      case "start":
        this.resetEntry();
        this.auth = "idle";
        await reply.sendText(Messages.HELP);
        return CONTINUE;

      case "help":
        await reply.sendText(Messages.HELP);
        return CONTINUE;

      case "auth":
        if (this.auth === "authenticated") {
          await reply.sendText(Messages.AUTH_ALREADY);
          return CONTINUE;
        }
        console.log(`[Session ${this.userId}] Auth requested`);
        this.auth = "authenticating";
        await reply.sendText(Messages.AUTH_PROMPT);
        return CONTINUE;

      case "logout":
        if (this.auth !== "authenticated") {
          return CONTINUE;
        }
        this.resetEntry();
        this.auth = "idle";
        await this.audit.log(this.userId, "logout");
        await reply.sendText(Messages.LOGOUT);
        return { loggedOut: true };

      case "register":
        await this.beginEntry(reply);
        return CONTINUE;

      case "restart":
        if (guardEntry(this.auth).status === "rejected") {
          await reply.sendText(Messages.AUTH_REQUIRED);
          return CONTINUE;
        }
        this.resetEntry();
        await reply.sendText(Messages.RESET);
        return CONTINUE;
    }
  }

  private async beginEntry(reply: ReplyPort): Promise<void> {
    if (guardEntry(this.auth).status === "rejected") {
      await reply.sendText(Messages.AUTH_REQUIRED);
      return;
    }

    if (isEntryInProgress(this.input)) {
      console.log(`[Session ${this.userId}] Discarding unfinished entry at ${this.input}`);
    }
    this.resetEntry();
    this.input = "studentName";
    console.log(`[Session ${this.userId}] Data entry requested`);

    await reply.sendText(Messages.REGISTER_INTRO);
    await reply.sendText(Messages.STUDENT_NAME_PROMPT);
  }

  // ============== Messages ==============

  private async handleMessage(event: MessageEvent): Promise<void> {
    if (this.auth === "authenticating") {
      await this.handleSecret(event);
      return;
    }
    if (this.auth !== "authenticated") {
      return;
    }

    const step = this.input;
    if (step === "studentName") {
      await this.handleStudentName(event);
      return;
    }
    if (!isSelectorStep(step)) {
      return;
    }

    // A step whose keyboard never made it out is retried on the next message.
    if (!this.pendingSelections.isBound(this.selectorFor(step))) {
      await this.presentSelector(step, event.reply);
      return;
    }
    await event.reply.sendText(Messages.USE_BUTTONS);
  }

  private async handleSecret(event: MessageEvent): Promise<void> {
    const result = checkSecret(event.text, this.authSecretHash);

    switch (result.status) {
      case "accepted":
        this.auth = result.nextState;
        console.log(`[Session ${this.userId}] Auth completed`);
        await this.audit.log(this.userId, "auth_success");
        await event.reply.sendText(Messages.AUTH_SUCCESS);
        return;
      case "rejected":
        this.auth = result.nextState;
        if (result.reason === "not_text") {
          await event.reply.sendText(Messages.AUTH_NOT_TEXT);
          return;
        }
        console.log(`[Session ${this.userId}] Auth attempt failed`);
        await this.audit.log(this.userId, "auth_failure");
        await event.reply.sendText(Messages.AUTH_RETRY);
        return;
    }
  }

  private async handleStudentName(event: MessageEvent): Promise<void> {
    const name = event.text?.trim();
    if (!name) {
      await event.reply.sendText(Messages.STUDENT_NAME_INVALID);
      return;
    }

    this.draft = { ...this.draft, studentName: name };
    await this.advance(event.reply);
  }

  // ============== Callbacks ==============

  private async handleCallback(event: CallbackEvent): Promise<void> {
    const step = this.input;
    const bound = this.pendingSelections.resolve(event.sourceMessageId);

    if (
      this.auth !== "authenticated" ||
      !isSelectorStep(step) ||
      bound === undefined ||
      bound !== this.selectorFor(step)
    ) {
      await this.answerCallback(event, Messages.SELECTION_OUTDATED);
      return;
    }

    const outcome: SelectorOutcome = bound.handleSelectorEvent(event.token);
    switch (outcome.type) {
      case "ignored":
        await this.answerCallback(
          event,
          outcome.reason === "stale" ? Messages.SELECTION_OUTDATED : undefined
        );
        return;
      case "updated":
        await this.answerCallback(event);
        await this.replaceKeyboard(event, outcome.keyboard);
        return;
      case "selected": {
        const field = fieldForInputState(step);
        if (field) {
          const next: FormDraft = { ...this.draft };
          next[field] = outcome.value;
          this.draft = next;
        }
        await this.answerCallback(event);
        await this.replaceKeyboard(event, outcome.keyboard);
        await this.advance(event.reply);
        return;
      }
    }
  }

  // A selection stands even when Telegram rejects the answer or the edit.
  private async answerCallback(event: CallbackEvent, text?: string): Promise<void> {
    try {
      await event.reply.acknowledge(text);
    } catch (error) {
      console.warn(`[Session ${this.userId}] Could not answer callback:`, error);
    }
  }

  private async replaceKeyboard(event: CallbackEvent, keyboard: KeyboardLayout): Promise<void> {
    try {
      await event.reply.editKeyboard(event.sourceMessageId, keyboard);
    } catch (error) {
      console.warn(
        `[Session ${this.userId}] Could not update keyboard ${event.sourceMessageId}:`,
        error
      );
    }
  }

  // ============== Transitions ==============

  private async advance(reply: ReplyPort): Promise<void> {
    this.input = nextInputState(this.input);
    const step = this.input;

    if (step === "end") {
      await this.finishEntry(reply);
      return;
    }
    if (isSelectorStep(step)) {
      await this.presentSelector(step, reply);
    }
  }

  private async presentSelector(step: SelectorStep, reply: ReplyPort): Promise<void> {
    const selector = this.selectorFor(step);
    this.pendingSelections.unbind(selector);

    try {
      const keyboard = await this.armSelector(step);
      const messageId = await reply.sendKeyboard(SELECTOR_PROMPTS[step], keyboard);
      this.pendingSelections.bind(messageId, selector);
    } catch (error) {
      console.error(`[Session ${this.userId}] Could not present ${step} selector:`, error);
      await reply.sendText(Messages.OPTIONS_UNAVAILABLE);
    }
  }

  private async armSelector(step: SelectorStep): Promise<KeyboardLayout> {
    switch (step) {
      case "courseName":
        return this.armPaginated(this.courseSelector);
      case "assistName":
      case "auxName":
        return this.armPaginated(this.staffSelector);
      case "receivedDate":
      case "endDate":
        this.dateSelector.reset(false);
        return this.dateSelector.render();
      case "startDate":
        // The start is usually close to the received time; keep the wheels.
        this.dateSelector.reset(true);
        return this.dateSelector.render();
    }
  }

  private async armPaginated(selector: PaginatedSelector): Promise<KeyboardLayout> {
    selector.reset();
    await selector.fetchData();
    return selector.render();
  }

  private async finishEntry(reply: ReplyPort): Promise<void> {
    const record = completeDraft(this.draft);
    this.resetEntry();

    if (!record) {
      console.error(`[Session ${this.userId}] Reached end of entry with missing fields`);
      await reply.sendText(Messages.RESET);
      return;
    }

    this.records.enqueue(record);
    console.log(`[Session ${this.userId}] Entry submitted for ${record.studentName}`);
    await this.audit.log(this.userId, "record_submitted", { record });

    await reply.sendText(Messages.ENTRY_SAVED);
    await reply.sendText(formatRecordSummary(record));
    await reply.sendText(Messages.ENTRY_NEXT);
  }

  private selectorFor(step: SelectorStep): Selector {
    switch (step) {
      case "courseName":
        return this.courseSelector;
      case "assistName":
      case "auxName":
        return this.staffSelector;
      case "receivedDate":
      case "startDate":
      case "endDate":
        return this.dateSelector;
    }
  }

  private resetEntry(): void {
    this.input = "idle";
    this.draft = createEmptyDraft();
    this.courseSelector.reset();
    this.staffSelector.reset();
    this.dateSelector.reset(false);
    this.pendingSelections.clear();
  }
}
