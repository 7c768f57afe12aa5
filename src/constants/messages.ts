import type { FormRecord } from "../types/form-record";
import type { SelectorStep } from "../core/session/state-machine";

export const Messages = {
  HELP: [
    "👋 Hi! I help you register tutoring consults without the paperwork.",
    "➡️ /auth to authenticate this chat 🔐",
    "➡️ /register to enter a consult 📝",
    "➡️ /restart to discard the current entry and start over 🔄",
    "➡️ /logout to close your session",
  ].join("\n"),
  AUTH_PROMPT: "🔐 Please send the access password.",
  AUTH_RETRY: "❌ Wrong password, please try again.",
  AUTH_NOT_TEXT: "🔐 Please send the password as a text message.",
  AUTH_SUCCESS: "✅ Authenticated! Use /register to start entering a consult.",
  AUTH_ALREADY: "🙂 You are already authenticated.\nUse /register to enter a consult 📝",
  AUTH_REQUIRED: "🔐 Please use /auth to authenticate this chat first.",
  LOGOUT: "👋 Session closed. Send /start whenever you need me again.",
  RESET: "🔄 Entry data reset.",
  REGISTER_INTRO: "📝 Follow the steps to register the consult.",
  STUDENT_NAME_PROMPT: "📖 Send the student's name.",
  STUDENT_NAME_INVALID: "🤔 That doesn't look like a valid name.\nPlease send it as text 👇",
  USE_BUTTONS: "👆 Please answer with the buttons above.",
  OPTIONS_UNAVAILABLE:
    "⚠️ Couldn't load the options right now. Send any message to try again.",
  SELECTION_OUTDATED: "This selection is no longer active.",
  ENTRY_SAVED: "🎉 Consult registered!",
  ENTRY_NEXT: "Use /register to enter another consult.",
} as const;

export const SELECTOR_PROMPTS: Record<SelectorStep, string> = {
  courseName: "📚 Select the course.",
  assistName: "🧑‍🏫 Select the assistant in charge.",
  auxName: "🤝 Select the supporting member.",
  receivedDate: "📥 When was the consult received?",
  startDate: "▶️ When did it start?",
  endDate: "⏹ When did it end?",
};

export function formatRecordSummary(record: FormRecord): string {
  return [
    `Student: ${record.studentName}`,
    `Course: ${record.courseName}`,
    `Assistant: ${record.assistantName}`,
    `Support: ${record.auxiliaryName}`,
    `Received: ${record.receivedDate}`,
    `Started: ${record.startDate}`,
    `Ended: ${record.endDate}`,
  ].join("\n");
}
