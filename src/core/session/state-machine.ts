import { createHash } from "crypto";
import type { FormRecord } from "../../types/form-record";

export type AuthState = "idle" | "authenticating" | "authenticated";

export type InputState =
  | "idle"
  | "studentName"
  | "courseName"
  | "assistName"
  | "auxName"
  | "receivedDate"
  | "startDate"
  | "endDate"
  | "end";

/** Input steps answered through an inline selector rather than free text. */
export type SelectorStep = Extract<
  InputState,
  "courseName" | "assistName" | "auxName" | "receivedDate" | "startDate" | "endDate"
>;

export type SecretCheckResult =
  | { status: "accepted"; nextState: "authenticated" }
  | { status: "rejected"; reason: "hash_mismatch" | "not_text"; nextState: "authenticating" };

export type EntryGuardResult =
  | { status: "accepted" }
  | { status: "rejected"; reason: "unauthenticated" };

export function hashSecret(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

export function checkSecret(
  text: string | undefined,
  expectedHash: string
): SecretCheckResult {
  if (text === undefined) {
    return { status: "rejected", reason: "not_text", nextState: "authenticating" };
  }
  if (hashSecret(text) !== expectedHash.toLowerCase()) {
    return { status: "rejected", reason: "hash_mismatch", nextState: "authenticating" };
  }
  return { status: "accepted", nextState: "authenticated" };
}

export function guardEntry(authState: AuthState): EntryGuardResult {
  return authState === "authenticated"
    ? { status: "accepted" }
    : { status: "rejected", reason: "unauthenticated" };
}

export function nextInputState(state: InputState): InputState {
  switch (state) {
    case "idle":
      return "idle";
    case "studentName":
      return "courseName";
    case "courseName":
      return "assistName";
    case "assistName":
      return "auxName";
    case "auxName":
      return "receivedDate";
    case "receivedDate":
      return "startDate";
    case "startDate":
      return "endDate";
    case "endDate":
      return "end";
    case "end":
      return "end";
  }
}

/**
 * Record field filled in while the dialog sits in `state`.
 */
export function fieldForInputState(state: InputState): keyof FormRecord | null {
  switch (state) {
    case "studentName":
      return "studentName";
    case "courseName":
      return "courseName";
    case "assistName":
      return "assistantName";
    case "auxName":
      return "auxiliaryName";
    case "receivedDate":
      return "receivedDate";
    case "startDate":
      return "startDate";
    case "endDate":
      return "endDate";
    case "idle":
    case "end":
      return null;
  }
}

export function isSelectorStep(state: InputState): state is SelectorStep {
  switch (state) {
    case "courseName":
    case "assistName":
    case "auxName":
    case "receivedDate":
    case "startDate":
    case "endDate":
      return true;
    case "idle":
    case "studentName":
    case "end":
      return false;
  }
}

export function isEntryInProgress(state: InputState): boolean {
  return state !== "idle" && state !== "end";
}
