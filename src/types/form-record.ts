/**
 * Consult record types.
 *
 * A draft is filled field by field while the dialog advances; it only becomes
 * a FormRecord once every field is present.
 */

export interface FormRecord {
  studentName: string;
  courseName: string;
  assistantName: string;
  auxiliaryName: string;
  receivedDate: string;
  startDate: string;
  endDate: string;
}

export type FormDraft = Partial<FormRecord>;

export function createEmptyDraft(): FormDraft {
  return {};
}

/**
 * Returns the completed record, or null while any field is still missing.
 */
export function completeDraft(draft: FormDraft): FormRecord | null {
  const {
    studentName,
    courseName,
    assistantName,
    auxiliaryName,
    receivedDate,
    startDate,
    endDate,
  } = draft;

  if (
    studentName === undefined ||
    courseName === undefined ||
    assistantName === undefined ||
    auxiliaryName === undefined ||
    receivedDate === undefined ||
    startDate === undefined ||
    endDate === undefined
  ) {
    return null;
  }

  return {
    studentName,
    courseName,
    assistantName,
    auxiliaryName,
    receivedDate,
    startDate,
    endDate,
  };
}
