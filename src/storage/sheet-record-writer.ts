import type { RecordWriter } from "../services/record-sink";
import type { FormRecord } from "../types/form-record";
import type { CourseCatalog } from "./course-catalog";
import type { SheetsClient } from "./sheets-client";

export const DEFAULT_INSERT_ROW = 4;

export interface SheetRecordWriterOptions {
  tab: string;
  insertRow?: number;
}

/**
 * Row layout of the register tab. Columns G and H hold the response time
 * (start - received) and the consult duration (end - start).
 */
export function buildRegisterRow(
  record: FormRecord,
  courseCode: string,
  rowNumber: number
): string[] {
  return [
    record.studentName,
    record.courseName,
    courseCode,
    record.receivedDate,
    record.startDate,
    record.endDate,
    `=E${rowNumber}-D${rowNumber}`,
    `=F${rowNumber}-E${rowNumber}`,
    record.assistantName,
    record.auxiliaryName,
  ];
}

export class SheetRecordWriter implements RecordWriter {
  private readonly tab: string;
  private readonly insertRow: number;

  constructor(
    private readonly client: SheetsClient,
    private readonly catalog: CourseCatalog,
    options: SheetRecordWriterOptions
  ) {
    this.tab = options.tab;
    this.insertRow = options.insertRow ?? DEFAULT_INSERT_ROW;
  }

  async write(record: FormRecord): Promise<void> {
    const courseCode = await this.catalog.lookupCode(record.courseName);
    const row = buildRegisterRow(record, courseCode, this.insertRow);
    await this.client.insertRow(this.tab, this.insertRow, row);
    console.log(`[SheetRecordWriter] Inserted record for "${record.studentName}" at ${this.tab}!A${this.insertRow}`);
  }
}
