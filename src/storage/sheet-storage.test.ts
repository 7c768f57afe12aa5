import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { FormRecord } from "../types/form-record";
import { CourseCatalog } from "./course-catalog";
import { SheetDataSource } from "./sheet-data-source";
import { SheetRecordWriter, buildRegisterRow } from "./sheet-record-writer";
import type { SheetRow, SheetsClient } from "./sheets-client";

class FakeSheetsClient implements SheetsClient {
  readonly inserted: Array<{ tab: string; rowNumber: number; values: string[] }> = [];
  reads = 0;

  constructor(private readonly tabs: Record<string, SheetRow[]>) {}

  async readRecords(tab: string): Promise<SheetRow[]> {
    this.reads += 1;
    return this.tabs[tab] ?? [];
  }

  async insertRow(tab: string, rowNumber: number, values: string[]): Promise<void> {
    this.inserted.push({ tab, rowNumber, values });
  }
}

const DATA_ROWS: SheetRow[] = [
  { STAFF: "Luis", COURSE: "CALC1", CODE: "MAT101" },
  { STAFF: "Marta", COURSE: "PHYS2", CODE: "" },
  { STAFF: "", COURSE: "CHEM1", CODE: "QUI110" },
];

const RECORD: FormRecord = {
  studentName: "Ana",
  courseName: "CALC1",
  assistantName: "Luis",
  auxiliaryName: "Marta",
  receivedDate: "2024/05/10 15:30:00",
  startDate: "2024/05/10 15:31:00",
  endDate: "2024/05/10 16:30:00",
};

describe("SheetDataSource", () => {
  test("reads one column on every fetch", async () => {
    const client = new FakeSheetsClient({ DATA: DATA_ROWS });
    const staff = new SheetDataSource(client, "DATA", "STAFF");

    await expect(staff.fetch()).resolves.toEqual(["Luis", "Marta", ""]);
    await staff.fetch();

    expect(staff.name).toBe("DATA.STAFF");
    expect(client.reads).toBe(2);
  });

  test("an unknown column reads as empty values", async () => {
    const client = new FakeSheetsClient({ DATA: DATA_ROWS });
    const source = new SheetDataSource(client, "DATA", "ROOM");

    await expect(source.fetch()).resolves.toEqual(["", "", ""]);
  });
});

describe("CourseCatalog", () => {
  const catalog = new CourseCatalog(new FakeSheetsClient({ DATA: DATA_ROWS }), {
    tab: "DATA",
    courseColumn: "COURSE",
    codeColumn: "CODE",
  });

  test("looks up the code of a course", async () => {
    await expect(catalog.lookupCode("CHEM1")).resolves.toBe("QUI110");
  });

  test("unknown courses and blank codes are N/A", async () => {
    await expect(catalog.lookupCode("BIO9")).resolves.toBe("N/A");
    await expect(catalog.lookupCode("PHYS2")).resolves.toBe("N/A");
  });
});

describe("SheetRecordWriter", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("buildRegisterRow places the formulas for the target row", () => {
    expect(buildRegisterRow(RECORD, "MAT101", 4)).toEqual([
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
    ]);
  });

  test("inserts the record at row 4 of the register tab by default", async () => {
    const client = new FakeSheetsClient({ DATA: DATA_ROWS });
    const catalog = new CourseCatalog(client, {
      tab: "DATA",
      courseColumn: "COURSE",
      codeColumn: "CODE",
    });
    const writer = new SheetRecordWriter(client, catalog, { tab: "REGISTER" });

    await writer.write(RECORD);

    expect(client.inserted).toEqual([
      { tab: "REGISTER", rowNumber: 4, values: buildRegisterRow(RECORD, "MAT101", 4) },
    ]);
  });

  test("honours a configured insert row and unknown course codes", async () => {
    const client = new FakeSheetsClient({ DATA: DATA_ROWS });
    const catalog = new CourseCatalog(client, {
      tab: "DATA",
      courseColumn: "COURSE",
      codeColumn: "CODE",
    });
    const writer = new SheetRecordWriter(client, catalog, { tab: "REGISTER", insertRow: 2 });

    await writer.write({ ...RECORD, courseName: "BIO9" });

    const inserted = client.inserted[0];
    expect(inserted?.rowNumber).toBe(2);
    expect(inserted?.values.slice(1, 3)).toEqual(["BIO9", "N/A"]);
    expect(inserted?.values.slice(6, 8)).toEqual(["=E2-D2", "=F2-E2"]);
  });
});
