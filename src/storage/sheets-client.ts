/**
 * Google Sheets access behind a narrow interface.
 *
 * Rows are read header-keyed: the first row of a tab names the columns and
 * every later row becomes a `SheetRow` keyed by those names.
 */

import { google, type sheets_v4 } from "googleapis";

const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets";

export type SheetRow = Record<string, string>;

export interface SheetsClient {
  readRecords(tab: string): Promise<SheetRow[]>;
  insertRow(tab: string, rowNumber: number, values: string[]): Promise<void>;
}

export class SheetNotFoundError extends Error {
  readonly code = "SHEET_NOT_FOUND";

  constructor(readonly tab: string) {
    super(`Worksheet "${tab}" not found in spreadsheet`);
    this.name = "SheetNotFoundError";
  }
}

export function cellToString(cell: unknown): string {
  if (cell === null || cell === undefined) return "";
  return String(cell);
}

/**
 * Turn a values grid into header-keyed rows. Blank header cells are skipped
 * and missing trailing cells read as "".
 */
export function rowsToRecords(values: unknown[][]): SheetRow[] {
  const [header, ...rows] = values;
  if (!header) return [];

  const keys = header.map(cellToString);
  return rows.map((row) => {
    const record: SheetRow = {};
    keys.forEach((key, index) => {
      if (!key) return;
      record[key] = cellToString(row[index]);
    });
    return record;
  });
}

/**
 * A1 range for a tab, optionally narrowed to a cell. The tab name is always
 * quoted so names with spaces or punctuation resolve.
 */
export function a1Range(tab: string, cell?: string): string {
  const sheet = `'${tab.replace(/'/g, "''")}'`;
  return cell ? `${sheet}!${cell}` : sheet;
}

export interface GoogleSheetsClientOptions {
  spreadsheetId: string;
  keyFile: string;
}

export class GoogleSheetsClient implements SheetsClient {
  private readonly api: sheets_v4.Sheets;
  private readonly spreadsheetId: string;
  private readonly sheetIds = new Map<string, number>();

  constructor(options: GoogleSheetsClientOptions) {
    const auth = new google.auth.GoogleAuth({
      keyFile: options.keyFile,
      scopes: [SHEETS_SCOPE],
    });
    this.api = google.sheets({ version: "v4", auth });
    this.spreadsheetId = options.spreadsheetId;
  }

  async readRecords(tab: string): Promise<SheetRow[]> {
    const response = await this.api.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: a1Range(tab),
    });
    return rowsToRecords(response.data.values ?? []);
  }

  async insertRow(tab: string, rowNumber: number, values: string[]): Promise<void> {
    const sheetId = await this.resolveSheetId(tab);

    await this.api.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [
          {
            insertDimension: {
              range: {
                sheetId,
                dimension: "ROWS",
                startIndex: rowNumber - 1,
                endIndex: rowNumber,
              },
              inheritFromBefore: rowNumber > 1,
            },
          },
        ],
      },
    });

    await this.api.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: a1Range(tab, `A${rowNumber}`),
      valueInputOption: "USER_ENTERED",
      requestBody: { values: [values] },
    });
  }

  private async resolveSheetId(tab: string): Promise<number> {
    const cached = this.sheetIds.get(tab);
    if (cached !== undefined) return cached;

    const response = await this.api.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: "sheets.properties",
    });

    for (const sheet of response.data.sheets ?? []) {
      const title = sheet.properties?.title;
      const sheetId = sheet.properties?.sheetId;
      if (title && typeof sheetId === "number") {
        this.sheetIds.set(title, sheetId);
      }
    }

    const sheetId = this.sheetIds.get(tab);
    if (sheetId === undefined) {
      throw new SheetNotFoundError(tab);
    }
    return sheetId;
  }
}
