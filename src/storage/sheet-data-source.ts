import type { DataSource } from "../types/data-source";
import type { SheetsClient } from "./sheets-client";

/**
 * One column of a worksheet, read fresh on every fetch.
 */
export class SheetDataSource implements DataSource {
  readonly name: string;

  constructor(
    private readonly client: SheetsClient,
    private readonly tab: string,
    private readonly column: string
  ) {
    this.name = `${tab}.${column}`;
  }

  async fetch(): Promise<string[]> {
    const rows = await this.client.readRecords(this.tab);
    return rows.map((row) => row[this.column] ?? "");
  }
}
