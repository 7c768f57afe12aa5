import type { SheetsClient } from "./sheets-client";

export const UNKNOWN_COURSE_CODE = "N/A";

export interface CourseCatalogOptions {
  tab: string;
  courseColumn: string;
  codeColumn: string;
}

export class CourseCatalog {
  constructor(
    private readonly client: SheetsClient,
    private readonly options: CourseCatalogOptions
  ) {}

  /**
   * Code of the first row whose course column equals `courseName`.
   * Unknown courses and blank codes both map to "N/A".
   */
  async lookupCode(courseName: string): Promise<string> {
    const rows = await this.client.readRecords(this.options.tab);
    const match = rows.find((row) => row[this.options.courseColumn] === courseName);
    const code = match?.[this.options.codeColumn];
    return code ? code : UNKNOWN_COURSE_CODE;
  }
}
