/**
 * Supplies a freshly fetched, ordered list of options for one form field
 * (course names, staff names).
 */
export interface DataSource {
  readonly name: string;
  fetch(): Promise<string[]>;
}
