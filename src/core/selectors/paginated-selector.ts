import type { DataSource } from "../../types/data-source";
import type { KeyboardLayout } from "../../types/keyboard";
import {
  ACTION_MARKER,
  NOOP_TOKEN,
  SelectorError,
  ignored,
  isActionToken,
  isEncodableLiteral,
  type Selector,
  type SelectorOutcome,
  type SelectorState,
} from "./selector";

export const DEFAULT_PAGE_LENGTH = 5;

export const PAGE_LEFT_TOKEN = `${ACTION_MARKER}left`;
export const PAGE_RIGHT_TOKEN = `${ACTION_MARKER}right`;

const PAGE_LEFT_LABEL = "«";
const PAGE_RIGHT_LABEL = "»";

export interface PaginatedSelectorOptions {
  pageLength?: number;
}

/**
 * Inline list selector that pages through options from a DataSource.
 *
 * Cycle: reset() -> fetchData() -> render() [active] -> literal token
 * [complete]. The same instance is re-armed for every field that draws from
 * the same source.
 */
export class PaginatedSelector implements Selector {
  readonly kind = "paginated";
  private selectorState: SelectorState = "idle";
  private data: string[] | null = null;
  private pageIndex = 0;
  private readonly pageLength: number;

  constructor(
    private readonly dataSource: DataSource,
    options: PaginatedSelectorOptions = {}
  ) {
    const pageLength = options.pageLength ?? DEFAULT_PAGE_LENGTH;
    if (!Number.isInteger(pageLength) || pageLength < 1) {
      throw new Error("pageLength must be a positive integer");
    }
    this.pageLength = pageLength;
  }

  get state(): SelectorState {
    return this.selectorState;
  }

  get currentPage(): number {
    return this.pageIndex;
  }

  get items(): readonly string[] | null {
    return this.data;
  }

  async fetchData(): Promise<void> {
    const raw = await this.dataSource.fetch();
    const values = raw.filter((value) => value !== "");
    const usable = values.filter(isEncodableLiteral);

    if (usable.length !== values.length) {
      console.warn(
        `[PaginatedSelector] ${this.dataSource.name}: skipped ${values.length - usable.length} option(s) that cannot be sent as buttons`
      );
    }
    this.data = usable;
  }

  render(): KeyboardLayout {
    const data = this.requireData();
    const start = this.pageIndex * this.pageLength;
    const page = data.slice(start, start + this.pageLength);

    const keyboard: KeyboardLayout = page.map((value) => [
      { label: value, token: value },
    ]);
    keyboard.push([
      { label: PAGE_LEFT_LABEL, token: PAGE_LEFT_TOKEN },
      { label: PAGE_RIGHT_LABEL, token: PAGE_RIGHT_TOKEN },
    ]);

    this.selectorState = "active";
    return keyboard;
  }

  handleSelectorEvent(token: string): SelectorOutcome {
    if (this.selectorState !== "active" || this.data === null) {
      return ignored("stale");
    }

    if (token === PAGE_LEFT_TOKEN) {
      if (this.pageIndex === 0) {
        return ignored("bounds");
      }
      this.pageIndex -= 1;
      return { type: "updated", keyboard: this.render() };
    }

    if (token === PAGE_RIGHT_TOKEN) {
      if ((this.pageIndex + 1) * this.pageLength >= this.data.length) {
        return ignored("bounds");
      }
      this.pageIndex += 1;
      return { type: "updated", keyboard: this.render() };
    }

    if (isActionToken(token)) {
      return ignored("noop");
    }

    this.selectorState = "complete";
    return {
      type: "selected",
      value: token,
      keyboard: [[{ label: token, token: NOOP_TOKEN }]],
    };
  }

  reset(): void {
    this.selectorState = "idle";
    this.pageIndex = 0;
    this.data = null;
  }

  private requireData(): string[] {
    if (this.data === null) {
      throw new SelectorError(
        "SELECTOR_NOT_LOADED",
        `Selector for ${this.dataSource.name} rendered before fetchData()`
      );
    }
    return this.data;
  }
}
