import type { KeyboardLayout, KeyboardRow } from "../../types/keyboard";
import {
  ACTION_MARKER,
  NOOP_TOKEN,
  ignored,
  type Selector,
  type SelectorOutcome,
  type SelectorState,
} from "./selector";

export const DEFAULT_UTC_OFFSET_HOURS = -4;

const MONTHS_PER_YEAR = 12;
const HOURS_PER_DAY = 24;
const MINUTES_PER_HOUR = 60;

const MONTH_LABELS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
] as const;

const UP_LABEL = "︿";
const DOWN_LABEL = "﹀";
const CONFIRM_LABEL = "Confirm";

export const DATE_ACTIONS = {
  dayUp: `${ACTION_MARKER}day_up`,
  dayDown: `${ACTION_MARKER}day_down`,
  monthUp: `${ACTION_MARKER}month_up`,
  monthDown: `${ACTION_MARKER}month_down`,
  hourUp: `${ACTION_MARKER}hour_up`,
  hourDown: `${ACTION_MARKER}hour_down`,
  minuteUp: `${ACTION_MARKER}minute_up`,
  minuteDown: `${ACTION_MARKER}minute_down`,
  confirm: `${ACTION_MARKER}date_confirm`,
} as const;

type DateField = "day" | "month" | "hour" | "minute";

type DateAction =
  | { type: "adjust"; field: DateField; delta: 1 | -1 }
  | { type: "confirm" };

const ACTIONS_BY_TOKEN = new Map<string, DateAction>([
  [DATE_ACTIONS.dayUp, { type: "adjust", field: "day", delta: 1 }],
  [DATE_ACTIONS.dayDown, { type: "adjust", field: "day", delta: -1 }],
  [DATE_ACTIONS.monthUp, { type: "adjust", field: "month", delta: 1 }],
  [DATE_ACTIONS.monthDown, { type: "adjust", field: "month", delta: -1 }],
  [DATE_ACTIONS.hourUp, { type: "adjust", field: "hour", delta: 1 }],
  [DATE_ACTIONS.hourDown, { type: "adjust", field: "hour", delta: -1 }],
  [DATE_ACTIONS.minuteUp, { type: "adjust", field: "minute", delta: 1 }],
  [DATE_ACTIONS.minuteDown, { type: "adjust", field: "minute", delta: -1 }],
  [DATE_ACTIONS.confirm, { type: "confirm" }],
]);

export interface DateWheelValues {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

export interface DateWheelSelectorOptions {
  now?: () => Date;
  utcOffsetHours?: number;
}

export function padTwo(value: number): string {
  return String(value).padStart(2, "0");
}

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of `month`.
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function formatDateWheelValues(values: DateWheelValues): string {
  const { year, month, day, hour, minute } = values;
  return `${year}/${padTwo(month)}/${padTwo(day)} ${padTwo(hour)}:${padTwo(minute)}:00`;
}

/**
 * Wall-clock fields of `date` in a fixed UTC offset.
 */
export function valuesAtOffset(date: Date, utcOffsetHours: number): DateWheelValues {
  const shifted = new Date(date.getTime() + utcOffsetHours * 60 * 60 * 1000);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
  };
}

function wrap(value: number, delta: number, min: number, max: number): number {
  const span = max - min + 1;
  return ((((value - min + delta) % span) + span) % span) + min;
}

/**
 * Four-wheel date/time picker: day, month, hour, minute.
 *
 * Each wheel wraps within its own bound. Changing the month clamps the day
 * down to the new month's length; the day is never pushed back up.
 */
export class DateWheelSelector implements Selector {
  readonly kind = "date";
  private selectorState: SelectorState = "idle";
  private values: DateWheelValues;
  private confirmed: string | null = null;
  private readonly now: () => Date;
  private readonly utcOffsetHours: number;

  constructor(options: DateWheelSelectorOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.utcOffsetHours = options.utcOffsetHours ?? DEFAULT_UTC_OFFSET_HOURS;
    this.values = valuesAtOffset(this.now(), this.utcOffsetHours);
  }

  get state(): SelectorState {
    return this.selectorState;
  }

  get current(): Readonly<DateWheelValues> {
    return { ...this.values };
  }

  get confirmedDate(): string | null {
    return this.confirmed;
  }

  render(): KeyboardLayout {
    const upRow: KeyboardRow = [
      { label: UP_LABEL, token: DATE_ACTIONS.dayUp },
      { label: UP_LABEL, token: DATE_ACTIONS.monthUp },
      { label: UP_LABEL, token: DATE_ACTIONS.hourUp },
      { label: UP_LABEL, token: DATE_ACTIONS.minuteUp },
    ];
    const downRow: KeyboardRow = [
      { label: DOWN_LABEL, token: DATE_ACTIONS.dayDown },
      { label: DOWN_LABEL, token: DATE_ACTIONS.monthDown },
      { label: DOWN_LABEL, token: DATE_ACTIONS.hourDown },
      { label: DOWN_LABEL, token: DATE_ACTIONS.minuteDown },
    ];

    this.selectorState = "active";
    return [
      upRow,
      this.valueRow(),
      downRow,
      [{ label: CONFIRM_LABEL, token: DATE_ACTIONS.confirm }],
    ];
  }

  handleSelectorEvent(token: string): SelectorOutcome {
    if (this.selectorState !== "active") {
      return ignored("stale");
    }

    const action = ACTIONS_BY_TOKEN.get(token);
    if (!action) {
      return ignored("noop");
    }

    switch (action.type) {
      case "confirm": {
        const value = formatDateWheelValues(this.values);
        this.confirmed = value;
        this.selectorState = "complete";
        return { type: "selected", value, keyboard: [this.valueRow()] };
      }
      case "adjust":
        this.adjust(action.field, action.delta);
        return { type: "updated", keyboard: this.render() };
    }
  }

  /**
   * Re-arms the selector. With `persistValues` the wheels keep their last
   * position, which suits consecutive timestamps that are close together.
   */
  reset(persistValues = false): void {
    this.selectorState = "idle";
    this.confirmed = null;
    if (!persistValues) {
      this.values = valuesAtOffset(this.now(), this.utcOffsetHours);
    }
  }

  private adjust(field: DateField, delta: 1 | -1): void {
    const { year, month, day, hour, minute } = this.values;

    switch (field) {
      case "month": {
        const nextMonth = wrap(month, delta, 1, MONTHS_PER_YEAR);
        const maxDay = daysInMonth(year, nextMonth);
        this.values = { ...this.values, month: nextMonth, day: Math.min(day, maxDay) };
        return;
      }
      case "day":
        this.values = {
          ...this.values,
          day: wrap(day, delta, 1, daysInMonth(year, month)),
        };
        return;
      case "hour":
        this.values = { ...this.values, hour: wrap(hour, delta, 0, HOURS_PER_DAY - 1) };
        return;
      case "minute":
        this.values = {
          ...this.values,
          minute: wrap(minute, delta, 0, MINUTES_PER_HOUR - 1),
        };
        return;
    }
  }

  private valueRow(): KeyboardRow {
    const monthLabel = MONTH_LABELS[this.values.month - 1] ?? String(this.values.month);
    return [
      { label: padTwo(this.values.day), token: NOOP_TOKEN },
      { label: monthLabel, token: NOOP_TOKEN },
      { label: padTwo(this.values.hour), token: NOOP_TOKEN },
      { label: `:${padTwo(this.values.minute)}`, token: NOOP_TOKEN },
    ];
  }
}
