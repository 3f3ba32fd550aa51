import { DAYS_PER_WEEK, addDays, formatDateString, weekDays, weekStart } from "./datetime.utils.js";
import type { WeekDay } from "./types.js";

/** Source of the current time. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Tracks which week is being viewed, as a signed number of weeks away from
 * the week containing "now".
 *
 * @category Calendar
 */
export class WeekCalendar {
  #offset: number;
  #clock: Clock;

  constructor(options: { clock?: Clock; offset?: number } = {}) {
    this.#clock = options.clock ?? systemClock;
    this.#offset = options.offset ?? 0;
  }

  get offset(): number {
    return this.#offset;
  }

  now(): Date {
    return this.#clock();
  }

  /** Sunday (midnight) of the week under view. */
  current(): Date {
    return weekStart(addDays(this.#clock(), this.#offset * DAYS_PER_WEEK));
  }

  /** ISO key of the week under view. */
  currentKey(): string {
    return formatDateString(this.current());
  }

  days(): WeekDay[] {
    return weekDays(this.current());
  }

  advance(): Date {
    this.#offset += 1;
    return this.current();
  }

  previous(): Date {
    this.#offset -= 1;
    return this.current();
  }

  reset(): Date {
    this.#offset = 0;
    return this.current();
  }

  /** True when the viewed week starts after the current moment. */
  isFuture(): boolean {
    return this.current().getTime() > this.#clock().getTime();
  }
}
