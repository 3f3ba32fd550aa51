import { formatDateString, parseDateString } from "./datetime.utils.js";
import { PublishBlockedError, ValidationError, type StreakViolation } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { computeSaturdayStreaks } from "./streaks.js";
import { copySchedule, type ArchiveDocument, type WeekSchedule } from "./types.js";

/**
 * Published weeks. Once a week is stored it is never changed.
 *
 * @category Publishing
 */
export class ScheduleStore {
  #weeks: ArchiveDocument;
  #publishStreakLimit: number;
  #logger: Logger;

  constructor(
    document: ArchiveDocument = {},
    options: { publishStreakLimit?: number; logger?: Logger } = {},
  ) {
    this.#weeks = Object.fromEntries(
      Object.entries(document).map(([key, week]) => [key, copySchedule(week)]),
    );
    this.#publishStreakLimit = options.publishStreakLimit ?? 4;
    this.#logger = options.logger ?? silentLogger;
  }

  has(weekKey: string): boolean {
    return weekKey in this.#weeks;
  }

  /** A copy of the published week, if any. */
  get(weekKey: string): WeekSchedule | undefined {
    const week = this.#weeks[weekKey];
    return week ? copySchedule(week) : undefined;
  }

  keys(): string[] {
    return Object.keys(this.#weeks).toSorted();
  }

  /**
   * Read-only view for streak computation and generation.
   */
  snapshot(): Readonly<ArchiveDocument> {
    return this.#weeks;
  }

  /**
   * Streaks that would result from publishing `schedule` for the week
   * starting `weekStart`, limited to those at or over the publish limit.
   */
  violations(weekStart: Date, schedule: WeekSchedule, workers: readonly string[] = []): StreakViolation[] {
    const streaks = computeSaturdayStreaks({
      archive: this.#weeks,
      workers,
      viewedWeekStart: weekStart,
      current: schedule,
      logger: this.#logger,
    });
    return Object.entries(streaks)
      .filter(([, streak]) => streak >= this.#publishStreakLimit)
      .map(([worker, streak]) => ({ worker, streak }));
  }

  /**
   * Stores the week permanently.
   *
   * @throws ValidationError if the week is already published
   * @throws PublishBlockedError if any bartender would reach the Saturday
   * streak limit; every such bartender is listed
   */
  publish(weekStart: Date, schedule: WeekSchedule, workers: readonly string[] = []): string {
    const key = formatDateString(weekStart);
    if (!parseDateString(key)) {
      throw new ValidationError(`Invalid week start ${String(weekStart)}`);
    }
    if (this.has(key)) {
      throw new ValidationError(`Week of ${key} is already published`);
    }

    const violators = this.violations(weekStart, schedule, workers);
    if (violators.length > 0) {
      this.#logger.warn("Publish blocked by Saturday streaks", { week: key, violators });
      throw new PublishBlockedError(violators, this.#publishStreakLimit);
    }

    this.#weeks[key] = copySchedule(schedule);
    this.#logger.info("Published week", { week: key });
    return key;
  }

  toJSON(): ArchiveDocument {
    return Object.fromEntries(Object.entries(this.#weeks).map(([key, week]) => [key, copySchedule(week)]));
  }
}
