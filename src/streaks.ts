import { dayNameFromLabel, formatDateString, parseDateString } from "./datetime.utils.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { UNASSIGNED, type ArchiveDocument, type SaturdayStreaks, type WeekSchedule } from "./types.js";

export interface SaturdayStreakInput {
  /** Published weeks keyed by Sunday start date. */
  archive: ArchiveDocument;
  /** Bartenders to report on; anyone seen on a Saturday is added. */
  workers: readonly string[];
  /** Weeks starting after this date are ignored. */
  viewedWeekStart: Date;
  /** In-progress week applied after the archive walk. */
  current?: WeekSchedule;
  logger?: Logger;
}

/**
 * Bartenders holding a Saturday slot in `schedule`, or `undefined` when the
 * week has no Saturday row.
 */
export function saturdayWorkers(schedule: WeekSchedule): Set<string> | undefined {
  const row = Object.entries(schedule).find(([label]) => dayNameFromLabel(label) === "Saturday");
  if (!row) return undefined;
  return new Set(Object.values(row[1]).filter((worker) => worker !== UNASSIGNED));
}

function collectWorkers(input: SaturdayStreakInput, weeks: WeekSchedule[]): string[] {
  const names = new Set(input.workers);
  for (const week of weeks) {
    for (const worker of saturdayWorkers(week) ?? []) names.add(worker);
  }
  return [...names];
}

/**
 * Counts, for each bartender, how many weeks in a row up to the viewed week
 * they have worked a Saturday.
 *
 * Weeks are taken oldest first. Working that week's Saturday adds one;
 * anything else, including a week with no Saturday row, resets to zero.
 * Archive keys that are not dates are skipped with a warning.
 *
 * @example
 * ```typescript
 * computeSaturdayStreaks({
 *   archive: {
 *     "2026-10-04": { "Saturday 2026-10-10": { "16-1": "Dana" } },
 *     "2026-10-11": { "Saturday 2026-10-17": { "16-1": "Dana" } },
 *   },
 *   workers: ["Dana", "Eli"],
 *   viewedWeekStart: new Date(2026, 9, 18),
 * });
 * // { Dana: 2, Eli: 0 }
 * ```
 */
export function computeSaturdayStreaks(input: SaturdayStreakInput): SaturdayStreaks {
  const logger = input.logger ?? silentLogger;
  const viewed = formatDateString(input.viewedWeekStart);

  const weeks: WeekSchedule[] = [];
  for (const key of Object.keys(input.archive).toSorted()) {
    const start = parseDateString(key);
    if (!start) {
      logger.warn("Skipping archived week with an unreadable date", { key });
      continue;
    }
    if (formatDateString(start) > viewed) continue;
    const week = input.archive[key];
    if (week) weeks.push(week);
  }
  if (input.current) weeks.push(input.current);

  const workers = collectWorkers(input, weeks);
  const streaks: SaturdayStreaks = Object.fromEntries(workers.map((worker) => [worker, 0]));

  for (const week of weeks) {
    const onSaturday = saturdayWorkers(week);
    for (const worker of workers) {
      streaks[worker] = onSaturday?.has(worker) ? (streaks[worker] ?? 0) + 1 : 0;
    }
  }

  return streaks;
}
