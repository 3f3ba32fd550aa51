/**
 * Greedy week generation.
 *
 * Days are filled Sunday to Saturday so each bartender's rest chain is
 * built in time order. Within a day the shifts are shuffled on every call
 * so no shift is systematically filled first.
 *
 * @module
 */

import type { EngineOptions } from "./config.js";
import { DAYS_PER_WEEK, HOURS_PER_DAY, formatDateString, weekDays } from "./datetime.utils.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { shuffle, type RandomSource } from "./random.js";
import { computeSaturdayStreaks } from "./streaks.js";
import {
  UNASSIGNED,
  copySchedule,
  slotKey,
  type ArchiveDocument,
  type SaturdayStreaks,
  type ShiftDefinition,
  type UnassignedReasons,
  type WeekDay,
  type WeekSchedule,
  type WorkerConstraints,
} from "./types.js";

/**
 * Why a bartender could not take a slot.
 */
export type ExclusionReason =
  | "restricted-day"
  | "restricted-shift"
  | "not-allowed"
  | "max-shifts"
  | "rest";

const EXCLUSION_LABELS: Record<ExclusionReason, string> = {
  "restricted-day": "does not work this day",
  "restricted-shift": "does not work this shift",
  "not-allowed": "shift not in allowed list",
  "max-shifts": "max shifts reached",
  rest: "not enough rest",
};

/** A bartender's most recent assignment in the week being built. */
export interface LastAssignment {
  dayIndex: number;
  endHour: number;
}

/**
 * Hours between the end of `last` and the start of `shift` on `day`.
 */
export function restGapHours(last: LastAssignment, day: WeekDay, shift: ShiftDefinition): number {
  return (day.index - last.dayIndex) * HOURS_PER_DAY + (shift.startHour - last.endHour);
}

/**
 * First constraint that keeps a bartender off a slot, or `undefined` when
 * they can take it.
 */
export function checkEligibility(
  constraints: WorkerConstraints,
  state: { load: number; last?: LastAssignment },
  day: WeekDay,
  shift: ShiftDefinition,
  minRestHours: number,
): ExclusionReason | undefined {
  if (constraints.restrictedDays.includes(day.name)) return "restricted-day";
  if (constraints.restrictedShifts.includes(shift.label)) return "restricted-shift";
  if (constraints.allowedShifts.length > 0 && !constraints.allowedShifts.includes(shift.label)) {
    return "not-allowed";
  }
  if (state.load >= constraints.maxShifts) return "max-shifts";
  if (state.last && restGapHours(state.last, day, shift) < minRestHours) return "rest";
  return undefined;
}

export interface GenerateWeekInput {
  /** Sunday the week starts on. */
  weekStart: Date;
  /** Active shifts. */
  shifts: readonly ShiftDefinition[];
  /** Bartenders in a stable order with their constraints. */
  workers: readonly (readonly [string, WorkerConstraints])[];
  archive: ArchiveDocument;
  random: RandomSource;
  options: Pick<EngineOptions, "minRestHours" | "saturdayStreakLimit">;
  logger?: Logger;
}

export interface GeneratedWeek {
  schedule: WeekSchedule;
  reasons: UnassignedReasons;
  /** True when the week was already published and returned as stored. */
  published: boolean;
}

function describeExclusions(exclusions: [string, ExclusionReason][]): string {
  if (exclusions.length === 0) return "No bartenders available";
  const details = exclusions.map(([worker, reason]) => `${worker}: ${EXCLUSION_LABELS[reason]}`);
  return `No eligible bartender (${details.join("; ")})`;
}

/**
 * Builds one week of assignments.
 *
 * A week already present in the archive is returned as stored, without
 * touching the random source.
 *
 * For every other week each slot goes to a bartender picked uniformly from
 * those eligible. On Saturday, bartenders whose streak has already reached
 * `saturdayStreakLimit` are skipped as long as someone else can cover.
 */
export function generateWeek(input: GenerateWeekInput): GeneratedWeek {
  const logger = input.logger ?? silentLogger;
  const key = formatDateString(input.weekStart);

  const stored = input.archive[key];
  if (stored) {
    logger.debug("Using published schedule", { week: key });
    return { schedule: copySchedule(stored), reasons: {}, published: true };
  }

  const { minRestHours, saturdayStreakLimit } = input.options;
  const loads = new Map<string, number>(input.workers.map(([name]) => [name, 0]));
  const lastAssignment = new Map<string, LastAssignment>();
  let streaks: SaturdayStreaks | undefined;

  const schedule: WeekSchedule = {};
  const reasons: UnassignedReasons = {};

  for (const day of weekDays(input.weekStart)) {
    const row: Record<string, string> = {};

    for (const shift of shuffle(input.shifts, input.random)) {
      const exclusions: [string, ExclusionReason][] = [];
      let eligible: string[] = [];

      for (const [name, constraints] of input.workers) {
        const reason = checkEligibility(
          constraints,
          { load: loads.get(name) ?? 0, last: lastAssignment.get(name) },
          day,
          shift,
          minRestHours,
        );
        if (reason) exclusions.push([name, reason]);
        else eligible.push(name);
      }

      if (day.name === "Saturday" && eligible.length > 1) {
        streaks ??= computeSaturdayStreaks({
          archive: input.archive,
          workers: input.workers.map(([name]) => name),
          viewedWeekStart: input.weekStart,
          logger,
        });
        const rested = eligible.filter((name) => (streaks?.[name] ?? 0) < saturdayStreakLimit);
        if (rested.length > 0) eligible = rested;
      }

      if (eligible.length === 0) {
        row[shift.label] = UNASSIGNED;
        reasons[slotKey(day.name, shift.label)] = describeExclusions(exclusions);
        continue;
      }

      const picked = eligible[input.random.pick(eligible.length)]!;
      row[shift.label] = picked;
      loads.set(picked, (loads.get(picked) ?? 0) + 1);
      lastAssignment.set(picked, { dayIndex: day.index, endHour: shift.endHour });
    }

    // Rows keep catalog order regardless of the fill order above.
    schedule[day.label] = Object.fromEntries(
      input.shifts.map((shift) => [shift.label, row[shift.label] ?? UNASSIGNED]),
    );
  }

  const unassigned = Object.keys(reasons).length;
  logger.info("Generated week", { week: key, slots: DAYS_PER_WEEK * input.shifts.length, unassigned });

  return { schedule, reasons, published: false };
}
