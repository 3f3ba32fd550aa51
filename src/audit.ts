import { HOURS_PER_DAY, dayNameFromLabel } from "./datetime.utils.js";
import { countLoads } from "./editor.js";
import { ValidationError } from "./errors.js";
import { parseShiftLabel } from "./shifts.js";
import { DAY_NAMES, UNASSIGNED, type DayName, type WeekSchedule, type WorkerConstraints } from "./types.js";

/**
 * A rule a finished week breaks, usually because of a manual override.
 */
export interface AuditViolation {
  rule:
    | "unknown-worker"
    | "restricted-day"
    | "restricted-shift"
    | "not-allowed"
    | "max-shifts"
    | "rest";
  worker: string;
  message: string;
  /** Day labels involved. */
  days: string[];
}

interface Placement {
  label: string;
  day: DayName;
  shift: string;
  start: number;
  end: number;
}

function shiftHours(label: string): { start: number; end: number } | undefined {
  try {
    return parseShiftLabel(label);
  } catch (error) {
    if (error instanceof ValidationError) return undefined;
    throw error;
  }
}

function placementsByWorker(schedule: WeekSchedule): Map<string, Placement[]> {
  const byWorker = new Map<string, Placement[]>();

  for (const [label, row] of Object.entries(schedule)) {
    const day = dayNameFromLabel(label);
    if (!day) continue;
    const offset = DAY_NAMES.indexOf(day) * HOURS_PER_DAY;

    for (const [shift, worker] of Object.entries(row)) {
      if (worker === UNASSIGNED) continue;
      const hours = shiftHours(shift);
      if (!hours) continue;
      const { start, end } = hours;
      const list = byWorker.get(worker) ?? [];
      list.push({ label, day, shift, start: offset + start, end: offset + end });
      byWorker.set(worker, list);
    }
  }

  return byWorker;
}

/**
 * Re-checks every assignment in a week against the bartenders' constraints
 * and the rest rule.
 *
 * Generated weeks pass by construction; overrides and swaps may not.
 *
 * @example
 * ```typescript
 * auditWeek(schedule, new Map([["Dana", { ...defaultConstraints(), restrictedDays: ["Monday"] }]]), 8);
 * // [{ rule: "restricted-day", worker: "Dana", message: "Dana does not work Monday", ... }]
 * ```
 */
export function auditWeek(
  schedule: WeekSchedule,
  constraints: ReadonlyMap<string, WorkerConstraints>,
  minRestHours: number,
): AuditViolation[] {
  const violations: AuditViolation[] = [];
  const loads = countLoads(schedule);

  for (const [worker, placements] of placementsByWorker(schedule)) {
    const limits = constraints.get(worker);
    if (!limits) {
      violations.push({
        rule: "unknown-worker",
        worker,
        message: `${worker} is not a known bartender`,
        days: [...new Set(placements.map((p) => p.label))],
      });
      continue;
    }

    for (const p of placements) {
      if (limits.restrictedDays.includes(p.day)) {
        violations.push({
          rule: "restricted-day",
          worker,
          message: `${worker} does not work ${p.day}`,
          days: [p.label],
        });
      }
      if (limits.restrictedShifts.includes(p.shift)) {
        violations.push({
          rule: "restricted-shift",
          worker,
          message: `${worker} does not work ${p.shift} (${p.day})`,
          days: [p.label],
        });
      }
      if (limits.allowedShifts.length > 0 && !limits.allowedShifts.includes(p.shift)) {
        violations.push({
          rule: "not-allowed",
          worker,
          message: `${worker} only works ${limits.allowedShifts.join(", ")}, not ${p.shift} (${p.day})`,
          days: [p.label],
        });
      }
    }

    const load = loads[worker] ?? 0;
    if (load > limits.maxShifts) {
      violations.push({
        rule: "max-shifts",
        worker,
        message: `${worker} has ${load} shifts, limit is ${limits.maxShifts}`,
        days: [...new Set(placements.map((p) => p.label))],
      });
    }

    const sorted = placements.toSorted((a, b) => a.start - b.start);
    for (let i = 0; i < sorted.length - 1; i++) {
      const current = sorted[i]!;
      const next = sorted[i + 1]!;
      const gap = next.start - current.end;
      if (gap < minRestHours) {
        violations.push({
          rule: "rest",
          worker,
          message: `${worker} has ${gap}h rest between ${current.day} ${current.shift} and ${next.day} ${next.shift}, need ${minRestHours}h`,
          days: [current.label, next.label],
        });
      }
    }
  }

  return violations;
}
