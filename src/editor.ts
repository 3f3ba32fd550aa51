import { dayNameFromLabel } from "./datetime.utils.js";
import { ValidationError } from "./errors.js";
import { UNASSIGNED, type ShiftLoad, type WeekSchedule } from "./types.js";

/**
 * A slot address. `day` is either the full row label (`"Monday 2026-10-19"`)
 * or just the day name (`"Monday"`).
 */
export interface SlotRef {
  day: string;
  shift: string;
}

/**
 * Counts the slots each bartender holds in `schedule`.
 *
 * Loads are always read off the schedule itself, so edits can never leave
 * them out of step.
 */
export function countLoads(schedule: WeekSchedule, workers: readonly string[] = []): ShiftLoad {
  const loads: ShiftLoad = Object.fromEntries(workers.map((worker) => [worker, 0]));
  for (const row of Object.values(schedule)) {
    for (const worker of Object.values(row)) {
      if (worker === UNASSIGNED) continue;
      loads[worker] = (loads[worker] ?? 0) + 1;
    }
  }
  return loads;
}

function resolveSlot(schedule: WeekSchedule, ref: SlotRef): { row: Record<string, string>; label: string } {
  const label = Object.keys(schedule).find(
    (candidate) => candidate === ref.day || dayNameFromLabel(candidate) === ref.day,
  );
  const row = label === undefined ? undefined : schedule[label];
  if (label === undefined || !row) {
    throw new ValidationError(`No day "${ref.day}" in this week`);
  }
  if (!(ref.shift in row)) {
    throw new ValidationError(`No shift "${ref.shift}" on ${label}`);
  }
  return { row, label };
}

/**
 * Exchanges the occupants of two slots. Applying the same swap twice
 * restores the original schedule.
 */
export function swapSlots(schedule: WeekSchedule, first: SlotRef, second: SlotRef): void {
  const a = resolveSlot(schedule, first);
  const b = resolveSlot(schedule, second);
  const occupantA = a.row[first.shift] ?? UNASSIGNED;
  const occupantB = b.row[second.shift] ?? UNASSIGNED;
  a.row[first.shift] = occupantB;
  b.row[second.shift] = occupantA;
}

/**
 * Puts `worker` in a slot without checking any constraint.
 *
 * @returns the previous occupant
 */
export function overrideSlot(schedule: WeekSchedule, worker: string, slot: SlotRef): string {
  const name = worker.trim();
  if (!name) throw new ValidationError("Bartender name cannot be empty");

  const { row } = resolveSlot(schedule, slot);
  const previous = row[slot.shift] ?? UNASSIGNED;
  row[slot.shift] = name;
  return previous;
}
