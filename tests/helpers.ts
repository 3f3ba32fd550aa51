import { vi, type Mock } from "vitest";
import type { Logger } from "../src/logger.js";
import type { RandomSource } from "../src/random.js";
import {
  UNASSIGNED,
  defaultConstraints,
  type WeekSchedule,
  type WorkerConstraints,
} from "../src/types.js";

/** Wednesday 2026-10-21, noon. The viewed week starts Sunday 2026-10-18. */
export const NOW = new Date(2026, 9, 21, 12, 0, 0);
export const WEEK_KEY = "2026-10-18";

export const fixedClock = () => new Date(NOW);

/**
 * Never reorders shifts and always takes the last eligible bartender.
 */
export const lastPick: RandomSource = { pick: (n) => n - 1 };

/** Fails the test if generation consumes randomness. */
export const forbiddenRandom: RandomSource = {
  pick() {
    throw new Error("random source should not be used");
  },
};

export function spyLogger(): { [K in keyof Logger]: Mock<Logger[K]> } {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}

export function constraints(overrides: Partial<WorkerConstraints> = {}): WorkerConstraints {
  return { ...defaultConstraints(), ...overrides };
}

/**
 * A week containing only a Saturday row.
 */
export function saturdayOnly(date: string, shifts: Record<string, string>): WeekSchedule {
  return { [`Saturday ${date}`]: shifts };
}

/** All non-Unassigned cells of a schedule, in row order. */
export function assignedCells(schedule: WeekSchedule): { day: string; shift: string; worker: string }[] {
  return Object.entries(schedule).flatMap(([day, row]) =>
    Object.entries(row)
      .filter(([, worker]) => worker !== UNASSIGNED)
      .map(([shift, worker]) => ({ day, shift, worker })),
  );
}

export function countUnassigned(schedule: WeekSchedule): number {
  return Object.values(schedule)
    .flatMap((row) => Object.values(row))
    .filter((worker) => worker === UNASSIGNED).length;
}
