import { describe, expect, it } from "vitest";
import { auditWeek } from "../src/audit.js";
import { countLoads } from "../src/editor.js";
import { checkEligibility, generateWeek, type GenerateWeekInput } from "../src/generator.js";
import { SeededRandom } from "../src/random.js";
import { ShiftCatalog } from "../src/shifts.js";
import type { WorkerConstraints } from "../src/types.js";
import {
  assignedCells,
  constraints,
  countUnassigned,
  forbiddenRandom,
  lastPick,
  saturdayOnly,
} from "./helpers.js";

const WEEK_START = new Date(2026, 9, 18);
const OPTIONS = { minRestHours: 8, saturdayStreakLimit: 3 };

function input(
  overrides: Partial<GenerateWeekInput> & Pick<GenerateWeekInput, "shifts">,
): GenerateWeekInput {
  return {
    weekStart: WEEK_START,
    workers: [],
    archive: {},
    random: lastPick,
    options: OPTIONS,
    ...overrides,
  };
}

const twoShifts = new ShiftCatalog({ "10-18": true, "18-2": true }).activeShifts();
const fiveShifts = new ShiftCatalog({
  "6-10": true,
  "10-14": true,
  "14-18": true,
  "18-22": true,
  "22-2": true,
}).activeShifts();

describe("checkEligibility", () => {
  const [day, night] = twoShifts;
  const monday = { name: "Monday", date: "2026-10-19", label: "Monday 2026-10-19", index: 1 } as const;

  it("reports the first failing rule", () => {
    const limits = constraints({ restrictedDays: ["Monday"], restrictedShifts: ["10-18"] });
    expect(checkEligibility(limits, { load: 0 }, monday, day!, 8)).toBe("restricted-day");
  });

  it("applies the whitelist only when it is not empty", () => {
    expect(checkEligibility(constraints(), { load: 0 }, monday, day!, 8)).toBeUndefined();
    const limits = constraints({ allowedShifts: ["18-2"] });
    expect(checkEligibility(limits, { load: 0 }, monday, day!, 8)).toBe("not-allowed");
    expect(checkEligibility(limits, { load: 0 }, monday, night!, 8)).toBeUndefined();
  });

  it("stops at the weekly maximum", () => {
    const limits = constraints({ maxShifts: 2 });
    expect(checkEligibility(limits, { load: 2 }, monday, day!, 8)).toBe("max-shifts");
  });

  it("measures rest across days", () => {
    // Sunday 18-2 ends 02:00 Monday; Monday 10-18 starts 8h later.
    const last = { dayIndex: 0, endHour: 26 };
    expect(checkEligibility(constraints(), { load: 1, last }, monday, day!, 8)).toBeUndefined();
    expect(checkEligibility(constraints(), { load: 1, last }, monday, day!, 9)).toBe("rest");
  });
});

describe("generateWeek", () => {
  it("leaves every slot open with a reason when there are no bartenders", () => {
    const { schedule, reasons } = generateWeek(input({ shifts: twoShifts }));

    expect(Object.keys(schedule)).toHaveLength(7);
    expect(countUnassigned(schedule)).toBe(14);
    expect(Object.keys(reasons)).toHaveLength(14);
    expect(reasons["Wednesday - 18-2"]).toBe("No bartenders available");
  });

  it("alternates two bartenders until both reach their maximum", () => {
    const { schedule, reasons } = generateWeek(
      input({
        shifts: twoShifts,
        workers: [
          ["Avery", constraints()],
          ["Blake", constraints()],
        ],
      }),
    );

    expect(schedule["Sunday 2026-10-18"]).toEqual({ "10-18": "Blake", "18-2": "Avery" });
    expect(schedule["Thursday 2026-10-22"]).toEqual({ "10-18": "Blake", "18-2": "Avery" });
    expect(schedule["Friday 2026-10-23"]).toEqual({ "10-18": "Unassigned", "18-2": "Unassigned" });
    expect(schedule["Saturday 2026-10-24"]).toEqual({
      "10-18": "Unassigned",
      "18-2": "Unassigned",
    });
    expect(reasons).toEqual({
      "Friday - 10-18": "No eligible bartender (Avery: max shifts reached; Blake: max shifts reached)",
      "Friday - 18-2": "No eligible bartender (Avery: max shifts reached; Blake: max shifts reached)",
      "Saturday - 10-18":
        "No eligible bartender (Avery: max shifts reached; Blake: max shifts reached)",
      "Saturday - 18-2":
        "No eligible bartender (Avery: max shifts reached; Blake: max shifts reached)",
    });
    expect(countLoads(schedule)).toEqual({ Avery: 5, Blake: 5 });
  });

  it("gives a bartender limited to one shift exactly one slot", () => {
    const { schedule } = generateWeek(
      input({
        shifts: fiveShifts,
        workers: [["Wren", constraints({ maxShifts: 1 })]],
        random: new SeededRandom(7),
      }),
    );

    expect(assignedCells(schedule).filter((cell) => cell.worker === "Wren")).toHaveLength(1);
    expect(countUnassigned(schedule)).toBe(34);
  });

  it("accounts for every slot and keeps every rule", () => {
    const workers: [string, WorkerConstraints][] = [
      ["Avery", constraints({ restrictedDays: ["Monday", "Tuesday"] })],
      ["Blake", constraints({ allowedShifts: ["18-22", "22-2"], maxShifts: 4 })],
      ["Casey", constraints({ restrictedShifts: ["6-10"] })],
      ["Drew", constraints({ maxShifts: 3 })],
      ["Emery", constraints()],
      ["Finley", constraints({ restrictedDays: ["Saturday"] })],
    ];

    for (const seed of [1, 2, 3, 42, 1234]) {
      const { schedule, reasons } = generateWeek(
        input({ shifts: fiveShifts, workers, random: new SeededRandom(seed) }),
      );

      const loads = countLoads(schedule);
      const assigned = Object.values(loads).reduce((sum, n) => sum + n, 0);
      expect(assigned + countUnassigned(schedule)).toBe(7 * fiveShifts.length);
      expect(Object.keys(reasons)).toHaveLength(countUnassigned(schedule));
      expect(auditWeek(schedule, new Map(workers), 8)).toEqual([]);
    }
  });

  it("keeps rows in catalog order", () => {
    const { schedule } = generateWeek(
      input({
        shifts: fiveShifts,
        workers: [["Avery", constraints()]],
        random: new SeededRandom(99),
      }),
    );
    for (const row of Object.values(schedule)) {
      expect(Object.keys(row)).toEqual(["6-10", "10-14", "14-18", "18-22", "22-2"]);
    }
  });

  it("keeps a bartender on a long Saturday streak off Saturday when someone else can cover", () => {
    const oneShift = new ShiftCatalog({ "20-23": true }).activeShifts();
    const archive = {
      "2026-09-27": saturdayOnly("2026-10-03", { "20-23": "Blake" }),
      "2026-10-04": saturdayOnly("2026-10-10", { "20-23": "Blake" }),
      "2026-10-11": saturdayOnly("2026-10-17", { "20-23": "Blake" }),
    };

    const { schedule } = generateWeek(
      input({
        shifts: oneShift,
        archive,
        workers: [
          ["Avery", constraints({ maxShifts: 7 })],
          ["Blake", constraints({ maxShifts: 7 })],
        ],
      }),
    );

    expect(schedule["Friday 2026-10-23"]).toEqual({ "20-23": "Blake" });
    expect(schedule["Saturday 2026-10-24"]).toEqual({ "20-23": "Avery" });
  });

  it("still uses that bartender when nobody else can work Saturday", () => {
    const oneShift = new ShiftCatalog({ "20-23": true }).activeShifts();
    const archive = {
      "2026-09-27": saturdayOnly("2026-10-03", { "20-23": "Blake" }),
      "2026-10-04": saturdayOnly("2026-10-10", { "20-23": "Blake" }),
      "2026-10-11": saturdayOnly("2026-10-17", { "20-23": "Blake" }),
    };

    const { schedule, reasons } = generateWeek(
      input({
        shifts: oneShift,
        archive,
        workers: [
          ["Avery", constraints({ restrictedDays: ["Saturday"] })],
          [
            "Blake",
            constraints({
              maxShifts: 1,
              restrictedDays: ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday"],
            }),
          ],
        ],
      }),
    );

    expect(schedule["Saturday 2026-10-24"]).toEqual({ "20-23": "Blake" });
    expect(reasons["Saturday - 20-23"]).toBeUndefined();
  });

  it("returns a published week as stored without using randomness", () => {
    const stored = {
      "Sunday 2026-10-18": { "10-18": "Avery", "18-2": "Unassigned" },
      "Saturday 2026-10-24": { "10-18": "Blake", "18-2": "Avery" },
    };

    const first = generateWeek(
      input({
        shifts: twoShifts,
        archive: { "2026-10-18": stored },
        workers: [["Casey", constraints()]],
        random: forbiddenRandom,
      }),
    );
    const second = generateWeek(
      input({
        shifts: twoShifts,
        archive: { "2026-10-18": stored },
        random: forbiddenRandom,
      }),
    );

    expect(first.published).toBe(true);
    expect(first.schedule).toEqual(stored);
    expect(second.schedule).toEqual(first.schedule);
    expect(first.reasons).toEqual({});

    first.schedule["Sunday 2026-10-18"]!["18-2"] = "Casey";
    expect(stored["Sunday 2026-10-18"]["18-2"]).toBe("Unassigned");
  });
});
