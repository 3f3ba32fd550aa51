import { describe, expect, it } from "vitest";
import { auditWeek } from "../src/audit.js";
import type { WorkerConstraints } from "../src/types.js";
import { constraints } from "./helpers.js";

const limits = new Map<string, WorkerConstraints>([
  ["Dana", constraints({ restrictedDays: ["Monday"], maxShifts: 2 })],
  ["Eli", constraints({ allowedShifts: ["18-2"], restrictedShifts: ["10-18"] })],
]);

describe("auditWeek", () => {
  it("passes a week that keeps every rule", () => {
    const schedule = {
      "Sunday 2026-10-18": { "10-18": "Dana", "18-2": "Eli" },
      "Monday 2026-10-19": { "10-18": "Unassigned", "18-2": "Eli" },
    };
    expect(auditWeek(schedule, limits, 8)).toEqual([]);
  });

  it("reports restricted days and the weekly maximum", () => {
    const schedule = {
      "Sunday 2026-10-18": { "10-18": "Dana" },
      "Monday 2026-10-19": { "10-18": "Dana" },
      "Tuesday 2026-10-20": { "10-18": "Dana" },
    };

    expect(auditWeek(schedule, limits, 8)).toEqual([
      {
        rule: "restricted-day",
        worker: "Dana",
        message: "Dana does not work Monday",
        days: ["Monday 2026-10-19"],
      },
      {
        rule: "max-shifts",
        worker: "Dana",
        message: "Dana has 3 shifts, limit is 2",
        days: ["Sunday 2026-10-18", "Monday 2026-10-19", "Tuesday 2026-10-20"],
      },
    ]);
  });

  it("reports restricted and non-whitelisted shifts", () => {
    const schedule = { "Wednesday 2026-10-21": { "10-18": "Eli" } };

    expect(auditWeek(schedule, limits, 8).map((v) => v.rule)).toEqual([
      "restricted-shift",
      "not-allowed",
    ]);
  });

  it("reports short rest across midnight", () => {
    const schedule = {
      "Sunday 2026-10-18": { "18-2": "Eli" },
      "Monday 2026-10-19": { "6-10": "Eli" },
    };
    const relaxed = new Map([["Eli", constraints()]]);

    expect(auditWeek(schedule, relaxed, 8)).toEqual([
      {
        rule: "rest",
        worker: "Eli",
        message: "Eli has 4h rest between Sunday 18-2 and Monday 6-10, need 8h",
        days: ["Sunday 2026-10-18", "Monday 2026-10-19"],
      },
    ]);
  });

  it("reports names that are not known bartenders", () => {
    const schedule = { "Friday 2026-10-23": { "18-2": "Guest" } };
    expect(auditWeek(schedule, limits, 8)).toEqual([
      {
        rule: "unknown-worker",
        worker: "Guest",
        message: "Guest is not a known bartender",
        days: ["Friday 2026-10-23"],
      },
    ]);
  });
});
