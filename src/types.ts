/**
 * Core domain types for weekly bartender scheduling.
 *
 * Persisted shapes are defined as Zod schemas and the TypeScript types are
 * derived from them so the two cannot drift apart.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Days
// ============================================================================

/**
 * Weekday names in week order. Weeks start on Sunday.
 */
export const DAY_NAMES = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
] as const;

/**
 * Day of the week identifier.
 */
export type DayName = (typeof DAY_NAMES)[number];

/**
 * Zod schema for {@link DayName}.
 */
export const DayNameSchema = z.enum(DAY_NAMES);

/**
 * A weekday paired with its concrete date inside the week under view.
 *
 * `label` is the key used for the day's row in a {@link WeekSchedule},
 * e.g. `"Saturday 2026-10-24"`.
 */
export interface WeekDay {
  name: DayName;
  /** YYYY-MM-DD */
  date: string;
  label: string;
  /** 0 = Sunday ... 6 = Saturday */
  index: number;
}

// ============================================================================
// Workers
// ============================================================================

/** Placeholder stored in a slot nobody could take. */
export const UNASSIGNED = "Unassigned";

export const DEFAULT_MAX_SHIFTS = 5;

export const WorkerConstraintsSchema = z.object({
  allowedShifts: z.array(z.string()).default([]),
  restrictedDays: z.array(DayNameSchema).default([]),
  restrictedShifts: z.array(z.string()).default([]),
  maxShifts: z.number().int().positive().default(DEFAULT_MAX_SHIFTS),
});

/**
 * Constraint record for a single bartender.
 *
 * - `allowedShifts`: whitelist of shift labels; empty means every shift is allowed
 * - `restrictedDays`: days the bartender never works
 * - `restrictedShifts`: shift labels the bartender never works
 * - `maxShifts`: most slots the bartender may hold in one week
 */
export type WorkerConstraints = z.infer<typeof WorkerConstraintsSchema>;

/**
 * The constraint record a new bartender starts with.
 */
export function defaultConstraints(maxShifts: number = DEFAULT_MAX_SHIFTS): WorkerConstraints {
  return { allowedShifts: [], restrictedDays: [], restrictedShifts: [], maxShifts };
}

/** Persisted constraints document: bartender name to constraint record. */
export const ConstraintsDocumentSchema = z.record(z.string(), WorkerConstraintsSchema);

export type ConstraintsDocument = z.infer<typeof ConstraintsDocumentSchema>;

// ============================================================================
// Shifts
// ============================================================================

/**
 * A shift label resolved to hours.
 *
 * `endHour` is past midnight-adjusted: a `"16-1"` shift has `startHour` 16
 * and `endHour` 25.
 */
export interface ShiftDefinition {
  label: string;
  active: boolean;
  startHour: number;
  endHour: number;
}

/** Persisted shift catalog: label to active flag. */
export const ShiftCatalogDocumentSchema = z.record(z.string(), z.boolean());

export type ShiftCatalogDocument = z.infer<typeof ShiftCatalogDocumentSchema>;

// ============================================================================
// Schedules
// ============================================================================

export const WeekScheduleSchema = z.record(z.string(), z.record(z.string(), z.string()));

/**
 * One week of assignments: day label to shift label to bartender name
 * (or {@link UNASSIGNED}).
 */
export type WeekSchedule = z.infer<typeof WeekScheduleSchema>;

/**
 * Why a slot was left unassigned, keyed by `"<DayName> - <shift>"`.
 */
export type UnassignedReasons = Record<string, string>;

/** Bartender name to number of slots held in a week. */
export type ShiftLoad = Record<string, number>;

/** Bartender name to consecutive weeks with a Saturday slot. */
export type SaturdayStreaks = Record<string, number>;

/** Published weeks, keyed by their Sunday start date (YYYY-MM-DD). */
export const ArchiveDocumentSchema = z.record(z.string(), WeekScheduleSchema);

export type ArchiveDocument = z.infer<typeof ArchiveDocumentSchema>;

/**
 * Builds the key used for {@link UnassignedReasons}.
 */
export function slotKey(day: DayName, shift: string): string {
  return `${day} - ${shift}`;
}

/**
 * Copies a schedule deeply enough that edits to the copy never reach the
 * original.
 */
export function copySchedule(schedule: WeekSchedule): WeekSchedule {
  return Object.fromEntries(Object.entries(schedule).map(([day, row]) => [day, { ...row }]));
}
