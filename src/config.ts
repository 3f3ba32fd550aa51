import * as z from "zod";
import { DEFAULT_MAX_SHIFTS } from "./types.js";

/**
 * Tunable limits for generation and publishing.
 *
 * - `minRestHours`: minimum hours between the end of one shift and the start of the next
 * - `saturdayStreakLimit`: prior streak at which a bartender is kept off Saturday when someone else can cover
 * - `publishStreakLimit`: streak (including the week being published) that blocks publishing
 * - `defaultMaxShifts`: weekly limit for new bartenders and for unreadable "up to" phrases
 */
export const EngineOptionsSchema = z.object({
  minRestHours: z.number().min(0).default(8),
  saturdayStreakLimit: z.number().int().positive().default(3),
  publishStreakLimit: z.number().int().positive().default(4),
  defaultMaxShifts: z.number().int().positive().default(DEFAULT_MAX_SHIFTS),
});

export type EngineOptions = z.infer<typeof EngineOptionsSchema>;

/** Input accepted where {@link EngineOptions} are read; omitted fields take defaults. */
export type EngineOptionsInput = z.input<typeof EngineOptionsSchema>;

export function resolveEngineOptions(input: EngineOptionsInput = {}): EngineOptions {
  return EngineOptionsSchema.parse(input);
}

/**
 * File names of the three persisted documents, relative to a data directory.
 */
export const StorePathsSchema = z.object({
  constraints: z.string().min(1).default("bartenders.json"),
  shifts: z.string().min(1).default("shifts.json"),
  archive: z.string().min(1).default("published.json"),
});

export type StorePaths = z.infer<typeof StorePathsSchema>;

export type StorePathsInput = z.input<typeof StorePathsSchema>;
