/**
 * Weekly bartender scheduling.
 *
 * Fills recurring weekly shift slots with bartenders, honouring each
 * bartender's restrictions and weekly limit, a minimum rest between shifts,
 * and a cap on consecutive Saturdays. Weeks can be corrected by hand and
 * then published, after which they never change.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Shifts** are `"start-end"` hour labels. An end before the start runs
 * past midnight: `"18-2"` is 18:00 to 02:00.
 *
 * **Constraints** per bartender: days and shifts they never work, an
 * optional whitelist of shifts, and a weekly maximum. They can be written
 * as free text ({@link parseConstraintText}).
 *
 * **Generation** ({@link generateWeek}) is a single greedy pass: days in
 * order, shifts shuffled within each day, each slot given to a random
 * eligible bartender. Published weeks are returned as stored.
 *
 * **Publishing** ({@link ScheduleStore}) refuses a week that would give a
 * bartender four Saturdays in a row.
 *
 * @example
 * ```typescript
 * import { JsonFileStore, SchedulingEngine } from "barshift";
 *
 * const store = new JsonFileStore("./data");
 * const engine = SchedulingEngine.fromStore(store);
 *
 * engine.workers.add("Dana");
 * engine.workers.applyText("Dana", "Doesn't work Sunday\nUp to 3 shifts");
 * engine.generate();
 * engine.assignOverride("Dana", { day: "Friday", shift: "18-2" });
 * engine.publish();
 * engine.save(store);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Types
// ============================================================================

export type {
  DayName,
  WeekDay,
  WorkerConstraints,
  ConstraintsDocument,
  ShiftDefinition,
  ShiftCatalogDocument,
  WeekSchedule,
  UnassignedReasons,
  ShiftLoad,
  SaturdayStreaks,
  ArchiveDocument,
} from "./types.js";

export {
  DAY_NAMES,
  UNASSIGNED,
  DEFAULT_MAX_SHIFTS,
  DayNameSchema,
  WorkerConstraintsSchema,
  ConstraintsDocumentSchema,
  ShiftCatalogDocumentSchema,
  WeekScheduleSchema,
  ArchiveDocumentSchema,
  defaultConstraints,
  slotKey,
  copySchedule,
} from "./types.js";

// ============================================================================
// Errors
// ============================================================================

export {
  BarshiftError,
  ValidationError,
  ConstraintParseError,
  PublishBlockedError,
  PersistenceError,
} from "./errors.js";

export type { StreakViolation } from "./errors.js";

// ============================================================================
// Configuration & logging
// ============================================================================

export { EngineOptionsSchema, StorePathsSchema, resolveEngineOptions } from "./config.js";

export type { EngineOptions, EngineOptionsInput, StorePaths, StorePathsInput } from "./config.js";

export { consoleLogger, silentLogger } from "./logger.js";

export type { Logger } from "./logger.js";

// ============================================================================
// Calendar & shifts
// ============================================================================

export {
  weekStart,
  weekDays,
  addDays,
  formatDateString,
  parseDateString,
  formatDayLabel,
  dayNameFromLabel,
} from "./datetime.utils.js";

export { WeekCalendar, systemClock } from "./calendar.js";

export type { Clock } from "./calendar.js";

export {
  ShiftCatalog,
  parseShiftLabel,
  normalizeShiftLabel,
  tryNormalizeShiftLabel,
} from "./shifts.js";

// ============================================================================
// Constraints
// ============================================================================

export { ConstraintStore, parseConstraintText, applyConstraintUpdate } from "./constraints.js";

export type {
  ConstraintUpdate,
  ConstraintIssue,
  ConstraintParseResult,
} from "./constraints.js";

// ============================================================================
// Generation, editing, publishing
// ============================================================================

export { mathRandom, SeededRandom, shuffle } from "./random.js";

export type { RandomSource } from "./random.js";

export { generateWeek, checkEligibility, restGapHours } from "./generator.js";

export type {
  GenerateWeekInput,
  GeneratedWeek,
  ExclusionReason,
  LastAssignment,
} from "./generator.js";

export { computeSaturdayStreaks, saturdayWorkers } from "./streaks.js";

export type { SaturdayStreakInput } from "./streaks.js";

export { swapSlots, overrideSlot, countLoads } from "./editor.js";

export type { SlotRef } from "./editor.js";

export { ScheduleStore } from "./archive.js";

export { auditWeek } from "./audit.js";

export type { AuditViolation } from "./audit.js";

// ============================================================================
// Persistence & engine
// ============================================================================

export { JsonFileStore, readJsonDocument, writeJsonDocument } from "./persistence.js";

export type { EngineStore } from "./persistence.js";

export { SchedulingEngine } from "./engine.js";

export type { SchedulingEngineInit, WeekSummary } from "./engine.js";
