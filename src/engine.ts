import { auditWeek, type AuditViolation } from "./audit.js";
import { WeekCalendar, type Clock } from "./calendar.js";
import { resolveEngineOptions, type EngineOptions, type EngineOptionsInput } from "./config.js";
import { ConstraintStore } from "./constraints.js";
import { DAYS_PER_WEEK, dayNameFromLabel } from "./datetime.utils.js";
import { countLoads, overrideSlot, swapSlots, type SlotRef } from "./editor.js";
import { ValidationError } from "./errors.js";
import { generateWeek } from "./generator.js";
import type { Logger } from "./logger.js";
import { consoleLogger } from "./logger.js";
import type { EngineStore } from "./persistence.js";
import { mathRandom, type RandomSource } from "./random.js";
import { ScheduleStore } from "./archive.js";
import { ShiftCatalog } from "./shifts.js";
import { computeSaturdayStreaks } from "./streaks.js";
import {
  UNASSIGNED,
  copySchedule,
  slotKey,
  type ArchiveDocument,
  type ConstraintsDocument,
  type SaturdayStreaks,
  type ShiftCatalogDocument,
  type ShiftLoad,
  type UnassignedReasons,
  type WeekSchedule,
} from "./types.js";

/**
 * Initial state and collaborators for a {@link SchedulingEngine}.
 */
export interface SchedulingEngineInit {
  constraints?: ConstraintsDocument;
  shifts?: ShiftCatalogDocument;
  archive?: ArchiveDocument;
  options?: EngineOptionsInput;
  random?: RandomSource;
  clock?: Clock;
  logger?: Logger;
  /** Signed number of weeks from the current week to view first. */
  weekOffset?: number;
}

export interface WeekSummary {
  week: string;
  published: boolean;
  slots: number;
  assigned: number;
  unassigned: number;
}

/**
 * Owns the state of one scheduling session: bartenders, shifts, published
 * weeks and the week being worked on.
 *
 * Call {@link generate} (or navigate) to build the viewed week, adjust it
 * with {@link swap} or {@link assignOverride}, then {@link publish} it.
 *
 * @example
 * ```typescript
 * const engine = new SchedulingEngine({
 *   constraints: { Dana: { allowedShifts: [], restrictedDays: [], restrictedShifts: [], maxShifts: 5 } },
 *   shifts: { "10-18": true, "18-2": true },
 * });
 * engine.generate();
 * engine.swap({ day: "Friday", shift: "10-18" }, { day: "Saturday", shift: "18-2" });
 * engine.publish();
 * ```
 *
 * @category Engine
 */
export class SchedulingEngine {
  readonly workers: ConstraintStore;
  readonly shifts: ShiftCatalog;
  readonly published: ScheduleStore;
  readonly calendar: WeekCalendar;
  readonly options: EngineOptions;

  #random: RandomSource;
  #logger: Logger;
  #schedule: WeekSchedule = {};
  #reasons: UnassignedReasons = {};
  #week: string | undefined;

  constructor(init: SchedulingEngineInit = {}) {
    this.options = resolveEngineOptions(init.options);
    this.#random = init.random ?? mathRandom;
    this.#logger = init.logger ?? consoleLogger;
    this.workers = new ConstraintStore(init.constraints, {
      defaultMaxShifts: this.options.defaultMaxShifts,
    });
    this.shifts = new ShiftCatalog(init.shifts);
    this.published = new ScheduleStore(init.archive, {
      publishStreakLimit: this.options.publishStreakLimit,
      logger: this.#logger,
    });
    this.calendar = new WeekCalendar({ clock: init.clock, offset: init.weekOffset });
  }

  /**
   * Builds an engine from persisted state.
   *
   * Saved shifts and bartenders are restored one at a time; an entry the
   * catalog or the constraint store rejects is logged and skipped.
   */
  static fromStore(
    store: EngineStore,
    init: Omit<SchedulingEngineInit, "constraints" | "shifts" | "archive"> = {},
  ): SchedulingEngine {
    const engine = new SchedulingEngine({ ...init, archive: store.loadArchive() });
    for (const [label, active] of Object.entries(store.loadShifts())) {
      engine.#restore("shift", label, () => engine.shifts.add(label, active));
    }
    for (const [name, constraints] of Object.entries(store.loadConstraints())) {
      engine.#restore("bartender", name, () => engine.workers.add(name, constraints));
    }
    return engine;
  }

  save(store: EngineStore): void {
    store.saveConstraints(this.workers.toJSON());
    store.saveShifts(this.shifts.toJSON());
    store.saveArchive(this.published.toJSON());
  }

  // ==========================================================================
  // Viewed week
  // ==========================================================================

  /** ISO start date of the viewed week. */
  get weekKey(): string {
    return this.calendar.currentKey();
  }

  /** Whether the viewed week is already published. */
  isPublished(): boolean {
    return this.published.has(this.weekKey);
  }

  /**
   * Builds the viewed week, or restores it if it has been published.
   */
  generate(): WeekSchedule {
    const result = generateWeek({
      weekStart: this.calendar.current(),
      shifts: this.shifts.activeShifts(),
      workers: this.workers.entries(),
      archive: this.published.snapshot(),
      random: this.#random,
      options: this.options,
      logger: this.#logger,
    });
    this.#schedule = result.schedule;
    this.#reasons = result.reasons;
    this.#week = this.weekKey;
    return this.schedule();
  }

  nextWeek(): WeekSchedule {
    this.calendar.advance();
    return this.generate();
  }

  previousWeek(): WeekSchedule {
    this.calendar.previous();
    return this.generate();
  }

  currentWeek(): WeekSchedule {
    this.calendar.reset();
    return this.generate();
  }

  /** A copy of the viewed week's assignments. */
  schedule(): WeekSchedule {
    return copySchedule(this.#ensureGenerated());
  }

  unassignedReasons(): UnassignedReasons {
    this.#ensureGenerated();
    return { ...this.#reasons };
  }

  /**
   * Slots held per bartender in the viewed week. Every known bartender is
   * listed, with zero if they hold nothing.
   */
  shiftLoads(): ShiftLoad {
    return countLoads(this.#ensureGenerated(), this.workers.names());
  }

  summary(): WeekSummary {
    const schedule = this.#ensureGenerated();
    const cells = Object.values(schedule).flatMap((row) => Object.values(row));
    const unassigned = cells.filter((worker) => worker === UNASSIGNED).length;
    return {
      week: this.weekKey,
      published: this.isPublished(),
      slots: cells.length,
      assigned: cells.length - unassigned,
      unassigned,
    };
  }

  /** Number of slots a fully generated week has. */
  expectedSlots(): number {
    return DAYS_PER_WEEK * this.shifts.activeShifts().length;
  }

  /**
   * Consecutive Saturday weeks per bartender up to the viewed week.
   *
   * With `includeCurrent`, the viewed week counts too, unless it lies in
   * the future or is already part of the published history.
   */
  saturdayStreaks(includeCurrent = false): SaturdayStreaks {
    const useCurrent = includeCurrent && !this.calendar.isFuture() && !this.isPublished();
    return computeSaturdayStreaks({
      archive: this.published.snapshot(),
      workers: this.workers.names(),
      viewedWeekStart: this.calendar.current(),
      current: useCurrent ? this.#ensureGenerated() : undefined,
      logger: this.#logger,
    });
  }

  /** Constraint and rest problems in the viewed week. */
  audit(): AuditViolation[] {
    return auditWeek(
      this.#ensureGenerated(),
      new Map(this.workers.entries()),
      this.options.minRestHours,
    );
  }

  // ==========================================================================
  // Manual edits
  // ==========================================================================

  /**
   * Exchanges two slots in the viewed week. Swapping the same pair again
   * undoes it.
   */
  swap(first: SlotRef, second: SlotRef): void {
    swapSlots(this.#editable(), first, second);

    const a = this.#reasonKey(first);
    const b = this.#reasonKey(second);
    const reasonA = this.#reasons[a];
    const reasonB = this.#reasons[b];
    delete this.#reasons[a];
    delete this.#reasons[b];
    if (reasonB !== undefined) this.#reasons[a] = reasonB;
    if (reasonA !== undefined) this.#reasons[b] = reasonA;

    this.#logger.debug("Swapped slots", { week: this.weekKey, first, second });
  }

  /**
   * Puts a bartender in a slot regardless of their constraints or rest.
   * Use {@link audit} to see what the override breaks.
   */
  assignOverride(worker: string, slot: SlotRef): void {
    const previous = overrideSlot(this.#editable(), worker, slot);
    const key = this.#reasonKey(slot);
    if (worker.trim() === UNASSIGNED) this.#reasons[key] = "Cleared by manual override";
    else delete this.#reasons[key];

    this.#logger.debug("Override assignment", { week: this.weekKey, slot, worker, previous });
  }

  // ==========================================================================
  // Publishing
  // ==========================================================================

  /**
   * Publishes the viewed week.
   *
   * @throws PublishBlockedError when a bartender would reach the Saturday
   * streak limit
   */
  publish(): string {
    const schedule = this.#ensureGenerated();
    return this.published.publish(this.calendar.current(), schedule, this.workers.names());
  }

  #ensureGenerated(): WeekSchedule {
    if (this.#week !== this.weekKey) this.generate();
    return this.#schedule;
  }

  #editable(): WeekSchedule {
    const schedule = this.#ensureGenerated();
    if (this.isPublished()) {
      throw new ValidationError(`Week of ${this.weekKey} is published and cannot be edited`);
    }
    return schedule;
  }

  #restore(kind: "shift" | "bartender", key: string, load: () => unknown): void {
    try {
      load();
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      this.#logger.warn(`Skipping saved ${kind}: ${error.message}`, { [kind]: key });
    }
  }

  #reasonKey(slot: SlotRef): string {
    const day = dayNameFromLabel(slot.day);
    if (!day) throw new ValidationError(`No day "${slot.day}" in this week`);
    return slotKey(day, slot.shift);
  }
}
