import { HOURS_PER_DAY } from "./datetime.utils.js";
import { ValidationError } from "./errors.js";
import type { ShiftCatalogDocument, ShiftDefinition } from "./types.js";

const SHIFT_LABEL = /^\s*(\d{1,2})\s*-\s*(\d{1,2})\s*$/;

/**
 * Parses a `"start-end"` shift label into hours.
 *
 * An end hour earlier than the start hour means the shift runs past
 * midnight, so 24 is added to it.
 *
 * @example
 * ```typescript
 * parseShiftLabel("8-16"); // { start: 8, end: 16 }
 * parseShiftLabel("16-1"); // { start: 16, end: 25 }
 * ```
 *
 * @throws ValidationError unless the label is two hours (0-24) joined by `-`
 */
export function parseShiftLabel(label: string): { start: number; end: number } {
  const match = SHIFT_LABEL.exec(label);
  if (!match) {
    throw new ValidationError(`Invalid shift "${label}": expected "start-end", e.g. "8-16"`);
  }

  const start = Number(match[1]);
  let end = Number(match[2]);
  if (start > HOURS_PER_DAY || end > HOURS_PER_DAY) {
    throw new ValidationError(`Invalid shift "${label}": hours must be between 0 and 24`);
  }
  if (start === end) {
    throw new ValidationError(`Invalid shift "${label}": start and end are the same hour`);
  }
  if (end < start) end += HOURS_PER_DAY;

  return { start, end };
}

/**
 * Canonical form of a shift label: `" 16 - 1 "` becomes `"16-1"`.
 */
export function normalizeShiftLabel(label: string): string {
  parseShiftLabel(label);
  const [, start, end] = SHIFT_LABEL.exec(label) ?? [];
  return `${Number(start)}-${Number(end)}`;
}

/**
 * Like {@link normalizeShiftLabel}, but hands back the trimmed input when it
 * does not parse.
 */
export function tryNormalizeShiftLabel(label: string): string {
  try {
    return normalizeShiftLabel(label);
  } catch (error) {
    if (error instanceof ValidationError) return label.trim();
    throw error;
  }
}

/**
 * The set of known shift labels and whether each is currently scheduled.
 *
 * @category Shifts
 */
export class ShiftCatalog {
  #shifts = new Map<string, boolean>();
  #active: ShiftDefinition[] | undefined;

  constructor(document: ShiftCatalogDocument = {}) {
    for (const [label, active] of Object.entries(document)) {
      this.add(label, active);
    }
  }

  add(label: string, active = true): string {
    const canonical = normalizeShiftLabel(label);
    if (this.#shifts.has(canonical)) {
      throw new ValidationError(`Shift "${canonical}" already exists`);
    }
    this.#shifts.set(canonical, active);
    this.#active = undefined;
    return canonical;
  }

  remove(label: string): void {
    const canonical = this.#require(label);
    this.#shifts.delete(canonical);
    this.#active = undefined;
  }

  setActive(label: string, active: boolean): void {
    const canonical = this.#require(label);
    this.#shifts.set(canonical, active);
    this.#active = undefined;
  }

  has(label: string): boolean {
    return this.#shifts.has(label);
  }

  labels(): string[] {
    return [...this.#shifts.keys()];
  }

  /**
   * Active shifts ordered by start hour. Re-parsed after every change to
   * the catalog.
   */
  activeShifts(): ShiftDefinition[] {
    if (!this.#active) {
      this.#active = [...this.#shifts]
        .filter(([, active]) => active)
        .map(([label, active]) => {
          const { start, end } = parseShiftLabel(label);
          return { label, active, startHour: start, endHour: end };
        })
        .toSorted((a, b) => a.startHour - b.startHour || a.endHour - b.endHour);
    }
    return this.#active;
  }

  toJSON(): ShiftCatalogDocument {
    return Object.fromEntries(this.#shifts);
  }

  #require(label: string): string {
    const canonical = tryNormalizeShiftLabel(label);
    if (!this.#shifts.has(canonical)) {
      throw new ValidationError(`Unknown shift "${label}"`);
    }
    return canonical;
  }
}
