/**
 * Per-bartender constraint records and the free-text constraint parser.
 *
 * @module
 */

import { ConstraintParseError, ValidationError } from "./errors.js";
import { tryNormalizeShiftLabel } from "./shifts.js";
import {
  DAY_NAMES,
  DEFAULT_MAX_SHIFTS,
  UNASSIGNED,
  WorkerConstraintsSchema,
  defaultConstraints,
  type ConstraintsDocument,
  type DayName,
  type WorkerConstraints,
} from "./types.js";

// ============================================================================
// Free-text parsing
// ============================================================================

/**
 * A single change read from one line of constraint text.
 */
export type ConstraintUpdate =
  | { kind: "restricted-day"; day: DayName }
  | { kind: "restricted-shift"; shift: string }
  | { kind: "allowed-shifts"; shifts: string[] }
  | { kind: "max-shifts"; value: number };

/**
 * Something about a line the caller may want to show.
 *
 * - `ambiguous`: the line matched more than one rule; the first rule won
 * - `max-shifts-fallback`: the "up to N shifts" number was unreadable
 * - `unknown-day`: "doesn't work" was followed by something that is not a day
 * - `unrecognized`: no rule matched the line
 */
export type ConstraintIssue =
  | { kind: "ambiguous"; line: string; rules: string[] }
  | { kind: "max-shifts-fallback"; line: string; error: ConstraintParseError }
  | { kind: "unknown-day"; line: string; value: string }
  | { kind: "unrecognized"; line: string };

export interface ConstraintParseResult {
  constraints: WorkerConstraints;
  updates: ConstraintUpdate[];
  issues: ConstraintIssue[];
}

interface MatcherContext {
  line: string;
  /** Text following the matched keyword, trimmed. */
  remainder: string;
  defaultMaxShifts: number;
  issues: ConstraintIssue[];
}

interface ConstraintMatcher {
  name: string;
  matches(lowerLine: string): number;
  parse(context: MatcherContext): ConstraintUpdate | undefined;
}

function keyword(word: string): (lowerLine: string) => number {
  return (lowerLine) => {
    const index = lowerLine.indexOf(word);
    return index < 0 ? -1 : index + word.length;
  };
}

/**
 * Matchers in priority order. A line is handled by the first one that
 * matches.
 */
const MATCHERS: readonly ConstraintMatcher[] = [
  {
    name: "doesn't work",
    matches: keyword("doesn't work"),
    parse({ line, remainder, issues }) {
      const value = remainder.replace(/^on\s+/i, "");
      const capitalized = value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
      const day = DAY_NAMES.find((name) => name === capitalized);
      if (!day) {
        issues.push({ kind: "unknown-day", line, value });
        return undefined;
      }
      return { kind: "restricted-day", day };
    },
  },
  {
    name: "cannot work",
    matches: keyword("cannot work"),
    parse({ remainder }) {
      if (!remainder) return undefined;
      return { kind: "restricted-shift", shift: tryNormalizeShiftLabel(remainder) };
    },
  },
  {
    name: "can only work",
    matches: keyword("can only work"),
    parse({ remainder }) {
      const shifts = remainder
        .split(/,|\s+or\s+/i)
        .map((token) => token.trim())
        .filter((token) => token.length > 0)
        .map(tryNormalizeShiftLabel);
      return shifts.length > 0 ? { kind: "allowed-shifts", shifts } : undefined;
    },
  },
  {
    name: "up to ... shifts",
    matches(lowerLine) {
      const start = lowerLine.indexOf("up to");
      return start >= 0 && lowerLine.indexOf("shifts", start) >= 0 ? start + "up to".length : -1;
    },
    parse({ line, remainder, defaultMaxShifts, issues }) {
      const token = remainder.slice(0, remainder.toLowerCase().indexOf("shifts")).trim();
      const value = /^\d+$/.test(token) ? Number(token) : Number.NaN;
      if (Number.isInteger(value) && value > 0) {
        return { kind: "max-shifts", value };
      }
      issues.push({
        kind: "max-shifts-fallback",
        line,
        error: new ConstraintParseError(
          `Could not read a shift count from "${token}", using ${defaultMaxShifts}`,
          line,
        ),
      });
      return { kind: "max-shifts", value: defaultMaxShifts };
    },
  },
];

function addUnique<T>(list: T[], ...values: T[]): void {
  for (const value of values) {
    if (!list.includes(value)) list.push(value);
  }
}

/**
 * Applies one update to a constraint record in place.
 */
export function applyConstraintUpdate(
  constraints: WorkerConstraints,
  update: ConstraintUpdate,
): void {
  switch (update.kind) {
    case "restricted-day":
      addUnique(constraints.restrictedDays, update.day);
      break;
    case "restricted-shift":
      addUnique(constraints.restrictedShifts, update.shift);
      break;
    case "allowed-shifts":
      addUnique(constraints.allowedShifts, ...update.shifts);
      break;
    case "max-shifts":
      constraints.maxShifts = update.value;
      break;
  }
}

/**
 * Reads a constraint record from free text, one rule per line.
 *
 * @example
 * ```typescript
 * parseConstraintText("Doesn't work Friday\nCan only work 8-16 or 16-1\nUp to 3 shifts");
 * // constraints: {
 * //   allowedShifts: ["8-16", "16-1"],
 * //   restrictedDays: ["Friday"],
 * //   restrictedShifts: [],
 * //   maxShifts: 3,
 * // }
 * ```
 */
export function parseConstraintText(
  text: string,
  options: { defaultMaxShifts?: number } = {},
): ConstraintParseResult {
  const defaultMaxShifts = options.defaultMaxShifts ?? DEFAULT_MAX_SHIFTS;
  const constraints = defaultConstraints(defaultMaxShifts);
  const updates: ConstraintUpdate[] = [];
  const issues: ConstraintIssue[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const lower = line.toLowerCase();
    const hits = MATCHERS.map((matcher) => ({ matcher, end: matcher.matches(lower) })).filter(
      (hit) => hit.end >= 0,
    );

    const first = hits[0];
    if (!first) {
      issues.push({ kind: "unrecognized", line });
      continue;
    }
    if (hits.length > 1) {
      issues.push({ kind: "ambiguous", line, rules: hits.map((hit) => hit.matcher.name) });
    }

    const update = first.matcher.parse({
      line,
      remainder: line.slice(first.end).trim(),
      defaultMaxShifts,
      issues,
    });
    if (update) {
      applyConstraintUpdate(constraints, update);
      updates.push(update);
    }
  }

  return { constraints, updates, issues };
}

// ============================================================================
// Store
// ============================================================================

function cloneConstraints(constraints: WorkerConstraints): WorkerConstraints {
  return {
    allowedShifts: [...constraints.allowedShifts],
    restrictedDays: [...constraints.restrictedDays],
    restrictedShifts: [...constraints.restrictedShifts],
    maxShifts: constraints.maxShifts,
  };
}

/** Shift labels in catalog form, without repeats. */
function canonicalShifts(labels: readonly string[]): string[] {
  return [...new Set(labels.map((label) => tryNormalizeShiftLabel(label)))];
}

/**
 * Owns the constraint record of every bartender.
 *
 * Every failing operation throws {@link ValidationError} and leaves the
 * store unchanged.
 *
 * @category Constraints
 */
export class ConstraintStore {
  #workers = new Map<string, WorkerConstraints>();
  #defaultMaxShifts: number;

  constructor(document: ConstraintsDocument = {}, options: { defaultMaxShifts?: number } = {}) {
    this.#defaultMaxShifts = options.defaultMaxShifts ?? DEFAULT_MAX_SHIFTS;
    for (const [name, constraints] of Object.entries(document)) {
      this.add(name, constraints);
    }
  }

  has(name: string): boolean {
    return this.#workers.has(name);
  }

  names(): string[] {
    return [...this.#workers.keys()];
  }

  get size(): number {
    return this.#workers.size;
  }

  /** Returns a copy of the bartender's constraints. */
  get(name: string): WorkerConstraints {
    return cloneConstraints(this.#require(name));
  }

  entries(): [string, WorkerConstraints][] {
    return [...this.#workers].map(([name, constraints]) => [name, cloneConstraints(constraints)]);
  }

  add(name: string, constraints?: Partial<WorkerConstraints>): string {
    const trimmed = this.#validName(name);
    if (this.#workers.has(trimmed)) {
      throw new ValidationError(`Bartender "${trimmed}" already exists`);
    }
    this.#workers.set(trimmed, this.#validConstraints(constraints));
    return trimmed;
  }

  set(name: string, constraints: Partial<WorkerConstraints>): void {
    this.#require(name);
    this.#workers.set(name, this.#validConstraints(constraints));
  }

  remove(name: string): void {
    this.#require(name);
    this.#workers.delete(name);
  }

  rename(from: string, to: string): string {
    const constraints = this.#require(from);
    const target = this.#validName(to);
    if (target === from) return target;
    if (this.#workers.has(target)) {
      throw new ValidationError(`Bartender "${target}" already exists`);
    }

    // Rebuild so the renamed bartender keeps its position.
    this.#workers = new Map(
      [...this.#workers].map(([name, value]) => (name === from ? [target, constraints] : [name, value])),
    );
    return target;
  }

  /**
   * Replaces a bartender's constraints with those parsed from `text`.
   */
  applyText(name: string, text: string): ConstraintParseResult {
    this.#require(name);
    const result = parseConstraintText(text, { defaultMaxShifts: this.#defaultMaxShifts });
    this.#workers.set(name, cloneConstraints(result.constraints));
    return result;
  }

  toJSON(): ConstraintsDocument {
    return Object.fromEntries(this.entries());
  }

  #require(name: string): WorkerConstraints {
    const constraints = this.#workers.get(name);
    if (!constraints) {
      throw new ValidationError(`Unknown bartender "${name}"`);
    }
    return constraints;
  }

  #validName(name: string): string {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError("Bartender name cannot be empty");
    }
    if (trimmed === UNASSIGNED) {
      throw new ValidationError(`"${UNASSIGNED}" is reserved and cannot be a bartender name`);
    }
    return trimmed;
  }

  #validConstraints(constraints: Partial<WorkerConstraints> = {}): WorkerConstraints {
    const parsed = WorkerConstraintsSchema.safeParse({
      maxShifts: this.#defaultMaxShifts,
      ...constraints,
    });
    if (!parsed.success) {
      throw new ValidationError(`Invalid constraints: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return {
      ...cloneConstraints(parsed.data),
      allowedShifts: canonicalShifts(parsed.data.allowedShifts),
      restrictedShifts: canonicalShifts(parsed.data.restrictedShifts),
    };
  }
}
