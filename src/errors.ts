/**
 * Base class for errors raised by the scheduling engine.
 *
 * @category Errors
 */
export class BarshiftError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "BarshiftError";
    this.code = code;
  }
}

/**
 * Rejected input: a malformed shift label, a duplicate or unknown bartender,
 * a slot that does not exist. Nothing was changed.
 *
 * @category Errors
 */
export class ValidationError extends BarshiftError {
  constructor(message: string) {
    super(message, "VALIDATION");
    this.name = "ValidationError";
  }
}

/**
 * A max-shifts phrase whose number could not be read.
 *
 * Never thrown by the constraint parser; it is attached to the parse result
 * so callers can show it, and the default limit is used instead.
 *
 * @category Errors
 */
export class ConstraintParseError extends BarshiftError {
  public readonly line: string;

  constructor(message: string, line: string) {
    super(message, "CONSTRAINT_PARSE");
    this.name = "ConstraintParseError";
    this.line = line;
  }
}

/**
 * A bartender whose Saturday streak would hit the publish limit.
 */
export interface StreakViolation {
  worker: string;
  streak: number;
}

/**
 * Publishing was refused because it would give one or more bartenders too
 * many consecutive Saturdays. The archive is unchanged.
 *
 * @category Errors
 */
export class PublishBlockedError extends BarshiftError {
  public readonly violators: readonly StreakViolation[];

  constructor(violators: readonly StreakViolation[], limit: number) {
    const names = violators.map((v) => `${v.worker} (${v.streak})`).join(", ");
    super(`Cannot publish: ${limit}+ consecutive Saturdays for ${names}`, "PUBLISH_BLOCKED");
    this.name = "PublishBlockedError";
    this.violators = violators;
  }
}

/**
 * A persisted document could not be read or did not match its schema.
 *
 * @category Errors
 */
export class PersistenceError extends BarshiftError {
  public readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, "PERSISTENCE");
    this.name = "PersistenceError";
    this.path = path;
    if (options && "cause" in options) this.cause = options.cause;
  }
}
