/**
 * JSON file persistence for bartenders, shifts and published weeks.
 *
 * Reads never fail: a missing or unreadable file is logged and loads as an
 * empty document. Anything that was in an unreadable file is therefore
 * dropped on the next save.
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type * as z from "zod";
import { StorePathsSchema, type StorePaths, type StorePathsInput } from "./config.js";
import { PersistenceError } from "./errors.js";
import type { Logger } from "./logger.js";
import { consoleLogger } from "./logger.js";
import {
  ArchiveDocumentSchema,
  ConstraintsDocumentSchema,
  ShiftCatalogDocumentSchema,
  type ArchiveDocument,
  type ConstraintsDocument,
  type ShiftCatalogDocument,
} from "./types.js";

/**
 * Everything the engine needs from storage.
 *
 * @category Persistence
 */
export interface EngineStore {
  loadConstraints(): ConstraintsDocument;
  loadShifts(): ShiftCatalogDocument;
  loadArchive(): ArchiveDocument;
  saveConstraints(document: ConstraintsDocument): void;
  saveShifts(document: ShiftCatalogDocument): void;
  saveArchive(document: ArchiveDocument): void;
}

/**
 * Reads and validates one JSON document.
 *
 * @throws PersistenceError when the file is missing, not JSON, or does not
 * match `schema`
 */
export function readJsonDocument<T extends z.ZodType>(file: string, schema: T): z.output<T> {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (error) {
    throw new PersistenceError(`Cannot read ${file}`, file, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PersistenceError(`${file} is not valid JSON`, file, { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new PersistenceError(
      `${file} has unexpected content${where}: ${issue?.message ?? "invalid"}`,
      file,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

/**
 * Writes a JSON document, replacing the file in one step.
 */
export function writeJsonDocument(file: string, document: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const temp = `${file}.tmp`;
  fs.writeFileSync(temp, `${JSON.stringify(document, null, 2)}\n`, "utf8");
  fs.renameSync(temp, file);
}

/**
 * {@link EngineStore} backed by three JSON files in one directory.
 *
 * @example
 * ```typescript
 * const store = new JsonFileStore("./data");
 * const engine = SchedulingEngine.fromStore(store);
 * ```
 *
 * @category Persistence
 */
export class JsonFileStore implements EngineStore {
  readonly paths: StorePaths;
  #logger: Logger;

  constructor(dataDir: string, options: { paths?: StorePathsInput; logger?: Logger } = {}) {
    const names = StorePathsSchema.parse(options.paths ?? {});
    this.paths = {
      constraints: path.resolve(dataDir, names.constraints),
      shifts: path.resolve(dataDir, names.shifts),
      archive: path.resolve(dataDir, names.archive),
    };
    this.#logger = options.logger ?? consoleLogger;
  }

  loadConstraints(): ConstraintsDocument {
    return this.#load(this.paths.constraints, ConstraintsDocumentSchema);
  }

  loadShifts(): ShiftCatalogDocument {
    return this.#load(this.paths.shifts, ShiftCatalogDocumentSchema);
  }

  loadArchive(): ArchiveDocument {
    return this.#load(this.paths.archive, ArchiveDocumentSchema);
  }

  saveConstraints(document: ConstraintsDocument): void {
    writeJsonDocument(this.paths.constraints, document);
  }

  saveShifts(document: ShiftCatalogDocument): void {
    writeJsonDocument(this.paths.shifts, document);
  }

  saveArchive(document: ArchiveDocument): void {
    writeJsonDocument(this.paths.archive, document);
  }

  #load<T extends z.ZodType>(file: string, schema: T): z.output<T> {
    if (!fs.existsSync(file)) {
      this.#logger.warn("No saved data, starting empty", { file });
      return schema.parse({});
    }
    try {
      return readJsonDocument(file, schema);
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      this.#logger.warn(`${error.message}; starting empty`, { file });
      return schema.parse({});
    }
  }
}
