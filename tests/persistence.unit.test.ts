import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceError } from "../src/errors.js";
import { SchedulingEngine } from "../src/engine.js";
import { JsonFileStore, readJsonDocument } from "../src/persistence.js";
import { silentLogger } from "../src/logger.js";
import { ShiftCatalogDocumentSchema } from "../src/types.js";
import {
  WEEK_KEY,
  constraints,
  fixedClock,
  forbiddenRandom,
  lastPick,
  spyLogger,
} from "./helpers.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "barshift-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("readJsonDocument", () => {
  it("throws a PersistenceError naming the file", () => {
    const file = path.join(dir, "shifts.json");
    fs.writeFileSync(file, '{ "8-16": "yes" }');

    expect(() => readJsonDocument(file, ShiftCatalogDocumentSchema)).toThrow(PersistenceError);
    expect(() => readJsonDocument(file, ShiftCatalogDocumentSchema)).toThrow(/at 8-16/);
  });
});

describe("JsonFileStore", () => {
  it("loads empty documents with a warning when files are missing", () => {
    const logger = spyLogger();
    const store = new JsonFileStore(dir, { logger });

    expect(store.loadConstraints()).toEqual({});
    expect(store.loadShifts()).toEqual({});
    expect(store.loadArchive()).toEqual({});
    expect(logger.warn).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledWith("No saved data, starting empty", {
      file: path.join(dir, "bartenders.json"),
    });
  });

  it("treats malformed JSON as empty", () => {
    const logger = spyLogger();
    const store = new JsonFileStore(dir, { logger });
    fs.writeFileSync(store.paths.archive, "{ not json");

    expect(store.loadArchive()).toEqual({});
    expect(logger.warn).toHaveBeenCalledWith(
      `${store.paths.archive} is not valid JSON; starting empty`,
      { file: store.paths.archive },
    );
  });

  it("treats content of the wrong shape as empty", () => {
    const store = new JsonFileStore(dir, { logger: spyLogger() });
    fs.writeFileSync(store.paths.constraints, JSON.stringify({ Dana: { maxShifts: "five" } }));

    expect(store.loadConstraints()).toEqual({});
  });

  it("fills in missing constraint fields", () => {
    const store = new JsonFileStore(dir, { logger: spyLogger() });
    fs.writeFileSync(store.paths.constraints, JSON.stringify({ Dana: { maxShifts: 3 } }));

    expect(store.loadConstraints()).toEqual({ Dana: constraints({ maxShifts: 3 }) });
  });

  it("round-trips all three documents", () => {
    const store = new JsonFileStore(path.join(dir, "nested"), {
      logger: spyLogger(),
      paths: { archive: "history.json" },
    });
    const document = {
      constraints: { Dana: constraints({ restrictedDays: ["Friday"] }) },
      shifts: { "10-18": true, "18-2": false },
      archive: { "2026-10-18": { "Saturday 2026-10-24": { "18-2": "Dana" } } },
    };

    store.saveConstraints(document.constraints);
    store.saveShifts(document.shifts);
    store.saveArchive(document.archive);

    expect(store.paths.archive).toBe(path.join(dir, "nested", "history.json"));
    expect(store.loadConstraints()).toEqual(document.constraints);
    expect(store.loadShifts()).toEqual(document.shifts);
    expect(store.loadArchive()).toEqual(document.archive);
    expect(fs.existsSync(`${store.paths.archive}.tmp`)).toBe(false);
  });
});

describe("SchedulingEngine with a JsonFileStore", () => {
  it("saves and reloads bartenders, shifts and published weeks", () => {
    const store = new JsonFileStore(dir, { logger: spyLogger() });
    const engine = SchedulingEngine.fromStore(store, {
      clock: fixedClock,
      random: lastPick,
      logger: silentLogger,
    });

    engine.workers.add("Dana");
    engine.shifts.add("18-2");
    engine.publish();
    engine.save(store);

    const reloaded = SchedulingEngine.fromStore(store, {
      clock: fixedClock,
      random: forbiddenRandom,
      logger: silentLogger,
    });

    expect(reloaded.workers.names()).toEqual(["Dana"]);
    expect(reloaded.shifts.toJSON()).toEqual({ "18-2": true });
    expect(reloaded.published.keys()).toEqual([WEEK_KEY]);
    expect(reloaded.schedule()).toEqual(engine.schedule());
  });

  it("skips saved entries the engine rejects", () => {
    const store = new JsonFileStore(dir, { logger: silentLogger });
    fs.writeFileSync(store.paths.shifts, JSON.stringify({ abc: true, "8-16": true, "08-16": false }));
    fs.writeFileSync(store.paths.constraints, JSON.stringify({ Unassigned: {}, "  ": {}, Dana: {} }));
    const logger = spyLogger();

    const engine = SchedulingEngine.fromStore(store, { clock: fixedClock, random: lastPick, logger });

    expect(engine.shifts.toJSON()).toEqual({ "8-16": true });
    expect(engine.workers.names()).toEqual(["Dana"]);
    expect(logger.warn.mock.calls).toEqual([
      ['Skipping saved shift: Invalid shift "abc": expected "start-end", e.g. "8-16"', { shift: "abc" }],
      ['Skipping saved shift: Shift "8-16" already exists', { shift: "08-16" }],
      [
        'Skipping saved bartender: "Unassigned" is reserved and cannot be a bartender name',
        { bartender: "Unassigned" },
      ],
      ["Skipping saved bartender: Bartender name cannot be empty", { bartender: "  " }],
    ]);
  });
});
