import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import sqlite3 from "sqlite3";
import { parseAliases, SqliteReferenceStore } from "./store.js";

function run(db: sqlite3.Database, sql: string, params: Array<string | number | null> = []): Promise<void> {
  return new Promise((resolve, reject) => {
    db.run(sql, params, (err: Error | null) => (err ? reject(err) : resolve()));
  });
}

function closeDb(db: sqlite3.Database): Promise<void> {
  return new Promise((resolve, reject) => db.close((err) => (err ? reject(err) : resolve())));
}

function openWritable(file: string): Promise<sqlite3.Database> {
  return new Promise((resolve, reject) => {
    const db = new sqlite3.Database(file, (err) => (err ? reject(err) : resolve(db)));
  });
}

describe("parseAliases", () => {
  it("reads JSON arrays", () => {
    expect(parseAliases('["Purple Rain (live)", "PR"]')).toEqual(["Purple Rain (live)", "PR"]);
  });

  it("reads pipe-separated text", () => {
    expect(parseAliases("Baby I'm A Star | Star")).toEqual(["Baby I'm A Star", "Star"]);
  });

  it("returns nothing for empty input", () => {
    expect(parseAliases(null)).toEqual([]);
    expect(parseAliases("  ")).toEqual([]);
  });

  it("treats malformed JSON as plain text", () => {
    expect(parseAliases("[unclosed")).toEqual(["[unclosed"]);
  });
});

describe("SqliteReferenceStore", () => {
  let tempDir: string;
  let store: SqliteReferenceStore;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "tapetag-reference-test-"));
    const file = path.join(tempDir, "reference.sqlite");
    const db = await openWritable(file);
    await run(
      db,
      `CREATE TABLE recordings (
        id INTEGER PRIMARY KEY, title TEXT NOT NULL, aliases TEXT, date TEXT, venue TEXT,
        city TEXT, duration_seconds REAL, source_type TEXT, speed_variance INTEGER, notes TEXT)`
    );
    await run(db, "INSERT INTO recordings VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)", [
      1, "Purple Rain", '["Purple Rain (live)"]', "1983-08-03", "First Avenue", "Minneapolis", 296, "SBD", 0, null,
    ]);
    await run(db, "INSERT INTO recordings VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)", [
      2, "Computer Blue", null, "1983-08-03", "First Avenue", "Minneapolis", 240, "SBD", 1, "runs fast",
    ]);
    await run(db, "INSERT INTO recordings VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)", [
      3, "Electric Intercourse", null, "1982-11-20", "Met Center", "Bloomington", null, "AUD", 0, null,
    ]);
    await closeDb(db);

    store = await SqliteReferenceStore.open(file);
  });

  afterAll(async () => {
    await store.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("finds rows by title words", async () => {
    const rows = await store.findCandidates({ title: "Purple Rain" });
    expect(rows.map((r) => r.id)).toEqual([1]);
    expect(rows[0]).toEqual({
      id: 1,
      title: "Purple Rain",
      aliases: ["Purple Rain (live)"],
      date: "1983-08-03",
      venue: "First Avenue",
      city: "Minneapolis",
      durationSeconds: 296,
      sourceType: "SBD",
      speedVariance: false,
      notes: null,
    });
  });

  it("finds rows by year", async () => {
    const rows = await store.findCandidates({ date: "1983" });
    expect(rows.map((r) => r.id)).toEqual([1, 2]);
    expect(rows[1].speedVariance).toBe(true);
  });

  it("finds rows by venue words", async () => {
    const rows = await store.findCandidates({ venue: "Met Center" });
    expect(rows.map((r) => r.id)).toEqual([3]);
  });

  it("returns nothing without hints", async () => {
    await expect(store.findCandidates({})).resolves.toEqual([]);
  });

  it("fails to open a missing database", async () => {
    await expect(SqliteReferenceStore.open(path.join(tempDir, "missing.sqlite"))).rejects.toThrow(
      "Failed to open reference database"
    );
  });
});
