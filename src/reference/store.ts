import sqlite3 from "sqlite3";
import { z } from "zod";
import type { EvidenceHints } from "../evidence/types.js";
import type { ReferenceRecording, ReferenceStore } from "./types.js";
import { normalizeText } from "../matching/similarity.js";
import { logger } from "../utils/logger.js";

type SqlParam = string | number;

const rowSchema = z.object({
  id: z.number(),
  title: z.string(),
  aliases: z.string().nullable(),
  date: z.string().nullable(),
  venue: z.string().nullable(),
  city: z.string().nullable(),
  duration_seconds: z.number().nullable(),
  source_type: z.string().nullable(),
  speed_variance: z.union([z.number(), z.boolean()]).nullable(),
  notes: z.string().nullable(),
});

type RecordingRow = z.infer<typeof rowSchema>;

const MAX_ROWS = 200;

/** Aliases are stored either as a JSON array or pipe-separated text. */
export function parseAliases(raw: string | null): string[] {
  if (!raw || !raw.trim()) return [];
  const text = raw.trim();
  if (text.startsWith("[")) {
    const parsed = z.array(z.string()).safeParse(parseJson(text));
    if (parsed.success) return parsed.data.filter((a) => a.trim());
  }
  return text
    .split("|")
    .map((a) => a.trim())
    .filter(Boolean);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function toRecording(row: RecordingRow): ReferenceRecording {
  return {
    id: row.id,
    title: row.title,
    aliases: parseAliases(row.aliases),
    date: row.date,
    venue: row.venue,
    city: row.city,
    durationSeconds: row.duration_seconds,
    sourceType: row.source_type,
    speedVariance: Boolean(row.speed_variance),
    notes: row.notes,
  };
}

/**
 * SQLite-backed reference store. Opened read-only; shared by every file
 * pipeline in a batch.
 */
export class SqliteReferenceStore implements ReferenceStore {
  private constructor(private readonly db: sqlite3.Database) {}

  static open(filename: string): Promise<SqliteReferenceStore> {
    return new Promise((resolve, reject) => {
      const db = new sqlite3.Database(filename, sqlite3.OPEN_READONLY, (err) => {
        if (err) {
          reject(new Error(`Failed to open reference database ${filename}: ${err.message}`));
        } else {
          resolve(new SqliteReferenceStore(db));
        }
      });
    });
  }

  async findCandidates(hints: EvidenceHints): Promise<ReferenceRecording[]> {
    const clauses: string[] = [];
    const params: SqlParam[] = [];

    const year = hints.date?.match(/^\d{4}/)?.[0];
    if (year) {
      clauses.push("date LIKE ?");
      params.push(`${year}%`);
    }
    for (const word of significantWords(hints.title)) {
      clauses.push("(lower(title) LIKE ? OR lower(aliases) LIKE ?)");
      params.push(`%${word}%`, `%${word}%`);
    }
    for (const word of significantWords(hints.venue)) {
      clauses.push("lower(venue) LIKE ?");
      params.push(`%${word}%`);
    }

    if (clauses.length === 0) return [];

    const sql =
      "SELECT id, title, aliases, date, venue, city, duration_seconds, source_type, speed_variance, notes " +
      `FROM recordings WHERE ${clauses.join(" OR ")} ORDER BY id LIMIT ${MAX_ROWS}`;

    const rows = await this.all(sql, params);
    const recordings: ReferenceRecording[] = [];
    for (const row of rows) {
      const parsed = rowSchema.safeParse(row);
      if (parsed.success) {
        recordings.push(toRecording(parsed.data));
      } else {
        logger.debug(`Skipping malformed reference row: ${parsed.error.issues[0]?.message}`);
      }
    }
    return recordings;
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private all(sql: string, params: SqlParam[]): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: unknown[]) => {
        if (err) {
          reject(new Error(`Reference query failed: ${err.message}`));
        } else {
          resolve(rows);
        }
      });
    });
  }
}

/** Words of three or more characters, for LIKE pre-filtering */
function significantWords(text: string | undefined): string[] {
  if (!text) return [];
  return normalizeText(text)
    .split(" ")
    .filter((w) => w.length >= 3);
}
