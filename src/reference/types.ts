import type { EvidenceHints } from "../evidence/types.js";

/** One known recording in the local reference database */
export interface ReferenceRecording {
  id: number;
  title: string;
  aliases: string[];
  /** ISO-8601 date or year */
  date: string | null;
  venue: string | null;
  city: string | null;
  durationSeconds: number | null;
  sourceType: string | null;
  /** Known to run at a different speed or pitch than the released version */
  speedVariance: boolean;
  notes: string | null;
}

/** Read-only query interface over the reference database */
export interface ReferenceStore {
  /**
   * Coarse, case-insensitive pre-filter on any hint. Callers score the
   * returned rows themselves.
   */
  findCandidates(hints: EvidenceHints): Promise<ReferenceRecording[]>;
  close(): Promise<void>;
}
