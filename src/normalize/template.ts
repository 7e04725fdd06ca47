/** Longest segment (directory name or filename with extension) we produce */
export const MAX_SEGMENT_LENGTH = 255;

/**
 * Render a template by replacing {var} placeholders with values.
 *
 * Supports date formatting with {date:FORMAT} syntax where FORMAT uses:
 *   YYYY = 4-digit year
 *   MM   = 2-digit month
 *   DD   = 2-digit day
 *
 * Examples:
 *   {date}            -> "1983-08-03" (raw value)
 *   {date:YYYY.MM.DD} -> "1983.08.03"
 *
 * Unknown placeholders are left as-is.
 */
export function renderTemplate(
  template: string,
  vars: Record<string, string | number>
): string {
  // Match {var} or {var:format}
  return template.replace(/\{(\w+)(?::([^}]+))?\}/g, (match, key: string, format?: string) => {
    const value = vars[key];
    if (value === undefined) return match;

    // If format is specified and this is a date value, apply date formatting
    if (format && key === "date" && typeof value === "string") {
      return formatDate(value, format);
    }

    return String(value);
  });
}

/**
 * Format a date string (YYYY-MM-DD) using a format pattern.
 * Replaces YYYY, MM, DD tokens with actual values.
 */
export function formatDate(dateStr: string, format: string): string {
  const [year, month, day] = dateStr.split("-");
  if (!year || !month || !day) return dateStr;

  return format
    .replace(/YYYY/g, year)
    .replace(/MM/g, month)
    .replace(/DD/g, day);
}

/**
 * Pad a number to at least `width` digits with leading zeros.
 */
export function zeroPad(n: number, width: number = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * Restrict a value to the path character set: letters, digits, space and
 * - _ ( ) [ ]. Accents are stripped; anything else becomes "_". Runs of
 * spaces collapse and the ends are trimmed.
 */
export function sanitizeSegment(str: string): string {
  return str
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^A-Za-z0-9 \-_()[\]]/g, "_")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Clean up after empty placeholders: drop empty " - " parts and empty
 * brackets, collapse spaces.
 */
export function tidySegment(segment: string): string {
  return segment
    .replace(/\[\s*\]|\(\s*\)/g, "")
    .split(" - ")
    .map((part) => part.trim())
    .filter(Boolean)
    .join(" - ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Template variables, derived from a canonical tag map */
export function templateVars(tags: Readonly<Record<string, string>>): Record<string, string> {
  const date = tags.DATE ?? "";
  const track = Number.parseInt(tags.TRACKNUMBER ?? "", 10);
  const vars: Record<string, string> = {
    title: tags.TITLE ?? "",
    artist: tags.ARTIST ?? "",
    album: tags.ALBUM ?? "",
    date,
    year: date.slice(0, 4),
    city: tags.CITY ?? "",
    venue: tags.VENUE ?? "",
    source: tags.SOURCE ?? "",
    tracknum: Number.isFinite(track) && track > 0 ? zeroPad(track) : "",
  };
  for (const key of Object.keys(vars)) {
    vars[key] = sanitizeSegment(vars[key]);
  }
  return vars;
}

/**
 * Render one segment within `max` characters, shortening the title first
 * and cutting the whole segment only when the other fields alone exceed it.
 */
export function renderSegment(template: string, vars: Record<string, string>, max: number): string {
  const full = tidySegment(renderTemplate(template, vars));
  if (full.length <= max) return full;

  const title = vars.title ?? "";
  const room = max - (full.length - title.length);
  if (room > 0 && template.includes("{title")) {
    const shortened = tidySegment(
      renderTemplate(template, { ...vars, title: title.slice(0, room).trimEnd() })
    );
    if (shortened.length <= max) return shortened;
  }
  return full.slice(0, max).trimEnd();
}

export interface Destination {
  /** Relative to the category root; "" when the template has one segment */
  directory: string;
  /** Without extension */
  filename: string;
}

/**
 * Build the relative destination from a category template. The last "/"
 * segment of the template is the filename; empty directory segments are
 * dropped.
 */
export function buildDestination(
  template: string,
  tags: Readonly<Record<string, string>>,
  extension = ""
): Destination {
  const vars = templateVars(tags);
  const segments = template.split("/");
  const leaf = segments.pop() ?? "";

  const directory = segments
    .map((segment) => renderSegment(segment, vars, MAX_SEGMENT_LENGTH))
    .filter(Boolean)
    .join("/");
  const filename =
    renderSegment(leaf, vars, MAX_SEGMENT_LENGTH - extension.length) || "Untitled";

  return { directory, filename };
}
