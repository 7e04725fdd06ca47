import { z } from "zod";
import { SOURCE_TYPE_CODES, isSourceTypeCode } from "../evidence/types.js";
import { MAX_SEGMENT_LENGTH } from "./template.js";

export const REQUIRED_TAGS = ["TITLE", "ARTIST"] as const;

const SEGMENT_PATTERN = /^[A-Za-z0-9 \-_()[\]]+$/;
const TAG_KEY_PATTERN = /^[A-Z][A-Z0-9_]*$/;
const DATE_PATTERN = /^\d{4}(-\d{2}-\d{2})?$/;

const CHARSET_MESSAGE = "has characters outside A-Z a-z 0-9 space - _ ( ) [ ]";

function checkSegment(
  segment: string,
  ctx: z.RefinementCtx,
  label: string,
  maxLength = MAX_SEGMENT_LENGTH
): void {
  if (!SEGMENT_PATTERN.test(segment)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} ${CHARSET_MESSAGE}` });
  } else if (segment !== segment.trim()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} has leading or trailing spaces` });
  } else if (/ {2,}/.test(segment)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} has consecutive spaces` });
  }
  if (segment.length > maxLength) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `${label} is longer than ${maxLength} characters`,
    });
  }
}

function checkDirectory(directory: string, ctx: z.RefinementCtx): void {
  if (directory === "") return;
  if (/^([/\\]|[A-Za-z]:([/\\]|$))/.test(directory)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "absolute directory" });
    return;
  }
  if (directory.includes("\\")) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "contains a backslash" });
    return;
  }
  for (const segment of directory.split("/")) {
    if (segment === ".." || segment === ".") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `contains a "${segment}" segment` });
    } else if (segment === "") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "contains an empty segment" });
    } else {
      checkSegment(segment, ctx, `segment "${segment}"`);
    }
  }
}

/** The extension is appended later, so it counts against the name's length. */
function checkFilename(filename: string, ctx: z.RefinementCtx, extension: string): void {
  if (filename === "") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "is empty" });
    return;
  }
  if (/[/\\]/.test(filename)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "contains a path separator" });
    return;
  }
  if (filename.includes("..")) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'contains ".."' });
    return;
  }
  checkSegment(filename, ctx, "name", MAX_SEGMENT_LENGTH - extension.length);
}

const tagValue = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

const tagsSchema = z
  .record(tagValue)
  .transform((tags) =>
    Object.fromEntries(
      Object.entries(tags)
        .filter(([, value]) => value !== "")
        .map(([key, value]) => [key.toUpperCase(), value])
    )
  )
  .superRefine((tags, ctx) => {
    for (const key of REQUIRED_TAGS) {
      if (!tags[key]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "required tag is missing" });
      }
    }
    for (const key of Object.keys(tags)) {
      if (!TAG_KEY_PATTERN.test(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "invalid tag key" });
      }
    }
    if (tags.SOURCE !== undefined && !isSourceTypeCode(tags.SOURCE)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SOURCE"],
        message: `"${tags.SOURCE}" is not one of ${SOURCE_TYPE_CODES.join("/")}`,
      });
    }
    if (tags.DATE !== undefined && !DATE_PATTERN.test(tags.DATE)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATE"],
        message: `"${tags.DATE}" is not YYYY-MM-DD or YYYY`,
      });
    }
  });

/**
 * Schema for normalizer output, bound to the configured categories and the
 * extension (".flac") the filename will carry.
 */
export function createNormalizationSchema(categories: readonly string[], extension = "") {
  return z.object({
    tags: tagsSchema,
    category: z
      .string()
      .refine(
        (category) => categories.includes(category),
        (category) => ({ message: `"${category}" is not a configured category` })
      ),
    directory: z.string().superRefine(checkDirectory),
    filename: z.string().superRefine((filename, ctx) => checkFilename(filename, ctx, extension)),
    notes: z.array(z.string()).default([]),
    confidence: z.number().min(0).max(1),
  });
}

export type NormalizationOutput = z.infer<ReturnType<typeof createNormalizationSchema>>;

export type NormalizationResult =
  | { ok: true; output: NormalizationOutput }
  | { ok: false; violations: string[] };

/**
 * Validate untrusted normalizer output. Violations read
 * "<field path>: <failed check>".
 */
export function validateNormalization(
  raw: unknown,
  categories: readonly string[],
  extension = ""
): NormalizationResult {
  const result = createNormalizationSchema(categories, extension).safeParse(raw);
  if (result.success) {
    return { ok: true, output: result.data };
  }
  return {
    ok: false,
    violations: result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    ),
  };
}
