import { resolve } from "node:path";
import { z } from "zod";
import { InvalidOptionsError } from "./errors";
import type { PresetRegistry } from "./presets";
import type { MetadataField, OutputOptions } from "./types";

export const METADATA_LIMITS: Record<MetadataField, number> = {
  title: 200,
  author: 100,
  subject: 500,
  keywords: 1000,
};

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const LONE_SURROGATE = /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/;

const metadataText = (field: MetadataField) =>
  z
    .string()
    .max(METADATA_LIMITS[field], `${field} is limited to ${METADATA_LIMITS[field]} characters`)
    .refine((v) => !CONTROL_CHARS.test(v), `${field} contains control characters`)
    .refine((v) => !LONE_SURROGATE.test(v), `${field} is not valid Unicode`)
    .optional();

export const MetadataSchema = z
  .object({
    title: metadataText("title"),
    author: metadataText("author"),
    subject: metadataText("subject"),
    keywords: metadataText("keywords"),
  })
  .strict();

export const CompressionLevelSchema = z.enum(["none", "fast", "normal", "high", "maximum"]);

export const BookmarkModeSchema = z.enum(["per-document", "none"]);

export const OutputOptionsSchema = z.object({
  outputPath: z.string().min(1, "an output path is required"),
  /** Supplies compression and bookmarks wherever they are not given explicitly. */
  preset: z.string().min(1).optional(),
  compressionLevel: CompressionLevelSchema.optional(),
  // Commas separate mupdf's write options, so they cannot appear inside a password.
  password: z
    .string()
    .min(1, "password must not be empty")
    .refine((v) => !v.includes(","), "password must not contain commas")
    .optional(),
  metadata: MetadataSchema.default({}),
  bookmarks: BookmarkModeSchema.optional(),
});

export type OutputOptionsInput = z.input<typeof OutputOptionsSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}

/** Validates caller input; the output path comes back absolute. */
export function parseOutputOptions(input: unknown, presets?: PresetRegistry): OutputOptions {
  const parsed = OutputOptionsSchema.safeParse(input);
  if (!parsed.success) throw new InvalidOptionsError(formatIssues(parsed.error));
  const { preset: presetId, compressionLevel, bookmarks, ...rest } = parsed.data;
  const preset = presetId === undefined ? undefined : presets?.get(presetId);
  if (presetId !== undefined && !preset) throw new InvalidOptionsError([`preset: unknown preset "${presetId}"`]);
  return {
    ...rest,
    outputPath: resolve(rest.outputPath),
    compressionLevel: compressionLevel ?? preset?.compressionLevel ?? "normal",
    bookmarks: bookmarks ?? preset?.bookmarks ?? "per-document",
  };
}

const CONTROL_RUNS = /[\u0000-\u001f\u007f]+/g;
const LONE_SURROGATES = new RegExp(LONE_SURROGATE.source, "g");

/** Turns text found in an existing file into a value the metadata rules accept. */
export function sanitizeMetadataText(field: MetadataField, text: string): string {
  const clean = text.replace(CONTROL_RUNS, " ").replace(LONE_SURROGATES, "\ufffd").trim();
  // Cutting at the limit must not leave half a surrogate pair behind.
  return clean.slice(0, METADATA_LIMITS[field]).replace(/[\ud800-\udbff]$/, "");
}

