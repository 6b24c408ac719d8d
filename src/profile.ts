import { z } from "zod";
import { InvalidOptionsError, errorMessage } from "./errors";
import { normalizeIntervals } from "./engine/pageRange";
import { BookmarkModeSchema, CompressionLevelSchema, MetadataSchema, formatIssues } from "./options";
import type { BookmarkMode, CompressionLevel, Document, Metadata, PageInterval } from "./types";

const IntervalSchema = z.object({ start: z.number().int().min(1), end: z.number().int().min(1) });

const ProfileSchema = z.object({
  version: z.literal(1),
  documents: z.array(
    z.object({
      sourcePath: z.string().min(1),
      selectedRange: z.array(IntervalSchema).default([]),
      preserveBookmarks: z.boolean().default(true),
      order: z.number().int().min(0),
    }),
  ),
  options: z
    .object({
      compressionLevel: CompressionLevelSchema.default("normal"),
      metadata: MetadataSchema.default({}),
      bookmarks: BookmarkModeSchema.default("per-document"),
      outputPath: z.string().min(1).optional(),
    })
    .default({}),
});

export type ProfileDocument = {
  sourcePath: string;
  selectedRange: PageInterval[];
  preserveBookmarks: boolean;
  order: number;
};

/** Saved settings. Passwords are never part of it. */
export type Profile = {
  version: 1;
  documents: ProfileDocument[];
  options: {
    compressionLevel: CompressionLevel;
    metadata: Metadata;
    bookmarks: BookmarkMode;
    outputPath?: string;
  };
};

export type ProfileOptions = Profile["options"];

export function toProfile(documents: readonly Readonly<Document>[], options: Partial<ProfileOptions> = {}): Profile {
  return {
    version: 1,
    documents: documents.map((d) => ({
      sourcePath: d.sourcePath,
      selectedRange: d.selectedRange.map((iv) => ({ ...iv })),
      preserveBookmarks: d.preserveBookmarks,
      order: d.order,
    })),
    options: {
      compressionLevel: options.compressionLevel ?? "normal",
      metadata: { ...options.metadata },
      bookmarks: options.bookmarks ?? "per-document",
      ...(options.outputPath ? { outputPath: options.outputPath } : {}),
    },
  };
}

export function serializeProfile(profile: Profile): string {
  return JSON.stringify(profile, null, 2);
}

/** Parses and checks a saved profile; documents come back sorted by `order`. */
export function parseProfile(json: string): Profile {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new InvalidOptionsError([`profile is not valid JSON (${errorMessage(err)})`]);
  }
  const parsed = ProfileSchema.safeParse(raw);
  if (!parsed.success) throw new InvalidOptionsError(formatIssues(parsed.error));

  const documents = [...parsed.data.documents]
    .sort((a, b) => a.order - b.order)
    .map((d, i) => ({ ...d, selectedRange: normalizeIntervals(d.selectedRange), order: i }));
  return { version: 1, documents, options: parsed.data.options };
}
