import { z } from "zod";
import { InvalidOptionsError } from "./errors";
import { BookmarkModeSchema, CompressionLevelSchema, formatIssues } from "./options";
import type { CompressionLevel } from "./types";

export const QualityPresetSchema = z
  .object({
    name: z.string().trim().min(1, "a preset needs a name").max(60),
    description: z.string().max(200).default(""),
    compressionLevel: CompressionLevelSchema,
    bookmarks: BookmarkModeSchema.default("per-document"),
  })
  .strict();

export type QualityPreset = z.output<typeof QualityPresetSchema>;
export type QualityPresetInput = z.input<typeof QualityPresetSchema>;

const PRESET_ID = /^[a-z][a-z0-9-]{0,31}$/;

const BUILT_IN = new Map<string, QualityPreset>(
  Object.entries({
    web: { name: "Web Optimized", description: "Small file size for web sharing", compressionLevel: "maximum", bookmarks: "per-document" },
    print: { name: "Print Quality", description: "High quality for printing", compressionLevel: "normal", bookmarks: "per-document" },
    archive: { name: "Archive", description: "Maximum compression for storage", compressionLevel: "maximum", bookmarks: "per-document" },
    screen: { name: "Screen Reading", description: "Optimized for digital reading", compressionLevel: "normal", bookmarks: "per-document" },
    draft: { name: "Draft Quality", description: "Fast processing, no bookmarks", compressionLevel: "fast", bookmarks: "none" },
    ebook: { name: "E-book Format", description: "Optimized for e-readers", compressionLevel: "maximum", bookmarks: "per-document" },
  } satisfies Record<string, QualityPreset>),
);

const USE_CASES: Record<string, string> = {
  web: "web",
  print: "print",
  archive: "archive",
  screen: "screen",
  mobile: "screen",
  ebook: "ebook",
  fast: "draft",
  draft: "draft",
};

/** Named output settings. Built-in presets are fixed; custom ones live as long as the registry. */
export class PresetRegistry {
  private readonly custom = new Map<string, QualityPreset>();

  get(id: string): QualityPreset | undefined {
    return BUILT_IN.get(id) ?? this.custom.get(id);
  }

  ids(): string[] {
    return [...BUILT_IN.keys(), ...this.custom.keys()];
  }

  isBuiltIn(id: string): boolean {
    return BUILT_IN.has(id);
  }

  define(id: string, input: unknown): QualityPreset {
    if (!PRESET_ID.test(id)) throw new InvalidOptionsError([`preset id "${id}" must be lowercase letters, digits or dashes`]);
    if (this.get(id)) throw new InvalidOptionsError([`preset "${id}" already exists`]);
    const parsed = QualityPresetSchema.safeParse(input);
    if (!parsed.success) throw new InvalidOptionsError(formatIssues(parsed.error));
    this.custom.set(id, parsed.data);
    return parsed.data;
  }

  /** Built-in presets cannot be removed. */
  remove(id: string): boolean {
    return this.custom.delete(id);
  }

  /** Unknown use cases fall back to "print", the balanced preset. */
  recommend(useCase: string): string {
    return USE_CASES[useCase.toLowerCase()] ?? "print";
  }
}

/** Expected output size as a share of the input, from typical results per level. */
const SIZE_RATIO: Record<CompressionLevel, { min: number; max: number }> = {
  none: { min: 1, max: 1 },
  fast: { min: 0.8, max: 0.9 },
  normal: { min: 0.7, max: 0.85 },
  high: { min: 0.6, max: 0.8 },
  maximum: { min: 0.5, max: 0.75 },
};

export type SizeEstimate = {
  bytes: number;
  description: string;
};

/**
 * Rough output size for `originalBytes` of input at `level`. Long documents share more
 * fonts and images, so past ten pages the estimate drops by at least 5% and half a percent
 * per page, down to half.
 */
export function estimateOutputSize(originalBytes: number, pageCount: number, level: CompressionLevel): SizeEstimate {
  const { min, max } = SIZE_RATIO[level];
  let bytes = Math.round(originalBytes * ((min + max) / 2));
  if (level !== "none" && pageCount > 10) {
    bytes = Math.round(bytes * Math.max(0.5, Math.min(0.95, 1 - (pageCount - 10) * 0.005)));
  }
  const pct = (r: number) => `${Math.round(r * 100)}%`;
  const description = min === max ? `~${pct(min)} of original` : `~${pct(min)}-${pct(max)} of original`;
  return { bytes, description };
}
