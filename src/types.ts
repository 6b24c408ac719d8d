export type DetectedType = "pdf" | "word" | "epub" | "zip" | "rar" | "unknown";

export type ConversionState = "not-needed" | "pending" | "converted" | "failed";

export type InvalidReason = "NotFound" | "Encrypted" | "WrongPassword" | "ZeroPages" | "Corrupt" | "Unreadable";

export type ValidationState =
  | { status: "unchecked" }
  | { status: "valid"; pageCount: number }
  | { status: "invalid"; reason: InvalidReason };

export type ValidationResult =
  | { valid: true; pageCount: number }
  | { valid: false; reason: InvalidReason };

/** Inclusive, 1-based. */
export type PageInterval = { start: number; end: number };

export type DocumentFailure = { code: string; message: string };

export type DocumentOrigin = { archivePath: string; member: string };

export type Document = {
  id: string;
  sourcePath: string;
  label: string;
  origin?: DocumentOrigin;
  detectedType: DetectedType;
  conversionState: ConversionState;
  resolvedPdfPath?: string;
  validation: ValidationState;
  pageCount?: number;
  selectedRange: PageInterval[];
  preserveBookmarks: boolean;
  password?: string;
  failure?: DocumentFailure;
  order: number;
};

export type CompressionLevel = "none" | "fast" | "normal" | "high" | "maximum";

export type MetadataField = "title" | "author" | "subject" | "keywords";

export type Metadata = Partial<Record<MetadataField, string>>;

export type BookmarkMode = "per-document" | "none";

export type OutputOptions = {
  outputPath: string;
  compressionLevel: CompressionLevel;
  password?: string;
  metadata: Metadata;
  bookmarks: BookmarkMode;
};

/** A document as the merge engine borrows it: read-only, already resolved. */
export type MergeSource = {
  id: string;
  label: string;
  pdfPath: string;
  pageCount: number;
  selectedRange: readonly PageInterval[];
  preserveBookmarks: boolean;
  password?: string;
};

export type MergeJob = {
  documents: readonly MergeSource[];
  options: OutputOptions;
};

export type MergeResult = {
  outputPath: string;
  pageCount: number;
  documentCount: number;
};

export type TaskKind = "ingest" | "validate" | "merge";

export type TaskStatus = "queued" | "running" | "done" | "error" | "cancelled";

export type TaskHandle = {
  id: string;
  kind: TaskKind;
  label: string;
};

export type ItemOutcome = {
  documentId?: string;
  label: string;
  status: "succeeded" | "failed" | "skipped";
  reason?: string;
};

export type TaskSummary = {
  succeeded: number;
  failed: number;
  skipped: number;
  items: ItemOutcome[];
  result?: MergeResult;
};
