import type { InvalidReason } from "./types";

export type ErrorCode =
  | "DetectionAmbiguous"
  | "UnsupportedType"
  | "ConversionUnavailable"
  | "ConversionFailed"
  | "ArchiveToolMissing"
  | "ArchiveCorrupt"
  | "ValidationFailed"
  | "InvalidPageRange"
  | "InvalidOptions"
  | "TaskAlreadyRunning"
  | "TaskCancelled"
  | "MergeError";

export type MergeFailure =
  | "SourceUnavailable"
  | "WriteFailed"
  | "EncryptionFailed"
  | "CompressionFailed"
  | "NothingToMerge";

/** Plain, serializable shape of an error as it travels in task events. */
export type ErrorInfo = {
  code: ErrorCode | "Unexpected";
  message: string;
  reason?: string;
  documentRef?: string;
};

export class MergerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  toInfo(): ErrorInfo {
    return { code: this.code, message: this.message };
  }
}

export class DetectionAmbiguousError extends MergerError {
  constructor(label: string) {
    super("DetectionAmbiguous", `Cannot tell what kind of document "${label}" is.`);
  }
}

export class UnsupportedTypeError extends MergerError {
  constructor(label: string) {
    super("UnsupportedType", `"${label}" is not a PDF, Word, EPUB or archive file.`);
  }
}

export class ConversionUnavailableError extends MergerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ConversionUnavailable", message, options);
  }
}

export class ConversionFailedError extends MergerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ConversionFailed", message, options);
  }
}

export class ArchiveToolMissingError extends MergerError {
  constructor(tool: string, options?: { cause?: unknown }) {
    super("ArchiveToolMissing", `RAR extraction needs "${tool}" on the execution path.`, options);
  }
}

export class ArchiveCorruptError extends MergerError {
  constructor(label: string, detail: string, options?: { cause?: unknown }) {
    super("ArchiveCorrupt", `Cannot open archive "${label}" (${detail})`, options);
  }
}

export class ValidationFailedError extends MergerError {
  readonly reason: InvalidReason;

  constructor(label: string, reason: InvalidReason, options?: { cause?: unknown }) {
    super("ValidationFailed", `"${label}" is not usable: ${reason}`, options);
    this.reason = reason;
  }

  override toInfo(): ErrorInfo {
    return { ...super.toInfo(), reason: this.reason };
  }
}

export class InvalidPageRangeError extends MergerError {
  constructor(message: string) {
    super("InvalidPageRange", message);
  }
}

export class InvalidOptionsError extends MergerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("InvalidOptions", `Invalid settings: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class TaskAlreadyRunningError extends MergerError {
  constructor(message: string) {
    super("TaskAlreadyRunning", message);
  }
}

export class TaskCancelledError extends MergerError {
  constructor() {
    super("TaskCancelled", "Task was cancelled.");
  }
}

export class MergeError extends MergerError {
  readonly failure: MergeFailure;
  readonly documentRef?: string;

  constructor(failure: MergeFailure, message: string, options?: { documentRef?: string; cause?: unknown }) {
    super("MergeError", message, options);
    this.failure = failure;
    this.documentRef = options?.documentRef;
  }

  override toInfo(): ErrorInfo {
    const info: ErrorInfo = { ...super.toInfo(), reason: this.failure };
    if (this.documentRef) info.documentRef = this.documentRef;
    return info;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof MergerError) return err.toInfo();
  return { code: "Unexpected", message: errorMessage(err) };
}

/** Node's fs/child_process errors carry a string `code` such as ENOENT. */
export function systemErrorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}
