import { mkdtemp, stat } from "node:fs/promises";
import { basename, join } from "node:path";
import type { MergerConfig } from "../config";
import { createDraft } from "../documents";
import { extract } from "../engine/archive";
import { convert, type ConverterRegistry } from "../engine/convert";
import { inspect, isArchive, listSupported } from "../engine/detect";
import { mergeDocuments } from "../engine/merge";
import { fitsWithin } from "../engine/pageRange";
import { validate } from "../engine/validate";
import {
  DetectionAmbiguousError,
  InvalidPageRangeError,
  MergerError,
  TaskCancelledError,
  UnsupportedTypeError,
  ValidationFailedError,
  toErrorInfo,
} from "../errors";
import type { ItemOutcome, MergeJob, PageInterval, TaskSummary } from "../types";
import type { DocumentDraft, TaskPort } from "./messages";
import type { TaskContext, TaskOperation } from "./scheduler";

export type EngineDeps = {
  config: MergerConfig;
  converters: ConverterRegistry;
  /** Scratch directory owned by the core; removed on dispose. */
  workDir: () => Promise<string>;
};

/** One document an ingest task still has to resolve. */
export type IngestItem = {
  documentId: string;
  path: string;
  label: string;
  /** Set for archive members, which are never expanded again. */
  member?: boolean;
  password?: string;
  selectedRange: readonly PageInterval[];
};

export type ValidateItem = {
  documentId: string;
  label: string;
  pdfPath: string;
  password?: string;
  selectedRange: readonly PageInterval[];
};

/** Conversion backends missing or inputs of a kind nobody handles: the file is left out, not broken. */
const SKIP_CODES = new Set(["ConversionUnavailable", "UnsupportedType", "DetectionAmbiguous"]);

export function summarize(items: ItemOutcome[], extra: Partial<TaskSummary> = {}): TaskSummary {
  return {
    succeeded: items.filter((i) => i.status === "succeeded").length,
    failed: items.filter((i) => i.status === "failed").length,
    skipped: items.filter((i) => i.status === "skipped").length,
    items,
    ...extra,
  };
}

function itemFromDraft(draft: DocumentDraft, member: boolean): IngestItem {
  return {
    documentId: draft.id,
    path: draft.sourcePath,
    label: draft.label,
    member,
    selectedRange: draft.selectedRange,
  };
}

function rangeFailure(range: readonly PageInterval[], pageCount: number) {
  if (fitsWithin(range, pageCount)) return undefined;
  return toErrorInfo(new InvalidPageRangeError(`Selected pages exceed the ${pageCount} page(s) of the document.`));
}

/** Nothing was ever resolved, so validation stays unchecked and the failure carries the reason. */
function missing(item: IngestItem, { port, logger }: TaskContext): ItemOutcome {
  logger.warn(`"${item.label}" does not exist`, { documentId: item.documentId, path: item.path });
  port.postUpdate(item.documentId, { failure: toErrorInfo(new ValidationFailedError(item.label, "NotFound")) });
  return { documentId: item.documentId, label: item.label, status: "failed", reason: "NotFound" };
}

async function expandFolder(item: IngestItem, port: TaskPort, deps: EngineDeps): Promise<IngestItem[]> {
  const files = await listSupported(item.path, { recursive: deps.config.recursiveFolders });
  const drafts = files.map((f) => createDraft(f));
  port.postReplace(item.documentId, drafts);
  return drafts.map((d) => itemFromDraft(d, false));
}

async function expandArchive(
  item: IngestItem,
  type: "zip" | "rar",
  ctx: TaskContext,
  deps: EngineDeps,
  outcomes: ItemOutcome[],
): Promise<IngestItem[]> {
  const { port, token, logger } = ctx;
  const destDir = await mkdtemp(join(await deps.workDir(), "archive-"));
  const drafts: DocumentDraft[] = [];
  const archiveName = basename(item.path);
  try {
    for await (const entry of extract(item.path, type, destDir, { unrarPath: deps.config.unrarPath, signal: token.signal })) {
      const label = `${archiveName} › ${entry.name}`;
      if (entry.kind === "skipped") {
        logger.warn(`Skipped archive member ${label}`, { reason: entry.reason });
        outcomes.push({ label, status: "skipped", reason: entry.reason });
        continue;
      }
      drafts.push(createDraft(entry.path, { label, origin: { archivePath: item.path, member: entry.name } }));
    }
  } catch (err) {
    // unrar killed through the token's signal is a cancellation, not a broken archive.
    token.throwIfCancelled();
    if (!(err instanceof MergerError)) throw err;
    const failure = toErrorInfo(err);
    logger.warn(err.message, { documentId: item.documentId });
    port.postUpdate(item.documentId, { detectedType: type, conversionState: "failed", failure });
    outcomes.push({ documentId: item.documentId, label: item.label, status: "failed", reason: failure.code });
    return [];
  }

  port.postReplace(item.documentId, drafts);
  if (drafts.length === 0) {
    outcomes.push({ label: item.label, status: "skipped", reason: "archive holds no PDF documents" });
  }
  logger.info(`Extracted ${drafts.length} PDF(s) from ${archiveName}`);
  return drafts.map((d) => itemFromDraft(d, true));
}

/** Detect, convert and validate one file, reporting every state change as a delta. */
async function resolveFile(
  item: IngestItem,
  ctx: TaskContext,
  deps: EngineDeps,
  detection: Awaited<ReturnType<typeof inspect>>,
): Promise<ItemOutcome> {
  const { port, token, logger } = ctx;
  const { documentId, label } = item;
  const type = detection.type;

  if (type === "unknown" || isArchive(type)) {
    const err = detection.ambiguous ? new DetectionAmbiguousError(label) : new UnsupportedTypeError(label);
    const failure = toErrorInfo(err);
    logger.warn(err.message, { documentId });
    port.postUpdate(documentId, { detectedType: type, conversionState: "failed", failure });
    return { documentId, label, status: "skipped", reason: failure.code };
  }

  let pdfPath = item.path;
  if (type !== "pdf") {
    port.postUpdate(documentId, { detectedType: type, conversionState: "pending" });
    try {
      const outDir = await mkdtemp(join(await deps.workDir(), "convert-"));
      pdfPath = await convert(deps.converters, item.path, type, outDir, token.signal);
    } catch (err) {
      token.throwIfCancelled();
      const failure = toErrorInfo(err);
      logger.warn(`Conversion of "${label}" failed`, { documentId, error: failure });
      port.postUpdate(documentId, { conversionState: "failed", failure });
      return { documentId, label, status: SKIP_CODES.has(failure.code) ? "skipped" : "failed", reason: failure.code };
    }
    logger.debug(`Converted "${label}"`, { documentId, pdfPath });
  }

  const result = await validate(pdfPath, item.password);
  const conversionState = type === "pdf" ? "not-needed" : "converted";
  if (!result.valid) {
    logger.warn(`"${label}" is not usable: ${result.reason}`, { documentId });
    port.postUpdate(documentId, {
      detectedType: type,
      conversionState,
      resolvedPdfPath: pdfPath,
      validation: { status: "invalid", reason: result.reason },
      pageCount: undefined,
      failure: undefined,
    });
    return { documentId, label, status: "failed", reason: result.reason };
  }

  const failure = rangeFailure(item.selectedRange, result.pageCount);
  port.postUpdate(documentId, {
    detectedType: type,
    conversionState,
    resolvedPdfPath: pdfPath,
    validation: { status: "valid", pageCount: result.pageCount },
    pageCount: result.pageCount,
    failure,
  });
  if (failure) return { documentId, label, status: "failed", reason: failure.code };
  logger.info(`"${label}" is ready`, { documentId, pages: result.pageCount });
  return { documentId, label, status: "succeeded" };
}

/**
 * Resolves one work item. Folders and archives push their members to the front of
 * `work`; everything else is detected, converted and validated.
 */
async function ingestOne(
  item: IngestItem,
  work: IngestItem[],
  outcomes: ItemOutcome[],
  ctx: TaskContext,
  deps: EngineDeps,
): Promise<void> {
  const info = await stat(item.path).catch(() => undefined);
  if (!info) {
    outcomes.push(missing(item, ctx));
    return;
  }

  if (info.isDirectory() && !item.member) {
    const folder = await expandFolder(item, ctx.port, deps);
    if (folder.length === 0) outcomes.push({ label: item.label, status: "skipped", reason: "folder holds no supported documents" });
    work.unshift(...folder);
    return;
  }

  const detection = await inspect(item.path);
  if (!item.member && isArchive(detection.type)) {
    work.unshift(...(await expandArchive(item, detection.type, ctx, deps, outcomes)));
    return;
  }

  outcomes.push(await resolveFile(item, ctx, deps, detection));
}

/**
 * Ingest: folders expand to their files, archives to their PDF members, everything
 * else is detected, converted and validated. Expansions keep their place in the list.
 * An error on one item fails that item only; cancellation marks every item not finished.
 */
export function ingestTask(items: IngestItem[], deps: EngineDeps): TaskOperation {
  return async (ctx) => {
    const { port, token, logger } = ctx;
    const work = [...items];
    const outcomes: ItemOutcome[] = [];
    // Expansions count as processed items, so the total never shrinks.
    let processed = 0;
    let current: IngestItem | undefined;

    try {
      while (work.length > 0) {
        token.throwIfCancelled();
        const item = work.shift();
        if (!item) break;
        current = item;
        port.postProgress(processed, processed + work.length + 1, item.label);
        try {
          await ingestOne(item, work, outcomes, ctx, deps);
        } catch (err) {
          token.throwIfCancelled();
          if (err instanceof TaskCancelledError) throw err;
          const failure = toErrorInfo(err);
          logger.error(`Could not add "${item.label}"`, { documentId: item.documentId, error: failure });
          port.postUpdate(item.documentId, { conversionState: "failed", failure });
          outcomes.push({ documentId: item.documentId, label: item.label, status: "failed", reason: failure.code });
        }
        processed++;
        current = undefined;
      }
    } catch (err) {
      if (err instanceof TaskCancelledError) {
        const failure = toErrorInfo(err);
        for (const left of current ? [current, ...work] : work) port.postUpdate(left.documentId, { failure });
      }
      throw err;
    }

    port.postProgress(processed, processed, "Done");
    return summarize(outcomes);
  };
}

/** Re-checks documents that already have a PDF, e.g. after a password or the file changed. */
export function validateTask(items: ValidateItem[]): TaskOperation {
  return async ({ port, token, logger }) => {
    const outcomes: ItemOutcome[] = [];
    for (const [i, item] of items.entries()) {
      token.throwIfCancelled();
      port.postProgress(i, items.length, item.label);
      const { documentId, label } = item;
      const result = await validate(item.pdfPath, item.password);
      if (!result.valid) {
        logger.warn(`"${label}" is not usable: ${result.reason}`, { documentId });
        port.postUpdate(documentId, {
          validation: { status: "invalid", reason: result.reason },
          pageCount: undefined,
          failure: undefined,
        });
        outcomes.push({ documentId, label, status: "failed", reason: result.reason });
        continue;
      }
      const failure = rangeFailure(item.selectedRange, result.pageCount);
      port.postUpdate(documentId, {
        validation: { status: "valid", pageCount: result.pageCount },
        pageCount: result.pageCount,
        failure,
      });
      outcomes.push(
        failure ? { documentId, label, status: "failed", reason: failure.code } : { documentId, label, status: "succeeded" },
      );
    }
    port.postProgress(items.length, items.length, "Done");
    return summarize(outcomes);
  };
}

/** Merge a frozen job. Documents left out at snapshot time come back as skipped items. */
export function mergeTask(job: MergeJob, skipped: ItemOutcome[], deps: Pick<EngineDeps, "config">): TaskOperation {
  return async ({ port, token }) => {
    const result = await mergeDocuments(job, {
      token,
      onProgress: (processed, total, label) => port.postProgress(processed, total, label),
      creator: deps.config.producer,
      producer: deps.config.producer,
    });
    const included = job.documents.map((d): ItemOutcome => ({ documentId: d.id, label: d.label, status: "succeeded" }));
    return summarize([...included, ...skipped], { result });
  };
}
