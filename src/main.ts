import { mkdtemp, rm, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { loadConfig, type MergerConfig } from "./config";
import { createDefaultConverters } from "./converters";
import { DocumentList, createDraft, eligibility, skippedOutcome } from "./documents";
import type { ConverterRegistry } from "./engine/convert";
import { readMetadata } from "./engine/metadata";
import { parsePageRange, selectedPageCount } from "./engine/pageRange";
import { InvalidOptionsError } from "./errors";
import { Logger } from "./logger";
import { parseOutputOptions } from "./options";
import { PresetRegistry, estimateOutputSize, type SizeEstimate } from "./presets";
import { parseProfile, serializeProfile, toProfile, type ProfileOptions } from "./profile";
import type { CompressionLevel, Document, ItemOutcome, Metadata, MergeSource, TaskHandle } from "./types";
import { ingestTask, mergeTask, validateTask, type EngineDeps, type IngestItem } from "./worker/engine";
import { TaskChannel, type ProgressEvent, type TerminalEvent, type WorkerEvent } from "./worker/messages";
import { TaskScheduler } from "./worker/scheduler";

export type MergerCoreOptions = {
  config?: MergerConfig;
  logger?: Logger;
  converters?: ConverterRegistry;
};

export type EventListener = (event: WorkerEvent) => void;

/**
 * Control-side owner of the document list. Tasks run in the background and report
 * through a channel; their deltas reach the list only when the channel is drained
 * (`drain`, `poll`, `wait`).
 */
export class MergerCore {
  readonly config: MergerConfig;
  readonly presets = new PresetRegistry();
  private readonly logger: Logger;
  private readonly list: DocumentList;
  private readonly channel = new TaskChannel();
  private readonly scheduler: TaskScheduler;
  private readonly deps: EngineDeps;
  private readonly listeners = new Set<EventListener>();
  private workDir?: Promise<string>;

  constructor(options: MergerCoreOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.logger = options.logger ?? new Logger({ level: this.config.logLevel });
    this.list = new DocumentList(this.logger.child("documents"));
    this.scheduler = new TaskScheduler(this.channel, { maxWorkers: this.config.maxWorkers, logger: this.logger });
    this.deps = {
      config: this.config,
      converters: options.converters ?? createDefaultConverters(this.config),
      workDir: () => this.ensureWorkDir(),
    };
  }

  get documents(): readonly Readonly<Document>[] {
    return this.list.snapshot();
  }

  get(id: string): Readonly<Document> | undefined {
    return this.list.get(id);
  }

  /** Files, folders and archives, appended in the given order. */
  addPaths(paths: readonly string[]): TaskHandle {
    const drafts = paths.map((p) => createDraft(resolve(p)));
    const items: IngestItem[] = drafts.map((d) => ({
      documentId: d.id,
      path: d.sourcePath,
      label: d.label,
      selectedRange: d.selectedRange,
    }));
    const handle = this.scheduler.submit("ingest", `Add ${paths.length} item(s)`, ingestTask(items, this.deps));
    this.list.add(drafts);
    this.logger.info(`Adding ${paths.length} item(s)`, { taskId: handle.id });
    return handle;
  }

  /** Detects, converts and validates documents that were restored from a profile. */
  processPending(): TaskHandle {
    const items: IngestItem[] = this.list
      .snapshot()
      .filter((d) => d.conversionState === "pending" && !d.failure)
      .map((d) => ({
        documentId: d.id,
        path: d.sourcePath,
        label: d.label,
        member: d.origin !== undefined,
        password: d.password,
        selectedRange: d.selectedRange,
      }));
    return this.scheduler.submit("ingest", `Process ${items.length} document(s)`, ingestTask(items, this.deps));
  }

  /** Re-checks every document that has a PDF to check. */
  validateAll(): TaskHandle {
    const items = this.list
      .snapshot()
      .filter((d) => d.resolvedPdfPath !== undefined)
      .map((d) => ({
        documentId: d.id,
        label: d.label,
        pdfPath: d.resolvedPdfPath ?? d.sourcePath,
        password: d.password,
        selectedRange: d.selectedRange,
      }));
    return this.scheduler.submit("validate", `Validate ${items.length} document(s)`, validateTask(items));
  }

  remove(id: string): boolean {
    const removed = this.list.remove(id);
    if (removed) this.logger.info("Removed document", { documentId: id });
    return removed;
  }

  clear() {
    this.list.clear();
    this.logger.info("Cleared the document list");
  }

  move(id: string, toIndex: number): boolean {
    return this.list.move(id, toIndex);
  }

  /** "1,3,5-7"; blank selects every page. Checked against the page count once it is known. */
  setPageRange(id: string, text: string) {
    const doc = this.require(id);
    const selectedRange = parsePageRange(text, doc.pageCount);
    const failure = doc.failure?.code === "InvalidPageRange" ? undefined : doc.failure;
    this.list.update(id, { selectedRange, failure });
  }

  setPreserveBookmarks(id: string, preserve: boolean) {
    this.require(id);
    this.list.update(id, { preserveBookmarks: preserve });
  }

  /** The document goes back to unchecked; run `validateAll` to open it with the new password. */
  setPassword(id: string, password: string | undefined) {
    const doc = this.require(id);
    const patch = doc.resolvedPdfPath ? { validation: { status: "unchecked" as const }, pageCount: undefined } : {};
    this.list.update(id, { ...patch, password: password || undefined });
  }

  /** Snapshots the eligible documents in order and merges them in the background. */
  merge(options: unknown): TaskHandle {
    const output = parseOutputOptions(options, this.presets);
    const sources: MergeSource[] = [];
    const skipped: ItemOutcome[] = [];
    for (const doc of this.list.snapshot()) {
      const verdict = eligibility(doc);
      if (!verdict.eligible || doc.validation.status !== "valid" || !doc.resolvedPdfPath) {
        skipped.push(skippedOutcome(doc, verdict.eligible ? "NotValidated" : verdict.reason));
        continue;
      }
      sources.push({
        id: doc.id,
        label: doc.label,
        pdfPath: doc.resolvedPdfPath,
        pageCount: doc.validation.pageCount,
        selectedRange: doc.selectedRange,
        preserveBookmarks: doc.preserveBookmarks,
        password: doc.password,
      });
    }
    const job = { documents: Object.freeze(sources), options: output };
    const handle = this.scheduler.submit("merge", `Merge into ${output.outputPath}`, mergeTask(job, skipped, this.deps));
    this.logger.info(`Merging ${sources.length} document(s)`, { taskId: handle.id, skipped: skipped.length });
    return handle;
  }

  /** Metadata of a resolved document, cleaned for use as output metadata. */
  async readMetadata(id: string): Promise<Metadata> {
    const doc = this.require(id);
    if (!doc.resolvedPdfPath) throw new InvalidOptionsError([`document ${id} has no PDF to read yet`]);
    return readMetadata(doc.resolvedPdfPath, doc.password);
  }

  /** Expected output size for the documents a merge would take right now. */
  async estimateOutputSize(level: CompressionLevel): Promise<SizeEstimate> {
    let bytes = 0;
    let pages = 0;
    for (const doc of this.list.snapshot()) {
      if (!eligibility(doc).eligible || doc.validation.status !== "valid" || !doc.resolvedPdfPath) continue;
      const total = doc.validation.pageCount;
      const selected = selectedPageCount(doc.selectedRange, total);
      const { size } = await stat(doc.resolvedPdfPath);
      bytes += (size * selected) / total;
      pages += selected;
    }
    return estimateOutputSize(bytes, pages, level);
  }

  poll(handle: TaskHandle): ProgressEvent | TerminalEvent | undefined {
    this.drain();
    return this.scheduler.poll(handle);
  }

  cancel(handle: TaskHandle): boolean {
    return this.scheduler.cancel(handle);
  }

  async wait(handle: TaskHandle): Promise<TerminalEvent> {
    const terminal = await this.scheduler.wait(handle);
    this.drain();
    return terminal;
  }

  /** Applies pending deltas to the list and hands every event to the listeners. */
  drain(): WorkerEvent[] {
    const events = this.channel.drain();
    for (const event of events) {
      if (event.type === "delta") this.list.apply(event.delta);
      for (const listener of this.listeners) listener(event);
    }
    return events;
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  toProfile(options: Partial<ProfileOptions> = {}): string {
    return serializeProfile(toProfile(this.list.snapshot(), options));
  }

  /** Replaces the list with the profile's documents. Nothing is detected or validated yet. */
  loadProfile(json: string): ProfileOptions {
    const profile = parseProfile(json);
    if (this.scheduler.busy) throw new InvalidOptionsError(["a profile cannot be loaded while tasks are running"]);
    this.list.clear();
    this.list.add(
      profile.documents.map((d) => ({
        ...createDraft(d.sourcePath),
        selectedRange: d.selectedRange,
        preserveBookmarks: d.preserveBookmarks,
      })),
    );
    this.logger.info(`Loaded a profile with ${profile.documents.length} document(s)`);
    return profile.options;
  }

  /** Cancels running tasks, empties the list and removes scratch files. */
  async dispose() {
    await this.scheduler.shutdown();
    this.drain();
    this.list.clear();
    this.listeners.clear();
    const dir = this.workDir;
    this.workDir = undefined;
    const path = dir && (await dir.catch(() => undefined));
    if (path) await rm(path, { recursive: true, force: true });
  }

  private require(id: string): Readonly<Document> {
    const doc = this.list.get(id);
    if (!doc) throw new InvalidOptionsError([`unknown document ${id}`]);
    return doc;
  }

  private ensureWorkDir(): Promise<string> {
    if (!this.workDir) {
      this.workDir = mkdtemp(join(this.config.tempDir, "pdfmerge-")).catch((err: unknown) => {
        this.workDir = undefined;
        throw err;
      });
    }
    return this.workDir;
  }
}

export { loadConfig, type MergerConfig } from "./config";
export { ConverterRegistry, type Converter } from "./engine/convert";
export * from "./errors";
export { Logger, ConsoleSink, MemorySink, createSilentLogger, type LogEntry, type LogSink } from "./logger";
export type { OutputOptionsInput } from "./options";
export { PresetRegistry, type QualityPreset, type SizeEstimate } from "./presets";
export type * from "./types";
export type { TerminalEvent, ProgressEvent, WorkerEvent } from "./worker/messages";
