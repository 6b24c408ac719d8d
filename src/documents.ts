import { basename } from "node:path";
import { fitsWithin } from "./engine/pageRange";
import type { Logger } from "./logger";
import type { Document, DocumentOrigin, ItemOutcome } from "./types";
import type { DocumentDelta, DocumentDraft, DocumentPatch } from "./worker/messages";

function uid() {
  return `doc_${Math.random().toString(16).slice(2)}_${Date.now().toString(16)}`;
}

/** A freshly ingested document: nothing detected, converted or validated yet. */
export function createDraft(sourcePath: string, init: { label?: string; origin?: DocumentOrigin } = {}): DocumentDraft {
  return {
    id: uid(),
    sourcePath,
    label: init.label ?? basename(sourcePath),
    origin: init.origin,
    detectedType: "unknown",
    conversionState: "pending",
    validation: { status: "unchecked" },
    selectedRange: [],
    preserveBookmarks: true,
  };
}

export type Eligibility = { eligible: true } | { eligible: false; reason: string };

/** Whether a document may go into a merge, and the reason it is skipped otherwise. */
export function eligibility(doc: Readonly<Document>): Eligibility {
  if (doc.failure) return { eligible: false, reason: doc.failure.code };
  switch (doc.validation.status) {
    case "unchecked":
      return { eligible: false, reason: "NotValidated" };
    case "invalid":
      return { eligible: false, reason: doc.validation.reason };
    case "valid":
      if (!doc.resolvedPdfPath) return { eligible: false, reason: "NotValidated" };
      if (!fitsWithin(doc.selectedRange, doc.validation.pageCount)) return { eligible: false, reason: "InvalidPageRange" };
      return { eligible: true };
  }
}

export function skippedOutcome(doc: Readonly<Document>, reason: string): ItemOutcome {
  return { documentId: doc.id, label: doc.label, status: "skipped", reason };
}

/** Detached copy; callers can hold it across later deltas without seeing torn state. */
function freeze(doc: Document): Readonly<Document> {
  return Object.freeze({
    ...doc,
    origin: doc.origin && { ...doc.origin },
    validation: { ...doc.validation },
    selectedRange: doc.selectedRange.map((iv) => ({ ...iv })),
    failure: doc.failure && { ...doc.failure },
  });
}

/**
 * The canonical, ordered document list. Only the control side touches it; task
 * results arrive as deltas through `apply`. `order` is always 0..N-1 in list order.
 */
export class DocumentList {
  private items: Document[] = [];

  constructor(private readonly logger?: Logger) {}

  get size() {
    return this.items.length;
  }

  /** Frozen copies in merge order. */
  snapshot(): readonly Readonly<Document>[] {
    return Object.freeze(this.items.map(freeze));
  }

  get(id: string): Readonly<Document> | undefined {
    const doc = this.items.find((d) => d.id === id);
    return doc && freeze(doc);
  }

  has(id: string) {
    return this.items.some((d) => d.id === id);
  }

  add(drafts: readonly DocumentDraft[]) {
    for (const d of drafts) this.items.push({ ...d, order: this.items.length });
    this.renumber();
  }

  /** Swaps one document (a folder or archive placeholder) for the documents it expanded to. */
  replace(id: string, drafts: readonly DocumentDraft[]): boolean {
    const at = this.items.findIndex((d) => d.id === id);
    if (at < 0) return false;
    this.items.splice(at, 1, ...drafts.map((d) => ({ ...d, order: 0 })));
    this.renumber();
    return true;
  }

  update(id: string, patch: DocumentPatch): boolean {
    const at = this.items.findIndex((d) => d.id === id);
    if (at < 0) return false;
    this.items[at] = { ...this.items[at], ...patch };
    return true;
  }

  remove(id: string): boolean {
    const before = this.items.length;
    this.items = this.items.filter((d) => d.id !== id);
    this.renumber();
    return this.items.length !== before;
  }

  clear() {
    this.items = [];
  }

  /** Moves a document to `toIndex`, clamped to the list bounds. */
  move(id: string, toIndex: number): boolean {
    const from = this.items.findIndex((d) => d.id === id);
    if (from < 0) return false;
    const [doc] = this.items.splice(from, 1);
    const to = Math.max(0, Math.min(Math.trunc(toIndex), this.items.length));
    this.items.splice(to, 0, doc);
    this.renumber();
    return true;
  }

  /** Deltas for documents removed in the meantime are dropped. */
  apply(delta: DocumentDelta): boolean {
    const applied =
      delta.kind === "update" ? this.update(delta.documentId, delta.patch) : this.replace(delta.documentId, delta.documents);
    if (!applied) this.logger?.debug("Dropped update for a removed document", { documentId: delta.documentId });
    return applied;
  }

  private renumber() {
    this.items.forEach((d, i) => {
      d.order = i;
    });
  }
}
