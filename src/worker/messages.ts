import type { ErrorInfo } from "../errors";
import type { Document, TaskSummary } from "../types";

/** Fields a task may change on a document. Identity and order stay with the control side. */
export type DocumentPatch = Partial<Omit<Document, "id" | "order">>;

/** A document a task creates before the control side has placed it. */
export type DocumentDraft = Omit<Document, "order">;

export type DocumentDelta =
  | { kind: "update"; documentId: string; patch: DocumentPatch }
  | { kind: "replace"; documentId: string; documents: DocumentDraft[] };

export type ProgressEvent = { type: "progress"; taskId: string; processed: number; total: number; label: string };

export type TerminalEvent =
  | { type: "completed"; taskId: string; summary: TaskSummary }
  | { type: "failed"; taskId: string; error: ErrorInfo }
  | { type: "cancelled"; taskId: string };

export type WorkerEvent = ProgressEvent | TerminalEvent | { type: "delta"; taskId: string; delta: DocumentDelta };

export function isTerminal(event: WorkerEvent): event is TerminalEvent {
  return event.type === "completed" || event.type === "failed" || event.type === "cancelled";
}

/** In-process result queue. Tasks post, the control side drains. */
export class TaskChannel {
  private queue: WorkerEvent[] = [];

  post(event: WorkerEvent) {
    this.queue.push(event);
  }

  drain(): WorkerEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  get pending() {
    return this.queue.length;
  }
}

/** A task's end of the channel. Progress that would go backwards is dropped. */
export class TaskPort {
  private processed = 0;
  private latest?: ProgressEvent;

  constructor(
    readonly taskId: string,
    private readonly channel: TaskChannel,
  ) {}

  get lastProgress(): ProgressEvent | undefined {
    return this.latest;
  }

  postProgress(processed: number, total: number, label: string) {
    if (processed < this.processed) return;
    this.processed = processed;
    const msg: ProgressEvent = { type: "progress", taskId: this.taskId, processed, total: Math.max(total, processed), label };
    this.latest = msg;
    this.channel.post(msg);
  }

  postUpdate(documentId: string, patch: DocumentPatch) {
    this.channel.post({ type: "delta", taskId: this.taskId, delta: { kind: "update", documentId, patch } });
  }

  postReplace(documentId: string, documents: DocumentDraft[]) {
    this.channel.post({ type: "delta", taskId: this.taskId, delta: { kind: "replace", documentId, documents } });
  }
}
