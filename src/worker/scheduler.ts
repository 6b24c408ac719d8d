import { TaskAlreadyRunningError, TaskCancelledError, toErrorInfo } from "../errors";
import { Logger } from "../logger";
import type { TaskHandle, TaskKind, TaskSummary } from "../types";
import { CancellationToken } from "./cancellation";
import { TaskChannel, TaskPort, type ProgressEvent, type TerminalEvent } from "./messages";

export type TaskContext = {
  token: CancellationToken;
  port: TaskPort;
  logger: Logger;
};

export type TaskOperation = (ctx: TaskContext) => Promise<TaskSummary>;

class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => {};

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolve = resolve;
    });
  }
}

type TaskRecord = {
  handle: TaskHandle;
  status: "queued" | "running" | "settled";
  operation: TaskOperation;
  token: CancellationToken;
  port: TaskPort;
  terminal?: TerminalEvent;
  settled: Deferred<TerminalEvent>;
  execution?: Promise<void>;
};

function uid() {
  return `task_${Math.random().toString(16).slice(2)}_${Date.now().toString(16)}`;
}

/**
 * Runs ingest, validation and merge operations as background tasks.
 * At most one merge, never alongside anything else; other tasks share a pool of
 * `maxWorkers` and queue in submission order beyond it.
 */
export class TaskScheduler {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly queue: TaskRecord[] = [];
  private readonly running = new Set<TaskRecord>();
  private readonly maxWorkers: number;
  private readonly logger: Logger;

  constructor(
    private readonly channel: TaskChannel,
    options: { maxWorkers?: number; logger?: Logger } = {},
  ) {
    this.maxWorkers = Math.max(1, options.maxWorkers ?? 4);
    this.logger = (options.logger ?? new Logger()).child("scheduler");
  }

  get busy() {
    return this.running.size > 0 || this.queue.length > 0;
  }

  get mergeActive() {
    for (const r of this.running) if (r.handle.kind === "merge") return true;
    return false;
  }

  submit(kind: TaskKind, label: string, operation: TaskOperation): TaskHandle {
    if (kind === "merge" && this.busy) {
      throw new TaskAlreadyRunningError(
        this.mergeActive ? "A merge is already running." : "Wait for the running tasks to finish before merging.",
      );
    }
    if (kind !== "merge" && this.mergeActive) {
      throw new TaskAlreadyRunningError("Documents cannot change while a merge is running.");
    }

    const handle: TaskHandle = { id: uid(), kind, label };
    const record: TaskRecord = {
      handle,
      status: "queued",
      operation,
      token: new CancellationToken(),
      port: new TaskPort(handle.id, this.channel),
      settled: new Deferred<TerminalEvent>(),
    };
    this.tasks.set(handle.id, record);
    this.queue.push(record);
    this.logger.debug(`Queued ${kind} task "${label}"`, { taskId: handle.id });
    this.pump();
    return handle;
  }

  /** Cooperative: a running task stops at its next per-document check. */
  cancel(handle: TaskHandle): boolean {
    const record = this.tasks.get(handle.id);
    if (!record || record.status === "settled") return false;
    record.token.cancel();
    if (record.status === "queued") {
      this.queue.splice(this.queue.indexOf(record), 1);
      this.settle(record, { type: "cancelled", taskId: handle.id });
    }
    this.logger.info(`Cancellation requested for "${handle.label}"`, { taskId: handle.id });
    return true;
  }

  /** Latest known state: the terminal event once there is one, else the newest progress. */
  poll(handle: TaskHandle): ProgressEvent | TerminalEvent | undefined {
    const record = this.tasks.get(handle.id);
    if (!record) return undefined;
    return record.terminal ?? record.port.lastProgress;
  }

  wait(handle: TaskHandle): Promise<TerminalEvent> {
    const record = this.tasks.get(handle.id);
    if (!record) return Promise.reject(new Error(`Unknown task ${handle.id}`));
    return record.settled.promise;
  }

  /** Cancels everything and resolves once every task has settled. */
  async shutdown() {
    const pending = [...this.tasks.values()].filter((r) => r.status !== "settled");
    for (const r of pending) this.cancel(r.handle);
    await Promise.all(pending.map((r) => r.settled.promise));
  }

  private pump() {
    while (this.queue.length > 0 && this.running.size < this.maxWorkers) {
      const next = this.queue[0];
      if (next.handle.kind === "merge" && this.running.size > 0) return;
      this.queue.shift();
      this.running.add(next);
      next.status = "running";
      next.execution = this.execute(next);
    }
  }

  private async execute(record: TaskRecord) {
    const { handle, token, port } = record;
    const logger = this.logger.child(handle.kind);
    logger.info(`Started "${handle.label}"`, { taskId: handle.id });
    let terminal: TerminalEvent;
    try {
      token.throwIfCancelled();
      const summary = await record.operation({ token, port, logger });
      terminal = { type: "completed", taskId: handle.id, summary };
      logger.info(`Completed "${handle.label}"`, {
        taskId: handle.id,
        succeeded: summary.succeeded,
        failed: summary.failed,
        skipped: summary.skipped,
      });
    } catch (err) {
      if (err instanceof TaskCancelledError || token.cancelled) {
        terminal = { type: "cancelled", taskId: handle.id };
        logger.warn(`Cancelled "${handle.label}"`, { taskId: handle.id });
      } else {
        terminal = { type: "failed", taskId: handle.id, error: toErrorInfo(err) };
        logger.error(`Failed "${handle.label}"`, { taskId: handle.id, error: terminal.error });
      }
    }
    this.running.delete(record);
    this.settle(record, terminal);
    this.pump();
  }

  private settle(record: TaskRecord, terminal: TerminalEvent) {
    record.status = "settled";
    record.terminal = terminal;
    this.channel.post(terminal);
    record.settled.resolve(terminal);
  }
}
