import { describe, expect, it } from "vitest";
import { TaskAlreadyRunningError, ValidationFailedError } from "../errors";
import { createSilentLogger } from "../logger";
import { summarize } from "./engine";
import { TaskChannel } from "./messages";
import { TaskScheduler, type TaskOperation } from "./scheduler";

function gate() {
  let open: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { open, opened };
}

function setup(maxWorkers = 4) {
  const channel = new TaskChannel();
  const { logger, sink } = createSilentLogger();
  return { channel, sink, scheduler: new TaskScheduler(channel, { maxWorkers, logger }) };
}

const done: TaskOperation = async () => summarize([]);

function blockedUntil(g: ReturnType<typeof gate>): TaskOperation {
  return async ({ token }) => {
    await g.opened;
    token.throwIfCancelled();
    return summarize([{ label: "x", status: "succeeded" }]);
  };
}

describe("TaskScheduler", () => {
  it("delivers progress and exactly one completed event", async () => {
    const { channel, scheduler } = setup();
    const handle = scheduler.submit("validate", "check", async ({ port }) => {
      port.postProgress(0, 2, "first");
      port.postProgress(2, 2, "Done");
      return summarize([{ label: "first", status: "succeeded" }]);
    });

    const terminal = await scheduler.wait(handle);

    expect(terminal).toEqual({
      type: "completed",
      taskId: handle.id,
      summary: { succeeded: 1, failed: 0, skipped: 0, items: [{ label: "first", status: "succeeded" }] },
    });
    expect(channel.drain().map((e) => e.type)).toEqual(["progress", "progress", "completed"]);
    expect(scheduler.poll(handle)).toBe(terminal);
  });

  it("shows the latest progress while running", async () => {
    const { scheduler } = setup();
    const g = gate();
    const handle = scheduler.submit("ingest", "add", async ({ port }) => {
      port.postProgress(1, 3, "b.pdf");
      await g.opened;
      return summarize([]);
    });

    expect(scheduler.poll(handle)).toEqual({ type: "progress", taskId: handle.id, processed: 1, total: 3, label: "b.pdf" });
    g.open();
    await scheduler.wait(handle);
  });

  it("turns a thrown error into a failed event", async () => {
    const { scheduler, sink } = setup();
    const handle = scheduler.submit("validate", "check", async () => {
      throw new ValidationFailedError("a.pdf", "Corrupt");
    });

    expect(await scheduler.wait(handle)).toEqual({
      type: "failed",
      taskId: handle.id,
      error: { code: "ValidationFailed", message: '"a.pdf" is not usable: Corrupt', reason: "Corrupt" },
    });
    expect(sink.find("error", /Failed "check"/)).toBeDefined();
  });

  it("cancels a running task at its next check", async () => {
    const { scheduler } = setup();
    const g = gate();
    const handle = scheduler.submit("ingest", "slow", blockedUntil(g));

    expect(scheduler.cancel(handle)).toBe(true);
    g.open();

    expect(await scheduler.wait(handle)).toEqual({ type: "cancelled", taskId: handle.id });
    expect(scheduler.cancel(handle)).toBe(false);
  });

  it("cancels a queued task without running it", async () => {
    const { scheduler } = setup(1);
    const g = gate();
    let ran = false;
    const first = scheduler.submit("ingest", "first", blockedUntil(g));
    const second = scheduler.submit("ingest", "second", async () => {
      ran = true;
      return summarize([]);
    });

    scheduler.cancel(second);
    expect(await scheduler.wait(second)).toEqual({ type: "cancelled", taskId: second.id });
    g.open();
    expect((await scheduler.wait(first)).type).toBe("completed");
    expect(ran).toBe(false);
  });

  it("runs at most maxWorkers tasks and starts the rest in order", async () => {
    const { scheduler } = setup(2);
    const gates = [gate(), gate(), gate()];
    const started: number[] = [];
    let running = 0;
    let peak = 0;
    const handles = gates.map((g, i) =>
      scheduler.submit("validate", `task ${i}`, async () => {
        started.push(i);
        running++;
        peak = Math.max(peak, running);
        await g.opened;
        running--;
        return summarize([]);
      }),
    );

    expect(started).toEqual([0, 1]);
    gates[0].open();
    await scheduler.wait(handles[0]);
    expect(started).toEqual([0, 1, 2]);
    gates[1].open();
    gates[2].open();
    await Promise.all(handles.map((h) => scheduler.wait(h)));
    expect(peak).toBe(2);
  });

  it("refuses a merge while anything else is active", async () => {
    const { scheduler } = setup();
    const g = gate();
    const ingest = scheduler.submit("ingest", "add", blockedUntil(g));

    expect(() => scheduler.submit("merge", "merge", done)).toThrow(TaskAlreadyRunningError);
    g.open();
    await scheduler.wait(ingest);
    const merge = scheduler.submit("merge", "merge", done);
    expect((await scheduler.wait(merge)).type).toBe("completed");
  });

  it("refuses a second merge and other work while a merge runs", async () => {
    const { scheduler } = setup();
    const g = gate();
    const merge = scheduler.submit("merge", "merge", blockedUntil(g));

    expect(() => scheduler.submit("merge", "again", done)).toThrow("A merge is already running.");
    expect(() => scheduler.submit("validate", "check", done)).toThrow(TaskAlreadyRunningError);
    expect(scheduler.mergeActive).toBe(true);

    g.open();
    expect((await scheduler.wait(merge)).type).toBe("completed");
    expect(scheduler.busy).toBe(false);
  });

  it("cancels everything on shutdown", async () => {
    const { scheduler } = setup(1);
    const g = gate();
    const a = scheduler.submit("ingest", "a", blockedUntil(g));
    const b = scheduler.submit("ingest", "b", blockedUntil(g));

    const stopping = scheduler.shutdown();
    g.open();
    await stopping;

    expect(scheduler.poll(a)).toEqual({ type: "cancelled", taskId: a.id });
    expect(scheduler.poll(b)).toEqual({ type: "cancelled", taskId: b.id });
  });
});
