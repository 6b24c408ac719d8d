import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createDraft } from "../documents";
import { ConverterRegistry, type Converter } from "../engine/convert";
import { createSilentLogger } from "../logger";
import { cleanupTempDirs, makeDocx, makePdf, makeTempDir, makeZip, testConfig, writePdf } from "../test/fixtures";
import { CancellationToken } from "./cancellation";
import { ingestTask, summarize, validateTask, type EngineDeps, type IngestItem } from "./engine";
import { TaskChannel, TaskPort, type DocumentDelta } from "./messages";
import type { TaskOperation } from "./scheduler";

let dir: string;
let deps: EngineDeps;

beforeAll(async () => {
  dir = await makeTempDir();
  const work = join(dir, "work");
  await mkdir(work);
  deps = { config: testConfig(dir), converters: new ConverterRegistry(), workDir: async () => work };
});

afterAll(cleanupTempDirs);

async function run(operation: TaskOperation) {
  const channel = new TaskChannel();
  const summary = await operation({
    token: new CancellationToken(),
    port: new TaskPort("task-1", channel),
    logger: createSilentLogger().logger,
  });
  const deltas: DocumentDelta[] = [];
  for (const event of channel.drain()) if (event.type === "delta") deltas.push(event.delta);
  return { summary, deltas };
}

function itemFor(path: string): IngestItem {
  const draft = createDraft(path);
  return { documentId: draft.id, path, label: draft.label, selectedRange: [] };
}

describe("summarize", () => {
  it("counts outcomes by status", () => {
    expect(
      summarize([
        { label: "a", status: "succeeded" },
        { label: "b", status: "failed", reason: "Corrupt" },
        { label: "c", status: "skipped", reason: "UnsupportedType" },
        { label: "d", status: "succeeded" },
      ]),
    ).toMatchObject({ succeeded: 2, failed: 1, skipped: 1 });
  });
});

describe("ingestTask", () => {
  it("skips files of an unsupported type", async () => {
    const path = join(dir, "notes.txt");
    await writeFile(path, "plain text");
    const item = itemFor(path);

    const { summary, deltas } = await run(ingestTask([item], deps));

    expect(summary.items).toEqual([
      { documentId: item.documentId, label: "notes.txt", status: "skipped", reason: "UnsupportedType" },
    ]);
    expect(deltas).toEqual([
      {
        kind: "update",
        documentId: item.documentId,
        patch: {
          detectedType: "unknown",
          conversionState: "failed",
          failure: { code: "UnsupportedType", message: '"notes.txt" is not a PDF, Word, EPUB or archive file.' },
        },
      },
    ]);
  });

  it("marks a path that does not exist as not found", async () => {
    const item = itemFor(join(dir, "nowhere.pdf"));

    const { summary, deltas } = await run(ingestTask([item], deps));

    expect(summary.items).toEqual([{ documentId: item.documentId, label: "nowhere.pdf", status: "failed", reason: "NotFound" }]);
    expect(deltas).toEqual([
      {
        kind: "update",
        documentId: item.documentId,
        patch: {
          failure: { code: "ValidationFailed", message: '"nowhere.pdf" is not usable: NotFound', reason: "NotFound" },
        },
      },
    ]);
  });

  it("counts archive members it could not write as skipped and carries on", async () => {
    const pdf = await makePdf({ pages: 1 });
    const zip = join(dir, "clash.zip");
    await writeFile(zip, await makeZip([["x", pdf], ["x/y.pdf", pdf]], true));
    const after = itemFor(await writePdf(dir, "after.pdf", { pages: 1 }));

    const { summary } = await run(ingestTask([itemFor(zip), after], deps));

    expect(summary).toMatchObject({ succeeded: 2, failed: 0, skipped: 1 });
    expect(summary.items.map((i) => [i.label, i.status])).toEqual([
      ["clash.zip › x/y.pdf", "skipped"],
      ["clash.zip › x", "succeeded"],
      ["after.pdf", "succeeded"],
    ]);
  });

  it("fails only the item that hit an unexpected error", async () => {
    const zip = join(dir, "bundle.zip");
    await writeFile(zip, await makeZip([["one.pdf", await makePdf({ pages: 1 })]]));
    const archive = itemFor(zip);
    const after = itemFor(await writePdf(dir, "next.pdf", { pages: 1 }));
    const noScratch: EngineDeps = {
      ...deps,
      workDir: async () => {
        throw new Error("scratch space unavailable");
      },
    };

    const { summary, deltas } = await run(ingestTask([archive, after], noScratch));

    expect(summary.items).toEqual([
      { documentId: archive.documentId, label: "bundle.zip", status: "failed", reason: "Unexpected" },
      { documentId: after.documentId, label: "next.pdf", status: "succeeded" },
    ]);
    expect(deltas[0]).toEqual({
      kind: "update",
      documentId: archive.documentId,
      patch: { conversionState: "failed", failure: { code: "Unexpected", message: "scratch space unavailable" } },
    });
  });

  it("treats a conversion aborted by cancellation as cancelled, not failed", async () => {
    let started: () => void = () => {};
    const running = new Promise<void>((resolve) => {
      started = resolve;
    });
    const hanging: Converter = {
      name: "hanging",
      canHandle: (type) => type === "word",
      convert: (_input, _outDir, signal) =>
        new Promise<string>((_resolve, reject) => {
          started();
          signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    };
    const path = join(dir, "slow.docx");
    await writeFile(path, await makeDocx());
    const item = itemFor(path);
    const token = new CancellationToken();
    const channel = new TaskChannel();

    const pending = ingestTask([item], { ...deps, converters: new ConverterRegistry([hanging]) })({
      token,
      port: new TaskPort("task-1", channel),
      logger: createSilentLogger().logger,
    });
    await running;
    token.cancel();

    await expect(pending).rejects.toMatchObject({ code: "TaskCancelled" });
    const updates = channel.drain().flatMap((e) => (e.type === "delta" && e.delta.kind === "update" ? [e.delta.patch] : []));
    expect(updates).toEqual([
      { detectedType: "word", conversionState: "pending" },
      { failure: { code: "TaskCancelled", message: "Task was cancelled." } },
    ]);
  });

  it("never lets the progress total shrink when a folder turns out empty", async () => {
    const folder = join(dir, "hollow");
    await mkdir(folder);
    const next = itemFor(await writePdf(dir, "one.pdf", { pages: 1 }));
    const channel = new TaskChannel();

    await ingestTask([itemFor(folder), next], deps)({
      token: new CancellationToken(),
      port: new TaskPort("task-1", channel),
      logger: createSilentLogger().logger,
    });

    const progress = channel.drain().flatMap((e) => (e.type === "progress" ? [[e.processed, e.total]] : []));
    expect(progress).toEqual([
      [0, 2],
      [1, 2],
      [2, 2],
    ]);
  });

  it("reports an empty folder as skipped and removes its placeholder", async () => {
    const folder = join(dir, "empty");
    await mkdir(folder);
    const item = itemFor(folder);

    const { summary, deltas } = await run(ingestTask([item], deps));

    expect(summary).toMatchObject({ succeeded: 0, failed: 0, skipped: 1 });
    expect(deltas).toEqual([{ kind: "replace", documentId: item.documentId, documents: [] }]);
  });

  it("flags a stored range that no longer fits", async () => {
    const path = await writePdf(dir, "short.pdf", { pages: 2 });
    const item = { ...itemFor(path), selectedRange: [{ start: 1, end: 5 }] };

    const { summary } = await run(ingestTask([item], deps));

    expect(summary.items).toEqual([
      { documentId: item.documentId, label: "short.pdf", status: "failed", reason: "InvalidPageRange" },
    ]);
  });
});

describe("validateTask", () => {
  it("updates page counts and reports unusable files", async () => {
    const good = await writePdf(dir, "good.pdf", { pages: 3 });
    const { summary, deltas } = await run(
      validateTask([
        { documentId: "d1", label: "good.pdf", pdfPath: good, selectedRange: [] },
        { documentId: "d2", label: "gone.pdf", pdfPath: join(dir, "gone.pdf"), selectedRange: [] },
      ]),
    );

    expect(summary).toMatchObject({ succeeded: 1, failed: 1, skipped: 0 });
    expect(deltas).toEqual([
      {
        kind: "update",
        documentId: "d1",
        patch: { validation: { status: "valid", pageCount: 3 }, pageCount: 3, failure: undefined },
      },
      {
        kind: "update",
        documentId: "d2",
        patch: { validation: { status: "invalid", reason: "NotFound" }, pageCount: undefined, failure: undefined },
      },
    ]);
  });

  it("stops when cancelled before the next document", async () => {
    const token = new CancellationToken();
    token.cancel();
    const operation = validateTask([{ documentId: "d1", label: "a.pdf", pdfPath: join(dir, "a.pdf"), selectedRange: [] }]);
    await expect(
      operation({ token, port: new TaskPort("t", new TaskChannel()), logger: createSilentLogger().logger }),
    ).rejects.toMatchObject({ code: "TaskCancelled" });
  });
});
