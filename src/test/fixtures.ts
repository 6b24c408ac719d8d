import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import JSZip from "jszip";
import { PDFDocument, StandardFonts } from "pdf-lib";
import type { MergerConfig } from "../config";
import { getMupdf } from "../engine/mupdf";
import { writeOutline, type OutlineNode } from "../engine/outline";

const created: string[] = [];

/** A scratch directory removed by `cleanupTempDirs`. */
export async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "pdfmerge-test-"));
  created.push(dir);
  return dir;
}

export async function cleanupTempDirs() {
  await Promise.all(created.splice(0).map((d) => rm(d, { recursive: true, force: true })));
}

export type PdfFixture = {
  pages: number;
  /** Text drawn on every page, followed by the page number. */
  text?: string;
  outline?: OutlineNode[];
  title?: string;
};

export async function makePdf({ pages, text = "Page", outline, title }: PdfFixture): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (let i = 1; i <= pages; i++) {
    const page = doc.addPage([300, 400]);
    page.drawText(`${text} ${i}`, { x: 40, y: 340, size: 18, font });
  }
  if (outline) writeOutline(doc, outline);
  if (title) doc.setTitle(title);
  return doc.save();
}

export async function writePdf(dir: string, name: string, fixture: PdfFixture): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, await makePdf(fixture));
  return path;
}

/** Entries are written in the given order, uncompressed unless `deflate` is set. */
export async function makeZip(entries: Array<[string, Uint8Array | string]>, deflate = false): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [name, data] of entries) zip.file(name, data);
  return zip.generateAsync({ type: "uint8array", compression: deflate ? "DEFLATE" : "STORE" });
}

/** Minimal .docx container: enough for detection, not for a real word processor. */
export function makeDocx(): Promise<Uint8Array> {
  return makeZip([
    ["[Content_Types].xml", "<Types/>"],
    ["word/document.xml", "<w:document/>"],
  ]);
}

/** EPUB container with the stored mimetype first. */
export function makeEpub(): Promise<Uint8Array> {
  return makeZip([
    ["mimetype", "application/epub+zip"],
    ["META-INF/container.xml", "<container/>"],
    ["OEBPS/chapter.xhtml", "<html><body><p>Chapter</p></body></html>"],
  ]);
}

export function testConfig(tempDir: string, overrides: Partial<MergerConfig> = {}): MergerConfig {
  return {
    tempDir,
    maxWorkers: 2,
    unrarPath: "unrar-not-installed",
    sofficePath: "soffice-not-installed",
    logLevel: "debug",
    producer: "pdf-merge-core test",
    recursiveFolders: false,
    ...overrides,
  };
}

export async function pageCountOf(bytes: Uint8Array, password?: string): Promise<number> {
  if (password === undefined) return (await PDFDocument.load(bytes)).getPageCount();
  const mupdf = await getMupdf();
  const doc = mupdf.Document.openDocument(bytes, "application/pdf");
  try {
    doc.authenticatePassword(password);
    return doc.countPages();
  } finally {
    doc.destroy();
  }
}

/** First text line of each page, in order: "Page 1", "Page 2", ... */
export async function pageLabels(bytes: Uint8Array): Promise<string[]> {
  const mupdf = await getMupdf();
  const doc = mupdf.Document.openDocument(bytes, "application/pdf");
  try {
    const labels: string[] = [];
    for (let i = 0; i < doc.countPages(); i++) {
      const page = doc.loadPage(i);
      const text = page.toStructuredText("").asText().trim();
      labels.push(text.split("\n")[0]);
      page.destroy();
    }
    return labels;
  } finally {
    doc.destroy();
  }
}
