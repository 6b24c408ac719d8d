import { readFile, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import type { Converter } from "../engine/convert";
import { getMupdf } from "../engine/mupdf";
import { ConversionFailedError } from "../errors";
import type { DetectedType } from "../types";

// A4 in points, body text at 11pt.
const PAGE_WIDTH = 595;
const PAGE_HEIGHT = 842;
const EM = 11;

/**
 * EPUB through mupdf's reflowable layout engine: lay the book out on fixed pages,
 * then replay every page into a PDF writer.
 */
export class MupdfEpubConverter implements Converter {
  readonly name = "mupdf";

  canHandle(type: DetectedType) {
    return type === "epub";
  }

  async convert(inputPath: string, outDir: string, signal?: AbortSignal): Promise<string> {
    const mupdf = await getMupdf();
    const doc = mupdf.Document.openDocument(await readFile(inputPath), "application/epub+zip");
    const out = new mupdf.Buffer();
    try {
      doc.layout(PAGE_WIDTH, PAGE_HEIGHT, EM);
      const total = doc.countPages();
      if (total === 0) throw new ConversionFailedError(`"${basename(inputPath)}" has no readable content.`);

      const writer = new mupdf.DocumentWriter(out, "pdf", "");
      for (let i = 0; i < total; i++) {
        signal?.throwIfAborted();
        const page = doc.loadPage(i);
        const device = writer.beginPage(page.getBounds());
        page.run(device, mupdf.Matrix.identity);
        writer.endPage();
        page.destroy();
      }
      writer.close();

      const target = join(outDir, `${basename(inputPath, extname(inputPath))}.pdf`);
      await writeFile(target, out.asUint8Array().slice());
      return target;
    } finally {
      out.destroy();
      doc.destroy();
    }
  }
}
