import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { LibreOfficeConverter, MupdfEpubConverter } from "../converters";
import { ConversionFailedError, ConversionUnavailableError } from "../errors";
import { cleanupTempDirs, makeTempDir, makeZip, pageCountOf, writePdf } from "../test/fixtures";
import type { DetectedType } from "../types";
import { ConverterRegistry, convert, type Converter } from "./convert";

let dir: string;

beforeAll(async () => {
  dir = await makeTempDir();
});

afterAll(cleanupTempDirs);

function fakeConverter(type: DetectedType, body: (input: string, outDir: string) => Promise<string>): Converter {
  return { name: "fake", canHandle: (t) => t === type, convert: body };
}

describe("ConverterRegistry", () => {
  it("registers converters by the types they handle", () => {
    const registry = new ConverterRegistry([fakeConverter("word", async () => "")]);
    expect(registry.has("word")).toBe(true);
    expect(registry.has("epub")).toBe(false);
    expect(registry.get("pdf")).toBeUndefined();
    registry.unregister("word");
    expect(registry.has("word")).toBe(false);
  });
});

describe("convert", () => {
  it("passes PDFs through untouched", async () => {
    expect(await convert(new ConverterRegistry(), "/x/a.pdf", "pdf", dir)).toBe("/x/a.pdf");
  });

  it("fails at once when no converter is registered", async () => {
    await expect(convert(new ConverterRegistry(), "/x/b.docx", "word", dir)).rejects.toBeInstanceOf(
      ConversionUnavailableError,
    );
    await expect(convert(new ConverterRegistry(), "/x/c.zip", "zip", dir)).rejects.toThrow(
      'No converter is registered for zip documents ("c.zip").',
    );
  });

  it("returns the converter output", async () => {
    const registry = new ConverterRegistry([
      fakeConverter("word", async (_input, outDir) => writePdf(outDir, "b.pdf", { pages: 2 })),
    ]);
    const out = await convert(registry, "/x/b.docx", "word", dir);
    expect(out).toBe(join(dir, "b.pdf"));
    expect(await pageCountOf(await readFile(out))).toBe(2);
  });

  it("wraps unexpected converter errors", async () => {
    const registry = new ConverterRegistry([
      fakeConverter("epub", async () => {
        throw new Error("boom");
      }),
    ]);
    await expect(convert(registry, "/x/book.epub", "epub", dir)).rejects.toThrow(
      new ConversionFailedError('fake could not convert "book.epub" (boom)'),
    );
  });

  it("keeps typed converter errors as they are", async () => {
    const registry = new ConverterRegistry([
      fakeConverter("epub", async () => {
        throw new ConversionUnavailableError("engine missing");
      }),
    ]);
    await expect(convert(registry, "/x/book.epub", "epub", dir)).rejects.toBeInstanceOf(ConversionUnavailableError);
  });

  it("fails when the converter wrote nothing", async () => {
    const registry = new ConverterRegistry([fakeConverter("word", async (_input, outDir) => join(outDir, "ghost.pdf"))]);
    await expect(convert(registry, "/x/ghost.docx", "word", dir)).rejects.toThrow(
      'fake reported success but wrote no PDF for "ghost.docx".',
    );
  });
});

describe("LibreOfficeConverter", () => {
  it("reports a missing soffice binary as unavailable", async () => {
    const converter = new LibreOfficeConverter("soffice-not-installed");
    await expect(converter.convert(join(dir, "a.docx"), dir)).rejects.toBeInstanceOf(ConversionUnavailableError);
  });
});

describe("MupdfEpubConverter", () => {
  it("lays a small book out into PDF pages", async () => {
    const epub = await makeZip([
      ["mimetype", "application/epub+zip"],
      [
        "META-INF/container.xml",
        `<?xml version="1.0"?><container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container"><rootfiles><rootfile full-path="content.opf" media-type="application/oebps-package+xml"/></rootfiles></container>`,
      ],
      [
        "content.opf",
        `<?xml version="1.0"?><package xmlns="http://www.idpf.org/2007/opf" version="2.0" unique-identifier="id"><metadata xmlns:dc="http://purl.org/dc/elements/1.1/"><dc:title>Sample</dc:title><dc:identifier id="id">sample-1</dc:identifier></metadata><manifest><item id="c1" href="chapter.xhtml" media-type="application/xhtml+xml"/></manifest><spine><itemref idref="c1"/></spine></package>`,
      ],
      [
        "chapter.xhtml",
        `<?xml version="1.0"?><html xmlns="http://www.w3.org/1999/xhtml"><head><title>One</title></head><body><h1>Chapter one</h1><p>Some text.</p></body></html>`,
      ],
    ]);
    const input = join(dir, "sample.epub");
    await writeFile(input, epub);
    const outDir = join(dir, "epub-out");
    await mkdir(outDir);

    const out = await new MupdfEpubConverter().convert(input, outDir);
    expect(out).toBe(join(outDir, "sample.pdf"));
    expect(await pageCountOf(await readFile(out))).toBeGreaterThanOrEqual(1);
  });

  it("only handles EPUB", () => {
    const converter = new MupdfEpubConverter();
    expect(converter.canHandle("epub")).toBe(true);
    expect(converter.canHandle("word")).toBe(false);
  });
});
