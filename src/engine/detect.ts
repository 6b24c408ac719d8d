import { open, readFile, readdir } from "node:fs/promises";
import { extname, join } from "node:path";
import JSZip from "jszip";
import type { DetectedType } from "../types";

export type Detection = {
  type: DetectedType;
  method: "content" | "extension" | "none";
  /** Content matched a container we cannot tell apart without the extension. */
  ambiguous: boolean;
};

const PREFIX_BYTES = 4096;
const PDF_HEADER_WINDOW = 1024;

const PDF_MAGIC = Buffer.from("%PDF-", "latin1");
const RAR_MAGIC = Buffer.from([0x52, 0x61, 0x72, 0x21, 0x1a, 0x07]);
const OLE_MAGIC = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);
const ZIP_MAGICS = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]), // local file header
  Buffer.from([0x50, 0x4b, 0x05, 0x06]), // empty archive
  Buffer.from([0x50, 0x4b, 0x07, 0x08]), // spanned
];
const EPUB_MIMETYPE = "application/epub+zip";

const EXTENSION_MAP: Record<string, DetectedType> = {
  ".pdf": "pdf",
  ".docx": "word",
  ".doc": "word",
  ".epub": "epub",
  ".zip": "zip",
  ".rar": "rar",
};

export function typeFromExtension(path: string): DetectedType {
  return EXTENSION_MAP[extname(path).toLowerCase()] ?? "unknown";
}

export function isArchive(type: DetectedType): type is "zip" | "rar" {
  return type === "zip" || type === "rar";
}

async function readPrefix(path: string): Promise<Buffer | null> {
  try {
    const fh = await open(path, "r");
    try {
      const buf = Buffer.alloc(PREFIX_BYTES);
      const { bytesRead } = await fh.read(buf, 0, PREFIX_BYTES, 0);
      return buf.subarray(0, bytesRead);
    } finally {
      await fh.close();
    }
  } catch {
    return null;
  }
}

/**
 * Classify raw leading bytes. ZIP containers come back as "zip" and need probing.
 * Container magics sit at offset 0 and win over a `%PDF-` further in, which a stored
 * member would otherwise expose.
 */
export function sniffSignature(prefix: Uint8Array): DetectedType | "ole" {
  const buf = Buffer.from(prefix.buffer, prefix.byteOffset, prefix.byteLength);
  if (buf.subarray(0, RAR_MAGIC.length).equals(RAR_MAGIC)) return "rar";
  if (buf.subarray(0, OLE_MAGIC.length).equals(OLE_MAGIC)) return "ole";
  if (ZIP_MAGICS.some((m) => buf.subarray(0, 4).equals(m))) return "zip";
  if (buf.subarray(0, PDF_HEADER_WINDOW).includes(PDF_MAGIC)) return "pdf";
  return "unknown";
}

/** EPUB puts an uncompressed "mimetype" entry first; read it straight from the local header. */
function epubFromLocalHeader(prefix: Buffer): boolean {
  if (prefix.length < 30) return false;
  const method = prefix.readUInt16LE(8);
  const nameLen = prefix.readUInt16LE(26);
  const extraLen = prefix.readUInt16LE(28);
  const name = prefix.subarray(30, 30 + nameLen).toString("latin1");
  if (name !== "mimetype" || method !== 0) return false;
  const dataStart = 30 + nameLen + extraLen;
  return prefix.subarray(dataStart, dataStart + EPUB_MIMETYPE.length).toString("latin1") === EPUB_MIMETYPE;
}

async function readZipManifest(path: string): Promise<DetectedType | null> {
  try {
    const zip = await JSZip.loadAsync(await readFile(path));
    const names = Object.keys(zip.files);
    if (names.some((n) => n === "word/document.xml")) return "word";
    if (names.includes("mimetype") && names.includes("META-INF/container.xml")) return "epub";
    return "zip";
  } catch {
    return null;
  }
}

export async function inspect(path: string): Promise<Detection> {
  const byExtension = typeFromExtension(path);
  const prefix = await readPrefix(path);
  if (!prefix) return { type: "unknown", method: "none", ambiguous: false };

  const sniffed = sniffSignature(prefix);
  if (sniffed === "pdf" || sniffed === "rar") return { type: sniffed, method: "content", ambiguous: false };

  if (sniffed === "ole") {
    // Legacy .doc shares the compound-file header with .xls, .ppt, .msg ...
    if (extname(path).toLowerCase() === ".doc") return { type: "word", method: "extension", ambiguous: false };
    return { type: "unknown", method: "content", ambiguous: true };
  }

  if (sniffed === "zip") {
    if (epubFromLocalHeader(prefix)) return { type: "epub", method: "content", ambiguous: false };
    const fromManifest = await readZipManifest(path);
    if (fromManifest) return { type: fromManifest, method: "content", ambiguous: false };
    const zipFamily = byExtension === "word" || byExtension === "epub" || byExtension === "zip";
    return { type: zipFamily ? byExtension : "zip", method: zipFamily ? "extension" : "content", ambiguous: false };
  }

  if (byExtension !== "unknown") return { type: byExtension, method: "extension", ambiguous: false };
  return { type: "unknown", method: "none", ambiguous: false };
}

export async function detect(path: string): Promise<DetectedType> {
  return (await inspect(path)).type;
}

/** Supported files of a folder, sorted by name so folder order is stable. */
export async function listSupported(dir: string, options: { recursive?: boolean } = {}): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  const found: string[] = [];
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (options.recursive) found.push(...(await listSupported(full, options)));
    } else if (entry.isFile() && (await detect(full)) !== "unknown") {
      found.push(full);
    }
  }
  return found;
}
