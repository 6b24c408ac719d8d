import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { PDFDocument } from "pdf-lib";
import { ValidationFailedError, systemErrorCode } from "../errors";
import { sanitizeMetadataText } from "../options";
import type { Metadata, MetadataField } from "../types";
import { decryptPdf } from "./mupdf";

/**
 * Title, author, subject and keywords of an existing PDF, cleaned so they can be fed
 * straight back as output metadata. Empty fields are left out.
 */
export async function readMetadata(pdfPath: string, password?: string): Promise<Metadata> {
  const label = basename(pdfPath);
  let doc: PDFDocument;
  try {
    let bytes: Uint8Array = await readFile(pdfPath);
    if (password) bytes = await decryptPdf(bytes, password, label);
    doc = await PDFDocument.load(bytes, { updateMetadata: false });
  } catch (err) {
    throw new ValidationFailedError(label, systemErrorCode(err) === "ENOENT" ? "NotFound" : "Unreadable", { cause: err });
  }

  const found: Record<MetadataField, string | undefined> = {
    title: doc.getTitle(),
    author: doc.getAuthor(),
    subject: doc.getSubject(),
    keywords: doc.getKeywords(),
  };
  const metadata: Metadata = {};
  for (const field of ["title", "author", "subject", "keywords"] as const) {
    const text = found[field];
    const clean = text === undefined ? "" : sanitizeMetadataText(field, text);
    if (clean) metadata[field] = clean;
  }
  return metadata;
}
