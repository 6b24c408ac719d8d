import { readFile } from "node:fs/promises";
import { EncryptedPDFError, PDFDocument } from "pdf-lib";
import { systemErrorCode } from "../errors";
import type { ValidationResult } from "../types";
import { inspectSecurity } from "./mupdf";

/**
 * Read-only usability check. Never throws: every failure maps onto one of the closed
 * reasons so a document can be marked invalid and left in the list for correction.
 */
export async function validate(pdfPath: string, password?: string): Promise<ValidationResult> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(pdfPath);
  } catch (err) {
    const code = systemErrorCode(err);
    return { valid: false, reason: code === "ENOENT" || code === "ENOTDIR" ? "NotFound" : "Unreadable" };
  }
  return validateBytes(bytes, password);
}

export async function validateBytes(bytes: Uint8Array, password?: string): Promise<ValidationResult> {
  let pageCount: number;
  try {
    const doc = await PDFDocument.load(bytes, { updateMetadata: false });
    pageCount = doc.getPageCount();
  } catch (err) {
    // pdf-lib reports encryption itself, but may also trip over encrypted object streams first.
    try {
      const security = await inspectSecurity(bytes, password);
      if (!security.encrypted && !(err instanceof EncryptedPDFError)) return { valid: false, reason: "Corrupt" };
      if (!security.authenticated) return { valid: false, reason: password ? "WrongPassword" : "Encrypted" };
      pageCount = security.pageCount ?? 0;
    } catch {
      return { valid: false, reason: "Corrupt" };
    }
  }
  if (pageCount === 0) return { valid: false, reason: "ZeroPages" };
  return { valid: true, pageCount };
}
