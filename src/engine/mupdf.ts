import type { CompressionLevel } from "../types";

type Mupdf = typeof import("mupdf");

let mupdfReady: Promise<Mupdf> | null = null;

/** mupdf ships as ESM with a wasm payload; load it once, on first use. */
export function getMupdf(): Promise<Mupdf> {
  if (!mupdfReady) {
    mupdfReady = import("mupdf").catch((err: unknown) => {
      mupdfReady = null;
      throw err;
    });
  }
  return mupdfReady;
}

class PasswordError extends Error {
  readonly needed: boolean;

  constructor(label: string, needed: boolean) {
    super(
      needed
        ? `"${label}" is password-protected. Provide the password and try again.`
        : `Wrong password for "${label}".`,
    );
    this.name = "PasswordError";
    this.needed = needed;
  }
}

export type SecurityInfo = { encrypted: boolean; pageCount?: number; authenticated: boolean };

/**
 * Checks an encrypted file against a password without writing anything.
 * `pageCount` is only read once the password has been accepted.
 */
export async function inspectSecurity(bytes: Uint8Array, password?: string): Promise<SecurityInfo> {
  const mupdf = await getMupdf();
  const doc = mupdf.Document.openDocument(bytes, "application/pdf");
  try {
    if (!doc.needsPassword()) return { encrypted: false, pageCount: doc.countPages(), authenticated: true };
    if (!password || doc.authenticatePassword(password) === 0) return { encrypted: true, authenticated: false };
    return { encrypted: true, pageCount: doc.countPages(), authenticated: true };
  } finally {
    doc.destroy();
  }
}

async function rewrite(bytes: Uint8Array, options: string, password?: string, label?: string): Promise<Uint8Array> {
  const mupdf = await getMupdf();
  const doc = mupdf.Document.openDocument(bytes, "application/pdf");
  try {
    if (doc.needsPassword()) {
      if (!password) throw new PasswordError(label ?? "PDF", true);
      if (doc.authenticatePassword(password) === 0) throw new PasswordError(label ?? "PDF", false);
    }
    if (!(doc instanceof mupdf.PDFDocument)) throw new Error(`${label ?? "Input"} is not a PDF document.`);
    const out = doc.saveToBuffer(options);
    try {
      // The view points into the wasm heap; copy before the buffer is released.
      return out.asUint8Array().slice();
    } finally {
      out.destroy();
    }
  } finally {
    doc.destroy();
  }
}

export function decryptPdf(bytes: Uint8Array, password: string | undefined, label?: string): Promise<Uint8Array> {
  return rewrite(bytes, "decrypt", password, label);
}

// Higher levels spend more time for smaller files: object GC/dedup, then font and image re-encoding.
const COMPRESSION_OPTIONS: Record<Exclude<CompressionLevel, "none">, string> = {
  fast: "compress",
  normal: "compress,garbage=1",
  high: "compress,compress-fonts,garbage=3",
  maximum: "compress,compress-fonts,compress-images,garbage=4",
};

export async function compressPdf(bytes: Uint8Array, level: CompressionLevel): Promise<Uint8Array> {
  if (level === "none") return bytes;
  return rewrite(bytes, COMPRESSION_OPTIONS[level]);
}

export function encryptPdf(bytes: Uint8Array, password: string): Promise<Uint8Array> {
  const args = ["encrypt=aes-256", `user-password=${password}`, `owner-password=${password}`];
  return rewrite(bytes, args.join(","));
}

/** Reads a document-info field ("title", "author", ...) of a possibly encrypted file. */
export async function readInfoField(bytes: Uint8Array, field: string, password?: string): Promise<string | undefined> {
  const mupdf = await getMupdf();
  const doc = mupdf.Document.openDocument(bytes, "application/pdf");
  try {
    if (doc.needsPassword() && (!password || doc.authenticatePassword(password) === 0)) {
      throw new PasswordError("PDF", !password);
    }
    const key = `info:${field.charAt(0).toUpperCase()}${field.slice(1)}`;
    return doc.getMetaData(key) || undefined;
  } finally {
    doc.destroy();
  }
}
