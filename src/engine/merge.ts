import { randomBytes } from "node:crypto";
import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { PDFDocument } from "pdf-lib";
import { MergeError, MergerError, errorMessage } from "../errors";
import type { MergeJob, MergeResult, MergeSource, Metadata } from "../types";
import { CancellationToken } from "../worker/cancellation";
import { compressPdf, decryptPdf, encryptPdf } from "./mupdf";
import { readOutline, rerootOutline, writeOutline, type OutlineNode } from "./outline";
import { expandToIndices } from "./pageRange";

export type MergeProgress = (processed: number, total: number, label: string) => void;

export type MergeRunOptions = {
  token?: CancellationToken;
  onProgress?: MergeProgress;
  creator?: string;
  producer?: string;
};

async function loadSource(src: MergeSource): Promise<PDFDocument> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(src.pdfPath);
    if (src.password) bytes = await decryptPdf(bytes, src.password, src.label);
    return await PDFDocument.load(bytes, { updateMetadata: false });
  } catch (err) {
    throw new MergeError("SourceUnavailable", `Cannot open "${src.label}" (${errorMessage(err)})`, {
      documentRef: src.id,
      cause: err,
    });
  }
}

function applyMetadata(out: PDFDocument, metadata: Metadata, run: MergeRunOptions) {
  if (metadata.title !== undefined) out.setTitle(metadata.title);
  if (metadata.author !== undefined) out.setAuthor(metadata.author);
  if (metadata.subject !== undefined) out.setSubject(metadata.subject);
  // setKeywords joins with spaces; one element keeps the caller's text as is.
  if (metadata.keywords !== undefined) out.setKeywords([metadata.keywords]);
  if (run.creator) out.setCreator(run.creator);
  if (run.producer) out.setProducer(run.producer);
  const now = new Date();
  out.setCreationDate(now);
  out.setModificationDate(now);
}

/** Writes beside the destination, then renames; a failed or cancelled run leaves nothing behind. */
async function writeAtomically(destination: string, bytes: Uint8Array, token: CancellationToken) {
  const temp = `${destination}.${randomBytes(4).toString("hex")}.part`;
  try {
    await writeFile(temp, bytes);
    token.throwIfCancelled();
    await rename(temp, destination);
  } catch (err) {
    await rm(temp, { force: true });
    if (err instanceof MergerError) throw err;
    throw new MergeError("WriteFailed", `Cannot write "${destination}" (${errorMessage(err)})`, { cause: err });
  }
}

/**
 * Assembles the job's documents, in order, into one PDF at `job.options.outputPath`.
 * Pages are appended in ascending range order; outlines are re-rooted onto merged page
 * numbers; compression and metadata run on plaintext, encryption last.
 */
export async function mergeDocuments(job: MergeJob, run: MergeRunOptions = {}): Promise<MergeResult> {
  const token = run.token ?? CancellationToken.none();
  const { documents, options } = job;
  if (documents.length === 0) {
    throw new MergeError("NothingToMerge", "No eligible documents to merge.");
  }

  const total = documents.length + 1;
  const out = await PDFDocument.create();
  const outline: OutlineNode[] = [];
  let offset = 0;

  for (let i = 0; i < documents.length; i++) {
    token.throwIfCancelled();
    const src = documents[i];
    run.onProgress?.(i, total, `Importing ${src.label}…`);

    const doc = await loadSource(src);
    let indices: number[];
    try {
      indices = expandToIndices(src.selectedRange, doc.getPageCount());
    } catch (err) {
      throw new MergeError("SourceUnavailable", `"${src.label}" changed since it was validated (${errorMessage(err)})`, {
        documentRef: src.id,
        cause: err,
      });
    }
    const pages = await out.copyPages(doc, indices);
    pages.forEach((p) => out.addPage(p));

    if (options.bookmarks !== "none" && src.preserveBookmarks) {
      const pageMap = new Map(indices.map((srcIndex, k) => [srcIndex, offset + k]));
      outline.push(...rerootOutline(readOutline(doc), pageMap));
    }
    offset += indices.length;
  }

  token.throwIfCancelled();
  run.onProgress?.(documents.length, total, "Saving…");
  writeOutline(out, outline);
  applyMetadata(out, options.metadata, run);

  let bytes: Uint8Array = await out.save({ useObjectStreams: options.compressionLevel !== "none" });
  try {
    bytes = await compressPdf(bytes, options.compressionLevel);
  } catch (err) {
    throw new MergeError("CompressionFailed", `Compression failed (${errorMessage(err)})`, { cause: err });
  }

  if (options.password) {
    try {
      bytes = await encryptPdf(bytes, options.password);
    } catch (err) {
      throw new MergeError("EncryptionFailed", `Failed to apply encryption (${errorMessage(err)})`, { cause: err });
    }
  }

  token.throwIfCancelled();
  await writeAtomically(options.outputPath, bytes, token);
  run.onProgress?.(total, total, "Done");
  return { outputPath: options.outputPath, pageCount: offset, documentCount: documents.length };
}
