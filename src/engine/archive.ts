import { execFile } from "node:child_process";
import { mkdir, mkdtemp, readFile, readdir, writeFile } from "node:fs/promises";
import { basename, dirname, isAbsolute, join, normalize, relative, sep } from "node:path";
import { promisify } from "node:util";
import JSZip from "jszip";
import { ArchiveCorruptError, ArchiveToolMissingError, errorMessage, systemErrorCode } from "../errors";
import { sniffSignature } from "./detect";

const run = promisify(execFile);

export type ArchiveEntry =
  | { kind: "candidate"; name: string; path: string }
  | { kind: "skipped"; name: string; reason: string };

export type ExtractOptions = {
  unrarPath?: string;
  signal?: AbortSignal;
};

/** Member names must stay inside the extraction root once joined onto it. */
export function safeMemberPath(root: string, name: string): string | null {
  const cleaned = normalize(name);
  if (isAbsolute(cleaned) || cleaned.startsWith(`..${sep}`) || cleaned === "..") return null;
  const target = join(root, cleaned);
  const rel = relative(root, target);
  return rel && !rel.startsWith("..") && !isAbsolute(rel) ? target : null;
}

async function* extractZip(archivePath: string, destDir: string): AsyncGenerator<ArchiveEntry> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(await readFile(archivePath));
  } catch (err) {
    throw new ArchiveCorruptError(basename(archivePath), errorMessage(err), { cause: err });
  }

  const members = Object.values(zip.files)
    .filter((f) => !f.dir)
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const member of members) {
    const target = safeMemberPath(destDir, member.name);
    if (!target) {
      yield { kind: "skipped", name: member.name, reason: "unsafe path" };
      continue;
    }
    let data: Uint8Array;
    try {
      data = await member.async("uint8array");
    } catch (err) {
      yield { kind: "skipped", name: member.name, reason: errorMessage(err) };
      continue;
    }
    if (sniffSignature(data.subarray(0, 1024)) !== "pdf") continue;
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, data);
    } catch (err) {
      // A file member may already occupy a name another member uses as a folder.
      yield { kind: "skipped", name: member.name, reason: errorMessage(err) };
      continue;
    }
    yield { kind: "candidate", name: member.name, path: target };
  }
}

async function listFiles(dir: string): Promise<string[]> {
  const out: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) out.push(...(await listFiles(full)));
    else if (entry.isFile()) out.push(full);
  }
  return out.sort();
}

/** unrar exit codes: 1 = non-fatal warning, 3 = CRC error, 11 = wrong/missing password. */
const UNRAR_PASSWORD = 11;
const UNRAR_WARNINGS = new Set([1, 3]);

async function* extractRar(archivePath: string, destDir: string, options: ExtractOptions): AsyncGenerator<ArchiveEntry> {
  const tool = options.unrarPath ?? "unrar";
  const scratch = await mkdtemp(join(destDir, "rar-"));
  let partial = false;
  try {
    // -p- never prompts for a password; -o+ overwrites; -y answers yes to everything else.
    await run(tool, ["x", "-p-", "-o+", "-y", archivePath, `${scratch}${sep}`], {
      signal: options.signal,
      windowsHide: true,
      maxBuffer: 16 * 1024 * 1024,
    });
  } catch (err) {
    if (systemErrorCode(err) === "ENOENT") throw new ArchiveToolMissingError(tool, { cause: err });
    const exit = typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
    if (exit === UNRAR_PASSWORD) {
      throw new ArchiveCorruptError(basename(archivePath), "password-protected", { cause: err });
    }
    if (typeof exit !== "number" || !UNRAR_WARNINGS.has(exit)) {
      throw new ArchiveCorruptError(basename(archivePath), errorMessage(err), { cause: err });
    }
    partial = true;
  }

  const files = await listFiles(scratch);
  if (partial && files.length === 0) {
    throw new ArchiveCorruptError(basename(archivePath), "no member could be read");
  }
  for (const file of files) {
    const name = relative(scratch, file).split(sep).join("/");
    let head: Uint8Array;
    try {
      head = (await readFile(file)).subarray(0, 1024);
    } catch (err) {
      yield { kind: "skipped", name, reason: errorMessage(err) };
      continue;
    }
    if (sniffSignature(head) === "pdf") yield { kind: "candidate", name, path: file };
  }
  if (partial) yield { kind: "skipped", name: basename(archivePath), reason: "some members failed their checksum" };
}

/**
 * Lazily yields the PDF members of a ZIP or RAR archive, written under `destDir`.
 * Opening failures raise one error for the whole archive before anything is yielded;
 * unreadable members are reported as skipped and extraction carries on.
 */
export function extract(
  archivePath: string,
  type: "zip" | "rar",
  destDir: string,
  options: ExtractOptions = {},
): AsyncGenerator<ArchiveEntry> {
  return type === "zip" ? extractZip(archivePath, destDir) : extractRar(archivePath, destDir, options);
}
