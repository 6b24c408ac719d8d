import { tmpdir } from "node:os";
import { z } from "zod";
import { InvalidOptionsError } from "./errors";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
  PDFMERGE_TEMP_DIR: z.string().min(1).optional(),
  PDFMERGE_MAX_WORKERS: z.coerce.number().int().min(1).max(32).default(4),
  PDFMERGE_UNRAR_PATH: z.string().min(1).default("unrar"),
  PDFMERGE_SOFFICE_PATH: z.string().min(1).default("soffice"),
  PDFMERGE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  PDFMERGE_PRODUCER: z.string().min(1).default("pdf-merge-core"),
  PDFMERGE_RECURSIVE_FOLDERS: booleanFlag.default("false"),
});

export type MergerConfig = {
  tempDir: string;
  maxWorkers: number;
  unrarPath: string;
  sofficePath: string;
  logLevel: "debug" | "info" | "warn" | "error";
  producer: string;
  recursiveFolders: boolean;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): MergerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidOptionsError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    tempDir: e.PDFMERGE_TEMP_DIR ?? tmpdir(),
    maxWorkers: e.PDFMERGE_MAX_WORKERS,
    unrarPath: e.PDFMERGE_UNRAR_PATH,
    sofficePath: e.PDFMERGE_SOFFICE_PATH,
    logLevel: e.PDFMERGE_LOG_LEVEL,
    producer: e.PDFMERGE_PRODUCER,
    recursiveFolders: e.PDFMERGE_RECURSIVE_FOLDERS,
  };
}
