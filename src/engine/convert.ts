import { stat } from "node:fs/promises";
import { basename } from "node:path";
import { ConversionFailedError, ConversionUnavailableError, MergerError, errorMessage } from "../errors";
import type { DetectedType } from "../types";

export type ConvertibleType = "word" | "epub";

/**
 * A backend that turns one document type into PDF. Implementations throw
 * ConversionUnavailableError when their runtime is missing and ConversionFailedError
 * when the input cannot be converted.
 */
export interface Converter {
  readonly name: string;
  canHandle(type: DetectedType): boolean;
  convert(inputPath: string, outDir: string, signal?: AbortSignal): Promise<string>;
}

export class ConverterRegistry {
  private readonly byType = new Map<ConvertibleType, Converter>();

  constructor(converters: Converter[] = []) {
    for (const c of converters) this.register(c);
  }

  register(converter: Converter) {
    for (const type of ["word", "epub"] as const) {
      if (converter.canHandle(type)) this.byType.set(type, converter);
    }
  }

  unregister(type: ConvertibleType) {
    this.byType.delete(type);
  }

  get(type: DetectedType): Converter | undefined {
    return type === "word" || type === "epub" ? this.byType.get(type) : undefined;
  }

  has(type: DetectedType): boolean {
    return this.get(type) !== undefined;
  }
}

/** No-op for PDFs; otherwise the registered converter's output path. */
export async function convert(
  registry: ConverterRegistry,
  path: string,
  type: DetectedType,
  outDir: string,
  signal?: AbortSignal,
): Promise<string> {
  if (type === "pdf") return path;
  const converter = registry.get(type);
  if (!converter) {
    throw new ConversionUnavailableError(`No converter is registered for ${type} documents ("${basename(path)}").`);
  }

  let output: string;
  try {
    output = await converter.convert(path, outDir, signal);
  } catch (err) {
    if (err instanceof MergerError) throw err;
    throw new ConversionFailedError(`${converter.name} could not convert "${basename(path)}" (${errorMessage(err)})`, {
      cause: err,
    });
  }

  const produced = await stat(output).then(
    (s) => s.isFile() && s.size > 0,
    () => false,
  );
  if (!produced) {
    throw new ConversionFailedError(`${converter.name} reported success but wrote no PDF for "${basename(path)}".`);
  }
  return output;
}
