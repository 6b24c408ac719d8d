import { execFile } from "node:child_process";
import { basename, extname, join } from "node:path";
import { promisify } from "node:util";
import type { Converter } from "../engine/convert";
import { ConversionFailedError, ConversionUnavailableError, errorMessage, systemErrorCode } from "../errors";
import type { DetectedType } from "../types";

const run = promisify(execFile);

/** Word (.docx/.doc) through a headless LibreOffice process. */
export class LibreOfficeConverter implements Converter {
  readonly name = "LibreOffice";

  constructor(private readonly binary = "soffice") {}

  canHandle(type: DetectedType) {
    return type === "word";
  }

  async convert(inputPath: string, outDir: string, signal?: AbortSignal): Promise<string> {
    const args = ["--headless", "--norestore", "--convert-to", "pdf", "--outdir", outDir, inputPath];
    try {
      await run(this.binary, args, { signal, windowsHide: true });
    } catch (err) {
      if (systemErrorCode(err) === "ENOENT") {
        throw new ConversionUnavailableError(`Word conversion needs "${this.binary}" on the execution path.`, { cause: err });
      }
      throw new ConversionFailedError(`LibreOffice failed on "${basename(inputPath)}" (${errorMessage(err)})`, { cause: err });
    }
    return join(outDir, `${basename(inputPath, extname(inputPath))}.pdf`);
  }
}
