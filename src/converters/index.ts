import type { MergerConfig } from "../config";
import { ConverterRegistry } from "../engine/convert";
import { MupdfEpubConverter } from "./epub";
import { LibreOfficeConverter } from "./word";

export { LibreOfficeConverter } from "./word";
export { MupdfEpubConverter } from "./epub";

export function createDefaultConverters(config: Pick<MergerConfig, "sofficePath">): ConverterRegistry {
  return new ConverterRegistry([new LibreOfficeConverter(config.sofficePath), new MupdfEpubConverter()]);
}
