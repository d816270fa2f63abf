import { resolve } from "node:path";
import { DEFAULT_DPI } from "../../domain/models";

export interface CliConfig {
  outputsDir: string; // PDFs y CSVs generados
  dpi: number;
}

export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const dpiRaw = Number(env.COVER_DPI);
  return {
    outputsDir: resolve(env.COVER_OUTPUT_DIR?.trim() || "outputs"),
    dpi: Number.isFinite(dpiRaw) && dpiRaw > 0 ? dpiRaw : DEFAULT_DPI,
  };
}
