import { readFile } from "node:fs/promises";
import type { JobReaderPort } from "../../application/ports";
import { InvalidRequestError } from "../../domain/errors";
import { CoverJob, DEFAULT_COVER_JOB_VERSION, DEFAULT_DPI, defaultTextSettings } from "../../domain/models";

/** Parser CSV con soporte de campos entre comillas que abarcan varias lineas. */
export function parseCsv(raw: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cur = "";
  let inQuotes = false;

  const endRow = () => {
    row.push(cur);
    rows.push(row);
    row = [];
    cur = "";
  };

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];

    if (inQuotes) {
      if (ch === '"') {
        if (raw[i + 1] === '"') {
          cur += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cur += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(cur);
      cur = "";
    } else if (ch === "\n") {
      endRow();
    } else if (ch !== "\r") {
      cur += ch;
    }
  }

  if (cur || row.length > 0) endRow();
  return rows;
}

function cleanKey(key: string): string {
  return key.replace(/^\uFEFF/, "").trim();
}

function toNumber(v: string | undefined, fallback: number): number {
  if (v === undefined || v.trim() === "") return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

function required(meta: Record<string, string>, key: string): string {
  const value = meta[key];
  if (value === undefined || !value.trim()) {
    throw new InvalidRequestError(key, `CSV invalido: falta ${key} en metadata.`);
  }
  return value;
}

function normalizeJob(meta: Record<string, string>): CoverJob {
  const defaults = defaultTextSettings();

  const version = toNumber(meta.jobVersion, DEFAULT_COVER_JOB_VERSION);
  if (version !== DEFAULT_COVER_JOB_VERSION) {
    throw new InvalidRequestError("jobVersion", `Version de pedido no soportada: ${meta.jobVersion}`, meta.jobVersion);
  }

  const pageCount = Number(required(meta, "pageCount"));
  if (!Number.isFinite(pageCount)) {
    throw new InvalidRequestError("pageCount", `CSV invalido: pageCount=${meta.pageCount}`, meta.pageCount);
  }

  const job: CoverJob = {
    jobVersion: DEFAULT_COVER_JOB_VERSION,
    timestamp: meta.timestamp ?? "",
    frontImagePath: required(meta, "frontImagePath"),
    title: required(meta, "title"),
    author: required(meta, "author"),
    trimSize: required(meta, "trimSize"),
    pageCount,
    paperType: required(meta, "paperType"),
    dpi: toNumber(meta.dpi, DEFAULT_DPI),
    textColor: meta.textColor || defaults.textColor,
    backgroundColor: meta.backgroundColor || defaults.backgroundColor,
    titleFontSizePt: toNumber(meta.titleFontSizePt, defaults.titleFontSizePt),
    authorFontSizePt: toNumber(meta.authorFontSizePt, defaults.authorFontSizePt),
    blurbFontSizePt: toNumber(meta.blurbFontSizePt, defaults.blurbFontSizePt),
  };

  if (meta.backImagePath) job.backImagePath = meta.backImagePath;
  if (meta.subtitle) job.subtitle = meta.subtitle;
  if (meta.spineLabel) job.spineLabel = meta.spineLabel;
  if (meta.blurb) job.blurb = meta.blurb;
  return job;
}

export async function readJobCsv(csvPath: string): Promise<CoverJob> {
  const raw = await readFile(csvPath, "utf-8");

  const meta: Record<string, string> = {};
  for (const parts of parseCsv(raw)) {
    if (parts.length < 2) continue;
    const key = cleanKey(parts[0]);
    // una coma sin comillas dentro del valor lo parte; se vuelve a unir
    const value = parts.slice(1).join(",");
    if (key) meta[key] = key === "blurb" ? value : value.trim();
  }

  return normalizeJob(meta);
}

export class CsvJobReader implements JobReaderPort {
  async read(csvPath: string): Promise<CoverJob> {
    return readJobCsv(csvPath);
  }
}
