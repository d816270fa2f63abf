import { writeFile } from "node:fs/promises";
import type { JobWriterPort } from "../../application/ports";
import type { CoverJob } from "../../domain/models";

function esc(v: unknown) {
  const s = String(v ?? "");
  return `"${s.replace(/"/g, '""')}"`;
}

export function toJobCsv(job: CoverJob): string {
  const lines: string[] = [];
  const push = (key: string, value: unknown) => lines.push(`${esc(key)},${esc(value)}`);
  const pushOptional = (key: string, value: string | undefined) => {
    if (value !== undefined) push(key, value);
  };

  push("jobVersion", job.jobVersion);
  push("timestamp", job.timestamp);
  push("frontImagePath", job.frontImagePath);
  pushOptional("backImagePath", job.backImagePath);
  push("trimSize", job.trimSize);
  push("pageCount", job.pageCount);
  push("paperType", job.paperType);
  push("dpi", job.dpi);
  push("title", job.title);
  pushOptional("subtitle", job.subtitle);
  push("author", job.author);
  pushOptional("spineLabel", job.spineLabel);
  push("textColor", job.textColor);
  push("backgroundColor", job.backgroundColor);
  push("titleFontSizePt", job.titleFontSizePt);
  push("authorFontSizePt", job.authorFontSizePt);
  push("blurbFontSizePt", job.blurbFontSizePt);
  // la resena puede tener saltos de linea; quedan dentro del campo entre comillas
  pushOptional("blurb", job.blurb);

  return lines.join("\n");
}

export class CsvJobWriter implements JobWriterPort {
  async writeJobCsv(params: { csvPath: string; job: CoverJob }): Promise<void> {
    await writeFile(params.csvPath, toJobCsv(params.job), "utf-8");
  }
}
