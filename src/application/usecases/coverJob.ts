import {
  CoverJob,
  DEFAULT_COVER_JOB_VERSION,
  DEFAULT_DPI,
  GenerationRequest,
  defaultTextSettings,
} from "../../domain/models";
import type { ImageSourcePort } from "../ports";

export interface NewCoverJobParams {
  frontImagePath: string;
  backImagePath?: string;
  title: string;
  subtitle?: string;
  author: string;
  spineLabel?: string;
  blurb?: string;
  trimSize: string;
  pageCount: number;
  paperType: string;
  dpi?: number;
  textColor?: string;
  backgroundColor?: string;
  titleFontSizePt?: number;
  authorFontSizePt?: number;
  blurbFontSizePt?: number;
}

function nowIsoNoMs(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, "Z");
}

function optional(value: string | undefined): string | undefined {
  const v = (value ?? "").trim();
  return v ? v : undefined;
}

export function toCoverJob(params: NewCoverJobParams, timestamp: string = nowIsoNoMs()): CoverJob {
  const defaults = defaultTextSettings();
  const job: CoverJob = {
    jobVersion: DEFAULT_COVER_JOB_VERSION,
    timestamp,
    frontImagePath: params.frontImagePath,
    title: params.title.trim(),
    author: params.author.trim(),
    trimSize: params.trimSize,
    pageCount: params.pageCount,
    paperType: params.paperType,
    dpi: params.dpi ?? DEFAULT_DPI,
    textColor: params.textColor ?? defaults.textColor,
    backgroundColor: params.backgroundColor ?? defaults.backgroundColor,
    titleFontSizePt: params.titleFontSizePt ?? defaults.titleFontSizePt,
    authorFontSizePt: params.authorFontSizePt ?? defaults.authorFontSizePt,
    blurbFontSizePt: params.blurbFontSizePt ?? defaults.blurbFontSizePt,
  };

  const backImagePath = optional(params.backImagePath);
  const subtitle = optional(params.subtitle);
  const spineLabel = optional(params.spineLabel);
  const blurb = optional(params.blurb);
  if (backImagePath) job.backImagePath = backImagePath;
  if (subtitle) job.subtitle = subtitle;
  if (spineLabel) job.spineLabel = spineLabel;
  if (blurb) job.blurb = blurb;
  return job;
}

/** Carga las imagenes del pedido y arma el request para el compositor. */
export async function coverJobToRequest(job: CoverJob, source: ImageSourcePort): Promise<GenerationRequest> {
  const [frontImage, backImage] = await Promise.all([
    source.load(job.frontImagePath, "frontImage"),
    job.backImagePath ? source.load(job.backImagePath, "backImage") : Promise.resolve(undefined),
  ]);

  return {
    frontImage,
    backImage,
    title: job.title,
    subtitle: job.subtitle,
    author: job.author,
    spineLabel: job.spineLabel,
    blurb: job.blurb,
    trimSize: job.trimSize,
    pageCount: job.pageCount,
    paperType: job.paperType,
    dpi: job.dpi,
    textColor: job.textColor,
    backgroundColor: job.backgroundColor,
    titleFontSizePt: job.titleFontSizePt,
    authorFontSizePt: job.authorFontSizePt,
    blurbFontSizePt: job.blurbFontSizePt,
  };
}
