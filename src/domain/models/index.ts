import type { PaperType, TrimSize } from "./catalog";

export * from "./catalog";
export * from "./color";
export * from "./units";

export type Px = number;
export type Inches = number;

export const DEFAULT_DPI = 300;
export const MIN_PAGE_COUNT = 24;
export const MIN_SPINE_WIDTH_INCHES = 0.06;

export interface BleedSpec {
  bleedInches: Inches;
  safeMarginInches: Inches; // margen de texto, no de imagen
  spineMarginInches: Inches; // margen horizontal del texto del lomo
}

export const DEFAULT_BLEED: Readonly<BleedSpec> = Object.freeze({
  bleedInches: 0.125,
  safeMarginInches: 0.25,
  spineMarginInches: 0.0625,
});

export interface SpineSpec {
  readonly pageCount: number;
  readonly paperType: PaperType;
  readonly spineWidthInches: Inches;
}

export interface Rect {
  x: Px;
  y: Px;
  width: Px;
  height: Px;
}

export type PanelId = "back" | "spine" | "front";

export const PANEL_ORDER: readonly PanelId[] = ["back", "spine", "front"];

export interface PanelPlan {
  readonly rect: Readonly<Rect>;
  readonly safe: Readonly<Rect> | null; // null solo en lomos angostos con allowNarrowSpine
}

export interface CoverPlan {
  readonly dpi: number;
  readonly trim: TrimSize;
  readonly bleed: Readonly<BleedSpec>;
  readonly spineWidthInches: Inches;
  readonly pageWidthInches: Inches;
  readonly pageHeightInches: Inches;
  readonly canvas: Readonly<{ widthPx: Px; heightPx: Px }>;
  readonly panels: Readonly<Record<PanelId, PanelPlan>>;
}

export type NarrowSpinePolicy = "fail" | "omit";

export interface GenerationRequest {
  frontImage?: Buffer;
  backImage?: Buffer;
  title: string;
  subtitle?: string;
  author: string;
  spineLabel?: string;
  blurb?: string;
  trimSize: string | TrimSize;
  pageCount: number;
  paperType: string;
  dpi?: number;
  textColor?: string;
  backgroundColor?: string;
  titleFontSizePt?: number;
  authorFontSizePt?: number;
  blurbFontSizePt?: number;
  narrowSpine?: NarrowSpinePolicy;
}

export interface TextSettings {
  textColor: string;
  backgroundColor: string;
  titleFontSizePt: number;
  authorFontSizePt: number;
  blurbFontSizePt: number;
  spineFontSizePt: number;
  minFontSizePt: number;
  fontFamily: string;
}

export function defaultTextSettings(): TextSettings {
  return {
    textColor: "#FFFFFF",
    backgroundColor: "#3A3A3A",
    titleFontSizePt: 48,
    authorFontSizePt: 24,
    blurbFontSizePt: 12,
    spineFontSizePt: 14,
    minFontSizePt: 6,
    fontFamily: "Helvetica, Arial, sans-serif",
  };
}

export type CompositionStage =
  | "Initialized"
  | "PlanBuilt"
  | "ImagesFitted"
  | "TextRendered"
  | "Composited"
  | "Finalized";

export const COMPOSITION_STAGES: readonly CompositionStage[] = [
  "Initialized",
  "PlanBuilt",
  "ImagesFitted",
  "TextRendered",
  "Composited",
  "Finalized",
];

export interface CompositedCanvas {
  png: Buffer;
  widthPx: Px;
  heightPx: Px;
  dpi: number;
  pageWidthInches: Inches;
  pageHeightInches: Inches;
  spine: SpineSpec;
  plan: CoverPlan;
  stages: CompositionStage[];
}

export type CoverJobVersion = 1;
export const DEFAULT_COVER_JOB_VERSION: CoverJobVersion = 1;

// pedido persistible (CSV) a partir del cual se arma un GenerationRequest
export interface CoverJob {
  jobVersion: CoverJobVersion;
  timestamp: string; // ISO sin ms
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
  dpi: number;
  textColor: string;
  backgroundColor: string;
  titleFontSizePt: number;
  authorFontSizePt: number;
  blurbFontSizePt: number;
}
