import type { RgbColor } from "../../domain/models";

export const RATIO_TOLERANCE = 0.01;
export const MAX_CROP_FRACTION = 0.15;
export const MIN_SOURCE_PX = 100;
export const MAX_UPSCALE = 4;

export interface Size {
  width: number;
  height: number;
}

export type EdgeSide = "left" | "right" | "top" | "bottom";

export type FitStrategy =
  | { kind: "scale" }
  | { kind: "crop"; lossFraction: number }
  | { kind: "extend"; axis: "x" | "y"; before: number; after: number };

export interface FitPlan {
  strategy: FitStrategy;
  upscale: number;
  exceedsUpscaleCap: boolean;
}

/**
 * Decide como llevar la imagen al tamano del panel:
 * - ratio casi igual: escalar directo
 * - diferencia chica: recorte centrado (se pierde a lo sumo MAX_CROP_FRACTION de un eje)
 * - diferencia grande: extender el eje corto con el color de borde antes de escalar
 */
export function planFit(source: Size, target: Size): FitPlan {
  const srcRatio = source.width / source.height;
  const tgtRatio = target.width / target.height;
  const sx = target.width / source.width;
  const sy = target.height / source.height;

  const withCap = (strategy: FitStrategy, upscale: number): FitPlan => ({
    strategy,
    upscale,
    exceedsUpscaleCap: upscale > MAX_UPSCALE,
  });

  if (Math.abs(srcRatio - tgtRatio) / tgtRatio <= RATIO_TOLERANCE) {
    return withCap({ kind: "scale" }, Math.max(sx, sy));
  }

  const lossFraction = 1 - Math.min(srcRatio, tgtRatio) / Math.max(srcRatio, tgtRatio);
  if (lossFraction <= MAX_CROP_FRACTION) {
    return withCap({ kind: "crop", lossFraction }, Math.max(sx, sy));
  }

  if (srcRatio < tgtRatio) {
    const pad = Math.max(0, Math.round(source.height * tgtRatio) - source.width);
    const before = Math.floor(pad / 2);
    return withCap({ kind: "extend", axis: "x", before, after: pad - before }, sy);
  }

  const pad = Math.max(0, Math.round(source.width / tgtRatio) - source.height);
  const before = Math.floor(pad / 2);
  return withCap({ kind: "extend", axis: "y", before, after: pad - before }, sx);
}

/** Promedio RGB de la fila o columna mas externa del lado pedido. */
export function averageEdgeColor(
  pixels: Uint8Array,
  size: Size,
  channels: number,
  side: EdgeSide
): RgbColor {
  const { width, height } = size;
  let r = 0;
  let g = 0;
  let b = 0;
  let n = 0;

  const add = (x: number, y: number) => {
    const i = (y * width + x) * channels;
    r += pixels[i];
    g += pixels[i + (channels >= 3 ? 1 : 0)];
    b += pixels[i + (channels >= 3 ? 2 : 0)];
    n += 1;
  };

  if (side === "left" || side === "right") {
    const x = side === "left" ? 0 : width - 1;
    for (let y = 0; y < height; y++) add(x, y);
  } else {
    const y = side === "top" ? 0 : height - 1;
    for (let x = 0; x < width; x++) add(x, y);
  }

  if (n === 0) return { r: 255, g: 255, b: 255 };
  return { r: Math.round(r / n), g: Math.round(g / n), b: Math.round(b / n) };
}
