import { InvalidDimensionError } from "../errors";

export const POINTS_PER_INCH = 72;

function assertNonNegative(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) throw new InvalidDimensionError(field, value);
}

export function inchesToPixels(value: number, dpi = 300): number {
  assertNonNegative(value, "inches");
  if (!Number.isFinite(dpi) || dpi <= 0) throw new InvalidDimensionError("dpi", dpi);
  return Math.round(value * dpi);
}

export function inchesToPoints(value: number): number {
  assertNonNegative(value, "inches");
  return value * POINTS_PER_INCH;
}

// tamanos de fuente llegan en pt; se rasterizan a px del lienzo
export function pointsToPixels(points: number, dpi = 300): number {
  assertNonNegative(points, "points");
  return inchesToPixels(points / POINTS_PER_INCH, dpi);
}
