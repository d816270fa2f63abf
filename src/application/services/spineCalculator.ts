import { InvalidPageCountError, UnsupportedPaperTypeError } from "../../domain/errors";
import {
  MIN_PAGE_COUNT,
  MIN_SPINE_WIDTH_INCHES,
  SpineSpec,
  isPaperType,
  thicknessPerPage,
} from "../../domain/models";

export function computeSpineWidthInches(pageCount: number, paperType: string): number {
  if (!Number.isInteger(pageCount) || pageCount < MIN_PAGE_COUNT) {
    throw new InvalidPageCountError(pageCount, MIN_PAGE_COUNT);
  }
  if (!isPaperType(paperType)) throw new UnsupportedPaperTypeError(paperType);

  const spineWidth = pageCount * thicknessPerPage(paperType);
  return Math.max(spineWidth, MIN_SPINE_WIDTH_INCHES);
}

export function createSpineSpec(pageCount: number, paperType: string): SpineSpec {
  const spineWidthInches = computeSpineWidthInches(pageCount, paperType);
  if (!isPaperType(paperType)) throw new UnsupportedPaperTypeError(paperType);
  return Object.freeze({ pageCount, paperType, spineWidthInches });
}
