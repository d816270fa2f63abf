import { InvalidDimensionError, SpineTooNarrowForTextError } from "../../domain/errors";
import { BleedSpec, CoverPlan, PanelPlan, Rect, TrimSize, inchesToPixels } from "../../domain/models";

export interface BuildPlanOptions {
  // el lomo sin area segura queda con safe=null en vez de fallar
  allowNarrowSpine?: boolean;
}

function inset(rect: Rect, dx: number, dy: number): Rect {
  return { x: rect.x + dx, y: rect.y + dy, width: rect.width - 2 * dx, height: rect.height - 2 * dy };
}

function hasArea(rect: Rect): boolean {
  return rect.width > 0 && rect.height > 0;
}

/**
 * Arma el plano del lienzo envolvente: contratapa, lomo y tapa en ese orden,
 * con el sangrado sumado solo en los bordes exteriores.
 *
 * Los bordes se calculan en pulgadas y se redondean a px una sola vez cada uno;
 * los anchos salen de restar bordes ya redondeados, asi los paneles quedan
 * contiguos y el ancho total coincide con el del lienzo.
 */
export function buildPlan(
  trim: TrimSize,
  spineWidthInches: number,
  bleed: BleedSpec,
  dpi: number,
  options: BuildPlanOptions = {}
): CoverPlan {
  if (!Number.isFinite(spineWidthInches) || spineWidthInches <= 0) {
    throw new InvalidDimensionError("spineWidthInches", spineWidthInches);
  }
  if (bleed.bleedInches < 0) throw new InvalidDimensionError("bleedInches", bleed.bleedInches);

  const { bleedInches, safeMarginInches, spineMarginInches } = bleed;

  const edgesIn = [
    0,
    trim.widthInches + bleedInches,
    trim.widthInches + bleedInches + spineWidthInches,
    trim.widthInches * 2 + spineWidthInches + bleedInches * 2,
  ];
  const pageHeightInches = trim.heightInches + bleedInches * 2;

  const [x0, x1, x2, x3] = edgesIn.map((e) => inchesToPixels(e, dpi));
  const heightPx = inchesToPixels(pageHeightInches, dpi);
  const safePx = inchesToPixels(safeMarginInches, dpi);
  const spineSafePx = inchesToPixels(spineMarginInches, dpi);

  const backRect: Rect = { x: x0, y: 0, width: x1 - x0, height: heightPx };
  const spineRect: Rect = { x: x1, y: 0, width: x2 - x1, height: heightPx };
  const frontRect: Rect = { x: x2, y: 0, width: x3 - x2, height: heightPx };

  const backSafe = inset(backRect, safePx, safePx);
  const frontSafe = inset(frontRect, safePx, safePx);
  if (!hasArea(backSafe) || !hasArea(frontSafe)) {
    throw new InvalidDimensionError("trim", `${trim.widthInches}x${trim.heightInches}`);
  }

  const spineSafe = inset(spineRect, spineSafePx, safePx);
  let spine: PanelPlan;
  if (hasArea(spineSafe)) {
    spine = { rect: spineRect, safe: spineSafe };
  } else if (options.allowNarrowSpine) {
    spine = { rect: spineRect, safe: null };
  } else {
    throw new SpineTooNarrowForTextError(spineWidthInches);
  }

  return Object.freeze({
    dpi,
    trim,
    bleed: Object.freeze({ ...bleed }),
    spineWidthInches,
    pageWidthInches: edgesIn[3],
    pageHeightInches,
    canvas: Object.freeze({ widthPx: x3, heightPx }),
    panels: Object.freeze({
      back: { rect: backRect, safe: backSafe },
      spine,
      front: { rect: frontRect, safe: frontSafe },
    }),
  });
}

export function toPanelLocal(rect: Rect, panel: Rect): Rect {
  return { x: rect.x - panel.x, y: rect.y - panel.y, width: rect.width, height: rect.height };
}

/** Banda horizontal [from, to) del alto de un rectangulo, en fracciones. */
export function band(rect: Rect, from: number, to: number): Rect {
  const top = rect.y + Math.round(rect.height * from);
  const bottom = rect.y + Math.round(rect.height * to);
  return { x: rect.x, y: top, width: rect.width, height: bottom - top };
}
