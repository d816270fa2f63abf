import { InvalidDimensionError, UnknownTrimSizeError, UnsupportedPaperTypeError } from "../errors";

export const TRIM_SIZE_KEYS = [
  "5x8",
  "5.25x8",
  "5.5x8.5",
  "6x9",
  "6.14x9.21", // A5
  "6.69x9.61", // 17x24.4 cm
  "7x10",
  "7.44x9.69", // B5
  "7.5x9.25",
  "8x10",
  "8.25x6",
  "8.25x8.25",
  "8.5x8.5",
  "8.5x11",
] as const;

export interface TrimSize {
  readonly key: string;
  readonly widthInches: number;
  readonly heightInches: number;
  readonly custom: boolean;
}

export const PAPER_TYPES = ["white", "cream", "color"] as const;

export type PaperType = (typeof PAPER_TYPES)[number];

// pulgadas por pagina; valores fijos, ver DESIGN.md
const THICKNESS_PER_PAGE: Readonly<Record<PaperType, number>> = Object.freeze({
  white: 0.002252,
  cream: 0.0025,
  color: 0.002347,
});

function buildCatalog(): ReadonlyMap<string, TrimSize> {
  const entries = TRIM_SIZE_KEYS.map((key): [string, TrimSize] => {
    const [w, h] = key.split("x").map(Number);
    return [key, Object.freeze({ key, widthInches: w, heightInches: h, custom: false })];
  });
  return new Map(entries);
}

const TRIM_CATALOG = buildCatalog();

export function resolveTrimSize(sizeKey: string): TrimSize {
  const trim = TRIM_CATALOG.get(sizeKey.trim());
  if (!trim) throw new UnknownTrimSizeError(sizeKey);
  return trim;
}

export function listTrimSizes(): TrimSize[] {
  return Array.from(TRIM_CATALOG.values());
}

export function customTrimSize(widthInches: number, heightInches: number): TrimSize {
  if (!Number.isFinite(widthInches) || widthInches <= 0) throw new InvalidDimensionError("trim.widthInches", widthInches);
  if (!Number.isFinite(heightInches) || heightInches <= 0) {
    throw new InvalidDimensionError("trim.heightInches", heightInches);
  }
  return Object.freeze({ key: `${widthInches}x${heightInches}`, widthInches, heightInches, custom: true });
}

/** Valida un corte ya armado: los personalizados por sus medidas, el resto contra el catalogo. */
export function normalizeTrimSize(trim: TrimSize): TrimSize {
  if (trim.custom) return customTrimSize(trim.widthInches, trim.heightInches);
  const known = TRIM_CATALOG.get(trim.key);
  if (!known || known.widthInches !== trim.widthInches || known.heightInches !== trim.heightInches) {
    throw new UnknownTrimSizeError(trim.key);
  }
  return known;
}

export function isPaperType(value: unknown): value is PaperType {
  return typeof value === "string" && (PAPER_TYPES as readonly string[]).includes(value);
}

export function thicknessPerPage(paperType: PaperType): number {
  switch (paperType) {
    case "white":
      return THICKNESS_PER_PAGE.white;
    case "cream":
      return THICKNESS_PER_PAGE.cream;
    case "color":
      return THICKNESS_PER_PAGE.color;
    default: {
      const unreachable: never = paperType;
      throw new UnsupportedPaperTypeError(unreachable);
    }
  }
}
