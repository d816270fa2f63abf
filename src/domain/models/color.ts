import { InvalidRequestError } from "../errors";

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

const HEX_COLOR = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i;

export function parseHexColor(value: string, field = "color"): RgbColor {
  const m = HEX_COLOR.exec(value.trim());
  if (!m) throw new InvalidRequestError(field, `Color invalido en ${field}: ${value} (usar #RGB o #RRGGBB).`, value);

  let hex = m[1];
  if (hex.length === 3) hex = hex.split("").map((c) => c + c).join("");
  return {
    r: parseInt(hex.slice(0, 2), 16),
    g: parseInt(hex.slice(2, 4), 16),
    b: parseInt(hex.slice(4, 6), 16),
  };
}

export function toHexColor(c: RgbColor): string {
  const part = (n: number) => Math.max(0, Math.min(255, Math.round(n))).toString(16).padStart(2, "0");
  return `#${part(c.r)}${part(c.g)}${part(c.b)}`.toUpperCase();
}

// luminancia relativa aproximada (0..1), alcanza para elegir sombra clara u oscura
export function luminance(c: RgbColor): number {
  return (0.2126 * c.r + 0.7152 * c.g + 0.0722 * c.b) / 255;
}

export function contrastingColor(value: string): string {
  return luminance(parseHexColor(value)) > 0.5 ? "#000000" : "#FFFFFF";
}
