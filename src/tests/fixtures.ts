import sharp from "sharp";
import type { LoggerPort } from "../application/ports";

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export function solidPng(width: number, height: number, color: Rgb): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: color } }).png().toBuffer();
}

/** PNG con la mitad superior de un color y la inferior de otro. */
export function splitPng(width: number, height: number, top: Rgb, bottom: Rgb): Promise<Buffer> {
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    const c = y < height / 2 ? top : bottom;
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 3;
      data[i] = c.r;
      data[i + 1] = c.g;
      data[i + 2] = c.b;
    }
  }
  return sharp(data, { raw: { width, height, channels: 3 } }).png().toBuffer();
}

export async function pixelAt(png: Buffer, x: number, y: number): Promise<Rgb> {
  const { data, info } = await sharp(png).removeAlpha().raw().toBuffer({ resolveWithObject: true });
  const i = (y * info.width + x) * info.channels;
  return { r: data[i], g: data[i + 1], b: data[i + 2] };
}

export function isNear(actual: Rgb, expected: Rgb, tolerance = 3): boolean {
  return (
    Math.abs(actual.r - expected.r) <= tolerance &&
    Math.abs(actual.g - expected.g) <= tolerance &&
    Math.abs(actual.b - expected.b) <= tolerance
  );
}

export interface InkBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/** Caja (inclusiva) de los pixeles que difieren del fondo, opcionalmente dentro de una region. */
export async function inkBox(
  png: Buffer,
  background: Rgb,
  region?: { x: number; y: number; width: number; height: number }
): Promise<InkBox | null> {
  const { data, info } = await sharp(png).removeAlpha().raw().toBuffer({ resolveWithObject: true });
  const area = region ?? { x: 0, y: 0, width: info.width, height: info.height };
  let box: InkBox | null = null;
  for (let y = area.y; y < area.y + area.height; y++) {
    for (let x = area.x; x < area.x + area.width; x++) {
      const i = (y * info.width + x) * info.channels;
      if (isNear({ r: data[i], g: data[i + 1], b: data[i + 2] }, background, 8)) continue;
      box = box
        ? { left: Math.min(box.left, x), top: Math.min(box.top, y), right: Math.max(box.right, x), bottom: Math.max(box.bottom, y) }
        : { left: x, top: y, right: x, bottom: y };
    }
  }
  return box;
}

export class MemoryLogger implements LoggerPort {
  readonly infos: string[] = [];
  readonly warnings: string[] = [];

  info(message: string): void {
    this.infos.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }
}
