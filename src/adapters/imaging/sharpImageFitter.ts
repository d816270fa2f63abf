import sharp from "sharp";
import type { ImageFitterPort, LoggerPort } from "../../application/ports";
import {
  EdgeSide,
  MIN_SOURCE_PX,
  Size,
  averageEdgeColor,
  planFit,
} from "../../application/services/fitPlanner";
import { ImageTooSmallError, InvalidDimensionError, UnsupportedImageFormatError } from "../../domain/errors";
import type { RgbColor } from "../../domain/models";
import { consoleLogger } from "../logging/consoleLogger";

type Channels = 1 | 2 | 3 | 4;

interface RawImage {
  data: Buffer;
  width: number;
  height: number;
  channels: Channels;
}

function asChannels(n: number): Channels {
  if (n === 1 || n === 2 || n === 3 || n === 4) return n;
  throw new Error(`Cantidad de canales inesperada: ${n}`);
}

function assertTarget(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) throw new InvalidDimensionError(field, value);
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function decode(source: Buffer, field: string): Promise<RawImage> {
  try {
    // orientacion EXIF aplicada, alpha aplanado sobre blanco, siempre sRGB
    const { data, info } = await sharp(source)
      .rotate()
      .flatten({ background: "#ffffff" })
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height, channels: asChannels(info.channels) };
  } catch (err) {
    throw new UnsupportedImageFormatError(field, describe(err));
  }
}

async function extendSide(img: RawImage, side: EdgeSide, amount: number, color: RgbColor): Promise<RawImage> {
  const pad = { top: 0, bottom: 0, left: 0, right: 0 };
  pad[side] = amount;
  const { data, info } = await toSharp(img)
    .extend({ ...pad, background: color })
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height, channels: asChannels(info.channels) };
}

function toSharp(img: RawImage): sharp.Sharp {
  return sharp(img.data, { raw: { width: img.width, height: img.height, channels: img.channels } });
}

export class SharpImageFitter implements ImageFitterPort {
  constructor(private readonly logger: LoggerPort = consoleLogger) {}

  async fit(source: Buffer, targetWidthPx: number, targetHeightPx: number, field = "image"): Promise<Buffer> {
    assertTarget(targetWidthPx, "targetWidthPx");
    assertTarget(targetHeightPx, "targetHeightPx");

    const img = await decode(source, field);
    if (Math.min(img.width, img.height) < MIN_SOURCE_PX) {
      throw new ImageTooSmallError(field, img.width, img.height, MIN_SOURCE_PX);
    }

    const size: Size = { width: img.width, height: img.height };
    const target: Size = { width: targetWidthPx, height: targetHeightPx };
    const plan = planFit(size, target);

    if (plan.exceedsUpscaleCap) {
      this.logger.warn(
        `${field}: ${img.width}x${img.height}px se amplia ${plan.upscale.toFixed(2)}x para ${targetWidthPx}x${targetHeightPx}px; la calidad de impresion puede bajar.`
      );
    }

    const strategy = plan.strategy;
    let prepared = img;
    let fit: "fill" | "cover" = "fill";

    if (strategy.kind === "crop") {
      fit = "cover";
    } else if (strategy.kind === "extend") {
      const [first, second]: [EdgeSide, EdgeSide] = strategy.axis === "x" ? ["left", "right"] : ["top", "bottom"];
      // colores tomados de la imagen original, antes de extender
      const firstColor = averageEdgeColor(img.data, size, img.channels, first);
      const secondColor = averageEdgeColor(img.data, size, img.channels, second);
      if (strategy.before > 0) prepared = await extendSide(prepared, first, strategy.before, firstColor);
      if (strategy.after > 0) prepared = await extendSide(prepared, second, strategy.after, secondColor);
    }

    return toSharp(prepared)
      .resize(targetWidthPx, targetHeightPx, { fit, position: "centre", kernel: "lanczos3" })
      .png()
      .toBuffer();
  }
}
