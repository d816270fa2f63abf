import sharp from "sharp";
import type { CanvasCompositorPort, CanvasLayer } from "../../application/ports";
import { InvalidDimensionError } from "../../domain/errors";
import { parseHexColor } from "../../domain/models";

function assertSize(widthPx: number, heightPx: number): void {
  if (!Number.isInteger(widthPx) || widthPx <= 0) throw new InvalidDimensionError("widthPx", widthPx);
  if (!Number.isInteger(heightPx) || heightPx <= 0) throw new InvalidDimensionError("heightPx", heightPx);
}

export class SharpCanvasCompositor implements CanvasCompositorPort {
  async solidPanel(widthPx: number, heightPx: number, color: string): Promise<Buffer> {
    assertSize(widthPx, heightPx);
    const background = parseHexColor(color, "backgroundColor");
    return sharp({ create: { width: widthPx, height: heightPx, channels: 3, background } })
      .png()
      .toBuffer();
  }

  async compose(params: { widthPx: number; heightPx: number; dpi: number; layers: CanvasLayer[] }): Promise<Buffer> {
    const { widthPx, heightPx, dpi, layers } = params;
    assertSize(widthPx, heightPx);

    return sharp({ create: { width: widthPx, height: heightPx, channels: 3, background: "#ffffff" } })
      .composite(layers.map((l) => ({ input: l.input, left: l.left, top: l.top })))
      .withMetadata({ density: dpi })
      .png()
      .toBuffer();
  }
}
