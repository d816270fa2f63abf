import sharp from "sharp";
import type { TextLayer, TextRendererPort } from "../../application/ports";
import { TextLayout, TextMeasurer, layoutText } from "../../application/services/textLayout";
import { contrastingColor, parseHexColor, toHexColor } from "../../domain/models";

// proporcion de la altura de mayusculas; centra la linea sobre su baseline
const CAP_HEIGHT_EM = 0.7;
const SHADOW_OPACITY = 0.55;
// aire a cada lado de la tinta medida, para el antialiasing
export const INK_GUTTER_PX = 2;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function shadowOffset(fontSizePx: number): number {
  return Math.max(2, Math.round(fontSizePx * 0.04));
}

export function baselines(layout: TextLayout): number[] {
  const blockHeight = layout.lines.length * layout.lineHeightPx;
  const top = (layout.frame.height - blockHeight) / 2;
  return layout.lines.map((_, i) => top + i * layout.lineHeightPx + (layout.lineHeightPx + layout.fontSizePx * CAP_HEIGHT_EM) / 2);
}

const fmt = (n: number) => String(Math.round(n * 100) / 100);

/** SVG del tamano sin rotar del texto: sombra desplazada y luego el texto principal. */
export function buildTextSvg(layout: TextLayout, layer: TextLayer): string {
  const { width, height } = layout.frame;
  const color = toHexColor(parseHexColor(layer.color, "textColor"));
  const contrast = contrastingColor(color);
  const cx = width / 2;
  const ys = baselines(layout);
  const font = `font-family="${escapeXml(layer.style.fontFamily)}" font-size="${fmt(layout.fontSizePx)}" font-weight="${layer.style.fontWeight}" text-anchor="middle"`;

  const elements: string[] = [];
  if (layer.style.shadow) {
    const d = shadowOffset(layout.fontSizePx);
    layout.lines.forEach((line, i) => {
      if (!line) return;
      elements.push(
        `<text x="${fmt(cx + d)}" y="${fmt(ys[i] + d)}" ${font} fill="${contrast}" fill-opacity="${SHADOW_OPACITY}">${escapeXml(line)}</text>`
      );
    });
  }

  const stroke = layer.style.outline
    ? ` stroke="${contrast}" stroke-width="${Math.max(1, Math.round(layout.fontSizePx * 0.03))}" paint-order="stroke"`
    : "";
  layout.lines.forEach((line, i) => {
    if (!line) return;
    elements.push(`<text x="${fmt(cx)}" y="${fmt(ys[i])}" ${font} fill="${color}"${stroke}>${escapeXml(line)}</text>`);
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    ...elements,
    "</svg>",
  ].join("\n");
}

/**
 * Ancho real de una linea: la rasteriza sola con la misma fuente, sombra y
 * contorno y mide las columnas con tinta. Como se dibuja centrada, devuelve el
 * doble de la mitad mas ancha, asi la tinta entra en cualquier caja de ese ancho.
 */
export async function measureInkWidth(line: string, fontSizePx: number, layer: TextLayer): Promise<number> {
  if (!line.trim()) return 0;
  const sample: TextLayout = {
    lines: [line],
    fontSizePx,
    lineHeightPx: fontSizePx * 1.2,
    frame: {
      width: Math.ceil(Array.from(line).length * fontSizePx * 1.2 + 2 * fontSizePx),
      height: Math.ceil(fontSizePx * 3),
    },
    wrapped: false,
    truncated: false,
  };

  const { data, info } = await sharp(Buffer.from(buildTextSvg(sample, layer)))
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const inked = (x: number): boolean => {
    for (let y = 0; y < info.height; y++) {
      if (data[(y * info.width + x) * info.channels + 3] > 0) return true;
    }
    return false;
  };

  let minX = 0;
  while (minX < info.width && !inked(minX)) minX++;
  if (minX === info.width) return 0;
  let maxX = info.width - 1;
  while (maxX > minX && !inked(maxX)) maxX--;

  const cx = sample.frame.width / 2;
  return 2 * Math.max(cx - minX, maxX + 1 - cx) + 2 * INK_GUTTER_PX;
}

export class SvgTextRenderer implements TextRendererPort {
  private readonly widths = new Map<string, number>();

  /** Distribucion del texto de la capa con anchos medidos sobre la tinta. */
  layout(layer: TextLayer): Promise<TextLayout> {
    const { fontFamily, fontWeight, shadow, outline } = layer.style;
    const measure: TextMeasurer = async (line, fontSizePx) => {
      const key = [fontFamily, fontWeight, shadow, outline, fontSizePx, line].join("|");
      const cached = this.widths.get(key);
      if (cached !== undefined) return cached;
      const width = await measureInkWidth(line, fontSizePx, layer);
      this.widths.set(key, width);
      return width;
    };

    return layoutText(
      {
        text: layer.text,
        box: { width: layer.rect.width, height: layer.rect.height },
        fontSizePx: layer.fontSizePx,
        minFontSizePx: layer.minFontSizePx,
        rotation: layer.rotation,
        mode: layer.mode,
      },
      measure
    );
  }

  async renderText(panelImage: Buffer, layer: TextLayer): Promise<Buffer> {
    const layout = await this.layout(layer);

    // copia: el buffer del llamador no se toca
    if (layout.lines.length === 0) return Buffer.from(panelImage);

    let overlay: Buffer = Buffer.from(buildTextSvg(layout, layer));
    if (layer.rotation !== 0) {
      // se rasteriza fuera de pantalla con el tamano sin rotar y despues se gira
      overlay = await sharp(overlay).rotate(layer.rotation).png().toBuffer();
    }

    return sharp(panelImage)
      .composite([{ input: overlay, left: layer.rect.x, top: layer.rect.y }])
      .png()
      .toBuffer();
  }
}
