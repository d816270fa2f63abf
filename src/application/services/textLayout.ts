export const GLYPH_WIDTH_EM = 0.56;
export const LINE_HEIGHT_EM = 1.2;
export const SHRINK_STEP = 0.9;
export const ELLIPSIS = "...";

export type TextRotation = 0 | 90 | 270;
export type TextMode = "line" | "paragraph";

export interface TextBox {
  width: number;
  height: number;
}

export interface TextLayoutInput {
  text: string;
  box: TextBox;
  fontSizePx: number;
  minFontSizePx: number;
  rotation: TextRotation;
  mode: TextMode;
}

export interface TextLayout {
  lines: string[];
  fontSizePx: number;
  lineHeightPx: number;
  // area sin rotar donde se dibuja el texto (alto/ancho invertidos si rota)
  frame: TextBox;
  wrapped: boolean;
  truncated: boolean;
}

/** Ancho en px que ocupa una linea a un tamano dado. */
export type TextMeasurer = (text: string, fontSizePx: number) => Promise<number>;

export function estimateTextWidth(text: string, fontSizePx: number): number {
  return Array.from(text).length * fontSizePx * GLYPH_WIDTH_EM;
}

// aproximacion por ancho promedio de glifo; el renderer SVG mide la tinta real
export const estimateMeasurer: TextMeasurer = async (text, fontSizePx) => estimateTextWidth(text, fontSizePx);

export function lineHeight(fontSizePx: number): number {
  return fontSizePx * LINE_HEIGHT_EM;
}

function shrink(size: number, floor: number): number {
  return Math.max(floor, Math.floor(size * SHRINK_STEP));
}

export async function ellipsize(
  line: string,
  maxWidth: number,
  fontSizePx: number,
  measure: TextMeasurer = estimateMeasurer
): Promise<string> {
  let chars = Array.from(line);
  while (chars.length > 0 && (await measure(chars.join("").trimEnd() + ELLIPSIS, fontSizePx)) > maxWidth) {
    chars = chars.slice(0, -1);
  }
  return chars.join("").trimEnd() + ELLIPSIS;
}

async function breakLongWord(word: string, maxWidth: number, fontSizePx: number, measure: TextMeasurer): Promise<string[]> {
  const parts: string[] = [];
  let current = "";
  for (const ch of Array.from(word)) {
    const candidate = current + ch;
    if (current && (await measure(candidate, fontSizePx)) > maxWidth) {
      parts.push(current);
      current = ch;
    } else {
      current = candidate;
    }
  }
  if (current) parts.push(current);
  return parts;
}

export async function wrapWords(
  text: string,
  maxWidth: number,
  fontSizePx: number,
  measure: TextMeasurer = estimateMeasurer
): Promise<string[]> {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if ((await measure(candidate, fontSizePx)) <= maxWidth) {
      current = candidate;
      continue;
    }
    if (current) lines.push(current);
    if ((await measure(word, fontSizePx)) <= maxWidth) {
      current = word;
      continue;
    }
    const parts = await breakLongWord(word, maxWidth, fontSizePx, measure);
    lines.push(...parts.slice(0, -1));
    current = parts[parts.length - 1] ?? "";
  }

  if (current) lines.push(current);
  return lines;
}

async function wrapParagraphs(text: string, maxWidth: number, fontSizePx: number, measure: TextMeasurer): Promise<string[]> {
  const paragraphs = text
    .split(/\r?\n/)
    .map((p) => p.trim())
    .filter(Boolean);
  const lines: string[] = [];
  for (const [i, p] of paragraphs.entries()) {
    if (i > 0) lines.push("");
    lines.push(...(await wrapWords(p, maxWidth, fontSizePx, measure)));
  }
  return lines;
}

async function clampLines(
  lines: string[],
  frame: TextBox,
  fontSizePx: number,
  measure: TextMeasurer
): Promise<{ lines: string[]; truncated: boolean }> {
  const maxLines = Math.max(1, Math.floor(frame.height / lineHeight(fontSizePx)));
  if (lines.length <= maxLines) return { lines, truncated: false };
  const kept = lines.slice(0, maxLines);
  // no terminar en una linea vacia de separacion
  while (kept.length > 1 && kept[kept.length - 1] === "") kept.pop();
  kept[kept.length - 1] = await ellipsize(kept[kept.length - 1], frame.width, fontSizePx, measure);
  return { lines: kept, truncated: true };
}

/**
 * Ajusta el tamano de fuente partiendo de `fontSizePx` y achicando de a 10%
 * hasta `minFontSizePx`, con anchos tomados de `measure`. Si ni el minimo entra:
 * - texto horizontal: se parte en lineas (y se corta con "..." lo que no entre en alto)
 * - texto rotado (lomo): una sola linea cortada con "..."
 */
export async function layoutText(input: TextLayoutInput, measure: TextMeasurer = estimateMeasurer): Promise<TextLayout> {
  const frame: TextBox =
    input.rotation === 0
      ? { width: input.box.width, height: input.box.height }
      : { width: input.box.height, height: input.box.width };
  const floor = Math.max(1, Math.min(input.minFontSizePx, input.fontSizePx));
  const text = input.text.trim();

  const result = (lines: string[], size: number, wrapped: boolean, truncated: boolean): TextLayout => ({
    lines,
    fontSizePx: size,
    lineHeightPx: lineHeight(size),
    frame,
    wrapped,
    truncated,
  });

  if (!text) return result([], Math.max(floor, input.fontSizePx), false, false);

  let size = Math.max(floor, Math.floor(input.fontSizePx));

  if (input.mode === "paragraph") {
    let lines = await wrapParagraphs(text, frame.width, size, measure);
    while (lines.length * lineHeight(size) > frame.height && size > floor) {
      size = shrink(size, floor);
      lines = await wrapParagraphs(text, frame.width, size, measure);
    }
    const clamped = await clampLines(lines, frame, size, measure);
    return result(clamped.lines, size, lines.length > 1, clamped.truncated);
  }

  const singleLine = text.replace(/\s+/g, " ");
  const fits = async (s: number) => lineHeight(s) <= frame.height && (await measure(singleLine, s)) <= frame.width;
  while (!(await fits(size)) && size > floor) size = shrink(size, floor);

  if (await fits(size)) return result([singleLine], size, false, false);

  const widthAtFloor = await measure(singleLine, size);
  if (input.rotation !== 0 || widthAtFloor <= frame.width) {
    const line = widthAtFloor <= frame.width ? singleLine : await ellipsize(singleLine, frame.width, size, measure);
    return result([line], size, false, line !== singleLine);
  }

  const clamped = await clampLines(await wrapWords(singleLine, frame.width, size, measure), frame, size, measure);
  return result(clamped.lines, size, true, clamped.truncated);
}
