import test from "node:test";
import assert from "node:assert/strict";
import sharp from "sharp";

import type { TextLayer } from "../application/ports";
import type { TextLayout } from "../application/services/textLayout";
import {
  INK_GUTTER_PX,
  SvgTextRenderer,
  buildTextSvg,
  escapeXml,
  measureInkWidth,
  shadowOffset,
} from "../adapters/imaging/svgTextRenderer";
import { Rgb, inkBox, solidPng } from "./fixtures";

function layer(overrides: Partial<TextLayer>): TextLayer {
  return {
    text: "A & B",
    rect: { x: 0, y: 0, width: 200, height: 100 },
    fontSizePx: 50,
    minFontSizePx: 10,
    color: "#ffffff",
    rotation: 0,
    mode: "line",
    style: { shadow: true, outline: false, fontFamily: "Sans", fontWeight: "bold" },
    ...overrides,
  };
}

const layout: TextLayout = {
  lines: ["A & B"],
  fontSizePx: 50,
  lineHeightPx: 60,
  frame: { width: 200, height: 100 },
  wrapped: false,
  truncated: false,
};

test("escapeXml escapa los caracteres reservados", () => {
  assert.equal(escapeXml(`<a href='x'>"&"</a>`), "&lt;a href=&apos;x&apos;&gt;&quot;&amp;&quot;&lt;/a&gt;");
});

test("Desplazamiento de sombra proporcional con minimo de 2px", () => {
  assert.equal(shadowOffset(20), 2);
  assert.equal(shadowOffset(200), 8);
});

test("SVG con sombra de contraste debajo del texto", () => {
  const svg = buildTextSvg(layout, layer({}));
  const font = `font-family="Sans" font-size="50" font-weight="bold" text-anchor="middle"`;
  assert.deepEqual(svg.split("\n"), [
    `<svg xmlns="http://www.w3.org/2000/svg" width="200" height="100" viewBox="0 0 200 100">`,
    `<text x="102" y="69.5" ${font} fill="#000000" fill-opacity="0.55">A &amp; B</text>`,
    `<text x="100" y="67.5" ${font} fill="#FFFFFF">A &amp; B</text>`,
    "</svg>",
  ]);
});

test("SVG con contorno y sin sombra", () => {
  const big: TextLayout = { ...layout, fontSizePx: 100 };
  const svg = buildTextSvg(big, layer({ style: { shadow: false, outline: true, fontFamily: "Sans", fontWeight: "normal" } }));
  const lines = svg.split("\n");
  assert.equal(lines.length, 3);
  assert.equal(
    lines[1],
    `<text x="100" y="85" font-family="Sans" font-size="100" font-weight="normal" text-anchor="middle" fill="#FFFFFF" stroke="#000000" stroke-width="3" paint-order="stroke">A &amp; B</text>`
  );
});

test("Texto vacio devuelve una copia del panel", async () => {
  const panel = await solidPng(40, 30, { r: 10, g: 20, b: 30 });
  const out = await new SvgTextRenderer().renderText(panel, layer({ text: "  " }));
  assert.notEqual(out, panel);
  assert.deepEqual(out, panel);
});

test("Texto rotado mantiene el tamano del panel", async () => {
  const panel = await solidPng(300, 200, { r: 58, g: 58, b: 58 });
  const out = await new SvgTextRenderer().renderText(
    panel,
    layer({ text: "Hi", rect: { x: 10, y: 20, width: 80, height: 150 }, fontSizePx: 20, rotation: 90 })
  );
  const meta = await sharp(out).metadata();
  assert.equal(meta.width, 300);
  assert.equal(meta.height, 200);
});

const DARK: Rgb = { r: 32, g: 32, b: 32 };

test("La tinta medida crece con el tamano de fuente", async () => {
  const small = await measureInkWidth("MOUNTAINS", 50, layer({}));
  const big = await measureInkWidth("MOUNTAINS", 100, layer({}));
  assert.ok(small > 2 * INK_GUTTER_PX, `small=${small}`);
  assert.ok(big > small, `small=${small} big=${big}`);
  assert.equal(await measureInkWidth("   ", 100, layer({})), 0);
});

test("Un titulo ancho se achica hasta que su tinta entra en la caja", async () => {
  const rect = { x: 100, y: 100, width: 507, height: 300 };
  const panel = await solidPng(700, 500, DARK);
  const renderer = new SvgTextRenderer();
  const titleLayer = layer({ text: "MOUNTAINS", rect, fontSizePx: 100, minFontSizePx: 20 });

  const layout = await renderer.layout(titleLayer);
  assert.ok(layout.fontSizePx < 100, `fontSizePx=${layout.fontSizePx}`);
  assert.deepEqual(layout.lines, ["MOUNTAINS"]);
  assert.equal(layout.truncated, false);

  const box = await inkBox(await renderer.renderText(panel, titleLayer), DARK);
  if (box === null) throw new Error("sin tinta");
  // ninguna columna de tinta sobre los bordes de la caja
  assert.ok(box.left > rect.x, JSON.stringify(box));
  assert.ok(box.right < rect.x + rect.width - 1, JSON.stringify(box));
  assert.ok(box.top >= rect.y && box.bottom < rect.y + rect.height, JSON.stringify(box));
});

test("Sin margen para achicar, la palabra se parte y la tinta queda en la caja", async () => {
  const rect = { x: 50, y: 20, width: 451, height: 400 };
  const panel = await solidPng(600, 460, DARK);
  const renderer = new SvgTextRenderer();
  const wideLayer = layer({ text: "WWWWWWWW", rect, fontSizePx: 100, minFontSizePx: 100 });

  const layout = await renderer.layout(wideLayer);
  assert.equal(layout.fontSizePx, 100);
  assert.equal(layout.wrapped, true);
  assert.ok(layout.lines.length > 1, JSON.stringify(layout.lines));
  assert.equal(layout.lines.join(""), "WWWWWWWW");

  const box = await inkBox(await renderer.renderText(panel, wideLayer), DARK);
  if (box === null) throw new Error("sin tinta");
  assert.ok(box.left > rect.x, JSON.stringify(box));
  assert.ok(box.right < rect.x + rect.width - 1, JSON.stringify(box));
  assert.ok(box.top >= rect.y && box.bottom < rect.y + rect.height, JSON.stringify(box));
});
