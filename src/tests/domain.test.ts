import test from "node:test";
import assert from "node:assert/strict";

import {
  InvalidDimensionError,
  InvalidRequestError,
  UnknownTrimSizeError,
} from "../domain/errors";
import {
  contrastingColor,
  customTrimSize,
  inchesToPixels,
  inchesToPoints,
  listTrimSizes,
  normalizeTrimSize,
  parseHexColor,
  pointsToPixels,
  resolveTrimSize,
  toHexColor,
} from "../domain/models";

test("inchesToPixels redondea al pixel mas cercano", () => {
  assert.equal(inchesToPixels(6.125), 1838);
  assert.equal(inchesToPixels(9.25), 2775);
  assert.equal(inchesToPixels(0.0625), 19);
  assert.equal(inchesToPixels(1, 72), 72);
});

test("inchesToPixels rechaza valores negativos y dpi invalido", () => {
  assert.throws(() => inchesToPixels(-0.1), InvalidDimensionError);
  assert.throws(() => inchesToPixels(1, 0), InvalidDimensionError);
  assert.throws(() => inchesToPixels(Number.NaN), InvalidDimensionError);
});

test("Conversion de puntos a pulgadas y pixeles", () => {
  assert.equal(inchesToPoints(9.25), 666);
  assert.equal(pointsToPixels(14), 58);
  assert.equal(pointsToPixels(48), 200);
  assert.equal(pointsToPixels(6), 25);
});

test("Catalogo de cortes: resuelve claves conocidas", () => {
  const trim = resolveTrimSize("6x9");
  assert.equal(trim.widthInches, 6);
  assert.equal(trim.heightInches, 9);
  assert.equal(trim.custom, false);

  assert.equal(resolveTrimSize(" 8.5x11 ").heightInches, 11);
  assert.equal(listTrimSizes().length, 14);
});

test("Catalogo de cortes: clave desconocida", () => {
  assert.throws(() => resolveTrimSize("6x10"), UnknownTrimSizeError);
  assert.throws(() => resolveTrimSize("11x17"), UnknownTrimSizeError);
});

test("Corte personalizado", () => {
  const trim = customTrimSize(5.5, 8.25);
  assert.equal(trim.key, "5.5x8.25");
  assert.equal(trim.custom, true);
  assert.throws(() => customTrimSize(0, 9), InvalidDimensionError);
  assert.throws(() => customTrimSize(6, Number.POSITIVE_INFINITY), InvalidDimensionError);
});

test("Un corte armado a mano se valida igual que uno del catalogo", () => {
  assert.equal(normalizeTrimSize({ key: "6x9", widthInches: 6, heightInches: 9, custom: false }), resolveTrimSize("6x9"));
  assert.equal(normalizeTrimSize({ key: "x", widthInches: 5, heightInches: 7.5, custom: true }).key, "5x7.5");
  assert.throws(() => normalizeTrimSize({ key: "7x7", widthInches: 7, heightInches: 7, custom: false }), UnknownTrimSizeError);
  assert.throws(() => normalizeTrimSize({ key: "6x9", widthInches: 6, heightInches: 10, custom: false }), UnknownTrimSizeError);
  assert.throws(() => normalizeTrimSize({ key: "-6x9", widthInches: -6, heightInches: 9, custom: true }), InvalidDimensionError);
});

test("Colores hex: parseo y formato", () => {
  assert.deepEqual(parseHexColor("#3a3"), { r: 51, g: 170, b: 51 });
  assert.deepEqual(parseHexColor("3A3A3A"), { r: 58, g: 58, b: 58 });
  assert.equal(toHexColor({ r: 255, g: 0, b: 16 }), "#FF0010");
  assert.throws(() => parseHexColor("red", "textColor"), InvalidRequestError);
});

test("Color de contraste para sombra", () => {
  assert.equal(contrastingColor("#FFFFFF"), "#000000");
  assert.equal(contrastingColor("#3A3A3A"), "#FFFFFF");
});
