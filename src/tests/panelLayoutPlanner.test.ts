import test from "node:test";
import assert from "node:assert/strict";

import { band, buildPlan, toPanelLocal } from "../application/services/panelLayoutPlanner";
import { InvalidDimensionError, SpineTooNarrowForTextError } from "../domain/errors";
import { DEFAULT_BLEED, PANEL_ORDER, customTrimSize, resolveTrimSize } from "../domain/models";

const sixByNine = resolveTrimSize("6x9");

test("Plano 6x9 con lomo de 0.4504in", () => {
  const plan = buildPlan(sixByNine, 0.4504, DEFAULT_BLEED, 300);

  assert.equal(plan.canvas.widthPx, 3810);
  assert.equal(plan.canvas.heightPx, 2775);
  assert.ok(Math.abs(plan.pageWidthInches - 12.7004) < 1e-9);
  assert.equal(plan.pageHeightInches, 9.25);

  assert.deepEqual(plan.panels.back.rect, { x: 0, y: 0, width: 1838, height: 2775 });
  assert.deepEqual(plan.panels.spine.rect, { x: 1838, y: 0, width: 135, height: 2775 });
  assert.deepEqual(plan.panels.front.rect, { x: 1973, y: 0, width: 1837, height: 2775 });
});

test("Areas seguras: 0.25in en tapas, 0.0625in horizontal en el lomo", () => {
  const plan = buildPlan(sixByNine, 0.4504, DEFAULT_BLEED, 300);

  assert.deepEqual(plan.panels.front.safe, { x: 2048, y: 75, width: 1687, height: 2625 });
  assert.deepEqual(plan.panels.back.safe, { x: 75, y: 75, width: 1688, height: 2625 });
  assert.deepEqual(plan.panels.spine.safe, { x: 1857, y: 75, width: 97, height: 2625 });
});

test("Paneles contiguos que cubren el lienzo completo", () => {
  for (const [spineInches, trimKey] of [
    [0.06, "5x8"],
    [0.3333, "5.5x8.5"],
    [1.2345, "8.5x11"],
  ] as const) {
    const plan = buildPlan(resolveTrimSize(trimKey), spineInches, DEFAULT_BLEED, 300, { allowNarrowSpine: true });
    let x = 0;
    for (const id of PANEL_ORDER) {
      const rect = plan.panels[id].rect;
      assert.equal(rect.x, x, `${trimKey} ${id}`);
      assert.equal(rect.height, plan.canvas.heightPx);
      x += rect.width;
    }
    assert.equal(x, plan.canvas.widthPx);
  }
});

test("Lomo sin area segura falla salvo allowNarrowSpine", () => {
  const trim = resolveTrimSize("5x8");
  assert.throws(() => buildPlan(trim, 0.06, DEFAULT_BLEED, 300), SpineTooNarrowForTextError);

  const plan = buildPlan(trim, 0.06, DEFAULT_BLEED, 300, { allowNarrowSpine: true });
  assert.equal(plan.panels.spine.safe, null);
  assert.ok(plan.panels.spine.rect.width <= 18);
});

test("Dimensiones invalidas", () => {
  assert.throws(() => buildPlan(sixByNine, 0, DEFAULT_BLEED, 300), InvalidDimensionError);
  assert.throws(() => buildPlan(customTrimSize(0.3, 9), 0.5, DEFAULT_BLEED, 300), InvalidDimensionError);
  assert.throws(
    () => buildPlan(sixByNine, 0.5, { ...DEFAULT_BLEED, bleedInches: -0.125 }, 300),
    InvalidDimensionError
  );
});

test("Bandas y coordenadas locales", () => {
  assert.deepEqual(band({ x: 0, y: 10, width: 5, height: 100 }, 0.1, 0.4), { x: 0, y: 20, width: 5, height: 30 });
  assert.deepEqual(toPanelLocal({ x: 2048, y: 75, width: 10, height: 20 }, { x: 1973, y: 0, width: 1837, height: 2775 }), {
    x: 75,
    y: 75,
    width: 10,
    height: 20,
  });
});
