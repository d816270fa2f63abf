import { CoverPlan, PanelId, TextSettings, pointsToPixels } from "../../domain/models";
import type { TextLayer, TextStyle } from "../ports";
import { band, toPanelLocal } from "./panelLayoutPlanner";

export interface CoverText {
  title: string;
  subtitle: string;
  author: string;
  spineLabel: string;
  blurb: string;
}

// bandas verticales dentro del area segura, en fracciones del alto
export const FRONT_BANDS = {
  title: [0.1, 0.4],
  subtitle: [0.4, 0.52],
  author: [0.78, 1],
} as const;
export const BACK_BLURB_BAND = [0.1, 0.9] as const;

/**
 * Capas de texto por panel, en coordenadas locales del panel y en orden de apilado
 * (titulo, subtitulo, autor, resena). El lomo sin area segura no recibe texto.
 */
export function planTextLayers(plan: CoverPlan, text: CoverText, settings: TextSettings): Record<PanelId, TextLayer[]> {
  const px = (pt: number) => pointsToPixels(pt, plan.dpi);
  const minFontSizePx = px(settings.minFontSizePt);
  const style = (fontWeight: TextStyle["fontWeight"], outline = false): TextStyle => ({
    shadow: true,
    outline,
    fontFamily: settings.fontFamily,
    fontWeight,
  });
  const layers: Record<PanelId, TextLayer[]> = { back: [], spine: [], front: [] };

  const { back, spine, front } = plan.panels;

  if (front.safe) {
    const local = toPanelLocal(front.safe, front.rect);
    const titleSize = px(settings.titleFontSizePt);
    const entries: Array<[string, readonly [number, number], number, TextStyle]> = [
      [text.title, FRONT_BANDS.title, titleSize, style("bold", true)],
      [text.subtitle, FRONT_BANDS.subtitle, Math.floor(titleSize / 2), style("normal")],
      [text.author, FRONT_BANDS.author, px(settings.authorFontSizePt), style("normal")],
    ];
    for (const [value, [from, to], fontSizePx, s] of entries) {
      if (!value.trim()) continue;
      layers.front.push({
        text: value,
        rect: band(local, from, to),
        fontSizePx,
        minFontSizePx,
        color: settings.textColor,
        rotation: 0,
        mode: "line",
        style: s,
      });
    }
  }

  if (back.safe && text.blurb.trim()) {
    const local = toPanelLocal(back.safe, back.rect);
    layers.back.push({
      text: text.blurb,
      rect: band(local, BACK_BLURB_BAND[0], BACK_BLURB_BAND[1]),
      fontSizePx: px(settings.blurbFontSizePt),
      minFontSizePx,
      color: settings.textColor,
      rotation: 0,
      mode: "paragraph",
      style: style("normal"),
    });
  }

  if (spine.safe && text.spineLabel.trim()) {
    layers.spine.push({
      text: text.spineLabel,
      rect: toPanelLocal(spine.safe, spine.rect),
      fontSizePx: px(settings.spineFontSizePt),
      minFontSizePx,
      color: settings.textColor,
      rotation: 90,
      mode: "line",
      style: style("bold"),
    });
  }

  return layers;
}
