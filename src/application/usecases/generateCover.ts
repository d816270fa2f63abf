import {
  InvalidDimensionError,
  InvalidRequestError,
  MissingRequiredImageError,
} from "../../domain/errors";
import {
  COMPOSITION_STAGES,
  CompositedCanvas,
  CompositionStage,
  DEFAULT_BLEED,
  DEFAULT_DPI,
  GenerationRequest,
  NarrowSpinePolicy,
  PANEL_ORDER,
  PanelId,
  TextSettings,
  TrimSize,
  defaultTextSettings,
  parseHexColor,
  normalizeTrimSize,
  resolveTrimSize,
} from "../../domain/models";
import type {
  CanvasCompositorPort,
  DocumentEmitterPort,
  ImageFitterPort,
  LoggerPort,
  TextRendererPort,
} from "../ports";
import { buildPlan } from "../services/panelLayoutPlanner";
import { createSpineSpec } from "../services/spineCalculator";
import { CoverText, planTextLayers } from "../services/textPlacement";

export interface CoverComposerDeps {
  fitter: ImageFitterPort;
  textRenderer: TextRendererPort;
  compositor: CanvasCompositorPort;
  logger: LoggerPort;
}

interface ValidatedRequest {
  frontImage: Buffer;
  backImage?: Buffer;
  text: CoverText;
  trimSize: string | TrimSize;
  pageCount: number;
  paperType: string;
  dpi: number;
  settings: TextSettings;
  narrowSpine: NarrowSpinePolicy;
}

function requireText(value: string | undefined, field: string): string {
  const v = (value ?? "").trim();
  if (!v) throw new InvalidRequestError(field, `Falta el campo obligatorio ${field}.`, value);
  return v;
}

function positiveOr(value: number | undefined, fallback: number, field: string): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value <= 0) throw new InvalidDimensionError(field, value);
  return value;
}

export function deriveSpineLabel(title: string, author: string): string {
  return `${title} - ${author}`;
}

function validateRequest(request: GenerationRequest): ValidatedRequest {
  if (!request.frontImage || request.frontImage.length === 0) throw new MissingRequiredImageError("frontImage");

  const title = requireText(request.title, "title");
  const author = requireText(request.author, "author");
  const explicitSpine = (request.spineLabel ?? "").trim();

  const defaults = defaultTextSettings();
  const textColor = request.textColor ?? defaults.textColor;
  const backgroundColor = request.backgroundColor ?? defaults.backgroundColor;
  parseHexColor(textColor, "textColor");
  parseHexColor(backgroundColor, "backgroundColor");

  return {
    frontImage: request.frontImage,
    backImage: request.backImage && request.backImage.length > 0 ? request.backImage : undefined,
    text: {
      title,
      subtitle: (request.subtitle ?? "").trim(),
      author,
      spineLabel: explicitSpine || deriveSpineLabel(title, author),
      blurb: (request.blurb ?? "").trim(),
    },
    trimSize: request.trimSize,
    pageCount: request.pageCount,
    paperType: request.paperType,
    dpi: positiveOr(request.dpi, DEFAULT_DPI, "dpi"),
    settings: {
      ...defaults,
      textColor,
      backgroundColor,
      titleFontSizePt: positiveOr(request.titleFontSizePt, defaults.titleFontSizePt, "titleFontSizePt"),
      authorFontSizePt: positiveOr(request.authorFontSizePt, defaults.authorFontSizePt, "authorFontSizePt"),
      blurbFontSizePt: positiveOr(request.blurbFontSizePt, defaults.blurbFontSizePt, "blurbFontSizePt"),
    },
    // una etiqueta de lomo pedida explicitamente no se descarta en silencio
    narrowSpine: request.narrowSpine ?? (explicitSpine ? "fail" : "omit"),
  };
}

/**
 * Orquesta la generacion de una tapa envolvente:
 * Initialized -> PlanBuilt -> ImagesFitted -> TextRendered -> Composited -> Finalized.
 *
 * No guarda estado entre llamadas; cualquier error corta el pedido completo.
 */
export class CoverComposer {
  constructor(private readonly deps: CoverComposerDeps) {}

  async generateCover(request: GenerationRequest): Promise<CompositedCanvas> {
    const { fitter, textRenderer, compositor, logger } = this.deps;
    const stages: CompositionStage[] = [];
    const enter = (stage: CompositionStage) => {
      stages.push(stage);
      logger.info(`etapa ${stages.length}/${COMPOSITION_STAGES.length}: ${stage}`);
    };

    const req = validateRequest(request);
    enter("Initialized");

    const trim = typeof req.trimSize === "string" ? resolveTrimSize(req.trimSize) : normalizeTrimSize(req.trimSize);
    const spine = createSpineSpec(req.pageCount, req.paperType);
    const plan = buildPlan(trim, spine.spineWidthInches, DEFAULT_BLEED, req.dpi, {
      allowNarrowSpine: req.narrowSpine === "omit",
    });
    if (plan.panels.spine.safe === null) {
      logger.warn(`lomo de ${spine.spineWidthInches.toFixed(4)}" sin area segura; se omite el texto del lomo.`);
    }
    enter("PlanBuilt");

    const { back, spine: spinePanel, front } = plan.panels;
    const [frontImg, backImg, spineImg] = await Promise.all([
      fitter.fit(req.frontImage, front.rect.width, front.rect.height, "frontImage"),
      req.backImage
        ? fitter.fit(req.backImage, back.rect.width, back.rect.height, "backImage")
        : compositor.solidPanel(back.rect.width, back.rect.height, req.settings.backgroundColor),
      compositor.solidPanel(spinePanel.rect.width, spinePanel.rect.height, req.settings.backgroundColor),
    ]);
    enter("ImagesFitted");

    const images: Record<PanelId, Buffer> = { back: backImg, spine: spineImg, front: frontImg };
    const layers = planTextLayers(plan, req.text, req.settings);
    for (const id of PANEL_ORDER) {
      for (const layer of layers[id]) {
        images[id] = await textRenderer.renderText(images[id], layer);
      }
    }
    enter("TextRendered");

    const png = await compositor.compose({
      widthPx: plan.canvas.widthPx,
      heightPx: plan.canvas.heightPx,
      dpi: plan.dpi,
      layers: PANEL_ORDER.map((id) => ({
        input: images[id],
        left: plan.panels[id].rect.x,
        top: plan.panels[id].rect.y,
      })),
    });
    enter("Composited");

    enter("Finalized");
    return {
      png,
      widthPx: plan.canvas.widthPx,
      heightPx: plan.canvas.heightPx,
      dpi: plan.dpi,
      pageWidthInches: plan.pageWidthInches,
      pageHeightInches: plan.pageHeightInches,
      spine,
      plan,
      stages,
    };
  }
}

export interface GenerateCoverDocumentParams {
  composer: CoverComposer;
  emitter: DocumentEmitterPort;
  request: GenerationRequest;
  outputPath: string;
}

export async function generateCoverDocument(params: GenerateCoverDocumentParams): Promise<CompositedCanvas> {
  const canvas = await params.composer.generateCover(params.request);
  await params.emitter.emit({ canvas, outputPath: params.outputPath });
  return canvas;
}
