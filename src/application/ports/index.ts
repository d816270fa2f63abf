import type { CompositedCanvas, CoverJob, Rect } from "../../domain/models";
import type { TextMode, TextRotation } from "../services/textLayout";

// ===== Logging =====
export interface LoggerPort {
  info(message: string): void;
  warn(message: string): void;
}

// ===== Imagen (sharp, etc.) =====
export interface ImageFitterPort {
  /** Devuelve un PNG de exactamente targetWidthPx x targetHeightPx. */
  fit(source: Buffer, targetWidthPx: number, targetHeightPx: number, field?: string): Promise<Buffer>;
}

export interface TextStyle {
  shadow: boolean;
  outline: boolean;
  fontFamily: string;
  fontWeight: "normal" | "bold";
}

export interface TextLayer {
  text: string;
  rect: Rect; // coordenadas locales del panel
  fontSizePx: number;
  minFontSizePx: number;
  color: string;
  rotation: TextRotation;
  mode: TextMode;
  style: TextStyle;
}

export interface TextRendererPort {
  renderText(panelImage: Buffer, layer: TextLayer): Promise<Buffer>;
}

export interface CanvasLayer {
  input: Buffer;
  left: number;
  top: number;
}

export interface CanvasCompositorPort {
  solidPanel(widthPx: number, heightPx: number, color: string): Promise<Buffer>;
  compose(params: { widthPx: number; heightPx: number; dpi: number; layers: CanvasLayer[] }): Promise<Buffer>;
}

// ===== Emisor de documento (PDF, etc.) =====
export interface DocumentEmitterPort {
  emit(params: { canvas: CompositedCanvas; outputPath: string }): Promise<void>;
}

// ===== Entrada de archivos =====
export interface ImageSourcePort {
  load(filePath: string, field: string): Promise<Buffer>;
}

// ===== Persistencia del pedido =====
export interface JobWriterPort {
  writeJobCsv(params: { csvPath: string; job: CoverJob }): Promise<void>;
}

export interface JobReaderPort {
  read(csvPath: string): Promise<CoverJob>;
}
