import { writeFile } from "node:fs/promises";
import { PDFDocument } from "pdf-lib";
import type { DocumentEmitterPort } from "../../application/ports";
import { CompositedCanvas, inchesToPoints } from "../../domain/models";

export class PdfLibEmitter implements DocumentEmitterPort {
  async toPdfBytes(canvas: CompositedCanvas): Promise<Uint8Array> {
    const doc = await PDFDocument.create();
    doc.setTitle(`Cover ${canvas.plan.trim.key} (${canvas.spine.pageCount} p.)`);

    const pageW = inchesToPoints(canvas.pageWidthInches);
    const pageH = inchesToPoints(canvas.pageHeightInches);
    const bleed = inchesToPoints(canvas.plan.bleed.bleedInches);

    const page = doc.addPage([pageW, pageH]);
    // cajas de imprenta: la pagina completa es el sangrado, el corte va adentro
    page.setBleedBox(0, 0, pageW, pageH);
    page.setTrimBox(bleed, bleed, pageW - 2 * bleed, pageH - 2 * bleed);

    const png = await doc.embedPng(canvas.png);
    page.drawImage(png, { x: 0, y: 0, width: pageW, height: pageH });

    return doc.save();
  }

  async emit(params: { canvas: CompositedCanvas; outputPath: string }): Promise<void> {
    const pdfBytes = await this.toPdfBytes(params.canvas);
    await writeFile(params.outputPath, pdfBytes);
  }
}
