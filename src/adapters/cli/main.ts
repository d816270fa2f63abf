import readline from "node:readline";
import { readdir, mkdir } from "node:fs/promises";
import { join } from "node:path";

import { CoverComposer, generateCoverDocument } from "../../application/usecases/generateCover";
import { coverJobToRequest, toCoverJob } from "../../application/usecases/coverJob";
import { CompositedCanvas, CoverJob, PAPER_TYPES, listTrimSizes } from "../../domain/models";
import { SharpImageFitter } from "../imaging/sharpImageFitter";
import { SvgTextRenderer } from "../imaging/svgTextRenderer";
import { SharpCanvasCompositor } from "../imaging/sharpCanvasCompositor";
import { FsImageSource } from "../input/fsImageSource";
import { consoleLogger } from "../logging/consoleLogger";
import { CsvJobReader } from "../persistence/csvJobReader";
import { CsvJobWriter } from "../persistence/csvJobWriter";
import { PdfLibEmitter } from "../renderer/pdfLibEmitter";
import { CliConfig, loadCliConfig } from "./config";

function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) =>
    rl.question(question, (ans) => {
      rl.close();
      resolve(ans);
    })
  );
}

function toPositiveIntOrThrow(value: string, label: string): number {
  const n = Number(String(value ?? "").trim());
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${label} invalido. Debe ser un entero > 0.`);
  }
  return n;
}

function toOptionalPositive(value: string): number | undefined {
  const s = value.trim();
  if (!s) return undefined;
  const n = Number(s);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

function nowTimestamp(): string {
  return new Date()
    .toISOString()
    .replace(/[:.]/g, "-")
    .replace("T", "_")
    .slice(0, 19);
}

function slug(text: string): string {
  const s = text
    .normalize("NFKD")
    .replace(/[^\w\s-]/g, "")
    .trim()
    .replace(/\s+/g, "_")
    .slice(0, 40);
  return s || "cover";
}

function buildComposer(): CoverComposer {
  return new CoverComposer({
    fitter: new SharpImageFitter(consoleLogger),
    textRenderer: new SvgTextRenderer(),
    compositor: new SharpCanvasCompositor(),
    logger: consoleLogger,
  });
}

async function chooseFromList<T>(items: T[], label: (item: T) => string, prompt: string): Promise<T> {
  items.forEach((it, i) => console.log(`${i + 1}) ${label(it)}`));
  const choice = Number(await ask(prompt));
  const picked = items[choice - 1];
  if (!Number.isInteger(choice) || picked === undefined) {
    throw new Error("Seleccion invalida.");
  }
  return picked;
}

async function askBlurb(): Promise<string> {
  console.log("Texto de contratapa (linea vacia para terminar):");
  const lines: string[] = [];
  for (;;) {
    const line = await ask("> ");
    if (!line.trim()) break;
    lines.push(line);
  }
  return lines.join("\n");
}

function printSummary(canvas: CompositedCanvas, heading: string): void {
  console.log(`\n=== ${heading} ===`);
  console.log(`Corte: ${canvas.plan.trim.key} | Paginas: ${canvas.spine.pageCount} (${canvas.spine.paperType})`);
  console.log(`Lomo: ${canvas.spine.spineWidthInches.toFixed(4)}"`);
  console.log(
    `Lienzo: ${canvas.widthPx}x${canvas.heightPx}px @ ${canvas.dpi} DPI (${canvas.pageWidthInches.toFixed(3)}" x ${canvas.pageHeightInches.toFixed(3)}")`
  );
  if (!canvas.plan.panels.spine.safe) console.log("Lomo sin texto (demasiado angosto).");
}

async function renderJob(job: CoverJob, outputPdfPath: string): Promise<CompositedCanvas> {
  const request = await coverJobToRequest(job, new FsImageSource());
  return generateCoverDocument({
    composer: buildComposer(),
    emitter: new PdfLibEmitter(),
    request,
    outputPath: outputPdfPath,
  });
}

async function runNewCover(config: CliConfig): Promise<void> {
  await mkdir(config.outputsDir, { recursive: true });

  const frontImagePath = (await ask("Imagen de tapa (ruta): ")).trim();
  const backImagePath = (await ask("Imagen de contratapa (ruta, opcional): ")).trim();
  const title = await ask("Titulo: ");
  const subtitle = await ask("Subtitulo (opcional): ");
  const author = await ask("Autor: ");
  const spineLabel = await ask("Texto del lomo (vacio = titulo - autor): ");
  const blurb = await askBlurb();

  console.log("\nTamano de corte:");
  const trim = await chooseFromList(listTrimSizes(), (t) => `${t.key} in`, "\nElegi (numero): ");

  const pageCount = toPositiveIntOrThrow(await ask("Cantidad de paginas: "), "Cantidad de paginas");

  console.log("\nPapel:");
  const paperType = await chooseFromList([...PAPER_TYPES], (p) => p, "\nElegi (numero): ");

  const textColor = (await ask("Color de texto (#RRGGBB, vacio = blanco): ")).trim() || undefined;
  const titleFontSizePt = toOptionalPositive(await ask("Tamano de titulo en pt (vacio = 48): "));
  const authorFontSizePt = toOptionalPositive(await ask("Tamano de autor en pt (vacio = 24): "));

  const job = toCoverJob({
    frontImagePath,
    backImagePath,
    title,
    subtitle,
    author,
    spineLabel,
    blurb,
    trimSize: trim.key,
    pageCount,
    paperType,
    dpi: config.dpi,
    textColor,
    titleFontSizePt,
    authorFontSizePt,
  });

  const ts = nowTimestamp();
  const name = slug(job.title);
  const outputPdfPath = join(config.outputsDir, `tapa_${name}_${ts}.pdf`);
  const outputCsvPath = join(config.outputsDir, `pedido_${name}_${ts}.csv`);

  const canvas = await renderJob(job, outputPdfPath);
  printSummary(canvas, "RESUMEN");
  console.log(`\nPDF generado correctamente:\n${outputPdfPath}`);

  await new CsvJobWriter().writeJobCsv({ csvPath: outputCsvPath, job });
  console.log(`CSV generado:\n${outputCsvPath}`);
}

async function chooseCsvFromOutputs(config: CliConfig): Promise<string> {
  await mkdir(config.outputsDir, { recursive: true });
  const entries = await readdir(config.outputsDir, { withFileTypes: true });

  const csvs = entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .filter((name) => name.toLowerCase().startsWith("pedido_") && name.toLowerCase().endsWith(".csv"))
    .sort()
    .reverse();

  if (csvs.length === 0) {
    throw new Error(`No hay CSVs en: ${config.outputsDir}`);
  }

  console.log(`\nCSVs disponibles en: ${config.outputsDir}\n`);
  const picked = await chooseFromList(csvs, (f) => f, "\nElegi un CSV (numero): ");
  return join(config.outputsDir, picked);
}

async function runFromExistingCsv(config: CliConfig): Promise<void> {
  const csvPath = await chooseCsvFromOutputs(config);
  console.log(`\nUsando CSV:\n${csvPath}`);

  const job = await new CsvJobReader().read(csvPath);
  const outputPdfPath = join(config.outputsDir, `tapa_${slug(job.title)}_reprint_${nowTimestamp()}.pdf`);

  const canvas = await renderJob(job, outputPdfPath);
  printSummary(canvas, "RESUMEN (RE-EJECUCION)");
  console.log(`\nPDF generado correctamente (sin CSV):\n${outputPdfPath}`);
}

export async function runCli(config: CliConfig = loadCliConfig()): Promise<void> {
  console.log("\nGenerador de tapas iniciado\n");

  console.log("Que queres hacer?");
  console.log("1) Nueva tapa (wizard + genera PDF y CSV)");
  console.log("2) Re-ejecutar desde un CSV existente (genera SOLO PDF)\n");

  const choice = Number(await ask("Elegi (1/2): "));

  if (choice === 1) {
    await runNewCover(config);
    return;
  }

  if (choice === 2) {
    await runFromExistingCsv(config);
    return;
  }

  throw new Error("Opcion invalida.");
}
