import { readFile, stat } from "node:fs/promises";
import { basename, extname } from "node:path";
import type { ImageSourcePort } from "../../application/ports";
import { UploadRejectedError } from "../../domain/errors";

export const ALLOWED_EXTENSIONS: readonly string[] = ["png", "jpg", "jpeg", "gif", "bmp", "tiff"];
export const MAX_FILE_BYTES = 16 * 1024 * 1024; // 16MB

export class FsImageSource implements ImageSourcePort {
  constructor(private readonly maxBytes = MAX_FILE_BYTES) {}

  async load(filePath: string, field: string): Promise<Buffer> {
    const ext = extname(filePath).slice(1).toLowerCase();
    if (!ALLOWED_EXTENSIONS.includes(ext)) {
      throw new UploadRejectedError(
        field,
        `Tipo de archivo no permitido para ${field}: ${basename(filePath)} (usar ${ALLOWED_EXTENSIONS.join(", ")}).`,
        filePath
      );
    }

    const info = await stat(filePath);
    if (!info.isFile()) throw new UploadRejectedError(field, `No es un archivo: ${filePath}`, filePath);
    if (info.size > this.maxBytes) {
      const mb = (this.maxBytes / (1024 * 1024)).toFixed(0);
      throw new UploadRejectedError(field, `Archivo demasiado grande para ${field} (maximo ${mb}MB).`, info.size);
    }

    return readFile(filePath);
  }
}
