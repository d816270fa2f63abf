export class DomainError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(message: string, field: string, value?: unknown) {
    super(message);
    // Fix para herencia correcta en TS/Node
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
    this.field = field;
    this.value = value;
  }
}

export class InvalidDimensionError extends DomainError {
  constructor(field: string, value: unknown) {
    super(`Dimension invalida en ${field}: ${String(value)} (debe ser un numero finito >= 0).`, field, value);
  }
}

export class UnsupportedPaperTypeError extends DomainError {
  constructor(value: unknown) {
    super(`Tipo de papel no soportado: ${String(value)}.`, "paperType", value);
  }
}

export class InvalidPageCountError extends DomainError {
  constructor(value: unknown, minimum: number) {
    super(`Cantidad de paginas invalida: ${String(value)} (entero >= ${minimum}).`, "pageCount", value);
  }
}

export class UnknownTrimSizeError extends DomainError {
  constructor(value: string) {
    super(`Tamano de corte desconocido: ${value}.`, "trimSize", value);
  }
}

export class SpineTooNarrowForTextError extends DomainError {
  constructor(spineWidthInches: number) {
    super(
      `El lomo (${spineWidthInches.toFixed(4)}") no deja area segura para texto.`,
      "spineWidthInches",
      spineWidthInches
    );
  }
}

export class UnsupportedImageFormatError extends DomainError {
  constructor(field: string, reason?: string) {
    super(`No se pudo decodificar la imagen ${field}${reason ? `: ${reason}` : "."}`, field);
  }
}

export class ImageTooSmallError extends DomainError {
  constructor(field: string, widthPx: number, heightPx: number, minimumPx: number) {
    super(
      `Imagen ${field} demasiado chica: ${widthPx}x${heightPx}px (minimo ${minimumPx}px por lado).`,
      field,
      { widthPx, heightPx }
    );
  }
}

export class MissingRequiredImageError extends DomainError {
  constructor(field = "frontImage") {
    super("Falta la imagen de tapa (frente).", field);
  }
}

export class InvalidRequestError extends DomainError {
  constructor(field: string, message: string, value?: unknown) {
    super(message, field, value);
  }
}

export class UploadRejectedError extends DomainError {
  constructor(field: string, message: string, value?: unknown) {
    super(message, field, value);
  }
}
