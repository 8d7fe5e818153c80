import { BadRequestException, NotFoundException } from "@nestjs/common";

export class MaterialNotFoundError extends NotFoundException {
  constructor(readonly materialId: string) {
    super(`Material ${materialId} not found`);
  }
}

export class BasePriceNotFoundError extends NotFoundException {
  constructor(grade: string, surfaceFinish: string, thickness: number, width: number) {
    super(`No base price for ${grade} ${surfaceFinish} ${thickness}mm x ${width}mm`);
  }
}

export class ImportNotFoundError extends NotFoundException {
  constructor(readonly importId: string) {
    super(`Import ${importId} not found or expired. Upload the file again.`);
  }
}

export class PriceValidationError extends BadRequestException {}

/**
 * Raised for a single spreadsheet row. The reconciler records it against the
 * row and moves on.
 */
export class RowParseError extends Error {
  constructor(readonly rowNumber: number, message: string) {
    super(message);
    this.name = "RowParseError";
  }
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : "Unknown error";
}
