import { IsBoolean, IsIn } from "class-validator";
import { IMPORT_MODES, type ImportMode } from "../import/import.types";

export class ApplyImportDto {
  @IsIn(IMPORT_MODES)
  mode!: ImportMode;

  @IsBoolean()
  confirm!: boolean;
}
