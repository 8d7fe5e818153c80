import { Transform } from "class-transformer";
import { IsIn, IsOptional, IsString } from "class-validator";
import { toList } from "../../common/query-list";
import {
  FILM_TYPES,
  type FilmType,
  GRINDING_PROVIDERS,
  type GrindingProvider,
  MATERIAL_CATEGORIES,
  type MaterialCategory,
} from "../../price-store/price-store.types";
import { EXPORT_DATA_TYPES, type ExportDataType } from "../price-export.service";

export class ExportPricesQueryDto {
  @IsOptional()
  @IsIn(EXPORT_DATA_TYPES)
  dataType?: ExportDataType;

  @IsOptional()
  @Transform(toList)
  @IsIn(MATERIAL_CATEGORIES, { each: true })
  categories?: MaterialCategory[];

  @IsOptional()
  @Transform(toList)
  @IsString({ each: true })
  grades?: string[];

  @IsOptional()
  @Transform(toList)
  @IsIn(GRINDING_PROVIDERS, { each: true })
  providers?: GrindingProvider[];

  @IsOptional()
  @Transform(toList)
  @IsIn(FILM_TYPES, { each: true })
  filmTypes?: FilmType[];
}
