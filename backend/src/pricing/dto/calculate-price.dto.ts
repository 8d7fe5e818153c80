import { Type } from "class-transformer";
import {
  IsBoolean,
  IsIn,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  IsUUID,
  MinLength,
  ValidateNested,
} from "class-validator";
import {
  FILM_TYPES,
  type FilmType,
  GRINDING_PROVIDERS,
  type GrindingProvider,
} from "../../price-store/price-store.types";

export class GrindingSelectionDto {
  @IsIn(GRINDING_PROVIDERS)
  provider!: GrindingProvider;

  @IsOptional()
  @IsString()
  grit?: string;

  @IsOptional()
  @IsString()
  widthVariant?: string;

  @IsOptional()
  @IsBoolean()
  withSb?: boolean;
}

export class CalculatePriceDto {
  @IsUUID()
  materialId!: string;

  @IsString()
  @MinLength(1)
  surfaceFinish!: string;

  @IsNumber()
  @IsPositive()
  thickness!: number;

  @IsNumber()
  @IsPositive()
  width!: number;

  @IsNumber()
  @IsPositive()
  length!: number;

  @IsOptional()
  @IsIn(FILM_TYPES)
  filmType?: FilmType;

  @IsOptional()
  @ValidateNested()
  @Type(() => GrindingSelectionDto)
  grinding?: GrindingSelectionDto;
}
