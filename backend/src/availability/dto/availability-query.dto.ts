import { Transform, Type } from "class-transformer";
import { IsBoolean, IsIn, IsNumber, IsOptional, IsPositive, IsString } from "class-validator";
import {
  FILM_TYPES,
  type FilmType,
  GRINDING_PROVIDERS,
  type GrindingProvider,
} from "../../price-store/price-store.types";

const toBoolean = ({ value }: { value: unknown }) =>
  value === true || value === "true" || value === "1";

export class GrindingAvailabilityQueryDto {
  @IsIn(GRINDING_PROVIDERS)
  provider!: GrindingProvider;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  thickness!: number;

  @IsOptional()
  @IsString()
  grit?: string;

  @IsOptional()
  @IsString()
  widthVariant?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  withSb?: boolean;
}

export class SheetGrindingAvailabilityQueryDto {
  @IsIn(GRINDING_PROVIDERS)
  provider!: GrindingProvider;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  thickness!: number;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  width!: number;

  @IsOptional()
  @IsString()
  grit?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  withSb?: boolean;
}

export class FilmAvailabilityQueryDto {
  @IsIn(FILM_TYPES)
  filmType!: FilmType;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  thickness!: number;
}

export class AvailableGrindingsQueryDto {
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  thickness!: number;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  width!: number;

  @IsOptional()
  @IsString()
  grit?: string;
}

export class GrindingMatrixQueryDto {
  @IsOptional()
  @IsString()
  widthVariant?: string;
}
