import { Type } from "class-transformer";
import { IsIn, IsNumber, IsOptional, IsPositive, IsString, IsUUID } from "class-validator";
import { MATERIAL_CATEGORIES, type MaterialCategory } from "../../price-store/price-store.types";

export class PriceTableQueryDto {
  @IsOptional()
  @IsIn(MATERIAL_CATEGORIES)
  category?: MaterialCategory;

  @IsOptional()
  @IsString()
  grade?: string;

  @IsOptional()
  @IsString()
  surfaceFinish?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  thicknessMin?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  thicknessMax?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  width?: number;
}

export class AvailableOptionsQueryDto {
  @IsUUID()
  materialId!: string;

  @IsString()
  surfaceFinish!: string;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  thickness!: number;
}
