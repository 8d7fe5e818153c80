import { Transform, Type } from "class-transformer";
import {
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from "class-validator";
import { toList, toNumberList } from "../../common/query-list";
import { CHANGE_TYPES, type ChangeType, MAX_ROUND_TO } from "../price-formula";

export class BulkPriceFiltersDto {
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  categories?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  groupIds?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  grades?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  surfaceFinishes?: string[];

  @IsOptional()
  @IsNumber()
  @Min(0)
  thicknessMin?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  thicknessMax?: number;

  @IsOptional()
  @IsArray()
  @IsPositive({ each: true })
  widths?: number[];
}

export class FilterOptionsQueryDto {
  @IsOptional()
  @Transform(toList)
  @IsString({ each: true })
  categories?: string[];

  @IsOptional()
  @Transform(toList)
  @IsString({ each: true })
  groupIds?: string[];

  @IsOptional()
  @Transform(toList)
  @IsString({ each: true })
  grades?: string[];

  @IsOptional()
  @Transform(toList)
  @IsString({ each: true })
  surfaceFinishes?: string[];

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  thicknessMin?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  thicknessMax?: number;

  @IsOptional()
  @Transform(toNumberList)
  @IsPositive({ each: true })
  widths?: number[];
}

export class BulkPriceChangeDto {
  @ValidateNested()
  @Type(() => BulkPriceFiltersDto)
  filters!: BulkPriceFiltersDto;

  @IsIn(CHANGE_TYPES)
  changeType!: ChangeType;

  @IsNumber()
  changeValue!: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_ROUND_TO)
  roundTo?: number;
}

export class BulkPricePreviewDto extends BulkPriceChangeDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  page?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(500)
  perPage?: number;
}

export class BulkPriceApplyDto extends BulkPriceChangeDto {
  @IsOptional()
  @IsString()
  @MaxLength(500)
  notes?: string;
}

export class AuditHistoryQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  limit?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;

  @IsOptional()
  @IsString()
  changeType?: string;
}
