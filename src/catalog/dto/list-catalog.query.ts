import { ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import { IsInt, IsOptional, IsString, Max, Min } from "class-validator";

export const DEFAULT_LIST_LIMIT = 10;
export const MAX_LIST_LIMIT = 100;

class LimitQueryDto {
  @ApiPropertyOptional({
    minimum: 1,
    maximum: MAX_LIST_LIMIT,
    default: DEFAULT_LIST_LIMIT,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_LIST_LIMIT)
  limit?: number;
}

export class ListProductsQueryDto extends LimitQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  category?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  brand?: string;
}

export class ListStocksQueryDto extends LimitQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  warehouse_id?: string;
}

export class ListPricesQueryDto extends LimitQueryDto {
  @ApiPropertyOptional({ example: "EUR" })
  @IsOptional()
  @IsString()
  currency?: string;
}
