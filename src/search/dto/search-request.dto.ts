/**
 * Search Request DTO
 * Input for the search workflow
 */

import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsInt,
  IsBoolean,
  Min,
  Max,
} from 'class-validator';

export class SearchRequestDto {
  @IsString()
  @IsNotEmpty()
  declare query: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  declare page?: number; // default: 1

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  declare size?: number; // default: SEARCH_DEFAULT_SIZE

  @IsOptional()
  @IsBoolean()
  declare useCache?: boolean; // default: true
}
