import { IsIn, IsISO8601, IsOptional, IsString, Length } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export const DATE_TYPES = ['dep', 'arr'] as const;
export type DateType = (typeof DATE_TYPES)[number];

export class SearchFlightsQuery {
  @ApiPropertyOptional({ example: 'TLV' })
  @IsOptional()
  @IsString()
  @Length(1, 10)
  origin?: string;

  @ApiPropertyOptional({ example: 'ATH' })
  @IsOptional()
  @IsString()
  @Length(1, 10)
  destination?: string;

  @ApiPropertyOptional({ example: '2026-03-01' })
  @IsOptional()
  @IsISO8601({ strict: true })
  date?: string;

  // Whether `date` matches the departure or the arrival day
  @ApiPropertyOptional({ enum: DATE_TYPES, default: 'dep' })
  @IsOptional()
  @IsIn(DATE_TYPES)
  dateType?: DateType;
}
