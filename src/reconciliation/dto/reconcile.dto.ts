import { IsOptional, IsString, Length } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class ReconcileDto {
  @ApiPropertyOptional({ description: 'Limit the sweep to one flight', example: 'FT001' })
  @IsOptional()
  @IsString()
  @Length(1, 10)
  flightId?: string;
}
