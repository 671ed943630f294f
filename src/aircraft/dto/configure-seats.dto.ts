import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import type { SeatLayoutRequest } from '../seat-layout';

export class ConfigureSeatsDto implements SeatLayoutRequest {
  @ApiPropertyOptional({ description: 'Large aircraft only' })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(20)
  businessRows?: number;

  @ApiPropertyOptional({ description: 'Large aircraft only' })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(10)
  businessCols?: number;

  @ApiProperty()
  @IsInt()
  @Min(1)
  @Max(80)
  economyRows!: number;

  @ApiProperty()
  @IsInt()
  @Min(1)
  @Max(10)
  economyCols!: number;
}
