import { IsIn, IsISO8601, IsOptional } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { flightStatusEnum, FlightStatus } from '../../db/schema';

export class UpdateFlightDto {
  @ApiPropertyOptional({ enum: flightStatusEnum.enumValues })
  @IsOptional()
  @IsIn(flightStatusEnum.enumValues)
  status?: FlightStatus;

  @ApiPropertyOptional({ example: '2030-04-01T10:00:00Z' })
  @IsOptional()
  @IsISO8601()
  departure?: string;
}
