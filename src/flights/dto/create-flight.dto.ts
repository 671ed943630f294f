import { IsISO8601, IsString, Length } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class CreateFlightDto {
  @ApiProperty({ example: 'R001' })
  @IsString()
  @Length(1, 10)
  routeId!: string;

  @ApiProperty({ example: '2030-04-01T08:30:00Z' })
  @IsISO8601()
  departure!: string;

  @ApiProperty({ example: 'ACB001' })
  @IsString()
  @Length(1, 10)
  aircraftId!: string;
}
