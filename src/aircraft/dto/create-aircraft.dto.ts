import { IsIn, IsString, Length } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import {
  aircraftSizeEnum,
  AircraftSize,
  manufacturerEnum,
  Manufacturer,
} from '../../db/schema';

export class CreateAircraftDto {
  @ApiProperty({ enum: manufacturerEnum.enumValues })
  @IsIn(manufacturerEnum.enumValues)
  manufacturer!: Manufacturer;

  @ApiProperty({ example: '787-9' })
  @IsString()
  @Length(1, 40)
  model!: string;

  @ApiProperty({ enum: aircraftSizeEnum.enumValues })
  @IsIn(aircraftSizeEnum.enumValues)
  size!: AircraftSize;
}
