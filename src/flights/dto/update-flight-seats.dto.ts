import {
  IsArray,
  IsIn,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Length,
  Max,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class ClassPricesDto {
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  @Max(999_999.99)
  Business?: number;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  @Max(999_999.99)
  Economy?: number;
}

export class SeatStatusChangeDto {
  @IsString()
  @Length(1, 10)
  flightSeatId!: string;

  @IsIn(['Available', 'Blocked'])
  status!: 'Available' | 'Blocked';
}

export class UpdateFlightSeatsDto {
  @ApiPropertyOptional({ type: ClassPricesDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => ClassPricesDto)
  classPrices?: ClassPricesDto;

  @ApiPropertyOptional({ type: [SeatStatusChangeDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeatStatusChangeDto)
  seatStatuses?: SeatStatusChangeDto[];
}
