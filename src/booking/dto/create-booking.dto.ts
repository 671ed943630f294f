import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsEmail,
  IsOptional,
  IsString,
  Length,
  Matches,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class GuestDetailsDto {
  @ApiProperty()
  @IsString()
  @Length(1, 40)
  firstName!: string;

  @ApiProperty()
  @IsString()
  @Length(1, 40)
  lastName!: string;

  @ApiProperty()
  @IsEmail()
  email!: string;

  @ApiProperty({ type: [String], example: ['0501234567'] })
  @IsArray()
  @ArrayMinSize(1)
  @Matches(/^\+?[0-9-]{7,20}$/, { each: true })
  phones!: string[];
}

export class CreateBookingDto {
  @ApiProperty({ example: 'FT001' })
  @IsString()
  @Length(1, 10)
  flightId!: string;

  @ApiProperty({ type: [String], example: ['FS000001'] })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(20)
  @IsString({ each: true })
  seatIds!: string[];

  /** Required when no bearer token is sent */
  @ApiPropertyOptional({ type: GuestDetailsDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => GuestDetailsDto)
  guest?: GuestDetailsDto;
}
