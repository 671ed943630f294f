import { ArrayMaxSize, IsArray, IsInt, IsString, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class SaveCrewDto {
  @ApiProperty({ type: [String] })
  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  pilotIds!: string[];

  @ApiProperty({ type: [String] })
  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  attendantIds!: string[];

  @ApiProperty({ description: 'crewVersion read with the crew options' })
  @IsInt()
  @Min(0)
  crewVersion!: number;
}
