import {
  IsBoolean,
  IsIn,
  IsInt,
  IsISO8601,
  IsOptional,
  IsString,
  Length,
  Matches,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import type { CrewRole } from '../../scheduling/scheduling.types';

export const CREW_ROLES: readonly CrewRole[] = ['pilot', 'attendant'];

export class CreateCrewMemberDto {
  @ApiProperty({ enum: CREW_ROLES })
  @IsIn(CREW_ROLES)
  role!: CrewRole;

  @ApiProperty({ example: '123456782', description: 'National id, 9 digits' })
  @Matches(/^[0-9]{9}$/)
  id!: string;

  @IsString()
  @Length(1, 40)
  firstName!: string;

  @IsString()
  @Length(1, 40)
  lastName!: string;

  @IsString()
  @Length(1, 60)
  city!: string;

  @IsString()
  @Length(1, 60)
  street!: string;

  @IsInt()
  @Min(1)
  houseNumber!: number;

  @Matches(/^\+?[0-9][0-9-]{6,18}$/)
  phone!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsISO8601()
  startedAt?: string;

  @IsBoolean()
  longHaulCertified!: boolean;
}

export class ListCrewQuery {
  @IsOptional()
  @IsIn(CREW_ROLES)
  role?: CrewRole;
}
