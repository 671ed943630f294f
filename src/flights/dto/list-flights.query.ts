import { IsIn, IsISO8601, IsOptional, IsString, Length } from 'class-validator';
import { flightStatusEnum, FlightStatus } from '../../db/schema';

export class ListFlightsQuery {
  @IsOptional()
  @IsIn(flightStatusEnum.enumValues)
  status?: FlightStatus;

  /** Departures at or after this instant */
  @IsOptional()
  @IsISO8601()
  from?: string;

  @IsOptional()
  @IsISO8601()
  to?: string;

  @IsOptional()
  @IsString()
  @Length(1, 10)
  origin?: string;

  @IsOptional()
  @IsString()
  @Length(1, 10)
  destination?: string;
}

export class CandidateAircraftQuery {
  @IsString()
  @Length(1, 10)
  routeId!: string;

  @IsISO8601()
  departure!: string;
}
