import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  Patch,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { FlightsService } from './flights.service';
import { FlightSeatsService } from './flight-seats.service';
import { CreateFlightDto } from './dto/create-flight.dto';
import { UpdateFlightDto } from './dto/update-flight.dto';
import { CandidateAircraftQuery, ListFlightsQuery } from './dto/list-flights.query';
import { UpdateFlightSeatsDto } from './dto/update-flight-seats.dto';

@ApiTags('Manager Flights')
@ApiBearerAuth()
@Controller('manager')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('manager')
export class FlightsController {
  constructor(
    private readonly flightsService: FlightsService,
    private readonly flightSeatsService: FlightSeatsService,
  ) {}

  @Get('routes')
  listRoutes() {
    return this.flightsService.listRoutes();
  }

  @Get('flights')
  listFlights(@Query() query: ListFlightsQuery) {
    return this.flightsService.listFlights(query);
  }

  @Get('flights/candidate-aircraft')
  candidateAircraft(@Query() query: CandidateAircraftQuery) {
    return this.flightsService.candidateAircraft(query.routeId, query.departure);
  }

  @Get('flights/:id')
  getFlight(@Param('id') id: string) {
    return this.flightsService.getFlight(id);
  }

  @Post('flights')
  createFlight(@Body() dto: CreateFlightDto) {
    return this.flightsService.createFlight(dto);
  }

  @Patch('flights/:id')
  updateFlight(@Param('id') id: string, @Body() dto: UpdateFlightDto) {
    return this.flightsService.updateFlight(id, dto);
  }

  @Post('flights/:id/cancel')
  @HttpCode(200)
  cancelFlight(@Param('id') id: string) {
    return this.flightsService.cancelFlight(id);
  }

  @Get('flights/:id/seats')
  getSeats(@Param('id') id: string) {
    return this.flightSeatsService.getSeats(id);
  }

  @Put('flights/:id/seats')
  updateSeats(@Param('id') id: string, @Body() dto: UpdateFlightSeatsDto) {
    return this.flightSeatsService.updateSeats(id, dto);
  }
}
