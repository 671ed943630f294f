import { Body, Controller, Get, Param, Post, Put, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { AircraftService } from './aircraft.service';
import { CreateAircraftDto } from './dto/create-aircraft.dto';
import { ConfigureSeatsDto } from './dto/configure-seats.dto';

@ApiTags('Aircraft')
@ApiBearerAuth()
@Controller('manager/aircraft')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('manager')
export class AircraftController {
  constructor(private readonly aircraftService: AircraftService) {}

  @Get()
  listFleet() {
    return this.aircraftService.listFleet();
  }

  @Post()
  createAircraft(@Body() dto: CreateAircraftDto) {
    return this.aircraftService.createAircraft(dto);
  }

  @Put(':id/seats')
  configureSeats(@Param('id') id: string, @Body() dto: ConfigureSeatsDto) {
    return this.aircraftService.configureSeats(id, dto);
  }
}
