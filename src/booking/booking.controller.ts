import { Body, Controller, Get, Param, Post, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { OptionalJwtAuthGuard } from '../common/guards/optional-jwt-auth.guard';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { AuthenticatedUser } from '../typings/express';
import { BookingService } from './booking.service';
import { CreateBookingDto } from './dto/create-booking.dto';
import { SearchFlightsQuery } from './dto/search-flights.query';

@ApiTags('Booking')
@Controller()
export class BookingController {
  constructor(private readonly bookingService: BookingService) {}

  @Get('flights/search')
  search(@Query() query: SearchFlightsQuery) {
    return this.bookingService.search(query);
  }

  @Get('flights/:id/seats')
  availableSeats(@Param('id') id: string) {
    return this.bookingService.availableSeats(id);
  }

  // Registered customers send a bearer token; guests send their details instead
  @Post('bookings')
  @ApiBearerAuth()
  @UseGuards(OptionalJwtAuthGuard)
  confirmBooking(
    @Body() dto: CreateBookingDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ) {
    return this.bookingService.confirmBooking(dto, user);
  }
}
