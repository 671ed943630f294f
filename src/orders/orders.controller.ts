import { Body, Controller, Get, HttpCode, Param, Post, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { AuthenticatedUser } from '../typings/express';
import { OrdersService } from './orders.service';
import { ListOrdersQuery } from './dto/list-orders.query';
import { GuestCancelDto, GuestLookupDto } from './dto/guest-order.dto';

@ApiTags('Orders')
@Controller('orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Get()
  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard, RolesGuard)
  @Roles('customer')
  listCustomerOrders(@CurrentUser() user: AuthenticatedUser, @Query() query: ListOrdersQuery) {
    return this.ordersService.listCustomerOrders(user.email, query.status);
  }

  @Post('guest/lookup')
  @HttpCode(200)
  guestLookup(@Body() dto: GuestLookupDto) {
    return this.ordersService.guestLookup(dto.email, dto.orderCode);
  }

  @Post('guest/:code/cancel')
  @HttpCode(200)
  cancelGuestOrder(@Param('code') code: string, @Body() dto: GuestCancelDto) {
    return this.ordersService.cancelOrder(code, dto.email);
  }

  @Post(':code/cancel')
  @HttpCode(200)
  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard, RolesGuard)
  @Roles('customer')
  cancelOrder(@CurrentUser() user: AuthenticatedUser, @Param('code') code: string) {
    return this.ordersService.cancelOrder(code, user.email);
  }
}
