import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { OrdersService } from './orders.service';
import { ManagerOrdersQuery } from './dto/list-orders.query';

@ApiTags('Orders')
@ApiBearerAuth()
@Controller('manager/orders')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('manager')
export class ManagerOrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Get()
  list(@Query() query: ManagerOrdersQuery) {
    return this.ordersService.managerList(query);
  }
}
