import { IsEmail, IsIn, IsOptional, IsString, Length } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { orderStatusEnum, OrderStatus } from '../../db/schema';

export class ListOrdersQuery {
  @ApiPropertyOptional({ enum: orderStatusEnum.enumValues })
  @IsOptional()
  @IsIn(orderStatusEnum.enumValues)
  status?: OrderStatus;
}

export class ManagerOrdersQuery extends ListOrdersQuery {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @Length(1, 10)
  flightId?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsEmail()
  email?: string;
}
