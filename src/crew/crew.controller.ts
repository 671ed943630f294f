import { Body, Controller, Get, Param, Post, Put, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { CrewService } from './crew.service';
import { CreateCrewMemberDto, ListCrewQuery } from './dto/create-crew-member.dto';
import { SaveCrewDto } from './dto/save-crew.dto';

@ApiTags('Crew')
@ApiBearerAuth()
@Controller('manager')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('manager')
export class CrewController {
  constructor(private readonly crewService: CrewService) {}

  @Get('crew')
  listCrew(@Query() query: ListCrewQuery) {
    return this.crewService.listCrew(query.role);
  }

  @Post('crew')
  createMember(@Body() dto: CreateCrewMemberDto) {
    return this.crewService.createMember(dto);
  }

  @Get('flights/:id/crew')
  getCrewOptions(@Param('id') id: string) {
    return this.crewService.getCrewOptions(id);
  }

  @Put('flights/:id/crew')
  saveCrew(@Param('id') id: string, @Body() dto: SaveCrewDto) {
    return this.crewService.saveCrew(id, dto);
  }
}
