import { Body, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { RolesGuard } from '../common/guards/roles.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { StatusSyncService } from './status-sync.service';
import { ReconcileDto } from './dto/reconcile.dto';

@ApiTags('Reconciliation')
@ApiBearerAuth()
@Controller('manager/reconcile')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('manager')
export class ReconciliationController {
  constructor(private readonly statusSync: StatusSyncService) {}

  @Post()
  @HttpCode(200)
  async reconcile(@Body() dto: ReconcileDto) {
    return { changes: await this.statusSync.run(dto.flightId) };
  }
}
