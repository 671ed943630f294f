import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database.module';
import { StatusSyncService } from './status-sync.service';
import { ReconciliationController } from './reconciliation.controller';

@Module({
  imports: [DatabaseModule],
  controllers: [ReconciliationController],
  providers: [StatusSyncService],
  exports: [StatusSyncService],
})
export class ReconciliationModule {}
