import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database.module';
import { SchedulingModule } from '../scheduling/scheduling.module';
import { CrewController } from './crew.controller';
import { CrewService } from './crew.service';

@Module({
  imports: [DatabaseModule, SchedulingModule],
  controllers: [CrewController],
  providers: [CrewService],
})
export class CrewModule {}
