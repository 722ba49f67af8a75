import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { HealthModule } from '../health/health.module';
import { InboundsModule } from '../inbounds/inbounds.module';
import { SchedulerService } from './scheduler.service';

@Module({
  imports: [ScheduleModule.forRoot(), HealthModule, InboundsModule],
  providers: [SchedulerService],
})
export class SchedulerModule {}
