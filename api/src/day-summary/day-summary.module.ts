import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { SettingsModule } from '../settings/settings.module';
import { DaySummaryService } from './day-summary.service';
import { DaySummaryQueueService, DAY_SUMMARY_QUEUE } from './day-summary.queue';
import { DaySummaryProcessor } from './day-summary.processor';
import { DaySummaryListener } from './day-summary.listener';

@Module({
  imports: [SettingsModule, BullModule.registerQueue({ name: DAY_SUMMARY_QUEUE })],
  providers: [
    DaySummaryService,
    DaySummaryQueueService,
    DaySummaryProcessor,
    DaySummaryListener,
  ],
  exports: [DaySummaryService],
})
export class DaySummaryModule {}
