import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { QueueService } from './queue.service';
import { ApplicationsService } from './applications.service';
import { ApplicationLifecycleService } from './application-lifecycle.service';
import { ApplicationMessageService } from './application-message.service';

/**
 * Applications, their queue and lifecycle.
 * NotifierService and the notification channel come from the global
 * NotificationsModule.
 */
@Module({
  imports: [UsersModule],
  providers: [
    QueueService,
    ApplicationsService,
    ApplicationLifecycleService,
    ApplicationMessageService,
  ],
  exports: [
    QueueService,
    ApplicationsService,
    ApplicationLifecycleService,
    ApplicationMessageService,
  ],
})
export class ApplicationsModule {}
