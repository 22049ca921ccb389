import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { DrizzleModule } from './drizzle/drizzle.module';
import { QueueModule } from './queue/queue.module';
import { SettingsModule } from './settings/settings.module';
import { NotificationsModule } from './notifications/notifications.module';
import { UsersModule } from './users/users.module';
import { ProcedureTypesModule } from './procedure-types/procedure-types.module';
import { ApplicationsModule } from './applications/applications.module';
import { EventsModule } from './events/events.module';
import { DaySummaryModule } from './day-summary/day-summary.module';
import { DiscordBotModule } from './discord-bot/discord-bot.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env' }),
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),
    QueueModule,
    DrizzleModule,
    SettingsModule,
    NotificationsModule,
    UsersModule,
    ProcedureTypesModule,
    ApplicationsModule,
    EventsModule,
    DaySummaryModule,
    DiscordBotModule,
  ],
})
export class AppModule {}
