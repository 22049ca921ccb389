import { Module } from '@nestjs/common';
import { ApplicationsModule } from '../applications/applications.module';
import { DaySummaryModule } from '../day-summary/day-summary.module';
import { EventsModule } from '../events/events.module';
import { ProcedureTypesModule } from '../procedure-types/procedure-types.module';
import { UsersModule } from '../users/users.module';
import { DiscordBotService } from './discord-bot.service';
import { AdminAccessService } from './services/admin-access.service';
import { PhotoCollectorService } from './services/photo-collector.service';
import { InteractionListener } from './listeners/interaction.listener';
import { ApplicationActionListener } from './listeners/application-action.listener';
import { ApplyFlowListener } from './listeners/apply-flow.listener';
import { RegisterCommandsService } from './commands/register-commands';
import { ProcedureCommand } from './commands/procedure.command';
import { ProcedureTypeCommand } from './commands/procedure-type.command';
import { QueueCommand } from './commands/queue.command';
import { SummaryCommand } from './commands/summary.command';
import { CandidateCommand } from './commands/candidate.command';

/**
 * The Discord interaction surface. The client itself lives in the global
 * NotificationsModule.
 */
@Module({
  imports: [
    UsersModule,
    ProcedureTypesModule,
    ApplicationsModule,
    EventsModule,
    DaySummaryModule,
  ],
  providers: [
    DiscordBotService,
    AdminAccessService,
    PhotoCollectorService,
    InteractionListener,
    ApplicationActionListener,
    ApplyFlowListener,
    RegisterCommandsService,
    ProcedureCommand,
    ProcedureTypeCommand,
    QueueCommand,
    SummaryCommand,
    CandidateCommand,
  ],
})
export class DiscordBotModule {}
