import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { ProcedureTypesModule } from '../procedure-types/procedure-types.module';
import { ApplicationsModule } from '../applications/applications.module';
import { EventsService } from './events.service';
import { EventArchiveService } from './event-archive.service';

@Module({
  imports: [UsersModule, ProcedureTypesModule, ApplicationsModule],
  providers: [EventsService, EventArchiveService],
  exports: [EventsService],
})
export class EventsModule {}
