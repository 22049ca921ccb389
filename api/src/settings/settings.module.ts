import { Module } from '@nestjs/common';
import { SettingsService } from './settings.service';
import { ChannelConfigService } from './channel-config.service';

@Module({
  providers: [SettingsService, ChannelConfigService],
  exports: [SettingsService, ChannelConfigService],
})
export class SettingsModule {}
