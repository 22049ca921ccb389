import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BullModule } from '@nestjs/bullmq';
import type { ConnectionOptions } from 'bullmq';

/** Unix socket path (e.g. /tmp/redis.sock) vs TCP URL */
export function redisConnectionFromUrl(url: string): ConnectionOptions {
  if (url.startsWith('/')) {
    return { path: url };
  }

  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    ...(parsed.password ? { password: parsed.password } : {}),
  };
}

@Global()
@Module({
  imports: [
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        connection: redisConnectionFromUrl(
          config.get<string>('REDIS_URL', 'redis://localhost:6379'),
        ),
      }),
    }),
  ],
  exports: [BullModule],
})
export class QueueModule {}
