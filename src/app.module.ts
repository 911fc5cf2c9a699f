import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { BullModule } from '@nestjs/bullmq';

import appConfig from './config/app.config';
import databaseConfig from './config/database.config';
import redisConfig, { loadRedisSettings, type RedisSettings } from './config/redis.config';
import ingestionConfig from './config/ingestion.config';

import { DatabaseModule } from './database/database.module';
import { RedisModule } from './redis/redis.module';
import { CacheModule } from './cache/cache.module';
import { EventBusModule } from './events/event-bus.module';
import { VotersModule } from './modules/voters/voters.module';
import { IngestionModule } from './modules/ingestion/ingestion.module';
import { JobsModule } from './jobs/jobs.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, databaseConfig, redisConfig, ingestionConfig],
    }),

    // BullMQ
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        connection: {
          ...(config.get<RedisSettings>('redis') ?? loadRedisSettings(process.env)),
          maxRetriesPerRequest: null,
        },
      }),
    }),

    // Core modules
    DatabaseModule,
    RedisModule,
    CacheModule,
    EventBusModule,

    // Feature modules
    VotersModule,
    IngestionModule,
    JobsModule,
  ],
})
export class AppModule { }
