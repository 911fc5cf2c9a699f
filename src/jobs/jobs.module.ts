import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { IngestionProcessor } from './ingestion.processor';
import { IngestionModule } from '../modules/ingestion/ingestion.module';
import { INGESTION_QUEUE } from '../events/event-types';

@Module({
  imports: [
    BullModule.registerQueue({ name: INGESTION_QUEUE }),
    IngestionModule,
  ],
  providers: [IngestionProcessor],
})
export class JobsModule {}
