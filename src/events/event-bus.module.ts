import { Global, Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { EventBusService } from './event-bus.service';
import { INGESTION_QUEUE } from './event-types';

@Global()
@Module({
  imports: [BullModule.registerQueue({ name: INGESTION_QUEUE })],
  providers: [EventBusService],
  exports: [EventBusService],
})
export class EventBusModule {}
