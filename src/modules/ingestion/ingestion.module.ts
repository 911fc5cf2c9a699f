import { Module } from '@nestjs/common';
import { VotersModule } from '../voters/voters.module';
import { IngestionService } from './ingestion.service';
import { CommitterService } from './committer.service';

@Module({
  imports: [VotersModule],
  providers: [IngestionService, CommitterService],
  exports: [IngestionService, CommitterService],
})
export class IngestionModule {}
