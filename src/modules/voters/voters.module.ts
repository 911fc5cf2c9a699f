import { Module } from '@nestjs/common';
import { VotersRepository } from './voters.repository';
import { VOTER_STORE } from './voter.types';

@Module({
  providers: [
    VotersRepository,
    { provide: VOTER_STORE, useExisting: VotersRepository },
  ],
  exports: [VotersRepository, VOTER_STORE],
})
export class VotersModule {}
