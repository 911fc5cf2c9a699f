import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  IsUUID,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import type { ResolveReviewEvent } from '../../../events/event-types';
import { RawRecordDto } from './raw-record.dto';

export class ResolveReviewDto implements ResolveReviewEvent {
  @IsUUID()
  batchId!: string;

  @ValidateNested()
  @Type(() => RawRecordDto)
  row!: RawRecordDto;

  @IsIn(['create', 'merge'])
  action!: 'create' | 'merge';

  @ValidateIf((o: ResolveReviewDto) => o.action === 'merge')
  @IsInt()
  @Min(1)
  voterId?: number;

  @IsString()
  @IsNotEmpty()
  resolvedBy!: string;

  @IsInt()
  timestamp!: number;
}
