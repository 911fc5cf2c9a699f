import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsString,
  IsUUID,
  ValidateNested,
} from 'class-validator';
import type { IngestBatchEvent } from '../../../events/event-types';
import { RawRecordDto } from './raw-record.dto';

export class IngestBatchDto implements IngestBatchEvent {
  @IsUUID()
  batchId!: string;

  @IsArray()
  @ArrayMaxSize(50_000)
  @ValidateNested({ each: true })
  @Type(() => RawRecordDto)
  rows!: RawRecordDto[];

  @IsString()
  @IsNotEmpty()
  submittedBy!: string;

  @IsInt()
  timestamp!: number;
}
