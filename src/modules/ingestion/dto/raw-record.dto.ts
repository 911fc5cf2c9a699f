import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import type { RawFields, RawRecord } from '../engine';

/** Unparsed cell text. Anything may be blank; the normalizer decides. */
export class RawFieldsDto implements RawFields {
  @IsString()
  @IsOptional()
  name?: string;

  @IsString()
  @IsOptional()
  age?: string;

  @IsString()
  @IsOptional()
  gender?: string;

  @IsString()
  @IsOptional()
  constituency?: string;

  @IsString()
  @IsOptional()
  boothNo?: string;

  @IsString()
  @IsOptional()
  address?: string;

  @IsString()
  @IsOptional()
  vote?: string;
}

export class RawRecordDto implements RawRecord {
  @IsString()
  @IsNotEmpty()
  sourceDocumentId!: string;

  @IsInt()
  @Min(0)
  rowIndex!: number;

  @IsBoolean()
  boothRequired!: boolean;

  @IsObject()
  @ValidateNested()
  @Type(() => RawFieldsDto)
  fields!: RawFieldsDto;
}
