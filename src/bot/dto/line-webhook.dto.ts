import { Type } from 'class-transformer';
import {
  IsArray,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

// Subset of the Messaging API webhook body. Unknown fields are tolerated,
// LINE adds new ones without notice.

export class LineSourceDto {
  @IsString()
  type!: string;

  @IsOptional()
  @IsString()
  userId?: string;
}

export class LineMessageDto {
  @IsString()
  type!: string;

  @IsOptional()
  @IsString()
  id?: string;

  @IsOptional()
  @IsString()
  text?: string;
}

export class LineEventDto {
  @IsString()
  type!: string;

  @IsOptional()
  @IsString()
  replyToken?: string;

  @IsOptional()
  @IsString()
  webhookEventId?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => LineSourceDto)
  source?: LineSourceDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => LineMessageDto)
  message?: LineMessageDto;
}

export class LineWebhookDto {
  @IsOptional()
  @IsString()
  destination?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LineEventDto)
  events!: LineEventDto[];
}
