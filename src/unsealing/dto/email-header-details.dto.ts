import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

export class EmailMessageAddressDto {
  @IsString()
  @IsNotEmpty()
  emailAddress!: string;

  @IsOptional()
  @IsString()
  displayName?: string;
}

/**
 * JSON carried in the sealed RFC 822 header attribute of a message.
 * `date` is milliseconds since the epoch.
 */
export class EmailHeaderDetailsDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EmailMessageAddressDto)
  from!: EmailMessageAddressDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EmailMessageAddressDto)
  to?: EmailMessageAddressDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EmailMessageAddressDto)
  cc?: EmailMessageAddressDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EmailMessageAddressDto)
  bcc?: EmailMessageAddressDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EmailMessageAddressDto)
  replyTo?: EmailMessageAddressDto[];

  @IsOptional()
  @IsBoolean()
  hasAttachments?: boolean;

  @IsOptional()
  @IsString()
  subject?: string;

  @IsOptional()
  @IsInt()
  date?: number;

  @IsOptional()
  @IsString()
  inReplyTo?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  references?: string[];
}
