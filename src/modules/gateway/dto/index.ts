import {
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export const MAX_LINK_LENGTH = 8192;

export class ParseLinkDto {
  @IsString()
  @MaxLength(MAX_LINK_LENGTH)
  link!: string;
}

export class InterpretEventDto {
  @IsObject()
  event!: Record<string, unknown>;

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  wallet?: string;
}
