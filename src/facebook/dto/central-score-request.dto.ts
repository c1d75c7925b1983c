import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  ValidateNested,
} from 'class-validator';

export class SocialMediaRequestDTO {
  @IsNotEmpty()
  @IsString()
  social_media!: string;

  @IsNotEmpty()
  @IsString()
  username!: string;
}

export class ScoreRequestDTO {
  @IsNotEmpty()
  @IsString()
  type!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SocialMediaRequestDTO)
  data!: SocialMediaRequestDTO[];
}

export class CentralScoreRequestDTO {
  @IsNotEmpty()
  @IsString()
  fayda_number!: string;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => ScoreRequestDTO)
  requests!: ScoreRequestDTO[];

  @IsOptional()
  @IsUrl({ require_protocol: true, require_tld: false })
  callbackUrl?: string;
}
