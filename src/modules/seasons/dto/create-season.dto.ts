import {
  IsISO8601,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  MinLength,
} from 'class-validator';
import { ISO_DATE_PATTERN } from '../../../common/ladder-clock';

export class CreateSeasonDto {
  @IsString()
  @MinLength(1)
  @MaxLength(120)
  name!: string;

  @IsISO8601({ strict: true })
  @Matches(ISO_DATE_PATTERN, { message: 'startDate must be YYYY-MM-DD' })
  startDate!: string;

  @IsOptional()
  @IsISO8601({ strict: true })
  @Matches(ISO_DATE_PATTERN, { message: 'endDate must be YYYY-MM-DD' })
  endDate?: string;
}
