import {
  IsBoolean,
  IsISO8601,
  IsOptional,
  IsUUID,
  Matches,
} from 'class-validator';
import { ISO_DATE_PATTERN } from '../../../common/ladder-clock';

export class RecordMatchDto {
  @IsUUID()
  winnerId!: string;

  @IsUUID()
  loserId!: string;

  // defaults to today in the ladder time zone
  @IsOptional()
  @IsISO8601({ strict: true })
  @Matches(ISO_DATE_PATTERN, { message: 'date must be YYYY-MM-DD' })
  date?: string;

  @IsOptional()
  @IsBoolean()
  shutout?: boolean;
}
