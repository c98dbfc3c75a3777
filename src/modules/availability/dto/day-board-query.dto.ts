import { Matches } from 'class-validator';
import { ISO_DATE_PATTERN } from '../operating-hours';

export class DayBoardQueryDto {
  @Matches(ISO_DATE_PATTERN, { message: 'date must be YYYY-MM-DD' })
  date!: string;
}
