import {
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { Trim } from '../../../common/transforms/trim.transform';
import { EMAIL_PATTERN } from '../../../common/schemas/serialize-document';

/**
 * DTO for reserving tickets
 *
 * @example
 * ```json
 * {
 *   "event_id": "64a7b8c9d0e1f2a3b4c5d6e7",
 *   "name": "Anna Gruber",
 *   "email": "anna@example.com",
 *   "tickets": 2,
 *   "note": "Aisle seats if possible"
 * }
 * ```
 */
export class CreateReservationDto {
  /**
   * ID of the event to reserve.
   * Unknown or malformed ids are answered with 404, not 400.
   */
  @IsString({ message: 'event_id must be a string' })
  @IsNotEmpty({ message: 'event_id must not be empty' })
  event_id!: string;

  /**
   * Checked after trimming, like the schema: whitespace alone is empty
   */
  @Trim()
  @IsString({ message: 'name must be a string' })
  @IsNotEmpty({ message: 'name must not be empty' })
  @MaxLength(255)
  name!: string;

  // IsEmail accepts quoted local parts with spaces; the schema pattern does not
  @Trim()
  @IsEmail({}, { message: 'email must be a valid email address' })
  @Matches(EMAIL_PATTERN, { message: 'email must not contain spaces' })
  email!: string;

  /**
   * Between 1 and 10 tickets per reservation
   */
  @IsInt({ message: 'tickets must be an integer' })
  @Min(1, { message: 'tickets must be at least 1' })
  @Max(10, { message: 'tickets must be at most 10' })
  tickets!: number;

  @IsOptional()
  @Trim()
  @IsString({ message: 'note must be a string' })
  @MaxLength(1000)
  note?: string;
}
