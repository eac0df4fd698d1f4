import {
  IsEmail,
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
  MinLength,
} from 'class-validator';
import { Trim } from '../../../common/transforms/trim.transform';
import { EMAIL_PATTERN } from '../../../common/schemas/serialize-document';

/**
 * DTO for the contact form
 *
 * @example
 * ```json
 * {
 *   "name": "Anna Gruber",
 *   "email": "anna@example.com",
 *   "subject": "Group visit",
 *   "message": "Do you offer reduced prices for groups of 15?"
 * }
 * ```
 */
export class CreateContactMessageDto {
  @Trim()
  @IsString({ message: 'name must be a string' })
  @IsNotEmpty({ message: 'name must not be empty' })
  @MaxLength(255)
  name!: string;

  @Trim()
  @IsEmail({}, { message: 'email must be a valid email address' })
  @Matches(EMAIL_PATTERN, { message: 'email must not contain spaces' })
  email!: string;

  @Trim()
  @IsString({ message: 'subject must be a string' })
  @IsNotEmpty({ message: 'subject must not be empty' })
  @MaxLength(255)
  subject!: string;

  @Trim()
  @IsString({ message: 'message must be a string' })
  @MinLength(5, { message: 'message must be at least 5 characters long' })
  @MaxLength(5000)
  message!: string;
}
