import { Transform, TransformFnParams } from 'class-transformer';

/**
 * Trim string input before validation, the way the mongoose schemas trim
 * on save. Non-strings pass through for the type validators to reject.
 */
export function Trim(): PropertyDecorator {
  return Transform(({ value }: TransformFnParams): unknown =>
    typeof value === 'string' ? value.trim() : value,
  );
}
