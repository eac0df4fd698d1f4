/**
 * toJSON transform shared by every schema: exposes `_id` as a string `id`
 * and drops the version key.
 */
export function serializeDocument(
  _doc: unknown,
  ret: Record<string, unknown>,
): Record<string, unknown> {
  ret.id = String(ret._id);
  delete ret._id;
  delete ret.__v;
  return ret;
}

export const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
