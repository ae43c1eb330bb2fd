import { z } from 'zod';

/**
 * Building blocks for the wire schemas.
 *
 * The modem sends every value as a string, but numbers and booleans are
 * accepted too and read through their text form.
 */
const wireScalar = z.union([z.string(), z.number(), z.boolean()]);

/**
 * A field that may be missing, null or blank. Missing and null are absent;
 * anything else goes through the normalizer.
 */
export function optionalField<T>(normalize: (raw: string) => T | null) {
  return z
    .union([wireScalar, z.null()])
    .optional()
    .transform((value): T | null =>
      value === undefined || value === null ? null : normalize(String(value)),
    );
}

/**
 * A field every record must carry. A missing value, or one the normalizer
 * rejects (returns null for), fails the record.
 */
export function requiredField<T>(
  normalize: (raw: string) => T | null,
  expected: string,
) {
  return wireScalar.transform((value, ctx): T => {
    const normalized = normalize(String(value));
    if (normalized === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `is not ${expected}`,
      });
      return z.NEVER;
    }
    return normalized;
  });
}

/** A required field kept as text. */
export const requiredText = wireScalar.transform((value) => String(value));
