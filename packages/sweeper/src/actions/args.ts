import { z } from 'zod';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

/** An absent flag reads as `defaultValue`. */
function booleanFlag(defaultValue: boolean) {
  return z.preprocess((value) => {
    if (value === undefined) {
      return String(defaultValue);
    }

    if (typeof value === 'string') {
      return value.toLowerCase();
    }

    return value;
  }, booleanFromCliSchema);
}

/** Like {@link booleanFlag}, but stays `undefined` when the flag is absent. */
function optionalBooleanFlag() {
  return z
    .preprocess(
      (value) => (typeof value === 'string' ? value.toLowerCase() : value),
      booleanFromCliSchema,
    )
    .optional();
}

function optionalPath(message: string) {
  return z
    .preprocess(
      (value) => {
        if (value === undefined) {
          return undefined;
        }

        if (typeof value === 'string') {
          const trimmed = value.trim();
          return trimmed.length ? trimmed : undefined;
        }

        return value;
      },
      z.string().min(1, message),
    )
    .optional();
}

export { booleanFromCliSchema, booleanFlag, optionalBooleanFlag, optionalPath };
