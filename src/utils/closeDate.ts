const EPOCH_MS_PATTERN = /^\s*-?\d+\s*$/;
const ISO_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * CRM close dates arrive as millisecond epochs, sometimes as ISO text.
 * Anything else resolves to `now`; this never throws.
 */
export function parseCloseDate(
  value: string | null | undefined,
  now: () => Date = () => new Date(),
): Date {
  if (!value) {
    return now();
  }

  if (EPOCH_MS_PATTERN.test(value)) {
    const fromEpoch = new Date(Number(value));
    if (isValidDate(fromEpoch)) {
      return fromEpoch;
    }
  }

  const trimmed = value.trim();
  if (ISO_PATTERN.test(trimmed)) {
    const fromIso = new Date(trimmed.replace(" ", "T"));
    if (isValidDate(fromIso)) {
      return fromIso;
    }
  }

  return now();
}
