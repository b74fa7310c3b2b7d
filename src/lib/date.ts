import { DateTime } from 'luxon';

export type BatchDateOptions = {
  dateFormat: string;
  timezone: string;
  now?: Date;
};

/**
 * The date every file in a batch is stamped with. Accepts the configured
 * format or an ISO date and always returns the configured format; with no
 * input it is today in the configured timezone.
 */
export function resolveBatchDate(
  input: string | undefined,
  options: BatchDateOptions,
): string {
  const zone = options.timezone;
  const raw = input?.trim() ?? '';

  if (raw.length === 0) {
    const now = options.now
      ? DateTime.fromJSDate(options.now, { zone })
      : DateTime.now().setZone(zone);
    if (!now.isValid) throw new Error(`Invalid timezone '${zone}'`);
    return now.toFormat(options.dateFormat);
  }

  const parsed = DateTime.fromFormat(raw, options.dateFormat, { zone });
  if (parsed.isValid) return parsed.toFormat(options.dateFormat);

  const iso = DateTime.fromISO(raw, { zone });
  if (iso.isValid) return iso.toFormat(options.dateFormat);

  throw new Error(
    `Invalid date '${raw}': expected ${options.dateFormat} (${parsed.invalidExplanation ?? parsed.invalidReason ?? 'unparseable'})`,
  );
}
