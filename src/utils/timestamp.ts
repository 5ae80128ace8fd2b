import { DateTime, IANAZone } from 'luxon';

export function isValidTimezone(timezone: string): boolean {
  return timezone.toUpperCase() === 'UTC' || IANAZone.isValidZone(timezone);
}

/**
 * Format a date as `YYYYMMDD_HHMMSS_<TZ>` in the given timezone, where `<TZ>`
 * is the zone's short name (`UTC`, `CET`, `EST`, ...) stripped to filename-safe
 * characters.
 */
export function formatBackupTimestamp(date: Date, timezone: string): string {
  const local = DateTime.fromJSDate(date, { zone: timezone }).setLocale('en-US');
  if (!local.isValid) {
    throw new Error(`Invalid timezone: ${timezone}`);
  }
  const zoneName = (local.offsetNameShort ?? 'UTC').replace(/[^A-Za-z0-9+-]/g, '');
  return `${local.toFormat('yyyyMMdd_HHmmss')}_${zoneName}`;
}

/**
 * Canonical backup filename: `<name>-<timestamp>.<ext>.gz`
 */
export function buildBackupFileName(baseName: string, timestamp: string, extension: string): string {
  return `${baseName}-${timestamp}.${extension}.gz`;
}
