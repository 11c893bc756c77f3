import { DateTime } from 'luxon';

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Calendar date (YYYY-MM-DD) of "now" in the ladder's time zone. */
export function ladderToday(zone: string): string {
  const today = DateTime.now().setZone(zone).toISODate();
  if (!today) throw new Error(`Invalid ladder time zone: ${zone}`);
  return today;
}
