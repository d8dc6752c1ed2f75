const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:[Zz]|([+-])(\d{2}):(\d{2}))$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Strict RFC3339 date-time check, including calendar and offset ranges. */
export function isRfc3339(value: string): boolean {
  const match = RFC3339_PATTERN.exec(value);
  if (!match) return false;
  const [, yearRaw, monthRaw, dayRaw, hourRaw, minuteRaw, secondRaw, , offsetHourRaw, offsetMinuteRaw] = match;
  const year = Number(yearRaw);
  const month = Number(monthRaw);
  const day = Number(dayRaw);
  if (month < 1 || month > 12) return false;
  if (day < 1 || day > daysInMonth(year, month)) return false;
  if (Number(hourRaw) > 23 || Number(minuteRaw) > 59 || Number(secondRaw) > 60) return false;
  if (offsetHourRaw !== undefined && (Number(offsetHourRaw) > 23 || Number(offsetMinuteRaw) > 59)) {
    return false;
  }
  return true;
}

export function nowRfc3339(): string {
  return new Date().toISOString();
}
