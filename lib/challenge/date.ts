const DATE_KEY_PATTERN = /^\d{8}$/;

export function getDateKeyForTimezone(timezone: string, date = new Date()) {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });

  const parts = formatter.formatToParts(date);
  const year = parts.find((part) => part.type === "year")?.value;
  const month = parts.find((part) => part.type === "month")?.value;
  const day = parts.find((part) => part.type === "day")?.value;

  if (!year || !month || !day) {
    throw new Error("Unable to compute date key.");
  }

  return `${year}${month}${day}`;
}

export function isDateKey(value: string) {
  if (!DATE_KEY_PATTERN.test(value)) {
    return false;
  }
  return formatUtcDateKey(parseDateKeyToDate(value)) === value;
}

export function parseDateKeyToDate(dateKey: string) {
  const year = Number(dateKey.slice(0, 4));
  const month = Number(dateKey.slice(4, 6));
  const day = Number(dateKey.slice(6, 8));
  return new Date(Date.UTC(year, month - 1, day, 12));
}

export function addDays(date: Date, days: number) {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}

// Keys are calendar dates, so the shift is done on UTC noon to stay clear of DST edges.
export function shiftDateKey(dateKey: string, days: number) {
  return formatUtcDateKey(addDays(parseDateKeyToDate(dateKey), days));
}

function formatUtcDateKey(date: Date) {
  return getDateKeyForTimezone("UTC", date);
}
