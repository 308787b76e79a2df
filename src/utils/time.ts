const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getDateTimeFormatter(timezone: string): Intl.DateTimeFormat {
  const cached = formatterCache.get(timezone);
  if (cached) return cached;

  const formatter = new Intl.DateTimeFormat('ru-RU', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
  });

  formatterCache.set(timezone, formatter);
  return formatter;
}

export function formatDateTime(timestampMs: number, timezone: string): string {
  return getDateTimeFormatter(timezone).format(new Date(timestampMs));
}

export function hoursToMs(hours: number): number {
  return hours * 60 * 60 * 1000;
}

export function minutesToMs(minutes: number): number {
  return minutes * 60 * 1000;
}

export function secondsToMs(seconds: number): number {
  return seconds * 1000;
}
