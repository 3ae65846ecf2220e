// Heure "murale" dans un fuseau donné (ET par défaut) : slug du jour et cutoff quotidien

export type ZonedClock = {
  year: number;
  month: number; // 1-12
  monthName: string; // "february"
  day: number;
  hour: number;
  minute: number;
};

/**
 * Décompose une date dans le fuseau demandé
 */
export function zonedClock(date: Date, timeZone: string): ZonedClock {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  });
  const parts = formatter.formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find(p => p.type === type)?.value || "0", 10);

  const monthName = new Intl.DateTimeFormat("en-US", { timeZone, month: "long" })
    .format(date)
    .toLowerCase();

  return {
    year: part("year"),
    month: part("month"),
    monthName,
    day: part("day"),
    hour: part("hour"),
    minute: part("minute")
  };
}

/**
 * "15:50" → minutes depuis minuit
 */
export function parseClockTime(value: string): number {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new Error(`invalid time "${value}", expected HH:MM`);
  }
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) {
    throw new Error(`invalid time "${value}", expected HH:MM`);
  }
  return hour * 60 + minute;
}

/**
 * Vrai si l'heure locale (dans `timeZone`) a atteint le cutoff quotidien
 */
export function isPastShutdownTime(date: Date, shutdownTime: string, timeZone: string): boolean {
  const clock = zonedClock(date, timeZone);
  return clock.hour * 60 + clock.minute >= parseClockTime(shutdownTime);
}
