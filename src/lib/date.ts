type DateTimeParts = {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
};

function getDateTimeParts(date: Date, timeZone: string): DateTimeParts {
  // Parts, not the formatted string: separators and order vary by locale.
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  }).formatToParts(date);

  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value;
  const year = get("year");
  const month = get("month");
  const day = get("day");
  const hour = get("hour");
  const minute = get("minute");

  if (!year || !month || !day || !hour || !minute) {
    throw new Error(`Failed to format date (tz=${timeZone})`);
  }

  return { year, month, day, hour, minute };
}

export function formatDateYYYYMMDD(date: Date, timeZone = "America/New_York"): string {
  const { year, month, day } = getDateTimeParts(date, timeZone);
  return `${year}-${month}-${day}`;
}

/**
* `YYYY-MM-DD HH:mm` wall-clock time in `timeZone`.
*/
export function formatLocalDateTime(date: Date, timeZone: string): string {
  const { year, month, day, hour, minute } = getDateTimeParts(date, timeZone);
  return `${year}-${month}-${day} ${hour}:${minute}`;
}

/**
* `YYYYMMDD_HHMM` stamp used in report file names.
*/
export function formatFileStamp(date: Date, timeZone: string): string {
  const { year, month, day, hour, minute } = getDateTimeParts(date, timeZone);
  return `${year}${month}${day}_${hour}${minute}`;
}

export function assertTimeZone(timeZone: string): string {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
  } catch {
    throw new Error(`Unknown time zone: ${timeZone}`);
  }
  return timeZone;
}
