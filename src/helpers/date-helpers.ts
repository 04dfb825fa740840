const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** True for a real calendar date written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

/** Today's date as YYYY-MM-DD in the given timezone (UTC by default). */
export function getCurrentDate(timezone = "UTC", now: Date = new Date()): string {
  const formatWithTimezone = (tz?: string) => {
    const options: Intl.DateTimeFormatOptions = {
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      ...(tz ? { timeZone: tz } : {}),
    };
    return new Intl.DateTimeFormat("en-CA", options).format(now); // YYYY-MM-DD
  };

  try {
    return formatWithTimezone(timezone);
  } catch (err) {
    console.warn(
      `[getCurrentDate] Invalid timezone "${timezone}", falling back to UTC:`,
      err instanceof Error ? err.message : err,
    );
    return formatWithTimezone("UTC");
  }
}
