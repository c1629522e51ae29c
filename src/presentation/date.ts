const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format with YYYY, YY, MMMM, MMM, MM, M, DD, D tokens. Always UTC so a build
 * doesn't depend on the machine's time zone.
 */
export function formatDate(date: Date, format: string): string {
  const month = MONTHS[date.getUTCMonth()] ?? "";
  const replacements: Record<string, string> = {
    YYYY: String(date.getUTCFullYear()),
    YY: String(date.getUTCFullYear()).slice(-2),
    MMMM: month,
    MMM: month.slice(0, 3),
    MM: pad(date.getUTCMonth() + 1),
    M: String(date.getUTCMonth() + 1),
    DD: pad(date.getUTCDate()),
    D: String(date.getUTCDate()),
  };

  return format.replace(/YYYY|YY|MMMM|MMM|MM|M|DD|D/g, (token) => replacements[token] ?? token);
}

/** RFC 822 date for RSS, e.g. "Tue, 02 Mar 2021 00:00:00 +0000" */
export function toRfc822(date: Date): string {
  return date.toUTCString().replace("GMT", "+0000");
}
