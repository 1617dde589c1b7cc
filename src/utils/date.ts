const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function toIsoDate(date: Date): string {
  return date.toISOString().split("T")[0];
}

// Free text must name a month or a four-digit year before `Date` gets it
const PLAUSIBLE_DATE =
  /\b\d{4}\b|\b(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\b/i;
// A time of day followed by its zone, e.g. "23:30:00-05:00" or "10:00 GMT"
const WRITTEN_ZONE =
  /\d:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:Z|GMT|UTC|([+-])(\d{2}):?(\d{2}))$/i;

/**
 * Reads a calendar date out of free text. `YYYY-MM-DD` is taken as is when it
 * names a real day; anything else that looks like a date goes through `Date`.
 * A timestamp keeps the day of the offset it is written in. Returns null when
 * neither works.
 */
export function parseCalendarDate(value: string | null | undefined): string | null {
  const text = value?.trim();
  if (!text) return null;

  const iso = text.match(ISO_DATE);
  if (iso) {
    const [, year, month, day] = iso;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    return toIsoDate(date) === text ? text : null;
  }

  if (!PLAUSIBLE_DATE.test(text)) return null;

  const parsed = new Date(text);
  if (Number.isNaN(parsed.getTime())) return null;

  const zone = text.match(WRITTEN_ZONE);
  if (zone) {
    const [, sign, hours, minutes] = zone;
    const offset = sign
      ? (sign === "-" ? -1 : 1) * (Number(hours) * 60 + Number(minutes))
      : 0;
    return toIsoDate(new Date(parsed.getTime() + offset * 60_000));
  }

  // No zone written: Date parsed it as local time, so read it back locally
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${parsed.getFullYear()}-${pad(parsed.getMonth() + 1)}-${pad(parsed.getDate())}`;
}
