import { format, isValid, parse, parseISO } from "date-fns";

const FRONT_MATTER_DATE_FORMATS = [
  "yyyy-MM-dd HH:mm:ss xx",
  "yyyy-MM-dd HH:mm:ss xxx",
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd HH:mm",
  "yyyy-MM-dd",
];

export const FRONT_MATTER_DATE_FORMAT = "yyyy-MM-dd HH:mm:ss xx";

/**
 * Parse a front matter `date`. YAML timestamps arrive as Date objects,
 * everything else as strings.
 */
export function parsePostDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value !== "string") return null;

  const text = value.trim();
  if (text.length === 0) return null;

  for (const pattern of FRONT_MATTER_DATE_FORMATS) {
    const date = parse(text, pattern, new Date());
    if (isValid(date)) return date;
  }

  const iso = parseISO(text);
  return isValid(iso) ? iso : null;
}

/**
 * Calendar day a front matter date was written for. YAML timestamps are UTC.
 */
export function calendarDay(value: unknown): string | null {
  if (value instanceof Date) {
    return isValid(value) ? value.toISOString().slice(0, 10) : null;
  }
  if (typeof value === "string") {
    const match = /^(\d{4}-\d{2}-\d{2})/.exec(value.trim());
    if (match && parsePostDate(value)) return match[1];
  }
  return null;
}

export function formatPostDate(date: Date): string {
  return format(date, FRONT_MATTER_DATE_FORMAT);
}
