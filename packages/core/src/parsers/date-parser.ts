/**
 * Due-date input helpers. Task payloads carry yyyy-MM-dd strings; the CLI
 * also takes the friendly forms listed in DUE_DATE_FORMS, which resolve to a
 * calendar day relative to "today" before validation sees them.
 */

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

const WEEKDAY_NAMES = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];
const MONTH_PREFIXES = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/** Format a Date as yyyy-MM-dd (local time) */
export function formatDate(d: Date): string {
  const y = String(d.getFullYear()).padStart(4, '0');
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Today's local date as yyyy-MM-dd */
export function todayString(now?: Date): string {
  return formatDate(now ?? new Date());
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

/**
 * True when the input is a yyyy-MM-dd string naming a real calendar day.
 * Rejects overflowing dates such as 2026-02-30.
 */
export function isIsoDate(input: string): boolean {
  if (!ISO_DATE_RE.test(input)) return false;
  const d = new Date(`${input}T00:00:00`);
  return !isNaN(d.getTime()) && formatDate(d) === input;
}

function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

/** Local calendar day, or null when the parts overflow (feb30) */
function calendarDay(year: number, month: number, day: number): Date | null {
  const d = new Date(year, month, day);
  return d.getMonth() === month && d.getDate() === day ? d : null;
}

function shift(today: Date, count: number, unit: string | undefined): Date {
  if (unit === 'w') return addDays(today, count * 7);
  if (unit === 'm') {
    const r = new Date(today);
    r.setMonth(r.getMonth() + count);
    return r;
  }
  return addDays(today, count);
}

/** Next occurrence strictly after today; "friday" on a Friday is a week out */
function nextWeekday(today: Date, name: string): Date | null {
  const target = WEEKDAY_NAMES.findIndex(full => full.startsWith(name));
  if (target < 0) return null;
  const ahead = (target - today.getDay() + 7) % 7;
  return addDays(today, ahead === 0 ? 7 : ahead);
}

/** jan15 this year, or next year once that day has gone by */
function nextMonthDay(today: Date, prefix: string | undefined, dayOfMonth: number): Date | null {
  const month = MONTH_PREFIXES.indexOf(prefix ?? '');
  if (month < 0) return null;

  const thisYear = calendarDay(today.getFullYear(), month, dayOfMonth);
  if (thisYear && thisYear.getTime() >= today.getTime()) return thisYear;
  return calendarDay(today.getFullYear() + 1, month, dayOfMonth);
}

interface DueDateForm {
  readonly pattern: RegExp;
  readonly resolve: (match: RegExpExecArray, today: Date) => Date | null;
}

const DUE_DATE_FORMS: readonly DueDateForm[] = [
  { pattern: /^today$/, resolve: (_match, today) => today },
  { pattern: /^tomorrow$/, resolve: (_match, today) => addDays(today, 1) },
  { pattern: /^\+(\d+)([dwm])$/, resolve: ([, count, unit], today) => shift(today, Number(count), unit) },
  { pattern: /^[a-z]{3,9}$/, resolve: ([name], today) => nextWeekday(today, name) },
  { pattern: /^([a-z]{3})(\d{1,2})$/, resolve: ([, prefix, day], today) => nextMonthDay(today, prefix, Number(day)) },
];

/**
 * Resolve a due-date argument to yyyy-MM-dd, or null if it names no day.
 *
 * @param input - e.g. "today", "+3d", "friday", "jan15", "2026-03-01"
 * @param now - Override "today" for testing. Defaults to current date.
 */
export function parseDate(input: string | null | undefined, now?: Date): string | null {
  const trimmed = input?.trim();
  if (!trimmed) return null;
  if (isIsoDate(trimmed)) return trimmed;

  const today = startOfDay(now ?? new Date());
  const normalized = trimmed.toLowerCase();

  for (const form of DUE_DATE_FORMS) {
    const match = form.pattern.exec(normalized);
    if (!match) continue;
    const day = form.resolve(match, today);
    return day ? formatDate(day) : null;
  }
  return null;
}
