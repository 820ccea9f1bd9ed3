/**
 * strftime-style date formatting and parsing
 *
 * Dates travel as text plus a format written with strftime directives. The
 * service's wire form drops the percent signs ("Y-m-d"); locally formats
 * keep them ("%Y-%m-%d"). The directive set is fixed: every character in
 * DATE_DIRECTIVE_CHARACTERS has an entry below, names are English, and
 * dates are read and written in the process's local time zone.
 *
 * Parsing follows strptime: the whole string must match, whitespace in the
 * format matches any run of whitespace, names match without regard to case,
 * and missing fields default to 1900-01-01 00:00:00.
 */

import { addDays, format, getDay, getDayOfYear, isValid } from 'date-fns';

/** Characters that name a directive when preceded by "%" */
export const DATE_DIRECTIVE_CHARACTERS = 'aAbBcdHIjmMpSUwWxXyYZ';

type CompositeDirective = 'c' | 'x' | 'X';

type SimpleDirective =
  | 'a' | 'A' | 'b' | 'B' | 'd' | 'H' | 'I' | 'j' | 'm' | 'M'
  | 'p' | 'S' | 'U' | 'w' | 'W' | 'y' | 'Y' | 'Z';

interface ParsedFields {
  year: number;
  month?: number;
  day?: number;
  hour: number;
  minute: number;
  second: number;
  hour12?: number;
  pm?: boolean;
  dayOfYear?: number;
  /** 0 = Sunday */
  weekday?: number;
  week?: { readonly value: number; readonly startsOn: 0 | 1 };
}

interface Directive {
  readonly format: (date: Date) => string;
  /** Regex source, without capture groups */
  readonly pattern: string;
  readonly parse: (text: string, fields: ParsedFields) => void;
}

/** Composite directives, expanded before formatting or parsing (C locale) */
const COMPOSITE_DIRECTIVES: Record<CompositeDirective, string> = {
  c: '%a %b %d %H:%M:%S %Y',
  x: '%m/%d/%y',
  X: '%H:%M:%S',
};

// 2023-01-01 was a Sunday
const WEEK_START = new Date(2023, 0, 1);
const WEEKDAY_ABBREVIATED = Array.from({ length: 7 }, (_, i) => format(addDays(WEEK_START, i), 'EEE'));
const WEEKDAY_FULL = Array.from({ length: 7 }, (_, i) => format(addDays(WEEK_START, i), 'EEEE'));
const MONTH_ABBREVIATED = Array.from({ length: 12 }, (_, i) => format(new Date(2000, i, 1), 'MMM'));
const MONTH_FULL = Array.from({ length: 12 }, (_, i) => format(new Date(2000, i, 1), 'MMMM'));

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function namePattern(names: readonly string[]): string {
  return [...names].sort((a, b) => b.length - a.length).join('|');
}

function nameIndex(names: readonly string[], text: string): number {
  return names.findIndex((name) => name.toLowerCase() === text.toLowerCase());
}

/** Week number with the given first weekday; days before the first such weekday are week 0 */
function weekOfYear(date: Date, startsOn: 0 | 1): number {
  const weekday = (getDay(date) - startsOn + 7) % 7;
  return Math.floor((getDayOfYear(date) + 6 - weekday) / 7);
}

/** Short local zone name, e.g. "UTC", "PST" or "GMT+2" */
function zoneName(date: Date): string {
  const part = new Intl.DateTimeFormat('en-US', { timeZoneName: 'short' })
    .formatToParts(date)
    .find((p) => p.type === 'timeZoneName');
  return part?.value ?? '';
}

const DIRECTIVES: Record<SimpleDirective, Directive> = {
  a: {
    format: (date) => format(date, 'EEE'),
    pattern: namePattern(WEEKDAY_ABBREVIATED),
    parse: (text, fields) => {
      fields.weekday = nameIndex(WEEKDAY_ABBREVIATED, text);
    },
  },
  A: {
    format: (date) => format(date, 'EEEE'),
    pattern: namePattern(WEEKDAY_FULL),
    parse: (text, fields) => {
      fields.weekday = nameIndex(WEEKDAY_FULL, text);
    },
  },
  b: {
    format: (date) => format(date, 'MMM'),
    pattern: namePattern(MONTH_ABBREVIATED),
    parse: (text, fields) => {
      fields.month = nameIndex(MONTH_ABBREVIATED, text) + 1;
    },
  },
  B: {
    format: (date) => format(date, 'MMMM'),
    pattern: namePattern(MONTH_FULL),
    parse: (text, fields) => {
      fields.month = nameIndex(MONTH_FULL, text) + 1;
    },
  },
  d: {
    format: (date) => format(date, 'dd'),
    pattern: '3[01]|[12]\\d|0[1-9]|[1-9]| [1-9]',
    parse: (text, fields) => {
      fields.day = Number(text.trim());
    },
  },
  H: {
    format: (date) => format(date, 'HH'),
    pattern: '2[0-3]|[0-1]\\d|\\d',
    parse: (text, fields) => {
      fields.hour = Number(text);
    },
  },
  I: {
    format: (date) => format(date, 'hh'),
    pattern: '1[0-2]|0[1-9]|[1-9]',
    parse: (text, fields) => {
      fields.hour12 = Number(text);
    },
  },
  j: {
    format: (date) => pad(getDayOfYear(date), 3),
    pattern: '36[0-6]|3[0-5]\\d|[12]\\d\\d|0[1-9]\\d|00[1-9]|[1-9]\\d|0[1-9]|[1-9]',
    parse: (text, fields) => {
      fields.dayOfYear = Number(text);
    },
  },
  m: {
    format: (date) => format(date, 'MM'),
    pattern: '1[0-2]|0[1-9]|[1-9]',
    parse: (text, fields) => {
      fields.month = Number(text);
    },
  },
  M: {
    format: (date) => format(date, 'mm'),
    pattern: '[0-5]\\d|\\d',
    parse: (text, fields) => {
      fields.minute = Number(text);
    },
  },
  p: {
    format: (date) => format(date, 'a'),
    pattern: 'am|pm',
    parse: (text, fields) => {
      fields.pm = text.toLowerCase() === 'pm';
    },
  },
  S: {
    format: (date) => format(date, 'ss'),
    pattern: '6[0-1]|[0-5]\\d|\\d',
    parse: (text, fields) => {
      fields.second = Number(text);
    },
  },
  U: {
    format: (date) => pad(weekOfYear(date, 0), 2),
    pattern: '5[0-3]|[0-4]\\d|\\d',
    parse: (text, fields) => {
      fields.week = { value: Number(text), startsOn: 0 };
    },
  },
  w: {
    format: (date) => String(getDay(date)),
    pattern: '[0-6]',
    parse: (text, fields) => {
      fields.weekday = Number(text);
    },
  },
  W: {
    format: (date) => pad(weekOfYear(date, 1), 2),
    pattern: '5[0-3]|[0-4]\\d|\\d',
    parse: (text, fields) => {
      fields.week = { value: Number(text), startsOn: 1 };
    },
  },
  y: {
    format: (date) => format(date, 'yy'),
    pattern: '\\d\\d',
    parse: (text, fields) => {
      const year = Number(text);
      fields.year = year < 69 ? 2000 + year : 1900 + year;
    },
  },
  Y: {
    format: (date) => format(date, 'yyyy'),
    pattern: '\\d\\d\\d\\d',
    parse: (text, fields) => {
      fields.year = Number(text);
    },
  },
  Z: {
    format: zoneName,
    // Zone names are accepted and ignored: parsed dates are local. The empty
    // branch reads a rendering with no zone name ("10:30:00  2020").
    pattern: '[a-z]{1,5}|gmt[+-]\\d{1,2}(?::\\d{2})?|[+-]\\d{2}:?\\d{2}|',
    parse: () => undefined,
  },
};

type Token =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'directive'; readonly directive: Directive };

function isComposite(char: string): char is CompositeDirective {
  return char in COMPOSITE_DIRECTIVES;
}

function isSimple(char: string): char is SimpleDirective {
  return char in DIRECTIVES;
}

/**
 * Split a format into literals and directives. "%%" is a literal percent
 * sign; an unknown directive is kept as literal text.
 */
function tokenize(formatString: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < formatString.length) {
    const char = formatString.charAt(i);
    const next = formatString.charAt(i + 1);
    if (char !== '%' || next === '') {
      tokens.push({ kind: 'literal', text: char });
      i += 1;
    } else if (next === '%') {
      tokens.push({ kind: 'literal', text: '%' });
      i += 2;
    } else if (isComposite(next)) {
      tokens.push(...tokenize(COMPOSITE_DIRECTIVES[next]));
      i += 2;
    } else if (isSimple(next)) {
      tokens.push({ kind: 'directive', directive: DIRECTIVES[next] });
      i += 2;
    } else {
      tokens.push({ kind: 'literal', text: `%${next}` });
      i += 2;
    }
  }
  return tokens;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Render a date with a strftime-style format
 */
export function formatDate(date: Date, formatString: string): string {
  return tokenize(formatString)
    .map((token) => (token.kind === 'literal' ? token.text : token.directive.format(date)))
    .join('');
}

/**
 * Parse a date with a strftime-style format
 *
 * @returns The parsed local date, or undefined when the text does not match
 *   the format or names a date that does not exist
 */
export function parseDate(text: string, formatString: string): Date | undefined {
  const tokens = tokenize(formatString);
  const directives: Directive[] = [];
  let source = '';
  let inWhitespace = false;

  for (const token of tokens) {
    if (token.kind === 'directive') {
      directives.push(token.directive);
      source += `(${token.directive.pattern})`;
      inWhitespace = false;
    } else if (/^\s+$/.test(token.text)) {
      if (!inWhitespace) source += '\\s+';
      inWhitespace = true;
    } else {
      source += escapeRegExp(token.text);
      inWhitespace = false;
    }
  }

  const match = new RegExp(`^${source}$`, 'i').exec(text);
  if (!match) {
    return undefined;
  }

  const fields: ParsedFields = { year: 1900, hour: 0, minute: 0, second: 0 };
  directives.forEach((directive, index) => {
    directive.parse(match[index + 1] ?? '', fields);
  });

  return buildDate(fields);
}

function buildDate(fields: ParsedFields): Date | undefined {
  const hour = fields.hour12 !== undefined ? (fields.hour12 % 12) + (fields.pm ? 12 : 0) : fields.hour;
  const date = new Date(2000, 0, 1, hour, fields.minute, fields.second);

  if (fields.month === undefined && fields.day === undefined && fields.dayOfYear !== undefined) {
    date.setFullYear(fields.year, 0, fields.dayOfYear);
  } else if (
    fields.month === undefined &&
    fields.day === undefined &&
    fields.week !== undefined &&
    fields.weekday !== undefined
  ) {
    const { value, startsOn } = fields.week;
    const january1 = new Date(2000, 0, 1);
    january1.setFullYear(fields.year, 0, 1);
    const firstWeekStart = 1 + ((7 + startsOn - getDay(january1)) % 7);
    const offset = (fields.weekday - startsOn + 7) % 7;
    date.setFullYear(fields.year, 0, firstWeekStart + (value - 1) * 7 + offset);
  } else {
    const month = fields.month ?? 1;
    const day = fields.day ?? 1;
    date.setFullYear(fields.year, month - 1, day);
    if (date.getFullYear() !== fields.year || date.getMonth() !== month - 1 || date.getDate() !== day) {
      return undefined;
    }
  }

  if (!isValid(date) || date.getHours() !== hour || date.getMinutes() !== fields.minute || date.getSeconds() !== fields.second) {
    return undefined;
  }
  return date;
}

/**
 * Remove percent signs from a local format, giving the wire form
 */
export function toWireFormat(formatString: string): string {
  return formatString.replaceAll('%', '');
}

/**
 * Put a percent sign back before every directive character of a wire format
 */
export function fromWireFormat(wireFormat: string): string {
  return Array.from(wireFormat, (char) => (DATE_DIRECTIVE_CHARACTERS.includes(char) ? `%${char}` : char)).join('');
}
