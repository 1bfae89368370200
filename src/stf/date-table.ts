import { DateParseError, InvalidDateFormatError } from "./errors.js";

// Agenda's date format table (manual appendix B-7), as strptime-style
// patterns. Entry 1 sits at index 0; entries 1 and 2 share a pattern.
export const DATE_FORMATS: readonly string[] = [
  "%m/%d/%Y %H:%M",
  "%m/%d/%Y %H:%M",
  "%d.%m.%Y %H:%M",
  "%Y-%m-%d %H:%M",
  "%d-%b %H:%M",
  "%d-%b-%Y %H:%M",
  "%m/%d/%Y %I:%M%p",
  "%d/%m/%Y %I:%M%p",
  "%d.%m.%Y %I:%M%p",
  "%Y-%m-%d %I:%M%p",
  "%d-%b %I:%M%p",
  "%d-%b-%Y %I:%M%p",
];

export const DEFAULT_DATE_FORMAT = 1;

// The {STF} header value, e.g. "10/15/20;14:03:22;002".
export const HEADER_FORMAT = "%m/%d/%y;%H:%M:%S;002";

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

type Directive = "m" | "d" | "Y" | "y" | "H" | "I" | "M" | "S" | "b" | "p";

const DIRECTIVE_PATTERNS: Record<Directive, string> = {
  m: "(\\d{1,2})",
  d: "(\\d{1,2})",
  Y: "(\\d{1,4})",
  y: "(\\d{1,2})",
  H: "(\\d{1,2})",
  I: "(\\d{1,2})",
  M: "(\\d{1,2})",
  S: "(\\d{1,2})",
  b: "([A-Za-z]+)",
  p: "([AaPp][Mm])",
};

function isDirective(ch: string): ch is Directive {
  return Object.prototype.hasOwnProperty.call(DIRECTIVE_PATTERNS, ch);
}

interface CompiledFormat {
  regex: RegExp;
  directives: Directive[];
}

const compiled = new Map<string, CompiledFormat>();

function escapeRegex(ch: string): string {
  return ch.replace(/[.*+?^${}()|[\]\\\/-]/g, "\\$&");
}

/**
 * Turn a strptime-style pattern into an anchored regex. Whitespace in the
 * pattern matches any run of whitespace, numbers may be preceded by blanks,
 * and anything after the pattern is ignored.
 */
function compileFormat(format: string): CompiledFormat {
  const cached = compiled.get(format);
  if (cached) {
    return cached;
  }

  const directives: Directive[] = [];
  let source = "^";
  for (let i = 0; i < format.length; i++) {
    const ch = format[i];
    if (ch === "%" && i + 1 < format.length) {
      const directive = format[++i];
      if (!isDirective(directive)) {
        throw new Error(`unsupported date directive %${directive}`);
      }
      directives.push(directive);
      source += "\\s*" + DIRECTIVE_PATTERNS[directive];
    } else if (ch === " ") {
      source += "\\s*";
    } else {
      source += escapeRegex(ch);
    }
  }

  const result = { regex: new RegExp(source), directives };
  compiled.set(format, result);
  return result;
}

function pivotYear(twoDigit: number): number {
  return twoDigit < 69 ? 2000 + twoDigit : 1900 + twoDigit;
}

function monthFromName(name: string): number | null {
  const lower = name.toLowerCase();
  const index = MONTHS.findIndex((month) => month === lower || month.slice(0, 3) === lower);
  return index === -1 ? null : index + 1;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

function inRange(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

/**
 * Parse `text` with a strptime-style `format` and render it as
 * `YYYY-MM-DDTHH:MM:SSZ`. The clock fields are copied as-is; the `Z` is only
 * a label. Fields the pattern lacks default to 1900-01-01 00:00:00.
 */
export function formatTimestamp(text: string, format: string): string {
  const { regex, directives } = compileFormat(format);
  const match = regex.exec(text);
  if (!match) {
    throw new DateParseError(text, format);
  }

  let year = 1900;
  let month = 1;
  let day = 1;
  let hour = 0;
  let minute = 0;
  let second = 0;
  let meridiem: "am" | "pm" | null = null;

  for (let i = 0; i < directives.length; i++) {
    const raw = match[i + 1];
    const num = Number.parseInt(raw, 10);
    switch (directives[i]) {
      case "m":
        month = num;
        break;
      case "d":
        day = num;
        break;
      case "Y":
        year = raw.length <= 2 ? pivotYear(num) : num;
        break;
      case "y":
        year = pivotYear(num);
        break;
      case "H":
        hour = num;
        if (!inRange(hour, 0, 23)) throw new DateParseError(text, format);
        break;
      case "I":
        hour = num;
        if (!inRange(hour, 1, 12)) throw new DateParseError(text, format);
        break;
      case "M":
        minute = num;
        break;
      case "S":
        second = num;
        break;
      case "b": {
        const fromName = monthFromName(raw);
        if (fromName === null) throw new DateParseError(text, format);
        month = fromName;
        break;
      }
      case "p":
        meridiem = raw.toLowerCase() === "pm" ? "pm" : "am";
        break;
    }
  }

  if (meridiem !== null) {
    hour = hour % 12 + (meridiem === "pm" ? 12 : 0);
  }

  if (
    !inRange(month, 1, 12) ||
    !inRange(day, 1, 31) ||
    !inRange(minute, 0, 59) ||
    !inRange(second, 0, 61)
  ) {
    throw new DateParseError(text, format);
  }

  return (
    `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` +
    `T${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}Z`
  );
}

export function isValidDateFormat(index: number): boolean {
  return Number.isInteger(index) && inRange(index, 1, DATE_FORMATS.length);
}

export function getDateFormat(index: number): string {
  if (!isValidDateFormat(index)) {
    throw new InvalidDateFormatError(String(index));
  }
  return DATE_FORMATS[index - 1];
}

/** Read the selector carried by a `{d}` chunk: its leading decimal digits. */
export function parseDateFormatSelector(value: string | null): number {
  const digits = value === null ? null : /^\s*\+?(\d+)/.exec(value);
  const index = digits ? Number.parseInt(digits[1], 10) : 0;
  if (!isValidDateFormat(index)) {
    throw new InvalidDateFormatError(value);
  }
  return index;
}

export function parseLinkDate(text: string, dateFormat: number): string {
  return formatTimestamp(text, getDateFormat(dateFormat));
}

export function parseHeaderTimestamp(value: string | null): string {
  return formatTimestamp(value ?? "", HEADER_FORMAT);
}
