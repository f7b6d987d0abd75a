/**
 * Date and time values (RFC 2822 section 3.3)
 */

import { extractComments } from './structured.js';

const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;
const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

/**
 * Obsolete zone names, in minutes east of UTC (RFC 2822 section 4.3)
 */
const ZONE_OFFSETS: Record<string, number> = {
  UT: 0,
  UTC: 0,
  GMT: 0,
  Z: 0,
  EST: -300,
  EDT: -240,
  CST: -360,
  CDT: -300,
  MST: -420,
  MDT: -360,
  PST: -480,
  PDT: -420,
};

const DATE_PATTERN =
  /^\s*(?:[A-Za-z]+\s*,?\s*)?(\d{1,2})\s*[\s-]\s*([A-Za-z]{3,})\.?\s*[\s-]\s*(\d{2,4})\s+(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?\s*([+-]\d{4}|[A-Za-z]+)?/;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

function formatZone(zone: number, unknown: boolean): string {
  const sign = zone < 0 || (unknown && zone === 0) ? '-' : '+';
  const minutes = Math.abs(zone);
  return `${sign}${pad(Math.floor(minutes / 60))}${pad(minutes % 60)}`;
}

function parseZone(text: string | undefined): number {
  if (!text) {
    return 0;
  }
  if (text[0] === '+' || text[0] === '-') {
    const value = parseInt(text.substring(1, 3), 10) * 60 + parseInt(text.substring(3, 5), 10);
    return text[0] === '-' && value !== 0 ? -value : value;
  }
  // Military zones and unknown names are treated as UTC
  return ZONE_OFFSETS[text.toUpperCase()] ?? 0;
}

function expandYear(year: number, digits: number): number {
  if (digits === 2) {
    return year < 50 ? 2000 + year : 1900 + year;
  }
  if (digits === 3) {
    return 1900 + year;
  }
  return year;
}

export class DateTime {
  /** Zone written as "-0000": UTC, with the local zone not known */
  zoneUnknown = false;

  /**
   * @param zone - Offset from UTC in minutes
   */
  constructor(
    public year: number = 1970,
    public month: number = 1,
    public day: number = 1,
    public hour: number = 0,
    public minute: number = 0,
    public second: number = 0,
    public zone: number = 0
  ) {}

  /**
   * Parses an RFC 2822 date-time
   *
   * Accepts obsolete forms: missing day name or seconds, two-digit years and
   * named zones.
   *
   * @returns The date, or null when the text is not a date
   */
  static parse(text: string): DateTime | null {
    const match = DATE_PATTERN.exec(extractComments(text).text);
    if (!match) {
      return null;
    }

    const monthIndex = MONTH_NAMES.findIndex(
      (name) => name.toLowerCase() === match[2].substring(0, 3).toLowerCase()
    );
    const date = new DateTime(
      expandYear(parseInt(match[3], 10), match[3].length),
      monthIndex + 1,
      parseInt(match[1], 10),
      parseInt(match[4], 10),
      parseInt(match[5], 10),
      match[6] ? parseInt(match[6], 10) : 0,
      parseZone(match[7])
    );
    date.zoneUnknown = match[7] === '-0000';

    if (
      monthIndex === -1 ||
      date.day < 1 || date.day > 31 ||
      date.hour > 23 || date.minute > 59 || date.second > 60
    ) {
      return null;
    }
    return date;
  }

  /**
   * Builds the date-time of an instant as seen from a zone
   */
  static fromDate(date: Date, zone: number = 0): DateTime {
    const shifted = new Date(date.getTime() + zone * 60_000);
    return new DateTime(
      shifted.getUTCFullYear(),
      shifted.getUTCMonth() + 1,
      shifted.getUTCDate(),
      shifted.getUTCHours(),
      shifted.getUTCMinutes(),
      shifted.getUTCSeconds(),
      zone
    );
  }

  /**
   * The instant this date-time denotes
   */
  toDate(): Date {
    const local = Date.UTC(this.year, this.month - 1, this.day, this.hour, this.minute, this.second);
    return new Date(local - this.zone * 60_000);
  }

  /**
   * Generates e.g. "Wed, 1 Jan 2020 00:00:00 +0000"
   */
  generate(): string {
    const weekday = new Date(Date.UTC(this.year, this.month - 1, this.day)).getUTCDay();
    const month = MONTH_NAMES[this.month - 1] ?? MONTH_NAMES[0];
    return (
      `${DAY_NAMES[weekday]}, ${this.day} ${month} ${pad(this.year, 4)} ` +
      `${pad(this.hour)}:${pad(this.minute)}:${pad(this.second)} ${formatZone(this.zone, this.zoneUnknown)}`
    );
  }

  /**
   * ISO 8601 form with the zone kept, e.g. "2020-01-01T00:00:00+0000"
   */
  toIsoString(): string {
    return (
      `${pad(this.year, 4)}-${pad(this.month)}-${pad(this.day)}` +
      `T${pad(this.hour)}:${pad(this.minute)}:${pad(this.second)}${formatZone(this.zone, this.zoneUnknown)}`
    );
  }

  /** Same fields, including the zone */
  equals(other: DateTime): boolean {
    return this.toIsoString() === other.toIsoString();
  }

  /** Compares instants */
  compare(other: DateTime): number {
    return this.toDate().getTime() - other.toDate().getTime();
  }

  clone(): DateTime {
    const copy = new DateTime(this.year, this.month, this.day, this.hour, this.minute, this.second, this.zone);
    copy.zoneUnknown = this.zoneUnknown;
    return copy;
  }

  toString(): string {
    return this.generate();
  }
}
