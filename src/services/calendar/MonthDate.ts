/**
 * MonthDate - immutable calendar date with month-step arithmetic
 *
 * Month arithmetic clamps the day to a fixed month-length table. February is
 * always 28 days there, so Jan 31 + 1 month is Feb 28 even in a leap year.
 * Day differences use the real calendar.
 */

import { InvalidArgumentError } from '../../types/ReportErrors';

/** Maximum day per month used by month arithmetic (1-indexed months). */
export const MONTH_MAX_DAY: Readonly<Record<number, number>> = {
  1: 31,
  2: 28,
  3: 31,
  4: 30,
  5: 31,
  6: 30,
  7: 31,
  8: 31,
  9: 30,
  10: 31,
  11: 30,
  12: 31,
};

const MS_PER_DAY = 86400 * 1000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_MONTH_PATTERN = /^(\d{4})-(\d{2})$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** UTC midnight of a calendar date; setUTCFullYear keeps years 0-99 literal, unlike Date.UTC. */
function utcDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

function daysInCalendarMonth(year: number, month: number): number {
  return utcDate(year, month, 0).getUTCDate();
}

export class MonthDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;

  constructor(year: number, month: number, day: number) {
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
      throw new InvalidArgumentError(`Date parts must be integers: ${year}-${month}-${day}`, 'INVALID_DATE');
    }
    if (month < 1 || month > 12) {
      throw new InvalidArgumentError(`Month out of range: ${month}`, 'INVALID_DATE');
    }
    if (day < 1 || day > daysInCalendarMonth(year, month)) {
      throw new InvalidArgumentError(`Day out of range for ${year}-${pad(month, 2)}: ${day}`, 'INVALID_DATE');
    }
    this.year = year;
    this.month = month;
    this.day = day;
  }

  /** Parse YYYY-MM-DD. */
  static parse(value: string): MonthDate {
    const match = ISO_DATE_PATTERN.exec(value.trim());
    if (!match) {
      throw new InvalidArgumentError(`Expected YYYY-MM-DD, got "${value}"`, 'INVALID_DATE');
    }
    return new MonthDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  /** Parse YYYY-MM as the first day of that month. */
  static parseMonth(value: string): MonthDate {
    const match = ISO_MONTH_PATTERN.exec(value.trim());
    if (!match) {
      throw new InvalidArgumentError(`Expected YYYY-MM, got "${value}"`, 'INVALID_MONTH');
    }
    return new MonthDate(Number(match[1]), Number(match[2]), 1);
  }

  /** Local calendar date of a JS Date. */
  static fromDate(date: Date): MonthDate {
    return new MonthDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
  }

  static today(): MonthDate {
    return MonthDate.fromDate(new Date());
  }

  /**
   * Shift by whole months. The day (own day unless given) is clamped to the
   * resulting month's maximum from MONTH_MAX_DAY.
   */
  adjustMonth(delta: number, day?: number): MonthDate {
    if (!Number.isInteger(delta)) {
      throw new InvalidArgumentError(`Month delta must be an integer: ${delta}`);
    }
    const targetDay = day ?? this.day;
    const index = this.year * 12 + (this.month - 1) + delta;
    const year = Math.floor(index / 12);
    const month = index - year * 12 + 1;
    return new MonthDate(year, month, Math.min(targetDay, MONTH_MAX_DAY[month]));
  }

  nextMonth(day?: number): MonthDate {
    return this.adjustMonth(1, day);
  }

  nextYear(): MonthDate {
    return this.adjustMonth(12);
  }

  /** First day of the following month. */
  roundMonthUp(): MonthDate {
    return this.adjustMonth(1, 1);
  }

  /** year * 12 + month */
  monthIndex(): number {
    return this.year * 12 + this.month;
  }

  /** Calendar days from `other` to this date (this − other). */
  diffInDays(other: MonthDate): number {
    return Math.round((this.toEpochMs() - other.toEpochMs()) / MS_PER_DAY);
  }

  compare(other: MonthDate): number {
    return this.year - other.year || this.month - other.month || this.day - other.day;
  }

  isBefore(other: MonthDate): boolean {
    return this.compare(other) < 0;
  }

  isAfter(other: MonthDate): boolean {
    return this.compare(other) > 0;
  }

  equals(other: MonthDate): boolean {
    return this.compare(other) === 0;
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toMonthString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }

  private toEpochMs(): number {
    return utcDate(this.year, this.month - 1, this.day).getTime();
  }
}
