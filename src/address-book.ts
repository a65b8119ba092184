/**
 * The address book: contacts keyed by name, in insertion order, plus the
 * upcoming-birthday query.
 *
 * The backing Map is private. Callers go through addRecord/find/delete and
 * the read-only views, so every mutation is one the command layer knows
 * about and can persist.
 */

import { NotFoundError, ValidationError } from "./errors.js";
import type { ContactRecord } from "./record.js";
import {
  addDays,
  diffInDays,
  formatDate,
  weekday,
  withYear,
  type CalendarDate,
} from "./time.js";

export const DEFAULT_BIRTHDAY_WINDOW_DAYS = 7;

export interface UpcomingBirthday {
  name: string;
  /** Congratulation date, "DD.MM.YYYY". */
  birthday: string;
}

const SATURDAY = 5;

export class AddressBook {
  private readonly data = new Map<string, ContactRecord>();

  get size(): number {
    return this.data.size;
  }

  /** Insert or overwrite by name. An overwritten entry keeps its position. */
  addRecord(record: ContactRecord): void {
    this.data.set(record.name.value, record);
  }

  find(name: string): ContactRecord | undefined {
    return this.data.get(name);
  }

  delete(name: string): void {
    if (!this.data.delete(name)) {
      throw new NotFoundError(`Contact ${name} not found.`);
    }
  }

  names(): string[] {
    return [...this.data.keys()];
  }

  records(): ContactRecord[] {
    return [...this.data.values()];
  }

  /**
   * Contacts whose next birthday falls within `days` days of `today`
   * (inclusive on both ends).
   *
   * Inclusion is decided on the real occurrence. Only afterwards is a
   * weekend occurrence moved to the following Monday, so a Saturday at the
   * edge of the window is reported up to two days past it.
   */
  getUpcomingBirthdays(today: CalendarDate, days = DEFAULT_BIRTHDAY_WINDOW_DAYS): UpcomingBirthday[] {
    if (!Number.isInteger(days) || days < 0) {
      throw new ValidationError(`Window must be a non-negative whole number of days, got ${days}.`);
    }

    const upcoming: UpcomingBirthday[] = [];
    for (const record of this.data.values()) {
      const birthday = record.birthday;
      if (!birthday) continue;

      let occurrence = withYear(birthday.value, today.year);
      if (diffInDays(occurrence, today) < 0) {
        occurrence = withYear(birthday.value, today.year + 1);
      }

      const delta = diffInDays(occurrence, today);
      if (delta < 0 || delta > days) continue;

      const dow = weekday(occurrence);
      if (dow >= SATURDAY) {
        occurrence = addDays(occurrence, 7 - dow);
      }

      upcoming.push({ name: record.name.value, birthday: formatDate(occurrence) });
    }
    return upcoming;
  }

  toString(): string {
    return this.records().map((record) => record.toString()).join("\n");
  }
}
