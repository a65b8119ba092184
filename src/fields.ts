/**
 * Validated scalar fields of a contact: Name, Phone, Birthday.
 *
 * Each constructor throws ValidationError on bad input, so an instance that
 * exists always holds a valid value.
 */

import { ValidationError } from "./errors.js";
import { formatDate, isValidDate, type CalendarDate } from "./time.js";

abstract class Field<T> {
  constructor(protected current: T) {}

  get value(): T {
    return this.current;
  }

  abstract toString(): string;
}

export class Name extends Field<string> {
  constructor(value: string) {
    if (!value) {
      throw new ValidationError("Name cannot be empty.");
    }
    super(value);
  }

  toString(): string {
    return this.value;
  }
}

const PHONE_PATTERN = /^\d{10}$/;

export class Phone extends Field<string> {
  constructor(value: string) {
    super(Phone.validate(value));
  }

  /** Replace the number in place, keeping this object's identity. */
  set value(next: string) {
    this.current = Phone.validate(next);
  }

  get value(): string {
    return this.current;
  }

  toString(): string {
    return this.value;
  }

  private static validate(value: string): string {
    if (!PHONE_PATTERN.test(value)) {
      throw new ValidationError(`Phone must be exactly 10 digits, got "${value}".`);
    }
    return value;
  }
}

const BIRTHDAY_PATTERN = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

export class Birthday extends Field<CalendarDate> {
  constructor(value: string) {
    super(Birthday.parse(value));
  }

  /**
   * Parse "DD.MM.YYYY" into a calendar date.
   */
  static parse(value: string): CalendarDate {
    const match = value.match(BIRTHDAY_PATTERN);
    if (!match) {
      throw new ValidationError("Birthday must be in the format DD.MM.YYYY.");
    }
    const day = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const year = parseInt(match[3], 10);
    if (!isValidDate(year, month, day)) {
      throw new ValidationError(`${value} is not a valid calendar date.`);
    }
    return { year, month, day };
  }

  toString(): string {
    return formatDate(this.value);
  }
}
