/**
 * One contact: a name, an ordered list of phones, an optional birthday.
 */

import { NotFoundError } from "./errors.js";
import { Birthday, Name, Phone } from "./fields.js";

export class ContactRecord {
  readonly name: Name;
  private readonly phoneList: Phone[] = [];
  private birthdayField: Birthday | undefined;

  constructor(name: string) {
    this.name = new Name(name);
  }

  get phones(): readonly Phone[] {
    return this.phoneList;
  }

  get birthday(): Birthday | undefined {
    return this.birthdayField;
  }

  /** Append a phone. Duplicates are kept. */
  addPhone(value: string): Phone {
    const phone = new Phone(value);
    this.phoneList.push(phone);
    return phone;
  }

  removePhone(value: string): void {
    const index = this.phoneList.findIndex((p) => p.value === value);
    if (index === -1) {
      throw new NotFoundError(`Phone ${value} not found for ${this.name.value}.`);
    }
    this.phoneList.splice(index, 1);
  }

  /**
   * Replace the first phone equal to `oldValue`. The Phone object is kept and
   * its value reassigned, which validates `newValue` before anything changes.
   */
  editPhone(oldValue: string, newValue: string): void {
    const phone = this.findPhone(oldValue);
    if (!phone) {
      throw new NotFoundError(`Phone ${oldValue} not found for ${this.name.value}.`);
    }
    phone.value = newValue;
  }

  findPhone(value: string): Phone | undefined {
    return this.phoneList.find((p) => p.value === value);
  }

  /** Set or overwrite the birthday from a "DD.MM.YYYY" string. */
  addBirthday(value: string): void {
    this.birthdayField = new Birthday(value);
  }

  toString(): string {
    const phones = this.phoneList.map((p) => p.value).join("; ");
    const birthday = this.birthdayField ? `, birthday: ${this.birthdayField.toString()}` : "";
    return `Contact name: ${this.name.value}, phone: ${phones}${birthday}`;
  }
}
