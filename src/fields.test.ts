import { describe, it, expect } from "vitest";
import { Birthday, Name, Phone } from "./fields.js";
import { ValidationError } from "./errors.js";

describe("Name", () => {
  it("keeps a non-empty value", () => {
    expect(new Name("Alice").value).toBe("Alice");
  });

  it("rejects an empty string", () => {
    expect(() => new Name("")).toThrow(ValidationError);
  });
});

describe("Phone", () => {
  it("accepts exactly ten digits", () => {
    expect(new Phone("1234567890").value).toBe("1234567890");
    expect(new Phone("0000000000").toString()).toBe("0000000000");
  });

  it.each([
    ["too short", "123456789"],
    ["too long", "12345678901"],
    ["letters", "12345abcde"],
    ["plus prefix", "+380501234"],
    ["spaces", "123 456 78"],
    ["empty", ""],
  ])("rejects %s", (_label, value) => {
    expect(() => new Phone(value)).toThrow(ValidationError);
  });

  it("validates reassignment and keeps the old value on failure", () => {
    const phone = new Phone("1234567890");
    phone.value = "0987654321";
    expect(phone.value).toBe("0987654321");

    expect(() => {
      phone.value = "12";
    }).toThrow(ValidationError);
    expect(phone.value).toBe("0987654321");
  });
});

describe("Birthday", () => {
  it("parses DD.MM.YYYY into a calendar date", () => {
    expect(new Birthday("17.03.1990").value).toEqual({ year: 1990, month: 3, day: 17 });
  });

  it("accepts single-digit day and month and renders them padded", () => {
    const birthday = new Birthday("1.2.1990");
    expect(birthday.value).toEqual({ year: 1990, month: 2, day: 1 });
    expect(birthday.toString()).toBe("01.02.1990");
  });

  it("accepts 29 February in a leap year", () => {
    expect(new Birthday("29.02.2024").value).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it.each([
    ["ISO format", "1990-03-17"],
    ["two-digit year", "17.03.90"],
    ["31 February", "31.02.2000"],
    ["29 February in a common year", "29.02.2023"],
    ["month 13", "17.13.1990"],
    ["day zero", "00.01.2000"],
    ["letters", "aa.bb.cccc"],
    ["trailing text", "17.03.1990x"],
    ["empty", ""],
  ])("rejects %s", (_label, value) => {
    expect(() => new Birthday(value)).toThrow(ValidationError);
  });
});
