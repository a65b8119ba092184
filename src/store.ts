/**
 * Persistence port for the address book, and its SQLite adapter.
 *
 * The whole book is the unit of persistence: save rewrites everything in
 * one transaction, load rebuilds a fresh AddressBook. Each call opens the
 * database and closes it again before returning, on every path.
 *
 * A crash in the middle of a save can still leave a damaged file behind if
 * the disk itself misbehaves; there is no backup or repair step.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { AddressBook } from "./address-book.js";
import { errorMessage, StoreError } from "./errors.js";
import { ContactRecord } from "./record.js";

export interface AddressBookStore {
  /** Path of the backing file. */
  readonly filePath: string;

  /** Read the persisted book. A missing file yields an empty book. */
  load(): AddressBook;

  /** Overwrite the persisted book with `book`. */
  save(book: AddressBook): void;
}

const ContactRow = Type.Object({
  position: Type.Integer(),
  name: Type.String(),
  birthday: Type.Union([Type.String(), Type.Null()]),
});

const PhoneRow = Type.Object({
  contact_position: Type.Integer(),
  value: Type.String(),
});

const ContactRows = Type.Array(ContactRow);
const PhoneRows = Type.Array(PhoneRow);

type PhoneRowType = Static<typeof PhoneRow>;

// Schema overview:
//   contacts — one row per contact; position keeps insertion order
//   phones   — one row per phone; (contact_position, position) keeps the
//              per-contact order, duplicates are separate rows
const SCHEMA = `
  CREATE TABLE IF NOT EXISTS contacts (
    position INTEGER PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    birthday TEXT
  );

  CREATE TABLE IF NOT EXISTS phones (
    contact_position INTEGER NOT NULL REFERENCES contacts(position) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    value TEXT NOT NULL,
    PRIMARY KEY (contact_position, position)
  );
`;

/**
 * Create a store backed by a single SQLite file at `filePath`.
 */
export function createSqliteStore(filePath: string): AddressBookStore {
  function readBook(db: Database.Database): AddressBook {
    const contacts: unknown = db
      .prepare("SELECT position, name, birthday FROM contacts ORDER BY position")
      .all();
    const phones: unknown = db
      .prepare("SELECT contact_position, value FROM phones ORDER BY contact_position, position")
      .all();

    if (!Value.Check(ContactRows, contacts) || !Value.Check(PhoneRows, phones)) {
      throw new StoreError(`Unexpected row shape in ${filePath}`);
    }

    const phonesByContact = new Map<number, PhoneRowType[]>();
    for (const row of phones) {
      const list = phonesByContact.get(row.contact_position) ?? [];
      list.push(row);
      phonesByContact.set(row.contact_position, list);
    }

    const book = new AddressBook();
    for (const row of contacts) {
      const record = new ContactRecord(row.name);
      for (const phone of phonesByContact.get(row.position) ?? []) {
        record.addPhone(phone.value);
      }
      if (row.birthday !== null) {
        record.addBirthday(row.birthday);
      }
      book.addRecord(record);
    }
    return book;
  }

  function writeBook(db: Database.Database, book: AddressBook): void {
    db.exec(SCHEMA);

    const insertContact = db.prepare(
      "INSERT INTO contacts (position, name, birthday) VALUES (?, ?, ?)",
    );
    const insertPhone = db.prepare(
      "INSERT INTO phones (contact_position, position, value) VALUES (?, ?, ?)",
    );

    const replaceAll = db.transaction((records: ContactRecord[]) => {
      db.exec("DELETE FROM phones; DELETE FROM contacts;");
      records.forEach((record, position) => {
        insertContact.run(position, record.name.value, record.birthday?.toString() ?? null);
        record.phones.forEach((phone, phonePosition) => {
          insertPhone.run(position, phonePosition, phone.value);
        });
      });
    });

    replaceAll(book.records());
  }

  return {
    filePath,

    load(): AddressBook {
      if (!fs.existsSync(filePath)) {
        return new AddressBook();
      }

      let db: Database.Database | undefined;
      try {
        db = new Database(filePath, { readonly: true, fileMustExist: true });
        return readBook(db);
      } catch (error) {
        if (error instanceof StoreError) throw error;
        throw new StoreError(`Could not read address book from ${filePath}: ${errorMessage(error)}`);
      } finally {
        db?.close();
      }
    },

    save(book: AddressBook): void {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      const db = new Database(filePath);
      try {
        writeBook(db, book);
      } finally {
        db.close();
      }
    },
  };
}
