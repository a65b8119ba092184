/**
 * Command parsing, handlers and dispatch.
 *
 * Each handler returns an explicit CommandResult. Errors raised by the
 * model (validation, lookup misses) are caught once, in runHandler, and
 * every failure is turned into user-facing text by the single table in
 * translateError. Handlers never format errors themselves.
 *
 * The dispatcher owns persistence: after a handler reports a mutation it
 * saves the whole book through the injected store. Save errors are not
 * translated; they propagate to whoever runs the loop.
 */

import type { AddressBook } from "./address-book.js";
import {
  errorMessage,
  isContactBookError,
  MissingArgumentError,
  NotFoundError,
  ValidationError,
  type ErrorKind,
} from "./errors.js";
import type { AppLogger } from "./logger.js";
import { ContactRecord } from "./record.js";
import type { AddressBookStore } from "./store.js";
import type { CalendarDate } from "./time.js";

export type CommandResult =
  | { ok: true; output: string; mutated: boolean }
  | { ok: false; error: unknown };

export interface CommandContext {
  book: AddressBook;
  store: AddressBookStore;
  logger: AppLogger;
  /** Current calendar date in the user's timezone. */
  today: () => CalendarDate;
  /** Window used by `birthdays` when no argument is given. */
  birthdayWindowDays: number;
}

export interface CommandSpec {
  usage: string;
  description: string;
  run: (args: string[], context: CommandContext) => CommandResult;
}

export interface DispatchOutcome {
  /** Text to print, absent for blank input. */
  output?: string;
  terminated: boolean;
}

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(["close", "exit"]);

/**
 * User-facing text per error kind. Deliberately coarse: a malformed
 * birthday reads the same as a malformed phone.
 */
const ERROR_MESSAGES: { readonly [K in ErrorKind]?: string } = {
  missing_argument: "Enter the argument for the command.",
  not_found: "Contact not found.",
  validation: "Give me name and phone please.",
};

export function translateError(error: unknown): string {
  const message = isContactBookError(error) ? ERROR_MESSAGES[error.kind] : undefined;
  return message ?? `An error occurred: ${errorMessage(error)}`;
}

// ---------------------------------------------------------------------------
// Result helpers
// ---------------------------------------------------------------------------

function ok(output: string, mutated = false): CommandResult {
  return { ok: true, output, mutated };
}

function fail(error: unknown): CommandResult {
  return { ok: false, error };
}

function missing(usage: string): CommandResult {
  return fail(new MissingArgumentError(`Usage: ${usage}`));
}

function contactNotFound(name: string): CommandResult {
  return fail(new NotFoundError(`Contact ${name} not found.`));
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

function addContact(args: string[], { book }: CommandContext): CommandResult {
  const [name, phone] = args;
  if (!name || !phone) return missing(COMMANDS.add.usage);

  const existing = book.find(name);
  if (existing) {
    existing.addPhone(phone);
    return ok("Contact update.", true);
  }

  // The record joins the book only once its first phone is valid
  const record = new ContactRecord(name);
  record.addPhone(phone);
  book.addRecord(record);
  return ok("Contact added.", true);
}

function changeContact(args: string[], { book }: CommandContext): CommandResult {
  const [name, oldPhone, newPhone] = args;
  if (!name || !oldPhone || !newPhone) return missing(COMMANDS.change.usage);

  const record = book.find(name);
  if (!record) return contactNotFound(name);

  record.editPhone(oldPhone, newPhone);
  return ok("Contact update.", true);
}

function showPhone(args: string[], { book }: CommandContext): CommandResult {
  const [name] = args;
  if (!name) return missing(COMMANDS.phone.usage);

  const record = book.find(name);
  if (!record) return contactNotFound(name);

  if (record.phones.length === 0) {
    return ok(`${name} has no phone numbers.`);
  }
  return ok(`The phone number for ${name} is ${record.phones.map((p) => p.value).join(", ")}.`);
}

function showAll(_args: string[], { book }: CommandContext): CommandResult {
  if (book.size === 0) return ok("No contacts saved.");
  return ok(book.toString());
}

function deleteContact(args: string[], { book }: CommandContext): CommandResult {
  const [name] = args;
  if (!name) return missing(COMMANDS.delete.usage);

  book.delete(name);
  return ok("Contact deleted.", true);
}

function removePhone(args: string[], { book }: CommandContext): CommandResult {
  const [name, phone] = args;
  if (!name || !phone) return missing(COMMANDS["remove-phone"].usage);

  const record = book.find(name);
  if (!record) return contactNotFound(name);

  record.removePhone(phone);
  return ok("Phone removed.", true);
}

function addBirthday(args: string[], { book }: CommandContext): CommandResult {
  const [name, date] = args;
  if (!name || !date) return missing(COMMANDS["add-birthday"].usage);

  const record = book.find(name);
  if (!record) return contactNotFound(name);

  record.addBirthday(date);
  return ok("Birthday added.", true);
}

function showBirthday(args: string[], { book }: CommandContext): CommandResult {
  const [name] = args;
  if (!name) return missing(COMMANDS["show-birthday"].usage);

  const record = book.find(name);
  if (!record) return contactNotFound(name);

  if (!record.birthday) return ok(`${name} has no birthday set.`);
  return ok(`${name}'s birthday is ${record.birthday.toString()}.`);
}

function parseWindow(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`Window must be a whole number of days, got "${raw}".`);
  }
  return parseInt(raw, 10);
}

function upcomingBirthdays(args: string[], context: CommandContext): CommandResult {
  const days = parseWindow(args[0], context.birthdayWindowDays);
  const upcoming = context.book.getUpcomingBirthdays(context.today(), days);
  if (upcoming.length === 0) return ok("No upcoming birthdays.");
  return ok(upcoming.map((entry) => `${entry.name}: ${entry.birthday}`).join("\n"));
}

function showHelp(): CommandResult {
  const lines = Object.values(COMMANDS).map((spec) => `  ${spec.usage.padEnd(34)}${spec.description}`);
  lines.push(`  ${"close | exit".padEnd(34)}Save and quit`);
  return ok(`Commands:\n${lines.join("\n")}`);
}

export const COMMANDS = {
  hello: {
    usage: "hello",
    description: "Greeting",
    run: () => ok("How can I help you?"),
  },
  add: {
    usage: "add <name> <phone>",
    description: "Add a contact, or a phone to an existing one",
    run: addContact,
  },
  change: {
    usage: "change <name> <old phone> <new phone>",
    description: "Replace a phone number",
    run: changeContact,
  },
  phone: {
    usage: "phone <name>",
    description: "Show a contact's phone numbers",
    run: showPhone,
  },
  all: {
    usage: "all",
    description: "Show every contact",
    run: showAll,
  },
  delete: {
    usage: "delete <name>",
    description: "Delete a contact",
    run: deleteContact,
  },
  "remove-phone": {
    usage: "remove-phone <name> <phone>",
    description: "Remove one phone number from a contact",
    run: removePhone,
  },
  "add-birthday": {
    usage: "add-birthday <name> <DD.MM.YYYY>",
    description: "Set a contact's birthday",
    run: addBirthday,
  },
  "show-birthday": {
    usage: "show-birthday <name>",
    description: "Show a contact's birthday",
    run: showBirthday,
  },
  birthdays: {
    usage: "birthdays [days]",
    description: "Birthdays in the coming days, weekends moved to Monday",
    run: upcomingBirthdays,
  },
  help: {
    usage: "help",
    description: "Show this list",
    run: showHelp,
  },
} satisfies Record<string, CommandSpec>;

const commandTable: Readonly<Record<string, CommandSpec>> = COMMANDS;

function lookupCommand(name: string): CommandSpec | undefined {
  return Object.hasOwn(commandTable, name) ? commandTable[name] : undefined;
}

// ---------------------------------------------------------------------------
// Parsing and dispatch
// ---------------------------------------------------------------------------

export interface ParsedInput {
  command: string;
  args: string[];
}

/**
 * Split a line on whitespace. The first token, lowercased, is the command.
 * Returns null for a blank line.
 */
export function parseInput(line: string): ParsedInput | null {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return null;
  const [command, ...args] = tokens;
  return { command: command.toLowerCase(), args };
}

function runHandler(spec: CommandSpec, args: string[], context: CommandContext): CommandResult {
  try {
    return spec.run(args, context);
  } catch (error) {
    return fail(error);
  }
}

/**
 * Save the book and end the session. Also used when input runs out.
 */
export function closeSession(context: CommandContext): DispatchOutcome {
  context.store.save(context.book);
  context.logger.info("session closed", { contacts: context.book.size });
  return { output: "Good bye!", terminated: true };
}

/**
 * Run one line of input against the book.
 */
export function dispatch(line: string, context: CommandContext): DispatchOutcome {
  const parsed = parseInput(line);
  if (!parsed) return { terminated: false };

  const { command, args } = parsed;
  const { logger } = context;

  if (EXIT_COMMANDS.has(command)) {
    return closeSession(context);
  }

  const spec = lookupCommand(command);
  if (!spec) {
    logger.warn("unknown command", { command });
    return { output: "Invalid command.", terminated: false };
  }

  logger.info("command", { command, argc: args.length });
  const result = runHandler(spec, args, context);

  if (!result.ok) {
    if (isContactBookError(result.error)) {
      logger.warn(`${command} failed`, { kind: result.error.kind, message: result.error.message });
    } else {
      logger.error(`${command} failed unexpectedly`, result.error);
    }
    return { output: translateError(result.error), terminated: false };
  }

  if (result.mutated) {
    context.store.save(context.book);
  }
  return { output: result.output, terminated: false };
}
