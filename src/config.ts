/**
 * Config loading and validation.
 *
 * Loads config.yml from the data directory when present, substitutes
 * ${ENV_VAR} references, and validates the result at startup so a typo
 * fails before the first command is read. Every key is optional; a missing
 * file means all defaults.
 */

import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DEFAULT_BIRTHDAY_WINDOW_DAYS } from "./address-book.js";
import { isValidTimezone, systemTimezone } from "./time.js";

export interface Config {
  /** IANA timezone that decides what "today" is for the birthdays command. */
  timezone: string;
  storage: {
    /** Address book file. Relative paths resolve against data_dir. */
    path: string;
  };
  birthdays: {
    /** Default window for the birthdays command. */
    window_days: number;
  };
  logging: {
    /** Write JSONL logs under data_dir/logs. */
    enabled: boolean;
  };
  data_dir: string;
}

const FileConfigSchema = Type.Object({
  timezone: Type.Optional(Type.String()),
  storage: Type.Optional(Type.Object({
    path: Type.Optional(Type.String({ minLength: 1 })),
  })),
  birthdays: Type.Optional(Type.Object({
    window_days: Type.Optional(Type.Integer({ minimum: 0 })),
  })),
  logging: Type.Optional(Type.Object({
    enabled: Type.Optional(Type.Boolean()),
  })),
});

type FileConfig = Static<typeof FileConfigSchema>;

export const ADDRESS_BOOK_FILENAME = "addressbook.db";

/**
 * Data directory from CONTACTS_DATA_DIR, or ./data.
 */
export function resolveDataDir(): string {
  return path.resolve(process.env.CONTACTS_DATA_DIR || "./data");
}

/**
 * Replace ${VAR} references with values from process.env.
 */
function substituteEnvVars(text: string): string {
  return text.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Environment variable ${varName} is not set`);
    }
    return value;
  });
}

/**
 * Recursively substitute env vars in all string values of an object.
 */
function substituteDeep(obj: unknown): unknown {
  if (typeof obj === "string") {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteDeep);
  }
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteDeep(value);
    }
    return result;
  }
  return obj;
}

function readConfigFile(cfgPath: string): FileConfig {
  if (!fs.existsSync(cfgPath)) {
    return {};
  }

  const parsed: unknown = parseYaml(fs.readFileSync(cfgPath, "utf-8"));
  // An empty file parses to null
  const substituted = substituteDeep(parsed ?? {});

  if (!Value.Check(FileConfigSchema, substituted)) {
    const errors = [...Value.Errors(FileConfigSchema, substituted)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new Error(`Config errors in ${cfgPath}:\n  - ${errors.join("\n  - ")}`);
  }
  return substituted;
}

export function loadConfig(dataDir: string = resolveDataDir()): Config {
  const resolvedDataDir = path.resolve(dataDir);
  const file = readConfigFile(path.join(resolvedDataDir, "config.yml"));

  const config: Config = {
    timezone: file.timezone || systemTimezone(),
    storage: {
      path: path.resolve(resolvedDataDir, file.storage?.path ?? ADDRESS_BOOK_FILENAME),
    },
    birthdays: {
      window_days: file.birthdays?.window_days ?? DEFAULT_BIRTHDAY_WINDOW_DAYS,
    },
    logging: {
      enabled: file.logging?.enabled ?? true,
    },
    data_dir: resolvedDataDir,
  };

  validateConfig(config);

  return config;
}

/**
 * Checks the schema cannot express.
 */
function validateConfig(config: Config): void {
  const errors: string[] = [];

  if (!isValidTimezone(config.timezone)) {
    errors.push(`timezone "${config.timezone}" is not a known IANA timezone`);
  }

  if (errors.length > 0) {
    throw new Error(`Config errors:\n  - ${errors.join("\n  - ")}`);
  }
}

/**
 * Create `dataDir` with a config.yml copied from config.example.yml.
 * Returns false when a config.yml is already there; it is never overwritten.
 */
export function initDataDir(dataDir: string): boolean {
  const resolved = path.resolve(dataDir);
  const target = path.join(resolved, "config.yml");
  if (fs.existsSync(target)) {
    return false;
  }

  fs.mkdirSync(resolved, { recursive: true });
  const example = new URL("../config.example.yml", import.meta.url);
  fs.copyFileSync(example, target);
  return true;
}
