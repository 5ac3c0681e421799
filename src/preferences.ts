import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import os from "node:os";
import { dirname, join } from "node:path";
import { PersistenceError } from "./errors.js";
import { errorMessage, isRecord } from "./util.js";

export type PreferenceStore = {
  getStringList(key: string): Promise<string[] | null>;
  setStringList(key: string, values: string[]): Promise<void>;
};

type PreferencesDocument = {
  version: number;
  updated_at_ms: number;
  lists: Record<string, string[]>;
};

export function defaultPreferencesPath(env: NodeJS.ProcessEnv = process.env) {
  const fromEnv = env.ROOMPRINT_STORE_PATH?.trim();
  if (fromEnv) return fromEnv;
  return join(os.homedir(), ".roomprint", "preferences.json");
}

// Single JSON document on disk, rewritten whole through a temp file and rename.
export class FilePreferences implements PreferenceStore {
  constructor(readonly path = defaultPreferencesPath()) {}

  async getStringList(key: string): Promise<string[] | null> {
    const doc = this.read();
    const list = doc.lists[key];
    return list ? [...list] : null;
  }

  async setStringList(key: string, values: string[]): Promise<void> {
    const doc = this.read();
    doc.lists[key] = [...values];
    doc.updated_at_ms = Date.now();
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      const tempPath = `${this.path}.tmp.${process.pid}.${Date.now()}`;
      writeFileSync(tempPath, `${JSON.stringify(doc, null, 2)}\n`, "utf8");
      renameSync(tempPath, this.path);
    } catch (err) {
      throw new PersistenceError("persistence_write", `failed to write ${this.path}: ${errorMessage(err)}`, err);
    }
  }

  private read(): PreferencesDocument {
    if (!existsSync(this.path)) return emptyDocument();
    let raw: string;
    try {
      raw = readFileSync(this.path, "utf8");
    } catch (err) {
      throw new PersistenceError("persistence_read", `failed to read ${this.path}: ${errorMessage(err)}`, err);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return emptyDocument();
    }
    if (!isRecord(parsed) || !isRecord(parsed.lists)) return emptyDocument();

    const lists: Record<string, string[]> = {};
    for (const [key, value] of Object.entries(parsed.lists)) {
      if (!Array.isArray(value)) continue;
      lists[key] = value.filter((item): item is string => typeof item === "string");
    }
    return {
      version: typeof parsed.version === "number" ? parsed.version : 1,
      updated_at_ms: typeof parsed.updated_at_ms === "number" ? parsed.updated_at_ms : 0,
      lists,
    };
  }
}

export class MemoryPreferences implements PreferenceStore {
  private lists = new Map<string, string[]>();

  constructor(initial: Record<string, string[]> = {}) {
    for (const [key, values] of Object.entries(initial)) this.lists.set(key, [...values]);
  }

  async getStringList(key: string): Promise<string[] | null> {
    const list = this.lists.get(key);
    return list ? [...list] : null;
  }

  async setStringList(key: string, values: string[]): Promise<void> {
    this.lists.set(key, [...values]);
  }
}

function emptyDocument(): PreferencesDocument {
  return {
    version: 1,
    updated_at_ms: 0,
    lists: {},
  };
}
