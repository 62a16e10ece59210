import { NotFoundError } from "./errors.js";
import type { Logger } from "../runtime/logger.js";
import type { CharacterRecord } from "./types.js";

// ── Built-in cast ────────────────────────────────────────────

export const DEFAULT_CHARACTERS: readonly CharacterRecord[] = [
  {
    name: "Jack",
    backstory: "Jack is a former spy who now lives as a covert hero.",
    superpower: "Invisibility and telepathy",
  },
  {
    name: "Ram",
    backstory: "Ram is an ancient warrior reborn in the modern world to fight for peace.",
    superpower: "Invincible body and immense strength",
  },
  {
    name: "Robert",
    backstory: "Robert is a scientist who became part machine after a lab accident.",
    superpower: "Power fused with advanced technology",
  },
];

function keyOf(name: string): string {
  return name.trim().toLowerCase();
}

// ── Registry ─────────────────────────────────────────────────

/**
 * Read-only lookup over a fixed set of characters. Names match
 * case-insensitively with surrounding whitespace ignored.
 */
export class CharacterRegistry {
  private readonly byKey = new Map<string, Readonly<CharacterRecord>>();
  private readonly names: readonly string[];

  constructor(records: readonly CharacterRecord[] = DEFAULT_CHARACTERS, private readonly logger?: Logger) {
    for (const record of records) {
      const key = keyOf(record.name);
      if (this.byKey.has(key)) throw new Error(`Duplicate character name: ${record.name}`);
      this.byKey.set(key, Object.freeze({ ...record }));
    }
    this.names = Object.freeze(records.map((r) => r.name));
  }

  listNames(): string[] {
    this.logger?.info(`Retrieved ${this.names.length} characters`, this.names);
    return [...this.names];
  }

  get(name: string): Readonly<CharacterRecord> {
    const record = this.byKey.get(keyOf(name));
    if (!record) {
      this.logger?.warn(`Character not found: ${name}`);
      throw new NotFoundError(`Character not found: ${name}`);
    }
    return record;
  }

  getBackstory(name: string): string {
    this.logger?.info(`Getting backstory for character: ${name}`);
    return this.get(name).backstory;
  }

  getSuperpower(name: string): string {
    this.logger?.info(`Getting superpower for character: ${name}`);
    return this.get(name).superpower;
  }
}
