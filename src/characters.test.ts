import { describe, expect, it } from "vitest";
import { CharacterRegistry, DEFAULT_CHARACTERS } from "./characters.js";
import { NotFoundError } from "./errors.js";

describe("CharacterRegistry", () => {
  const registry = new CharacterRegistry();

  it("lists built-in names in table order", () => {
    expect(registry.listNames()).toEqual(["Jack", "Ram", "Robert"]);
  });

  it("returns the same names on every call, unaffected by caller mutation", () => {
    const first = registry.listNames();
    first.push("Mallory");
    expect(registry.listNames()).toEqual(["Jack", "Ram", "Robert"]);
  });

  it("has a non-empty backstory and superpower for every built-in character", () => {
    for (const name of registry.listNames()) {
      expect(registry.getBackstory(name).length).toBeGreaterThan(0);
      expect(registry.getSuperpower(name).length).toBeGreaterThan(0);
    }
  });

  it("looks names up case-insensitively and ignores surrounding whitespace", () => {
    expect(registry.getBackstory("  jACK ")).toBe("Jack is a former spy who now lives as a covert hero.");
    expect(registry.getSuperpower("ROBERT")).toBe("Power fused with advanced technology");
  });

  it("fails with NotFoundError naming the unknown character", () => {
    expect(() => registry.getBackstory("Mallory")).toThrow(NotFoundError);
    expect(() => registry.getSuperpower("Mallory")).toThrow("Character not found: Mallory");
  });

  it("hands out frozen records", () => {
    const ram = registry.get("ram");
    expect(ram.superpower).toBe("Invincible body and immense strength");
    expect(Object.isFrozen(ram)).toBe(true);
  });

  it("accepts a custom table and rejects duplicate names", () => {
    const custom = new CharacterRegistry([{ name: "Ada", backstory: "b", superpower: "s" }]);
    expect(custom.listNames()).toEqual(["Ada"]);
    expect(() => new CharacterRegistry([...DEFAULT_CHARACTERS, { name: "jack", backstory: "b", superpower: "s" }])).toThrow(
      "Duplicate character name: jack",
    );
  });
});
