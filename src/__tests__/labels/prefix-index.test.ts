import { beforeEach, describe, expect, it } from "vitest";
import { PrefixIndex } from "@/labels/prefix-index";

describe("PrefixIndex", () => {
  let index: PrefixIndex;

  beforeEach(() => {
    index = new PrefixIndex();
    index.insert("en", "beach", "beach");
    index.insert("en", "seaside", "beach");
    index.insert("en", "Bazaar", "market");
    index.insert("zh", "海滩", "beach");
  });

  describe("lookup", () => {
    it("should return tags for every prefix of a synonym", () => {
      for (const prefix of ["s", "se", "sea", "seas", "seasi", "seasid", "seaside"]) {
        expect(index.lookup(prefix, "en")).toEqual(new Set(["beach"]));
      }
    });

    it("should collect the whole subtree under a shared prefix", () => {
      expect(index.lookup("b", "en")).toEqual(new Set(["beach", "market"]));
    });

    it("should be case-insensitive on both sides", () => {
      expect(index.lookup("BAZ", "en")).toEqual(new Set(["market"]));
      expect(index.lookup("baz", "en")).toEqual(new Set(["market"]));
    });

    it("should return an empty set when a character is missing", () => {
      expect(index.lookup("xyz", "en").size).toBe(0);
      expect(index.lookup("beachx", "en").size).toBe(0);
    });

    it("should not fall back to another language", () => {
      expect(index.lookup("海", "en").size).toBe(0);
      expect(index.lookup("海", "zh")).toEqual(new Set(["beach"]));
    });

    it("should return an empty set for a language with no trie", () => {
      expect(index.lookup("b", "fr").size).toBe(0);
    });

    it("should return every tag in the language for an empty prefix", () => {
      expect(index.lookup("", "en")).toEqual(new Set(["beach", "market"]));
    });

    it("should collapse identical spellings from different tags into one node", () => {
      index.insert("en", "beach", "coastline");
      expect(index.lookup("beach", "en")).toEqual(
        new Set(["beach", "coastline"]),
      );
    });

    it("should step through astral characters as single code points", () => {
      index.insert("en", "🏖️ day", "beach_day");
      expect(index.lookup("🏖", "en")).toEqual(new Set(["beach_day"]));
    });
  });

  describe("remove", () => {
    it("should retract every synonym of a tag", () => {
      index.remove("beach");
      expect(index.lookup("sea", "en").size).toBe(0);
      expect(index.lookup("海", "zh").size).toBe(0);
      expect(index.lookup("b", "en")).toEqual(new Set(["market"]));
    });

    it("should leave other tags sharing a node in place", () => {
      index.insert("en", "beach", "coastline");
      index.remove("beach");
      expect(index.lookup("beach", "en")).toEqual(new Set(["coastline"]));
    });

    it("should ignore unknown tag ids", () => {
      index.remove("nope");
      expect(index.lookup("", "en").size).toBe(2);
    });
  });

  it("should list indexed languages and clear them", () => {
    expect(index.languages().sort()).toEqual(["en", "zh"]);
    expect(index.hasLanguage("ja")).toBe(false);

    index.clear();
    expect(index.languages()).toEqual([]);
    expect(index.lookup("", "en").size).toBe(0);
  });
});
