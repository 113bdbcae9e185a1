import { beforeEach, describe, expect, it } from "vitest";
import { TagRegistry } from "@/labels/registry";
import { type Tag, TagSchema, type TagInput } from "@/types";

function tag(input: TagInput): Tag {
  return TagSchema.parse(input);
}

describe("TagRegistry", () => {
  let registry: TagRegistry;

  beforeEach(() => {
    registry = new TagRegistry();
    registry.addTag(
      tag({
        id: "beach",
        category: "scenery",
        synonyms: { en: ["beach", "seaside", "coast"], zh: ["海滩"] },
        weight: 1,
      }),
    );
    registry.addTag(
      tag({
        id: "bazaar",
        category: "culture",
        synonyms: { en: ["bazaar", "market"] },
        weight: 3,
      }),
    );
    registry.addTag(
      tag({
        id: "ski",
        category: "activity",
        synonyms: { en: ["ski", "skiing"], ja: ["スキー"] },
        weight: 2,
        parentId: "mountain",
      }),
    );
  });

  describe("searchByPrefix", () => {
    it("should find beach by 'bea'", () => {
      const ids = registry.searchByPrefix("bea", "en", 10).map((t) => t.id);
      expect(ids).toEqual(["beach"]);
    });

    it("should return nothing for an unmatched prefix", () => {
      expect(registry.searchByPrefix("xyz", "en", 10)).toEqual([]);
    });

    it("should order by weight descending", () => {
      const ids = registry.searchByPrefix("", "en", 10).map((t) => t.id);
      expect(ids).toEqual(["bazaar", "ski", "beach"]);
    });

    it("should truncate to limit after sorting", () => {
      const ids = registry.searchByPrefix("", "en", 2).map((t) => t.id);
      expect(ids).toEqual(["bazaar", "ski"]);
    });

    it("should return an empty list for a zero limit", () => {
      expect(registry.searchByPrefix("", "en", 0)).toEqual([]);
    });

    it("should only return tags with synonyms in the language", () => {
      const ids = registry.searchByPrefix("", "ja", 10).map((t) => t.id);
      expect(ids).toEqual(["ski"]);
    });

    it("should return hydrated records", () => {
      const [result] = registry.searchByPrefix("coa", "en", 10);
      expect(result?.synonyms.en).toEqual(["beach", "seaside", "coast"]);
    });
  });

  describe("addTag replacing an existing id", () => {
    beforeEach(() => {
      registry.addTag(
        tag({
          id: "beach",
          category: "climate",
          synonyms: { en: ["sunny shore"] },
        }),
      );
    });

    it("should stop matching retracted synonyms", () => {
      expect(registry.searchByPrefix("sea", "en", 10)).toEqual([]);
      expect(registry.searchByPrefix("海", "zh", 10)).toEqual([]);
    });

    it("should match the new synonyms", () => {
      const ids = registry.searchByPrefix("sunny", "en", 10).map((t) => t.id);
      expect(ids).toEqual(["beach"]);
    });

    it("should move the tag to its new category", () => {
      expect(registry.getTagsByCategory("scenery")).toEqual([]);
      expect(registry.getTagsByCategory("climate").map((t) => t.id)).toEqual([
        "beach",
      ]);
    });

    it("should keep a single record", () => {
      expect(registry.size).toBe(3);
      expect(registry.getTag("beach")?.category).toBe("climate");
    });
  });

  describe("getTagsByCategory", () => {
    it("should return the tags in a category", () => {
      expect(registry.getTagsByCategory("culture").map((t) => t.id)).toEqual([
        "bazaar",
      ]);
    });

    it("should return an empty list for an unused category", () => {
      expect(registry.getTagsByCategory("transport")).toEqual([]);
    });

    it("should count tags per category", () => {
      expect(registry.getCategoryCounts()).toEqual({
        scenery: 1,
        culture: 1,
        activity: 1,
      });
    });
  });

  describe("removeTag", () => {
    it("should remove the record and its index entries", () => {
      expect(registry.removeTag("ski")).toBe(true);
      expect(registry.hasTag("ski")).toBe(false);
      expect(registry.searchByPrefix("sk", "en", 10)).toEqual([]);
      expect(registry.getTagsByCategory("activity")).toEqual([]);
      expect(registry.getCategoryCounts().activity).toBeUndefined();
    });

    it("should return false for an unknown id", () => {
      expect(registry.removeTag("nope")).toBe(false);
      expect(registry.size).toBe(3);
    });
  });

  it("should keep its own copy of an added tag", () => {
    const lake = tag({
      id: "lake",
      category: "scenery",
      synonyms: { en: ["lake"] },
    });
    registry.addTag(lake);
    lake.synonyms.en = ["river"];

    expect(registry.searchByPrefix("riv", "en", 10)).toEqual([]);
    const [found] = registry.searchByPrefix("lak", "en", 10);
    expect(found?.id).toBe("lake");
    expect(found?.synonyms.en).toEqual(["lake"]);
  });

  it("should find child tags by parent id", () => {
    expect(registry.getChildTags("mountain").map((t) => t.id)).toEqual(["ski"]);
    expect(registry.getChildTags("beach")).toEqual([]);
  });

  it("should clear tags and indexes", () => {
    registry.clear();
    expect(registry.size).toBe(0);
    expect(registry.getIndexedLanguages()).toEqual([]);
    expect(registry.searchByPrefix("", "en", 10)).toEqual([]);
    expect(registry.getTagsByCategory("scenery")).toEqual([]);
  });
});
