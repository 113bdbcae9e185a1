import { describe, expect, it } from "vitest";
import { LabelDecodeError, parseLanguageCode, parseTagCategory } from "@/labels/errors";
import {
  decodeTagDocument,
  encodeTagDocument,
  parseTagDocument,
  serializeTagDocument,
} from "@/labels/serialization";
import { type Tag, TagSchema } from "@/types";

const onsen: Tag = TagSchema.parse({
  id: "onsen",
  category: "facility",
  synonyms: { ja: ["温泉", "露天風呂"], en: ["hot spring", "onsen"] },
  description: { en: "Natural hot spring bath" },
  weight: 2.5,
  parentId: "wellness",
});

const market: Tag = TagSchema.parse({
  id: "market",
  category: "culture",
  synonyms: { en: ["market"] },
});

describe("serialization", () => {
  describe("encodeTagDocument", () => {
    it("should key records by id and map parentId to parent_id", () => {
      const document = encodeTagDocument([onsen, market]);
      expect(document.version).toBe("1.0.0");
      expect(document.tags.onsen).toEqual({
        id: "onsen",
        category: "facility",
        synonyms: { ja: ["温泉", "露天風呂"], en: ["hot spring", "onsen"] },
        description: { en: "Natural hot spring bath" },
        weight: 2.5,
        parent_id: "wellness",
      });
      expect(document.tags.market?.parent_id).toBeNull();
    });
  });

  describe("serializeTagDocument", () => {
    it("should sort keys and keep synonym order", () => {
      const text = serializeTagDocument([onsen]);
      expect(text).toBe(
        [
          "{",
          '  "tags": {',
          '    "onsen": {',
          '      "category": "facility",',
          '      "description": {',
          '        "en": "Natural hot spring bath"',
          "      },",
          '      "id": "onsen",',
          '      "parent_id": "wellness",',
          '      "synonyms": {',
          '        "en": [',
          '          "hot spring",',
          '          "onsen"',
          "        ],",
          '        "ja": [',
          '          "温泉",',
          '          "露天風呂"',
          "        ]",
          "      },",
          '      "weight": 2.5',
          "    }",
          "  },",
          '  "version": "1.0.0"',
          "}",
          "",
        ].join("\n"),
      );
    });

    it("should not depend on insertion order", () => {
      expect(serializeTagDocument([onsen, market])).toBe(
        serializeTagDocument([market, onsen]),
      );
    });
  });

  describe("decodeTagDocument", () => {
    it("should round-trip tags", () => {
      const raw: unknown = JSON.parse(serializeTagDocument([onsen, market]));
      const decoded = decodeTagDocument(raw);
      expect(decoded.errors).toEqual([]);
      expect(decoded.tags).toHaveLength(2);
      expect(decoded.tags.find((t) => t.id === "onsen")).toEqual(onsen);
      expect(decoded.tags.find((t) => t.id === "market")).toEqual(market);
    });

    it("should fill defaults for optional fields", () => {
      const decoded = decodeTagDocument({
        tags: { quiet: { id: "quiet", category: "crowd" } },
      });
      expect(decoded.tags).toEqual([
        { id: "quiet", category: "crowd", synonyms: {}, description: {}, weight: 1 },
      ]);
    });

    it("should treat a missing tags object as empty", () => {
      expect(decodeTagDocument({ version: "1.0.0" })).toEqual({
        tags: [],
        errors: [],
      });
    });

    it("should skip and report an unknown category in lenient mode", () => {
      const decoded = decodeTagDocument({
        tags: {
          market: { id: "market", category: "culture", synonyms: { en: ["market"] } },
          volcano: { id: "volcano", category: "geology" },
        },
      });

      expect(decoded.tags.map((t) => t.id)).toEqual(["market"]);
      expect(decoded.errors).toHaveLength(1);
      const [error] = decoded.errors;
      expect(error).toBeInstanceOf(LabelDecodeError);
      expect(error?.recordId).toBe("volcano");
      expect(error?.field).toBe("category");
      expect(error?.value).toBe("geology");
    });

    it("should report an unknown language code with its path", () => {
      const decoded = decodeTagDocument({
        tags: { beach: { id: "beach", category: "scenery", synonyms: { xx: ["plage"] } } },
      });
      const [error] = decoded.errors;
      expect(error?.field).toBe("synonyms.xx");
      expect(error?.value).toBe("xx");
      expect(error?.message.startsWith('Tag "beach": synonyms.xx: ')).toBe(true);
    });

    it("should reject an empty synonym list", () => {
      const decoded = decodeTagDocument({
        tags: { beach: { id: "beach", category: "scenery", synonyms: { en: [] } } },
      });
      expect(decoded.tags).toEqual([]);
      expect(decoded.errors[0]?.field).toBe("synonyms.en");
    });

    it("should throw on the first bad record in strict mode", () => {
      expect(() =>
        decodeTagDocument(
          {
            tags: {
              market: { id: "market", category: "culture" },
              volcano: { id: "volcano", category: "geology" },
            },
          },
          { strategy: "strict" },
        ),
      ).toThrow(LabelDecodeError);
    });

    it("should throw when the document is not an object", () => {
      expect(() => decodeTagDocument([1, 2])).toThrow(LabelDecodeError);
    });
  });

  describe("parseTagDocument", () => {
    it("should turn invalid JSON into a decode error", () => {
      try {
        parseTagDocument("{ not json");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(LabelDecodeError);
        if (error instanceof LabelDecodeError) {
          expect(error.field).toBe("document");
          expect(error.message.startsWith("Invalid tag document: ")).toBe(true);
        }
      }
    });
  });

  describe("code parsing", () => {
    it("should accept known codes case-insensitively", () => {
      expect(parseLanguageCode("ZH")).toBe("zh");
      expect(parseLanguageCode(" ja ")).toBe("ja");
      expect(parseTagCategory("Budget")).toBe("budget");
    });

    it("should reject unknown codes", () => {
      expect(() => parseLanguageCode("xx")).toThrow('Unknown language code "xx"');
      expect(() => parseTagCategory("invalid")).toThrow(
        'Unknown tag category "invalid"',
      );
    });
  });
});
