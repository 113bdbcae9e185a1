/**
 * Tag document encoding
 *
 * The on-disk format is a JSON document keyed by tag id:
 *
 * ```json
 * {
 *   "version": "1.0.0",
 *   "tags": {
 *     "beach": {
 *       "id": "beach",
 *       "category": "scenery",
 *       "synonyms": { "en": ["beach", "seaside"] },
 *       "description": { "en": "Sandy shore" },
 *       "weight": 1,
 *       "parent_id": null
 *     }
 *   }
 * }
 * ```
 *
 * Records are decoded one by one. An unknown language or category code fails
 * that record with a LabelDecodeError; the caller picks whether that aborts
 * the whole decode (strict) or is reported and skipped (lenient).
 */

import { type ZodIssue, z } from "zod";
import {
  LanguageCodeSchema,
  SynonymListSchema,
  type Tag,
  TagCategorySchema,
} from "@/types";
import { stableStringify } from "@/utils";
import { LabelDecodeError } from "./errors";

export const TAG_DOCUMENT_VERSION = "1.0.0";

export const SerializedTagSchema = z.object({
  id: z.string().min(1),
  category: TagCategorySchema,
  synonyms: z.record(LanguageCodeSchema, SynonymListSchema).default({}),
  description: z.record(LanguageCodeSchema, z.string()).default({}),
  weight: z.number().nonnegative().default(1),
  parent_id: z.string().min(1).nullable().default(null),
});
export type SerializedTag = z.infer<typeof SerializedTagSchema>;

export const TagDocumentSchema = z.object({
  version: z.string().optional(),
  tags: z.record(z.string(), z.unknown()).default({}),
});

export interface TagDocument {
  version: string;
  tags: Record<string, SerializedTag>;
}

export const ImportStrategySchema = z.enum(["strict", "lenient"]);
export type ImportStrategy = z.infer<typeof ImportStrategySchema>;

export interface DecodeOptions {
  /** strict: throw on the first bad record; lenient (default): skip and report */
  strategy?: ImportStrategy;
}

export interface DecodedTags {
  tags: Tag[];
  errors: LabelDecodeError[];
}

export function toSerializedTag(tag: Tag): SerializedTag {
  return {
    id: tag.id,
    category: tag.category,
    synonyms: tag.synonyms,
    description: tag.description,
    weight: tag.weight,
    parent_id: tag.parentId ?? null,
  };
}

export function fromSerializedTag(record: SerializedTag): Tag {
  const tag: Tag = {
    id: record.id,
    category: record.category,
    synonyms: record.synonyms,
    description: record.description,
    weight: record.weight,
  };
  if (record.parent_id !== null) {
    tag.parentId = record.parent_id;
  }
  return tag;
}

export function encodeTagDocument(tags: Iterable<Tag>): TagDocument {
  const document: TagDocument = { version: TAG_DOCUMENT_VERSION, tags: {} };
  for (const tag of tags) {
    document.tags[tag.id] = toSerializedTag(tag);
  }
  return document;
}

/**
 * Serialize with sorted keys and a trailing newline
 */
export function serializeTagDocument(tags: Iterable<Tag>): string {
  return `${stableStringify(encodeTagDocument(tags), 2)}\n`;
}

/**
 * Decode a parsed JSON value into tags
 *
 * @throws LabelDecodeError when the document itself is malformed, or on the
 *   first bad record in strict mode
 */
export function decodeTagDocument(
  raw: unknown,
  options: DecodeOptions = {},
): DecodedTags {
  const strategy = options.strategy ?? "lenient";
  const parsed = TagDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw issueToDecodeError(parsed.error.issues[0], undefined);
  }

  const result: DecodedTags = { tags: [], errors: [] };

  for (const [key, value] of Object.entries(parsed.data.tags)) {
    const record = SerializedTagSchema.safeParse(value);
    if (record.success) {
      result.tags.push(fromSerializedTag(record.data));
      continue;
    }

    const error = issueToDecodeError(record.error.issues[0], key);
    if (strategy === "strict") {
      throw error;
    }
    result.errors.push(error);
  }

  return result;
}

/**
 * Parse document text. Invalid JSON is a decode error, not an I/O error.
 */
export function parseTagDocument(
  text: string,
  options: DecodeOptions = {},
): DecodedTags {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "Unknown error";
    throw new LabelDecodeError(
      `Invalid tag document: ${reason}`,
      "document",
      undefined,
    );
  }
  return decodeTagDocument(raw, options);
}

function issueToDecodeError(
  issue: ZodIssue | undefined,
  recordId: string | undefined,
): LabelDecodeError {
  if (!issue) {
    return new LabelDecodeError("Invalid tag record", "record", undefined, recordId);
  }

  const field = issue.path.length > 0 ? issue.path.join(".") : "record";
  const value = "received" in issue ? issue.received : undefined;
  const prefix = recordId === undefined ? "Tag document" : `Tag "${recordId}"`;

  return new LabelDecodeError(
    `${prefix}: ${field}: ${issue.message}`,
    field,
    value,
    recordId,
  );
}
