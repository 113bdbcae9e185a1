/**
 * DestinationLabelManager - facade over the tag registry, destination store
 * and matching engine
 *
 * All operations are synchronous and run to completion on the calling
 * thread, so a single instance can be shared by every MCP tool handler
 * without locking.
 */

import { readFileSync, writeFileSync } from "node:fs";
import {
  type Destination,
  type LanguageCode,
  type ScoredDestination,
  type Tag,
  type TagCategory,
  TagSchema,
} from "@/types";
import { DEFAULT_TAGS } from "./default-tags";
import { DestinationStore } from "./destination-store";
import { type LabelDecodeError, toLabelIOError } from "./errors";
import {
  calculateTagMatchScore,
  explainTagMatch,
  type MatchBreakdown,
  rankDestinations,
} from "./matching";
import { TagRegistry } from "./registry";
import {
  type ImportStrategy,
  parseTagDocument,
  serializeTagDocument,
} from "./serialization";

export interface LabelManagerOptions {
  /** Load DEFAULT_TAGS on construction (default: true) */
  seedDefaultTags?: boolean;
}

export interface LabelStats {
  tagCount: number;
  destinationCount: number;
  languages: LanguageCode[];
  byCategory: Partial<Record<TagCategory, number>>;
}

export interface TagExportResult {
  path: string;
  tags: number;
}

export interface TagImportOptions {
  strategy?: ImportStrategy;
}

export interface TagImportResult {
  path: string;
  imported: number;
  skipped: number;
  errors: LabelDecodeError[];
}

export class DestinationLabelManager {
  readonly tags = new TagRegistry();
  readonly destinations = new DestinationStore();

  constructor(options: LabelManagerOptions = {}) {
    if (options.seedDefaultTags ?? true) {
      for (const tag of DEFAULT_TAGS) {
        this.tags.addTag(TagSchema.parse(tag));
      }
    }
  }

  // =========================================================================
  // Tags
  // =========================================================================

  addTag(tag: Tag): void {
    this.tags.addTag(tag);
  }

  removeTag(id: string): boolean {
    return this.tags.removeTag(id);
  }

  getTag(id: string): Tag | undefined {
    return this.tags.getTag(id);
  }

  searchTagsByPrefix(
    prefix: string,
    language: LanguageCode,
    limit: number = 10,
  ): Tag[] {
    return this.tags.searchByPrefix(prefix, language, limit);
  }

  getTagsByCategory(category: TagCategory): Tag[] {
    return this.tags.getTagsByCategory(category);
  }

  // =========================================================================
  // Destinations
  // =========================================================================

  addDestination(destination: Destination): void {
    this.destinations.add(destination);
  }

  getDestination(id: string): Destination | undefined {
    return this.destinations.get(id);
  }

  /**
   * Rank every destination against the query terms
   *
   * @param minScore Open-ended threshold; scores can exceed 1.0
   */
  searchDestinationsByTags(
    queries: string[],
    language: LanguageCode = "en",
    minScore: number = 0.3,
    limit: number = 20,
  ): ScoredDestination[] {
    return rankDestinations(
      this.destinations.values(),
      queries,
      language,
      this.tags,
      { minScore, limit },
    );
  }

  calculateTagMatchScore(
    destination: Destination,
    queries: string[],
    language: LanguageCode,
  ): number {
    return calculateTagMatchScore(destination, queries, language, this.tags);
  }

  explainTagMatch(
    destination: Destination,
    queries: string[],
    language: LanguageCode,
  ): MatchBreakdown {
    return explainTagMatch(destination, queries, language, this.tags);
  }

  // =========================================================================
  // Persistence
  // =========================================================================

  /**
   * Write every tag to `path` as a JSON tag document
   *
   * @throws LabelIOError if the file cannot be written
   */
  exportTags(path: string): TagExportResult {
    const tags = this.tags.getAllTags();
    const content = serializeTagDocument(tags);

    try {
      writeFileSync(path, content, "utf-8");
    } catch (error) {
      throw toLabelIOError(error, "write", path);
    }

    return { path, tags: tags.length };
  }

  /**
   * Read a tag document and add every valid record. Existing tags with the
   * same id are replaced; other tags are kept.
   *
   * @throws LabelIOError if the file cannot be read
   * @throws LabelDecodeError if the document is malformed, or on the first
   *   bad record with `strategy: "strict"` (nothing is added in that case)
   */
  importTags(path: string, options: TagImportOptions = {}): TagImportResult {
    let content: string;
    try {
      content = readFileSync(path, "utf-8");
    } catch (error) {
      throw toLabelIOError(error, "read", path);
    }

    const decoded = parseTagDocument(content, { strategy: options.strategy });
    for (const tag of decoded.tags) {
      this.tags.addTag(tag);
    }

    for (const error of decoded.errors) {
      console.warn(`[destinations] Skipped tag record: ${error.message}`);
    }

    return {
      path,
      imported: decoded.tags.length,
      skipped: decoded.errors.length,
      errors: decoded.errors,
    };
  }

  getStats(): LabelStats {
    return {
      tagCount: this.tags.size,
      destinationCount: this.destinations.size,
      languages: this.tags.getIndexedLanguages(),
      byCategory: this.tags.getCategoryCounts(),
    };
  }
}
