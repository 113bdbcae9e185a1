/**
 * TagRegistry - single source of truth for tag records
 *
 * Every mutation fans out to the per-language PrefixIndex and the
 * CategoryIndex. Both indexes hold ids only and are hydrated through this
 * registry on read.
 *
 * Re-adding an id retracts the previous version's index entries before the
 * new version is indexed, so a replaced synonym stops matching.
 */

import {
  LANGUAGE_CODES,
  type LanguageCode,
  type Tag,
  type TagCategory,
} from "@/types";
import { CategoryIndex } from "./category-index";
import { PrefixIndex } from "./prefix-index";

export class TagRegistry {
  private tags: Map<string, Tag> = new Map();
  private prefixIndex = new PrefixIndex();
  private categoryIndex = new CategoryIndex();

  /**
   * Insert or replace a tag by id. The registry keeps its own copy, so later
   * changes to `input` do not reach the indexes.
   */
  addTag(input: Tag): void {
    const tag = structuredClone(input);
    if (this.tags.has(tag.id)) {
      this.retract(tag.id);
    }

    this.tags.set(tag.id, tag);
    this.categoryIndex.add(tag.category, tag.id);

    for (const language of LANGUAGE_CODES) {
      const synonyms = tag.synonyms[language];
      if (!synonyms) continue;

      for (const synonym of synonyms) {
        this.prefixIndex.insert(language, synonym, tag.id);
      }
    }
  }

  /**
   * Remove a tag and its index entries
   *
   * @returns True if the tag existed
   */
  removeTag(id: string): boolean {
    if (!this.tags.has(id)) {
      return false;
    }
    this.retract(id);
    this.tags.delete(id);
    return true;
  }

  private retract(id: string): void {
    const previous = this.tags.get(id);
    if (!previous) return;

    this.categoryIndex.remove(previous.category, id);
    this.prefixIndex.remove(id);
  }

  getTag(id: string): Tag | undefined {
    return this.tags.get(id);
  }

  hasTag(id: string): boolean {
    return this.tags.has(id);
  }

  getAllTags(): Tag[] {
    return Array.from(this.tags.values());
  }

  get size(): number {
    return this.tags.size;
  }

  /**
   * Tags with a synonym starting with `prefix`, highest weight first
   *
   * @param prefix Case-insensitive prefix; empty matches every tag in the language
   * @param language Trie to search; no fallback to another language
   * @param limit Maximum number of tags returned
   */
  searchByPrefix(prefix: string, language: LanguageCode, limit: number): Tag[] {
    const tags = this.hydrate(this.prefixIndex.lookup(prefix, language));
    return tags
      .sort((a, b) => b.weight - a.weight)
      .slice(0, Math.max(0, limit));
  }

  /**
   * All tags in a category, in no particular order
   */
  getTagsByCategory(category: TagCategory): Tag[] {
    return this.hydrate(this.categoryIndex.get(category));
  }

  /**
   * Tags whose parentId points at `parentId` (hierarchy is metadata only)
   */
  getChildTags(parentId: string): Tag[] {
    return this.getAllTags().filter((tag) => tag.parentId === parentId);
  }

  getIndexedLanguages(): LanguageCode[] {
    return this.prefixIndex.languages();
  }

  getCategoryCounts(): Partial<Record<TagCategory, number>> {
    const counts: Partial<Record<TagCategory, number>> = {};
    for (const category of this.categoryIndex.categories()) {
      counts[category] = this.categoryIndex.get(category).size;
    }
    return counts;
  }

  clear(): void {
    this.tags.clear();
    this.prefixIndex.clear();
    this.categoryIndex.clear();
  }

  private hydrate(ids: Iterable<string>): Tag[] {
    const result: Tag[] = [];
    for (const id of ids) {
      const tag = this.tags.get(id);
      if (tag) {
        result.push(tag);
      }
    }
    return result;
  }
}
