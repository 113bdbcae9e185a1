import type { TagCategory } from "@/types";

/**
 * Secondary index: category → tag ids
 */
export class CategoryIndex {
  private index: Map<TagCategory, Set<string>> = new Map();

  add(category: TagCategory, tagId: string): void {
    const ids = this.index.get(category) ?? new Set<string>();
    ids.add(tagId);
    this.index.set(category, ids);
  }

  remove(category: TagCategory, tagId: string): void {
    const ids = this.index.get(category);
    if (!ids) return;

    ids.delete(tagId);
    if (ids.size === 0) {
      this.index.delete(category);
    }
  }

  /**
   * Ids registered under `category`; a copy, so callers cannot mutate the index
   */
  get(category: TagCategory): Set<string> {
    return new Set(this.index.get(category));
  }

  categories(): TagCategory[] {
    return Array.from(this.index.keys());
  }

  clear(): void {
    this.index.clear();
  }
}
