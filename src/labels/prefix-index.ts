/**
 * Per-language prefix trie over tag synonyms
 *
 * Nodes hold tag ids only; records live in the TagRegistry. Each insert is
 * remembered per tag id so a tag's entries can be retracted when it is
 * replaced or removed.
 */

import type { LanguageCode } from "@/types";

interface TrieNode {
  children: Map<string, TrieNode>;
  /** Tags with a synonym ending at this node */
  tagIds: Set<string>;
}

interface TerminalRef {
  language: LanguageCode;
  node: TrieNode;
}

function createNode(): TrieNode {
  return { children: new Map(), tagIds: new Set() };
}

export class PrefixIndex {
  private roots: Map<LanguageCode, TrieNode> = new Map();
  private terminals: Map<string, TerminalRef[]> = new Map(); // tag id → nodes it ends at

  /**
   * Index one synonym for a tag. Matching is case-insensitive, so the
   * synonym is lower-cased before it is walked.
   */
  insert(language: LanguageCode, synonym: string, tagId: string): void {
    let root = this.roots.get(language);
    if (!root) {
      root = createNode();
      this.roots.set(language, root);
    }

    let node = root;
    // for..of walks code points, so CJK and astral characters are one step each
    for (const char of synonym.toLowerCase()) {
      let child = node.children.get(char);
      if (!child) {
        child = createNode();
        node.children.set(char, child);
      }
      node = child;
    }
    node.tagIds.add(tagId);

    const refs = this.terminals.get(tagId) ?? [];
    refs.push({ language, node });
    this.terminals.set(tagId, refs);
  }

  /**
   * Drop every entry a tag contributed. Nodes are left in place; an empty
   * node simply yields no ids.
   */
  remove(tagId: string): void {
    const refs = this.terminals.get(tagId);
    if (!refs) return;

    for (const ref of refs) {
      ref.node.tagIds.delete(tagId);
    }
    this.terminals.delete(tagId);
  }

  /**
   * Ids of every tag with a synonym starting with `prefix` in `language`.
   * Unknown language or a missing character gives an empty set; an empty
   * prefix gives every tag indexed for the language.
   */
  lookup(prefix: string, language: LanguageCode): Set<string> {
    const root = this.roots.get(language);
    if (!root) {
      return new Set();
    }

    let node = root;
    for (const char of prefix.toLowerCase()) {
      const child = node.children.get(char);
      if (!child) {
        return new Set();
      }
      node = child;
    }

    return collectTagIds(node);
  }

  languages(): LanguageCode[] {
    return Array.from(this.roots.keys());
  }

  hasLanguage(language: LanguageCode): boolean {
    return this.roots.has(language);
  }

  clear(): void {
    this.roots.clear();
    this.terminals.clear();
  }
}

/**
 * Union of tag ids in the subtree rooted at `start`
 */
function collectTagIds(start: TrieNode): Set<string> {
  const result = new Set<string>();
  const stack: TrieNode[] = [start];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    for (const id of node.tagIds) {
      result.add(id);
    }
    for (const child of node.children.values()) {
      stack.push(child);
    }
  }

  return result;
}
