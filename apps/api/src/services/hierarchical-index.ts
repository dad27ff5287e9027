import * as stringSimilarity from 'string-similarity';
import {
  LookupCapability,
  LookupItem,
  PickerNode,
} from '@trendlens/shared-types';

/**
 * Flatten a picker tree depth-first. Geo ids are joined to their parent's
 * ('US' > 'NY' becomes 'US-NY'); category ids are already unique.
 */
export function flattenTree(
  node: PickerNode,
  joinIds: boolean,
  parentId = '',
  result: LookupItem[] = []
): LookupItem[] {
  const id = joinIds && parentId ? `${parentId}-${node.id}` : node.id;
  result.push({ name: node.name, id });

  for (const child of node.children ?? []) {
    flattenTree(child, joinIds, joinIds ? id : '', result);
  }
  return result;
}

/**
 * Name and id search over a flattened geo or category tree
 */
export class HierarchicalIndex implements LookupCapability {
  private readonly byName = new Map<string, LookupItem>();
  private readonly wordIndex = new Map<string, Set<string>>();

  constructor(
    private readonly items: LookupItem[],
    private readonly partialIdSearch: boolean
  ) {
    for (const item of items) {
      const name = item.name.toLowerCase();
      // first occurrence wins: 'Georgia' the country precedes the US state
      if (!this.byName.has(name)) this.byName.set(name, item);

      for (const word of name.split(/[^\p{L}\p{N}]+/u)) {
        if (!word) continue;
        const names = this.wordIndex.get(word) ?? new Set<string>();
        names.add(name);
        this.wordIndex.set(word, names);
      }
    }
  }

  static fromTree(tree: PickerNode, joinIds: boolean): HierarchicalIndex {
    return new HierarchicalIndex(flattenTree(tree, joinIds), joinIds);
  }

  get size(): number {
    return this.items.length;
  }

  all(): LookupItem[] {
    return [...this.items];
  }

  find(query: string): LookupItem[] {
    return query.trim() ? this.partialSearch(query) : this.all();
  }

  exactSearch(name: string): LookupItem | undefined {
    return this.byName.get(name.trim().toLowerCase());
  }

  /**
   * Case-insensitive substring match on words and full names, best match first
   */
  partialSearch(query: string): LookupItem[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];

    const matches = new Set<string>();
    for (const [word, names] of this.wordIndex) {
      if (word.includes(needle)) names.forEach((name) => matches.add(name));
    }
    for (const name of this.byName.keys()) {
      if (name.includes(needle)) matches.add(name);
    }

    return [...matches]
      .map((name) => ({
        name,
        score: stringSimilarity.compareTwoStrings(needle, name),
      }))
      .sort((a, b) => b.score - a.score || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map(({ name }) => this.byName.get(name))
      .filter((item): item is LookupItem => item !== undefined);
  }

  idSearch(idQuery: string): LookupItem[] {
    const needle = idQuery.trim().toUpperCase();
    return this.items.filter((item) =>
      this.partialIdSearch ? item.id.toUpperCase().includes(needle) : item.id === idQuery.trim()
    );
  }
}
