/**
 * Geo and category picker types
 */

export type PickerNode = {
  name: string;
  id: string;
  children?: PickerNode[];
};

export type LookupItem = {
  name: string;
  id: string;
};

/**
 * Resolves free text to upstream ids ("New York" -> "US-NY")
 */
export type LookupCapability = {
  find(query: string): LookupItem[];
};

/**
 * Autocomplete entry: a search term or a knowledge-graph topic
 */
export type Suggestion = {
  mid: string;
  title: string;
  type: string;
};
