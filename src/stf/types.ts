// A (tag, value) pair read from the export. Structural tags carry no value.
export interface Chunk {
  tag: string;
  value: string | null;
}

export type CategoryLinkType = "standard" | "exclusive" | "unindexed" | "date" | "numeric";

export interface CategoryLink {
  type: CategoryLinkType;
  name: string;
  shortname?: string;
  alsomatch?: string[];
  value?: string; // ISO timestamp, date links only
}

export interface Assignment {
  include: string[];
  exclude: string[];
}

export interface StfCategory {
  name: string; // raw, type symbols included
  attributes: string[];
  note?: string;
  conditions?: Assignment;
  actions?: Assignment;
}

export interface StfItem {
  categories: CategoryLink[];
  text?: string;
  note?: string;
}

export interface StfBlock {
  timestamp: string;
  categories: StfCategory[];
  items: StfItem[];
}

export type StfDocument = StfBlock[];

// Tags the document builder understands.
export const STF_TAGS = {
  HEADER: "STF",
  COMMENT: "S",
  DATE_FORMAT: "d",
  CATEGORY: "C",
  ITEM: "I",
  ATTRIBUTE: "r",
  END_ATTRIBUTE: ";",
  END_CATEGORY: ".",
  CATEGORY_NOTE: "F",
  CONDITIONS: "p",
  ACTIONS: "a",
  INCLUDE: "+",
  EXCLUDE: "-",
  END_ASSIGNMENT: ";",
  TEXT: "T",
  ITEM_NOTE: "N",
  END_ITEM: "!",
} as const;

// These tags end as soon as the closing brace is read.
export const VALUELESS_TAGS: ReadonlySet<string> = new Set([";", "+", "-", ".", "!"]);

export interface Diagnostics {
  comment(text: string): void;
  warn(message: string): void;
}
