import type { StfDocument } from "./types.js";

export interface DocumentSummary {
  blocks: number;
  categories: number;
  items: number;
  links: number;
}

/** Pretty-print the document as JSON, newline-terminated. */
export function formatDocument(document: StfDocument, indent = 2): string {
  return JSON.stringify(document, null, indent) + "\n";
}

export function summarizeDocument(document: StfDocument): DocumentSummary {
  const summary: DocumentSummary = { blocks: document.length, categories: 0, items: 0, links: 0 };
  for (const block of document) {
    summary.categories += block.categories.length;
    summary.items += block.items.length;
    for (const item of block.items) {
      summary.links += item.categories.length;
    }
  }
  return summary;
}
