import { parseCategoryLink } from "./category-link.js";
import {
  DEFAULT_DATE_FORMAT,
  isValidDateFormat,
  parseDateFormatSelector,
  parseHeaderTimestamp,
} from "./date-table.js";
import { InvalidDateFormatError, LookaheadMismatchError, UnexpectedTagError } from "./errors.js";
import { ChunkLexer } from "./lexer.js";
import { STF_TAGS } from "./types.js";
import type {
  Assignment,
  Chunk,
  Diagnostics,
  StfBlock,
  StfCategory,
  StfDocument,
  StfItem,
} from "./types.js";

/**
 * Where the builder is in the document. Each nested state holds the objects
 * it is allowed to mutate, so nothing outlives the state that owns it.
 */
export type BuilderState =
  | { kind: "none" }
  | { kind: "root"; block: StfBlock }
  | { kind: "category"; block: StfBlock; category: StfCategory }
  | { kind: "conditions" | "actions"; block: StfBlock; category: StfCategory; assignment: Assignment }
  | { kind: "item"; block: StfBlock; item: StfItem };

export interface BuilderOptions {
  /** Initial date format selector, 1-12. */
  dateFormat?: number;
  diagnostics?: Diagnostics;
}

function valueOf(chunk: Chunk): string {
  return chunk.value ?? "";
}

export class DocumentBuilder {
  private state: BuilderState = { kind: "none" };
  private dateFormat: number;
  private readonly document: StfDocument = [];
  private readonly diagnostics?: Diagnostics;

  constructor(
    private readonly lexer: ChunkLexer,
    options: BuilderOptions = {}
  ) {
    const dateFormat = options.dateFormat ?? DEFAULT_DATE_FORMAT;
    if (!isValidDateFormat(dateFormat)) {
      throw new InvalidDateFormatError(String(dateFormat));
    }
    this.dateFormat = dateFormat;
    this.diagnostics = options.diagnostics;
  }

  /** The selector in effect. A `{d}` tag changes it for the rest of the input, across blocks. */
  get currentDateFormat(): number {
    return this.dateFormat;
  }

  get currentState(): BuilderState["kind"] {
    return this.state.kind;
  }

  /**
   * Consume the whole input. An unterminated category or item at the end
   * is kept as it stands.
   */
  build(): StfDocument {
    for (let chunk = this.lexer.next(); chunk !== null; chunk = this.lexer.next()) {
      if (chunk.tag === STF_TAGS.COMMENT) {
        if (chunk.value) {
          this.diagnostics?.comment(chunk.value);
        }
        continue;
      }
      // The lexer has already warned about an empty tag.
      if (chunk.tag.length === 0) {
        continue;
      }
      this.dispatch(chunk);
    }
    return this.document;
  }

  private dispatch(chunk: Chunk): void {
    const state = this.state;
    switch (state.kind) {
      case "none":
        return this.handleNone(chunk);
      case "root":
        return this.handleRoot(state, chunk);
      case "category":
        return this.handleCategory(state, chunk);
      case "conditions":
      case "actions":
        return this.handleAssignment(state, chunk);
      case "item":
        return this.handleItem(state, chunk);
    }
  }

  private handleNone(chunk: Chunk): void {
    if (chunk.tag !== STF_TAGS.HEADER) {
      throw new UnexpectedTagError("none", chunk.tag);
    }
    const block: StfBlock = {
      timestamp: parseHeaderTimestamp(chunk.value),
      categories: [],
      items: [],
    };
    this.document.push(block);
    this.state = { kind: "root", block };
  }

  private handleRoot(state: Extract<BuilderState, { kind: "root" }>, chunk: Chunk): void {
    const { block } = state;
    switch (chunk.tag) {
      case STF_TAGS.DATE_FORMAT:
        this.dateFormat = parseDateFormatSelector(chunk.value);
        return;
      case STF_TAGS.CATEGORY: {
        const category: StfCategory = { name: valueOf(chunk), attributes: [] };
        block.categories.push(category);
        this.state = { kind: "category", block, category };
        return;
      }
      case STF_TAGS.ITEM: {
        const item: StfItem = { categories: [] };
        block.items.push(item);
        this.state = { kind: "item", block, item };
        return;
      }
      case STF_TAGS.HEADER:
        // A new export starts; the header is handled again from the top.
        this.state = { kind: "none" };
        return this.handleNone(chunk);
      default:
        throw new UnexpectedTagError("root", chunk.tag);
    }
  }

  private handleCategory(state: Extract<BuilderState, { kind: "category" }>, chunk: Chunk): void {
    const { block, category } = state;
    switch (chunk.tag) {
      case STF_TAGS.ATTRIBUTE: {
        category.attributes.push(valueOf(chunk));
        const closer = this.readLookahead("failed to find end-attribute tag");
        if (closer.tag !== STF_TAGS.END_ATTRIBUTE || closer.value !== null) {
          throw new LookaheadMismatchError(`invalid end-attribute tag {${closer.tag}}`);
        }
        return;
      }
      case STF_TAGS.END_CATEGORY:
        this.state = { kind: "root", block };
        return;
      case STF_TAGS.CATEGORY_NOTE:
        category.note = valueOf(chunk);
        return;
      case STF_TAGS.CONDITIONS: {
        const assignment: Assignment = { include: [], exclude: [] };
        category.conditions = assignment;
        this.state = { kind: "conditions", block, category, assignment };
        return;
      }
      case STF_TAGS.ACTIONS: {
        const assignment: Assignment = { include: [], exclude: [] };
        category.actions = assignment;
        this.state = { kind: "actions", block, category, assignment };
        return;
      }
      default:
        throw new UnexpectedTagError("category", chunk.tag);
    }
  }

  private handleAssignment(
    state: Extract<BuilderState, { kind: "conditions" | "actions" }>,
    chunk: Chunk
  ): void {
    const { block, category, assignment } = state;
    switch (chunk.tag) {
      case STF_TAGS.CATEGORY: {
        const direction = this.readLookahead("failed to find end-category tag");
        if (direction.tag === STF_TAGS.INCLUDE) {
          assignment.include.push(valueOf(chunk));
        } else if (direction.tag === STF_TAGS.EXCLUDE) {
          assignment.exclude.push(valueOf(chunk));
        } else {
          throw new LookaheadMismatchError(`failed to find assignment type, got {${direction.tag}}`);
        }
        return;
      }
      case STF_TAGS.END_ASSIGNMENT:
        this.state = { kind: "category", block, category };
        return;
      default:
        throw new UnexpectedTagError(state.kind, chunk.tag);
    }
  }

  private handleItem(state: Extract<BuilderState, { kind: "item" }>, chunk: Chunk): void {
    const { block, item } = state;
    switch (chunk.tag) {
      case STF_TAGS.TEXT:
        item.text = valueOf(chunk);
        return;
      case STF_TAGS.ITEM_NOTE:
        item.note = valueOf(chunk);
        return;
      case STF_TAGS.CATEGORY:
        item.categories.push(parseCategoryLink(valueOf(chunk), this.dateFormat));
        return;
      case STF_TAGS.END_CATEGORY:
        // Agenda sometimes writes {.} inside items; it means nothing there.
        return;
      case STF_TAGS.END_ITEM:
        this.state = { kind: "root", block };
        return;
      default:
        throw new UnexpectedTagError("item", chunk.tag);
    }
  }

  private readLookahead(missing: string): Chunk {
    const chunk = this.lexer.next();
    if (chunk === null) {
      throw new LookaheadMismatchError(missing);
    }
    return chunk;
  }
}
