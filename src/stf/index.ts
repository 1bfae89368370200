export { ChunkLexer, isSpace } from "./lexer.js";
export { DocumentBuilder } from "./builder.js";
export type { BuilderOptions, BuilderState } from "./builder.js";
export { parseCategoryLink, unescapeLinkValue } from "./category-link.js";
export {
  DATE_FORMATS,
  DEFAULT_DATE_FORMAT,
  HEADER_FORMAT,
  formatTimestamp,
  getDateFormat,
  isValidDateFormat,
  parseDateFormatSelector,
  parseHeaderTimestamp,
  parseLinkDate,
} from "./date-table.js";
export * from "./errors.js";
export { formatDocument, summarizeDocument } from "./output.js";
export type { DocumentSummary } from "./output.js";
export * from "./types.js";
