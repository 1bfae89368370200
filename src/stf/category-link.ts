import { parseLinkDate } from "./date-table.js";
import { InvalidLinkSyntaxError } from "./errors.js";
import type { CategoryLink, CategoryLinkType } from "./types.js";

// Agenda escapes literal type symbols with a percent sign.
const ESCAPE = "%";
const NAME_SEPARATOR = ";";

interface LinkShape {
  type: CategoryLinkType;
  names: string;
  rawValue?: string;
}

function isUnescapedSuffix(raw: string, symbol: string): boolean {
  return raw.endsWith(symbol) && raw[raw.length - 2] !== ESCAPE;
}

/**
 * Work out the link type from its type symbols (appendix B-11): a trailing
 * `\`, `/` or `|`, or an embedded `@|` (date) or `#|` (numeric) followed by
 * the value.
 */
function classifyLink(raw: string): LinkShape {
  const body = raw.slice(0, -1);

  if (isUnescapedSuffix(raw, "\\")) {
    return { type: "standard", names: body };
  }
  if (isUnescapedSuffix(raw, "/")) {
    return { type: "exclusive", names: body };
  }
  const beforeLast = raw[raw.length - 2];
  if (isUnescapedSuffix(raw, "|") && beforeLast !== "@" && beforeLast !== "#") {
    return { type: "unindexed", names: body };
  }

  // An escaped pipe would read %|, so no escape check is needed here.
  const dateAt = raw.indexOf("@|");
  if (dateAt !== -1) {
    return { type: "date", names: raw.slice(0, dateAt), rawValue: raw.slice(dateAt + 2) };
  }
  const numericAt = raw.indexOf("#|");
  if (numericAt !== -1) {
    return { type: "numeric", names: raw.slice(0, numericAt), rawValue: raw.slice(numericAt + 2) };
  }

  throw new InvalidLinkSyntaxError(`could not determine type of link ${raw}`, raw);
}

/**
 * Strip escape markers, then keep only what follows the last `;`. Agenda
 * writes some values with a leading `;`-separated prefix.
 */
export function unescapeLinkValue(rawValue: string): string {
  const unescaped = rawValue.split(ESCAPE).join("");
  const lastSeparator = unescaped.lastIndexOf(NAME_SEPARATOR);
  return lastSeparator === -1 ? unescaped : unescaped.slice(lastSeparator + 1);
}

/**
 * Parse the value of an item's `{C}` tag, e.g. `Date;D@|12/31/20 23:59`,
 * into a link. The name part is `name;shortname;alsomatch...`; empty
 * fields between separators are skipped.
 */
export function parseCategoryLink(raw: string, dateFormat: number): CategoryLink {
  if (raw.length < 2) {
    throw new InvalidLinkSyntaxError("attempted to parse invalid category link", raw);
  }

  const { type, names, rawValue } = classifyLink(raw);
  const tokens = names.split(NAME_SEPARATOR).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    throw new InvalidLinkSyntaxError(`a category must have a name: ${raw}`, raw);
  }

  const link: CategoryLink = { type, name: tokens[0] };
  if (tokens.length > 1) {
    link.shortname = tokens[1];
  }
  if (tokens.length > 2) {
    link.alsomatch = tokens.slice(2);
  }

  if (rawValue !== undefined) {
    // Numeric links always carry a value slot, even an empty one.
    if (type !== "date") {
      throw new InvalidLinkSyntaxError(`didn't expect a ${type} link to have a value: ${raw}`, raw);
    }
    link.value = parseLinkDate(unescapeLinkValue(rawValue), dateFormat);
  }

  return link;
}
