// LDAP Filter Strings
// RFC 4515 text form <-> protocol Filter model

import { Filter, FilterType, utf8 } from "./ldap.ts";

export class FilterSyntaxError extends Error {
  constructor(message: string, readonly position: number) {
    super(`${message} at position ${position}`);
    this.name = "FilterSyntaxError";
  }
}

const ATTRIBUTE_DESCRIPTION = /^(?:[A-Za-z][A-Za-z0-9-]*|[0-9]+(?:\.[0-9]+)*)(?:;[A-Za-z0-9-]+)*$/;
const MATCHING_RULE = /^(?:[A-Za-z][A-Za-z0-9-]*|[0-9]+(?:\.[0-9]+)*)$/;

/**
 * Parse an RFC 4515 filter such as `(&(objectClass=user)(cn=J*))`.
 * A bare item without enclosing parentheses (`cn=John`) is accepted as well.
 */
export function parseFilter(text: string): Filter {
  const trimmed = text.trim();
  if (trimmed === "") throw new FilterSyntaxError("Empty filter", 0);

  const parser = new FilterParser(trimmed.startsWith("(") ? trimmed : `(${trimmed})`);
  const filter = parser.parseFilter();
  parser.expectEnd();
  return filter;
}

class FilterParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseFilter(): Filter {
    this.expect("(");
    let filter: Filter;
    switch (this.text[this.pos]) {
      case "&":
        this.pos++;
        filter = { type: FilterType.And, filters: this.parseList() };
        break;
      case "|":
        this.pos++;
        filter = { type: FilterType.Or, filters: this.parseList() };
        break;
      case "!":
        this.pos++;
        filter = { type: FilterType.Not, filter: this.parseFilter() };
        break;
      default:
        filter = this.parseItem();
    }
    this.expect(")");
    return filter;
  }

  expectEnd(): void {
    if (this.pos !== this.text.length) {
      throw new FilterSyntaxError("Unexpected trailing characters", this.pos);
    }
  }

  // RFC 4526 absolute true/false: an empty list is allowed
  private parseList(): Filter[] {
    const filters: Filter[] = [];
    while (this.text[this.pos] === "(") {
      filters.push(this.parseFilter());
    }
    return filters;
  }

  private parseItem(): Filter {
    const start = this.pos;
    const end = this.text.indexOf(")", start);
    if (end === -1) throw new FilterSyntaxError("Unterminated filter item", start);
    const item = this.text.slice(start, end);
    if (item.includes("(")) throw new FilterSyntaxError("Unescaped '(' in filter item", start + item.indexOf("("));
    this.pos = end;

    const eq = item.indexOf("=");
    if (eq <= 0) throw new FilterSyntaxError("Missing filter operator", start);

    const value = item.slice(eq + 1);
    const valueStart = start + eq + 1;

    switch (item[eq - 1]) {
      case ":":
        return this.parseExtensible(item.slice(0, eq - 1), value, start, valueStart);
      case "~":
        return {
          type: FilterType.ApproxMatch,
          attributeDesc: attribute(item.slice(0, eq - 1), start),
          assertionValue: unescapeValue(value, valueStart),
        };
      case ">":
        return {
          type: FilterType.GreaterOrEqual,
          attributeDesc: attribute(item.slice(0, eq - 1), start),
          assertionValue: unescapeValue(value, valueStart),
        };
      case "<":
        return {
          type: FilterType.LessOrEqual,
          attributeDesc: attribute(item.slice(0, eq - 1), start),
          assertionValue: unescapeValue(value, valueStart),
        };
    }

    const attributeDesc = attribute(item.slice(0, eq), start);
    if (value === "*") {
      return { type: FilterType.Present, attributeDesc };
    }
    if (!value.includes("*")) {
      return { type: FilterType.EqualityMatch, attributeDesc, assertionValue: unescapeValue(value, valueStart) };
    }

    // Every literal '*' is a wildcard; an asserted star is written \2a
    const parts = value.split("*");
    let offset = valueStart;
    const decoded = parts.map((part) => {
      const bytes = unescapeValue(part, offset);
      offset += part.length + 1;
      return bytes;
    });
    const initial = decoded[0];
    const final = decoded[decoded.length - 1];
    const any = decoded.slice(1, -1).filter((part) => part.length > 0);
    if (initial.length === 0 && final.length === 0 && any.length === 0) {
      throw new FilterSyntaxError("Substring filter needs at least one value", valueStart);
    }
    return {
      type: FilterType.Substrings,
      attributeDesc,
      ...(initial.length > 0 ? { initial } : {}),
      any,
      ...(final.length > 0 ? { final } : {}),
    };
  }

  private parseExtensible(lhs: string, value: string, start: number, valueStart: number): Filter {
    const [attr, ...options] = lhs.split(":");
    let dnAttributes = false;
    let matchingRule: string | undefined;

    for (const option of options) {
      if (option.toLowerCase() === "dn" && !dnAttributes && matchingRule === undefined) {
        dnAttributes = true;
      } else if (matchingRule === undefined && MATCHING_RULE.test(option)) {
        matchingRule = option;
      } else {
        throw new FilterSyntaxError(`Invalid extensible match option '${option}'`, start);
      }
    }

    if (attr === "" && matchingRule === undefined) {
      throw new FilterSyntaxError("Extensible match needs an attribute or a matching rule", start);
    }

    return {
      type: FilterType.ExtensibleMatch,
      ...(matchingRule !== undefined ? { matchingRule } : {}),
      ...(attr !== "" ? { attributeDesc: attribute(attr, start) } : {}),
      matchValue: unescapeValue(value, valueStart),
      dnAttributes,
    };
  }

  private expect(char: string): void {
    if (this.text[this.pos] !== char) {
      throw new FilterSyntaxError(`Expected '${char}'`, this.pos);
    }
    this.pos++;
  }
}

function attribute(name: string, position: number): string {
  if (!ATTRIBUTE_DESCRIPTION.test(name)) {
    throw new FilterSyntaxError(`Invalid attribute description '${name}'`, position);
  }
  return name;
}

function unescapeValue(value: string, position: number): Uint8Array {
  const bytes: number[] = [];
  let literal = "";
  const flush = () => {
    if (literal) bytes.push(...utf8(literal));
    literal = "";
  };

  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char !== "\\") {
      literal += char;
      continue;
    }
    const hex = value.slice(i + 1, i + 3);
    if (!/^[0-9A-Fa-f]{2}$/.test(hex)) {
      throw new FilterSyntaxError("Invalid escape sequence", position + i);
    }
    flush();
    bytes.push(parseInt(hex, 16));
    i += 2;
  }
  flush();
  return new Uint8Array(bytes);
}

const strictDecoder = new TextDecoder("utf-8", { fatal: true });

export function escapeValue(value: Uint8Array): string {
  let text: string;
  try {
    text = strictDecoder.decode(value);
  } catch (_err) {
    // Not UTF-8: escape every byte
    return Array.from(value, (b) => `\\${b.toString(16).padStart(2, "0")}`).join("");
  }
  return text.replace(/[*()\\\0]/g, (c) => `\\${c.charCodeAt(0).toString(16).padStart(2, "0")}`);
}

/**
 * Render a filter in canonical RFC 4515 form.
 */
export function formatFilter(filter: Filter): string {
  switch (filter.type) {
    case FilterType.And:
      return `(&${filter.filters.map(formatFilter).join("")})`;
    case FilterType.Or:
      return `(|${filter.filters.map(formatFilter).join("")})`;
    case FilterType.Not:
      return `(!${formatFilter(filter.filter)})`;
    case FilterType.EqualityMatch:
      return `(${filter.attributeDesc}=${escapeValue(filter.assertionValue)})`;
    case FilterType.GreaterOrEqual:
      return `(${filter.attributeDesc}>=${escapeValue(filter.assertionValue)})`;
    case FilterType.LessOrEqual:
      return `(${filter.attributeDesc}<=${escapeValue(filter.assertionValue)})`;
    case FilterType.ApproxMatch:
      return `(${filter.attributeDesc}~=${escapeValue(filter.assertionValue)})`;
    case FilterType.Present:
      return `(${filter.attributeDesc}=*)`;
    case FilterType.Substrings: {
      const middle = filter.any.map((part) => `${escapeValue(part)}*`).join("");
      const initial = filter.initial ? escapeValue(filter.initial) : "";
      const final = filter.final ? escapeValue(filter.final) : "";
      return `(${filter.attributeDesc}=${initial}*${middle}${final})`;
    }
    case FilterType.ExtensibleMatch: {
      const dn = filter.dnAttributes ? ":dn" : "";
      const rule = filter.matchingRule ? `:${filter.matchingRule}` : "";
      return `(${filter.attributeDesc ?? ""}${dn}${rule}:=${escapeValue(filter.matchValue)})`;
    }
  }
}
