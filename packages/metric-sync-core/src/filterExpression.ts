import { UnknownDimensionError, UnsupportedFilterSyntaxError } from "./errors.js";
import type { SemanticRegistry } from "./semanticRegistry.js";
import type { Dimension, FilterOperation, SemanticModel, SyncFilter } from "./types.js";

/*
 * Metric filters arrive as template strings such as
 *
 *   {{ Dimension('users__user__country_code') }} = 'CA' AND {{ Dimension('users__user__status') }} != 'churned'
 *
 * Only conjunctions of equality / inequality / IN comparisons against a single
 * dimension reference are accepted. Anything else fails instead of being guessed at.
 */

export type FilterComparison = {
  reference: string;
  operator: FilterOperation;
  values: string[];
};

export type FilterClause = {
  dimension: Dimension;
  property: string;
  operator: FilterOperation;
  values: string[];
};

export type FilterContext = {
  registry: SemanticRegistry;
  /** Semantic model owning the fact the filter is applied to. */
  model: SemanticModel;
};

type TokenKind = "open" | "close" | "lparen" | "rparen" | "comma" | "operator" | "string" | "number" | "word";

type Token = {
  kind: TokenKind;
  text: string;
  /** Unquoted value for strings, the raw text otherwise. */
  value: string;
  position: number;
};

const OPERATOR_PATTERN = /^(==|!=|<>|<=|>=|=|<|>)/;
const NUMBER_PATTERN = /^-?\d+(?:\.\d+)?/;
const WORD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;

const EQUALITY_OPERATORS: Record<string, FilterOperation> = {
  "=": "equals",
  "==": "equals",
  "!=": "not_equals",
  "<>": "not_equals",
};

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  while (pos < expression.length) {
    const char = expression[pos];
    if (/\s/.test(char)) {
      pos += 1;
      continue;
    }
    const rest = expression.slice(pos);
    if (rest.startsWith("{{")) {
      tokens.push({ kind: "open", text: "{{", value: "{{", position: pos });
      pos += 2;
      continue;
    }
    if (rest.startsWith("}}")) {
      tokens.push({ kind: "close", text: "}}", value: "}}", position: pos });
      pos += 2;
      continue;
    }
    if (char === "(" || char === ")" || char === ",") {
      const kind: TokenKind = char === "(" ? "lparen" : char === ")" ? "rparen" : "comma";
      tokens.push({ kind, text: char, value: char, position: pos });
      pos += 1;
      continue;
    }
    if (char === "'" || char === '"') {
      const literal = readQuoted(expression, pos);
      tokens.push({ kind: "string", text: expression.slice(pos, literal.end), value: literal.value, position: pos });
      pos = literal.end;
      continue;
    }
    const operator = OPERATOR_PATTERN.exec(rest);
    if (operator) {
      tokens.push({ kind: "operator", text: operator[0], value: operator[0], position: pos });
      pos += operator[0].length;
      continue;
    }
    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ kind: "number", text: number[0], value: number[0], position: pos });
      pos += number[0].length;
      continue;
    }
    const word = WORD_PATTERN.exec(rest);
    if (word) {
      tokens.push({ kind: "word", text: word[0], value: word[0], position: pos });
      pos += word[0].length;
      continue;
    }
    throw new UnsupportedFilterSyntaxError(expression, `unexpected character '${char}'`, pos);
  }
  return tokens;
}

// Backslash escapes and doubled quotes ('O''Brien') are both accepted inside literals.
function readQuoted(expression: string, start: number): { value: string; end: number } {
  const quote = expression[start];
  let value = "";
  let pos = start + 1;
  while (pos < expression.length) {
    const char = expression[pos];
    if (char === "\\" && pos + 1 < expression.length) {
      value += expression[pos + 1];
      pos += 2;
      continue;
    }
    if (char === quote) {
      if (expression[pos + 1] === quote) {
        value += quote;
        pos += 2;
        continue;
      }
      return { value, end: pos + 1 };
    }
    value += char;
    pos += 1;
  }
  throw new UnsupportedFilterSyntaxError(expression, "unterminated string literal", start);
}

class FilterParser {
  private index = 0;

  constructor(
    private readonly expression: string,
    private readonly tokens: Token[],
  ) {}

  parse(): FilterComparison[] {
    if (this.tokens.length === 0) {
      throw this.fail("filter is empty");
    }
    const comparisons = [this.parseComparison()];
    while (this.peekKeyword("AND")) {
      this.index += 1;
      comparisons.push(this.parseComparison());
    }
    if (this.peekKeyword("OR")) {
      throw this.fail("OR is not supported; only AND-combined comparisons can become property filters");
    }
    const trailing = this.peek();
    if (trailing) {
      throw this.fail(`unexpected '${trailing.text}' after comparison`, trailing);
    }
    return comparisons;
  }

  private parseComparison(): FilterComparison {
    const token = this.peek();
    if (token?.kind === "lparen") {
      throw this.fail("grouping with parentheses is not supported", token);
    }
    if (this.peekKeyword("NOT")) {
      throw this.fail("negated expressions are not supported", token);
    }
    const reference = this.parseDimensionReference();
    const next = this.advance("a comparison operator");
    if (next.kind === "operator") {
      const operator = EQUALITY_OPERATORS[next.value];
      if (!operator) {
        throw this.fail(`operator '${next.value}' cannot be expressed as a property filter`, next);
      }
      return { reference, operator, values: [this.parseLiteral()] };
    }
    if (isKeyword(next, "IN")) {
      return { reference, operator: "equals", values: this.parseLiteralList() };
    }
    if (isKeyword(next, "NOT")) {
      const inToken = this.advance("IN");
      if (!isKeyword(inToken, "IN")) {
        throw this.fail(`expected IN after NOT, found '${inToken.text}'`, inToken);
      }
      return { reference, operator: "not_equals", values: this.parseLiteralList() };
    }
    throw this.fail(`expected a comparison operator, found '${next.text}'`, next);
  }

  private parseDimensionReference(): string {
    this.expect("open", "'{{'");
    const call = this.advance("Dimension");
    if (call.kind !== "word" || call.value !== "Dimension") {
      throw this.fail(`only Dimension(...) references are supported, found '${call.text}'`, call);
    }
    this.expect("lparen", "'('");
    const name = this.expect("string", "a quoted dimension reference");
    this.expect("rparen", "')'");
    const close = this.advance("'}}'");
    if (close.kind !== "close") {
      throw this.fail(`expected '}}' after Dimension('${name.value}'), found '${close.text}'`, close);
    }
    return name.value;
  }

  private parseLiteral(): string {
    const token = this.advance("a literal value");
    if (token.kind === "string" || token.kind === "number") {
      return token.value;
    }
    throw this.fail(`expected a quoted string or number, found '${token.text}'`, token);
  }

  private parseLiteralList(): string[] {
    this.expect("lparen", "'('");
    const values = [this.parseLiteral()];
    while (this.peek()?.kind === "comma") {
      this.index += 1;
      values.push(this.parseLiteral());
    }
    this.expect("rparen", "')'");
    return values;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private peekKeyword(keyword: string): boolean {
    const token = this.peek();
    return token !== undefined && isKeyword(token, keyword);
  }

  private advance(expected: string): Token {
    const token = this.tokens[this.index];
    if (!token) {
      throw this.fail(`expected ${expected}, reached end of filter`);
    }
    this.index += 1;
    return token;
  }

  private expect(kind: TokenKind, description: string): Token {
    const token = this.advance(description);
    if (token.kind !== kind) {
      throw this.fail(`expected ${description}, found '${token.text}'`, token);
    }
    return token;
  }

  private fail(reason: string, token?: Token): UnsupportedFilterSyntaxError {
    return new UnsupportedFilterSyntaxError(this.expression, reason, token?.position);
  }
}

function isKeyword(token: Token, keyword: string): boolean {
  return token.kind === "word" && token.value.toUpperCase() === keyword;
}

/** Syntax only: no dimension is resolved. */
export function parseFilterSyntax(expression: string): FilterComparison[] {
  return new FilterParser(expression, tokenize(expression)).parse();
}

export function parseFilterExpression(expression: string, context: FilterContext): FilterClause[] {
  const clauses = parseFilterSyntax(expression).map((comparison) => resolveComparison(expression, comparison, context));
  return mergeFilterClauses(clauses);
}

export function parseFilterExpressions(expressions: string[], context: FilterContext): FilterClause[] {
  return mergeFilterClauses(expressions.flatMap((expression) => parseFilterExpression(expression, context)));
}

function resolveComparison(expression: string, comparison: FilterComparison, context: FilterContext): FilterClause {
  const segments = comparison.reference.split("__").filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    throw new UnsupportedFilterSyntaxError(expression, `empty dimension reference '${comparison.reference}'`);
  }
  const dimensionName = segments[segments.length - 1];
  if (segments.length >= 3 && segments[0] !== context.model.name) {
    throw new UnknownDimensionError(
      context.model.name,
      dimensionName,
      `reference '${comparison.reference}' points at semantic model '${segments[0]}'`,
    );
  }
  const dimension = context.registry.resolveDimension(context.model, dimensionName);
  if (dimension.type === "time") {
    throw new UnsupportedFilterSyntaxError(
      expression,
      `time dimension '${dimension.name}' cannot be used as a property filter`,
    );
  }
  return { dimension, property: dimension.name, operator: comparison.operator, values: comparison.values };
}

/**
 * Comparisons on the same property with the same operator collapse into one clause
 * carrying every value, in first-seen order.
 */
export function mergeFilterClauses(clauses: FilterClause[]): FilterClause[] {
  const merged = new Map<string, FilterClause>();
  for (const clause of clauses) {
    const key = `${clause.property}\u0000${clause.operator}`;
    const existing = merged.get(key);
    if (!existing) {
      merged.set(key, { ...clause, values: dedupe(clause.values) });
      continue;
    }
    existing.values = dedupe([...existing.values, ...clause.values]);
  }
  return Array.from(merged.values());
}

export function toSyncFilters(clauses: FilterClause[]): SyncFilter[] {
  return clauses.map((clause) => ({
    fact_property: clause.property,
    operation: clause.operator,
    values: [...clause.values],
  }));
}

function dedupe(values: string[]): string[] {
  return Array.from(new Set(values));
}
