/**
 * GridCalc Engine - Formula Parser
 *
 * Turns raw cell text into a CellValue:
 * - "=..."        -> formula (expression tree) or parseError
 * - numeric text  -> number literal
 * - anything else -> text literal
 *
 * Grammar (precedence climbing, all operators left-associative):
 *   expression := term (('+' | '-') term)*
 *   term       := primary (('*' | '/') primary)*
 *   primary    := NUMBER | REFERENCE | '(' expression ')'
 *
 * Parsing never touches a sheet; references are captured as positions only.
 */

import type { BinaryOperator, CellValue, Expr, Position } from '../types/index.js';
import { cellKey } from '../types/index.js';
import { parseA1 } from '../types/address.js';
import { FormulaLexer, FormulaSyntaxError } from './FormulaLexer.js';
import type { Token } from './FormulaLexer.js';

const NUMBER_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
  '+': 1,
  '-': 1,
  '*': 2,
  '/': 2,
};

function isBinaryOperator(value: string): value is BinaryOperator {
  return value === '+' || value === '-' || value === '*' || value === '/';
}

/**
 * Interpret non-formula text as a number, if it is one.
 * Surrounding whitespace is ignored; "Infinity", hex and empty strings are not numbers.
 */
export function parseNumberLiteral(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMBER_LITERAL.test(trimmed)) return null;

  const value = parseFloat(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function isFormulaText(text: string): boolean {
  return text.startsWith('=');
}

export class FormulaParser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  /**
   * Parse the token stream into a single expression.
   * @throws FormulaSyntaxError
   */
  parseFormula(): Expr {
    if (this.peek().type === 'EOF') {
      throw new FormulaSyntaxError('Empty formula', this.peek().start);
    }

    const expression = this.parseBinaryExpression(1);

    const trailing = this.peek();
    if (trailing.type !== 'EOF') {
      throw new FormulaSyntaxError(`Unexpected token '${trailing.value}'`, trailing.start);
    }

    return expression;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private consume(): Token {
    const token = this.tokens[this.index];
    if (token.type !== 'EOF') this.index++;
    return token;
  }

  private parseBinaryExpression(minPrecedence: number): Expr {
    let left = this.parsePrimary();

    while (true) {
      const token = this.peek();
      if (token.type !== 'OPERATOR' || !isBinaryOperator(token.value)) break;

      const operator = token.value;
      const precedence = PRECEDENCE[operator];
      if (precedence < minPrecedence) break;

      this.consume();
      const right = this.parseBinaryExpression(precedence + 1);
      left = { kind: 'binary', operator, left, right };
    }

    return left;
  }

  private parsePrimary(): Expr {
    const token = this.consume();

    switch (token.type) {
      case 'NUMBER': {
        const value = parseFloat(token.value);
        if (!Number.isFinite(value)) {
          throw new FormulaSyntaxError('Number out of range', token.start);
        }
        return { kind: 'number', value };
      }

      case 'REFERENCE': {
        const position = parseA1(token.value);
        if (!position) {
          throw new FormulaSyntaxError(`Invalid cell reference '${token.value}'`, token.start);
        }
        return { kind: 'reference', position };
      }

      case 'LPAREN': {
        const inner = this.parseBinaryExpression(1);
        const closing = this.consume();
        if (closing.type !== 'RPAREN') {
          throw new FormulaSyntaxError(
            closing.type === 'EOF' ? 'Missing closing parenthesis' : `Expected ')' but found '${closing.value}'`,
            closing.start
          );
        }
        return inner;
      }

      case 'EOF':
        throw new FormulaSyntaxError('Unexpected end of formula', token.start);

      default:
        throw new FormulaSyntaxError(`Unexpected token '${token.value}'`, token.start);
    }
  }
}

/**
 * Parse raw cell text. Total: malformed formulas come back as
 * { kind: 'parseError' } rather than an exception.
 */
export function parseCell(rawText: string): CellValue {
  if (isFormulaText(rawText)) {
    try {
      const tokens = new FormulaLexer(rawText.slice(1), 1).tokenize();
      return { kind: 'formula', expression: new FormulaParser(tokens).parseFormula() };
    } catch (error) {
      if (error instanceof FormulaSyntaxError) {
        return { kind: 'parseError', message: error.message, offset: error.offset };
      }
      throw error;
    }
  }

  const number = parseNumberLiteral(rawText);
  if (number !== null) {
    return { kind: 'number', value: number };
  }

  return { kind: 'text', value: rawText };
}

/**
 * Distinct cell references of a formula, in source order.
 * Literals and unparseable formulas have none.
 */
export function formulaReferences(rawText: string): Position[] {
  const value = parseCell(rawText);
  if (value.kind !== 'formula') return [];

  const seen = new Set<string>();
  const references: Position[] = [];

  const visit = (node: Expr): void => {
    switch (node.kind) {
      case 'number':
        return;
      case 'reference': {
        const key = cellKey(node.position);
        if (!seen.has(key)) {
          seen.add(key);
          references.push(node.position);
        }
        return;
      }
      case 'binary':
        visit(node.left);
        visit(node.right);
        return;
    }
  };

  visit(value.expression);
  return references;
}
