/**
 * GridCalc Engine - Formula Lexer
 *
 * Tokenizes the expression part of a formula (the text after "=").
 */

export type TokenType =
  | 'NUMBER'
  | 'REFERENCE'
  | 'OPERATOR'
  | 'LPAREN'
  | 'RPAREN'
  | 'EOF';

export interface Token {
  type: TokenType;
  value: string;
  /** Offset of the first character within the cell text */
  start: number;
  end: number;
}

/**
 * Raised for malformed formula text. Caught by parseCell and turned into a
 * parseError cell value; it never escapes the parser.
 */
export class FormulaSyntaxError extends Error {
  offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = 'FormulaSyntaxError';
    this.offset = offset;
  }
}

const OPERATORS = new Set(['+', '-', '*', '/']);

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isLetter(char: string): boolean {
  return (char >= 'A' && char <= 'Z') || (char >= 'a' && char <= 'z');
}

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

export class FormulaLexer {
  private readonly input: string;
  private readonly baseOffset: number;
  private position = 0;

  /**
   * @param input - expression text, without the leading "="
   * @param baseOffset - offset of input[0] within the cell text
   */
  constructor(input: string, baseOffset = 0) {
    this.input = input;
    this.baseOffset = baseOffset;
  }

  /**
   * Tokenize the whole input. The last token is always EOF.
   * @throws FormulaSyntaxError on an unrecognized character or a malformed reference
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    this.position = 0;

    while (this.position < this.input.length) {
      const char = this.input[this.position];

      if (isWhitespace(char)) {
        this.position++;
        continue;
      }

      if (isDigit(char) || (char === '.' && isDigit(this.peekChar(1)))) {
        tokens.push(this.readNumber());
      } else if (isLetter(char)) {
        tokens.push(this.readReference());
      } else if (OPERATORS.has(char)) {
        tokens.push(this.single('OPERATOR'));
      } else if (char === '(') {
        tokens.push(this.single('LPAREN'));
      } else if (char === ')') {
        tokens.push(this.single('RPAREN'));
      } else {
        throw new FormulaSyntaxError(`Unexpected character '${char}'`, this.offset(this.position));
      }
    }

    const end = this.offset(this.position);
    tokens.push({ type: 'EOF', value: '', start: end, end });
    return tokens;
  }

  private peekChar(ahead: number): string {
    return this.input.charAt(this.position + ahead);
  }

  private offset(index: number): number {
    return this.baseOffset + index;
  }

  private single(type: TokenType): Token {
    const start = this.position;
    this.position++;
    return {
      type,
      value: this.input[start],
      start: this.offset(start),
      end: this.offset(this.position),
    };
  }

  /** Decimal literal: 12, 1.5, 3., .25 */
  private readNumber(): Token {
    const start = this.position;

    while (isDigit(this.peekChar(0))) this.position++;
    if (this.peekChar(0) === '.') {
      this.position++;
      while (isDigit(this.peekChar(0))) this.position++;
    }

    return {
      type: 'NUMBER',
      value: this.input.slice(start, this.position),
      start: this.offset(start),
      end: this.offset(this.position),
    };
  }

  /** Cell reference: one or more letters followed by one or more digits */
  private readReference(): Token {
    const start = this.position;

    while (isLetter(this.peekChar(0))) this.position++;
    const lettersEnd = this.position;
    while (isDigit(this.peekChar(0))) this.position++;

    const value = this.input.slice(start, this.position);
    if (this.position === lettersEnd) {
      throw new FormulaSyntaxError(`Invalid cell reference '${value}'`, this.offset(start));
    }
    if (isLetter(this.peekChar(0))) {
      throw new FormulaSyntaxError(
        `Invalid cell reference '${value}${this.peekChar(0)}'`,
        this.offset(start)
      );
    }

    return {
      type: 'REFERENCE',
      value,
      start: this.offset(start),
      end: this.offset(this.position),
    };
  }
}
