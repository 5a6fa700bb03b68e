/**
 * Schema Lexer — tokenizes authorization schema text into a token stream.
 *
 * `//` starts a line comment anywhere; a single `/` is the prefix divider.
 *
 * Permissive: unknown characters emit an 'illegal' token rather than throwing,
 * so the parser can reject them with context.
 */

export type TokenKind =
  | 'eof'
  | 'illegal'        // any character outside the grammar
  | 'identifier'     // type, relation and permission names
  | 'definition'     // keywords
  | 'relation'
  | 'permission'
  | 'equal'          // =
  | 'plus'           // +
  | 'minus'          // -
  | 'pipe'           // |
  | 'wildcard'       // *
  | 'open_brace'     // {
  | 'close_brace'    // }
  | 'colon'          // :
  | 'slash'          // /
  | 'hash'           // #
  | 'arrow';         // ->

export interface Token {
  readonly kind: TokenKind;
  readonly value: string;
  readonly line: number;
  readonly col: number;
}

const KEYWORDS = new Map<string, TokenKind>([
  ['definition', 'definition'],
  ['relation', 'relation'],
  ['permission', 'permission'],
]);

const SINGLE_CHAR_TOKENS: Record<string, TokenKind> = {
  '=': 'equal',
  '+': 'plus',
  '|': 'pipe',
  '*': 'wildcard',
  '{': 'open_brace',
  '}': 'close_brace',
  ':': 'colon',
  '#': 'hash',
};

export class Lexer {
  private src: string;
  private pos = 0;
  private line = 1;
  private col = 1;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.src = source;
  }

  tokenize(): Token[] {
    for (;;) {
      this.skipTrivia();
      if (this.pos >= this.src.length) break;

      const ch = this.src[this.pos];

      if (ch in SINGLE_CHAR_TOKENS) {
        this.push(SINGLE_CHAR_TOKENS[ch], ch);
        this.advance();
        continue;
      }

      // skipTrivia already consumed any `//`
      if (ch === '/') {
        this.push('slash', ch);
        this.advance();
        continue;
      }

      if (ch === '-') {
        if (this.peekChar() === '>') {
          this.push('arrow', '->');
          this.advance();
          this.advance();
        } else {
          this.push('minus', ch);
          this.advance();
        }
        continue;
      }

      if (this.isIdentStart(ch)) {
        this.readIdentifier();
        continue;
      }

      const codePoint = this.src.codePointAt(this.pos) ?? 0;
      const illegal = String.fromCodePoint(codePoint);
      this.push('illegal', illegal);
      this.pos += illegal.length;
      this.col++;
    }

    this.tokens.push({ kind: 'eof', value: '', line: this.line, col: this.col });
    return this.tokens;
  }

  // ---- Helpers ----

  private push(kind: TokenKind, value: string) {
    this.tokens.push({ kind, value, line: this.line, col: this.col });
  }

  private advance(): string {
    const ch = this.src[this.pos];
    this.pos++;
    if (ch === '\n') {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    return ch;
  }

  private peekChar(): string | undefined {
    return this.src[this.pos + 1];
  }

  /** Skip whitespace and line comments until neither applies. */
  private skipTrivia() {
    while (this.pos < this.src.length) {
      const ch = this.src[this.pos];
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
        this.advance();
      } else if (ch === '/' && this.peekChar() === '/') {
        this.skipComment();
      } else {
        break;
      }
    }
  }

  private skipComment() {
    while (this.pos < this.src.length && this.src[this.pos] !== '\n') {
      this.advance();
    }
  }

  private readIdentifier() {
    const startCol = this.col;
    let id = '';
    while (this.pos < this.src.length && this.isIdentChar(this.src[this.pos])) {
      id += this.advance();
    }
    const kind = KEYWORDS.get(id) ?? 'identifier';
    this.tokens.push({ kind, value: id, line: this.line, col: startCol });
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isIdentStart(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
  }

  private isIdentChar(ch: string): boolean {
    return this.isIdentStart(ch) || this.isDigit(ch);
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
