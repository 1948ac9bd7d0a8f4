import { Position, Span } from './ast';
import { Diagnostic, error } from './diagnostics';

export type TokenKind =
  | 'identifier'
  | 'string'
  | 'number'
  | 'lbrace'
  | 'rbrace'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'comma'
  | 'colon'
  | 'equals'
  | 'question'
  | 'dot'
  | 'at'
  | 'atat'
  | 'newline'
  | 'doc'
  | 'eof';

export interface Token {
  kind: TokenKind;
  /** Source text for most tokens; the unescaped value for strings; the comment body for docs. */
  value: string;
  span: Span;
}

export interface LexResult {
  tokens: Token[];
  diagnostics: Diagnostic[];
}

const PUNCTUATION: Record<string, TokenKind> = {
  '{': 'lbrace',
  '}': 'rbrace',
  '(': 'lparen',
  ')': 'rparen',
  '[': 'lbracket',
  ']': 'rbracket',
  ',': 'comma',
  ':': 'colon',
  '=': 'equals',
  '?': 'question',
  '.': 'dot',
};

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  n: '\n',
  r: '\r',
  t: '\t',
};

const isIdentifierStart = (ch: string): boolean => /[A-Za-z_]/.test(ch);
const isIdentifierPart = (ch: string): boolean => /[A-Za-z0-9_]/.test(ch);
const isDigit = (ch: string): boolean => ch >= '0' && ch <= '9';

/**
 * Splits schema text into tokens. Lexing never throws: malformed input
 * produces diagnostics and the scan resumes after the offending character.
 */
export function tokenize(source: string): LexResult {
  return new Lexer(source).run();
}

class Lexer {
  private offset = 0;
  private line = 1;
  private column = 1;
  private readonly tokens: Token[] = [];
  private readonly diagnostics: Diagnostic[] = [];

  constructor(private readonly source: string) {}

  run(): LexResult {
    while (this.offset < this.source.length) {
      const ch = this.peek();

      if (ch === ' ' || ch === '\t') {
        this.advance();
      } else if (ch === '\n' || ch === '\r') {
        this.readNewline();
      } else if (ch === '/' && this.peek(1) === '/') {
        this.readComment();
      } else if (ch === '"') {
        this.readString();
      } else if (isDigit(ch) || (ch === '-' && isDigit(this.peek(1)))) {
        this.readNumber();
      } else if (isIdentifierStart(ch)) {
        this.readIdentifier();
      } else if (ch === '@') {
        const start = this.position();
        this.advance();
        if (this.peek() === '@') {
          this.advance();
          this.push('atat', '@@', start);
        } else {
          this.push('at', '@', start);
        }
      } else if (PUNCTUATION[ch]) {
        const start = this.position();
        this.advance();
        this.push(PUNCTUATION[ch], ch, start);
      } else {
        const start = this.position();
        this.advance();
        this.diagnostics.push(
          error('E_UNEXPECTED_CHARACTER', `Unexpected character '${ch}'`, this.spanFrom(start)),
        );
      }
    }

    const end = this.position();
    this.tokens.push({ kind: 'eof', value: '', span: { start: end, end } });
    return { tokens: this.tokens, diagnostics: this.diagnostics };
  }

  private readNewline(): void {
    const start = this.position();
    if (this.peek() === '\r' && this.peek(1) === '\n') {
      this.offset += 2;
    } else {
      this.offset += 1;
    }
    this.line += 1;
    this.column = 1;
    this.push('newline', '\n', start);
  }

  private readComment(): void {
    const start = this.position();
    const isDoc = this.peek(2) === '/';
    let text = '';
    while (this.offset < this.source.length && !this.atLineEnd()) {
      text += this.advance();
    }
    if (isDoc) {
      this.push('doc', text.slice(3).trim(), start);
    }
  }

  private readString(): void {
    const start = this.position();
    this.advance();
    let value = '';

    while (true) {
      if (this.offset >= this.source.length || this.atLineEnd()) {
        this.diagnostics.push(
          error('E_UNTERMINATED_STRING', 'Unterminated string', this.spanFrom(start)),
        );
        break;
      }

      const ch = this.advance();
      if (ch === '"') break;
      if (ch !== '\\') {
        value += ch;
        continue;
      }

      const next = this.peek();
      if (ESCAPES[next] !== undefined) {
        this.advance();
        value += ESCAPES[next];
      } else if (next === 'u' && /^[0-9a-fA-F]{4}$/.test(this.source.slice(this.offset + 1, this.offset + 5))) {
        const hex = this.source.slice(this.offset + 1, this.offset + 5);
        for (let i = 0; i < 5; i++) this.advance();
        value += String.fromCharCode(parseInt(hex, 16));
      } else {
        const escapeStart = this.position();
        this.diagnostics.push(
          error('E_INVALID_ESCAPE', `Invalid escape sequence '\\${next}'`, {
            start: escapeStart,
            end: escapeStart,
          }),
        );
        value += next;
        if (next && !this.atLineEnd()) this.advance();
      }
    }

    this.push('string', value, start);
  }

  private readNumber(): void {
    const start = this.position();
    let text = this.advance();
    while (isDigit(this.peek())) text += this.advance();
    if (this.peek() === '.' && isDigit(this.peek(1))) {
      text += this.advance();
      while (isDigit(this.peek())) text += this.advance();
    }
    this.push('number', text, start);
  }

  private readIdentifier(): void {
    const start = this.position();
    let text = '';
    while (isIdentifierPart(this.peek())) text += this.advance();
    this.push('identifier', text, start);
  }

  private atLineEnd(): boolean {
    const ch = this.peek();
    return ch === '\n' || ch === '\r';
  }

  private peek(ahead = 0): string {
    return this.source.charAt(this.offset + ahead);
  }

  private advance(): string {
    const ch = this.source.charAt(this.offset);
    this.offset += 1;
    this.column += 1;
    return ch;
  }

  private position(): Position {
    return { offset: this.offset, line: this.line, column: this.column };
  }

  private spanFrom(start: Position): Span {
    return { start, end: this.position() };
  }

  private push(kind: TokenKind, value: string, start: Position): void {
    this.tokens.push({ kind, value, span: this.spanFrom(start) });
  }
}
