import {
  Argument,
  Attribute,
  Block,
  ConfigBlock,
  ConfigProperty,
  EnumBlock,
  EnumValue,
  Expression,
  FieldArity,
  FieldDeclaration,
  FieldType,
  ModelBlock,
  Position,
  SchemaDocument,
  Span,
} from './ast';
import { Diagnostic, SchemaParseError, error, hasErrors } from './diagnostics';
import { Token, TokenKind, tokenize } from './lexer';

export interface ParseResult {
  document: SchemaDocument;
  diagnostics: Diagnostic[];
}

export const MAX_NESTING_DEPTH = 32;

const BLOCK_KEYWORDS = new Set(['datasource', 'generator', 'model', 'enum']);

/**
 * Parses schema text, throwing a SchemaParseError that carries every
 * diagnostic when the text is malformed.
 */
export function parseSchema(source: string): SchemaDocument {
  const { document, diagnostics } = tryParseSchema(source);
  if (hasErrors(diagnostics)) {
    throw new SchemaParseError(diagnostics);
  }
  return document;
}

/**
 * Parses schema text without throwing. The document holds every block that
 * could be recovered.
 */
export function tryParseSchema(source: string): ParseResult {
  const { tokens, diagnostics } = tokenize(source);
  const parser = new Parser(tokens);
  const document = parser.parseDocument();
  return { document, diagnostics: [...diagnostics, ...parser.diagnostics] };
}

/** Thrown inside the parser to abandon the current line. */
class ParseFailure extends Error {
  constructor(readonly diagnostic: Diagnostic) {
    super(diagnostic.message);
  }
}

class Parser {
  private depth = 0;
  readonly diagnostics: Diagnostic[] = [];
  private index = 0;
  private lastEnd: Position;

  constructor(private readonly tokens: Token[]) {
    this.lastEnd = tokens[0].span.start;
  }

  parseDocument(): SchemaDocument {
    const blocks: Block[] = [];

    while (true) {
      const documentation = this.readLeadingDocs();
      const token = this.peek();
      if (token.kind === 'eof') break;

      if (token.kind === 'identifier' && BLOCK_KEYWORDS.has(token.value)) {
        try {
          blocks.push(this.parseBlock(documentation));
        } catch (e) {
          this.report(e);
          this.skipToNextBlock();
        }
        continue;
      }

      this.diagnostics.push(
        error(
          'E_UNEXPECTED_TOKEN',
          `Expected a model, enum, datasource or generator block but found ${describe(token)}`,
          token.span,
        ),
      );
      this.next();
      this.skipToNextBlock();
    }

    return { blocks };
  }

  private parseBlock(documentation: string | undefined): Block {
    const keyword = this.next();
    const start = keyword.span.start;
    const name = this.expect('identifier', `a name after '${keyword.value}'`).value;
    this.expect('lbrace', `'{' to open ${keyword.value} '${name}'`);

    switch (keyword.value) {
      case 'model': {
        const block: ModelBlock = {
          kind: 'model',
          name,
          fields: [],
          attributes: [],
          documentation,
          span: this.spanFrom(start),
        };
        this.parseMembers(block.span, () => {
          const docs = this.readLeadingDocs();
          const token = this.peek();
          if (token.kind === 'identifier') {
            block.fields.push(this.parseField(docs));
          } else if (token.kind === 'atat') {
            block.attributes.push(this.parseAttribute());
            this.expectLineEnd();
          } else if (token.kind !== 'rbrace' && token.kind !== 'eof') {
            this.fail(`Expected a field or block attribute but found ${describe(token)}`, token);
          }
        });
        block.span = this.spanFrom(start);
        return block;
      }
      case 'enum': {
        const block: EnumBlock = {
          kind: 'enum',
          name,
          values: [],
          attributes: [],
          documentation,
          span: this.spanFrom(start),
        };
        this.parseMembers(block.span, () => {
          const docs = this.readLeadingDocs();
          const token = this.peek();
          if (token.kind === 'atat') {
            block.attributes.push(this.parseAttribute());
            this.expectLineEnd();
          } else if (token.kind === 'identifier') {
            block.values.push(this.parseEnumValue(docs));
          } else if (token.kind !== 'rbrace' && token.kind !== 'eof') {
            this.fail(`Expected an enum value but found ${describe(token)}`, token);
          }
        });
        block.span = this.spanFrom(start);
        return block;
      }
      default: {
        const kind = keyword.value === 'datasource' ? 'datasource' : 'generator';
        const block: ConfigBlock = {
          kind,
          name,
          properties: [],
          documentation,
          span: this.spanFrom(start),
        };
        this.parseMembers(block.span, () => {
          this.readLeadingDocs();
          const token = this.peek();
          if (token.kind === 'identifier') {
            block.properties.push(this.parseProperty());
          } else if (token.kind !== 'rbrace' && token.kind !== 'eof') {
            this.fail(`Expected a 'key = value' line but found ${describe(token)}`, token);
          }
        });
        block.span = this.spanFrom(start);
        return block;
      }
    }
  }

  /**
   * Runs `parseMember` once per line until the closing brace. A failing line
   * is reported and skipped.
   */
  private parseMembers(blockSpan: Span, parseMember: () => void): void {
    while (true) {
      this.skipNewlines();
      const token = this.peek();

      if (token.kind === 'rbrace') {
        this.next();
        return;
      }
      if (token.kind === 'eof') {
        this.diagnostics.push(
          error('E_UNCLOSED_BLOCK', "Missing '}' to close this block", blockSpan),
        );
        return;
      }

      try {
        parseMember();
      } catch (e) {
        this.report(e);
        this.skipLine();
      }
    }
  }

  private parseField(documentation: string | undefined): FieldDeclaration {
    const nameToken = this.next();
    const type = this.parseFieldType();
    const attributes: Attribute[] = [];

    while (this.peek().kind === 'at') {
      attributes.push(this.parseAttribute());
    }

    const trailing = this.readTrailingDoc();
    this.expectLineEnd();

    return {
      name: nameToken.value,
      type,
      attributes,
      documentation: joinDocs(documentation, trailing),
      span: this.spanFrom(nameToken.span.start),
    };
  }

  private parseFieldType(): FieldType {
    const token = this.expect('identifier', 'a field type');
    let unsupported: string | undefined;

    if (token.value === 'Unsupported' && this.peek().kind === 'lparen') {
      this.next();
      unsupported = this.expect('string', 'a quoted database type').value;
      this.expect('rparen', "')'");
    }

    let arity: FieldArity = 'required';
    if (this.peek().kind === 'lbracket') {
      this.next();
      this.expect('rbracket', "']'");
      arity = 'list';
    }
    if (this.peek().kind === 'question') {
      const question = this.next();
      if (arity === 'list') {
        this.fail('Optional lists are not supported', question);
      }
      arity = 'optional';
    }

    return { name: token.value, arity, unsupported, span: this.spanFrom(token.span.start) };
  }

  private parseEnumValue(documentation: string | undefined): EnumValue {
    const nameToken = this.next();
    const attributes: Attribute[] = [];
    while (this.peek().kind === 'at') {
      attributes.push(this.parseAttribute());
    }
    const trailing = this.readTrailingDoc();
    this.expectLineEnd();
    return {
      name: nameToken.value,
      attributes,
      documentation: joinDocs(documentation, trailing),
      span: this.spanFrom(nameToken.span.start),
    };
  }

  private parseProperty(): ConfigProperty {
    const key = this.next();
    this.expect('equals', `'=' after '${key.value}'`);
    const value = this.parseExpression();
    this.expectLineEnd();
    return { key: key.value, value, span: this.spanFrom(key.span.start) };
  }

  private parseAttribute(): Attribute {
    const marker = this.next();
    const scope = marker.kind === 'atat' ? 'block' : 'field';
    let name = this.expect('identifier', 'an attribute name').value;
    while (this.peek().kind === 'dot') {
      this.next();
      name += `.${this.expect('identifier', "a name after '.'").value}`;
    }

    const args = this.peek().kind === 'lparen' ? this.parseArguments() : [];
    return { name, scope, arguments: args, span: this.spanFrom(marker.span.start) };
  }

  private parseArguments(): Argument[] {
    this.expect('lparen', "'('");
    const args: Argument[] = [];

    while (true) {
      this.skipNewlines();
      if (this.peek().kind === 'rparen') break;

      const start = this.peek().span.start;
      let name: string | undefined;
      if (this.peek().kind === 'identifier' && this.peek(1).kind === 'colon') {
        name = this.next().value;
        this.next();
      }
      const value = this.parseExpression();
      args.push({ name, value, span: this.spanFrom(start) });

      this.skipNewlines();
      if (this.peek().kind !== 'comma') break;
      this.next();
    }

    this.skipNewlines();
    this.expect('rparen', "')' to close the argument list");
    return args;
  }

  private parseExpression(): Expression {
    const token = this.peek();
    if (this.depth >= MAX_NESTING_DEPTH) {
      return this.fail(`Values cannot be nested more than ${MAX_NESTING_DEPTH} levels deep`, token);
    }
    this.depth++;
    try {
      return this.parseValue(token);
    } finally {
      this.depth--;
    }
  }

  private parseValue(token: Token): Expression {
    const start = token.span.start;

    switch (token.kind) {
      case 'string':
        this.next();
        return { kind: 'string', value: token.value, span: token.span };
      case 'number':
        this.next();
        return { kind: 'number', value: Number(token.value), raw: token.value, span: token.span };
      case 'lbracket': {
        this.next();
        const items: Expression[] = [];
        while (true) {
          this.skipNewlines();
          if (this.peek().kind === 'rbracket') break;
          items.push(this.parseExpression());
          this.skipNewlines();
          if (this.peek().kind !== 'comma') break;
          this.next();
        }
        this.skipNewlines();
        this.expect('rbracket', "']' to close the list");
        return { kind: 'array', items, span: this.spanFrom(start) };
      }
      case 'identifier': {
        this.next();
        if (token.value === 'true' || token.value === 'false') {
          return { kind: 'boolean', value: token.value === 'true', span: token.span };
        }
        if (this.peek().kind === 'lparen') {
          const args = this.parseArguments();
          return { kind: 'function', name: token.value, arguments: args, span: this.spanFrom(start) };
        }
        return { kind: 'constant', value: token.value, span: token.span };
      }
      default:
        return this.fail(`Expected a value but found ${describe(token)}`, token);
    }
  }

  /** Reads consecutive `///` lines; a blank line discards what was read. */
  private readLeadingDocs(): string | undefined {
    let lines: string[] = [];
    while (true) {
      const token = this.peek();
      if (token.kind === 'doc') {
        lines.push(token.value);
        this.next();
        if (this.peek().kind === 'newline') this.next();
      } else if (token.kind === 'newline') {
        this.next();
        lines = [];
      } else {
        break;
      }
    }
    return lines.length > 0 ? lines.join('\n') : undefined;
  }

  private readTrailingDoc(): string | undefined {
    return this.peek().kind === 'doc' ? this.next().value : undefined;
  }

  private expectLineEnd(): void {
    const token = this.peek();
    if (token.kind === 'newline') {
      this.next();
      return;
    }
    if (token.kind === 'rbrace' || token.kind === 'eof') return;
    this.fail(`Expected end of line but found ${describe(token)}`, token);
  }

  private expect(kind: TokenKind, what: string): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      return this.fail(`Expected ${what} but found ${describe(token)}`, token);
    }
    return this.next();
  }

  private fail(message: string, token: Token): never {
    throw new ParseFailure(error('E_SYNTAX', message, token.span));
  }

  private report(e: unknown): void {
    if (e instanceof ParseFailure) {
      this.diagnostics.push(e.diagnostic);
      return;
    }
    throw e;
  }

  private skipNewlines(): void {
    while (this.peek().kind === 'newline') this.next();
  }

  /** Skips the rest of the current line, stopping before a closing brace. */
  private skipLine(): void {
    while (true) {
      const kind = this.peek().kind;
      if (kind === 'eof' || kind === 'rbrace') return;
      this.next();
      if (kind === 'newline') return;
    }
  }

  /** Skips tokens until a block keyword starts a line. */
  private skipToNextBlock(): void {
    let lineStart = false;
    while (true) {
      const token = this.peek();
      if (token.kind === 'eof') return;
      if (lineStart && token.kind === 'identifier' && BLOCK_KEYWORDS.has(token.value)) return;
      lineStart = token.kind === 'newline';
      this.next();
    }
  }

  private peek(ahead = 0): Token {
    const at = Math.min(this.index + ahead, this.tokens.length - 1);
    return this.tokens[at];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (this.index < this.tokens.length - 1) this.index += 1;
    this.lastEnd = token.span.end;
    return token;
  }

  private spanFrom(start: Position): Span {
    return { start, end: this.lastEnd };
  }
}

function describe(token: Token): string {
  switch (token.kind) {
    case 'eof':
      return 'end of input';
    case 'newline':
      return 'end of line';
    case 'string':
      return `string "${token.value}"`;
    case 'doc':
      return 'a documentation comment';
    default:
      return `'${token.value}'`;
  }
}

function joinDocs(leading: string | undefined, trailing: string | undefined): string | undefined {
  if (leading === undefined) return trailing;
  if (trailing === undefined) return leading;
  return `${leading}\n${trailing}`;
}
