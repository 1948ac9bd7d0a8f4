import { describe, expect, it } from 'vitest';

import { BLOG_SCHEMA } from '../../test/fixtures/schemas';
import { ModelBlock, findProperty, generatorsOf, datasourcesOf, modelsOf } from './ast';
import { SchemaParseError } from './diagnostics';
import { MAX_NESTING_DEPTH, parseSchema, tryParseSchema } from './parser';

const model = (blocks: ModelBlock[], name: string): ModelBlock => {
  const found = blocks.find((b) => b.name === name);
  if (!found) throw new Error(`model ${name} not parsed`);
  return found;
};

describe('parseSchema', () => {
  const document = parseSchema(BLOG_SCHEMA);
  const models = modelsOf(document);

  it('should parse every block in source order', () => {
    expect(document.blocks.map((b) => `${b.kind}:${b.name}`)).toEqual([
      'datasource:db',
      'generator:client',
      'model:User',
      'model:Profile',
      'model:Post',
      'model:Category',
      'enum:Role',
    ]);
  });

  it('should attach documentation comments to the following block', () => {
    expect(model(models, 'User').documentation).toBe('A registered author');
  });

  it('should parse field arity', () => {
    const user = model(models, 'User');
    expect(user.fields.find((f) => f.name === 'name')?.type).toMatchObject({
      name: 'String',
      arity: 'optional',
    });
    expect(user.fields.find((f) => f.name === 'posts')?.type).toMatchObject({
      name: 'Post',
      arity: 'list',
    });
  });

  it('should parse dotted native type attributes with arguments', () => {
    const title = model(models, 'Post').fields.find((f) => f.name === 'title');
    expect(title?.attributes).toHaveLength(1);
    expect(title?.attributes[0]).toMatchObject({
      name: 'db.VarChar',
      scope: 'field',
      arguments: [{ value: { kind: 'number', value: 200, raw: '200' } }],
    });
  });

  it('should parse named relation arguments', () => {
    const author = model(models, 'Post').fields.find((f) => f.name === 'author');
    const relation = author?.attributes[0];
    expect(relation?.arguments.map((a) => a.name)).toEqual(['fields', 'references', 'onDelete']);
    expect(relation?.arguments[0].value).toMatchObject({
      kind: 'array',
      items: [{ kind: 'constant', value: 'authorId' }],
    });
    expect(relation?.arguments[2].value).toMatchObject({ kind: 'constant', value: 'Cascade' });
  });

  it('should parse block attributes', () => {
    const post = model(models, 'Post');
    expect(post.attributes).toHaveLength(1);
    expect(post.attributes[0]).toMatchObject({ name: 'index', scope: 'block' });
  });

  it('should parse config properties', () => {
    const [datasource] = datasourcesOf(document);
    expect(findProperty(datasource, 'url')?.value).toMatchObject({
      kind: 'function',
      name: 'env',
      arguments: [{ value: { kind: 'string', value: 'DATABASE_URL' } }],
    });

    const [generator] = generatorsOf(document);
    expect(findProperty(generator, 'previewFeatures')?.value).toMatchObject({
      kind: 'array',
      items: [{ kind: 'string', value: 'fullTextSearch' }],
    });
  });

  it('should parse Unsupported field types', () => {
    const parsed = parseSchema('model Spot {\n  id Int @id\n  location Unsupported("geometry")?\n}');
    expect(modelsOf(parsed)[0].fields[1].type).toMatchObject({
      name: 'Unsupported',
      unsupported: 'geometry',
      arity: 'optional',
    });
  });

  it('should keep trailing documentation on a field', () => {
    const parsed = parseSchema('model A {\n  id Int @id /// the key\n}');
    expect(modelsOf(parsed)[0].fields[0].documentation).toBe('the key');
  });

  it('should throw SchemaParseError for optional lists', () => {
    expect(() => parseSchema('model User {\n  id Int[]?\n}')).toThrow(SchemaParseError);
    try {
      parseSchema('model User {\n  id Int[]?\n}');
    } catch (e) {
      expect(e instanceof SchemaParseError && e.diagnostics[0].message).toBe(
        'Optional lists are not supported',
      );
    }
  });
});

describe('tryParseSchema', () => {
  it('should skip a malformed line and keep the rest of the block', () => {
    const { document, diagnostics } = tryParseSchema(
      'model A {\n  id Int @id\n  = broken\n  name String\n}\n',
    );

    expect(diagnostics.map((d) => d.message)).toEqual([
      "Expected a field or block attribute but found '='",
    ]);
    expect(modelsOf(document)[0].fields.map((f) => f.name)).toEqual(['id', 'name']);
  });

  it('should report a block that is never closed', () => {
    const { document, diagnostics } = tryParseSchema('model A {\n  id Int @id\n');

    expect(diagnostics.map((d) => d.code)).toEqual(['E_UNCLOSED_BLOCK']);
    expect(modelsOf(document)[0].fields).toHaveLength(1);
  });

  it('should skip unknown top-level declarations up to the next block', () => {
    const { document, diagnostics } = tryParseSchema(
      'type Foo {\n  a String\n}\n\nenum Color {\n  RED\n}\n',
    );

    expect(diagnostics.map((d) => d.message)).toEqual([
      "Expected a model, enum, datasource or generator block but found 'type'",
    ]);
    expect(document.blocks.map((b) => b.name)).toEqual(['Color']);
  });

  it('should report an unclosed argument list', () => {
    const { diagnostics } = tryParseSchema(
      'model A {\n  id Int @default(autoincrement()\n  b Int\n}\n',
    );
    expect(diagnostics.map((d) => d.message)).toEqual([
      "Expected ')' to close the argument list but found 'b'",
    ]);
  });

  it('should include lexer diagnostics', () => {
    const { diagnostics } = tryParseSchema('model A {\n  id Int @id $\n}');
    expect(diagnostics[0]).toMatchObject({
      code: 'E_UNEXPECTED_CHARACTER',
      span: { start: { line: 2, column: 14 } },
    });
  });

  it('should report deeply nested values instead of overflowing the stack', () => {
    const { document, diagnostics } = tryParseSchema(
      `model A {\n  id Int @id @default(${'['.repeat(20000)})\n  name String\n}\n`,
    );

    expect(diagnostics.map((d) => d.code)).toEqual(['E_SYNTAX']);
    expect(diagnostics[0].message).toBe(
      `Values cannot be nested more than ${MAX_NESTING_DEPTH} levels deep`,
    );
    expect(modelsOf(document)[0].fields.map((f) => f.name)).toEqual(['name']);
  });
});
