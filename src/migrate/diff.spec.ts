import { BLOG_SCHEMA, withPostgres } from '../../test/fixtures/schemas';
import { DataModel } from '../data-model/data-model.types';
import { resolveDataModel } from '../data-model/resolver';
import { parseSchema } from '../language/parser';
import { diffDataModels, summarizeStep } from './diff';

const resolve = (source: string): DataModel => resolveDataModel(parseSchema(source));

const BEFORE = withPostgres(`model User {
  id    Int    @id @default(autoincrement())
  email String @unique
  name  String
  posts Post[]
}

model Post {
  id       Int    @id
  authorId Int
  author   User   @relation(fields: [authorId], references: [id])
  legacy   String

  @@index([authorId])
}

model Obsolete {
  id Int @id
}

enum Role {
  USER
  GUEST
}

enum Legacy {
  A
}
`);

const AFTER = withPostgres(`model User {
  id    Int     @id @default(autoincrement())
  email String
  name  String?
  role  Role    @default(USER)
  posts Post[]
}

model Post {
  id       Int    @id
  authorId Int
  author   User   @relation(fields: [authorId], references: [id])
  title    String

  @@unique([authorId, title])
}

model Tag {
  id   Int    @id
  name String @unique

  @@index([name])
}

enum Role {
  USER
  ADMIN
}

enum Status {
  DRAFT
}
`);

describe('diffDataModels', () => {
  it('should list steps in dependency order', () => {
    expect(diffDataModels(resolve(BEFORE), resolve(AFTER))).toEqual([
      { kind: 'AlterEnum', enum: 'Role', addedValues: ['ADMIN'], removedValues: ['GUEST'] },
      { kind: 'CreateEnum', enum: 'Status', values: ['DRAFT'] },
      { kind: 'CreateModel', model: 'Tag', fields: ['id', 'name'] },
      {
        kind: 'AlterField',
        model: 'User',
        field: 'email',
        from: 'String',
        to: 'String',
        changes: ['unique'],
      },
      {
        kind: 'AlterField',
        model: 'User',
        field: 'name',
        from: 'String',
        to: 'String?',
        changes: ['arity'],
      },
      { kind: 'AddField', model: 'User', field: 'role', type: 'Role' },
      { kind: 'AddField', model: 'Post', field: 'title', type: 'String' },
      { kind: 'CreateIndex', model: 'Tag', unique: false, fields: ['name'] },
      { kind: 'DropIndex', model: 'Post', unique: false, fields: ['authorId'] },
      { kind: 'CreateIndex', model: 'Post', unique: true, fields: ['authorId', 'title'] },
      { kind: 'DropField', model: 'Post', field: 'legacy' },
      { kind: 'DropModel', model: 'Obsolete' },
      { kind: 'DropEnum', enum: 'Legacy' },
    ]);
  });

  it('should return no steps for equal models', () => {
    expect(diffDataModels(resolve(BLOG_SCHEMA), resolve(BLOG_SCHEMA))).toEqual([]);
  });

  it('should create everything from an empty schema', () => {
    const steps = diffDataModels(resolve(''), resolve(BLOG_SCHEMA));

    expect(steps.map(summarizeStep)).toEqual([
      'Create enum Role (USER, ADMIN)',
      'Create model User (id, email, name, role, createdAt)',
      'Create model Profile (id, bio, userId)',
      'Create model Post (id, title, published, authorId, updatedAt)',
      'Create model Category (id, name)',
      'Create index on Post (authorId)',
    ]);
  });

  it('should detect changed defaults and types', () => {
    const before = resolve(withPostgres('model A {\n  id    Int @id\n  count Int @default(0)\n}\n'));
    const after = resolve(
      withPostgres('model A {\n  id    Int    @id\n  count BigInt @default(1)\n}\n'),
    );

    expect(diffDataModels(before, after)).toEqual([
      {
        kind: 'AlterField',
        model: 'A',
        field: 'count',
        from: 'Int',
        to: 'BigInt',
        changes: ['type', 'default'],
      },
    ]);
  });

  it('should see changes between large BigInt defaults', () => {
    const model = (value: string) =>
      resolve(withPostgres(`model A {\n  id    Int    @id\n  total BigInt @default(${value})\n}\n`));

    expect(diffDataModels(model('9007199254740992'), model('9007199254740993'))).toEqual([
      {
        kind: 'AlterField',
        model: 'A',
        field: 'total',
        from: 'BigInt',
        to: 'BigInt',
        changes: ['default'],
      },
    ]);
  });
});

describe('summarizeStep', () => {
  it('should render every step of a diff as one line', () => {
    expect(diffDataModels(resolve(BEFORE), resolve(AFTER)).map(summarizeStep)).toEqual([
      'Alter enum Role: add ADMIN; remove GUEST',
      'Create enum Status (DRAFT)',
      'Create model Tag (id, name)',
      'Alter field User.email from String to String (unique)',
      'Alter field User.name from String to String? (arity)',
      'Add field User.role (Role)',
      'Add field Post.title (String)',
      'Create index on Tag (name)',
      'Drop index on Post (authorId)',
      'Create unique index on Post (authorId, title)',
      'Drop field Post.legacy',
      'Drop model Obsolete',
      'Drop enum Legacy',
    ]);
  });

  it('should describe unique index drops', () => {
    expect(
      summarizeStep({
        kind: 'DropIndex',
        model: 'Post',
        unique: true,
        fields: ['slug'],
        name: 'post_slug_key',
      }),
    ).toBe('Drop unique index on Post (slug)');
  });
});
