import { NestFastifyApplication } from '@nestjs/platform-fastify';
import request from 'supertest';

import { BLOG_SCHEMA, withPostgres } from '../../fixtures/schemas';
import { createTestApp } from '../helpers/test-app';

describe('Migrations (e2e)', () => {
  let app: NestFastifyApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('should plan a first migration from an empty schema', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/migrations/diff')
      .send({ from: '', to: BLOG_SCHEMA, name: 'init blog' })
      .expect(200);

    expect(res.body.data.migrationName).toMatch(/^\d{14}_init_blog$/);
    expect(res.body.data.summary).toEqual([
      'Create enum Role (USER, ADMIN)',
      'Create model User (id, email, name, role, createdAt)',
      'Create model Profile (id, bio, userId)',
      'Create model Post (id, title, published, authorId, updatedAt)',
      'Create model Category (id, name)',
      'Create index on Post (authorId)',
    ]);
    expect(res.body.data.steps[0]).toEqual({
      kind: 'CreateEnum',
      enum: 'Role',
      values: ['USER', 'ADMIN'],
    });
  });

  it('should leave out the migration name unless one is given', async () => {
    const schema = withPostgres('model A {\n  id Int @id\n}\n');
    const res = await request(app.getHttpServer())
      .post('/api/migrations/diff')
      .send({ from: schema, to: schema })
      .expect(200);

    expect(res.body.data).toEqual({ steps: [], summary: [] });
  });

  it('should answer 422 when either schema is invalid', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/migrations/diff')
      .send({ from: 'model A {', to: BLOG_SCHEMA })
      .expect(422);

    expect(res.body.error.title).toBe('Schema parsing failed');
  });

  it('should answer 400 without a target schema', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/migrations/diff')
      .send({ from: '', to: '' })
      .expect(400);

    expect(res.body.error.message).toBe('to: Target schema text is required');
  });
});
