import { ConfigService } from '@nestjs/config';

import { withPostgres } from '../../test/fixtures/schemas';
import { SchemaService } from '../schema/schema.service';
import { MigrateService } from './migrate.service';

describe('MigrateService', () => {
  const service = new MigrateService(
    new SchemaService(new ConfigService({ SCHEMA_MAX_LENGTH: 10_000 })),
  );
  const now = new Date(Date.UTC(2024, 4, 1, 12, 0, 0));

  it('should name the migration and summarize its steps', () => {
    const plan = service.diff(
      {
        from: withPostgres('model A {\n  id Int @id\n}\n'),
        to: withPostgres('model A {\n  id   Int    @id\n  name String\n}\n'),
        name: 'add name',
      },
      now,
    );

    expect(plan).toEqual({
      migrationName: '20240501120000_add_name',
      steps: [{ kind: 'AddField', model: 'A', field: 'name', type: 'String' }],
      summary: ['Add field A.name (String)'],
    });
  });

  it('should treat an empty source schema as having no models', () => {
    const plan = service.diff({ from: '', to: withPostgres('model A {\n  id Int @id\n}\n') }, now);

    expect(plan.summary).toEqual(['Create model A (id)']);
    expect(plan.migrationName).toBeUndefined();
  });
});
