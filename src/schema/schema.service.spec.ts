import { PayloadTooLargeException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { vi } from 'vitest';

import { SchemaValidationError } from '../language/diagnostics';
import { SchemaService } from './schema.service';

const createService = (config: Record<string, unknown> = {}): SchemaService =>
  new SchemaService(
    new ConfigService({ SCHEMA_MAX_LENGTH: 10_000, SCHEMA_ENV_PASSTHROUGH: false, ...config }),
  );

const SQLITE_FROM_ENV = `datasource db {
  provider = "sqlite"
  url      = env("SCHEMA_SERVICE_DB_URL")
}
`;

describe('SchemaService', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should reject schema text over the configured length', () => {
    const service = createService({ SCHEMA_MAX_LENGTH: 10 });

    expect(() => service.parse('model A {}\n')).toThrow(PayloadTooLargeException);
    expect(() => service.parse('model A {}\n')).toThrow(
      'Schema text is 11 characters long; the limit is 10',
    );
  });

  it('should report a problem found by both passes once', () => {
    const result = createService().validate('datasource db {\n  url = "file:dev.db"\n}\n');

    expect(result.valid).toBe(false);
    expect(result.diagnostics.map((d) => d.code)).toEqual(['E_MISSING_PROVIDER']);
  });

  it('should stop at parse errors', () => {
    const result = createService().validate('model A {\n  id Int @id\n');

    expect(result).toEqual({
      valid: false,
      diagnostics: [expect.objectContaining({ code: 'E_UNCLOSED_BLOCK' })],
    });
  });

  it('should prefer request variables over dotenv text', () => {
    const resolution = createService().resolve(SQLITE_FROM_ENV, {
      env: { SCHEMA_SERVICE_DB_URL: 'file:./request.db' },
      dotenv: 'SCHEMA_SERVICE_DB_URL=file:./dotenv.db',
    });

    expect(resolution.datasources[0].url).toBe('file:./request.db');
    expect(resolution.envVars).toEqual(['SCHEMA_SERVICE_DB_URL']);
  });

  it('should ignore the process environment unless passthrough is on', () => {
    vi.stubEnv('SCHEMA_SERVICE_DB_URL', 'file:./process.db');

    expect(() => createService().resolve(SQLITE_FROM_ENV)).toThrow(SchemaValidationError);
    expect(
      createService({ SCHEMA_ENV_PASSTHROUGH: true }).resolve(SQLITE_FROM_ENV).datasources[0].url,
    ).toBe('file:./process.db');
  });

  it('should not fall back to the process environment when the request brings variables', () => {
    vi.stubEnv('SCHEMA_SERVICE_DB_URL', 'file:./process.db');
    const service = createService({ SCHEMA_ENV_PASSTHROUGH: true });

    expect(() => service.resolve(SQLITE_FROM_ENV, { env: {} })).toThrow(
      'Schema validation failed with 1 error',
    );
  });

  it('should return warnings with the resolution', () => {
    const resolution = createService().resolve('model A {\n  id Int @id\n}\n');

    expect(resolution.warnings.map((d) => d.code)).toEqual(['W_NO_DATASOURCE']);
    expect(resolution.datasources).toEqual([]);
  });
});
