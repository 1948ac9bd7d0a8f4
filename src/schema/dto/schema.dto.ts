import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const SchemaSourceSchema = z.object({
  schema: z.string().min(1, 'Schema text is required'),
});

export class SchemaSourceDto extends createZodDto(SchemaSourceSchema) {}

export const ResolveSchemaSchema = SchemaSourceSchema.extend({
  /** Variables for env() lookups. Takes precedence over `dotenv`. */
  env: z.record(z.string(), z.string()).optional(),
  /** Contents of a .env file. */
  dotenv: z.string().optional(),
});

export class ResolveSchemaDto extends createZodDto(ResolveSchemaSchema) {}
