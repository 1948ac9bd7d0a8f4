import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const DiffSchemasSchema = z.object({
  /** Schema currently applied. Empty for a first migration. */
  from: z.string(),
  to: z.string().min(1, 'Target schema text is required'),
  name: z.string().optional(),
});

export class DiffSchemasDto extends createZodDto(DiffSchemasSchema) {}

export const MigrationPlanSchema = z.object({
  migrationName: z.string().optional(),
  steps: z.array(z.object({ kind: z.string() }).catchall(z.unknown())),
  summary: z.array(z.string()),
});

export class MigrationPlanDto extends createZodDto(MigrationPlanSchema) {}
