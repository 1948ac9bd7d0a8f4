import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

const PositionSchema = z.object({
  offset: z.number().int(),
  line: z.number().int(),
  column: z.number().int(),
});

export const DiagnosticSchema = z.object({
  severity: z.enum(['error', 'warning']),
  code: z.string(),
  message: z.string(),
  span: z.object({ start: PositionSchema, end: PositionSchema }).optional(),
});

export const ValidationResultSchema = z.object({
  valid: z.boolean(),
  diagnostics: z.array(DiagnosticSchema),
});

export class ValidationResultDto extends createZodDto(ValidationResultSchema) {}

export const FormattedSchemaSchema = z.object({
  schema: z.string(),
});

export class FormattedSchemaDto extends createZodDto(FormattedSchemaSchema) {}

export const SchemaResolutionSchema = z.object({
  datasources: z.array(
    z.object({
      name: z.string(),
      provider: z.string(),
      url: z.string(),
      directUrl: z.string().optional(),
      shadowDatabaseUrl: z.string().optional(),
      relationMode: z.enum(['prisma', 'foreignKeys']).optional(),
      schemas: z.array(z.string()),
    }),
  ),
  generators: z.array(
    z.object({
      name: z.string(),
      provider: z.string(),
      output: z.string().optional(),
      previewFeatures: z.array(z.string()),
      binaryTargets: z.array(z.string()),
      config: z.record(z.string(), z.string()),
    }),
  ),
  envVars: z.array(z.string()),
  dataModel: z.object({
    provider: z.string().optional(),
    models: z.array(z.record(z.string(), z.unknown())),
    enums: z.array(z.record(z.string(), z.unknown())),
    relations: z.array(z.record(z.string(), z.unknown())),
  }),
  warnings: z.array(DiagnosticSchema),
});

export class SchemaResolutionDto extends createZodDto(SchemaResolutionSchema) {}

// The AST is recursive, so the document is documented loosely.
export const SchemaDocumentSchema = z.object({
  blocks: z.array(z.record(z.string(), z.unknown())),
});

export class SchemaDocumentDto extends createZodDto(SchemaDocumentSchema) {}
