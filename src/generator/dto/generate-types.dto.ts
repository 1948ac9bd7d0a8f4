import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { SchemaSourceSchema } from '../../schema/dto/schema.dto';

export const GenerateTypesSchema = SchemaSourceSchema.extend({
  target: z.enum(['runtime', 'json']).optional(),
  validation: z.enum(['zod', 'none']).optional(),
});

export class GenerateTypesDto extends createZodDto(GenerateTypesSchema) {}

export const GeneratedFilesSchema = z.object({
  files: z.array(z.object({ path: z.string(), content: z.string() })),
});

export class GeneratedFilesDto extends createZodDto(GeneratedFilesSchema) {}
