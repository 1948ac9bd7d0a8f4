import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { cleanupOpenApiDoc } from 'nestjs-zod';

import { API_PREFIX } from './common/interceptors/transform.interceptor';

/**
 * Applies the route prefix and OpenAPI docs. Shared by main.ts and the e2e
 * specs so both serve the same routes.
 */
export function setupApp(app: NestFastifyApplication): void {
  app.setGlobalPrefix(API_PREFIX, { exclude: ['metrics'] });

  const config = new DocumentBuilder()
    .setTitle('Schema Workbench')
    .setDescription('Parse, validate and resolve data model schemas')
    .setVersion('0.1.0')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, cleanupOpenApiDoc(document));
}
