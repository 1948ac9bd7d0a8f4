import { Injectable, Logger } from '@nestjs/common';

import { analyzeConfiguration } from '../environment/configuration';
import { SchemaService } from '../schema/schema.service';
import { GeneratedFile, GenerateOptions, generateClientTypes, generatorSettings } from './type-generator';

@Injectable()
export class GeneratorService {
  private readonly logger = new Logger(GeneratorService.name);

  constructor(private readonly schemaService: SchemaService) {}

  /**
   * Generates client types. Options missing from the request are read from
   * the schema's first generator block; env() values there are not resolved.
   */
  generateTypes(source: string, options: GenerateOptions = {}): { files: GeneratedFile[] } {
    const { document, dataModel } = this.schemaService.resolveDataModel(source);
    const [generator] = analyzeConfiguration(document, {}).configuration.generators;
    const defaults = generator ? generatorSettings(generator) : undefined;

    const files = generateClientTypes(dataModel, {
      target: options.target ?? defaults?.target,
      validation: options.validation ?? defaults?.validation,
    });
    this.logger.debug(`Generated ${files.length} files for ${dataModel.models.length} models`);
    return { files };
  }
}
